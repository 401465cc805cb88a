/**
 * Reflection Engine — what to run next, given everything run so far
 * (`analyzeResults`).
 *
 * Chain: pending tasks → threshold rule → LLM batch planner. An empty
 * list means the run is finished. Never throws: when the LLM fails, the
 * pending tasks are all that is left to do.
 */

import type { ReflectionInput, ReflectionStrategy } from "./interface.js";
import { admitActions } from "./admission.js";
import { describeActions } from "./decisionEngine.js";
import { derivePendingTasks } from "./rule/pendingTasks.js";
import type { Action } from "../types.js";
import type { Logger } from "../logger.js";
import { extractErrorMessage } from "../errors/index.js";
import { metrics, METRIC_LLM_FALLBACKS } from "../metrics.js";

export class ReflectionEngine {
    constructor(
        private readonly strategies: ReflectionStrategy[],
        private readonly log: Logger,
    ) {}

    async analyzeResults(input: ReflectionInput): Promise<Action[]> {
        const tag = `[agent:${input.agent.id}]`;

        for (const strategy of this.strategies) {
            if (strategy.deterministic && input.trigger.forceLlm) continue;

            try {
                const outcome = await strategy.reflect(input);
                if (outcome.kind === "pass") continue;
                if (outcome.kind === "satisfied") {
                    this.log.info(`${tag} satisfied (${strategy.name}): ${outcome.reason}`);
                    return [];
                }
                const admitted = admitActions(outcome.actions, input);
                this.log.info(`${tag} next (${strategy.name}): ${describeActions(admitted)}`);
                return admitted;
            } catch (err) {
                metrics.inc(METRIC_LLM_FALLBACKS);
                this.log.warn(`${tag} ${strategy.name} reflection failed, falling back to pending tasks: ${extractErrorMessage(err)}`);
                return admitActions(derivePendingTasks(input), input);
            }
        }

        return [];
    }
}
