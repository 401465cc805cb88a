/**
 * Decision Engine — the first plan of a run (`analyzeState`).
 *
 * Chain: behavior rule → LLM single-call planner. Never throws: when the
 * LLM fails, the run starts from the behavior heuristic plus any reads
 * the description names, or from nothing.
 */

import type { DecisionStrategy, PlanningInput } from "./interface.js";
import { admitActions } from "./admission.js";
import { behaviorActions } from "./rule/behavior.js";
import { derivePendingTasks } from "./rule/pendingTasks.js";
import type { Action } from "../types.js";
import type { Logger } from "../logger.js";
import { extractErrorMessage } from "../errors/index.js";
import { metrics, METRIC_LLM_FALLBACKS } from "../metrics.js";

/** Heuristic plan used when the LLM planner is unavailable */
export function fallbackPlan(input: PlanningInput): Action[] {
    return [
        ...behaviorActions(input),
        ...derivePendingTasks({ ...input, history: [] }),
    ];
}

export class DecisionEngine {
    constructor(
        private readonly strategies: DecisionStrategy[],
        private readonly log: Logger,
    ) {}

    async analyzeState(input: PlanningInput): Promise<Action[]> {
        const tag = `[agent:${input.agent.id}]`;

        for (const strategy of this.strategies) {
            if (strategy.deterministic && input.trigger.forceLlm) continue;

            let actions: Action[] | undefined;
            try {
                actions = await strategy.decide(input);
            } catch (err) {
                metrics.inc(METRIC_LLM_FALLBACKS);
                this.log.warn(`${tag} ${strategy.name} planner failed, using heuristic plan: ${extractErrorMessage(err)}`);
                return admitActions(fallbackPlan(input), input);
            }

            if (actions !== undefined) {
                const admitted = admitActions(actions, input);
                this.log.info(`${tag} plan (${strategy.name}): ${describeActions(admitted)}`);
                return admitted;
            }
        }

        return [];
    }
}

export function describeActions(actions: Action[]): string {
    if (actions.length === 0) return "nothing";
    return actions.map((action) => action.functionName).join(", ");
}
