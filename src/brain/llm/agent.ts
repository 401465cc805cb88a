/**
 * LLM planner strategies — the last link of both strategy chains.
 *
 * Decision asks for a single function call; reflection asks for a batch
 * with the whole execution history in the prompt. Failures propagate as
 * ExternalCallError: the engines own the fallback.
 */

import type {
    DecisionStrategy,
    PlanningInput,
    ReflectionInput,
    ReflectionOutcome,
    ReflectionStrategy,
} from "../interface.js";
import type { Action } from "../../types.js";
import { toJson } from "../../http.js";
import type { Logger } from "../../logger.js";
import { metrics, METRIC_LLM_CALLS } from "../../metrics.js";
import type { PlanMode, PlanningModel } from "./provider.js";
import { buildSystemPrompt, buildUserPrompt } from "./prompt.js";
import { parsePlanResponse } from "./responseParser.js";

async function askModel(
    model: PlanningModel,
    mode: PlanMode,
    input: PlanningInput,
    log: Logger,
    history?: ReflectionInput["history"],
): Promise<Action[]> {
    metrics.inc(METRIC_LLM_CALLS);
    const response = await model.plan({
        mode,
        system: buildSystemPrompt(mode),
        prompt: buildUserPrompt(input, history),
    });

    for (const call of response.toolCalls) {
        log.debug(`[agent:${input.agent.id}] [LLM Tool] ${call.toolName}(${toJson(call.input ?? null).slice(0, 200)})`);
    }
    if (response.toolCalls.length === 0 && response.text) {
        log.debug(`[agent:${input.agent.id}] [LLM Raw] ${response.text.slice(0, 200)}`);
    }

    return parsePlanResponse(response, input.catalog.enabled());
}

export class LlmDecisionStrategy implements DecisionStrategy {
    readonly name = "llm";
    readonly deterministic = false;

    constructor(private readonly model: PlanningModel, private readonly log: Logger) {}

    async decide(input: PlanningInput): Promise<Action[]> {
        return askModel(this.model, "single", input, this.log);
    }
}

export class LlmReflectionStrategy implements ReflectionStrategy {
    readonly name = "llm";
    readonly deterministic = false;

    constructor(private readonly model: PlanningModel, private readonly log: Logger) {}

    async reflect(input: ReflectionInput): Promise<ReflectionOutcome> {
        const actions = await askModel(this.model, "batch", input, this.log, input.history);
        return { kind: "actions", actions };
    }
}
