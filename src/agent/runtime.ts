/**
 * Agent Runtime — the plan–execute–reflect loop (`analyzeAndExecute`).
 *
 *   init → planning → executing → reflecting → (executing | done)
 *
 *   1. Plan     — Decision Engine picks the first actions
 *   2. Execute  — run them one by one, capturing each failure as an entry
 *   3. Reflect  — Reflection Engine reads the full history
 *   4. Repeat   — until reflection returns nothing or the cycle bound hits
 *
 * Nothing inside the loop throws to the caller: a partial run is always
 * returned. Successful read results are merged into the run's contract
 * state snapshot under the function name.
 */

import type { Agent, RunSettings } from "./agent.js";
import type { PlanningInput, ReflectionInput } from "../brain/interface.js";
import { applyExtractedParams } from "../description/parser.js";
import { defaultMessage } from "../brain/llm/responseParser.js";
import { AgentError } from "../errors/index.js";
import type { Logger } from "../logger.js";
import {
    metrics,
    METRIC_ACTIONS_FAILURE,
    METRIC_ACTIONS_SKIPPED,
    METRIC_ACTIONS_SUCCESS,
    METRIC_CYCLES_TOTAL,
    METRIC_MAX_CYCLES_REACHED,
} from "../metrics.js";
import type {
    Action,
    ActionParams,
    ContractState,
    CycleOutputEntry,
    ExecutionHistoryEntry,
    ExecutionResult,
    FunctionDescriptor,
    Trigger,
} from "../types.js";

// ═══════════════════════════════════════════════════════
//                   Run Result
// ═══════════════════════════════════════════════════════

export type RunPhase = "init" | "planning" | "executing" | "reflecting" | "done";

export type DoneReason = "no-actions" | "satisfied" | "max-cycles";

export interface RunReport {
    /** Every executed or failed action, in order, across all cycles */
    results: CycleOutputEntry[];
    history: ExecutionHistoryEntry[];
    /** Phase trace, ending in "done" */
    phases: RunPhase[];
    doneReason: DoneReason;
    /** Execute batches run */
    cycles: number;
    /** Contract state refreshed with this run's successful reads */
    contractState: ContractState;
}

export interface FunctionExecutor {
    executeFunction(fn: FunctionDescriptor, params: ActionParams, message?: string): Promise<ExecutionResult>;
}

/** Implemented by DecisionEngine */
export interface StatePlanner {
    analyzeState(input: PlanningInput): Promise<Action[]>;
}

/** Implemented by ReflectionEngine */
export interface ResultReflector {
    analyzeResults(input: ReflectionInput): Promise<Action[]>;
}

export interface RuntimeDeps {
    decision: StatePlanner;
    reflection: ResultReflector;
    executor: FunctionExecutor;
    settings: RunSettings;
    log: Logger;
}

/** Cycle bound for one run: trigger override clamped to the ceiling */
export function resolveCycleLimit(trigger: Trigger, settings: RunSettings): number {
    const ceiling = Math.max(1, settings.maxCyclesCeiling);
    const clamp = (n: number) => Math.min(ceiling, Math.max(1, Math.floor(n)));
    if (trigger.maxCycles !== undefined) return clamp(trigger.maxCycles);
    if (trigger.completeAllTasks) return ceiling;
    return clamp(settings.maxCycles);
}

// ═══════════════════════════════════════════════════════
//                   Cycle Controller
// ═══════════════════════════════════════════════════════

export async function analyzeAndExecute(
    agent: Agent,
    trigger: Trigger,
    deps: RuntimeDeps,
): Promise<RunReport> {
    const { log } = deps;
    const tag = `[agent:${agent.profile.id}]`;
    const limit = resolveCycleLimit(trigger, deps.settings);

    const phases: RunPhase[] = ["init"];
    const results: CycleOutputEntry[] = [];
    const history: ExecutionHistoryEntry[] = [];
    const contractState: ContractState = { ...agent.profile.contractState };

    const base: Omit<PlanningInput, "contractState"> = {
        agent: agent.profile,
        catalog: agent.catalog,
        description: agent.profile.description,
        analysis: applyExtractedParams(agent.analysis, trigger.extractedParams),
        trigger,
        defaultMintAmount: deps.settings.defaultMintAmount,
    };

    const finish = (doneReason: DoneReason, cycles: number): RunReport => {
        phases.push("done");
        log.info(`${tag} done: ${doneReason} after ${cycles} cycle(s), ${results.length} call(s)`);
        return { results, history, phases, doneReason, cycles, contractState };
    };

    // ───── Plan ─────
    phases.push("planning");
    let actions = await deps.decision.analyzeState({ ...base, contractState: { ...contractState } });
    if (actions.length === 0) {
        return finish("no-actions", 0);
    }

    for (let cycle = 1; ; cycle++) {
        // ───── Execute ─────
        phases.push("executing");
        metrics.inc(METRIC_CYCLES_TOTAL);
        log.info(`${tag} cycle ${cycle}/${limit}: ${actions.length} action(s)`);

        for (const action of actions) {
            await executeOne(action, cycle);
        }

        if (cycle >= limit) {
            metrics.inc(METRIC_MAX_CYCLES_REACHED);
            return finish("max-cycles", cycle);
        }

        // ───── Reflect ─────
        phases.push("reflecting");
        actions = await deps.reflection.analyzeResults({
            ...base,
            contractState: { ...contractState },
            history: [...history],
        });
        if (actions.length === 0) {
            return finish("satisfied", cycle);
        }
    }

    async function executeOne(action: Action, cycle: number): Promise<void> {
        const fn = agent.catalog.resolve(action.functionName);
        if (!fn) {
            metrics.inc(METRIC_ACTIONS_SKIPPED);
            log.debug(`${tag} skipping ${action.functionName}: not an enabled function`);
            return;
        }

        const message = action.message || defaultMessage(fn.name);
        const executed: Action = { functionName: fn.name, params: action.params, message };

        try {
            const result = await deps.executor.executeFunction(fn, action.params, message);
            history.push({ action: executed, result, message });
            results.push({ function: fn.name, params: action.params, result, message, cycle });

            if (result.success) {
                metrics.inc(METRIC_ACTIONS_SUCCESS);
                if (fn.type === "read" && result.data !== undefined) {
                    contractState[fn.name] = result.data;
                }
            } else {
                metrics.inc(METRIC_ACTIONS_FAILURE);
                log.warn(`${tag} ${fn.name} failed: ${result.error ?? "unknown error"}`);
            }
        } catch (err) {
            const error = AgentError.from(err);
            metrics.inc(METRIC_ACTIONS_FAILURE);
            log.warn(`${tag} ${fn.name} error (${error.code}): ${error.message}`);
            history.push({ action: executed, result: { success: false, error: error.message }, message });
            results.push({
                function: fn.name,
                params: action.params,
                error: error.message,
                errorCode: error.code,
                message,
                cycle,
            });
        }
    }
}
