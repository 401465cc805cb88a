/**
 * Execution Service — one trigger, one agent run (`executeAgent`).
 *
 * Loads the agent, wires the engines, runs the cycle controller and writes
 * the refreshed contract state back to the directory. Load failures come
 * back as a failed report with a sanitized message; they never throw.
 */

import { loadAgent } from "./agent/factory.js";
import type { RunSettings } from "./agent/agent.js";
import { analyzeAndExecute } from "./agent/runtime.js";
import type { DoneReason } from "./agent/runtime.js";
import { ActionExecutor } from "./actions/executor.js";
import { DecisionEngine } from "./brain/decisionEngine.js";
import { ReflectionEngine } from "./brain/reflectionEngine.js";
import { BehaviorStrategy } from "./brain/rule/behavior.js";
import { PendingTasksStrategy } from "./brain/rule/pendingTasks.js";
import { ThresholdStrategy } from "./brain/rule/threshold.js";
import { LlmDecisionStrategy, LlmReflectionStrategy } from "./brain/llm/agent.js";
import type { PlanningModel } from "./brain/llm/provider.js";
import type { AgentDirectory } from "./directory/client.js";
import type { ContractExecutionService } from "./execution/client.js";
import { AgentError, extractErrorMessage } from "./errors/index.js";
import type { Logger } from "./logger.js";
import { metrics, METRIC_ACTIVE_RUNS, METRIC_RUNS_TOTAL } from "./metrics.js";
import type { FailureCode } from "./runFailure.js";
import type { CycleOutputEntry } from "./types.js";
import { parseTrigger } from "./validation.js";

export interface ServiceSettings extends RunSettings {
    defaultGasLimit: string;
    defaultMaxPriorityFee: string;
}

export interface ServiceDeps {
    directory: AgentDirectory;
    execution: ContractExecutionService;
    model: PlanningModel;
    settings: ServiceSettings;
    log: Logger;
}

export type ExecuteAgentResult =
    | {
        success: true;
        agentId: string;
        results: CycleOutputEntry[];
        executionCount: number;
        cycles: number;
        doneReason: DoneReason;
        message?: string;
    }
    | {
        success: false;
        agentId: string;
        error: string;
        errorCode: FailureCode;
    };

function summarize(doneReason: DoneReason, calls: number, cycles: number): string | undefined {
    switch (doneReason) {
        case "no-actions":
            return "No actions were needed for this agent.";
        case "satisfied":
            return `Completed ${calls} call(s) in ${cycles} cycle(s).`;
        case "max-cycles":
            return `Stopped after ${cycles} cycle(s) with ${calls} call(s); the cycle limit was reached.`;
    }
}

/**
 * Run one agent for one trigger. The trigger may use camelCase or
 * snake_case keys; without one a manual trigger is synthesized.
 */
export async function executeAgent(
    agentId: string,
    deps: ServiceDeps,
    rawTrigger?: unknown,
): Promise<ExecuteAgentResult> {
    const { log, settings } = deps;
    const tag = `[agent:${agentId}]`;
    metrics.inc(METRIC_RUNS_TOTAL);
    metrics.set(METRIC_ACTIVE_RUNS, metrics.gauge(METRIC_ACTIVE_RUNS) + 1);

    try {
        const trigger = parseTrigger(rawTrigger ?? { trigger_type: "manual" });
        const agent = await loadAgent(agentId, deps.directory, settings);
        log.info(`${tag} run ${trigger.executionId} (${trigger.triggerType}): ${agent.catalog.size} enabled function(s)`);

        const executor = new ActionExecutor({
            agent: agent.profile,
            contract: agent.contract,
            directory: deps.directory,
            execution: deps.execution,
            log,
            executionId: trigger.executionId,
        });
        const report = await analyzeAndExecute(agent, trigger, {
            decision: new DecisionEngine(
                [new BehaviorStrategy(), new LlmDecisionStrategy(deps.model, log)],
                log,
            ),
            reflection: new ReflectionEngine(
                [new PendingTasksStrategy(), new ThresholdStrategy(), new LlmReflectionStrategy(deps.model, log)],
                log,
            ),
            executor,
            settings,
            log,
        });

        if (report.results.length > 0) {
            try {
                await deps.directory.updateAgent(agentId, { contractState: report.contractState });
            } catch (err) {
                log.warn(`${tag} failed to persist contract state: ${extractErrorMessage(err)}`);
            }
        }

        const message = summarize(report.doneReason, report.results.length, report.cycles);
        return {
            success: true,
            agentId,
            results: report.results,
            executionCount: report.results.length,
            cycles: report.cycles,
            doneReason: report.doneReason,
            ...(message ? { message } : {}),
        };
    } catch (err) {
        const error = AgentError.from(err);
        log.error(`${tag} run failed (${error.code}): ${error.message}`);
        return { success: false, agentId, error: error.userMessage, errorCode: error.code };
    } finally {
        metrics.set(METRIC_ACTIVE_RUNS, Math.max(0, metrics.gauge(METRIC_ACTIVE_RUNS) - 1));
    }
}
