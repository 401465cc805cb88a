/**
 * Action Executor — validates one action, dispatches it to the Contract
 * Execution Service and records it in the directory's execution log.
 *
 * Execution-log writes are best-effort: a failed write is warned about and
 * counted, never allowed to block or fail the dispatch.
 */

import type { AgentDirectory } from "../directory/client.js";
import type { ContractExecutionService } from "../execution/client.js";
import { ValidationError, extractErrorMessage } from "../errors/index.js";
import { toJson } from "../http.js";
import type { Logger } from "../logger.js";
import { metrics, METRIC_LOG_WRITE_FAILURES } from "../metrics.js";
import type {
    ActionParams,
    AgentProfile,
    ContractAbi,
    ContractInfo,
    ExecutionLogEntry,
    ExecutionPayload,
    ExecutionResult,
    FunctionDescriptor,
} from "../types.js";
import { validateFunctionParams } from "./paramsValidator.js";

export interface ActionExecutorDeps {
    agent: AgentProfile;
    contract: ContractInfo;
    directory: AgentDirectory;
    execution: ContractExecutionService;
    log: Logger;
    /** Trigger execution id stamped on every log entry */
    executionId?: string;
}

/** Function ABI item, else the contract ABI, else one synthesized from the inputs */
export function resolveAbi(fn: FunctionDescriptor, contract: ContractInfo): ContractAbi {
    if (fn.fragment) return [fn.fragment];
    if (contract.abi.length > 0) return contract.abi;
    return [{
        type: "function",
        name: fn.name,
        inputs: fn.inputs,
        outputs: [],
        stateMutability: fn.type === "read" ? "view" : fn.type === "payable" ? "payable" : "nonpayable",
    }];
}

export function buildPayload(
    fn: FunctionDescriptor,
    params: ActionParams,
    agent: AgentProfile,
    contract: ContractInfo,
): ExecutionPayload {
    const payload: ExecutionPayload = {
        contractAddress: contract.address,
        abi: resolveAbi(fn, contract),
        functionName: fn.name,
        inputs: fn.inputs.map((input) => params[input.name]),
    };
    if (fn.type !== "read") {
        payload.gasLimit = agent.gasLimit;
        payload.maxPriorityFee = agent.maxPriorityFee;
    }
    return payload;
}

export class ActionExecutor {
    constructor(private readonly deps: ActionExecutorDeps) {}

    /**
     * Execute one contract function.
     *
     * Throws ValidationError before any external call when params do not
     * fit the ABI or the stored rules. Dispatch failures are logged as
     * `failed` and re-thrown; a service answer with `success: false` is
     * returned as-is.
     */
    async executeFunction(
        fn: FunctionDescriptor,
        params: ActionParams,
        message?: string,
    ): Promise<ExecutionResult> {
        const validation = validateFunctionParams(fn, params);
        if (!validation.ok) {
            const issues = validation.issues.map((issue) => issue.message);
            throw new ValidationError(
                `Invalid params for ${fn.name}: ${issues.join("; ")}`,
                issues,
                validation.issues[0]?.code,
            );
        }

        const { agent, contract, directory, execution, log } = this.deps;
        const payload = buildPayload(fn, params, agent, contract);
        const base = {
            functionName: fn.name,
            params,
            ...(message !== undefined ? { message } : {}),
            ...(this.deps.executionId !== undefined ? { executionId: this.deps.executionId } : {}),
        };

        const logId = await this.bestEffort("create pending log", () =>
            directory.createExecutionLog(agent.id, { ...base, status: "pending", timestamp: now() })
        );

        let result: ExecutionResult;
        try {
            log.debug(`[agent:${agent.id}] dispatch ${fn.type} ${fn.name}(${toJson(payload.inputs)})`);
            result = await execution.dispatch(fn.type, payload);
        } catch (err) {
            await this.recordOutcome(logId, {
                ...base,
                status: "failed",
                error: extractErrorMessage(err),
                timestamp: now(),
            });
            throw err;
        }

        await this.recordOutcome(logId, {
            ...base,
            status: result.success ? "success" : "failed",
            ...(result.data !== undefined ? { result: result.data } : {}),
            ...(result.error !== undefined ? { error: result.error } : {}),
            ...(result.transactionHash !== undefined ? { transactionHash: result.transactionHash } : {}),
            timestamp: now(),
        });
        return result;
    }

    /** Update the pending entry, or create a final one when there is none */
    private async recordOutcome(logId: string | undefined, entry: ExecutionLogEntry): Promise<void> {
        const { agent, directory } = this.deps;
        if (logId) {
            await this.bestEffort("update log", () => directory.updateExecutionLog(agent.id, logId, entry));
        } else {
            await this.bestEffort("create final log", () => directory.createExecutionLog(agent.id, entry));
        }
    }

    private async bestEffort<T>(label: string, fn: () => Promise<T>): Promise<T | undefined> {
        try {
            return await fn();
        } catch (err) {
            metrics.inc(METRIC_LOG_WRITE_FAILURES);
            this.deps.log.warn(`[agent:${this.deps.agent.id}] execution log: ${label} failed: ${extractErrorMessage(err)}`);
            return undefined;
        }
    }
}

function now(): string {
    return new Date().toISOString();
}
