/**
 * Agent Directory client.
 *
 * The directory owns agents, their contracts, enabled functions and the
 * execution log. Reads return `null` for unknown records; writes go through
 * withRetry because the directory is eventually consistent and answers 5xx
 * under load.
 */

import { joinUrl, requestJson } from "../http.js";
import { ExternalCallError, withRetry } from "../errors/index.js";
import type { Logger } from "../logger.js";
import type {
    AgentProfile,
    ContractInfo,
    ContractState,
    ExecutionLogEntry,
    FunctionDescriptor,
} from "../types.js";
import {
    parseAgentProfile,
    parseContractInfo,
    parseFunctionDescriptors,
    parseLogId,
} from "../validation.js";

export interface AgentUpdate {
    contractState?: ContractState;
    status?: string;
}

export interface AgentDirectory {
    getAgent(agentId: string): Promise<AgentProfile | null>;
    updateAgent(agentId: string, update: AgentUpdate): Promise<void>;
    getContract(contractId: string): Promise<ContractInfo | null>;
    getAgentFunctions(agentId: string): Promise<FunctionDescriptor[]>;
    /** Returns the id of the created entry, when the directory reports one */
    createExecutionLog(agentId: string, entry: ExecutionLogEntry): Promise<string | undefined>;
    updateExecutionLog(agentId: string, logId: string, entry: Partial<ExecutionLogEntry>): Promise<void>;
}

export interface HttpAgentDirectoryConfig {
    baseUrl: string;
    apiKey?: string;
    timeoutMs: number;
    retryCount: number;
    retryBaseDelayMs: number;
    log?: Logger;
}

const SERVICE = "directory";

export class HttpAgentDirectory implements AgentDirectory {
    constructor(private readonly config: HttpAgentDirectoryConfig) {}

    async getAgent(agentId: string): Promise<AgentProfile | null> {
        const raw = await this.get(`agents/${encodeURIComponent(agentId)}`);
        if (raw === undefined || isEmptyList(raw)) return null;
        return parseAgentProfile(raw, agentId);
    }

    async updateAgent(agentId: string, update: AgentUpdate): Promise<void> {
        await this.write("PATCH", `agents/${encodeURIComponent(agentId)}`, {
            ...(update.contractState !== undefined ? { contract_state: update.contractState } : {}),
            ...(update.status !== undefined ? { status: update.status } : {}),
        });
    }

    async getContract(contractId: string): Promise<ContractInfo | null> {
        const raw = await this.get(`contracts/${encodeURIComponent(contractId)}`);
        if (raw === undefined || isEmptyList(raw)) return null;
        return parseContractInfo(raw, contractId);
    }

    async getAgentFunctions(agentId: string): Promise<FunctionDescriptor[]> {
        const raw = await this.get(`agents/${encodeURIComponent(agentId)}/functions`);
        if (raw === undefined) return [];
        return parseFunctionDescriptors(raw);
    }

    async createExecutionLog(agentId: string, entry: ExecutionLogEntry): Promise<string | undefined> {
        const raw = await this.write("POST", `agents/${encodeURIComponent(agentId)}/logs`, toLogBody(entry));
        return parseLogId(raw);
    }

    async updateExecutionLog(
        agentId: string,
        logId: string,
        entry: Partial<ExecutionLogEntry>,
    ): Promise<void> {
        await this.write(
            "PATCH",
            `agents/${encodeURIComponent(agentId)}/logs/${encodeURIComponent(logId)}`,
            toLogBody(entry),
        );
    }

    private get(path: string): Promise<unknown> {
        return withRetry(
            () => requestJson(joinUrl(this.config.baseUrl, path), {
                service: SERVICE,
                apiKey: this.config.apiKey,
                timeoutMs: this.config.timeoutMs,
            }),
            this.retryOptions(`GET ${path}`),
        );
    }

    private async write(method: "POST" | "PATCH", path: string, body: unknown): Promise<unknown> {
        const raw = await withRetry(
            () => requestJson(joinUrl(this.config.baseUrl, path), {
                method,
                body,
                service: SERVICE,
                apiKey: this.config.apiKey,
                timeoutMs: this.config.timeoutMs,
            }),
            this.retryOptions(`${method} ${path}`),
        );
        if (raw === undefined) {
            throw new ExternalCallError(SERVICE, `${method} ${path} returned 404`, { status: 404 });
        }
        return raw;
    }

    private retryOptions(label: string) {
        return {
            maxAttempts: this.config.retryCount,
            baseDelayMs: this.config.retryBaseDelayMs,
            label,
            log: this.config.log,
        };
    }
}

function isEmptyList(raw: unknown): boolean {
    return Array.isArray(raw) && raw.length === 0;
}

/** The directory stores execution logs with snake_case columns */
function toLogBody(entry: Partial<ExecutionLogEntry>): Record<string, unknown> {
    const body: Record<string, unknown> = {};
    if (entry.functionName !== undefined) body.function_name = entry.functionName;
    if (entry.params !== undefined) body.params = entry.params;
    if (entry.status !== undefined) body.status = entry.status;
    if (entry.message !== undefined) body.message = entry.message;
    if (entry.executionId !== undefined) body.execution_id = entry.executionId;
    if (entry.result !== undefined) body.result = entry.result;
    if (entry.error !== undefined) body.error = entry.error;
    if (entry.transactionHash !== undefined) body.transaction_hash = entry.transactionHash;
    if (entry.timestamp !== undefined) body.timestamp = entry.timestamp;
    return body;
}
