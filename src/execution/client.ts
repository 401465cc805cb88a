/**
 * Contract Execution Service client.
 *
 * The route is selected from the function type and never sent as a field:
 * reads go to /contracts/read, writes and payable calls to /contracts/write.
 * Dispatches are not retried; a write may already have been broadcast.
 */

import { joinUrl, requestJson } from "../http.js";
import { ExternalCallError } from "../errors/index.js";
import type { ExecutionPayload, ExecutionResult, FunctionType } from "../types.js";
import { parseExecutionResponse } from "../validation.js";

export interface ContractExecutionService {
    dispatch(type: FunctionType, payload: ExecutionPayload): Promise<ExecutionResult>;
}

export interface HttpContractExecutionConfig {
    baseUrl: string;
    apiKey?: string;
    timeoutMs: number;
}

const SERVICE = "execution";

export function routeFor(type: FunctionType): string {
    return type === "read" ? "contracts/read" : "contracts/write";
}

export class HttpContractExecutionService implements ContractExecutionService {
    constructor(private readonly config: HttpContractExecutionConfig) {}

    async dispatch(type: FunctionType, payload: ExecutionPayload): Promise<ExecutionResult> {
        const route = routeFor(type);
        const raw = await requestJson(joinUrl(this.config.baseUrl, route), {
            method: "POST",
            body: payload,
            service: SERVICE,
            apiKey: this.config.apiKey,
            timeoutMs: this.config.timeoutMs,
        });
        if (raw === undefined) {
            throw new ExternalCallError(SERVICE, `POST ${route} returned 404`, { status: 404 });
        }
        return parseExecutionResponse(raw);
    }
}
