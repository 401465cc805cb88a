/**
 * AgentError — typed error family for the contract agent runner.
 *
 * Every error carries structured failure metadata:
 * - category: configuration / lookup / validation / external call
 * - code: specific FailureCode
 * - retryable: whether withRetry may attempt the call again
 * - userMessage: sanitized string safe for user display
 */

import type { FailureCategory, FailureCode } from "../runFailure.js";
import { classifyFailureFromError, isTransientFailure } from "../runFailure.js";
import { sanitizeForUser } from "../errors.js";
import { metrics, METRIC_RETRIES } from "../metrics.js";
import type { Logger } from "../logger.js";

export interface AgentErrorOptions {
    category?: FailureCategory;
    code?: FailureCode;
    retryable?: boolean;
    cause?: unknown;
}

export class AgentError extends Error {
    readonly category: FailureCategory;
    readonly code: FailureCode;
    readonly retryable: boolean;
    readonly userMessage: string;

    constructor(message: string, opts?: AgentErrorOptions) {
        super(message, { cause: opts?.cause });
        this.name = "AgentError";

        const classified = classifyFailureFromError(message);
        this.category = opts?.category ?? classified.category;
        this.code = opts?.code ?? classified.code;
        this.retryable = opts?.retryable ?? isTransientFailure(this.code);
        this.userMessage = sanitizeForUser(message);
    }

    /** Wrap any unknown caught value into an AgentError */
    static from(err: unknown): AgentError {
        if (err instanceof AgentError) return err;
        const message = err instanceof Error ? err.message : String(err);
        return new AgentError(message, { cause: err });
    }

    static isRetryable(err: unknown): boolean {
        if (err instanceof AgentError) return err.retryable;
        const message = err instanceof Error ? err.message : String(err);
        return isTransientFailure(classifyFailureFromError(message).code);
    }
}

/** Missing required agent/contract/function fields or settings. Fatal at setup. */
export class ConfigurationError extends AgentError {
    constructor(message: string, opts?: { cause?: unknown }) {
        super(message, {
            category: "configuration_error",
            code: "CONFIG_MISSING_FIELD",
            retryable: false,
            cause: opts?.cause,
        });
        this.name = "ConfigurationError";
    }
}

/** A directory record (agent, contract) does not exist. */
export class LookupError extends AgentError {
    readonly resource: string;
    readonly resourceId: string;

    constructor(resource: string, resourceId: string) {
        super(`${resource} ${resourceId} not found`, {
            category: "lookup_error",
            code: "LOOKUP_NOT_FOUND",
            retryable: false,
        });
        this.name = "LookupError";
        this.resource = resource;
        this.resourceId = resourceId;
    }
}

/** Unknown function, missing parameter or type mismatch, found before any external call. */
export class ValidationError extends AgentError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = [], code: FailureCode = "VALIDATION_RULE_FAILED") {
        super(message, { category: "validation_error", code, retryable: false });
        this.name = "ValidationError";
        this.issues = issues;
    }
}

function externalFailureCode(message: string, status?: number): FailureCode {
    if (status === 429) return "EXTERNAL_RATE_LIMIT";
    const classified = classifyFailureFromError(message);
    if (classified.category === "external_call_error" && classified.code !== "EXTERNAL_RUNTIME_EXCEPTION") {
        return classified.code;
    }
    return status != null ? "EXTERNAL_HTTP_ERROR" : "EXTERNAL_RUNTIME_EXCEPTION";
}

/** Failure talking to the directory, the execution service or the LLM. */
export class ExternalCallError extends AgentError {
    readonly service: string;
    readonly status?: number;

    constructor(service: string, message: string, opts?: { status?: number; cause?: unknown }) {
        const status = opts?.status;
        const code = externalFailureCode(message, status);
        const retryable = status != null
            ? status === 429 || status >= 500
            : isTransientFailure(code);

        super(`${service}: ${message}`, {
            category: "external_call_error",
            code,
            retryable,
            cause: opts?.cause,
        });
        this.name = "ExternalCallError";
        this.service = service;
        this.status = status;
    }
}

// ═══════════════════════════════════════════════════════
//                  Retry Utility
// ═══════════════════════════════════════════════════════

export interface RetryOptions {
    /** Maximum number of attempts (including the first one). Default: 3 */
    maxAttempts?: number;
    /** Base delay in ms between retries. Default: 500 */
    baseDelayMs?: number;
    /** Whether to use exponential backoff. Default: true */
    exponential?: boolean;
    /** Optional label for logging. */
    label?: string;
    /** Decides if an error is worth another attempt. Default: AgentError.isRetryable */
    isRetryable?: (err: unknown) => boolean;
    log?: Logger;
}

/**
 * Retry wrapper for transient external failures.
 * Errors the predicate rejects are thrown on the first attempt.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    opts?: RetryOptions,
): Promise<T> {
    const maxAttempts = Math.max(1, opts?.maxAttempts ?? 3);
    const baseDelayMs = opts?.baseDelayMs ?? 500;
    const exponential = opts?.exponential ?? true;
    const label = opts?.label ?? "operation";
    const isRetryable = opts?.isRetryable ?? AgentError.isRetryable;

    let attempt = 1;
    for (;;) {
        try {
            return await fn();
        } catch (err) {
            if (attempt >= maxAttempts || !isRetryable(err)) {
                throw AgentError.from(err);
            }

            const delay = exponential
                ? baseDelayMs * Math.pow(2, attempt - 1)
                : baseDelayMs;
            const notice = `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed, retrying in ${delay}ms...`;
            if (opts?.log) {
                opts.log.warn(notice);
            } else {
                console.warn(`  ${notice}`);
            }
            metrics.inc(METRIC_RETRIES);
            await new Promise((resolve) => setTimeout(resolve, delay));
            attempt++;
        }
    }
}
