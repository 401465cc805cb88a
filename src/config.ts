/**
 * Environment-driven configuration for the contract agent runner.
 *
 * Values are read once at startup. Missing required variables raise a
 * ConfigurationError so the process never starts half-configured.
 */

import { ConfigurationError } from "./errors/AgentError.js";

type Env = Record<string, string | undefined>;

function requiredAny(env: Env, keys: string[]): string {
    for (const key of keys) {
        const value = env[key];
        if (value) return value;
    }
    throw new ConfigurationError(`Missing required env var (any of): ${keys.join(", ")}`);
}

function optionalAny(env: Env, keys: string[], fallback: string): string {
    for (const key of keys) {
        const value = env[key];
        if (value) return value;
    }
    return fallback;
}

function optionalInt(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (!raw) return fallback;
    const value = Number.parseInt(raw, 10);
    return Number.isFinite(value) ? value : fallback;
}

export interface RunnerConfig {
    // Agent Directory Service
    directoryApiUrl: string;
    directoryApiKey: string;

    // Contract Execution Service
    executionApiUrl: string;
    executionApiKey: string;

    // HTTP transport
    httpTimeoutMs: number;
    httpRetryCount: number;
    httpRetryBaseDelayMs: number;

    // LLM planning
    llmProvider: string;
    llmApiKey: string;
    llmBaseUrl: string;
    llmModel: string;
    llmMaxTokens: number;
    llmTimeoutMs: number;

    // Cycle bounds
    maxCycles: number;
    maxCyclesCeiling: number;

    // Fallbacks for agents stored without gas settings
    defaultGasLimit: string;
    defaultMaxPriorityFee: string;
    defaultMintAmount: number;

    // Logging
    logLevel: string;
    logJson: boolean;
}

export function loadConfig(env: Env = process.env): RunnerConfig {
    const maxCyclesCeiling = Math.max(1, optionalInt(env, "MAX_CYCLES_CEILING", 20));
    const maxCycles = Math.min(
        maxCyclesCeiling,
        Math.max(1, optionalInt(env, "MAX_CYCLES", 5)),
    );

    return {
        directoryApiUrl: requiredAny(env, ["DIRECTORY_API_URL", "DB_API_URL"]).replace(/\/+$/, ""),
        directoryApiKey: optionalAny(env, ["DIRECTORY_API_KEY"], ""),

        executionApiUrl: requiredAny(env, ["EXECUTION_API_URL", "BLOCKCHAIN_API_URL"]).replace(/\/+$/, ""),
        executionApiKey: optionalAny(env, ["EXECUTION_API_KEY"], ""),

        httpTimeoutMs: optionalInt(env, "HTTP_TIMEOUT_MS", 15_000),
        httpRetryCount: Math.max(1, optionalInt(env, "HTTP_RETRY_COUNT", 3)),
        httpRetryBaseDelayMs: optionalInt(env, "HTTP_RETRY_BASE_DELAY_MS", 500),

        llmProvider: optionalAny(env, ["LLM_PROVIDER"], "openai"),
        llmApiKey: optionalAny(env, ["LLM_API_KEY", "OPENAI_API_KEY"], ""),
        llmBaseUrl: optionalAny(env, ["LLM_BASE_URL"], ""),
        llmModel: optionalAny(env, ["LLM_MODEL", "OPENAI_MODEL"], "gpt-4o"),
        llmMaxTokens: optionalInt(env, "LLM_MAX_TOKENS", 2048),
        llmTimeoutMs: optionalInt(env, "LLM_TIMEOUT_MS", 30_000),

        maxCycles,
        maxCyclesCeiling,

        defaultGasLimit: optionalAny(env, ["DEFAULT_GAS_LIMIT"], "1000000"),
        defaultMaxPriorityFee: optionalAny(env, ["DEFAULT_MAX_PRIORITY_FEE"], "2"),
        defaultMintAmount: optionalInt(env, "DEFAULT_MINT_AMOUNT", 5_000_000),

        logLevel: optionalAny(env, ["LOG_LEVEL"], "info"),
        logJson: optionalAny(env, ["LOG_FORMAT"], "text").toLowerCase() === "json",
    };
}
