/**
 * Planning Model — forced tool-call planning over the Vercel AI SDK.
 *
 * Works with any OpenAI-compatible API:
 *   - OpenAI, SiliconFlow, Together, Azure OpenAI
 *   - Ollama, Gemini (via OpenAI-compatible endpoint)
 *   - DeepSeek through its dedicated provider
 *
 * The model is always asked for exactly one call of the tool matching the
 * request mode; callers get the raw tool calls and text back and parse
 * them with responseParser.ts.
 */

import { generateText, tool } from "ai";
import type { LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createDeepSeek } from "@ai-sdk/deepseek";
import { z } from "zod";
import type { RunnerConfig } from "../../config.js";
import { ExternalCallError } from "../../errors/index.js";

// ═══════════════════════════════════════════════════════
//                  Tool contracts
// ═══════════════════════════════════════════════════════

export const SINGLE_TOOL = "execute_contract_function";
export const BATCH_TOOL = "plan_contract_functions";

const FunctionCallSchema = z.object({
    function_name: z.string().describe("Exact name of an enabled contract function"),
    parameters: z.record(z.string(), z.unknown()).describe("Function arguments keyed by ABI parameter name"),
    message: z.string().describe("Short user-facing explanation of why this call is made"),
});

const PLANNING_TOOLS = {
    [SINGLE_TOOL]: tool({
        description: "Execute one function of the agent's smart contract",
        inputSchema: FunctionCallSchema,
    }),
    [BATCH_TOOL]: tool({
        description: "Plan the next contract function calls, in order. Return an empty list when nothing else is needed.",
        inputSchema: z.object({
            functions: z.array(FunctionCallSchema).describe("Calls to run sequentially; empty when the goal is met"),
        }),
    }),
};

// ═══════════════════════════════════════════════════════
//                 Planning Model Interface
// ═══════════════════════════════════════════════════════

export type PlanMode = "single" | "batch";

export interface PlanRequest {
    mode: PlanMode;
    system: string;
    prompt: string;
}

export interface RawToolCall {
    toolName: string;
    input: unknown;
}

export interface RawPlanResponse {
    toolCalls: RawToolCall[];
    text: string;
}

export interface PlanningModel {
    plan(request: PlanRequest): Promise<RawPlanResponse>;
}

// ═══════════════════════════════════════════════════════
//             AI SDK Planning Model
// ═══════════════════════════════════════════════════════

export interface AiPlanningModelConfig {
    provider: string;
    apiKey: string;
    model: string;
    baseUrl?: string;
    maxTokens?: number;
    timeoutMs?: number;
}

/** Known provider base URLs */
const PROVIDER_BASE_URLS: Record<string, string> = {
    openai: "https://api.openai.com/v1",
    deepseek: "https://api.deepseek.com/v1",
    ollama: "http://localhost:11434/v1",
};

export function resolveBaseUrl(provider: string, override?: string): string {
    if (override) return override;
    // Treat an unknown provider as a raw base URL
    return PROVIDER_BASE_URLS[provider] ?? provider;
}

export class AiPlanningModel implements PlanningModel {
    private model: LanguageModel;
    private maxTokens: number;
    private timeoutMs: number;

    constructor(config: AiPlanningModelConfig) {
        const baseURL = resolveBaseUrl(config.provider, config.baseUrl);
        this.maxTokens = config.maxTokens ?? 2048;
        this.timeoutMs = config.timeoutMs ?? 30_000;

        // DeepSeek's dedicated provider handles its tool calling format
        const isDeepSeek = baseURL.includes("deepseek.com") ||
            config.provider === "deepseek" ||
            config.model.includes("deepseek");

        if (isDeepSeek) {
            this.model = createDeepSeek({ baseURL, apiKey: config.apiKey })(config.model);
        } else {
            const openai = createOpenAI({
                baseURL,
                apiKey: config.apiKey,
                name: config.provider || "openai",
            });
            // .chat() forces the Chat Completions API (not Responses API)
            this.model = openai.chat(config.model);
        }
    }

    async plan(request: PlanRequest): Promise<RawPlanResponse> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            const result = await generateText({
                model: this.model,
                system: request.system,
                prompt: request.prompt,
                tools: PLANNING_TOOLS,
                toolChoice: {
                    type: "tool",
                    toolName: request.mode === "single" ? SINGLE_TOOL : BATCH_TOOL,
                },
                maxOutputTokens: this.maxTokens,
                maxRetries: 0,
                abortSignal: controller.signal,
            });

            return {
                toolCalls: result.toolCalls.map((call) => ({ toolName: call.toolName, input: call.input })),
                text: result.text,
            };
        } catch (err) {
            const message = controller.signal.aborted
                ? `request timeout after ${this.timeoutMs}ms`
                : err instanceof Error ? err.message : String(err);
            throw new ExternalCallError("llm", message, { cause: err });
        } finally {
            clearTimeout(timeout);
        }
    }
}

export function createPlanningModel(config: RunnerConfig): PlanningModel {
    return new AiPlanningModel({
        provider: config.llmProvider,
        apiKey: config.llmApiKey,
        model: config.llmModel,
        baseUrl: config.llmBaseUrl || undefined,
        maxTokens: config.llmMaxTokens,
        timeoutMs: config.llmTimeoutMs,
    });
}
