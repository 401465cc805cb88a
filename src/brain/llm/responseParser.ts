/**
 * Response Parser — turns an LLM planning response into actions.
 *
 * Two plan shapes are accepted, as one tagged union:
 *   - single: { function_name, parameters, message }
 *   - batch:  { functions: [ { function_name, parameters, message }, ... ] }
 *
 * Order of trust:
 *   1. structured tool calls
 *   2. JSON in the text (code block, whole text, first object or array)
 *   3. mentions of catalog function names, each with the nearest
 *      following address
 * Every action leaves here with a message.
 */

import { z } from "zod";
import type { Action, ActionParams, FunctionDescriptor } from "../../types.js";
import { camelizeKeys, parseJsonString } from "../../validation.js";
import type { RawPlanResponse } from "./provider.js";

export type PlanShape =
    | { kind: "single"; call: Action }
    | { kind: "batch"; calls: Action[] };

const ADDRESS_RE = /0x[0-9a-fA-F]{40}(?![0-9a-fA-F])/g;

const paramsSchema = z.preprocess(parseJsonString, z.record(z.string(), z.unknown()));

const callSchema = z.preprocess(camelizeKeys, z.object({
    functionName: z.string().optional(),
    function: z.string().optional(),
    name: z.string().optional(),
    parameters: paramsSchema.optional(),
    params: paramsSchema.optional(),
    arguments: paramsSchema.optional(),
    args: paramsSchema.optional(),
    message: z.string().optional(),
    reason: z.string().optional(),
}));

const batchSchema = z.object({ functions: z.array(z.unknown()) });

export function defaultMessage(functionName: string): string {
    return `Executing ${functionName}`;
}

function toAction(raw: unknown): Action | undefined {
    const parsed = callSchema.safeParse(raw);
    if (!parsed.success) return undefined;
    const call = parsed.data;
    const functionName = (call.functionName ?? call.function ?? call.name ?? "").trim();
    if (!functionName) return undefined;
    const params: ActionParams = call.parameters ?? call.params ?? call.arguments ?? call.args ?? {};
    const message = (call.message ?? call.reason ?? "").trim();
    return { functionName, params, message: message || defaultMessage(functionName) };
}

/** Classify one JSON value as a single or batch plan */
export function toPlanShape(value: unknown): PlanShape | undefined {
    const batch = batchSchema.safeParse(value);
    if (batch.success) {
        return { kind: "batch", calls: batch.data.functions.flatMap((item) => toAction(item) ?? []) };
    }
    if (Array.isArray(value)) {
        return { kind: "batch", calls: value.flatMap((item) => toAction(item) ?? []) };
    }
    const single = toAction(value);
    return single ? { kind: "single", call: single } : undefined;
}

function actionsOf(shape: PlanShape): Action[] {
    return shape.kind === "single" ? [shape.call] : shape.calls;
}

// ═══════════════════════════════════════════════════════
//                   Text fallbacks
// ═══════════════════════════════════════════════════════

function tryJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/** JSON candidates in the text, most explicit first */
function jsonCandidates(text: string): unknown[] {
    const out: unknown[] = [];
    const block = text.match(/```(?:json)?\s*([\s\S]*?)```/);
    if (block?.[1]) out.push(tryJson(block[1].trim()));
    out.push(tryJson(text.trim()));

    const firstBrace = text.indexOf("{");
    const lastBrace = text.lastIndexOf("}");
    if (firstBrace !== -1 && lastBrace > firstBrace) {
        out.push(tryJson(text.slice(firstBrace, lastBrace + 1)));
    }
    const firstBracket = text.indexOf("[");
    const lastBracket = text.lastIndexOf("]");
    if (firstBracket !== -1 && lastBracket > firstBracket) {
        out.push(tryJson(text.slice(firstBracket, lastBracket + 1)));
    }
    return out.filter((value) => value !== undefined);
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Last resort: function names mentioned in prose, each with the next address after it */
export function extractMentions(text: string, functions: FunctionDescriptor[]): Action[] {
    const mentions: Array<{ index: number; fn: FunctionDescriptor }> = [];
    for (const fn of functions) {
        if (!fn.name) continue;
        const re = new RegExp(String.raw`(?<![A-Za-z0-9_])${escapeRegExp(fn.name)}(?![A-Za-z0-9_])`, "g");
        for (const match of text.matchAll(re)) {
            mentions.push({ index: match.index ?? 0, fn });
        }
    }
    mentions.sort((a, b) => a.index - b.index);

    const addresses = [...text.matchAll(ADDRESS_RE)].map((m) => ({ index: m.index ?? 0, value: m[0] }));
    const seen = new Set<string>();
    const actions: Action[] = [];

    mentions.forEach((mention, i) => {
        const nextMention = mentions[i + 1]?.index ?? text.length;
        const address = addresses.find((a) => a.index > mention.index && a.index < nextMention);
        const params: ActionParams = {};
        const addressParam = mention.fn.inputs.find((input) => input.type === "address");
        if (address && addressParam) params[addressParam.name] = address.value;

        const key = `${mention.fn.name}:${address?.value ?? ""}`;
        if (seen.has(key)) return;
        seen.add(key);
        actions.push({ functionName: mention.fn.name, params, message: defaultMessage(mention.fn.name) });
    });
    return actions;
}

// ═══════════════════════════════════════════════════════
//                     Entry point
// ═══════════════════════════════════════════════════════

/**
 * Parse a planning response. Catalog filtering happens in the engines;
 * `functions` only feeds the prose fallback.
 */
export function parsePlanResponse(
    response: RawPlanResponse,
    functions: FunctionDescriptor[],
): Action[] {
    const fromTools = response.toolCalls
        .map((call) => toPlanShape(call.input))
        .filter((shape): shape is PlanShape => shape !== undefined);
    if (fromTools.length > 0) {
        return fromTools.flatMap(actionsOf);
    }

    const text = response.text.trim();
    if (!text) return [];

    for (const candidate of jsonCandidates(text)) {
        const shape = toPlanShape(candidate);
        if (shape) return actionsOf(shape);
    }

    return extractMentions(text, functions);
}
