/**
 * Prompt builder for the LLM planner.
 *
 * The system prompt states the rules; the user prompt carries the run's
 * state (contract state, trigger, description, enabled functions with their
 * ABI inputs and, when reflecting, the whole execution history).
 */

import { toJson } from "../../http.js";
import type { PlanMode } from "./provider.js";
import { BATCH_TOOL, SINGLE_TOOL } from "./provider.js";
import type { PlanningInput } from "../interface.js";
import type { ExecutionHistoryEntry, FunctionDescriptor } from "../../types.js";

/** Longest serialized result kept per history line */
const RESULT_PREVIEW = 300;

export function buildSystemPrompt(mode: PlanMode): string {
    const parts: string[] = [
        "You are an autonomous agent operating one smart contract on behalf of its owner.",
        "Follow the owner's behavior description exactly. Never invent functions or addresses.",
        "",
        "## Rules",
        "- Only call functions listed under 'Available functions'. Use their exact names.",
        "- Pass every ABI input by its parameter name. Addresses are 0x-prefixed hex strings; integers are plain decimal numbers or strings.",
        "- `message` is required: one short plain-text sentence telling the owner what the call does and why.",
        "- Read functions cost nothing; prefer reading state before writing when a condition depends on it.",
    ];

    if (mode === "single") {
        parts.push(
            "",
            "## Output",
            `- Call \`${SINGLE_TOOL}\` exactly once with the single best next function to run.`,
        );
    } else {
        parts.push(
            "",
            "## Output",
            `- Call \`${BATCH_TOOL}\` exactly once with the calls still needed, in execution order.`,
            "- Look at the execution history first. Do not repeat a write that already succeeded for the same arguments.",
            "- Return an empty `functions` list when the description's goal is already met or nothing else can be done.",
        );
    }
    return parts.join("\n");
}

function formatFunction(fn: FunctionDescriptor): string {
    const inputs = fn.inputs.map((input) => `${input.type} ${input.name}`).join(", ");
    const rules = Object.keys(fn.validationRules).length > 0
        ? ` rules=${toJson(fn.validationRules)}`
        : "";
    return `- ${fn.name}(${inputs}) [${fn.type}]${rules}`;
}

function formatHistoryEntry(entry: ExecutionHistoryEntry, index: number): string {
    const call = `${entry.action.functionName}(${toJson(entry.action.params)})`;
    const outcome = entry.result.success
        ? `OK ${toJson(entry.result.data ?? null).slice(0, RESULT_PREVIEW)}`
        : `ERROR: ${entry.result.error ?? "unknown error"}`;
    const tx = entry.result.transactionHash ? ` tx=${entry.result.transactionHash}` : "";
    return `${index + 1}. ${call} → ${outcome}${tx}`;
}

export function buildUserPrompt(
    input: PlanningInput,
    history?: readonly ExecutionHistoryEntry[],
): string {
    const functionLines = input.catalog.enabled().map(formatFunction);

    const parts: string[] = [
        "## Behavior description",
        input.description || "(empty)",
        "",
        "## Agent",
        `- Owner: ${input.agent.owner || "unknown"}`,
        `- Name: ${input.agent.name || input.agent.id}`,
        "",
        "## Contract state",
        toJson(input.contractState),
        "",
        "## Trigger",
        toJson(input.trigger),
        "",
        "## Available functions",
        ...(functionLines.length > 0 ? functionLines : ["(none)"]),
    ];

    if (input.analysis.addresses.length > 0 || input.analysis.amounts.length > 0) {
        parts.push(
            "",
            "## Extracted from the description",
            `- Addresses: ${input.analysis.addresses.join(", ") || "none"}`,
            `- Amounts: ${input.analysis.amounts.join(", ") || "none"}`,
        );
        if (input.analysis.threshold !== undefined) {
            parts.push(`- Threshold: ${input.analysis.threshold}`);
        }
    }

    if (history) {
        parts.push(
            "",
            "## Execution history",
            ...(history.length > 0 ? history.map(formatHistoryEntry) : ["(nothing executed yet)"]),
        );
    }

    return parts.join("\n");
}
