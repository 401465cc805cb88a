/**
 * Parameter Completer — fills action parameters the planner left out,
 * using what the Description Parser found. Supplied values are never
 * overwritten.
 */

import type { ActionParams, FunctionInput } from "../types.js";
import type { DescriptionAnalysis } from "./parser.js";
import type { Amount } from "./amount.js";

const ADDRESS_PARAM_NAMES = new Set(["to", "account", "owner", "recipient"]);
const AMOUNT_PARAM_NAMES = new Set(["amount", "value", "quantity"]);

const TRUE_WORDS = ["true", "yes", "enabled", "enable", "on", "verdadero", "sí"];
const FALSE_WORDS = ["false", "no", "disabled", "disable", "off", "falso"];

/** Characters after a parameter name searched for a true/false word */
const BOOL_WINDOW = 40;

export interface CompletionContext {
    functionName: string;
    inputs: FunctionInput[];
    analysis: DescriptionAnalysis;
    description: string;
}

function baseName(name: string): string {
    return name.replace(/^_+/, "").toLowerCase();
}

export function isIntegerType(type: string): boolean {
    return /^u?int\d*$/.test(type);
}

/** Mint amount for a `mint` call: the mint tier, else the amount after a threshold */
function mintAmountOf(analysis: DescriptionAnalysis): Amount | undefined {
    if (analysis.mintAmount !== undefined) return analysis.mintAmount;
    const index = analysis.threshold !== undefined ? 1 : 0;
    return analysis.amounts[index];
}

function findWord(window: string, words: string[]): number {
    let best = -1;
    for (const word of words) {
        const match = new RegExp(String.raw`(?<!\p{L})${word}(?!\p{L})`, "iu").exec(window);
        if (match && (best === -1 || match.index < best)) best = match.index;
    }
    return best;
}

/** Nearest true/false word following the parameter name, if any */
export function inferBoolean(description: string, paramName: string): boolean | undefined {
    const name = baseName(paramName);
    if (!name) return undefined;
    const at = description.toLowerCase().indexOf(name);
    if (at === -1) return undefined;

    const window = description.slice(at + name.length, at + name.length + BOOL_WINDOW);
    const t = findWord(window, TRUE_WORDS);
    const f = findWord(window, FALSE_WORDS);
    if (t === -1 && f === -1) return undefined;
    if (f === -1) return true;
    if (t === -1) return false;
    return t < f;
}

export function completeParameters(ctx: CompletionContext, params: ActionParams): ActionParams {
    const completed: ActionParams = { ...params };
    const { analysis } = ctx;
    const addressInputs = ctx.inputs.filter((input) => input.type === "address");

    for (const input of ctx.inputs) {
        if (completed[input.name] != null) continue;
        const name = baseName(input.name);

        if (input.type === "address") {
            const first = analysis.addresses[0];
            if (first && (ADDRESS_PARAM_NAMES.has(name) || addressInputs.length === 1)) {
                completed[input.name] = first;
            }
            continue;
        }

        if (isIntegerType(input.type) && AMOUNT_PARAM_NAMES.has(name)) {
            const amount = ctx.functionName.toLowerCase() === "mint"
                ? mintAmountOf(analysis)
                : analysis.amounts[0];
            if (amount !== undefined) completed[input.name] = amount;
            continue;
        }

        if (input.type === "bool") {
            const value = inferBoolean(ctx.description, input.name);
            if (value !== undefined) completed[input.name] = value;
        }
    }

    return completed;
}
