/**
 * Description Parser — deterministic reading of an agent's behavior text.
 *
 * Extracts addresses, amounts, behavior keywords and conditional clauses
 * from free text (English and Spanish vocabulary). Pure: the same text
 * always yields the same analysis.
 *
 * Amounts are collected in priority tiers so that the position of a number
 * carries its meaning:
 *   1. thresholds ("less than 5", "menos de 5")
 *   2. mint amounts ("mint 5000000", "1000 at a time")
 *   3. any other bare number
 * "mint 5000000 tokens ... if balance less than 5" therefore reads as
 * amounts [5, 5000000], threshold 5, mintAmount 5000000.
 */

import type { ExtractedParams } from "../types.js";
import { parseAmount } from "./amount.js";
import type { Amount } from "./amount.js";

export type Behavior = "check" | "balance" | "mint" | "repeat";

export interface DescriptionAnalysis {
    addresses: string[];
    amounts: Amount[];
    behaviors: Behavior[];
    conditions: string[];
    threshold?: Amount;
    mintAmount?: Amount;
}

// ═══════════════════════════════════════════════════════
//                     Vocabulary
// ═══════════════════════════════════════════════════════

const BEHAVIOR_KEYWORDS: Record<Behavior, string[]> = {
    check: ["check", "verify", "verificar", "revisar", "comprobar"],
    balance: ["balance", "saldo"],
    mint: ["mint", "create", "mintear", "acuñar", "crear"],
    repeat: ["repeat", "loop", "until", "repetir", "hasta"],
};

const BEHAVIOR_ORDER: Behavior[] = ["check", "balance", "mint", "repeat"];

const NUM = String.raw`(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?)`;

const ADDRESS_RE = /(?<![0-9a-zA-Z])0x[0-9a-fA-F]{40}(?![0-9a-fA-F])/g;
const THRESHOLD_RE = new RegExp(
    String.raw`(?<!\p{L})(?:less than|lower than|below|under|menos de|menor que)\s+${NUM}`,
    "giu",
);
const MINT_RE = new RegExp(
    String.raw`(?<!\p{L})(?:mint|create|mintear|acuñar|crear)\s+${NUM}`,
    "giu",
);
const AT_A_TIME_RE = new RegExp(String.raw`${NUM}(?:\s+\p{L}+)?\s+at a time`, "giu");
const BARE_NUMBER_RE = new RegExp(String.raw`(?<![\p{L}\d.,])${NUM}(?![\p{L}\d])`, "gu");
const CONDITION_RE = new RegExp(
    String.raw`(?<!\p{L})(?:if|when|si|cuando)\s+(.+?)(?=[.;,!?](?:\s|$)|\r?\n|\s+(?:then|entonces)(?!\p{L})|$)`,
    "giu",
);

// ═══════════════════════════════════════════════════════
//                     Extraction
// ═══════════════════════════════════════════════════════

function capture(text: string, re: RegExp): Amount[] {
    const out: Amount[] = [];
    for (const match of text.matchAll(re)) {
        const value = match[1] !== undefined ? parseAmount(match[1]) : undefined;
        if (value !== undefined) out.push(value);
    }
    return out;
}

export function extractAddresses(text: string): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const match of text.matchAll(ADDRESS_RE)) {
        const key = match[0].toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(match[0]);
    }
    return out;
}

export function extractAmounts(text: string): { amounts: Amount[]; threshold?: Amount; mintAmount?: Amount } {
    const thresholds = capture(text, THRESHOLD_RE);
    const mints = [...capture(text, MINT_RE), ...capture(text, AT_A_TIME_RE)];
    const bare = capture(text.replace(ADDRESS_RE, " "), BARE_NUMBER_RE);

    const amounts: Amount[] = [];
    for (const value of [...thresholds, ...mints, ...bare]) {
        if (!amounts.includes(value)) amounts.push(value);
    }

    return {
        amounts,
        ...(thresholds.length > 0 ? { threshold: thresholds[0] } : {}),
        ...(mints.length > 0 ? { mintAmount: mints[0] } : {}),
    };
}

export function extractBehaviors(text: string): Behavior[] {
    return BEHAVIOR_ORDER.filter((behavior) =>
        BEHAVIOR_KEYWORDS[behavior].some((word) =>
            new RegExp(String.raw`(?<!\p{L})${word}`, "iu").test(text)
        )
    );
}

export function extractConditions(text: string): string[] {
    const out: string[] = [];
    for (const match of text.matchAll(CONDITION_RE)) {
        const clause = match[1]?.trim();
        if (clause) out.push(clause);
    }
    return out;
}

export function parseDescription(text: string): DescriptionAnalysis {
    return {
        addresses: extractAddresses(text),
        ...extractAmounts(text),
        behaviors: extractBehaviors(text),
        conditions: extractConditions(text),
    };
}

/**
 * Overlay parameters that an upstream layer already extracted.
 * Upstream values win; `to` becomes the first address.
 */
export function applyExtractedParams(
    analysis: DescriptionAnalysis,
    extracted?: ExtractedParams,
): DescriptionAnalysis {
    if (!extracted) return analysis;

    let addresses = extracted.addresses && extracted.addresses.length > 0
        ? [...extracted.addresses]
        : [...analysis.addresses];
    if (extracted.to) {
        const to = extracted.to;
        addresses = [to, ...addresses.filter((a) => a.toLowerCase() !== to.toLowerCase())];
    }

    const merged: DescriptionAnalysis = {
        ...analysis,
        addresses,
        amounts: extracted.amounts && extracted.amounts.length > 0 ? [...extracted.amounts] : [...analysis.amounts],
    };
    if (extracted.threshold !== undefined) merged.threshold = extracted.threshold;
    if (extracted.mintAmount !== undefined) merged.mintAmount = extracted.mintAmount;
    return merged;
}

/** Upstream value, then the description's mint tier, then the configured default */
export function resolveMintAmount(analysis: DescriptionAnalysis, fallback: Amount): Amount {
    return analysis.mintAmount ?? fallback;
}
