/**
 * Function Catalog — the agent's callable contract functions.
 *
 * Only enabled functions resolve. Planners may mention anything; an action
 * naming an unknown or disabled function simply does not resolve and is
 * dropped by the caller.
 */

import type { FunctionDescriptor } from "../types.js";

const IDENT_CHAR = "[A-Za-z0-9_$]";
const READ_VERBS = ["read", "get", "fetch", "query", "check", "show", "call", "leer", "consultar", "obtener"];
const ARTICLES = ["the", "el", "la"];

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whether `text` asks for the read function `name`.
 *
 * Identifier-shaped names (`balanceOf`, `DOMAIN_SEPARATOR`) match as a
 * case-sensitive token. Plain words (`owner`, `name`) only match as a call
 * (`owner()`) or right after a read verb ("read the owner").
 */
export function mentionsRead(text: string, name: string): boolean {
    if (!name) return false;
    const id = escapeRegExp(name);
    if (/[^a-z]/.test(name) && new RegExp(`(?<!${IDENT_CHAR})${id}(?!${IDENT_CHAR})`).test(text)) {
        return true;
    }
    if (new RegExp(`(?<!${IDENT_CHAR})${id}\\s*\\(`).test(text)) return true;
    const verbs = READ_VERBS.join("|");
    const articles = ARTICLES.join("|");
    return new RegExp(
        `(?<!\\p{L})(?:${verbs})\\s+(?:(?:${articles})\\s+)?${id}(?!${IDENT_CHAR})`,
        "iu",
    ).test(text);
}

export class FunctionCatalog {
    private readonly byName = new Map<string, FunctionDescriptor>();
    private readonly byLowerName = new Map<string, FunctionDescriptor>();

    constructor(private readonly functions: FunctionDescriptor[]) {
        for (const fn of functions) {
            if (!fn.enabled) continue;
            if (!this.byName.has(fn.name)) this.byName.set(fn.name, fn);
            const lower = fn.name.toLowerCase();
            if (!this.byLowerName.has(lower)) this.byLowerName.set(lower, fn);
        }
    }

    /** Enabled descriptor for `name` (exact match first, then case-insensitive) */
    resolve(name: string): FunctionDescriptor | undefined {
        return this.byName.get(name) ?? this.byLowerName.get(name.toLowerCase());
    }

    enabled(): FunctionDescriptor[] {
        return this.functions.filter((fn) => fn.enabled);
    }

    get size(): number {
        return this.byName.size;
    }

    /** Read function that reports an address balance (balanceOf and friends) */
    balanceReader(): FunctionDescriptor | undefined {
        const reads = this.enabled().filter((fn) => fn.type === "read");
        return reads.find((fn) => fn.name === "balanceOf")
            ?? reads.find((fn) => /balance/i.test(fn.name) && fn.inputs.some((i) => i.type === "address"));
    }

    minter(): FunctionDescriptor | undefined {
        const writes = this.enabled().filter((fn) => fn.type !== "read");
        return writes.find((fn) => fn.name === "mint")
            ?? writes.find((fn) => /mint/i.test(fn.name));
    }

    /** Enabled read functions the text asks for, in catalog order */
    readsMentionedIn(text: string): FunctionDescriptor[] {
        return this.enabled().filter((fn) => fn.type === "read" && mentionsRead(text, fn.name));
    }
}
