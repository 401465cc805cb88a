/**
 * Threshold Rule — "mint N to X if balance less than T".
 *
 * Looks at the most recent balance read or mint in the history; other
 * calls in between (owner, name, ...) do not hide it:
 *   - balance read succeeded: below T and X not minted yet → mint once;
 *     X already minted, or balance ≥ T → satisfied
 *   - mint succeeded → re-read the balance to confirm, never mint again
 *   - that call failed → no opinion
 */

import type { ReflectionInput, ReflectionOutcome, ReflectionStrategy } from "../interface.js";
import type { ExecutionHistoryEntry, FunctionDescriptor } from "../../types.js";
import { balanceCheckAction, mintAction, targetParamOf } from "./behavior.js";
import { hasMintedTo } from "./pendingTasks.js";
import { compareAmounts, parseAmount } from "../../description/amount.js";
import type { Amount } from "../../description/amount.js";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Numeric balance from a read result (number, bigint, decimal string or a wrapping object) */
export function readBalance(data: unknown): Amount | undefined {
    if (typeof data === "number") return Number.isFinite(data) ? data : undefined;
    if (typeof data === "bigint") return data;
    if (typeof data === "string") {
        const trimmed = data.trim();
        if (trimmed === "") return undefined;
        return parseAmount(trimmed) ?? (Number.isFinite(Number(trimmed)) ? Number(trimmed) : undefined);
    }
    if (Array.isArray(data) && data.length === 1) return readBalance(data[0]);
    if (isRecord(data)) {
        for (const key of ["balance", "result", "value", "data"]) {
            if (key in data) return readBalance(data[key]);
        }
    }
    return undefined;
}

function lastCallTo(
    history: readonly ExecutionHistoryEntry[],
    names: string[],
): ExecutionHistoryEntry | undefined {
    for (let i = history.length - 1; i >= 0; i--) {
        const entry = history[i];
        if (entry && names.includes(entry.action.functionName)) return entry;
    }
    return undefined;
}

/** Account the most recent balance read looked at */
function lastBalanceAccount(
    history: readonly ExecutionHistoryEntry[],
    reader: FunctionDescriptor,
): string | undefined {
    const param = targetParamOf(reader);
    if (!param) return undefined;
    for (let i = history.length - 1; i >= 0; i--) {
        const entry = history[i];
        if (entry?.action.functionName !== reader.name) continue;
        const account = entry.action.params[param];
        if (typeof account === "string") return account;
    }
    return undefined;
}

export function thresholdOutcome(input: ReflectionInput): ReflectionOutcome {
    const { analysis, catalog, history, agent } = input;
    const threshold = analysis.threshold;
    const minter = catalog.minter();
    const reader = catalog.balanceReader();
    if (threshold === undefined || !minter || !reader) return { kind: "pass" };
    const last = lastCallTo(history, [reader.name, minter.name]);
    if (!last || !last.result.success) return { kind: "pass" };

    const target = analysis.addresses[0] ?? agent.owner;
    if (!target) return { kind: "pass" };

    if (last.action.functionName === reader.name) {
        const balance = readBalance(last.result.data);
        if (balance === undefined) return { kind: "pass" };
        if (compareAmounts(balance, threshold) >= 0) {
            return { kind: "satisfied", reason: `balance ${balance} is not below ${threshold}` };
        }
        if (hasMintedTo(history, minter, target)) {
            return { kind: "satisfied", reason: `already minted to ${target}` };
        }
        return { kind: "actions", actions: [mintAction(minter, target, input)] };
    }

    if (last.action.functionName === minter.name) {
        const account = lastBalanceAccount(history, reader) ?? target;
        return { kind: "actions", actions: [balanceCheckAction(reader, account, input)] };
    }

    return { kind: "pass" };
}

export class ThresholdStrategy implements ReflectionStrategy {
    readonly name = "threshold";
    readonly deterministic = true;

    async reflect(input: ReflectionInput): Promise<ReflectionOutcome> {
        return thresholdOutcome(input);
    }
}
