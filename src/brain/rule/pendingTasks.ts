/**
 * Pending tasks — work the description asks for that history does not show yet.
 *
 *   - reads: enabled read functions named in the description that never ran
 *   - mints: described addresses with no mint attempt yet, unless a balance
 *     threshold governs minting (the threshold rule owns that decision)
 *
 * Any prior attempt counts, failed or not, so the same history always yields
 * the same tasks and a minted address is never emitted twice.
 */

import type { ReflectionInput, ReflectionOutcome, ReflectionStrategy } from "../interface.js";
import type { Action, ExecutionHistoryEntry, FunctionDescriptor } from "../../types.js";
import { completeParameters } from "../../description/parameterCompleter.js";
import { mintAction, targetParamOf } from "./behavior.js";

export function sameAddress(a: unknown, b: unknown): boolean {
    return typeof a === "string" && typeof b === "string" && a.toLowerCase() === b.toLowerCase();
}

/** Whether history already holds a mint attempt to `address` */
export function hasMintedTo(
    history: readonly ExecutionHistoryEntry[],
    minter: FunctionDescriptor,
    address: string,
): boolean {
    const toParam = targetParamOf(minter);
    if (!toParam) return false;
    return history.some((entry) =>
        entry.action.functionName === minter.name && sameAddress(entry.action.params[toParam], address)
    );
}

function pendingReads(input: ReflectionInput): Action[] {
    const ran = new Set(input.history.map((entry) => entry.action.functionName));
    const out: Action[] = [];

    for (const fn of input.catalog.readsMentionedIn(input.description)) {
        if (ran.has(fn.name)) continue;
        const params = completeParameters(
            { functionName: fn.name, inputs: fn.inputs, analysis: input.analysis, description: input.description },
            {},
        );
        for (const param of fn.inputs) {
            if (param.type === "address" && params[param.name] == null && input.agent.owner) {
                params[param.name] = input.agent.owner;
            }
        }
        // a read we cannot fully parameterize is left to the planner
        if (fn.inputs.some((param) => params[param.name] == null)) continue;
        out.push({ functionName: fn.name, params, message: `Reading ${fn.name} as the description requests` });
    }
    return out;
}

function pendingMints(input: ReflectionInput): Action[] {
    const { analysis, catalog, history } = input;
    if (analysis.threshold !== undefined || !analysis.behaviors.includes("mint")) return [];
    const minter = catalog.minter();
    if (!minter) return [];

    return analysis.addresses
        .filter((address) => !hasMintedTo(history, minter, address))
        .map((address) => mintAction(minter, address, input));
}

export function derivePendingTasks(input: ReflectionInput): Action[] {
    return [...pendingReads(input), ...pendingMints(input)];
}

export class PendingTasksStrategy implements ReflectionStrategy {
    readonly name = "pending-tasks";
    readonly deterministic = true;

    async reflect(input: ReflectionInput): Promise<ReflectionOutcome> {
        const actions = derivePendingTasks(input);
        return actions.length > 0 ? { kind: "actions", actions } : { kind: "pass" };
    }
}
