/**
 * Behavior Rule — deterministic first move derived from the description.
 *
 *   - "check" / "balance" behavior → read the owner's balance (or the
 *     first described address when the agent has no owner)
 *   - otherwise "mint" behavior    → mint to the first described address
 *
 * Nothing else is guessed here; anything subtler goes to the LLM planner.
 */

import type { DecisionStrategy, PlanningInput } from "../interface.js";
import type { Action, ActionParams, FunctionDescriptor } from "../../types.js";
import { completeParameters, isIntegerType } from "../../description/parameterCompleter.js";
import { resolveMintAmount } from "../../description/parser.js";

// ═══════════════════════════════════════════════════════
//                   Action builders
// ═══════════════════════════════════════════════════════

function firstInputOf(fn: FunctionDescriptor, match: (type: string) => boolean): string | undefined {
    return fn.inputs.find((input) => match(input.type))?.name;
}

function complete(fn: FunctionDescriptor, input: PlanningInput, params: ActionParams): ActionParams {
    return completeParameters(
        { functionName: fn.name, inputs: fn.inputs, analysis: input.analysis, description: input.description },
        params,
    );
}

export function balanceCheckAction(fn: FunctionDescriptor, account: string, input: PlanningInput): Action {
    const params: ActionParams = {};
    const accountParam = firstInputOf(fn, (type) => type === "address");
    if (accountParam) params[accountParam] = account;
    return {
        functionName: fn.name,
        params: complete(fn, input, params),
        message: `Checking the token balance of ${account}`,
    };
}

export function mintAction(fn: FunctionDescriptor, to: string, input: PlanningInput): Action {
    const amount = resolveMintAmount(input.analysis, input.defaultMintAmount);
    const params: ActionParams = {};
    const toParam = firstInputOf(fn, (type) => type === "address");
    const amountParam = firstInputOf(fn, isIntegerType);
    if (toParam) params[toParam] = to;
    if (amountParam) params[amountParam] = amount;
    return {
        functionName: fn.name,
        params: complete(fn, input, params),
        message: `Minting ${amount} tokens to ${to}`,
    };
}

/** Address parameter a mint or balance action targets */
export function targetParamOf(fn: FunctionDescriptor): string | undefined {
    return firstInputOf(fn, (type) => type === "address");
}

// ═══════════════════════════════════════════════════════
//                    Behavior rule
// ═══════════════════════════════════════════════════════

export function behaviorActions(input: PlanningInput): Action[] {
    const { analysis, catalog, agent } = input;

    if (analysis.behaviors.includes("check") || analysis.behaviors.includes("balance")) {
        const reader = catalog.balanceReader();
        const account = agent.owner || analysis.addresses[0];
        if (reader && account) return [balanceCheckAction(reader, account, input)];
    }

    if (analysis.behaviors.includes("mint")) {
        const minter = catalog.minter();
        const to = analysis.addresses[0] ?? agent.owner;
        if (minter && to) return [mintAction(minter, to, input)];
    }

    return [];
}

export class BehaviorStrategy implements DecisionStrategy {
    readonly name = "behavior";
    readonly deterministic = true;

    async decide(input: PlanningInput): Promise<Action[] | undefined> {
        const actions = behaviorActions(input);
        return actions.length > 0 ? actions : undefined;
    }
}
