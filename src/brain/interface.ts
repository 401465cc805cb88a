/**
 * Planning strategies for the plan–execute–reflect cycle.
 *
 * Both engines walk an ordered chain: deterministic strategies first, the
 * LLM planner last. Deterministic strategies are skipped when the trigger
 * sets `forceLlm`.
 */

import type { FunctionCatalog } from "../actions/catalog.js";
import type { DescriptionAnalysis } from "../description/parser.js";
import type {
    Action,
    AgentProfile,
    ContractState,
    ExecutionHistoryEntry,
    Trigger,
} from "../types.js";

// ═══════════════════════════════════════════════════════
//                     Inputs
// ═══════════════════════════════════════════════════════

export interface PlanningInput {
    agent: AgentProfile;
    catalog: FunctionCatalog;
    description: string;
    /** Description analysis overlaid with the trigger's extracted params */
    analysis: DescriptionAnalysis;
    contractState: ContractState;
    trigger: Trigger;
    defaultMintAmount: number;
}

export interface ReflectionInput extends PlanningInput {
    history: readonly ExecutionHistoryEntry[];
}

// ═══════════════════════════════════════════════════════
//                    Strategies
// ═══════════════════════════════════════════════════════

export interface DecisionStrategy {
    readonly name: string;
    readonly deterministic: boolean;
    /** Actions to start with, or `undefined` to let the next strategy decide */
    decide(input: PlanningInput): Promise<Action[] | undefined>;
}

/**
 * - actions: run these next
 * - satisfied: the description's goal is met, stop without asking anyone else
 * - pass: no opinion, ask the next strategy
 */
export type ReflectionOutcome =
    | { kind: "actions"; actions: Action[] }
    | { kind: "satisfied"; reason: string }
    | { kind: "pass" };

export interface ReflectionStrategy {
    readonly name: string;
    readonly deterministic: boolean;
    reflect(input: ReflectionInput): Promise<ReflectionOutcome>;
}
