/**
 * Agent — a runnable contract agent as loaded from the directory.
 *
 * Data only. Behavior lives in agent/runtime.ts, which drives the
 * plan–execute–reflect cycle over an Agent.
 */

import type { FunctionCatalog } from "../actions/catalog.js";
import type { DescriptionAnalysis } from "../description/parser.js";
import type { AgentProfile, ContractInfo, FunctionDescriptor } from "../types.js";

export interface Agent {
    profile: AgentProfile;
    contract: ContractInfo;
    /** Every function the directory lists, enabled or not */
    functions: FunctionDescriptor[];
    /** Enabled functions only */
    catalog: FunctionCatalog;
    /** Deterministic reading of `profile.description`, before trigger overrides */
    analysis: DescriptionAnalysis;
}

/** Cycle bounds and fallbacks a run needs from configuration */
export interface RunSettings {
    maxCycles: number;
    maxCyclesCeiling: number;
    defaultMintAmount: number;
}
