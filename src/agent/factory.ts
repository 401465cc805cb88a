/**
 * Agent Factory — assembles a runnable Agent from directory records.
 *
 * 1. Reads the agent profile (missing → LookupError)
 * 2. Reads its contract (no contract id or address → ConfigurationError,
 *    unknown contract → LookupError)
 * 3. Reads the agent's functions and builds the enabled catalog
 * 4. Fills blank gas settings from configuration
 */

import type { Agent } from "./agent.js";
import type { AgentDirectory } from "../directory/client.js";
import { FunctionCatalog } from "../actions/catalog.js";
import { parseDescription } from "../description/parser.js";
import { ConfigurationError, LookupError } from "../errors/index.js";

export interface AgentDefaults {
    defaultGasLimit: string;
    defaultMaxPriorityFee: string;
}

export async function loadAgent(
    agentId: string,
    directory: AgentDirectory,
    defaults: AgentDefaults,
): Promise<Agent> {
    const profile = await directory.getAgent(agentId);
    if (!profile) {
        throw new LookupError("agent", agentId);
    }
    if (!profile.contractId) {
        throw new ConfigurationError(`Agent ${agentId} has no contract id`);
    }

    const contract = await directory.getContract(profile.contractId);
    if (!contract) {
        throw new LookupError("contract", profile.contractId);
    }
    if (!contract.address) {
        throw new ConfigurationError(`Contract ${contract.id} has no address`);
    }

    const functions = await directory.getAgentFunctions(agentId);

    return {
        profile: {
            ...profile,
            gasLimit: profile.gasLimit || defaults.defaultGasLimit,
            maxPriorityFee: profile.maxPriorityFee || defaults.defaultMaxPriorityFee,
        },
        contract,
        functions,
        catalog: new FunctionCatalog(functions),
        analysis: parseDescription(profile.description),
    };
}
