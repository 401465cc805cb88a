import type { FailureCode } from "./runFailure.js";
import type { Amount } from "./description/amount.js";

export type FunctionType = "read" | "write" | "payable";

export type ActionParams = Record<string, unknown>;

/** Opaque snapshot of what the agent last knew about its contract */
export type ContractState = Record<string, unknown>;

export interface AgentProfile {
    id: string;
    name: string;
    description: string;
    owner: string;
    contractId: string;
    gasLimit: string;
    maxPriorityFee: string;
    status: string;
    contractState: ContractState;
}

/** One ordered ABI parameter (name + solidity type) */
export interface FunctionInput {
    name: string;
    type: string;
}

/** Declared as a type alias so it stays assignable to ContractAbi items */
export type AbiFunctionFragment = {
    type: "function";
    name: string;
    inputs: FunctionInput[];
    outputs?: FunctionInput[];
    stateMutability?: string;
};

/** Contract-level ABI items, forwarded as-is to the execution service */
export type ContractAbi = Array<Record<string, unknown>>;

export interface ContractInfo {
    id: string;
    address: string;
    abi: ContractAbi;
}

export interface ValidationRule {
    required?: boolean;
    min?: number;
    max?: number;
    pattern?: string;
    enum?: Array<string | number>;
}

export type ValidationRules = Record<string, ValidationRule>;

export interface FunctionDescriptor {
    id: string;
    name: string;
    signature: string;
    type: FunctionType;
    enabled: boolean;
    /** Ordered parameter list */
    inputs: FunctionInput[];
    /** Function-specific ABI item, when the directory stores one */
    fragment?: AbiFunctionFragment;
    validationRules: ValidationRules;
}

export interface Action {
    functionName: string;
    params: ActionParams;
    /** Explanatory annotation surfaced to users */
    message?: string;
}

export interface ExecutionResult {
    success: boolean;
    data?: unknown;
    error?: string;
    transactionHash?: string;
}

export interface ExecutionHistoryEntry {
    readonly action: Action;
    readonly result: ExecutionResult;
    readonly message: string;
}

/** Parameters pre-extracted upstream (e.g. by the WebSocket layer) */
export interface ExtractedParams {
    addresses?: string[];
    amounts?: Amount[];
    threshold?: Amount;
    mintAmount?: Amount;
    to?: string;
}

export interface Trigger {
    triggerType: string;
    timestamp: string;
    executionId: string;
    completeAllTasks?: boolean;
    maxCycles?: number;
    /** Skip deterministic strategies and go straight to the LLM planner */
    forceLlm?: boolean;
    extractedParams?: ExtractedParams;
}

export interface CycleOutputEntry {
    function: string;
    params: ActionParams;
    result?: ExecutionResult;
    error?: string;
    errorCode?: FailureCode;
    message: string;
    cycle: number;
}

export type ExecutionLogStatus = "pending" | "success" | "failed";

export interface ExecutionLogEntry {
    functionName: string;
    params: ActionParams;
    status: ExecutionLogStatus;
    message?: string;
    executionId?: string;
    result?: unknown;
    error?: string;
    transactionHash?: string;
    timestamp: string;
}

export interface ExecutionPayload {
    contractAddress: string;
    abi: ContractAbi;
    functionName: string;
    inputs: unknown[];
    gasLimit?: string;
    maxPriorityFee?: string;
}
