/**
 * Boundary normalization.
 *
 * The directory and execution services answer with camelCase or snake_case
 * keys (sometimes both). Every payload goes through one schema here, so the
 * rest of the runner only sees the typed records from ./types.ts.
 */

import { z } from "zod";
import { parseAmount } from "./description/amount.js";
import type {
    AbiFunctionFragment,
    AgentProfile,
    ContractAbi,
    ContractInfo,
    ExecutionResult,
    ExtractedParams,
    FunctionDescriptor,
    FunctionInput,
    FunctionType,
    Trigger,
    ValidationRule,
    ValidationRules,
} from "./types.js";

// ═══════════════════════════════════════════════════════
//                  Key normalization
// ═══════════════════════════════════════════════════════

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCamel(key: string): string {
    return key.replace(/_([a-z0-9])/g, (_m, c: string) => c.toUpperCase());
}

/** Rename snake_case keys to camelCase; an explicit camelCase key wins. */
export function camelizeKeys(value: unknown): unknown {
    if (!isRecord(value)) return value;
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
        const camel = toCamel(key);
        if (camel === key || !(camel in out)) {
            out[camel] = v;
        }
    }
    return out;
}

/** Some directory endpoints wrap a single record in a list */
function firstRecord(value: unknown): unknown {
    return Array.isArray(value) ? value[0] : value;
}

export function parseJsonString(value: unknown): unknown {
    if (typeof value !== "string") return value;
    try {
        return JSON.parse(value);
    } catch {
        return value;
    }
}

const idLike = z.union([z.string(), z.number()]).transform((v) => String(v));
const numericString = z.union([z.string(), z.number(), z.bigint()]).transform((v) => String(v));
const numberLike = z.union([
    z.number(),
    z.string().regex(/^-?\d+(\.\d+)?$/).transform((v) => Number(v)),
]);
/** Token amount; integers past the safe range must arrive as strings or bigint */
const amountLike = z.union([
    z.bigint(),
    z.number().refine((n) => !Number.isInteger(n) || Number.isSafeInteger(n), {
        message: "integer amount exceeds the safe range; send it as a decimal string",
    }),
    z.string().regex(/^-?\d+(\.\d+)?$/).transform((v) => parseAmount(v) ?? Number(v)),
]);
const booleanLike = z.union([
    z.boolean(),
    z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1"),
]);

// ═══════════════════════════════════════════════════════
//                      Agent
// ═══════════════════════════════════════════════════════

const agentSchema = z.object({
    agentId: idLike.optional(),
    id: idLike.optional(),
    name: z.string().default(""),
    description: z.string().default(""),
    owner: z.string().default(""),
    contractId: idLike.optional(),
    gasLimit: numericString.optional(),
    maxPriorityFee: numericString.optional(),
    status: z.string().default(""),
    contractState: z.preprocess(
        parseJsonString,
        z.record(z.string(), z.unknown()).nullish(),
    ),
});

export function parseAgentProfile(raw: unknown, fallbackId = ""): AgentProfile {
    const parsed = agentSchema.parse(camelizeKeys(firstRecord(raw)));
    return {
        id: parsed.agentId ?? parsed.id ?? fallbackId,
        name: parsed.name,
        description: parsed.description,
        owner: parsed.owner,
        contractId: parsed.contractId ?? "",
        gasLimit: parsed.gasLimit ?? "",
        maxPriorityFee: parsed.maxPriorityFee ?? "",
        status: parsed.status,
        contractState: parsed.contractState ?? {},
    };
}

// ═══════════════════════════════════════════════════════
//                     Contract
// ═══════════════════════════════════════════════════════

const abiItemsSchema = z.preprocess(
    parseJsonString,
    z.union([
        z.array(z.record(z.string(), z.unknown())),
        z.record(z.string(), z.unknown()).transform((item) => [item]),
    ]),
);

const contractSchema = z.object({
    contractId: idLike.optional(),
    id: idLike.optional(),
    address: z.string().optional(),
    contractAddress: z.string().optional(),
    abi: abiItemsSchema.optional(),
});

export function parseContractInfo(raw: unknown, fallbackId = ""): ContractInfo {
    const parsed = contractSchema.parse(camelizeKeys(firstRecord(raw)));
    const abi: ContractAbi = parsed.abi ?? [];
    return {
        id: parsed.contractId ?? parsed.id ?? fallbackId,
        address: parsed.address ?? parsed.contractAddress ?? "",
        abi,
    };
}

// ═══════════════════════════════════════════════════════
//                Function descriptors
// ═══════════════════════════════════════════════════════

const inputSchema = z.object({
    name: z.string().default(""),
    type: z.string(),
});

const fragmentSchema = z.object({
    type: z.literal("function").default("function"),
    name: z.string().optional(),
    inputs: z.array(inputSchema).default([]),
    outputs: z.array(inputSchema).optional(),
    stateMutability: z.string().optional(),
});

const ruleSchema = z.object({
    required: booleanLike.optional(),
    min: numberLike.optional(),
    max: numberLike.optional(),
    pattern: z.string().optional(),
    enum: z.array(z.union([z.string(), z.number()])).optional(),
});

const functionSchema = z.object({
    functionId: idLike.optional(),
    id: idLike.optional(),
    functionName: z.string().optional(),
    name: z.string().optional(),
    functionSignature: z.string().optional(),
    signature: z.string().optional(),
    functionType: z.string().optional(),
    type: z.string().optional(),
    isEnabled: booleanLike.optional(),
    enabled: booleanLike.optional(),
    validationRules: z.preprocess(parseJsonString, z.unknown()).optional(),
    abi: z.preprocess(parseJsonString, z.unknown()).optional(),
});

function normalizeFunctionType(raw: string | undefined, fragment?: AbiFunctionFragment): FunctionType {
    const value = (raw ?? "").toLowerCase();
    if (value === "read" || value === "view" || value === "pure") return "read";
    if (value === "payable") return "payable";
    if (value === "write" || value === "nonpayable") return "write";

    const mutability = fragment?.stateMutability;
    if (mutability === "view" || mutability === "pure") return "read";
    if (mutability === "payable") return "payable";
    return "write";
}

function toFragment(raw: unknown, fallbackName: string): AbiFunctionFragment | undefined {
    const parsed = fragmentSchema.safeParse(raw);
    if (!parsed.success) return undefined;
    return {
        type: "function",
        name: parsed.data.name ?? fallbackName,
        inputs: parsed.data.inputs,
        ...(parsed.data.outputs ? { outputs: parsed.data.outputs } : {}),
        ...(parsed.data.stateMutability ? { stateMutability: parsed.data.stateMutability } : {}),
    };
}

/**
 * Resolve a stored function ABI into its ordered inputs.
 *
 * Accepted shapes: a bare parameter list, a single function item, or a full
 * contract ABI in which the item named `name` is picked.
 */
export function normalizeFunctionAbi(
    raw: unknown,
    name: string,
): { inputs: FunctionInput[]; fragment?: AbiFunctionFragment } {
    if (Array.isArray(raw)) {
        const looksLikeItems = raw.some((item) => isRecord(item) && (item.type === "function" || "inputs" in item));
        if (looksLikeItems) {
            const match = raw.find((item) => isRecord(item) && item.name === name)
                ?? (raw.length === 1 ? raw[0] : undefined);
            const fragment = toFragment(match, name);
            return fragment ? { inputs: fragment.inputs, fragment } : { inputs: [] };
        }
        const params = z.array(inputSchema).safeParse(raw);
        return { inputs: params.success ? params.data : [] };
    }

    if (isRecord(raw) && Array.isArray(raw.inputs)) {
        const fragment = toFragment(raw, name);
        return fragment ? { inputs: fragment.inputs, fragment } : { inputs: [] };
    }

    return { inputs: [] };
}

/**
 * Rules arrive either per parameter (`{amount: {min: 1}}`) or as a list of
 * required names (`{required: ["to", "amount"]}`).
 */
export function normalizeValidationRules(raw: unknown): ValidationRules {
    const rules: ValidationRules = {};
    if (!isRecord(raw)) return rules;

    for (const [key, value] of Object.entries(raw)) {
        if (key === "required" && Array.isArray(value)) {
            for (const param of value) {
                if (typeof param !== "string") continue;
                rules[param] = { ...rules[param], required: true };
            }
            continue;
        }
        const parsed = ruleSchema.safeParse(value);
        if (!parsed.success) continue;
        const rule: ValidationRule = {};
        if (parsed.data.required !== undefined) rule.required = parsed.data.required;
        if (parsed.data.min !== undefined) rule.min = parsed.data.min;
        if (parsed.data.max !== undefined) rule.max = parsed.data.max;
        if (parsed.data.pattern !== undefined) rule.pattern = parsed.data.pattern;
        if (parsed.data.enum !== undefined) rule.enum = parsed.data.enum;
        rules[key] = { ...rules[key], ...rule };
    }
    return rules;
}

export function parseFunctionDescriptor(raw: unknown): FunctionDescriptor {
    const parsed = functionSchema.parse(camelizeKeys(raw));
    const name = parsed.functionName ?? parsed.name ?? "";
    const { inputs, fragment } = normalizeFunctionAbi(parsed.abi, name);

    return {
        id: parsed.functionId ?? parsed.id ?? name,
        name,
        signature: parsed.functionSignature ?? parsed.signature ?? "",
        type: normalizeFunctionType(parsed.functionType ?? parsed.type, fragment),
        enabled: parsed.isEnabled ?? parsed.enabled ?? true,
        inputs,
        ...(fragment ? { fragment } : {}),
        validationRules: normalizeValidationRules(parsed.validationRules),
    };
}

export function parseFunctionDescriptors(raw: unknown): FunctionDescriptor[] {
    const list = z.array(z.unknown()).parse(raw);
    return list.map(parseFunctionDescriptor).filter((fn) => fn.name.length > 0);
}

// ═══════════════════════════════════════════════════════
//                      Trigger
// ═══════════════════════════════════════════════════════

const extractedParamsSchema = z.preprocess(camelizeKeys, z.object({
    addresses: z.array(z.string()).optional(),
    amounts: z.array(amountLike).optional(),
    threshold: amountLike.optional(),
    mintAmount: amountLike.optional(),
    amount: amountLike.optional(),
    to: z.string().optional(),
}));

const triggerSchema = z.object({
    triggerType: z.string().default("manual"),
    timestamp: z.string().optional(),
    executionId: idLike.optional(),
    completeAllTasks: booleanLike.optional(),
    maxCycles: z.union([z.number().int(), z.string().regex(/^\d+$/).transform((v) => Number(v))]).optional(),
    forceLlm: booleanLike.optional(),
    extractedParams: extractedParamsSchema.optional(),
});

function compactTimestamp(iso: string): string {
    return iso.replace(/[-:TZ]/g, "").slice(0, 14);
}

export function parseTrigger(raw: unknown, now: Date = new Date()): Trigger {
    const parsed = triggerSchema.parse(camelizeKeys(raw ?? {}));
    const timestamp = parsed.timestamp ?? now.toISOString();
    const trigger: Trigger = {
        triggerType: parsed.triggerType,
        timestamp,
        executionId: parsed.executionId ?? `${parsed.triggerType}_${compactTimestamp(now.toISOString())}`,
    };
    if (parsed.completeAllTasks !== undefined) trigger.completeAllTasks = parsed.completeAllTasks;
    if (parsed.maxCycles !== undefined) trigger.maxCycles = parsed.maxCycles;
    if (parsed.forceLlm !== undefined) trigger.forceLlm = parsed.forceLlm;

    const extracted = parsed.extractedParams;
    if (extracted) {
        const params: ExtractedParams = {};
        if (extracted.addresses) params.addresses = extracted.addresses;
        if (extracted.amounts) params.amounts = extracted.amounts;
        if (extracted.threshold !== undefined) params.threshold = extracted.threshold;
        const mintAmount = extracted.mintAmount ?? extracted.amount;
        if (mintAmount !== undefined) params.mintAmount = mintAmount;
        if (extracted.to) params.to = extracted.to;
        trigger.extractedParams = params;
    }
    return trigger;
}

// ═══════════════════════════════════════════════════════
//              Execution service responses
// ═══════════════════════════════════════════════════════

const executionResponseSchema = z.object({
    success: booleanLike.optional(),
    data: z.unknown().optional(),
    result: z.unknown().optional(),
    error: z.unknown().optional(),
    transactionHash: z.string().optional(),
    txHash: z.string().optional(),
    hash: z.string().optional(),
});

function errorText(value: unknown): string | undefined {
    if (value == null) return undefined;
    if (typeof value === "string") return value;
    if (isRecord(value) && typeof value.message === "string") return value.message;
    return JSON.stringify(value);
}

export function parseExecutionResponse(raw: unknown): ExecutionResult {
    const parsed = executionResponseSchema.parse(camelizeKeys(raw ?? {}));
    const error = errorText(parsed.error);
    const result: ExecutionResult = {
        success: parsed.success ?? error === undefined,
    };
    const data = parsed.data !== undefined ? parsed.data : parsed.result;
    if (data !== undefined) result.data = data;
    if (error !== undefined) result.error = error;
    const transactionHash = parsed.transactionHash ?? parsed.txHash ?? parsed.hash;
    if (transactionHash) result.transactionHash = transactionHash;
    return result;
}

const logRecordSchema = z.object({
    logId: idLike.optional(),
    id: idLike.optional(),
});

/** Extract the id of a freshly created execution-log entry, if the directory returned one */
export function parseLogId(raw: unknown): string | undefined {
    const parsed = logRecordSchema.safeParse(camelizeKeys(firstRecord(raw)));
    if (!parsed.success) return undefined;
    return parsed.data.logId ?? parsed.data.id;
}
