import { isAddress } from "viem";
import type { FailureCode } from "../runFailure.js";
import { compareAmounts, parseAmount } from "../description/amount.js";
import type { Amount } from "../description/amount.js";
import type { ActionParams, FunctionDescriptor, ValidationRule } from "../types.js";

export interface ParamsIssue {
    code: FailureCode;
    message: string;
}

export interface ParamsValidationResult {
    ok: boolean;
    issues: ParamsIssue[];
}

function isMissing(value: unknown): boolean {
    return value === undefined || value === null || value === "";
}

function describe(value: unknown): string {
    if (Array.isArray(value)) return "array";
    if (value === null) return "null";
    return typeof value;
}

function isIntegerLike(value: unknown, signed: boolean): boolean {
    if (typeof value === "bigint") return signed || value >= 0n;
    // past the safe range a number has already lost digits
    if (typeof value === "number") return Number.isSafeInteger(value) && (signed || value >= 0);
    if (typeof value === "string") return (signed ? /^-?\d+$/ : /^\d+$/).test(value.trim());
    return false;
}

/** Whether a JSON value can be passed for a solidity parameter type */
export function matchesAbiType(value: unknown, type: string): boolean {
    if (type.endsWith("]")) return Array.isArray(value);
    if (type === "address") return typeof value === "string" && isAddress(value, { strict: false });
    if (/^uint\d*$/.test(type)) return isIntegerLike(value, false);
    if (/^int\d*$/.test(type)) return isIntegerLike(value, true);
    if (type === "bool") return typeof value === "boolean";
    if (type === "string") return typeof value === "string";
    if (/^bytes\d*$/.test(type)) return typeof value === "string" && /^0x[0-9a-fA-F]*$/.test(value);
    // tuples and anything exotic are left to the execution service
    return true;
}

function toComparable(value: unknown): Amount | undefined {
    if (typeof value === "number" || typeof value === "bigint") return value;
    if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
        return parseAmount(value) ?? Number(value);
    }
    return undefined;
}

function checkRule(name: string, value: unknown, rule: ValidationRule, issues: ParamsIssue[]): void {
    if (isMissing(value)) {
        if (rule.required) {
            issues.push({ code: "VALIDATION_MISSING_PARAM", message: `Missing required parameter '${name}'` });
        }
        return;
    }

    const numeric = toComparable(value);
    if (rule.min !== undefined && (numeric === undefined || compareAmounts(numeric, rule.min) < 0)) {
        issues.push({ code: "VALIDATION_RULE_FAILED", message: `Parameter '${name}' violates validation rule min=${rule.min}` });
    }
    if (rule.max !== undefined && (numeric === undefined || compareAmounts(numeric, rule.max) > 0)) {
        issues.push({ code: "VALIDATION_RULE_FAILED", message: `Parameter '${name}' violates validation rule max=${rule.max}` });
    }
    if (rule.pattern !== undefined) {
        let re: RegExp | undefined;
        try {
            re = new RegExp(rule.pattern);
        } catch {
            re = undefined;
        }
        if (!re) {
            issues.push({ code: "VALIDATION_RULE_FAILED", message: `Parameter '${name}' has an invalid validation rule pattern` });
        } else if (!re.test(String(value))) {
            issues.push({ code: "VALIDATION_RULE_FAILED", message: `Parameter '${name}' violates validation rule pattern=${rule.pattern}` });
        }
    }
    if (rule.enum !== undefined && !rule.enum.some((allowed) => String(allowed) === String(value))) {
        issues.push({ code: "VALIDATION_RULE_FAILED", message: `Parameter '${name}' violates validation rule enum=${rule.enum.join("|")}` });
    }
}

/**
 * Validate action params against a function's ABI inputs and its stored
 * validation rules.
 * - Every ABI input must be present and of a compatible type.
 * - No implicit coercion; numeric strings are accepted for integer types.
 * - Extra params are ignored (only ABI inputs are dispatched).
 */
export function validateFunctionParams(
    fn: FunctionDescriptor,
    params: ActionParams,
): ParamsValidationResult {
    const issues: ParamsIssue[] = [];

    for (const input of fn.inputs) {
        const value = params[input.name];
        if (isMissing(value)) {
            issues.push({ code: "VALIDATION_MISSING_PARAM", message: `Missing parameter '${input.name}' (${input.type})` });
            continue;
        }
        if (!matchesAbiType(value, input.type)) {
            issues.push({
                code: "VALIDATION_TYPE_MISMATCH",
                message: `Parameter '${input.name}' expected type ${input.type}, got ${describe(value)}`,
            });
        }
    }

    const declared = new Set(fn.inputs.map((input) => input.name));
    for (const [name, rule] of Object.entries(fn.validationRules)) {
        // a missing ABI input is already reported above
        if (declared.has(name) && isMissing(params[name])) continue;
        checkRule(name, params[name], rule, issues);
    }

    return { ok: issues.length === 0, issues };
}
