export type FailureCategory =
    | "configuration_error"
    | "lookup_error"
    | "validation_error"
    | "external_call_error";

export type FailureCode =
    | "CONFIG_MISSING_FIELD"
    | "LOOKUP_NOT_FOUND"
    | "VALIDATION_UNKNOWN_FUNCTION"
    | "VALIDATION_MISSING_PARAM"
    | "VALIDATION_TYPE_MISMATCH"
    | "VALIDATION_RULE_FAILED"
    | "EXTERNAL_CHAIN_REVERTED"
    | "EXTERNAL_INSUFFICIENT_FUNDS"
    | "EXTERNAL_RATE_LIMIT"
    | "EXTERNAL_NETWORK_UNAVAILABLE"
    | "EXTERNAL_TIMEOUT"
    | "EXTERNAL_HTTP_ERROR"
    | "EXTERNAL_RUNTIME_EXCEPTION";

export interface FailureInfo {
    category: FailureCategory;
    code: FailureCode;
}

const RATE_LIMIT_PATTERNS = [/too many request/i, /\b429\b/i, /rate.?limit/i];
const NETWORK_PATTERNS = [
    /getaddrinfo/i,
    /econnrefused/i,
    /econnreset/i,
    /fetch failed/i,
    /socket hang up/i,
    /network error/i,
];
const TIMEOUT_PATTERNS = [/timed?\s*out/i, /\btimeout\b/i, /aborted/i];

function hasAny(text: string, patterns: RegExp[]): boolean {
    return patterns.some((p) => p.test(text));
}

/** Codes worth retrying: the remote side may succeed on a later attempt. */
const TRANSIENT_CODES = new Set<FailureCode>([
    "EXTERNAL_RATE_LIMIT",
    "EXTERNAL_NETWORK_UNAVAILABLE",
    "EXTERNAL_TIMEOUT",
]);

export function isTransientFailure(code: FailureCode): boolean {
    return TRANSIENT_CODES.has(code);
}

export function classifyFailureFromError(rawMessage: string): FailureInfo {
    const text = rawMessage.toLowerCase();

    if (text.includes("missing required env") || text.includes("is not configured")) {
        return { category: "configuration_error", code: "CONFIG_MISSING_FIELD" };
    }

    if (text.includes("unknown function") || text.includes("not enabled")) {
        return { category: "validation_error", code: "VALIDATION_UNKNOWN_FUNCTION" };
    }

    if (text.includes("missing parameter") || text.includes("missing required")) {
        return { category: "validation_error", code: "VALIDATION_MISSING_PARAM" };
    }

    if (text.includes("expected type") || text.includes("type mismatch")) {
        return { category: "validation_error", code: "VALIDATION_TYPE_MISMATCH" };
    }

    if (text.includes("validation rule")) {
        return { category: "validation_error", code: "VALIDATION_RULE_FAILED" };
    }

    if (text.includes("not found")) {
        return { category: "lookup_error", code: "LOOKUP_NOT_FOUND" };
    }

    if (text.includes("execution reverted") || text.includes("reverted with")) {
        return { category: "external_call_error", code: "EXTERNAL_CHAIN_REVERTED" };
    }

    if (text.includes("insufficient funds")) {
        return { category: "external_call_error", code: "EXTERNAL_INSUFFICIENT_FUNDS" };
    }

    if (hasAny(text, RATE_LIMIT_PATTERNS)) {
        return { category: "external_call_error", code: "EXTERNAL_RATE_LIMIT" };
    }

    if (hasAny(text, NETWORK_PATTERNS)) {
        return { category: "external_call_error", code: "EXTERNAL_NETWORK_UNAVAILABLE" };
    }

    if (hasAny(text, TIMEOUT_PATTERNS)) {
        return { category: "external_call_error", code: "EXTERNAL_TIMEOUT" };
    }

    return { category: "external_call_error", code: "EXTERNAL_RUNTIME_EXCEPTION" };
}
