/**
 * Error sanitization — keep service internals out of user-facing output.
 *
 * Raw errors (service URLs, stack traces, provider codes) are logged, while
 * callers such as the WebSocket layer receive a short, stable message.
 */

/** Known error patterns → user-facing replacements */
const ERROR_PATTERNS: Array<[RegExp, string]> = [
    // Transport
    [/Too many request/i, "A service is busy. Try again shortly."],
    [/\b429\b/i, "A service is busy. Try again shortly."],
    [/getaddrinfo|ECONNREFUSED|ECONNRESET|fetch failed/i, "A required service is unreachable."],
    [/ETIMEDOUT|timed? ?out|aborted/i, "A request timed out."],

    // Directory
    [/agent .* not found/i, "The agent does not exist."],
    [/contract .* not found/i, "The agent's contract does not exist."],

    // Chain
    [/insufficient funds/i, "The executing wallet has insufficient funds for gas."],
    [/execution reverted/i, "The contract rejected the transaction."],
    [/nonce too low|replacement transaction underpriced/i, "Transaction conflict detected."],

    // Configuration and LLM
    [/Missing required env var|is not configured/i, "The runner is misconfigured. Contact an admin."],
    [/rate.?limit/i, "The planning service is busy. Try again shortly."],
    [/API key/i, "The planning service is misconfigured. Contact an admin."],
];

/**
 * Sanitize an error for user-facing display.
 */
export function sanitizeForUser(rawError: string): string {
    for (const [pattern, friendly] of ERROR_PATTERNS) {
        if (pattern.test(rawError)) {
            return friendly;
        }
    }
    return "An unexpected error occurred while running the agent.";
}

/**
 * Extract error message from unknown catch value.
 */
export function extractErrorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === "string") return err;
    return String(err);
}
