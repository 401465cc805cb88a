import { ExternalCallError } from "./errors/index.js";

export interface RequestOptions {
    method?: "GET" | "POST" | "PATCH";
    body?: unknown;
    apiKey?: string;
    timeoutMs: number;
    /** Service name used in error messages ("directory", "execution") */
    service: string;
}

/** Serializes bigint values (uint256 params, balances) as decimal strings */
export function toJson(payload: unknown, space?: number): string {
    return JSON.stringify(payload, (_key, value: unknown) =>
        typeof value === "bigint" ? value.toString() : value
    , space);
}

export function joinUrl(base: string, path: string): string {
    return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * Issue a JSON request with a per-call timeout.
 *
 * Returns `undefined` for 404 so callers can map it to a LookupError.
 * Any other non-2xx status, network failure or abort becomes an
 * ExternalCallError carrying the status when there is one.
 */
export async function requestJson(url: string, opts: RequestOptions): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), opts.timeoutMs);

    try {
        const headers: Record<string, string> = { Accept: "application/json" };
        if (opts.body !== undefined) headers["Content-Type"] = "application/json";
        if (opts.apiKey) headers["x-api-key"] = opts.apiKey;

        let res: Response;
        try {
            res = await fetch(url, {
                method: opts.method ?? "GET",
                headers,
                body: opts.body !== undefined ? toJson(opts.body) : undefined,
                signal: controller.signal,
            });
        } catch (err) {
            const reason = controller.signal.aborted
                ? `request timeout after ${opts.timeoutMs}ms`
                : `network error: ${err instanceof Error ? err.message : String(err)}`;
            throw new ExternalCallError(opts.service, reason, { cause: err });
        }

        if (res.status === 404) {
            return undefined;
        }
        if (!res.ok) {
            const errorText = await res.text().catch(() => "Unknown error");
            throw new ExternalCallError(
                opts.service,
                `HTTP ${res.status}: ${errorText.slice(0, 300)}`,
                { status: res.status },
            );
        }

        const text = await res.text();
        if (!text) return {};
        try {
            return JSON.parse(text);
        } catch (err) {
            throw new ExternalCallError(opts.service, `invalid JSON response: ${text.slice(0, 120)}`, { cause: err });
        }
    } finally {
        clearTimeout(timeout);
    }
}
