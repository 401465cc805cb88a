/**
 * In-memory metrics counters for the contract agent runner.
 *
 * Counters and gauges keyed by name. The CLI prints a snapshot in verbose
 * mode.
 */

export interface MetricsSnapshot {
    /** Unix timestamp when snapshot was taken */
    snapshotAt: number;
    counters: Record<string, number>;
    gauges: Record<string, number>;
}

class MetricsRegistry {
    private counters = new Map<string, number>();
    private gauges = new Map<string, number>();

    /** Increment a counter by delta (default 1) */
    inc(name: string, delta = 1): void {
        this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
    }

    set(name: string, value: number): void {
        this.gauges.set(name, value);
    }

    counter(name: string): number {
        return this.counters.get(name) ?? 0;
    }

    gauge(name: string): number {
        return this.gauges.get(name) ?? 0;
    }

    snapshot(): MetricsSnapshot {
        return {
            snapshotAt: Date.now(),
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
        };
    }
}

export const metrics = new MetricsRegistry();

// ═══════════════════════════════════════════════════════
//                  Well-known metric names
// ═══════════════════════════════════════════════════════

/** Counter: plan–execute–reflect runs started */
export const METRIC_RUNS_TOTAL = "runs";
/** Counter: execute batches (cycles) across all runs */
export const METRIC_CYCLES_TOTAL = "cycles";
/** Counter: runs stopped by the cycle ceiling */
export const METRIC_MAX_CYCLES_REACHED = "max_cycles_reached";
/** Counter: actions dispatched successfully */
export const METRIC_ACTIONS_SUCCESS = "actions_success";
/** Counter: actions that produced an error entry */
export const METRIC_ACTIONS_FAILURE = "actions_failure";
/** Counter: actions dropped because the function is unknown or disabled */
export const METRIC_ACTIONS_SKIPPED = "actions_skipped";
/** Counter: LLM planning calls */
export const METRIC_LLM_CALLS = "llm_calls";
/** Counter: LLM failures answered by deterministic fallbacks */
export const METRIC_LLM_FALLBACKS = "llm_fallbacks";
/** Counter: retry attempts (withRetry) */
export const METRIC_RETRIES = "retry_attempts";
/** Counter: execution-log writes that failed and were downgraded */
export const METRIC_LOG_WRITE_FAILURES = "log_write_failures";
/** Gauge: runs currently in progress */
export const METRIC_ACTIVE_RUNS = "active_runs";
