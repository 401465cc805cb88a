export interface Logger {
    debug: (...args: unknown[]) => void;
    info: (...args: unknown[]) => void;
    warn: (...args: unknown[]) => void;
    error: (...args: unknown[]) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerOptions {
    level?: string;
    /** Output JSON lines instead of human-readable text. Default: false */
    json?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function toLevel(raw: string | undefined): LogLevel {
    const value = (raw ?? "info").toLowerCase();
    return isLogLevel(value) ? value : "info";
}

export function createLogger(levelOrOpts: string | LoggerOptions): Logger {
    const opts = typeof levelOrOpts === "string"
        ? { level: levelOrOpts, json: false }
        : levelOrOpts;
    const threshold = LEVEL_RANK[toLevel(opts.level)];
    const enabled = (level: Exclude<LogLevel, "silent">) => LEVEL_RANK[level] >= threshold;
    const json = opts.json ?? (process.env.LOG_FORMAT === "json");

    if (json) {
        return createJsonLogger(enabled);
    }

    return {
        debug: (...args: unknown[]) => {
            if (!enabled("debug")) return;
            console.debug(`[${new Date().toISOString()}] [DEBUG]`, ...args);
        },
        info: (...args: unknown[]) => {
            if (!enabled("info")) return;
            console.log(`[${new Date().toISOString()}] [INFO]`, ...args);
        },
        warn: (...args: unknown[]) => {
            if (!enabled("warn")) return;
            console.warn(`[${new Date().toISOString()}] [WARN]`, ...args);
        },
        error: (...args: unknown[]) => {
            if (!enabled("error")) return;
            console.error(`[${new Date().toISOString()}] [ERROR]`, ...args);
        },
    };
}

/** JSON structured logger — one JSON object per line */
function createJsonLogger(enabled: (level: Exclude<LogLevel, "silent">) => boolean): Logger {
    const emit = (level: Exclude<LogLevel, "silent">, args: unknown[]) => {
        if (!enabled(level)) return;
        const msg = args.map(a =>
            typeof a === "string" ? a : a instanceof Error ? a.message : JSON.stringify(a)
        ).join(" ");
        const entry: Record<string, unknown> = {
            ts: new Date().toISOString(),
            level,
            msg,
        };

        // Messages tagged "[agent:<id>]" are queryable by agent
        const agentMatch = msg.match(/\[agent:([^\]\s]+)\]/);
        if (agentMatch) {
            entry.agentId = agentMatch[1];
        }

        const line = JSON.stringify(entry);
        if (level === "error") {
            process.stderr.write(line + "\n");
        } else {
            process.stdout.write(line + "\n");
        }
    };

    return {
        debug: (...args: unknown[]) => emit("debug", args),
        info: (...args: unknown[]) => emit("info", args),
        warn: (...args: unknown[]) => emit("warn", args),
        error: (...args: unknown[]) => emit("error", args),
    };
}
