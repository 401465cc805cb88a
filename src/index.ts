#!/usr/bin/env node
/**
 * Contract Agent Runner — command line entry.
 *
 *   contract-agent <agentId> [--verbose] [--max-cycles N] [--complete-all] [--force-llm]
 *
 * Runs one `cli` trigger for the agent, prints each call and exits 0 on a
 * completed run, 1 when the agent could not be run.
 */

import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { HttpAgentDirectory } from "./directory/client.js";
import { HttpContractExecutionService } from "./execution/client.js";
import { createPlanningModel } from "./brain/llm/provider.js";
import { executeAgent } from "./service.js";
import type { ExecuteAgentResult } from "./service.js";
import { toJson } from "./http.js";
import { metrics } from "./metrics.js";
import type { CycleOutputEntry } from "./types.js";

const USAGE = "Usage: contract-agent <agentId> [--verbose] [--max-cycles N] [--complete-all] [--force-llm]";

function outcomeOf(entry: CycleOutputEntry): string {
    if (entry.error !== undefined) {
        return entry.errorCode ? `ERROR ${entry.errorCode} ${entry.error}` : `ERROR ${entry.error}`;
    }
    const result = entry.result;
    if (!result?.success) return `FAILED ${result?.error ?? "unknown error"}`;
    let text = "OK";
    if (result.transactionHash) text += ` tx=${result.transactionHash}`;
    if (result.data !== undefined) text += ` ${toJson(result.data)}`;
    return text;
}

function formatEntry(entry: CycleOutputEntry): string {
    return `  [cycle ${entry.cycle}] ${entry.function}(${toJson(entry.params)}) → ${outcomeOf(entry)}\n      ${entry.message}`;
}

function printResult(result: ExecuteAgentResult, verbose: boolean): void {
    if (!result.success) {
        console.error(`Agent ${result.agentId} failed: ${result.error}`);
        return;
    }
    console.log(`Agent ${result.agentId}: ${result.doneReason}, ${result.executionCount} call(s), ${result.cycles} cycle(s)`);
    for (const entry of result.results) {
        console.log(formatEntry(entry));
    }
    if (result.message) console.log(result.message);

    if (verbose) {
        console.log(toJson(result, 2));
        console.log(toJson(metrics.snapshot(), 2));
    }
}

async function main(): Promise<number> {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: {
            verbose: { type: "boolean", short: "v", default: false },
            "max-cycles": { type: "string" },
            "complete-all": { type: "boolean", default: false },
            "force-llm": { type: "boolean", default: false },
            help: { type: "boolean", short: "h", default: false },
        },
    });

    const agentId = positionals[0];
    if (values.help || !agentId) {
        console.log(USAGE);
        return agentId || values.help ? 0 : 1;
    }

    const maxCyclesRaw = values["max-cycles"];
    const maxCycles = maxCyclesRaw !== undefined ? Number.parseInt(maxCyclesRaw, 10) : undefined;
    if (maxCycles !== undefined && !Number.isFinite(maxCycles)) {
        console.error(`--max-cycles expects a number, got "${maxCyclesRaw}"`);
        return 1;
    }

    const config = loadConfig();
    const log = createLogger({ level: values.verbose === true ? "debug" : config.logLevel, json: config.logJson });

    const result = await executeAgent(
        agentId,
        {
            directory: new HttpAgentDirectory({
                baseUrl: config.directoryApiUrl,
                apiKey: config.directoryApiKey,
                timeoutMs: config.httpTimeoutMs,
                retryCount: config.httpRetryCount,
                retryBaseDelayMs: config.httpRetryBaseDelayMs,
                log,
            }),
            execution: new HttpContractExecutionService({
                baseUrl: config.executionApiUrl,
                apiKey: config.executionApiKey,
                timeoutMs: config.httpTimeoutMs,
            }),
            model: createPlanningModel(config),
            settings: config,
            log,
        },
        {
            trigger_type: "cli",
            complete_all_tasks: values["complete-all"] === true,
            force_llm: values["force-llm"] === true,
            ...(maxCycles !== undefined ? { max_cycles: maxCycles } : {}),
        },
    );

    printResult(result, values.verbose === true);
    return result.success ? 0 : 1;
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err) => {
        console.error("Fatal error:", err);
        process.exitCode = 1;
    });
