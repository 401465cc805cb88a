import assert from "node:assert/strict";
import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors/index.js";

function runConfigTests(): void {
    const config = loadConfig({
        DIRECTORY_API_URL: "http://directory.local/api/",
        EXECUTION_API_URL: "http://execution.local",
        MAX_CYCLES: "50",
        MAX_CYCLES_CEILING: "10",
        LOG_FORMAT: "JSON",
    });
    assert.equal(config.directoryApiUrl, "http://directory.local/api");
    assert.equal(config.executionApiUrl, "http://execution.local");
    assert.equal(config.maxCycles, 10, "the default bound never exceeds the ceiling");
    assert.equal(config.maxCyclesCeiling, 10);
    assert.equal(config.defaultMintAmount, 5_000_000);
    assert.equal(config.defaultGasLimit, "1000000");
    assert.equal(config.httpRetryCount, 3);
    assert.equal(config.llmProvider, "openai");
    assert.equal(config.llmModel, "gpt-4o");
    assert.equal(config.logJson, true);

    const legacy = loadConfig({
        DB_API_URL: "http://db.local",
        BLOCKCHAIN_API_URL: "http://chain.local",
        OPENAI_API_KEY: "test-secret",
        MAX_CYCLES: "abc",
    });
    assert.equal(legacy.directoryApiUrl, "http://db.local");
    assert.equal(legacy.executionApiUrl, "http://chain.local");
    assert.equal(legacy.llmApiKey, "test-secret");
    assert.equal(legacy.maxCycles, 5);

    assert.throws(
        () => loadConfig({ EXECUTION_API_URL: "http://execution.local" }),
        (err: unknown) =>
            err instanceof ConfigurationError
            && err.message === "Missing required env var (any of): DIRECTORY_API_URL, DB_API_URL",
    );
}

runConfigTests();
console.log("Config tests passed.");
