import assert from "node:assert/strict";
import { classifyFailureFromError, isTransientFailure } from "./runFailure.js";

function runFailureClassifierTests(): void {
    const unknownFunction = classifyFailureFromError("Unknown function: burnAll");
    assert.equal(unknownFunction.category, "validation_error");
    assert.equal(unknownFunction.code, "VALIDATION_UNKNOWN_FUNCTION");

    const missing = classifyFailureFromError("Invalid params for mint: Missing parameter 'to' (address)");
    assert.equal(missing.category, "validation_error");
    assert.equal(missing.code, "VALIDATION_MISSING_PARAM");

    const mismatch = classifyFailureFromError("Parameter 'amount' expected type uint256, got boolean");
    assert.equal(mismatch.code, "VALIDATION_TYPE_MISMATCH");

    const rule = classifyFailureFromError("Parameter 'amount' violates validation rule max=10");
    assert.equal(rule.code, "VALIDATION_RULE_FAILED");

    const lookup = classifyFailureFromError("agent agent-7 not found");
    assert.equal(lookup.category, "lookup_error");
    assert.equal(lookup.code, "LOOKUP_NOT_FOUND");

    const config = classifyFailureFromError("Missing required env var (any of): DIRECTORY_API_URL");
    assert.equal(config.category, "configuration_error");
    assert.equal(config.code, "CONFIG_MISSING_FIELD");

    const errRevert = classifyFailureFromError("execution reverted: paused");
    assert.equal(errRevert.category, "external_call_error");
    assert.equal(errRevert.code, "EXTERNAL_CHAIN_REVERTED");

    const errInvalidToken = classifyFailureFromError(
        "The contract function \"mint\" reverted with the following reason: Ownable: caller is not the owner",
    );
    assert.equal(errInvalidToken.code, "EXTERNAL_CHAIN_REVERTED");

    assert.equal(classifyFailureFromError("insufficient funds for gas * price + value").code, "EXTERNAL_INSUFFICIENT_FUNDS");
    assert.equal(classifyFailureFromError("429 Too many request").code, "EXTERNAL_RATE_LIMIT");
    assert.equal(classifyFailureFromError("network error: fetch failed").code, "EXTERNAL_NETWORK_UNAVAILABLE");
    assert.equal(classifyFailureFromError("request timeout after 15000ms").code, "EXTERNAL_TIMEOUT");

    const unknown = classifyFailureFromError("something odd");
    assert.equal(unknown.category, "external_call_error");
    assert.equal(unknown.code, "EXTERNAL_RUNTIME_EXCEPTION");
}

function transientTests(): void {
    assert.equal(isTransientFailure("EXTERNAL_RATE_LIMIT"), true);
    assert.equal(isTransientFailure("EXTERNAL_NETWORK_UNAVAILABLE"), true);
    assert.equal(isTransientFailure("EXTERNAL_TIMEOUT"), true);
    assert.equal(isTransientFailure("EXTERNAL_CHAIN_REVERTED"), false);
    assert.equal(isTransientFailure("VALIDATION_MISSING_PARAM"), false);
}

runFailureClassifierTests();
transientTests();
console.log("Run failure classifier tests passed.");
