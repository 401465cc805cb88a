import assert from "node:assert/strict";
import { analyzeAndExecute, resolveCycleLimit } from "./runtime.js";
import type { RuntimeDeps, StatePlanner } from "./runtime.js";
import { loadAgent } from "./factory.js";
import { ActionExecutor } from "../actions/executor.js";
import { DecisionEngine } from "../brain/decisionEngine.js";
import { ReflectionEngine } from "../brain/reflectionEngine.js";
import { BehaviorStrategy } from "../brain/rule/behavior.js";
import { PendingTasksStrategy } from "../brain/rule/pendingTasks.js";
import { ThresholdStrategy } from "../brain/rule/threshold.js";
import { LlmDecisionStrategy, LlmReflectionStrategy } from "../brain/llm/agent.js";
import { BATCH_TOOL, SINGLE_TOOL } from "../brain/llm/provider.js";
import type { PlanningModel } from "../brain/llm/provider.js";
import { ExternalCallError } from "../errors/index.js";
import { metrics, METRIC_ACTIONS_SKIPPED } from "../metrics.js";
import { parseTrigger } from "../validation.js";
import type { Action, FunctionDescriptor } from "../types.js";
import {
    FailingPlanningModel,
    FakeDirectory,
    FakeExecution,
    FakePlanningModel,
    OWNER,
    TARGET,
    agentProfile,
    balanceOfFn,
    contractInfo,
    descriptor,
    mintFn,
    silentLog,
    tokenLedger,
    toolCall,
} from "../testing/fakes.js";
import type { DispatchHandler } from "../testing/fakes.js";

const SETTINGS = { maxCycles: 5, maxCyclesCeiling: 20, defaultMintAmount: 5000000 };

async function setup(
    description: string,
    functions: FunctionDescriptor[],
    handler: DispatchHandler,
    model: PlanningModel,
) {
    const directory = new FakeDirectory();
    directory.agents.set("agent-1", agentProfile({ description }));
    directory.contracts.set("contract-1", contractInfo());
    directory.functions.set("agent-1", functions);

    const agent = await loadAgent("agent-1", directory, { defaultGasLimit: "1000000", defaultMaxPriorityFee: "2" });
    const execution = new FakeExecution(handler);
    const deps: RuntimeDeps = {
        decision: new DecisionEngine([new BehaviorStrategy(), new LlmDecisionStrategy(model, silentLog)], silentLog),
        reflection: new ReflectionEngine(
            [new PendingTasksStrategy(), new ThresholdStrategy(), new LlmReflectionStrategy(model, silentLog)],
            silentLog,
        ),
        executor: new ActionExecutor({
            agent: agent.profile,
            contract: agent.contract,
            directory,
            execution,
            log: silentLog,
        }),
        settings: SETTINGS,
        log: silentLog,
    };
    return { agent, deps, execution, directory };
}

/** Decision stage that hands the runtime a fixed first batch, unfiltered */
function fixedPlan(actions: Action[]): StatePlanner {
    return { analyzeState: async () => actions };
}

async function mintBelowThresholdRunsOneMint(): Promise<void> {
    const model = new FakePlanningModel(() => toolCall(BATCH_TOOL, { functions: [] }));
    const { agent, deps, execution } = await setup(
        `mint 5000000 tokens to ${TARGET} if balance less than 5`,
        [balanceOfFn, mintFn],
        tokenLedger(),
        model,
    );

    const report = await analyzeAndExecute(agent, parseTrigger({ trigger_type: "test" }), deps);

    assert.deepEqual(report.results.map((r) => r.function), ["balanceOf", "mint", "balanceOf"]);
    assert.deepEqual(report.results[0]?.params, { account: OWNER });
    assert.deepEqual(report.results[1]?.params, { to: TARGET, amount: 5000000 });
    assert.equal(report.results[1]?.cycle, 2);
    assert.equal(report.doneReason, "satisfied");
    assert.equal(report.cycles, 3);
    assert.deepEqual(report.phases, [
        "init", "planning",
        "executing", "reflecting",
        "executing", "reflecting",
        "executing", "reflecting",
        "done",
    ]);
    assert.equal(execution.calls.filter((c) => c.payload.functionName === "mint").length, 1, "exactly one mint");
    assert.equal("gasLimit" in (execution.calls[0]?.payload ?? {}), false, "reads carry no gas fields");
    assert.equal(execution.calls[1]?.payload.gasLimit, "300000");
    assert.equal(execution.calls[1]?.payload.maxPriorityFee, "2");
    assert.deepEqual(report.contractState, { balanceOf: 0 });
    assert.equal(model.requests.length, 0, "deterministic rules settle this run without the LLM");
}

async function ownerReadDoesNotBlockTheMint(): Promise<void> {
    const ownerFn = descriptor("owner", "read", []);
    const model = new FakePlanningModel(() => toolCall(BATCH_TOOL, { functions: [] }));
    const { agent, deps, execution } = await setup(
        `Check the balance of the owner and mint 1000 tokens to ${TARGET} if balance less than 5`,
        [balanceOfFn, ownerFn, mintFn],
        tokenLedger(),
        model,
    );

    const report = await analyzeAndExecute(agent, parseTrigger({ trigger_type: "test" }), deps);

    assert.deepEqual(report.results.map((r) => r.function), ["balanceOf", "mint", "balanceOf"]);
    assert.deepEqual(report.results[1]?.params, { to: TARGET, amount: 1000 });
    assert.equal(report.doneReason, "satisfied");
    assert.equal(execution.calls.some((c) => c.payload.functionName === "owner"), false);
    assert.equal(model.requests.length, 0);
}

async function alwaysBusyPlannerStopsAtTheBound(): Promise<void> {
    const call = { function_name: "balanceOf", parameters: { account: OWNER }, message: "read again" };
    const model = new FakePlanningModel((request) =>
        request.mode === "single"
            ? toolCall(SINGLE_TOOL, call)
            : toolCall(BATCH_TOOL, { functions: [call] })
    );
    const { agent, deps } = await setup("do something useful", [balanceOfFn], tokenLedger(), model);

    const report = await analyzeAndExecute(agent, parseTrigger({ trigger_type: "test", max_cycles: 3 }), deps);

    assert.equal(report.doneReason, "max-cycles");
    assert.equal(report.cycles, 3);
    assert.equal(report.results.length, 3);
    assert.deepEqual(report.results.map((r) => r.cycle), [1, 2, 3]);
    assert.equal(model.requests.length, 3, "one single plan and two reflections");
    assert.equal(report.phases[report.phases.length - 2], "executing", "no reflection after the last cycle");
}

async function disabledFunctionIsNeverRun(): Promise<void> {
    const burn = descriptor("burn", "write", [{ name: "amount", type: "uint256" }], { enabled: false });
    const model = new FakePlanningModel(() =>
        toolCall(SINGLE_TOOL, { function_name: "burn", parameters: { amount: 10 }, message: "burn" })
    );
    const { agent, deps, execution } = await setup("burn 10 tokens", [balanceOfFn, burn], tokenLedger(), model);

    const report = await analyzeAndExecute(agent, parseTrigger({ trigger_type: "test" }), deps);

    assert.equal(report.doneReason, "no-actions");
    assert.deepEqual(report.results, []);
    assert.equal(execution.calls.length, 0);
}

async function dispatchFailureBecomesAnErrorEntry(): Promise<void> {
    const model = new FailingPlanningModel();
    const { agent, deps, directory } = await setup(
        "check balance",
        [balanceOfFn],
        () => {
            throw new ExternalCallError("execution", "execution reverted: paused");
        },
        model,
    );

    const report = await analyzeAndExecute(agent, parseTrigger({ trigger_type: "test" }), deps);

    assert.equal(report.results.length, 1);
    assert.equal(report.results[0]?.error, "execution: execution reverted: paused");
    assert.equal(report.results[0]?.errorCode, "EXTERNAL_CHAIN_REVERTED");
    assert.equal(report.results[0]?.result, undefined);
    assert.equal(report.doneReason, "satisfied", "the failed reflection falls back to (no) pending tasks");
    assert.equal(model.calls, 1);
    assert.deepEqual(
        directory.logWrites.map((w) => [w.op, w.entry.status]),
        [["create", "pending"], ["update", "failed"]],
    );
}

async function failedActionDoesNotStopTheBatch(): Promise<void> {
    const ledger = tokenLedger();
    const model = new FakePlanningModel(() => toolCall(BATCH_TOOL, { functions: [] }));
    const { agent, deps, execution } = await setup(
        "do something useful",
        [balanceOfFn, mintFn],
        (type, payload) => {
            if (payload.functionName === "mint") throw new ExternalCallError("execution", "execution reverted: paused");
            return ledger(type, payload);
        },
        model,
    );
    const plan = fixedPlan([
        { functionName: "mint", params: { to: TARGET, amount: 1 }, message: "mint first" },
        { functionName: "balanceOf", params: { account: TARGET }, message: "then read" },
    ]);

    const report = await analyzeAndExecute(agent, parseTrigger({ trigger_type: "test" }), { ...deps, decision: plan });

    assert.deepEqual(execution.calls.map((c) => c.payload.functionName), ["mint", "balanceOf"]);
    assert.deepEqual(report.results.map((r) => [r.function, r.cycle]), [["mint", 1], ["balanceOf", 1]]);
    assert.equal(report.results[0]?.error, "execution: execution reverted: paused");
    assert.deepEqual(report.results[1]?.result, { success: true, data: 0 });
    assert.equal(report.doneReason, "satisfied");
    assert.equal(model.requests.length, 1);
}

async function unresolvedActionIsSkippedByTheRuntime(): Promise<void> {
    const burn = descriptor("burn", "write", [{ name: "amount", type: "uint256" }], { enabled: false });
    const model = new FakePlanningModel(() => toolCall(BATCH_TOOL, { functions: [] }));
    const { agent, deps, execution } = await setup("do something useful", [balanceOfFn, burn], tokenLedger(), model);
    const plan = fixedPlan([
        { functionName: "burn", params: { amount: 1 } },
        { functionName: "unknownFn", params: {} },
        { functionName: "balanceOf", params: { account: OWNER } },
    ]);
    const skippedBefore = metrics.counter(METRIC_ACTIONS_SKIPPED);

    const report = await analyzeAndExecute(agent, parseTrigger({ trigger_type: "test" }), { ...deps, decision: plan });

    assert.deepEqual(report.results.map((r) => r.function), ["balanceOf"]);
    assert.deepEqual(execution.calls.map((c) => c.payload.functionName), ["balanceOf"]);
    assert.equal(metrics.counter(METRIC_ACTIONS_SKIPPED) - skippedBefore, 2);
    assert.equal(report.doneReason, "satisfied");
}

function cycleLimitTests(): void {
    const base = { triggerType: "test", timestamp: "2026-01-01T00:00:00.000Z", executionId: "x" };
    assert.equal(resolveCycleLimit(base, SETTINGS), 5);
    assert.equal(resolveCycleLimit({ ...base, maxCycles: 100 }, SETTINGS), 20);
    assert.equal(resolveCycleLimit({ ...base, maxCycles: 0 }, SETTINGS), 1);
    assert.equal(resolveCycleLimit({ ...base, completeAllTasks: true }, SETTINGS), 20);
    assert.equal(resolveCycleLimit({ ...base, completeAllTasks: true, maxCycles: 2 }, SETTINGS), 2);
}

cycleLimitTests();
await mintBelowThresholdRunsOneMint();
await ownerReadDoesNotBlockTheMint();
await alwaysBusyPlannerStopsAtTheBound();
await disabledFunctionIsNeverRun();
await dispatchFailureBecomesAnErrorEntry();
await failedActionDoesNotStopTheBatch();
await unresolvedActionIsSkippedByTheRuntime();
console.log("Runtime tests passed.");
