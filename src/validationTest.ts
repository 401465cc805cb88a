import assert from "node:assert/strict";
import {
    camelizeKeys,
    normalizeFunctionAbi,
    parseAgentProfile,
    parseContractInfo,
    parseExecutionResponse,
    parseFunctionDescriptor,
    parseFunctionDescriptors,
    parseLogId,
    parseTrigger,
} from "./validation.js";
import { CONTRACT_ADDRESS, OWNER, TARGET } from "./testing/fakes.js";

const NOW = new Date("2026-03-04T05:06:07.000Z");

function keyTests(): void {
    assert.deepEqual(camelizeKeys({ function_name: "a", functionName: "b" }), { functionName: "b" });
    assert.deepEqual(camelizeKeys({ functionName: "b", function_name: "a" }), { functionName: "b" });
    assert.deepEqual(camelizeKeys(["x"]), ["x"]);
}

function agentTests(): void {
    assert.deepEqual(parseAgentProfile({
        agent_id: 7,
        name: "Minter",
        description: "check balance",
        owner: OWNER,
        contract_id: "contract-1",
        gas_limit: 300000,
        max_priority_fee: "2",
        status: "active",
        contract_state: "{\"balanceOf\":3}",
    }), {
        id: "7",
        name: "Minter",
        description: "check balance",
        owner: OWNER,
        contractId: "contract-1",
        gasLimit: "300000",
        maxPriorityFee: "2",
        status: "active",
        contractState: { balanceOf: 3 },
    });

    assert.deepEqual(parseAgentProfile([{ name: "Bare" }], "agent-9"), {
        id: "agent-9",
        name: "Bare",
        description: "",
        owner: "",
        contractId: "",
        gasLimit: "",
        maxPriorityFee: "",
        status: "",
        contractState: {},
    });
}

function contractTests(): void {
    assert.deepEqual(parseContractInfo({
        contract_address: CONTRACT_ADDRESS,
        abi: "[{\"type\":\"function\",\"name\":\"mint\",\"inputs\":[]}]",
    }, "contract-1"), {
        id: "contract-1",
        address: CONTRACT_ADDRESS,
        abi: [{ type: "function", name: "mint", inputs: [] }],
    });

    const single = parseContractInfo({ id: 4, address: CONTRACT_ADDRESS, abi: { type: "function", name: "mint" } });
    assert.equal(single.id, "4");
    assert.deepEqual(single.abi, [{ type: "function", name: "mint" }]);
}

function functionTests(): void {
    assert.deepEqual(parseFunctionDescriptor({
        function_id: 3,
        function_name: "mint",
        function_signature: "mint(address,uint256)",
        function_type: "nonpayable",
        is_enabled: "false",
        abi: "[{\"name\":\"to\",\"type\":\"address\"},{\"name\":\"amount\",\"type\":\"uint256\"}]",
        validation_rules: "{\"required\":[\"to\"],\"amount\":{\"min\":\"1\"}}",
    }), {
        id: "3",
        name: "mint",
        signature: "mint(address,uint256)",
        type: "write",
        enabled: false,
        inputs: [{ name: "to", type: "address" }, { name: "amount", type: "uint256" }],
        validationRules: { to: { required: true }, amount: { min: 1 } },
    });

    const fromFullAbi = parseFunctionDescriptor({
        name: "balanceOf",
        abi: [
            { type: "function", name: "transfer", inputs: [{ name: "to", type: "address" }] },
            {
                type: "function",
                name: "balanceOf",
                inputs: [{ name: "account", type: "address" }],
                outputs: [{ name: "", type: "uint256" }],
                stateMutability: "view",
            },
        ],
    });
    assert.equal(fromFullAbi.type, "read", "type follows stateMutability when none is stored");
    assert.equal(fromFullAbi.enabled, true);
    assert.deepEqual(fromFullAbi.inputs, [{ name: "account", type: "address" }]);
    assert.deepEqual(fromFullAbi.fragment, {
        type: "function",
        name: "balanceOf",
        inputs: [{ name: "account", type: "address" }],
        outputs: [{ name: "", type: "uint256" }],
        stateMutability: "view",
    });

    assert.deepEqual(
        normalizeFunctionAbi({ type: "function", name: "mint", inputs: [{ name: "to", type: "address" }] }, "mint"),
        {
            inputs: [{ name: "to", type: "address" }],
            fragment: { type: "function", name: "mint", inputs: [{ name: "to", type: "address" }] },
        },
    );
    assert.deepEqual(normalizeFunctionAbi("garbage", "mint"), { inputs: [] });

    assert.deepEqual(
        parseFunctionDescriptors([{ name: "" }, { function_name: "pause" }]).map((fn) => [fn.name, fn.type]),
        [["pause", "write"]],
    );
}

function triggerTests(): void {
    assert.deepEqual(parseTrigger({
        trigger_type: "scheduled",
        complete_all_tasks: "true",
        max_cycles: "4",
        extracted_params: { to: TARGET, amount: "250", threshold: 5 },
    }, NOW), {
        triggerType: "scheduled",
        timestamp: "2026-03-04T05:06:07.000Z",
        executionId: "scheduled_20260304050607",
        completeAllTasks: true,
        maxCycles: 4,
        extractedParams: { threshold: 5, mintAmount: 250, to: TARGET },
    });

    assert.deepEqual(parseTrigger(undefined, NOW), {
        triggerType: "manual",
        timestamp: "2026-03-04T05:06:07.000Z",
        executionId: "manual_20260304050607",
    });

    assert.equal(parseTrigger({ force_llm: true, execution_id: 99 }, NOW).executionId, "99");
}

function responseTests(): void {
    assert.deepEqual(
        parseExecutionResponse({ success: true, result: "42", tx_hash: "0xabc" }),
        { success: true, data: "42", transactionHash: "0xabc" },
    );
    assert.deepEqual(
        parseExecutionResponse({ error: { message: "execution reverted" } }),
        { success: false, error: "execution reverted" },
    );
    assert.deepEqual(parseExecutionResponse(undefined), { success: true });

    assert.equal(parseLogId([{ log_id: 12 }]), "12");
    assert.equal(parseLogId({ id: "abc" }), "abc");
    assert.equal(parseLogId({}), undefined);
    assert.equal(parseLogId("nope"), undefined);
}

keyTests();
agentTests();
contractTests();
functionTests();
triggerTests();
responseTests();
console.log("Validation tests passed.");
