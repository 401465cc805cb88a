import assert from "node:assert/strict";
import { derivePendingTasks, hasMintedTo, sameAddress } from "./pendingTasks.js";
import { mentionsRead } from "../../actions/catalog.js";
import { OWNER, TARGET, balanceOfFn, descriptor, historyEntry, mintFn, planningInput } from "../../testing/fakes.js";

const DESCRIPTION = `read balanceOf then mint 10 to ${TARGET}`;

function addressTests(): void {
    assert.equal(sameAddress(TARGET, TARGET.toLowerCase()), true);
    assert.equal(sameAddress(TARGET, OWNER), false);
    assert.equal(sameAddress(undefined, TARGET), false);

    const history = [historyEntry("mint", { to: TARGET.toLowerCase(), amount: 10 }, { success: false, error: "reverted" })];
    assert.equal(hasMintedTo(history, mintFn, TARGET), true, "a failed attempt still counts");
    assert.equal(hasMintedTo(history, mintFn, OWNER), false);
}

function freshRunTests(): void {
    const tasks = derivePendingTasks(planningInput(DESCRIPTION, [balanceOfFn, mintFn]));
    assert.deepEqual(tasks.map((t) => [t.functionName, t.params]), [
        ["balanceOf", { account: TARGET }],
        ["mint", { to: TARGET, amount: 10 }],
    ]);
}

function progressTests(): void {
    const history = [
        historyEntry("balanceOf", { account: TARGET }, { success: true, data: 0 }),
        historyEntry("mint", { to: TARGET, amount: 10 }, { success: true, transactionHash: "0x01" }),
    ];
    const input = planningInput(DESCRIPTION, [balanceOfFn, mintFn], { history });

    assert.deepEqual(derivePendingTasks(input), [], "nothing left once every task was attempted");
    assert.deepEqual(derivePendingTasks(input), derivePendingTasks(input));
}

function ownerFillsUnnamedAccount(): void {
    const tasks = derivePendingTasks(planningInput("report balanceOf daily", [balanceOfFn]));
    assert.deepEqual(tasks, [{
        functionName: "balanceOf",
        params: { account: OWNER },
        message: "Reading balanceOf as the description requests",
    }]);
}

function thresholdOwnsMinting(): void {
    const tasks = derivePendingTasks(planningInput(`mint 1000 tokens to ${TARGET} if balance less than 5`, [balanceOfFn, mintFn]));
    assert.deepEqual(tasks, []);
}

function mentionTests(): void {
    assert.equal(mentionsRead("report balanceOf daily", "balanceOf"), true);
    assert.equal(mentionsRead("report balanceof daily", "balanceOf"), false, "identifiers match case-sensitively");
    assert.equal(mentionsRead("sign with DOMAIN_SEPARATOR", "DOMAIN_SEPARATOR"), true);
    assert.equal(mentionsRead("Check the balance of the owner", "owner"), false);
    assert.equal(mentionsRead("the token name is fixed", "name"), false);
    assert.equal(mentionsRead("read the owner first", "owner"), true);
    assert.equal(mentionsRead("call owner() once", "owner"), true);
    assert.equal(mentionsRead("consultar el owner", "owner"), true);
    assert.equal(mentionsRead("read ownership", "owner"), false);
}

function plainWordReadsNeedAVerb(): void {
    const owner = descriptor("owner", "read", []);
    const description = `Check the balance of the owner and mint 1000 tokens to ${TARGET}`;
    assert.deepEqual(
        derivePendingTasks(planningInput(description, [balanceOfFn, owner, mintFn])).map((t) => t.functionName),
        ["mint"],
    );
    assert.deepEqual(derivePendingTasks(planningInput("read the owner", [owner])), [{
        functionName: "owner",
        params: {},
        message: "Reading owner as the description requests",
    }]);
}

function disabledReadIsIgnored(): void {
    const disabled = { ...balanceOfFn, enabled: false };
    assert.deepEqual(derivePendingTasks(planningInput("report balanceOf daily", [disabled])), []);
}

addressTests();
freshRunTests();
progressTests();
ownerFillsUnnamedAccount();
thresholdOwnsMinting();
mentionTests();
plainWordReadsNeedAVerb();
disabledReadIsIgnored();
console.log("Pending tasks tests passed.");
