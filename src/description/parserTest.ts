import assert from "node:assert/strict";
import {
    applyExtractedParams,
    extractAddresses,
    parseDescription,
    resolveMintAmount,
} from "./parser.js";
import { compareAmounts, parseAmount } from "./amount.js";

const TARGET = `0xABCDEF${"0".repeat(30)}1234`;
const OTHER = `0x${"AB".repeat(20)}`;

function runParserTests(): void {
    const mintIfLow = parseDescription(`mint 5000000 tokens to ${TARGET} if balance less than 5`);
    assert.deepEqual(mintIfLow.addresses, [TARGET]);
    assert.deepEqual(mintIfLow.amounts, [5, 5000000], "threshold tier comes before the mint tier");
    assert.equal(mintIfLow.threshold, 5);
    assert.equal(mintIfLow.mintAmount, 5000000);
    assert.deepEqual(mintIfLow.behaviors, ["balance", "mint"]);
    assert.deepEqual(mintIfLow.conditions, ["balance less than 5"]);

    assert.deepEqual(
        extractAddresses(`send to ${OTHER} and ${OTHER.toLowerCase()}`),
        [OTHER],
        "addresses are deduplicated case-insensitively",
    );
    assert.deepEqual(
        extractAddresses(`0x${"a".repeat(41)}`),
        [],
        "a longer hex run is not an address",
    );

    const batched = parseDescription("create 1,000,000 tokens 500 at a time");
    assert.deepEqual(batched.amounts, [1000000, 500]);
    assert.equal(batched.mintAmount, 1000000);
    assert.equal(batched.threshold, undefined);
    assert.deepEqual(batched.behaviors, ["mint"]);

    const spanish = parseDescription("revisar el saldo y acuñar 100 si el saldo es menor que 10");
    assert.deepEqual(spanish.behaviors, ["check", "balance", "mint"]);
    assert.equal(spanish.threshold, 10);
    assert.equal(spanish.mintAmount, 100);
    assert.deepEqual(spanish.amounts, [10, 100]);
    assert.deepEqual(spanish.conditions, ["el saldo es menor que 10"]);

    const clauses = parseDescription("When balance drops below 100 then mint 50. Repeat daily.");
    assert.deepEqual(clauses.conditions, ["balance drops below 100"]);
    assert.deepEqual(clauses.behaviors, ["balance", "mint", "repeat"]);
    assert.deepEqual(clauses.amounts, [100, 50]);

    const overlaid = applyExtractedParams(mintIfLow, { to: OTHER, mintAmount: 7 });
    assert.deepEqual(overlaid.addresses, [OTHER, TARGET]);
    assert.equal(overlaid.mintAmount, 7);
    assert.equal(overlaid.threshold, 5);
    assert.equal(applyExtractedParams(mintIfLow, undefined), mintIfLow);

    assert.equal(resolveMintAmount(parseDescription("check balance"), 5000000), 5000000);
    assert.equal(resolveMintAmount(mintIfLow, 1), 5000000);
}

function wideAmountTests(): void {
    const wei = parseDescription(`mint 1000000000000000000001 tokens to ${TARGET}`);
    assert.equal(wei.mintAmount, 1000000000000000000001n);
    assert.deepEqual(wei.amounts, [1000000000000000000001n]);

    assert.equal(parseDescription("mint 9007199254740993").mintAmount, 9007199254740993n);
    assert.equal(parseDescription("mint 9007199254740991").mintAmount, 9007199254740991);
    assert.equal(parseDescription("create 1,000,000,000,000,000,000,000").mintAmount, 10n ** 21n);
    assert.equal(
        parseDescription("mint 1 if balance less than 20000000000000000000").threshold,
        20000000000000000000n,
    );

    assert.equal(parseAmount("0.5"), 0.5);
    assert.equal(parseAmount("1e21"), undefined);
    assert.equal(compareAmounts(9007199254740993n, 9007199254740992), 1);
    assert.equal(compareAmounts(10n, 10), 0);
    assert.equal(compareAmounts(0.5, 1), -1);
}

runParserTests();
wideAmountTests();
console.log("Description parser tests passed.");
