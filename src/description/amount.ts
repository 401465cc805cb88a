/**
 * Token amounts.
 *
 * Integers inside the safe range stay plain numbers; larger integers are
 * carried as bigint so wei-scale values reach a uint256 input intact.
 * Fractions stay numbers.
 */

export type Amount = number | bigint;

const INTEGER_RE = /^-?\d+$/;
const DECIMAL_RE = /^-?\d+\.\d+$/;

/** Amount from a decimal literal; thousands separators are allowed */
export function parseAmount(raw: string): Amount | undefined {
    const cleaned = raw.replace(/,/g, "").trim();
    if (INTEGER_RE.test(cleaned)) {
        const n = Number(cleaned);
        return Number.isSafeInteger(n) ? n : BigInt(cleaned);
    }
    if (DECIMAL_RE.test(cleaned)) return Number(cleaned);
    return undefined;
}

function isWhole(value: Amount): boolean {
    return typeof value === "bigint" || Number.isInteger(value);
}

/** Sign of `a - b`; integers compare exactly */
export function compareAmounts(a: Amount, b: Amount): number {
    if (isWhole(a) && isWhole(b)) {
        const x = BigInt(a);
        const y = BigInt(b);
        return x < y ? -1 : x > y ? 1 : 0;
    }
    const x = Number(a);
    const y = Number(b);
    return x < y ? -1 : x > y ? 1 : 0;
}
