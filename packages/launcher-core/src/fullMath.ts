import { maxUint256 } from "viem";

export const Q96 = 1n << 96n;
export const Q192 = 1n << 192n;

/**
 * floor(a * b / denominator) with an unbounded intermediate product.
 * Mirrors FullMath.mulDiv: fails when the quotient does not fit 256 bits.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
    if (denominator === 0n) {
        throw new Error("Division by zero");
    }
    const result = (a * b) / denominator;
    if (result > maxUint256) {
        throw new Error(`mulDiv result overflows uint256: ${result}`);
    }
    return result;
}

/** Integer square root, rounded down. */
export function sqrt(x: bigint): bigint {
    if (x < 0n) {
        throw new Error(`Square root of negative number: ${x}`);
    }
    if (x < 2n) {
        return x;
    }
    let y = x;
    let z = (x + 1n) >> 1n;
    while (z < y) {
        y = z;
        z = (x / z + z) >> 1n;
    }
    return y;
}
