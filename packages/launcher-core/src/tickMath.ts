import { maxUint128, maxUint256 } from "viem";

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

/** getSqrtPriceAtTick(MIN_TICK) */
export const MIN_SQRT_PRICE = 4295128739n;
/** getSqrtPriceAtTick(MAX_TICK) */
export const MAX_SQRT_PRICE = 1461446703485210103287273052203988822378723970342n;

// sqrt(1.0001^-2^i) as Q128.128 for each bit of |tick| above the lowest one
const RATIOS: ReadonlyArray<readonly [number, bigint]> = [
    [0x2, 0xfff97272373d413259a46990580e213an],
    [0x4, 0xfff2e50f5f656932ef12357cf3c7fdccn],
    [0x8, 0xffe5caca7e10e4e61c3624eaa0941cd0n],
    [0x10, 0xffcb9843d60f6159c9db58835c926644n],
    [0x20, 0xff973b41fa98c081472e6896dfb254c0n],
    [0x40, 0xff2ea16466c96a3843ec78b326b52861n],
    [0x80, 0xfe5dee046a99a2a811c461f1969c3053n],
    [0x100, 0xfcbe86c7900a88aedcffc83b479aa3a4n],
    [0x200, 0xf987a7253ac413176f2b074cf7815e54n],
    [0x400, 0xf3392b0822b70005940c7a398e4b70f3n],
    [0x800, 0xe7159475a2c29b7443b29c7fa6e889d9n],
    [0x1000, 0xd097f3bdfd2022b8845ad8f792aa5825n],
    [0x2000, 0xa9f746462d870fdf8a65dc1f90e061e5n],
    [0x4000, 0x70d869a156d2a1b890bb3df62baf32f7n],
    [0x8000, 0x31be135f97d08fd981231505542fcfa6n],
    [0x10000, 0x9aa508b5b7a84e1c677de54f3e99bc9n],
    [0x20000, 0x5d6af8dedb81196699c329225ee604n],
    [0x40000, 0x2216e584f5fa1ea926041bedfe98n],
    [0x80000, 0x48a170391f7dc42444e8fa2n],
];

/**
 * Q64.96 sqrt price at the given tick, bit-identical to TickMath.getSqrtPriceAtTick.
 */
export function getSqrtPriceAtTick(tick: number): bigint {
    const absTick = Math.abs(tick);
    if (!Number.isInteger(tick) || absTick > MAX_TICK) {
        throw new RangeError(`Invalid tick ${tick}`);
    }

    let ratio = absTick & 0x1 ? 0xfffcb933bd6fad37aa2d162d1a594001n : 1n << 128n;
    for (const [bit, factor] of RATIOS) {
        if (absTick & bit) {
            ratio = (ratio * factor) >> 128n;
        }
    }
    if (tick > 0) {
        ratio = maxUint256 / ratio;
    }

    // Q128.128 -> Q64.96, rounding up so that getTickAtSqrtPrice(getSqrtPriceAtTick(t)) == t
    return (ratio >> 32n) + (ratio % (1n << 32n) === 0n ? 0n : 1n);
}

/**
 * Greatest tick whose sqrt price is less than or equal to `sqrtPriceX96`.
 */
export function getTickAtSqrtPrice(sqrtPriceX96: bigint): number {
    if (sqrtPriceX96 < MIN_SQRT_PRICE || sqrtPriceX96 >= MAX_SQRT_PRICE) {
        throw new RangeError(`Invalid sqrt price ${sqrtPriceX96}`);
    }

    let low = MIN_TICK;
    let high = MAX_TICK;
    while (low < high) {
        const mid = Math.floor((low + high + 1) / 2);
        if (getSqrtPriceAtTick(mid) <= sqrtPriceX96) {
            low = mid;
        } else {
            high = mid - 1;
        }
    }
    return low;
}

export function minUsableTick(tickSpacing: number): number {
    return Math.trunc(MIN_TICK / tickSpacing) * tickSpacing;
}

export function maxUsableTick(tickSpacing: number): number {
    return Math.trunc(MAX_TICK / tickSpacing) * tickSpacing;
}

/** Rounds toward negative infinity onto the spacing grid. */
export function tickFloor(tick: number, tickSpacing: number): number {
    return Math.floor(tick / tickSpacing) * tickSpacing;
}

/** Per-tick liquidity ceiling the pool enforces for a tick spacing. */
export function maxLiquidityPerTick(tickSpacing: number): bigint {
    const numTicks = (maxUsableTick(tickSpacing) - minUsableTick(tickSpacing)) / tickSpacing + 1;
    return maxUint128 / BigInt(numTicks);
}
