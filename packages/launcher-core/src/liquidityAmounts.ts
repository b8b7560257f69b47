import { maxUint128 } from "viem";
import { LauncherError } from "./errors";
import { mulDiv, Q96 } from "./fullMath";

function sortSqrtPrices(sqrtPriceAX96: bigint, sqrtPriceBX96: bigint): [bigint, bigint] {
    return sqrtPriceAX96 > sqrtPriceBX96 ? [sqrtPriceBX96, sqrtPriceAX96] : [sqrtPriceAX96, sqrtPriceBX96];
}

/**
 * Liquidity received for `amount0` of asset0 across [A, B]. Not capped to 128 bits.
 */
export function getLiquidityForAmount0(sqrtPriceAX96: bigint, sqrtPriceBX96: bigint, amount0: bigint): bigint {
    const [lower, upper] = sortSqrtPrices(sqrtPriceAX96, sqrtPriceBX96);
    const intermediate = mulDiv(lower, upper, Q96);
    return mulDiv(amount0, intermediate, upper - lower);
}

/**
 * Liquidity received for `amount1` of asset1 across [A, B]. Not capped to 128 bits.
 */
export function getLiquidityForAmount1(sqrtPriceAX96: bigint, sqrtPriceBX96: bigint, amount1: bigint): bigint {
    const [lower, upper] = sortSqrtPrices(sqrtPriceAX96, sqrtPriceBX96);
    return mulDiv(amount1, Q96, upper - lower);
}

/**
 * Maximum liquidity that both amounts can fund at the current price.
 * `amount0` and `amount1` must already be in pool order.
 */
export function getLiquidityForAmounts(
    sqrtPriceX96: bigint,
    sqrtPriceAX96: bigint,
    sqrtPriceBX96: bigint,
    amount0: bigint,
    amount1: bigint,
): bigint {
    const [lower, upper] = sortSqrtPrices(sqrtPriceAX96, sqrtPriceBX96);

    let liquidity: bigint;
    if (sqrtPriceX96 <= lower) {
        liquidity = getLiquidityForAmount0(lower, upper, amount0);
    } else if (sqrtPriceX96 < upper) {
        const liquidity0 = getLiquidityForAmount0(sqrtPriceX96, upper, amount0);
        const liquidity1 = getLiquidityForAmount1(lower, sqrtPriceX96, amount1);
        liquidity = liquidity0 < liquidity1 ? liquidity0 : liquidity1;
    } else {
        liquidity = getLiquidityForAmount1(lower, upper, amount1);
    }

    if (liquidity > maxUint128) {
        throw new LauncherError("LiquidityOverflow", { liquidity, max: maxUint128 });
    }
    return liquidity;
}
