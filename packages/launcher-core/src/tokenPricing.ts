import { maxUint128, maxUint160 } from "viem";
import { LauncherError } from "./errors";
import { mulDiv, Q192, sqrt } from "./fullMath";
import { getLiquidityForAmounts } from "./liquidityAmounts";
import {
    getSqrtPriceAtTick,
    MAX_SQRT_PRICE,
    maxUsableTick,
    MIN_SQRT_PRICE,
    minUsableTick,
} from "./tickMath";
import type { MigrationData } from "./types";

export type TokenAmounts = {
    tokenAmount: bigint;
    leftoverCurrency: bigint;
    correspondingCurrencyAmount: bigint;
};

/**
 * Q96 clearing price (currency per token) to the pool price as Q192.
 *
 * The pool quotes currency1 per currency0, so the price is inverted when the currency
 * sorts first. Amounts derived from it round down: the pool never receives more than was
 * set aside.
 */
export function convertToPriceX192(price: bigint, currencyIsCurrency0: boolean): bigint {
    if (price === 0n) {
        throw new LauncherError("PriceIsZero", { price });
    }

    let poolPriceX96 = price;
    if (currencyIsCurrency0) {
        // pool price is token per currency
        poolPriceX96 = Q192 / price;
    }
    if (poolPriceX96 > maxUint160) {
        throw new LauncherError("PriceTooHigh", { price: poolPriceX96, maxPrice: maxUint160 });
    }

    return poolPriceX96 << 96n;
}

export function convertToSqrtPriceX96(priceX192: bigint): bigint {
    const sqrtPriceX96 = sqrt(priceX192);
    if (sqrtPriceX96 < MIN_SQRT_PRICE || sqrtPriceX96 > MAX_SQRT_PRICE) {
        throw new LauncherError("SqrtPriceOutOfBounds", {
            sqrtPriceX96,
            minSqrtPrice: MIN_SQRT_PRICE,
            maxSqrtPrice: MAX_SQRT_PRICE,
        });
    }
    return sqrtPriceX96;
}

/**
 * Splits the raised currency into the part paired with reserve tokens at `priceX192`
 * and the leftover that the reserve cannot absorb.
 */
export function calculateAmounts(
    priceX192: bigint,
    currencyAmount: bigint,
    currencyIsCurrency0: boolean,
    reserveSupply: bigint,
): TokenAmounts {
    if (priceX192 === 0n) {
        throw new LauncherError("PriceIsZero", { price: priceX192 });
    }

    const tokenAmount = currencyIsCurrency0
        ? mulDiv(priceX192, currencyAmount, Q192)
        : mulDiv(currencyAmount, Q192, priceX192);

    if (tokenAmount <= reserveSupply) {
        return { tokenAmount, leftoverCurrency: 0n, correspondingCurrencyAmount: currencyAmount };
    }

    const correspondingCurrencyAmount = currencyIsCurrency0
        ? mulDiv(reserveSupply, Q192, priceX192)
        : mulDiv(reserveSupply, priceX192, Q192);
    if (correspondingCurrencyAmount > maxUint128) {
        throw new LauncherError("AmountOverflow", { amount: correspondingCurrencyAmount, max: maxUint128 });
    }

    return {
        tokenAmount: reserveSupply,
        leftoverCurrency: currencyAmount - correspondingCurrencyAmount,
        correspondingCurrencyAmount,
    };
}

export function prepareMigrationData(args: {
    clearingPrice: bigint;
    currencyRaised: bigint;
    reserveSupply: bigint;
    currencyIsCurrency0: boolean;
    poolTickSpacing: number;
}): MigrationData {
    const priceX192 = convertToPriceX192(args.clearingPrice, args.currencyIsCurrency0);
    const sqrtPriceX96 = convertToSqrtPriceX96(priceX192);

    const { tokenAmount, leftoverCurrency, correspondingCurrencyAmount } = calculateAmounts(
        priceX192,
        args.currencyRaised,
        args.currencyIsCurrency0,
        args.reserveSupply,
    );

    const liquidity = getLiquidityForAmounts(
        sqrtPriceX96,
        getSqrtPriceAtTick(minUsableTick(args.poolTickSpacing)),
        getSqrtPriceAtTick(maxUsableTick(args.poolTickSpacing)),
        args.currencyIsCurrency0 ? correspondingCurrencyAmount : tokenAmount,
        args.currencyIsCurrency0 ? tokenAmount : correspondingCurrencyAmount,
    );

    return {
        sqrtPriceX96,
        initialTokenAmount: tokenAmount,
        initialCurrencyAmount: correspondingCurrencyAmount,
        leftoverCurrency,
        liquidity,
    };
}
