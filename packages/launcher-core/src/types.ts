import type { Address } from "viem";

export type { Address, Hex } from "viem";

export type AuctionConfig = {
    raisedCurrency: Address;
    tickSpacing: number;
    startBlock: bigint;
    endBlock: bigint;
    claimBlock: bigint;
    floorPrice: bigint; // Q96, currency per token
    requiredCurrencyRaised: bigint;
    auctionSupply: bigint;
};

export type PoolKey = {
    currency0: Address;
    currency1: Address;
    fee: number;
    tickSpacing: number;
    hooks: Address;
};

/**
 * Values derived for one migration attempt. Recomputed on every call, never stored.
 */
export type MigrationData = {
    sqrtPriceX96: bigint;
    initialTokenAmount: bigint;
    initialCurrencyAmount: bigint;
    leftoverCurrency: bigint;
    liquidity: bigint;
};
