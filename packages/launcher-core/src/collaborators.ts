import type { Address, AuctionConfig, Hex, PoolKey } from "./types";

/**
 * A deployed clearing auction. `checkpoint` must run before `currencyRaised` and
 * `clearingPrice` report final values.
 */
export interface AuctionLike {
    readonly address: Address;
    checkpoint(): Promise<void>;
    currencyRaised(): Promise<bigint>;
    clearingPrice(): Promise<bigint>;
    sweepCurrency(): Promise<void>;
    sweepUnsoldTokens(): Promise<void>;
}

export interface AuctionFactoryLike {
    createAuction(args: {
        token: Address;
        amount: bigint;
        config: AuctionConfig;
        fundsRecipient: Address;
        salt: Hex;
    }): Promise<AuctionLike>;
}

export interface PositionManagerLike {
    readonly address: Address;
    /** Rejects when the pool already exists or the price is out of range. */
    initializePool(poolKey: PoolKey, sqrtPriceX96: bigint): Promise<void>;
    modifyLiquidities(unlockData: Hex, deadline: bigint, value: bigint): Promise<void>;
}

/**
 * Holdings of the launcher. The zero address stands for the native currency.
 */
export interface TreasuryLike {
    readonly address: Address;
    balanceOf(asset: Address): Promise<bigint>;
    transfer(asset: Address, to: Address, amount: bigint): Promise<void>;
}

export interface ChainLike {
    getBlockNumber(): Promise<bigint>;
    getBlockTimestamp(): Promise<bigint>;
}
