import { parseEther, zeroAddress } from "viem";
import type { AuctionFactoryLike, ChainLike, PositionManagerLike, TreasuryLike } from "./collaborators";
import { Launcher, type LauncherEvent } from "./launcher";
import { type AuctionStore, createMemoryAuctionStore } from "./store";
import type { Address } from "./types";

export * from "./actions";
export * from "./collaborators";
export * from "./errors";
export * from "./fullMath";
export * from "./launcher";
export * from "./liquidityAmounts";
export * from "./poolKey";
export * from "./store";
export * from "./strategyPlanner";
export * from "./tickMath";
export * from "./tokenPricing";
export * from "./types";
export * from "./validation";

export const DEFAULT_DEPLOY_FEE = parseEther("0.001");
export const DEFAULT_POOL_FEE = 100;
export const DEFAULT_POOL_TICK_SPACING = 1;
export const DEAD_ADDRESS: Address = "0x000000000000000000000000000000000000dEaD";

export type CreateLauncherOptions = {
    factory?: AuctionFactoryLike;
    positionManager: PositionManagerLike;
    treasury: TreasuryLike;
    chain: ChainLike;
    store?: AuctionStore;
    deployFee?: bigint;
    poolFee?: number;
    poolTickSpacing?: number;
    positionRecipient?: Address;
    hooks?: Address;
    oneSidedPositions?: boolean;
    sweepRecipient?: Address;
    deadlineSlack?: bigint;
    onEvent?: (event: LauncherEvent) => void;
};

export function createLauncher(options: CreateLauncherOptions): Launcher {
    const {
        store = createMemoryAuctionStore(),
        deployFee = DEFAULT_DEPLOY_FEE,
        poolFee = DEFAULT_POOL_FEE,
        poolTickSpacing = DEFAULT_POOL_TICK_SPACING,
        positionRecipient = DEAD_ADDRESS,
        hooks = zeroAddress,
        oneSidedPositions = true,
        sweepRecipient = options.treasury.address,
        deadlineSlack = 0n,
        onEvent,
    } = options;

    const launcher = new Launcher({
        factory: options.factory,
        positionManager: options.positionManager,
        treasury: options.treasury,
        chain: options.chain,
        store,
        deployFee,
        poolFee,
        poolTickSpacing,
        positionRecipient,
        hooks,
        oneSidedPositions,
        sweepRecipient,
        deadlineSlack,
    });

    if (onEvent) {
        launcher.onEvent(onEvent);
    }

    return launcher;
}
