import { isAddressEqual, maxUint128, zeroAddress } from "viem";
import { encodeUnlockData } from "./actions";
import type { AuctionFactoryLike, AuctionLike, ChainLike, PositionManagerLike, TreasuryLike } from "./collaborators";
import { LauncherError, type LauncherErrorDetails } from "./errors";
import { currencyIsCurrency0, toPoolId, toPoolKey } from "./poolKey";
import { type AuctionInfo, type AuctionStore, hasReachedStage, type MigrationStage } from "./store";
import { buildMigrationPlan, type MigrationPlan } from "./strategyPlanner";
import { prepareMigrationData } from "./tokenPricing";
import type { Address, AuctionConfig, Hex, MigrationData, PoolKey } from "./types";
import { validateAuctionConfig } from "./validation";

export type LauncherEvent =
    | {
          type: "AuctionCreated";
          auction: Address;
          token: Address;
          creator: Address;
          auctionConfig: AuctionConfig;
      }
    | {
          type: "Migrated";
          poolKey: PoolKey;
          sqrtPriceX96: bigint;
      };

type Listener = (event: LauncherEvent) => void;

type Operation = LauncherErrorDetails["OperationInProgress"]["operation"];

export type LauncherOptions = {
    // only needed to launch auctions
    factory?: AuctionFactoryLike;
    positionManager: PositionManagerLike;
    treasury: TreasuryLike;
    chain: ChainLike;
    store: AuctionStore;
    deployFee: bigint;
    poolFee: number;
    poolTickSpacing: number;
    positionRecipient: Address;
    hooks: Address;
    oneSidedPositions: boolean;
    sweepRecipient: Address;
    // seconds added to the block timestamp when the plan is submitted in a later block
    deadlineSlack: bigint;
};

export type LaunchAuctionArgs = {
    token: Address;
    creator: Address;
    reserveSupply: bigint;
    auctionConfig: AuctionConfig;
    salt: Hex;
    // fee paid alongside the launch; compared with `deployFee` and counted, never transferred here
    value: bigint;
};

export type MigrationResult = {
    poolKey: PoolKey;
    poolId: Hex;
    sqrtPriceX96: bigint;
    data: MigrationData;
    plan: MigrationPlan;
    unlockData: Hex;
};

export class Launcher {
    private readonly opts: LauncherOptions;
    private readonly listeners: Set<Listener> = new Set();
    // lowercased token -> operation holding it
    private readonly inFlight = new Map<string, Operation>();
    private fees = 0n;

    constructor(opts: LauncherOptions) {
        this.opts = opts;
    }

    get deployFee(): bigint {
        return this.opts.deployFee;
    }

    /**
     * Sum of the `value` of every successful launch. An accounting figure: the fee itself is
     * collected by whoever submits the launch, not moved through the treasury.
     */
    collectedFees(): bigint {
        return this.fees;
    }

    auctionInfo(token: Address): AuctionInfo | undefined {
        return this.opts.store.get(token);
    }

    migrationStage(token: Address): MigrationStage {
        return this.opts.store.migrationStage(token);
    }

    onEvent(cb: Listener): () => void {
        this.listeners.add(cb);
        return () => this.listeners.delete(cb);
    }

    async launchAuction(args: LaunchAuctionArgs): Promise<AuctionLike> {
        const { factory } = this.opts;
        if (!factory) {
            throw new Error("No auction factory configured");
        }
        return this.exclusive(args.token, "launch", () => this.launchWith(factory, args));
    }

    private async launchWith(factory: AuctionFactoryLike, args: LaunchAuctionArgs): Promise<AuctionLike> {
        const { token, auctionConfig } = args;
        if (args.value !== this.opts.deployFee) {
            throw new LauncherError("InvalidFee", { expected: this.opts.deployFee, actual: args.value });
        }
        const validation = validateAuctionConfig(token, auctionConfig);
        if (!validation.valid) {
            throw new LauncherError("InvalidAuctionConfig", { errors: validation.errors });
        }
        if (args.reserveSupply > maxUint128) {
            throw new LauncherError("AmountOverflow", { amount: args.reserveSupply, max: maxUint128 });
        }
        const existing = this.opts.store.get(token);
        if (existing) {
            throw new LauncherError("AuctionAlreadyExists", { token, auction: existing.auction.address });
        }

        const required = auctionConfig.auctionSupply + args.reserveSupply;
        const held = await this.opts.treasury.balanceOf(token);
        if (held < required) {
            throw new LauncherError("InsufficientToken", { token, required, actual: held });
        }

        const auction = await factory.createAuction({
            token,
            amount: auctionConfig.auctionSupply,
            config: auctionConfig,
            fundsRecipient: this.opts.sweepRecipient,
            salt: args.salt,
        });
        await this.opts.treasury.transfer(token, auction.address, auctionConfig.auctionSupply);

        this.opts.store.set({
            auction,
            token,
            raisedCurrency: auctionConfig.raisedCurrency,
            reserveSupply: args.reserveSupply,
            endBlock: auctionConfig.endBlock,
        });
        this.fees += args.value;

        this.emit({ type: "AuctionCreated", auction: auction.address, token, creator: args.creator, auctionConfig });
        return auction;
    }

    /**
     * Records an auction launched elsewhere so that it can be migrated here.
     */
    registerAuction(info: AuctionInfo): void {
        const operation = this.inFlight.get(info.token.toLowerCase());
        if (operation) {
            throw new LauncherError("OperationInProgress", { token: info.token, operation });
        }
        if (info.reserveSupply > maxUint128) {
            throw new LauncherError("AmountOverflow", { amount: info.reserveSupply, max: maxUint128 });
        }
        const existing = this.opts.store.get(info.token);
        if (existing) {
            throw new LauncherError("AuctionAlreadyExists", { token: info.token, auction: existing.auction.address });
        }
        this.opts.store.set(info);
    }

    async sweepAuction(token: Address): Promise<void> {
        const info = this.requireAuction(token);
        await info.auction.sweepCurrency();
        await info.auction.sweepUnsoldTokens();
    }

    /**
     * Seeds the pool for `token` from its finished auction.
     *
     * The writes (pool initialization, the two transfers, the liquidity call) are separate
     * transactions. Each one that lands is recorded as a `MigrationStage`, and a call after a
     * failure skips what has already been done, re-deriving the same plan from the final
     * auction state.
     */
    async migrate(token: Address): Promise<MigrationResult> {
        return this.exclusive(token, "migrate", () => this.migrateOnce(token));
    }

    private async migrateOnce(token: Address): Promise<MigrationResult> {
        const { store, treasury, positionManager, chain } = this.opts;
        const info = this.requireAuction(token);
        let stage = store.migrationStage(token);
        if (stage === "Migrated") {
            throw new LauncherError("AlreadyMigrated", { token });
        }
        const advance = (next: MigrationStage) => {
            store.setMigrationStage(token, next);
            stage = next;
        };

        const currentBlock = await chain.getBlockNumber();
        const allowedBlock = info.endBlock + 1n;
        if (currentBlock < allowedBlock) {
            throw new LauncherError("MigrationNotAllowed", { currentBlock, allowedBlock });
        }

        await info.auction.checkpoint();
        const currencyRaised = await info.auction.currencyRaised();
        if (currencyRaised === 0n) {
            throw new LauncherError("NoCurrencyRaised", { token });
        }
        if (currencyRaised > maxUint128) {
            throw new LauncherError("CurrencyAmountTooHigh", { amount: currencyRaised, max: maxUint128 });
        }

        // native currency leaves with the liquidity call, so it is held until the end
        const nativeCurrency = isAddressEqual(info.raisedCurrency, zeroAddress);
        if (nativeCurrency || !hasReachedStage(stage, "Funded")) {
            const currencyHeld = await treasury.balanceOf(info.raisedCurrency);
            if (currencyHeld < currencyRaised) {
                throw new LauncherError("InsufficientCurrency", {
                    currency: info.raisedCurrency,
                    required: currencyRaised,
                    actual: currencyHeld,
                });
            }
        }
        if (!hasReachedStage(stage, "TokenFunded")) {
            const tokenHeld = await treasury.balanceOf(token);
            if (tokenHeld < info.reserveSupply) {
                throw new LauncherError("InsufficientToken", { token, required: info.reserveSupply, actual: tokenHeld });
            }
        }

        const clearingPrice = await info.auction.clearingPrice();
        const data = prepareMigrationData({
            clearingPrice,
            currencyRaised,
            reserveSupply: info.reserveSupply,
            currencyIsCurrency0: currencyIsCurrency0(info.raisedCurrency, token),
            poolTickSpacing: this.opts.poolTickSpacing,
        });

        const poolKey = toPoolKey({
            currency: info.raisedCurrency,
            token,
            fee: this.opts.poolFee,
            tickSpacing: this.opts.poolTickSpacing,
            hooks: this.opts.hooks,
        });
        const poolId = toPoolId(poolKey);

        const plan = buildMigrationPlan({
            base: {
                currency: info.raisedCurrency,
                token,
                poolFee: this.opts.poolFee,
                poolTickSpacing: this.opts.poolTickSpacing,
                hooks: this.opts.hooks,
                initialSqrtPriceX96: data.sqrtPriceX96,
                liquidity: data.liquidity,
                positionRecipient: this.opts.positionRecipient,
            },
            data,
            reserveSupply: info.reserveSupply,
            recipient: treasury.address,
            oneSidedPositions: this.opts.oneSidedPositions,
        });
        const unlockData = encodeUnlockData(plan.steps);

        if (stage === "Pending") {
            try {
                await positionManager.initializePool(poolKey, data.sqrtPriceX96);
            } catch (err) {
                throw new LauncherError("PoolInitializationFailed", { poolId }, { cause: err });
            }
            advance("PoolInitialized");
        }

        try {
            if (!hasReachedStage(stage, "TokenFunded")) {
                if (plan.tokenAmount > 0n) {
                    await treasury.transfer(token, positionManager.address, plan.tokenAmount);
                }
                advance("TokenFunded");
            }
            if (!hasReachedStage(stage, "Funded")) {
                if (!nativeCurrency && plan.currencyAmount > 0n) {
                    await treasury.transfer(info.raisedCurrency, positionManager.address, plan.currencyAmount);
                }
                advance("Funded");
            }
            const deadline = (await chain.getBlockTimestamp()) + this.opts.deadlineSlack;
            await positionManager.modifyLiquidities(unlockData, deadline, nativeCurrency ? plan.currencyAmount : 0n);
        } catch (err) {
            throw new LauncherError("PlanExecutionFailed", { poolId }, { cause: err });
        }

        advance("Migrated");
        this.emit({ type: "Migrated", poolKey, sqrtPriceX96: data.sqrtPriceX96 });

        return { poolKey, poolId, sqrtPriceX96: data.sqrtPriceX96, data, plan, unlockData };
    }

    // one launch or migration per token at a time; the claim is taken before the first await
    private async exclusive<T>(token: Address, operation: Operation, run: () => Promise<T>): Promise<T> {
        const key = token.toLowerCase();
        const current = this.inFlight.get(key);
        if (current) {
            throw new LauncherError("OperationInProgress", { token, operation: current });
        }
        this.inFlight.set(key, operation);
        try {
            return await run();
        } finally {
            this.inFlight.delete(key);
        }
    }

    private requireAuction(token: Address): AuctionInfo {
        const info = this.opts.store.get(token);
        if (!info) {
            throw new LauncherError("AuctionNotFound", { token });
        }
        return info;
    }

    private emit(event: LauncherEvent) {
        for (const cb of this.listeners) {
            try {
                cb(event);
            } catch {
                // ignore listener errors
            }
        }
    }
}
