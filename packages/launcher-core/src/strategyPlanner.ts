import { CONTRACT_BALANCE, type PlanStep } from "./actions";
import { getLiquidityForAmount0, getLiquidityForAmount1 } from "./liquidityAmounts";
import { currencyIsCurrency0, toPoolKey } from "./poolKey";
import {
    getSqrtPriceAtTick,
    getTickAtSqrtPrice,
    MIN_TICK,
    maxLiquidityPerTick,
    maxUsableTick,
    minUsableTick,
    tickFloor,
} from "./tickMath";
import type { Address, MigrationData, PoolKey } from "./types";

/** Full-range mint, two settles and the final take. */
export const FULL_RANGE_SIZE = 4;

export type PlanStage = "Start" | "FullRangePlanned" | "OneSidedPlanned" | "PlanComplete";

export type BasePositionParams = {
    currency: Address;
    token: Address;
    poolFee: number;
    poolTickSpacing: number;
    hooks: Address;
    initialSqrtPriceX96: bigint;
    liquidity: bigint;
    positionRecipient: Address;
};

export type OneSidedPosition = {
    inToken: boolean;
    amount: bigint;
    tickLower: number;
    tickUpper: number;
    liquidity: bigint;
};

export type MigrationPlan = {
    poolKey: PoolKey;
    steps: PlanStep[];
    oneSided?: OneSidedPosition;
    // totals the position manager must receive before execution
    tokenAmount: bigint;
    currencyAmount: bigint;
};

/**
 * Builds the ordered action list for one migration:
 * Start -> FullRangePlanned -> (OneSidedPlanned) -> PlanComplete.
 */
export class StrategyPlanner {
    private readonly base: BasePositionParams;
    private readonly poolKey: PoolKey;
    private readonly currencyIsCurrency0: boolean;
    private readonly steps: PlanStep[] = [];
    private oneSided?: OneSidedPosition;
    private tokenAmount = 0n;
    private currencyAmount = 0n;
    private _stage: PlanStage = "Start";

    constructor(base: BasePositionParams) {
        this.base = base;
        this.currencyIsCurrency0 = currencyIsCurrency0(base.currency, base.token);
        this.poolKey = toPoolKey({
            currency: base.currency,
            token: base.token,
            fee: base.poolFee,
            tickSpacing: base.poolTickSpacing,
            hooks: base.hooks,
        });
    }

    get stage(): PlanStage {
        return this._stage;
    }

    planFullRangePosition(amounts: { tokenAmount: bigint; currencyAmount: bigint }): this {
        this.expectStage("Start");

        const { poolTickSpacing } = this.base;
        this.steps.push(
            {
                action: "MINT_POSITION",
                params: {
                    poolKey: this.poolKey,
                    tickLower: minUsableTick(poolTickSpacing),
                    tickUpper: maxUsableTick(poolTickSpacing),
                    liquidity: this.base.liquidity,
                    amount0Max: this.currencyIsCurrency0 ? amounts.currencyAmount : amounts.tokenAmount,
                    amount1Max: this.currencyIsCurrency0 ? amounts.tokenAmount : amounts.currencyAmount,
                    owner: this.base.positionRecipient,
                    hookData: "0x",
                },
            },
            {
                action: "SETTLE",
                params: { currency: this.poolKey.currency0, amount: CONTRACT_BALANCE, payerIsUser: false },
            },
            {
                action: "SETTLE",
                params: { currency: this.poolKey.currency1, amount: CONTRACT_BALANCE, payerIsUser: false },
            },
        );
        this.tokenAmount += amounts.tokenAmount;
        this.currencyAmount += amounts.currencyAmount;
        this._stage = "FullRangePlanned";
        return this;
    }

    /**
     * Adds a single-asset position for a surplus of token (`inToken`) or currency.
     * Returns false, leaving the plan unchanged, when the tick window is no wider than one
     * spacing or the liquidity is zero or would push the per-tick total over the ceiling.
     */
    planOneSidedPosition(args: { amount: bigint; inToken: boolean }): boolean {
        this.expectStage("FullRangePlanned");
        if (args.amount <= 0n) {
            return false;
        }

        // asset1 liquidity sits below the price, asset0 liquidity above it
        const inCurrency1 = args.inToken === this.currencyIsCurrency0;
        const [tickLower, tickUpper] = this.oneSidedTickBounds(inCurrency1);
        if (tickUpper - tickLower <= this.base.poolTickSpacing) {
            return false;
        }

        const sqrtPriceLower = getSqrtPriceAtTick(tickLower);
        const sqrtPriceUpper = getSqrtPriceAtTick(tickUpper);
        const liquidity = inCurrency1
            ? getLiquidityForAmount1(sqrtPriceLower, sqrtPriceUpper, args.amount)
            : getLiquidityForAmount0(sqrtPriceLower, sqrtPriceUpper, args.amount);
        if (liquidity === 0n || this.base.liquidity + liquidity > maxLiquidityPerTick(this.base.poolTickSpacing)) {
            return false;
        }

        this.steps.push({
            action: "MINT_POSITION",
            params: {
                poolKey: this.poolKey,
                tickLower,
                tickUpper,
                liquidity,
                amount0Max: inCurrency1 ? 0n : args.amount,
                amount1Max: inCurrency1 ? args.amount : 0n,
                owner: this.base.positionRecipient,
                hookData: "0x",
            },
        });
        if (args.inToken) {
            this.tokenAmount += args.amount;
        } else {
            this.currencyAmount += args.amount;
        }
        this.oneSided = { inToken: args.inToken, amount: args.amount, tickLower, tickUpper, liquidity };
        this._stage = "OneSidedPlanned";
        return true;
    }

    planFinalTakePair(recipient: Address): MigrationPlan {
        if (this._stage !== "FullRangePlanned" && this._stage !== "OneSidedPlanned") {
            throw new Error(`Cannot take pair from stage ${this._stage}`);
        }

        this.steps.push({
            action: "TAKE_PAIR",
            params: { currency0: this.poolKey.currency0, currency1: this.poolKey.currency1, recipient },
        });
        this._stage = "PlanComplete";

        return {
            poolKey: this.poolKey,
            steps: [...this.steps],
            oneSided: this.oneSided,
            tokenAmount: this.tokenAmount,
            currencyAmount: this.currencyAmount,
        };
    }

    private oneSidedTickBounds(inCurrency1: boolean): [number, number] {
        const { initialSqrtPriceX96, poolTickSpacing } = this.base;
        const floor = tickFloor(getTickAtSqrtPrice(initialSqrtPriceX96), poolTickSpacing);

        if (inCurrency1) {
            return [minUsableTick(poolTickSpacing), floor];
        }
        // first grid tick at or above the exact price
        const ceil =
            floor >= MIN_TICK && getSqrtPriceAtTick(floor) === initialSqrtPriceX96 ? floor : floor + poolTickSpacing;
        return [ceil, maxUsableTick(poolTickSpacing)];
    }

    private expectStage(stage: PlanStage) {
        if (this._stage !== stage) {
            throw new Error(`Expected planner stage ${stage}, found ${this._stage}`);
        }
    }
}

/**
 * Full-range position sized by `data`, an optional one-sided position for whichever
 * asset has a surplus, then a sweep of any residue to `recipient`.
 */
export function buildMigrationPlan(args: {
    base: BasePositionParams;
    data: MigrationData;
    reserveSupply: bigint;
    recipient: Address;
    oneSidedPositions: boolean;
}): MigrationPlan {
    const planner = new StrategyPlanner(args.base).planFullRangePosition({
        tokenAmount: args.data.initialTokenAmount,
        currencyAmount: args.data.initialCurrencyAmount,
    });

    if (args.oneSidedPositions) {
        const tokenSurplus = args.reserveSupply - args.data.initialTokenAmount;
        if (tokenSurplus > 0n) {
            planner.planOneSidedPosition({ amount: tokenSurplus, inToken: true });
        }
        // the allocator never leaves both surpluses, but only one one-sided mint fits the plan
        if (args.data.leftoverCurrency > 0n && planner.stage === "FullRangePlanned") {
            planner.planOneSidedPosition({ amount: args.data.leftoverCurrency, inToken: false });
        }
    }

    return planner.planFinalTakePair(args.recipient);
}
