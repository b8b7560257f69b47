import type { Address, Hex } from "./types";
import type { ValidationError } from "./validation";

export type LauncherErrorDetails = {
    PriceIsZero: { price: bigint };
    PriceTooHigh: { price: bigint; maxPrice: bigint };
    SqrtPriceOutOfBounds: { sqrtPriceX96: bigint; minSqrtPrice: bigint; maxSqrtPrice: bigint };
    AmountOverflow: { amount: bigint; max: bigint };
    CurrencyAmountTooHigh: { amount: bigint; max: bigint };
    LiquidityOverflow: { liquidity: bigint; max: bigint };
    NoCurrencyRaised: { token: Address };
    InsufficientCurrency: { currency: Address; required: bigint; actual: bigint };
    InsufficientToken: { token: Address; required: bigint; actual: bigint };
    MigrationNotAllowed: { currentBlock: bigint; allowedBlock: bigint };
    AlreadyMigrated: { token: Address };
    AuctionNotFound: { token: Address };
    AuctionAlreadyExists: { token: Address; auction: Address };
    OperationInProgress: { token: Address; operation: "launch" | "migrate" };
    InvalidFee: { expected: bigint; actual: bigint };
    InvalidAuctionConfig: { errors: ValidationError[] };
    PoolInitializationFailed: { poolId: Hex };
    PlanExecutionFailed: { poolId: Hex };
};

export type LauncherErrorCode = keyof LauncherErrorDetails;

const messages: { [C in LauncherErrorCode]: (details: LauncherErrorDetails[C]) => string } = {
    PriceIsZero: () => "Price is zero",
    PriceTooHigh: (d) => `Price ${d.price} exceeds ${d.maxPrice}`,
    SqrtPriceOutOfBounds: (d) =>
        `Sqrt price ${d.sqrtPriceX96} outside [${d.minSqrtPrice}, ${d.maxSqrtPrice}]`,
    AmountOverflow: (d) => `Amount ${d.amount} exceeds ${d.max}`,
    CurrencyAmountTooHigh: (d) => `Currency raised ${d.amount} exceeds ${d.max}`,
    LiquidityOverflow: (d) => `Liquidity ${d.liquidity} exceeds ${d.max}`,
    NoCurrencyRaised: (d) => `No currency raised for token ${d.token}`,
    InsufficientCurrency: (d) => `Insufficient currency ${d.currency}: required ${d.required}, held ${d.actual}`,
    InsufficientToken: (d) => `Insufficient token ${d.token}: required ${d.required}, held ${d.actual}`,
    MigrationNotAllowed: (d) => `Migration not allowed before block ${d.allowedBlock} (current ${d.currentBlock})`,
    AlreadyMigrated: (d) => `Token ${d.token} has already been migrated`,
    AuctionNotFound: (d) => `No auction launched for token ${d.token}`,
    AuctionAlreadyExists: (d) => `Token ${d.token} already has auction ${d.auction}`,
    OperationInProgress: (d) => `A ${d.operation} for token ${d.token} is already in progress`,
    InvalidFee: (d) => `Invalid fee: expected ${d.expected}, got ${d.actual}`,
    InvalidAuctionConfig: (d) => `Invalid auction config: ${d.errors.map((e) => e.message).join("; ")}`,
    PoolInitializationFailed: (d) => `Failed to initialize pool ${d.poolId}`,
    PlanExecutionFailed: (d) => `Failed to execute liquidity plan for pool ${d.poolId}`,
};

export class LauncherError<C extends LauncherErrorCode = LauncherErrorCode> extends Error {
    public readonly code: C;
    public readonly details: LauncherErrorDetails[C];

    constructor(code: C, details: LauncherErrorDetails[C], opts?: { cause?: unknown }) {
        super(messages[code](details), opts);
        Object.setPrototypeOf(this, new.target.prototype);
        this.name = "LauncherError";
        this.code = code;
        this.details = details;
    }
}

export function isLauncherError<C extends LauncherErrorCode>(err: unknown, code?: C): err is LauncherError<C> {
    return err instanceof LauncherError && (code === undefined || err.code === code);
}
