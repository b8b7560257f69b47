import type { Address, AuctionConfig } from "./types";

export type ValidationError = {
    type:
        | "invalid_block_order"
        | "zero_floor_price"
        | "zero_auction_supply"
        | "invalid_tick_spacing"
        | "currency_is_token";
    message: string;
    details?: Record<string, unknown>;
};

export type ValidationResult = {
    valid: boolean;
    errors: ValidationError[];
};

export function validateBlockOrder(config: AuctionConfig): ValidationResult {
    const errors: ValidationError[] = [];

    if (config.startBlock >= config.endBlock) {
        errors.push({
            type: "invalid_block_order",
            message: `Auction must start before it ends`,
            details: { startBlock: config.startBlock.toString(), endBlock: config.endBlock.toString() },
        });
    }
    if (config.endBlock > config.claimBlock) {
        errors.push({
            type: "invalid_block_order",
            message: `Claim block must not precede the end block`,
            details: { endBlock: config.endBlock.toString(), claimBlock: config.claimBlock.toString() },
        });
    }

    return { valid: errors.length === 0, errors };
}

export function validateAuctionAmounts(config: AuctionConfig): ValidationResult {
    const errors: ValidationError[] = [];

    if (config.floorPrice === 0n) {
        errors.push({ type: "zero_floor_price", message: `Floor price must be nonzero` });
    }
    if (config.auctionSupply === 0n) {
        errors.push({ type: "zero_auction_supply", message: `Auction supply must be nonzero` });
    }
    if (!Number.isInteger(config.tickSpacing) || config.tickSpacing <= 0) {
        errors.push({
            type: "invalid_tick_spacing",
            message: `Tick spacing must be a positive integer`,
            details: { tickSpacing: config.tickSpacing },
        });
    }

    return { valid: errors.length === 0, errors };
}

export function validateAuctionConfig(token: Address, config: AuctionConfig): ValidationResult {
    const allErrors: ValidationError[] = [];

    allErrors.push(...validateBlockOrder(config).errors);
    allErrors.push(...validateAuctionAmounts(config).errors);

    if (config.raisedCurrency.toLowerCase() === token.toLowerCase()) {
        allErrors.push({
            type: "currency_is_token",
            message: `Raised currency cannot be the auctioned token`,
            details: { token },
        });
    }

    return { valid: allErrors.length === 0, errors: allErrors };
}
