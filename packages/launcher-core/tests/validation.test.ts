import { zeroAddress } from "viem";
import { describe, expect, it } from "vitest";
import type { AuctionConfig } from "../src/types";
import { validateAuctionAmounts, validateAuctionConfig, validateBlockOrder } from "../src/validation";

const TOKEN = "0x00000000000000000000000000000000000000aa" as const;

function makeConfig(overrides: Partial<AuctionConfig> = {}): AuctionConfig {
    return {
        raisedCurrency: zeroAddress,
        tickSpacing: 100,
        startBlock: 10n,
        endBlock: 20n,
        claimBlock: 20n,
        floorPrice: 1n << 80n,
        requiredCurrencyRaised: 0n,
        auctionSupply: 1000n,
        ...overrides,
    };
}

describe("validateBlockOrder", () => {
    it("accepts a claim block equal to the end block", () => {
        expect(validateBlockOrder(makeConfig())).toEqual({ valid: true, errors: [] });
    });

    it("rejects an auction that ends before it starts", () => {
        const result = validateBlockOrder(makeConfig({ startBlock: 20n }));
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
            {
                type: "invalid_block_order",
                message: "Auction must start before it ends",
                details: { startBlock: "20", endBlock: "20" },
            },
        ]);
    });

    it("rejects a claim block before the end block", () => {
        const result = validateBlockOrder(makeConfig({ claimBlock: 19n }));
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0].message).toBe("Claim block must not precede the end block");
    });
});

describe("validateAuctionAmounts", () => {
    it("rejects zero floor price and supply", () => {
        const result = validateAuctionAmounts(makeConfig({ floorPrice: 0n, auctionSupply: 0n }));
        expect(result.errors.map((e) => e.type)).toEqual(["zero_floor_price", "zero_auction_supply"]);
    });

    it("rejects non-positive or fractional tick spacing", () => {
        expect(validateAuctionAmounts(makeConfig({ tickSpacing: 0 })).errors[0].type).toBe("invalid_tick_spacing");
        expect(validateAuctionAmounts(makeConfig({ tickSpacing: 1.5 })).valid).toBe(false);
    });
});

describe("validateAuctionConfig", () => {
    it("collects errors from every check", () => {
        const result = validateAuctionConfig(
            TOKEN,
            makeConfig({ raisedCurrency: "0x00000000000000000000000000000000000000AA", auctionSupply: 0n, claimBlock: 1n }),
        );
        expect(result.valid).toBe(false);
        expect(result.errors.map((e) => e.type)).toEqual([
            "invalid_block_order",
            "zero_auction_supply",
            "currency_is_token",
        ]);
    });

    it("accepts a well-formed config", () => {
        expect(validateAuctionConfig(TOKEN, makeConfig()).valid).toBe(true);
    });
});
