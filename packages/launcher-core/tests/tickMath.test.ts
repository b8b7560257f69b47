import { describe, expect, it } from "vitest";
import { Q96 } from "../src/fullMath";
import {
    getSqrtPriceAtTick,
    getTickAtSqrtPrice,
    MAX_SQRT_PRICE,
    MAX_TICK,
    maxLiquidityPerTick,
    maxUsableTick,
    MIN_SQRT_PRICE,
    MIN_TICK,
    minUsableTick,
    tickFloor,
} from "../src/tickMath";

describe("getSqrtPriceAtTick", () => {
    it("matches the pool's values at the edges and around zero", () => {
        expect(getSqrtPriceAtTick(MIN_TICK)).toBe(MIN_SQRT_PRICE);
        expect(getSqrtPriceAtTick(MAX_TICK)).toBe(MAX_SQRT_PRICE);
        expect(getSqrtPriceAtTick(0)).toBe(Q96);
        expect(getSqrtPriceAtTick(1)).toBe(79232123823359799118286999568n);
        expect(getSqrtPriceAtTick(-1)).toBe(79224201403219477170569942574n);
        expect(getSqrtPriceAtTick(60)).toBe(79466191966197645195421774833n);
        expect(getSqrtPriceAtTick(-60)).toBe(78990846045029531151608375686n);
    });

    it("rejects ticks outside the range", () => {
        expect(() => getSqrtPriceAtTick(MAX_TICK + 1)).toThrow(RangeError);
        expect(() => getSqrtPriceAtTick(MIN_TICK - 1)).toThrow(RangeError);
        expect(() => getSqrtPriceAtTick(1.5)).toThrow(RangeError);
    });
});

describe("getTickAtSqrtPrice", () => {
    it("returns the greatest tick at or below the price", () => {
        expect(getTickAtSqrtPrice(MIN_SQRT_PRICE)).toBe(MIN_TICK);
        expect(getTickAtSqrtPrice(MAX_SQRT_PRICE - 1n)).toBe(MAX_TICK - 1);
        expect(getTickAtSqrtPrice(Q96)).toBe(0);
        expect(getTickAtSqrtPrice(getSqrtPriceAtTick(1) - 1n)).toBe(0);
        expect(getTickAtSqrtPrice(getSqrtPriceAtTick(-60))).toBe(-60);
    });

    it("rejects prices outside [MIN_SQRT_PRICE, MAX_SQRT_PRICE)", () => {
        expect(() => getTickAtSqrtPrice(MIN_SQRT_PRICE - 1n)).toThrow(RangeError);
        expect(() => getTickAtSqrtPrice(MAX_SQRT_PRICE)).toThrow(RangeError);
    });
});

describe("tick grid helpers", () => {
    it("truncates usable ticks toward zero", () => {
        expect(minUsableTick(1)).toBe(MIN_TICK);
        expect(maxUsableTick(1)).toBe(MAX_TICK);
        expect(minUsableTick(60)).toBe(-887220);
        expect(maxUsableTick(60)).toBe(887220);
    });

    it("floors toward negative infinity", () => {
        expect(tickFloor(59, 60)).toBe(0);
        expect(tickFloor(-1, 60)).toBe(-60);
        expect(tickFloor(-887272, 60)).toBe(-887280);
    });

    it("splits the 128-bit liquidity budget across usable ticks", () => {
        expect(maxLiquidityPerTick(1)).toBe(191757530477355301479181766273477n);
        expect(maxLiquidityPerTick(60)).toBe(11505743598341114571880798222544994n);
    });
});
