import { encodeAbiParameters, parseAbiParameters, zeroAddress } from "viem";
import { describe, expect, it } from "vitest";
import {
    Actions,
    CONTRACT_BALANCE,
    decodeUnlockData,
    encodePlan,
    encodeStepParams,
    encodeUnlockData,
    type PlanStep,
} from "../src/actions";
import { DEAD_ADDRESS } from "../src/index";
import type { PoolKey } from "../src/types";
import { TOKEN, TREASURY } from "./fakes";

const poolKey: PoolKey = { currency0: zeroAddress, currency1: TOKEN, fee: 100, tickSpacing: 1, hooks: zeroAddress };

const steps: PlanStep[] = [
    {
        action: "MINT_POSITION",
        params: {
            poolKey,
            tickLower: -887272,
            tickUpper: 887272,
            liquidity: 111803398n,
            amount0Max: 500_000n,
            amount1Max: 25_000_000_000n,
            owner: DEAD_ADDRESS,
            hookData: "0x",
        },
    },
    { action: "SETTLE", params: { currency: zeroAddress, amount: CONTRACT_BALANCE, payerIsUser: false } },
    { action: "SETTLE", params: { currency: TOKEN, amount: CONTRACT_BALANCE, payerIsUser: false } },
    { action: "TAKE_PAIR", params: { currency0: zeroAddress, currency1: TOKEN, recipient: TREASURY } },
];

const unlockParameters = parseAbiParameters("bytes, bytes[]");

describe("encodePlan", () => {
    it("emits one opcode per step in order", () => {
        const { actions, params } = encodePlan(steps);
        expect(actions).toBe("0x020b0b11");
        expect(params).toHaveLength(4);
        expect(Actions.MINT_POSITION).toBe(0x02);
    });

    it("encodes settle parameters as (currency, amount, payerIsUser)", () => {
        expect(encodeStepParams(steps[1])).toBe(
            `0x${"0".repeat(64)}8${"0".repeat(63)}${"0".repeat(64)}`,
        );
    });
});

describe("decodeUnlockData", () => {
    it("recovers the steps from the position manager payload", () => {
        expect(decodeUnlockData(encodeUnlockData(steps))).toEqual(steps);
    });

    it("rejects a payload whose actions and params differ in length", () => {
        const payload = encodeAbiParameters(unlockParameters, ["0x0211", ["0x"]]);
        expect(() => decodeUnlockData(payload)).toThrow("Plan has 2 actions but 1 params");
    });

    it("rejects opcodes outside the migration plan", () => {
        const payload = encodeAbiParameters(unlockParameters, ["0x01", ["0x"]]);
        expect(() => decodeUnlockData(payload)).toThrow("Unsupported action opcode 0x01");
    });
});
