import { bytesToHex, decodeAbiParameters, encodeAbiParameters, hexToBytes, parseAbiParameters } from "viem";
import type { Address, Hex, PoolKey } from "./types";

/** Position manager opcodes used by the migration plan. */
export const Actions = {
    MINT_POSITION: 0x02,
    SETTLE: 0x0b,
    TAKE_PAIR: 0x11,
} as const;

export type ActionName = keyof typeof Actions;

/** SETTLE amount meaning "everything the position manager holds of this currency". */
export const CONTRACT_BALANCE = 1n << 255n;

export type MintPositionParams = {
    poolKey: PoolKey;
    tickLower: number;
    tickUpper: number;
    liquidity: bigint;
    amount0Max: bigint;
    amount1Max: bigint;
    owner: Address;
    hookData: Hex;
};

export type SettleParams = {
    currency: Address;
    amount: bigint;
    payerIsUser: boolean;
};

export type TakePairParams = {
    currency0: Address;
    currency1: Address;
    recipient: Address;
};

export type PlanStep =
    | { action: "MINT_POSITION"; params: MintPositionParams }
    | { action: "SETTLE"; params: SettleParams }
    | { action: "TAKE_PAIR"; params: TakePairParams };

const mintPositionParameters = [
    {
        name: "poolKey",
        type: "tuple",
        components: [
            { name: "currency0", type: "address" },
            { name: "currency1", type: "address" },
            { name: "fee", type: "uint24" },
            { name: "tickSpacing", type: "int24" },
            { name: "hooks", type: "address" },
        ],
    },
    { name: "tickLower", type: "int24" },
    { name: "tickUpper", type: "int24" },
    { name: "liquidity", type: "uint256" },
    { name: "amount0Max", type: "uint128" },
    { name: "amount1Max", type: "uint128" },
    { name: "owner", type: "address" },
    { name: "hookData", type: "bytes" },
] as const;

const settleParameters = parseAbiParameters("address currency, uint256 amount, bool payerIsUser");
const takePairParameters = parseAbiParameters("address currency0, address currency1, address recipient");
const unlockDataParameters = parseAbiParameters("bytes actions, bytes[] params");

export function encodeStepParams(step: PlanStep): Hex {
    switch (step.action) {
        case "MINT_POSITION": {
            const p = step.params;
            return encodeAbiParameters(mintPositionParameters, [
                p.poolKey,
                p.tickLower,
                p.tickUpper,
                p.liquidity,
                p.amount0Max,
                p.amount1Max,
                p.owner,
                p.hookData,
            ]);
        }
        case "SETTLE":
            return encodeAbiParameters(settleParameters, [
                step.params.currency,
                step.params.amount,
                step.params.payerIsUser,
            ]);
        case "TAKE_PAIR":
            return encodeAbiParameters(takePairParameters, [
                step.params.currency0,
                step.params.currency1,
                step.params.recipient,
            ]);
    }
}

/**
 * One opcode byte per step, and the matching parameter blob at the same index.
 */
export function encodePlan(steps: readonly PlanStep[]): { actions: Hex; params: Hex[] } {
    return {
        actions: bytesToHex(Uint8Array.from(steps.map((step) => Actions[step.action]))),
        params: steps.map(encodeStepParams),
    };
}

/** Payload for `modifyLiquidities(bytes unlockData, uint256 deadline)`. */
export function encodeUnlockData(steps: readonly PlanStep[]): Hex {
    const { actions, params } = encodePlan(steps);
    return encodeAbiParameters(unlockDataParameters, [actions, params]);
}

const actionNames: readonly ActionName[] = ["MINT_POSITION", "SETTLE", "TAKE_PAIR"];

function actionName(opcode: number): ActionName {
    const name = actionNames.find((n) => Actions[n] === opcode);
    if (name) {
        return name;
    }
    throw new Error(`Unsupported action opcode 0x${opcode.toString(16).padStart(2, "0")}`);
}

export function decodeUnlockData(unlockData: Hex): PlanStep[] {
    const [actions, params] = decodeAbiParameters(unlockDataParameters, unlockData);
    const opcodes = hexToBytes(actions);
    if (opcodes.length !== params.length) {
        throw new Error(`Plan has ${opcodes.length} actions but ${params.length} params`);
    }

    return Array.from(opcodes, (opcode, i): PlanStep => {
        const name = actionName(opcode);
        switch (name) {
            case "MINT_POSITION": {
                const [poolKey, tickLower, tickUpper, liquidity, amount0Max, amount1Max, owner, hookData] =
                    decodeAbiParameters(mintPositionParameters, params[i]);
                return {
                    action: name,
                    params: {
                        poolKey: { ...poolKey },
                        tickLower,
                        tickUpper,
                        liquidity,
                        amount0Max,
                        amount1Max,
                        owner,
                        hookData,
                    },
                };
            }
            case "SETTLE": {
                const [currency, amount, payerIsUser] = decodeAbiParameters(settleParameters, params[i]);
                return { action: name, params: { currency, amount, payerIsUser } };
            }
            case "TAKE_PAIR": {
                const [currency0, currency1, recipient] = decodeAbiParameters(takePairParameters, params[i]);
                return { action: name, params: { currency0, currency1, recipient } };
            }
        }
    });
}
