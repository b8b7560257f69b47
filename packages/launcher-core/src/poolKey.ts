import { encodeAbiParameters, keccak256, parseAbiParameters } from "viem";
import type { Address, Hex, PoolKey } from "./types";

/**
 * Whether the raised currency sorts first in the pool. Identifiers are compared as
 * 160-bit integers, so the native currency (zero address) is always currency0.
 */
export function currencyIsCurrency0(currency: Address, token: Address): boolean {
    return BigInt(currency) < BigInt(token);
}

export function toPoolKey(args: {
    currency: Address;
    token: Address;
    fee: number;
    tickSpacing: number;
    hooks: Address;
}): PoolKey {
    const isCurrency0 = currencyIsCurrency0(args.currency, args.token);
    return {
        currency0: isCurrency0 ? args.currency : args.token,
        currency1: isCurrency0 ? args.token : args.currency,
        fee: args.fee,
        tickSpacing: args.tickSpacing,
        hooks: args.hooks,
    };
}

export function toPoolId(poolKey: PoolKey): Hex {
    return keccak256(
        encodeAbiParameters(parseAbiParameters("address, address, uint24, int24, address"), [
            poolKey.currency0,
            poolKey.currency1,
            poolKey.fee,
            poolKey.tickSpacing,
            poolKey.hooks,
        ]),
    );
}
