import { existsSync, readFileSync, writeFileSync } from "fs";
import {
    createPublicClient,
    createWalletClient,
    getContract,
    http,
    isAddress,
    isAddressEqual,
    isHex,
    zeroAddress,
    type Hex,
    type Transport,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { mainnet, unichain, unichainSepolia } from "viem/chains";
import {
    buildMigrationPlan,
    createMemoryAuctionStore,
    currencyIsCurrency0,
    encodeUnlockData,
    isMigrationStage,
    mulDiv,
    prepareMigrationData,
    Q96,
    toPoolId,
    toPoolKey,
    type Address,
    type AuctionLike,
    type AuctionStore,
    type ChainLike,
    type MigrationData,
    type MigrationPlan,
    type MigrationStage,
    type PoolKey,
    type PositionManagerLike,
    type TreasuryLike,
} from "@cca-launcher/core";
import { continuousClearingAuctionAbi } from "./abis/IContinuousClearingAuction";
import { erc20Abi } from "./abis/IERC20";
import { positionManagerAbi } from "./abis/IPositionManager";

export const networks = { mainnet, unichain, unichainSepolia } as const;

export type NetworkName = keyof typeof networks;

export interface Config {
    rpcUrl: string;
    network: NetworkName;
    // overrides the http transport
    transport?: Transport;
}

const transport = (config: Config) => {
    return (
        config.transport ??
        http(config.rpcUrl, {
            timeout: 10000000,
        })
    );
};

const publicClient = (config: Config) => {
    return createPublicClient({
        chain: networks[config.network],
        transport: transport(config),
    });
};

export function createSigner(config: Config, privateKey: Hex) {
    return createWalletClient({
        account: privateKeyToAccount(privateKey),
        chain: networks[config.network],
        transport: transport(config),
    });
}

export type Signer = ReturnType<typeof createSigner>;

export function tryGetPrivateKey(): Hex | undefined {
    const envKey = process.env.PRIVATE_KEY;
    if (!envKey) {
        return undefined;
    }
    const key = envKey.startsWith("0x") ? envKey : `0x${envKey}`;
    if (!isHex(key)) {
        throw new Error("PRIVATE_KEY is not a hex string");
    }
    return key;
}

export async function waitForTransaction(config: Config, hash: Hex, label: string): Promise<void> {
    console.log(`  ${label} transaction hash: ${hash}`);
    const receipt = await publicClient(config).waitForTransactionReceipt({ hash });
    if (receipt.status === "reverted") {
        throw new Error(`${label} reverted in block ${receipt.blockNumber}. Transaction hash: ${hash}`);
    }
    console.log(`  ${label} confirmed in block ${receipt.blockNumber}`);
}

export type AuctionState = {
    token: Address;
    currency: Address;
    endBlock: bigint;
    clearingPrice: bigint;
    currencyRaised: bigint;
};

/**
 * Values as of the auction's latest checkpoint.
 */
export async function readAuctionState(config: Config, address: Address): Promise<AuctionState> {
    const auction = getContract({ address, abi: continuousClearingAuctionAbi, client: publicClient(config) });

    const [token, currency, endBlock, clearingPrice, currencyRaised] = await Promise.all([
        auction.read.token(),
        auction.read.currency(),
        auction.read.endBlock(),
        auction.read.clearingPrice(),
        auction.read.currencyRaised(),
    ]);

    return { token, currency, endBlock, clearingPrice, currencyRaised };
}

export async function readBalance(config: Config, asset: Address, owner: Address): Promise<bigint> {
    const client = publicClient(config);
    if (isAddressEqual(asset, zeroAddress)) {
        return client.getBalance({ address: owner });
    }
    return client.readContract({ address: asset, abi: erc20Abi, functionName: "balanceOf", args: [owner] });
}

export async function readDecimals(config: Config, asset: Address): Promise<number> {
    if (isAddressEqual(asset, zeroAddress)) {
        return 18;
    }
    return publicClient(config).readContract({ address: asset, abi: erc20Abi, functionName: "decimals" });
}

export type PlanOptions = {
    reserveSupply: bigint;
    poolFee: number;
    poolTickSpacing: number;
    hooks: Address;
    positionRecipient: Address;
    recipient: Address;
    oneSidedPositions: boolean;
};

export type PlannedMigration = {
    poolKey: PoolKey;
    poolId: Hex;
    data: MigrationData;
    plan: MigrationPlan;
    unlockData: Hex;
};

/**
 * Offline preview of what `Launcher.migrate` would submit for the given auction state.
 */
export function planMigration(state: AuctionState, opts: PlanOptions): PlannedMigration {
    const data = prepareMigrationData({
        clearingPrice: state.clearingPrice,
        currencyRaised: state.currencyRaised,
        reserveSupply: opts.reserveSupply,
        currencyIsCurrency0: currencyIsCurrency0(state.currency, state.token),
        poolTickSpacing: opts.poolTickSpacing,
    });
    const poolKey = toPoolKey({
        currency: state.currency,
        token: state.token,
        fee: opts.poolFee,
        tickSpacing: opts.poolTickSpacing,
        hooks: opts.hooks,
    });
    const plan = buildMigrationPlan({
        base: {
            currency: state.currency,
            token: state.token,
            poolFee: opts.poolFee,
            poolTickSpacing: opts.poolTickSpacing,
            hooks: opts.hooks,
            initialSqrtPriceX96: data.sqrtPriceX96,
            liquidity: data.liquidity,
            positionRecipient: opts.positionRecipient,
        },
        data,
        reserveSupply: opts.reserveSupply,
        recipient: opts.recipient,
        oneSidedPositions: opts.oneSidedPositions,
    });

    return { poolKey, poolId: toPoolId(poolKey), data, plan, unlockData: encodeUnlockData(plan.steps) };
}

/**
 * Auction records in memory, migration stages in a JSON file keyed by token, so that a
 * migration interrupted by a failed transaction resumes on the next run.
 */
export function createFileAuctionStore(path: string): AuctionStore {
    const records = createMemoryAuctionStore();
    const stages = readStages(path);

    return {
        get: (token) => records.get(token),
        set: (info) => records.set(info),
        migrationStage(token) {
            return stages.get(token.toLowerCase()) ?? "Pending";
        },
        setMigrationStage(token, stage) {
            stages.set(token.toLowerCase(), stage);
            writeFileSync(path, JSON.stringify(Object.fromEntries(stages), null, 2) + "\n");
        },
    };
}

function readStages(path: string): Map<string, MigrationStage> {
    const stages = new Map<string, MigrationStage>();
    if (!existsSync(path)) {
        return stages;
    }
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Invalid migration state in ${path}: expected an object of token to stage`);
    }
    for (const [token, stage] of Object.entries(parsed)) {
        if (!isAddress(token, { strict: false }) || !isMigrationStage(stage)) {
            throw new Error(`Invalid migration state in ${path}: ${token} -> ${String(stage)}`);
        }
        stages.set(token.toLowerCase(), stage);
    }
    return stages;
}

export function createViemAuction(config: Config, address: Address, signer: Signer): AuctionLike {
    const auction = getContract({
        address,
        abi: continuousClearingAuctionAbi,
        client: { public: publicClient(config), wallet: signer },
    });

    return {
        address,
        async checkpoint() {
            await waitForTransaction(config, await auction.write.checkpoint(), "checkpoint");
        },
        currencyRaised: () => auction.read.currencyRaised(),
        clearingPrice: () => auction.read.clearingPrice(),
        async sweepCurrency() {
            await waitForTransaction(config, await auction.write.sweepCurrency(), "sweepCurrency");
        },
        async sweepUnsoldTokens() {
            await waitForTransaction(config, await auction.write.sweepUnsoldTokens(), "sweepUnsoldTokens");
        },
    };
}

export function createViemPositionManager(config: Config, address: Address, signer: Signer): PositionManagerLike {
    const positionManager = getContract({
        address,
        abi: positionManagerAbi,
        client: { public: publicClient(config), wallet: signer },
    });

    return {
        address,
        async initializePool(poolKey, sqrtPriceX96) {
            const hash = await positionManager.write.initializePool([poolKey, sqrtPriceX96]);
            await waitForTransaction(config, hash, "initializePool");
        },
        async modifyLiquidities(unlockData, deadline, value) {
            const hash = await positionManager.write.modifyLiquidities([unlockData, deadline], { value });
            await waitForTransaction(config, hash, "modifyLiquidities");
        },
    };
}

/**
 * Holdings of the signing account.
 */
export function createViemTreasury(config: Config, signer: Signer): TreasuryLike {
    const address = signer.account.address;

    return {
        address,
        balanceOf: (asset) => readBalance(config, asset, address),
        async transfer(asset, to, amount) {
            const hash = isAddressEqual(asset, zeroAddress)
                ? await signer.sendTransaction({ to, value: amount })
                : await signer.writeContract({
                      address: asset,
                      abi: erc20Abi,
                      functionName: "transfer",
                      args: [to, amount],
                  });
            await waitForTransaction(config, hash, `transfer ${amount} of ${asset}`);
        },
    };
}

export function createViemChain(config: Config): ChainLike {
    const client = publicClient(config);
    return {
        getBlockNumber: () => client.getBlockNumber(),
        async getBlockTimestamp() {
            const block = await client.getBlock();
            return block.timestamp;
        },
    };
}

export function parseBoolean(value: string): boolean {
    if (value === "true") return true;
    if (value === "false") return false;
    throw new Error(`Invalid boolean "${value}". Expected "true" or "false".`);
}

export function parseAddress(value: string): Address {
    if (!isAddress(value, { strict: false })) {
        throw new Error(`Invalid address "${value}". Expected format: 0x followed by 40 hexadecimal characters.`);
    }
    return value;
}

export function parseNetwork(value: string): NetworkName {
    const name = Object.keys(networks).find((n): n is NetworkName => n === value);
    if (!name) {
        throw new Error(`Unknown network "${value}". Expected one of: ${Object.keys(networks).join(", ")}.`);
    }
    return name;
}

export function parseAmount(value: string): bigint {
    if (!/^\d+$/.test(value)) {
        throw new Error(`Invalid amount "${value}". Expected a non-negative integer in base units.`);
    }
    return BigInt(value);
}

export const formatAmount = (amount: bigint, decimals: number) => {
    const intAmount = amount / 10n ** BigInt(decimals);
    const decimalAmount = amount % 10n ** BigInt(decimals);
    return `${intAmount.toLocaleString("en-US")}.${decimalAmount.toString().padStart(decimals, "0")}`;
};

/**
 * Q96 currency-per-token price as a decimal, with `decimals` fractional digits.
 */
export const formatPriceQ96 = (price: bigint, decimals: number = 18) => {
    return formatAmount(mulDiv(price, 10n ** BigInt(decimals), Q96), decimals);
};
