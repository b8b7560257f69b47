import { zeroAddress } from "viem";
import { decodeUnlockData, type PlanStep } from "../src/actions";
import type {
    AuctionFactoryLike,
    AuctionLike,
    ChainLike,
    PositionManagerLike,
    TreasuryLike,
} from "../src/collaborators";
import { toPoolId } from "../src/poolKey";
import type { Address, AuctionConfig, Hex, PoolKey } from "../src/types";

export const TOKEN: Address = "0x1111111111111111111111111111111111111111";
export const TREASURY: Address = "0x2222222222222222222222222222222222222222";
export const POSITION_MANAGER: Address = "0x3333333333333333333333333333333333333333";
export const AUCTION: Address = "0x4444444444444444444444444444444444444444";
export const ERC20_CURRENCY: Address = "0x5555555555555555555555555555555555555555";
export const CREATOR: Address = "0x6666666666666666666666666666666666666666";

export class FakeTreasury implements TreasuryLike {
    readonly address: Address;
    readonly transfers: Array<{ asset: Address; to: Address; amount: bigint }> = [];
    // rejects transfers of this asset while set
    failTransfer?: { asset: Address; error: Error };
    private readonly balances = new Map<string, bigint>();

    constructor(address: Address = TREASURY) {
        this.address = address;
    }

    credit(asset: Address, amount: bigint) {
        const key = asset.toLowerCase();
        this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    }

    async balanceOf(asset: Address): Promise<bigint> {
        return this.balances.get(asset.toLowerCase()) ?? 0n;
    }

    async transfer(asset: Address, to: Address, amount: bigint): Promise<void> {
        if (this.failTransfer && this.failTransfer.asset.toLowerCase() === asset.toLowerCase()) {
            throw this.failTransfer.error;
        }
        const held = await this.balanceOf(asset);
        if (held < amount) {
            throw new Error(`transfer of ${amount} exceeds balance ${held}`);
        }
        this.balances.set(asset.toLowerCase(), held - amount);
        this.transfers.push({ asset, to, amount });
    }
}

/**
 * Auction whose final state is fixed up front. Sweeps credit the treasury.
 */
export class FakeAuction implements AuctionLike {
    readonly address: Address;
    checkpoints = 0;
    raised: bigint;
    price: bigint;
    private readonly treasury: FakeTreasury;
    private readonly currency: Address;
    private swept = false;

    constructor(args: {
        treasury: FakeTreasury;
        currency?: Address;
        currencyRaised: bigint;
        clearingPrice: bigint;
        address?: Address;
    }) {
        this.address = args.address ?? AUCTION;
        this.treasury = args.treasury;
        this.currency = args.currency ?? zeroAddress;
        this.raised = args.currencyRaised;
        this.price = args.clearingPrice;
    }

    async checkpoint(): Promise<void> {
        this.checkpoints++;
    }

    async currencyRaised(): Promise<bigint> {
        return this.raised;
    }

    async clearingPrice(): Promise<bigint> {
        return this.price;
    }

    async sweepCurrency(): Promise<void> {
        if (this.swept) {
            throw new Error("currency already swept");
        }
        this.swept = true;
        this.treasury.credit(this.currency, this.raised);
    }

    async sweepUnsoldTokens(): Promise<void> {}
}

export class FakeFactory implements AuctionFactoryLike {
    readonly created: Array<{ token: Address; amount: bigint; config: AuctionConfig; fundsRecipient: Address; salt: Hex }> =
        [];
    private readonly make: (config: AuctionConfig) => FakeAuction;

    constructor(make: (config: AuctionConfig) => FakeAuction) {
        this.make = make;
    }

    async createAuction(args: {
        token: Address;
        amount: bigint;
        config: AuctionConfig;
        fundsRecipient: Address;
        salt: Hex;
    }): Promise<AuctionLike> {
        this.created.push(args);
        return this.make(args.config);
    }
}

export type ExecutedPlan = { steps: PlanStep[]; deadline: bigint; value: bigint };

/**
 * Decodes the real unlock payload so tests can assert on the submitted actions.
 */
export class FakePositionManager implements PositionManagerLike {
    readonly address: Address = POSITION_MANAGER;
    readonly pools = new Map<Hex, bigint>();
    readonly executed: ExecutedPlan[] = [];
    failExecution?: Error;

    async initializePool(poolKey: PoolKey, sqrtPriceX96: bigint): Promise<void> {
        const poolId = toPoolId(poolKey);
        if (this.pools.has(poolId)) {
            throw new Error("PoolAlreadyInitialized");
        }
        this.pools.set(poolId, sqrtPriceX96);
    }

    async modifyLiquidities(unlockData: Hex, deadline: bigint, value: bigint): Promise<void> {
        if (this.failExecution) {
            throw this.failExecution;
        }
        this.executed.push({ steps: decodeUnlockData(unlockData), deadline, value });
    }
}

export class FakeChain implements ChainLike {
    blockNumber: bigint;
    timestamp: bigint;

    constructor(blockNumber: bigint, timestamp = 1_700_000_000n) {
        this.blockNumber = blockNumber;
        this.timestamp = timestamp;
    }

    async getBlockNumber(): Promise<bigint> {
        return this.blockNumber;
    }

    async getBlockTimestamp(): Promise<bigint> {
        return this.timestamp;
    }
}
