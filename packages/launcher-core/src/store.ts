import type { AuctionLike } from "./collaborators";
import type { Address } from "./types";

export type AuctionInfo = {
    auction: AuctionLike;
    token: Address;
    raisedCurrency: Address;
    reserveSupply: bigint;
    endBlock: bigint;
};

/**
 * Progress of a migration, in order. Every stage after `Pending` records a write that
 * has already landed, so a retry resumes after it.
 */
export const MIGRATION_STAGES = ["Pending", "PoolInitialized", "TokenFunded", "Funded", "Migrated"] as const;

export type MigrationStage = (typeof MIGRATION_STAGES)[number];

export function isMigrationStage(value: unknown): value is MigrationStage {
    return MIGRATION_STAGES.some((stage) => stage === value);
}

/** True once `stage` is at or past `target`. */
export function hasReachedStage(stage: MigrationStage, target: MigrationStage): boolean {
    return MIGRATION_STAGES.indexOf(stage) >= MIGRATION_STAGES.indexOf(target);
}

export interface AuctionStore {
    get(token: Address): AuctionInfo | undefined;
    set(info: AuctionInfo): void;
    migrationStage(token: Address): MigrationStage;
    setMigrationStage(token: Address, stage: MigrationStage): void;
}

export function createMemoryAuctionStore(): AuctionStore {
    const infos = new Map<string, AuctionInfo>();
    const stages = new Map<string, MigrationStage>();
    // addresses arrive in mixed checksum case
    const key = (token: Address) => token.toLowerCase();

    return {
        get(token) {
            return infos.get(key(token));
        },
        set(info) {
            infos.set(key(info.token), info);
        },
        migrationStage(token) {
            return stages.get(key(token)) ?? "Pending";
        },
        setMigrationStage(token, stage) {
            stages.set(key(token), stage);
        },
    };
}
