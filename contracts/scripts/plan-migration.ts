import { Command } from "commander";
import { zeroAddress } from "viem";
import { DEAD_ADDRESS, DEFAULT_POOL_FEE, DEFAULT_POOL_TICK_SPACING, type Address } from "@cca-launcher/core";
import {
    formatAmount,
    formatPriceQ96,
    parseAddress,
    parseAmount,
    parseBoolean,
    parseNetwork,
    planMigration,
    readAuctionState,
    readDecimals,
    type NetworkName,
} from "./utils.ts";
import { printPlan } from "./summary.ts";

interface Config {
    auctionAddress: Address;
    rpcUrl: string;
    network: NetworkName;
    reserveSupply: bigint;
    poolFee: number;
    poolTickSpacing: number;
    hooks: Address;
    positionRecipient: Address;
    recipient: Address;
    oneSidedPositions: boolean;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("plan-migration")
        .description("Preview the pool and liquidity positions an auction would migrate into. Read only.")
        .requiredOption("--auction-address <address>", "Address of the clearing auction", parseAddress)
        .requiredOption("--rpc-url <url>", "RPC URL to connect to")
        .requiredOption("--reserve-supply <amount>", "Tokens reserved for liquidity, in base units", parseAmount)
        .option("--network <name>", "mainnet, unichain or unichainSepolia (default: unichain)", parseNetwork, "unichain")
        .option("--pool-fee <fee>", "Pool fee in hundredths of a bip", (val) => parseInt(val, 10), DEFAULT_POOL_FEE)
        .option(
            "--pool-tick-spacing <spacing>",
            "Pool tick spacing",
            (val) => parseInt(val, 10),
            DEFAULT_POOL_TICK_SPACING,
        )
        .option("--hooks <address>", "Pool hooks contract", parseAddress, zeroAddress)
        .option("--position-recipient <address>", "Owner of the minted positions", parseAddress, DEAD_ADDRESS)
        .option("--recipient <address>", "Receiver of unspent balances (default: position recipient)", parseAddress)
        .option("--one-sided-positions <boolean>", "Place surplus as one-sided positions", parseBoolean, true)
        .parse();

    const opts = program.opts<{
        auctionAddress: Address;
        rpcUrl: string;
        network: NetworkName;
        reserveSupply: bigint;
        poolFee: number;
        poolTickSpacing: number;
        hooks: Address;
        positionRecipient: Address;
        recipient: Address | undefined;
        oneSidedPositions: boolean;
    }>();

    return {
        auctionAddress: opts.auctionAddress,
        rpcUrl: opts.rpcUrl,
        network: opts.network,
        reserveSupply: opts.reserveSupply,
        poolFee: opts.poolFee,
        poolTickSpacing: opts.poolTickSpacing,
        hooks: opts.hooks,
        positionRecipient: opts.positionRecipient,
        recipient: opts.recipient ?? opts.positionRecipient,
        oneSidedPositions: opts.oneSidedPositions,
    };
}

async function run() {
    const config = parseCliArgs();

    console.log("Loading auction state...");
    const state = await readAuctionState(config, config.auctionAddress);
    const [tokenDecimals, currencyDecimals] = await Promise.all([
        readDecimals(config, state.token),
        readDecimals(config, state.currency),
    ]);

    const planned = planMigration(state, config);

    console.log("\n=== SUMMARY ===");
    console.log(`Auction: ${config.auctionAddress}`);
    console.log(`Token: ${state.token}`);
    console.log(`Currency: ${state.currency}`);
    console.log(`End block: ${state.endBlock}`);
    console.log(`Clearing price: ${formatPriceQ96(state.clearingPrice)} currency per token`);
    console.log(`Currency raised: ${formatAmount(state.currencyRaised, currencyDecimals)}`);
    console.log(`Reserve supply: ${formatAmount(config.reserveSupply, tokenDecimals)}`);
    console.log();
    printPlan(planned, { tokenDecimals, currencyDecimals });

    if (state.currencyRaised === 0n) {
        console.warn("⚠ Warning: the auction has not raised any currency yet; migration would fail");
    }
}

run().catch(console.error);
