import { Command } from "commander";
import * as readline from "readline";
import { zeroAddress } from "viem";
import {
    createLauncher,
    DEAD_ADDRESS,
    DEFAULT_POOL_FEE,
    DEFAULT_POOL_TICK_SPACING,
    type Address,
} from "@cca-launcher/core";
import {
    createFileAuctionStore,
    createSigner,
    createViemAuction,
    createViemChain,
    createViemPositionManager,
    createViemTreasury,
    formatAmount,
    parseAddress,
    parseAmount,
    parseBoolean,
    parseNetwork,
    planMigration,
    readAuctionState,
    readBalance,
    readDecimals,
    tryGetPrivateKey,
    type NetworkName,
} from "./utils.ts";
import { printPlan } from "./summary.ts";

interface Config {
    auctionAddress: Address;
    positionManager: Address;
    rpcUrl: string;
    network: NetworkName;
    reserveSupply: bigint;
    poolFee: number;
    poolTickSpacing: number;
    hooks: Address;
    positionRecipient: Address;
    oneSidedPositions: boolean;
    sweep: boolean;
    deadlineSlack: bigint;
    stateFile: string;
    dryRun: boolean;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("migrate")
        .description(
            "Seed a pool from a finished auction. The signing account must hold the reserve tokens and receive the auction's raised currency.",
        )
        .requiredOption("--auction-address <address>", "Address of the clearing auction", parseAddress)
        .requiredOption("--position-manager <address>", "Address of the pool's position manager", parseAddress)
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
        .option("--one-sided-positions <boolean>", "Place surplus as one-sided positions", parseBoolean, true)
        .option("--sweep <boolean>", "Sweep the auction before migrating (default: true)", parseBoolean, true)
        .option("--deadline-slack <seconds>", "Seconds the liquidity transaction stays valid", parseAmount, 300n)
        .option("--state-file <path>", "Where migration progress is kept between runs", "migration-state.json")
        .option("--dry-run <boolean>", "Preview without submitting transactions (default: true)", parseBoolean, true)
        .parse();

    const opts = program.opts<Config>();

    return {
        auctionAddress: opts.auctionAddress,
        positionManager: opts.positionManager,
        rpcUrl: opts.rpcUrl,
        network: opts.network,
        reserveSupply: opts.reserveSupply,
        poolFee: opts.poolFee,
        poolTickSpacing: opts.poolTickSpacing,
        hooks: opts.hooks,
        positionRecipient: opts.positionRecipient,
        oneSidedPositions: opts.oneSidedPositions,
        sweep: opts.sweep,
        deadlineSlack: opts.deadlineSlack,
        stateFile: opts.stateFile,
        dryRun: opts.dryRun,
    };
}

async function promptConfirmation(message: string): Promise<boolean> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });

    return new Promise((resolve) => {
        rl.question(`${message} [y/N]: `, (answer) => {
            rl.close();
            resolve(answer.toLowerCase() === "y" || answer.toLowerCase() === "yes");
        });
    });
}

async function run() {
    const config = parseCliArgs();
    const privateKey = tryGetPrivateKey();
    const signer = privateKey ? createSigner(config, privateKey) : undefined;

    console.log("Loading auction state...");
    const state = await readAuctionState(config, config.auctionAddress);
    const [tokenDecimals, currencyDecimals] = await Promise.all([
        readDecimals(config, state.token),
        readDecimals(config, state.currency),
    ]);

    // the preview uses the last checkpoint; migrate checkpoints again before pricing
    const planned = planMigration(state, {
        ...config,
        recipient: signer?.account.address ?? config.positionRecipient,
    });

    console.log("\n=== SUMMARY ===");
    console.log(`Auction: ${config.auctionAddress}`);
    console.log(`Position manager: ${config.positionManager}`);
    console.log(`Token: ${state.token}`);
    console.log(`Currency: ${state.currency}`);
    console.log(`Currency raised: ${formatAmount(state.currencyRaised, currencyDecimals)}`);
    console.log(`Reserve supply: ${formatAmount(config.reserveSupply, tokenDecimals)}`);
    if (signer) {
        const account = signer.account.address;
        const [tokenBalance, currencyBalance] = await Promise.all([
            readBalance(config, state.token, account),
            readBalance(config, state.currency, account),
        ]);
        console.log(`Signer: ${account}`);
        console.log(`  token balance: ${formatAmount(tokenBalance, tokenDecimals)}`);
        console.log(`  currency balance: ${formatAmount(currencyBalance, currencyDecimals)}`);
    }
    console.log();
    printPlan(planned, { tokenDecimals, currencyDecimals });
    console.log();

    if (config.dryRun) {
        console.log("\n=== DRY RUN MODE ===");
        console.log("No transactions will be submitted.");
        console.log("To submit transactions, run with --dry-run false\n");
        return;
    }

    if (!signer) {
        throw new Error("PRIVATE_KEY environment variable is required");
    }

    const confirmed = await promptConfirmation("Do you want to submit these transactions?");
    if (!confirmed) {
        console.log("Aborted by user.");
        return;
    }

    const launcher = createLauncher({
        positionManager: createViemPositionManager(config, config.positionManager, signer),
        treasury: createViemTreasury(config, signer),
        chain: createViemChain(config),
        store: createFileAuctionStore(config.stateFile),
        poolFee: config.poolFee,
        poolTickSpacing: config.poolTickSpacing,
        hooks: config.hooks,
        positionRecipient: config.positionRecipient,
        oneSidedPositions: config.oneSidedPositions,
        deadlineSlack: config.deadlineSlack,
        onEvent: (event) => console.log(`Event: ${event.type}`),
    });
    launcher.registerAuction({
        auction: createViemAuction(config, config.auctionAddress, signer),
        token: state.token,
        raisedCurrency: state.currency,
        reserveSupply: config.reserveSupply,
        endBlock: state.endBlock,
    });

    // a resumed migration has already swept the auction
    const stage = launcher.migrationStage(state.token);
    if (stage !== "Pending") {
        console.log(`Resuming migration from stage ${stage} (recorded in ${config.stateFile})`);
    } else if (config.sweep) {
        console.log("Sweeping auction...");
        await launcher.sweepAuction(state.token);
    }

    console.log("Migrating...");
    const result = await launcher.migrate(state.token);

    console.log("\nMigration submitted successfully.\n");
    console.log(`Pool ID: ${result.poolId}`);
    console.log(`Initial sqrt price (Q96): ${result.sqrtPriceX96}`);
    console.log(`Liquidity: ${result.data.liquidity}`);
    if (result.plan.oneSided) {
        console.log(`One-sided liquidity: ${result.plan.oneSided.liquidity}`);
    }
    if (result.data.liquidity !== planned.data.liquidity) {
        console.warn("⚠ Warning: the final checkpoint changed the plan from the preview");
    }
}

run().catch(console.error);
