import { formatAmount, type PlannedMigration } from "./utils.ts";

type Decimals = { tokenDecimals: number; currencyDecimals: number };

export function describePlan(planned: PlannedMigration, { tokenDecimals, currencyDecimals }: Decimals): string[] {
    const { poolKey, data, plan } = planned;
    const token = (amount: bigint) => formatAmount(amount, tokenDecimals);
    const currency = (amount: bigint) => formatAmount(amount, currencyDecimals);

    const lines = [
        `Pool: ${poolKey.currency0} / ${poolKey.currency1}, fee ${poolKey.fee}, tick spacing ${poolKey.tickSpacing}`,
        `Pool ID: ${planned.poolId}`,
        `Initial sqrt price (Q96): ${data.sqrtPriceX96}`,
        `Full-range position: ${token(data.initialTokenAmount)} token + ${currency(data.initialCurrencyAmount)} currency, liquidity ${data.liquidity}`,
        `Leftover currency: ${currency(data.leftoverCurrency)}`,
    ];

    if (plan.oneSided) {
        const { inToken, amount, tickLower, tickUpper, liquidity } = plan.oneSided;
        const formatted = inToken ? `${token(amount)} token` : `${currency(amount)} currency`;
        lines.push(`One-sided position: ${formatted} in ticks [${tickLower}, ${tickUpper}], liquidity ${liquidity}`);
    } else {
        lines.push("One-sided position: none");
    }

    lines.push(
        `Transfers to position manager: ${token(plan.tokenAmount)} token, ${currency(plan.currencyAmount)} currency`,
        `Actions: ${plan.steps.map((s) => s.action).join(", ")}`,
    );
    return lines;
}

export function printPlan(planned: PlannedMigration, decimals: Decimals) {
    for (const line of describePlan(planned, decimals)) {
        console.log(line);
    }
}
