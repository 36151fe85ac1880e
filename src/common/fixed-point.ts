/**
 * Fixed-point arithmetic shared by the ledger and the risk engine.
 *
 * Asset amounts and USD values are 18-decimal integers, oracle prices are
 * 8-decimal integers. Every division floors, and the multiply-before-divide
 * order below is part of the contract: reordering changes rounding.
 */

/** 1.0 in 18-decimal fixed point. */
export const PRECISION = 10n ** 18n;

/** Lifts an 8-decimal oracle price to 18 decimals. */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** Health factor reported for an account without debt. */
export const HEALTH_FACTOR_INFINITE = 2n ** 256n - 1n;

export type RiskPolicy = {
	liquidationThreshold: bigint;
	liquidationBonus: bigint;
	liquidationPrecision: bigint;
	minHealthFactor: bigint;
};

export const DEFAULT_RISK_POLICY: RiskPolicy = {
	liquidationThreshold: 50n,
	liquidationBonus: 10n,
	liquidationPrecision: 100n,
	minHealthFactor: PRECISION,
};

export function usdValueOf(price: bigint, amount: bigint): bigint {
	return (price * ADDITIONAL_FEED_PRECISION * amount) / PRECISION;
}

export function tokenAmountFromUsdOf(price: bigint, usdAmount: bigint): bigint {
	return (usdAmount * PRECISION) / (price * ADDITIONAL_FEED_PRECISION);
}

/**
 * Collateral is first discounted by the liquidation threshold, then divided
 * by the debt. A zero debt yields {@link HEALTH_FACTOR_INFINITE}.
 */
export function healthFactorOf(
	minted: bigint,
	collateralValueUsd: bigint,
	policy: Pick<RiskPolicy, "liquidationThreshold" | "liquidationPrecision">,
): bigint {
	if (minted === 0n) {
		return HEALTH_FACTOR_INFINITE;
	}
	const collateralAdjustedForThreshold =
		(collateralValueUsd * policy.liquidationThreshold) /
		policy.liquidationPrecision;
	return (collateralAdjustedForThreshold * PRECISION) / minted;
}

export function liquidationBonusOf(
	tokenAmount: bigint,
	policy: Pick<RiskPolicy, "liquidationBonus" | "liquidationPrecision">,
): bigint {
	return (tokenAmount * policy.liquidationBonus) / policy.liquidationPrecision;
}

export function isHealthy(healthFactor: bigint, policy: RiskPolicy): boolean {
	return healthFactor >= policy.minHealthFactor;
}

/** Renders an 18-decimal amount for log lines, e.g. `1.5`. */
export function formatUnits(value: bigint, decimals = 18): string {
	if (value === HEALTH_FACTOR_INFINITE) {
		return "inf";
	}
	if (decimals === 0) {
		return value.toString();
	}
	const negative = value < 0n;
	const digits = (negative ? -value : value)
		.toString()
		.padStart(decimals + 1, "0");
	const integerPart = digits.slice(0, -decimals) || "0";
	const decimalPart = digits.slice(-decimals).replace(/0+$/, "");
	const sign = negative ? "-" : "";
	return decimalPart.length > 0
		? `${sign}${integerPart}.${decimalPart}`
		: `${sign}${integerPart}`;
}
