import { PriceFeedId } from "../registry/asset-registry";

export const PRICE_ORACLE = Symbol("PRICE_ORACLE");
export const CLOCK = Symbol("CLOCK");

/** Seconds since the unix epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export type PriceReading = {
	/** USD price, 8-decimal fixed point */
	price: bigint;
	/** Unix timestamp (seconds) of the last feed update */
	updatedAt: number;
};

/**
 * External price source.
 *
 * Implementations report the latest answer of a feed and when it was
 * updated; freshness is judged by the engine, not by the oracle.
 */
export interface PriceOracle {
	latestPrice(feedId: PriceFeedId): PriceReading;
}
