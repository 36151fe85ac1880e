import { PriceFeedId } from "../registry/asset-registry";
import { Clock, PriceOracle, PriceReading, systemClock } from "./price-oracle";

/**
 * In-memory price oracle.
 *
 * Useful for:
 * - Unit testing
 * - Local development without a live feed
 *
 * @example
 * ```typescript
 * const oracle = new StaticPriceOracle();
 * oracle.setPrice("eth-usd", 3000_00000000n);
 * oracle.latestPrice("eth-usd"); // { price: 300000000000n, updatedAt: now }
 * ```
 */
export class StaticPriceOracle implements PriceOracle {
	private readonly readings = new Map<PriceFeedId, PriceReading>();

	constructor(private readonly clock: Clock = systemClock) {}

	/**
	 * Record a new answer for a feed. `updatedAt` defaults to the oracle clock.
	 */
	setPrice(feedId: PriceFeedId, price: bigint, updatedAt?: number): void {
		this.readings.set(feedId, { price, updatedAt: updatedAt ?? this.clock() });
	}

	latestPrice(feedId: PriceFeedId): PriceReading {
		const reading = this.readings.get(feedId);
		if (!reading) {
			throw new Error(`No price recorded for feed ${feedId}`);
		}
		return { ...reading };
	}
}
