import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";

import engineConfig from "../config/engine.config";
import { AssetId } from "../common/engine.event";
import { EngineError } from "../common/errors";
import { ASSET_REGISTRY, AssetRegistry } from "../registry/asset-registry";
import { CLOCK, Clock, PRICE_ORACLE, PriceOracle } from "./price-oracle";

/**
 * Reads collateral prices and enforces the staleness window.
 *
 * A stale or non-positive answer fails the enclosing operation; the engine
 * freezes rather than value collateral on an outdated price.
 */
@Injectable()
export class OraclePriceService {
	private readonly logger = new Logger(OraclePriceService.name);

	constructor(
		@Inject(PRICE_ORACLE) private readonly oracle: PriceOracle,
		@Inject(ASSET_REGISTRY) private readonly registry: AssetRegistry,
		@Inject(CLOCK) private readonly clock: Clock,
		@Inject(engineConfig.KEY)
		private readonly config: ConfigType<typeof engineConfig>,
	) {}

	/** 8-decimal USD price of one whole unit of `asset`. */
	priceOf(asset: AssetId): bigint {
		const feedId = this.registry.priceFeedOf(asset);
		const { price, updatedAt } = this.oracle.latestPrice(feedId);

		const ageSeconds = this.clock() - updatedAt;
		if (ageSeconds > this.config.oracleTimeoutSeconds) {
			this.logger.warn(
				`Price feed ${feedId} is stale (${ageSeconds}s old, limit ${this.config.oracleTimeoutSeconds}s)`,
			);
			throw new EngineError(`Price feed ${feedId} is stale`, "STALE_PRICE", {
				asset,
				feedId,
				updatedAt,
				ageSeconds,
			});
		}
		if (price <= 0n) {
			throw new EngineError(
				`Price feed ${feedId} reported a non-positive price`,
				"INVALID_PRICE",
				{ asset, feedId, price },
			);
		}
		return price;
	}

	get timeoutSeconds(): number {
		return this.config.oracleTimeoutSeconds;
	}
}
