import { AssetId } from "../common/engine.event";
import { EngineError } from "../common/errors";

export const ASSET_REGISTRY = Symbol("ASSET_REGISTRY");

export type PriceFeedId = string;

/**
 * Immutable mapping of collateral asset to oracle price feed.
 *
 * Iteration follows registration order so collateral valuation is
 * deterministic.
 */
export class AssetRegistry {
	private readonly feeds: ReadonlyMap<AssetId, PriceFeedId>;
	private readonly assets: readonly AssetId[];

	private constructor(entries: ReadonlyArray<readonly [AssetId, PriceFeedId]>) {
		const feeds = new Map<AssetId, PriceFeedId>();
		for (const [asset, feed] of entries) {
			if (asset.length === 0 || feed.length === 0) {
				throw new EngineError(
					"Asset and price feed identifiers must not be empty",
					"INVALID_REGISTRY",
					{ asset, feed },
				);
			}
			if (feeds.has(asset)) {
				throw new EngineError(
					`Asset ${asset} is registered twice`,
					"INVALID_REGISTRY",
					{ asset },
				);
			}
			feeds.set(asset, feed);
		}
		if (feeds.size === 0) {
			throw new EngineError(
				"At least one collateral asset is required",
				"INVALID_REGISTRY",
			);
		}
		this.feeds = feeds;
		this.assets = Object.freeze(Array.from(feeds.keys()));
	}

	static fromEntries(
		entries: ReadonlyArray<{ asset: AssetId; priceFeed: PriceFeedId }>,
	): AssetRegistry {
		return new AssetRegistry(entries.map((e) => [e.asset, e.priceFeed]));
	}

	static fromParallelLists(
		assets: readonly AssetId[],
		priceFeeds: readonly PriceFeedId[],
	): AssetRegistry {
		if (assets.length !== priceFeeds.length) {
			throw new EngineError(
				"Asset and price feed lists must have the same length",
				"INVALID_REGISTRY",
				{ assets: assets.length, priceFeeds: priceFeeds.length },
			);
		}
		return new AssetRegistry(assets.map((asset, i) => [asset, priceFeeds[i]]));
	}

	isRegistered(asset: AssetId): boolean {
		return this.feeds.has(asset);
	}

	/** @throws EngineError `ASSET_NOT_ALLOWED` */
	requireRegistered(asset: AssetId): void {
		if (!this.feeds.has(asset)) {
			throw new EngineError(
				`Asset ${asset} is not an allowed collateral`,
				"ASSET_NOT_ALLOWED",
				{ asset },
			);
		}
	}

	priceFeedOf(asset: AssetId): PriceFeedId {
		const feed = this.feeds.get(asset);
		if (feed === undefined) {
			throw new EngineError(
				`Asset ${asset} is not an allowed collateral`,
				"ASSET_NOT_ALLOWED",
				{ asset },
			);
		}
		return feed;
	}

	registeredAssets(): readonly AssetId[] {
		return this.assets;
	}

	get size(): number {
		return this.assets.length;
	}
}
