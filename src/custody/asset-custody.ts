import { AccountId, AssetId } from "../common/engine.event";

export const ASSET_CUSTODY = Symbol("ASSET_CUSTODY");

/**
 * Custody of collateral assets on behalf of the engine.
 *
 * The engine account is the implicit counterparty of every call. A `false`
 * return is a failed transfer; implementations may also throw.
 */
export interface AssetCustody {
	/** Pull `amount` of `asset` from `from` into engine custody. */
	transferFrom(asset: AssetId, from: AccountId, amount: bigint): boolean;

	/** Release `amount` of `asset` from engine custody to `to`. */
	transfer(asset: AssetId, to: AccountId, amount: bigint): boolean;

	balanceOf(asset: AssetId, holder: AccountId): bigint;
}
