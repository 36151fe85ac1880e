import { AccountId } from "../common/engine.event";

export const LIABILITY_TOKEN = Symbol("LIABILITY_TOKEN");

/**
 * The USD-pegged liability token as seen from the engine.
 *
 * Issue and destroy authority belongs to the engine account; the token
 * ledger enforces that, the engine only checks results.
 */
export interface LiabilityToken {
	/** Mint `amount` to `to`. */
	issue(to: AccountId, amount: bigint): boolean;

	/** Destroy `amount` of the tokens held by the engine account. */
	destroy(amount: bigint): void;

	/** Pull `amount` from `from` into the engine account. */
	transferFrom(from: AccountId, amount: bigint): boolean;

	/** Send `amount` from the engine account to `to`. */
	transfer(to: AccountId, amount: bigint): boolean;

	balanceOf(holder: AccountId): bigint;

	totalSupply(): bigint;
}
