/**
 * Ledger Store Types
 *
 * The engine keeps positions (collateral per user and asset) and accounts
 * (liability minted per user) behind these interfaces. Each engine instance
 * owns its store; nothing else writes to it.
 */

import { AccountId, AssetId } from "../common/engine.event";

export const LEDGER_STORE = Symbol("LEDGER_STORE");

/**
 * Read access to positions and accounts. Unknown keys read as zero.
 */
export interface LedgerView {
	collateralOf(user: AccountId, asset: AssetId): bigint;
	mintedOf(user: AccountId): bigint;
}

export interface LedgerStore extends LedgerView {
	/** Amounts are never negative; implementations reject them. */
	setCollateral(user: AccountId, asset: AssetId, amount: bigint): void;
	setMinted(user: AccountId, amount: bigint): void;
}

/**
 * Ledger store with all-or-nothing transactions.
 */
export interface TransactionalLedgerStore extends LedgerStore {
	/**
	 * Begin a transaction. Transactions do not nest.
	 */
	beginTransaction(): void;

	/**
	 * Commit the current transaction.
	 */
	commit(): void;

	/**
	 * Undo every write since {@link beginTransaction}.
	 */
	rollback(): void;

	inTransaction(): boolean;

	/**
	 * View of the state as of the last commit, unaffected by the writes of
	 * an open transaction.
	 */
	committed(): LedgerView;

	/**
	 * Execute a function within a transaction.
	 *
	 * If the function throws, the transaction is rolled back.
	 * Otherwise, it's committed.
	 */
	withTransaction<T>(fn: () => T): T;
}

/**
 * Error thrown by ledger store operations.
 */
export class LedgerStoreError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "LedgerStoreError";
	}
}
