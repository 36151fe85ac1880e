/**
 * In-Memory Ledger Store
 *
 * Map-backed positions and accounts with a write journal for rollback.
 * Data is lost when the process exits.
 */

import { AccountId, AssetId } from "../common/engine.event";
import {
	LedgerStoreError,
	LedgerView,
	TransactionalLedgerStore,
} from "./ledger-store";

type JournalKey = string;

const positionKey = (user: AccountId, asset: AssetId): JournalKey =>
	`position:${user}:${asset}`;
const accountKey = (user: AccountId): JournalKey => `account:${user}`;

/**
 * In-memory ledger store.
 *
 * Writes inside a transaction record the value they replace, once per key,
 * so {@link rollback} and {@link committed} can reconstruct the last
 * committed state.
 *
 * @example
 * ```typescript
 * const store = new MemoryLedgerStore();
 *
 * store.withTransaction(() => {
 *   store.setCollateral("alice", "weth", 10n);
 *   store.setMinted("alice", 5n);
 * });
 *
 * store.collateralOf("alice", "weth"); // 10n
 * ```
 */
export class MemoryLedgerStore implements TransactionalLedgerStore {
	private readonly positions = new Map<AccountId, Map<AssetId, bigint>>();
	private readonly accounts = new Map<AccountId, bigint>();
	private journal: Map<JournalKey, () => void> | null = null;
	private journalReads: Map<JournalKey, bigint> | null = null;

	collateralOf(user: AccountId, asset: AssetId): bigint {
		return this.positions.get(user)?.get(asset) ?? 0n;
	}

	mintedOf(user: AccountId): bigint {
		return this.accounts.get(user) ?? 0n;
	}

	setCollateral(user: AccountId, asset: AssetId, amount: bigint): void {
		MemoryLedgerStore.requireNonNegative(amount, { user, asset });
		const key = positionKey(user, asset);
		if (this.journal && !this.journal.has(key)) {
			const previous = this.positions.get(user)?.get(asset);
			this.journalReads?.set(key, previous ?? 0n);
			this.journal.set(key, () => {
				const position = this.positions.get(user);
				if (previous === undefined) {
					position?.delete(asset);
					if (position?.size === 0) this.positions.delete(user);
				} else {
					position?.set(asset, previous);
				}
			});
		}
		let position = this.positions.get(user);
		if (!position) {
			position = new Map();
			this.positions.set(user, position);
		}
		position.set(asset, amount);
	}

	setMinted(user: AccountId, amount: bigint): void {
		MemoryLedgerStore.requireNonNegative(amount, { user });
		const key = accountKey(user);
		if (this.journal && !this.journal.has(key)) {
			const previous = this.accounts.get(user);
			this.journalReads?.set(key, previous ?? 0n);
			this.journal.set(key, () => {
				if (previous === undefined) {
					this.accounts.delete(user);
				} else {
					this.accounts.set(user, previous);
				}
			});
		}
		this.accounts.set(user, amount);
	}

	beginTransaction(): void {
		if (this.journal) {
			throw new LedgerStoreError(
				"A transaction is already open",
				"TRANSACTION_OPEN",
			);
		}
		this.journal = new Map();
		this.journalReads = new Map();
	}

	commit(): void {
		this.requireTransaction();
		this.journal = null;
		this.journalReads = null;
	}

	rollback(): void {
		const journal = this.requireTransaction();
		for (const undo of Array.from(journal.values()).reverse()) {
			undo();
		}
		this.journal = null;
		this.journalReads = null;
	}

	inTransaction(): boolean {
		return this.journal !== null;
	}

	committed(): LedgerView {
		return {
			collateralOf: (user, asset) =>
				this.journalReads?.get(positionKey(user, asset)) ??
				this.collateralOf(user, asset),
			mintedOf: (user) =>
				this.journalReads?.get(accountKey(user)) ?? this.mintedOf(user),
		};
	}

	withTransaction<T>(fn: () => T): T {
		this.beginTransaction();
		try {
			const result = fn();
			this.commit();
			return result;
		} catch (err) {
			this.rollback();
			throw err;
		}
	}

	/**
	 * Get all users holding a position or an account.
	 */
	users(): AccountId[] {
		return Array.from(
			new Set([...this.positions.keys(), ...this.accounts.keys()]),
		);
	}

	/**
	 * Clear all positions and accounts.
	 */
	clear(): void {
		if (this.journal) {
			throw new LedgerStoreError(
				"Cannot clear during a transaction",
				"TRANSACTION_OPEN",
			);
		}
		this.positions.clear();
		this.accounts.clear();
	}

	private requireTransaction(): Map<JournalKey, () => void> {
		if (!this.journal) {
			throw new LedgerStoreError("No transaction is open", "NO_TRANSACTION");
		}
		return this.journal;
	}

	private static requireNonNegative(
		amount: bigint,
		details: Record<string, string>,
	): void {
		if (amount < 0n) {
			throw new LedgerStoreError(
				`Ledger amounts cannot be negative (${amount})`,
				"NEGATIVE_AMOUNT",
				details,
			);
		}
	}
}
