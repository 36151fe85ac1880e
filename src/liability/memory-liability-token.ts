import { AccountId } from "../common/engine.event";
import { LiabilityToken } from "./liability-token";

export class LiabilityTokenError extends Error {
	constructor(
		message: string,
		public readonly code:
			| "MUST_BE_MORE_THAN_ZERO"
			| "BURN_AMOUNT_EXCEEDS_BALANCE"
			| "NOT_ZERO_ADDRESS"
			| "NOT_OWNER",
	) {
		super(message);
		this.name = "LiabilityTokenError";
	}
}

/**
 * In-memory fungible token whose issue and destroy calls are reserved to
 * a single owner account.
 *
 * The engine-facing {@link LiabilityToken} methods act as the owner. Other
 * holders move their balances with {@link MemoryLiabilityToken.transferBetween}.
 */
export class MemoryLiabilityToken implements LiabilityToken {
	private readonly balances = new Map<AccountId, bigint>();
	private supply = 0n;
	private failures = 0;

	constructor(private readonly owner: AccountId) {}

	/** Make the next `times` issue/transfer calls report failure. */
	failNext(times = 1): void {
		this.failures += times;
	}

	issue(to: AccountId, amount: bigint): boolean {
		return this.mintAs(this.owner, to, amount);
	}

	destroy(amount: bigint): void {
		this.burnAs(this.owner, amount);
	}

	transferFrom(from: AccountId, amount: bigint): boolean {
		return this.transferBetween(from, this.owner, amount);
	}

	transfer(to: AccountId, amount: bigint): boolean {
		return this.transferBetween(this.owner, to, amount);
	}

	balanceOf(holder: AccountId): bigint {
		return this.balances.get(holder) ?? 0n;
	}

	totalSupply(): bigint {
		return this.supply;
	}

	mintAs(caller: AccountId, to: AccountId, amount: bigint): boolean {
		this.requireOwner(caller);
		if (to.length === 0) {
			throw new LiabilityTokenError(
				"Cannot mint to an empty account",
				"NOT_ZERO_ADDRESS",
			);
		}
		if (amount <= 0n) {
			throw new LiabilityTokenError(
				"Amount must be more than zero",
				"MUST_BE_MORE_THAN_ZERO",
			);
		}
		if (this.consumeFailure()) {
			return false;
		}
		this.balances.set(to, this.balanceOf(to) + amount);
		this.supply += amount;
		return true;
	}

	burnAs(caller: AccountId, amount: bigint): void {
		this.requireOwner(caller);
		if (amount <= 0n) {
			throw new LiabilityTokenError(
				"Amount must be more than zero",
				"MUST_BE_MORE_THAN_ZERO",
			);
		}
		const balance = this.balanceOf(caller);
		if (balance < amount) {
			throw new LiabilityTokenError(
				`Burn amount ${amount} exceeds balance ${balance}`,
				"BURN_AMOUNT_EXCEEDS_BALANCE",
			);
		}
		this.balances.set(caller, balance - amount);
		this.supply -= amount;
	}

	transferBetween(from: AccountId, to: AccountId, amount: bigint): boolean {
		if (this.consumeFailure()) {
			return false;
		}
		if (amount < 0n || this.balanceOf(from) < amount) {
			return false;
		}
		this.balances.set(from, this.balanceOf(from) - amount);
		this.balances.set(to, this.balanceOf(to) + amount);
		return true;
	}

	private requireOwner(caller: AccountId): void {
		if (caller !== this.owner) {
			throw new LiabilityTokenError(
				`${caller} is not the token owner`,
				"NOT_OWNER",
			);
		}
	}

	private consumeFailure(): boolean {
		if (this.failures > 0) {
			this.failures--;
			return true;
		}
		return false;
	}
}
