import { AccountId } from "./engine.event";
import { EngineError } from "./errors";

export function requireMoreThanZero(amount: bigint, field = "amount"): void {
	if (amount <= 0n) {
		throw new EngineError(
			`${field} must be more than zero`,
			"AMOUNT_MUST_BE_MORE_THAN_ZERO",
			{ field, amount },
		);
	}
}

export function requireAccount(account: AccountId, field = "user"): void {
	if (account.trim().length === 0) {
		throw new EngineError(`${field} must not be empty`, "INVALID_ACCOUNT", {
			field,
		});
	}
}
