export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

export type EngineErrorCode =
	// input validation
	| "AMOUNT_MUST_BE_MORE_THAN_ZERO"
	| "INVALID_ACCOUNT"
	| "ASSET_NOT_ALLOWED"
	| "INVALID_REGISTRY"
	// insufficient balance
	| "INSUFFICIENT_COLLATERAL"
	| "BURN_AMOUNT_EXCEEDS_MINTED"
	// collaborator failure
	| "TRANSFER_FAILED"
	| "MINT_FAILED"
	| "ROLLBACK_INCOMPLETE"
	// risk policy
	| "HEALTH_FACTOR_BROKEN"
	| "HEALTH_FACTOR_OK"
	| "HEALTH_FACTOR_NOT_IMPROVED"
	// oracle
	| "STALE_PRICE"
	| "INVALID_PRICE"
	// concurrency
	| "REENTRANT_CALL";

/**
 * Error thrown by every engine operation.
 *
 * A thrown `EngineError` always means the operation was reverted as a whole:
 * no ledger mutation and no event of that attempt survives.
 */
export class EngineError extends Error {
	constructor(
		message: string,
		public readonly code: EngineErrorCode,
		public readonly details?: Record<string, unknown>,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "EngineError";
	}
}

export function isEngineError(
	err: unknown,
	code?: EngineErrorCode,
): err is EngineError {
	return (
		err instanceof EngineError && (code === undefined || err.code === code)
	);
}
