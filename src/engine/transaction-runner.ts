import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";

import { EngineError, isEngineError, toError } from "../common/errors";
import {
	LEDGER_STORE,
	LedgerView,
	TransactionalLedgerStore,
} from "../ledger/ledger-store";
import { EngineTransaction } from "./engine-transaction";

/**
 * Executes each mutating engine operation as one atomic unit.
 *
 * Holds the execution lock for the whole call: any attempt to start another
 * operation before the current one returns (typically from a collaborator
 * callback) is rejected with `REENTRANT_CALL`. Events are published only
 * after the ledger commit.
 */
@Injectable()
export class TransactionRunner {
	private readonly logger = new Logger(TransactionRunner.name);
	private current: EngineTransaction | null = null;

	constructor(
		@Inject(LEDGER_STORE) private readonly store: TransactionalLedgerStore,
		private readonly events: EventEmitter2,
	) {}

	run<T>(operation: string, body: (tx: EngineTransaction) => T): T {
		if (this.current) {
			throw new EngineError(
				`${operation} cannot start while ${this.current.operation} is in progress`,
				"REENTRANT_CALL",
				{ operation, inProgress: this.current.operation },
			);
		}

		const tx = new EngineTransaction(operation, this.store);
		this.current = tx;
		let result: T;
		try {
			result = this.store.withTransaction(() => {
				const value = body(tx);
				tx.settle();
				return value;
			});
		} catch (err) {
			if (isEngineError(err, "ROLLBACK_INCOMPLETE")) {
				this.logger.error(
					`${operation} reverted with incomplete compensation`,
					{ details: err.details },
				);
			} else {
				const error = toError(err);
				const reason = isEngineError(error) ? error.code : error.message;
				this.logger.warn(`${operation} reverted: ${reason}`);
			}
			throw err;
		} finally {
			this.current = null;
		}

		this.logger.debug(`${operation} committed`);
		for (const event of tx.pendingEvents()) {
			try {
				this.events.emit(event.name, event.payload);
			} catch (cause) {
				this.logger.error(
					`Listener for ${event.name} failed after ${operation} committed`,
					toError(cause).stack,
				);
			}
		}
		return result;
	}

	get inProgress(): boolean {
		return this.current !== null;
	}

	/**
	 * State visible to public reads: while an operation is open only its
	 * committed predecessor state is observable.
	 */
	readView(): LedgerView {
		return this.current ? this.store.committed() : this.store;
	}
}
