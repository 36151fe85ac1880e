import { EngineEvent } from "../common/engine.event";
import { EngineError } from "../common/errors";
import { LedgerView } from "../ledger/ledger-store";

/**
 * A call into an external collaborator, staged until the operation body has
 * finished all of its ledger writes and risk checks.
 */
export type Interaction = {
	description: string;
	execute: () => boolean;
	/**
	 * Reverses a successful `execute`. Omitted only for the outward push of an
	 * operation (a release or an issuance to a user), which always runs last.
	 */
	compensate?: () => boolean;
	failure: (cause?: unknown) => EngineError;
};

export class EngineTransaction {
	private readonly interactions: Interaction[] = [];
	private readonly events: EngineEvent[] = [];

	constructor(
		readonly operation: string,
		readonly view: LedgerView,
	) {}

	stage(interaction: Interaction): void {
		if (
			!interaction.compensate &&
			this.interactions.some((staged) => !staged.compensate)
		) {
			throw new Error(
				`${this.operation}: only one irreversible interaction may be staged (${interaction.description})`,
			);
		}
		this.interactions.push(interaction);
	}

	emit(event: EngineEvent): void {
		this.events.push(event);
	}

	pendingEvents(): readonly EngineEvent[] {
		return this.events;
	}

	/**
	 * Run the staged interactions, reversible ones first. On the first failure
	 * the completed ones are compensated in reverse order and the failure is
	 * thrown.
	 */
	settle(): void {
		const ordered = [
			...this.interactions.filter((i) => i.compensate),
			...this.interactions.filter((i) => !i.compensate),
		];
		const completed: Interaction[] = [];
		for (const interaction of ordered) {
			let succeeded = false;
			let cause: unknown;
			try {
				succeeded = interaction.execute();
			} catch (err) {
				cause = err;
			}
			if (!succeeded) {
				const failure = interaction.failure(cause);
				EngineTransaction.compensate(completed, failure);
				throw failure;
			}
			completed.push(interaction);
		}
	}

	private static compensate(
		completed: readonly Interaction[],
		failure: EngineError,
	): void {
		const incomplete: { description: string; cause?: unknown }[] = [];
		for (const interaction of [...completed].reverse()) {
			try {
				if (interaction.compensate && !interaction.compensate()) {
					incomplete.push({ description: interaction.description });
				}
			} catch (cause) {
				incomplete.push({ description: interaction.description, cause });
			}
		}
		if (incomplete.length > 0) {
			throw new EngineError(
				`Could not reverse ${incomplete.length} interaction(s) after ${failure.code}`,
				"ROLLBACK_INCOMPLETE",
				{ incomplete },
				{ cause: failure },
			);
		}
	}
}
