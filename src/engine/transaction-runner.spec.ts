import { Test } from "@nestjs/testing";
import { EventEmitter2 } from "@nestjs/event-emitter";

import { COLLATERAL_DEPOSITED_ID } from "../common/engine.event";
import { EngineError } from "../common/errors";
import { LEDGER_STORE } from "../ledger/ledger-store";
import { MemoryLedgerStore } from "../ledger/memory-ledger-store";
import { Interaction } from "./engine-transaction";
import { TransactionRunner } from "./transaction-runner";

const failure = (cause?: unknown) =>
	new EngineError("transfer failed", "TRANSFER_FAILED", undefined, { cause });

describe("TransactionRunner", () => {
	let store: MemoryLedgerStore;
	let events: EventEmitter2;
	let runner: TransactionRunner;

	const deposited = {
		name: COLLATERAL_DEPOSITED_ID,
		payload: {
			eventId: "evt1",
			user: "alice",
			asset: "weth",
			amount: 5n,
			depositedAt: "2025-01-01T00:00:00.000Z",
		},
	} as const;

	beforeEach(async () => {
		store = new MemoryLedgerStore();
		events = new EventEmitter2();
		const moduleRef = await Test.createTestingModule({
			providers: [
				TransactionRunner,
				{ provide: LEDGER_STORE, useValue: store },
				{ provide: EventEmitter2, useValue: events },
			],
		}).compile();
		runner = moduleRef.get(TransactionRunner);
	});

	it("commits the body and publishes its events afterwards", () => {
		const seen: { inTransaction: boolean; collateral: bigint }[] = [];
		events.on(COLLATERAL_DEPOSITED_ID, () => {
			seen.push({
				inTransaction: store.inTransaction(),
				collateral: store.collateralOf("alice", "weth"),
			});
		});

		const result = runner.run("deposit", (tx) => {
			store.setCollateral("alice", "weth", 5n);
			tx.emit(deposited);
			expect(seen).toHaveLength(0);
			return "done";
		});

		expect(result).toBe("done");
		expect(seen).toEqual([{ inTransaction: false, collateral: 5n }]);
		expect(runner.inProgress).toBe(false);
	});

	it("rolls back and publishes nothing when the body throws", () => {
		const listener = jest.fn();
		events.on(COLLATERAL_DEPOSITED_ID, listener);

		expect(() =>
			runner.run("deposit", (tx) => {
				store.setCollateral("alice", "weth", 5n);
				tx.emit(deposited);
				throw new EngineError("nope", "HEALTH_FACTOR_BROKEN");
			}),
		).toThrow(expect.objectContaining({ code: "HEALTH_FACTOR_BROKEN" }));

		expect(store.collateralOf("alice", "weth")).toBe(0n);
		expect(listener).not.toHaveBeenCalled();
		expect(runner.inProgress).toBe(false);
	});

	it("rejects a nested run while an operation is in progress", () => {
		let nested: unknown;
		runner.run("outer", () => {
			try {
				runner.run("inner", () => store.setMinted("mallory", 1n));
			} catch (err) {
				nested = err;
			}
			store.setMinted("alice", 1n);
		});

		expect(nested).toBeInstanceOf(EngineError);
		expect(nested).toMatchObject({
			code: "REENTRANT_CALL",
			details: { operation: "inner", inProgress: "outer" },
		});
		expect(store.mintedOf("mallory")).toBe(0n);
		expect(store.mintedOf("alice")).toBe(1n);
	});

	it("shows only committed state to reads during an operation", () => {
		store.setMinted("alice", 3n);
		const observed = runner.run("mint", () => {
			store.setMinted("alice", 8n);
			return runner.readView().mintedOf("alice");
		});
		expect(observed).toBe(3n);
		expect(runner.readView().mintedOf("alice")).toBe(8n);
	});

	describe("interactions", () => {
		it("runs reversible interactions before the irreversible one", () => {
			const calls: string[] = [];
			runner.run("redeemForBurn", (tx) => {
				tx.stage({
					description: "release",
					execute: () => calls.push("release") > 0,
					failure,
				});
				tx.stage({
					description: "pull",
					execute: () => calls.push("pull") > 0,
					compensate: () => true,
					failure,
				});
			});
			expect(calls).toEqual(["pull", "release"]);
		});

		it("compensates completed interactions in reverse order on failure", () => {
			const calls: string[] = [];
			const step = (name: string, ok = true): Interaction => ({
				description: name,
				execute: () => {
					calls.push(name);
					return ok;
				},
				compensate: () => {
					calls.push(`undo ${name}`);
					return true;
				},
				failure,
			});

			expect(() =>
				runner.run("liquidate", (tx) => {
					store.setMinted("alice", 2n);
					tx.stage(step("a"));
					tx.stage(step("b"));
					tx.stage(step("c", false));
				}),
			).toThrow(expect.objectContaining({ code: "TRANSFER_FAILED" }));

			expect(calls).toEqual(["a", "b", "c", "undo b", "undo a"]);
			expect(store.mintedOf("alice")).toBe(0n);
		});

		it("wraps a thrown collaborator error as the failure cause", () => {
			const boom = new Error("custody offline");
			let caught: unknown;
			try {
				runner.run("deposit", (tx) => {
					tx.stage({
						description: "pull",
						execute: () => {
							throw boom;
						},
						compensate: () => true,
						failure,
					});
				});
			} catch (err) {
				caught = err;
			}
			expect(caught).toBeInstanceOf(EngineError);
			expect(caught).toMatchObject({ code: "TRANSFER_FAILED", cause: boom });
		});

		it("reports compensation that could not be completed", () => {
			let caught: unknown;
			try {
				runner.run("burn", (tx) => {
					tx.stage({
						description: "pull",
						execute: () => true,
						compensate: () => false,
						failure,
					});
					tx.stage({ description: "release", execute: () => false, failure });
				});
			} catch (err) {
				caught = err;
			}
			expect(caught).toMatchObject({
				code: "ROLLBACK_INCOMPLETE",
				details: { incomplete: [{ description: "pull" }] },
				cause: expect.objectContaining({ code: "TRANSFER_FAILED" }),
			});
		});

		it("refuses a second irreversible interaction", () => {
			expect(() =>
				runner.run("mint", (tx) => {
					tx.stage({ description: "issue", execute: () => true, failure });
					tx.stage({ description: "release", execute: () => true, failure });
				}),
			).toThrow("mint: only one irreversible interaction may be staged (release)");
		});
	});
});
