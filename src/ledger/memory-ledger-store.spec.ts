import { LedgerStoreError } from "./ledger-store";
import { MemoryLedgerStore } from "./memory-ledger-store";

describe("MemoryLedgerStore", () => {
	let store: MemoryLedgerStore;

	beforeEach(() => {
		store = new MemoryLedgerStore();
	});

	it("reads unknown positions and accounts as zero", () => {
		expect(store.collateralOf("alice", "weth")).toBe(0n);
		expect(store.mintedOf("alice")).toBe(0n);
		expect(store.users()).toEqual([]);
	});

	it("commits writes made inside withTransaction", () => {
		store.withTransaction(() => {
			store.setCollateral("alice", "weth", 10n);
			store.setMinted("alice", 5n);
		});
		expect(store.collateralOf("alice", "weth")).toBe(10n);
		expect(store.mintedOf("alice")).toBe(5n);
		expect(store.inTransaction()).toBe(false);
	});

	it("rolls back every write when the function throws", () => {
		store.setCollateral("alice", "weth", 10n);
		expect(() =>
			store.withTransaction(() => {
				store.setCollateral("alice", "weth", 3n);
				store.setCollateral("alice", "weth", 1n);
				store.setCollateral("bob", "wbtc", 7n);
				store.setMinted("bob", 2n);
				throw new Error("boom");
			}),
		).toThrow("boom");

		expect(store.collateralOf("alice", "weth")).toBe(10n);
		expect(store.collateralOf("bob", "wbtc")).toBe(0n);
		expect(store.mintedOf("bob")).toBe(0n);
		expect(store.users()).toEqual(["alice"]);
	});

	it("exposes the last committed state while a transaction is open", () => {
		store.setMinted("alice", 4n);
		store.beginTransaction();
		store.setMinted("alice", 9n);
		store.setCollateral("alice", "weth", 1n);

		const committed = store.committed();
		expect(committed.mintedOf("alice")).toBe(4n);
		expect(committed.collateralOf("alice", "weth")).toBe(0n);
		expect(store.mintedOf("alice")).toBe(9n);

		store.commit();
		expect(store.committed().mintedOf("alice")).toBe(9n);
	});

	it("rejects negative amounts", () => {
		expect(() => store.setCollateral("alice", "weth", -1n)).toThrow(
			LedgerStoreError,
		);
		expect(() => store.setMinted("alice", -1n)).toThrow(
			expect.objectContaining({ code: "NEGATIVE_AMOUNT" }),
		);
	});

	it("does not nest transactions", () => {
		store.beginTransaction();
		expect(() => store.beginTransaction()).toThrow(
			expect.objectContaining({ code: "TRANSACTION_OPEN" }),
		);
		store.rollback();
		expect(() => store.commit()).toThrow(
			expect.objectContaining({ code: "NO_TRANSACTION" }),
		);
	});

	it("clears all state outside a transaction", () => {
		store.setMinted("alice", 1n);
		store.clear();
		expect(store.mintedOf("alice")).toBe(0n);
	});
});
