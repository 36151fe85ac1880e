import { CustodyTransfer, MemoryAssetCustody } from "./memory-asset-custody";

describe("MemoryAssetCustody", () => {
	let custody: MemoryAssetCustody;

	beforeEach(() => {
		custody = new MemoryAssetCustody("engine");
		custody.fund("weth", "alice", 10n);
	});

	it("pulls into and releases from the engine account", () => {
		expect(custody.transferFrom("weth", "alice", 4n)).toBe(true);
		expect(custody.transfer("weth", "bob", 1n)).toBe(true);

		expect(custody.balanceOf("weth", "alice")).toBe(6n);
		expect(custody.balanceOf("weth", "engine")).toBe(3n);
		expect(custody.balanceOf("weth", "bob")).toBe(1n);
	});

	it("refuses to move more than the sender holds", () => {
		expect(custody.transferFrom("weth", "alice", 11n)).toBe(false);
		expect(custody.transfer("weth", "alice", 1n)).toBe(false);
		expect(custody.balanceOf("weth", "alice")).toBe(10n);
	});

	it("keeps assets apart", () => {
		expect(custody.transferFrom("wbtc", "alice", 1n)).toBe(false);
	});

	it("calls the transfer hook before funds move, even for failures", () => {
		const seen: { transfer: CustodyTransfer; balance: bigint }[] = [];
		custody.onTransfer = (transfer) =>
			seen.push({ transfer, balance: custody.balanceOf("weth", "alice") });
		custody.failNext();

		expect(custody.transferFrom("weth", "alice", 2n)).toBe(false);
		expect(custody.transferFrom("weth", "alice", 2n)).toBe(true);

		expect(seen).toEqual([
			{
				transfer: {
					kind: "transferFrom",
					asset: "weth",
					from: "alice",
					to: "engine",
					amount: 2n,
				},
				balance: 10n,
			},
			{
				transfer: {
					kind: "transferFrom",
					asset: "weth",
					from: "alice",
					to: "engine",
					amount: 2n,
				},
				balance: 10n,
			},
		]);
		expect(custody.balanceOf("weth", "alice")).toBe(8n);
	});
});
