import { AccountId, AssetId } from "../common/engine.event";
import { AssetCustody } from "./asset-custody";

export type CustodyTransfer = {
	kind: "transferFrom" | "transfer";
	asset: AssetId;
	from: AccountId;
	to: AccountId;
	amount: bigint;
};

/**
 * In-memory multi-asset balance sheet.
 *
 * Data is lost when the process exits. `onTransfer` runs inside every
 * transfer before balances move, the way a token callback would, and
 * `failNext` makes the next transfers report failure without moving funds.
 */
export class MemoryAssetCustody implements AssetCustody {
	private readonly balances = new Map<AssetId, Map<AccountId, bigint>>();
	private failures = 0;

	onTransfer?: (transfer: CustodyTransfer) => void;

	constructor(private readonly engineAccount: AccountId) {}

	/** Credit `holder` out of thin air. Test and bootstrap helper. */
	fund(asset: AssetId, holder: AccountId, amount: bigint): void {
		this.credit(asset, holder, amount);
	}

	failNext(times = 1): void {
		this.failures += times;
	}

	transferFrom(asset: AssetId, from: AccountId, amount: bigint): boolean {
		return this.move({
			kind: "transferFrom",
			asset,
			from,
			to: this.engineAccount,
			amount,
		});
	}

	transfer(asset: AssetId, to: AccountId, amount: bigint): boolean {
		return this.move({
			kind: "transfer",
			asset,
			from: this.engineAccount,
			to,
			amount,
		});
	}

	balanceOf(asset: AssetId, holder: AccountId): bigint {
		return this.balances.get(asset)?.get(holder) ?? 0n;
	}

	private move(transfer: CustodyTransfer): boolean {
		this.onTransfer?.(transfer);
		if (this.failures > 0) {
			this.failures--;
			return false;
		}
		if (transfer.amount < 0n) {
			return false;
		}
		if (this.balanceOf(transfer.asset, transfer.from) < transfer.amount) {
			return false;
		}
		this.credit(transfer.asset, transfer.from, -transfer.amount);
		this.credit(transfer.asset, transfer.to, transfer.amount);
		return true;
	}

	private credit(asset: AssetId, holder: AccountId, amount: bigint): void {
		let ledger = this.balances.get(asset);
		if (!ledger) {
			ledger = new Map();
			this.balances.set(asset, ledger);
		}
		ledger.set(holder, (ledger.get(holder) ?? 0n) + amount);
	}
}
