import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { nanoid } from "nanoid";

import engineConfig from "../config/engine.config";
import {
	AccountId,
	AssetId,
	COLLATERAL_DEPOSITED_ID,
	COLLATERAL_REDEEMED_ID,
} from "../common/engine.event";
import { EngineError } from "../common/errors";
import {
	formatUnits,
	tokenAmountFromUsdOf,
	usdValueOf,
} from "../common/fixed-point";
import { requireAccount, requireMoreThanZero } from "../common/guards";
import { ASSET_CUSTODY, AssetCustody } from "../custody/asset-custody";
import { EngineTransaction } from "../engine/engine-transaction";
import { TransactionRunner } from "../engine/transaction-runner";
import { OraclePriceService } from "../oracle/oracle-price.service";
import {
	ASSET_REGISTRY,
	AssetRegistry,
	PriceFeedId,
} from "../registry/asset-registry";
import {
	LEDGER_STORE,
	LedgerView,
	TransactionalLedgerStore,
} from "./ledger-store";

/**
 * Per-user, per-asset collateral accounting and its USD valuation.
 */
@Injectable()
export class CollateralLedgerService {
	private readonly logger = new Logger(CollateralLedgerService.name);

	constructor(
		@Inject(LEDGER_STORE) private readonly store: TransactionalLedgerStore,
		@Inject(ASSET_REGISTRY) private readonly registry: AssetRegistry,
		@Inject(ASSET_CUSTODY) private readonly custody: AssetCustody,
		@Inject(engineConfig.KEY)
		private readonly config: ConfigType<typeof engineConfig>,
		private readonly prices: OraclePriceService,
		private readonly runner: TransactionRunner,
	) {}

	/**
	 * Credit `amount` of `asset` to the user's position and pull the funds
	 * into custody.
	 *
	 * @throws EngineError `TRANSFER_FAILED` when custody does not take the
	 * funds; the position is left untouched.
	 */
	deposit(user: AccountId, asset: AssetId, amount: bigint): void {
		this.runner.run("deposit", (tx) =>
			this.stageDeposit(tx, user, asset, amount),
		);
	}

	/**
	 * Debit `from`'s position and release the collateral to `to`. No health
	 * check is performed here.
	 */
	redeem(
		asset: AssetId,
		amount: bigint,
		from: AccountId,
		to: AccountId,
	): void {
		this.runner.run("redeem", (tx) =>
			this.stageRedeem(tx, asset, amount, from, to),
		);
	}

	stageDeposit(
		tx: EngineTransaction,
		user: AccountId,
		asset: AssetId,
		amount: bigint,
	): void {
		requireMoreThanZero(amount);
		requireAccount(user);
		this.registry.requireRegistered(asset);

		const balance = tx.view.collateralOf(user, asset) + amount;
		this.store.setCollateral(user, asset, balance);
		tx.emit({
			name: COLLATERAL_DEPOSITED_ID,
			payload: {
				eventId: nanoid(8),
				user,
				asset,
				amount,
				depositedAt: new Date().toISOString(),
			},
		});
		tx.stage({
			description: `pull ${asset} from ${user}`,
			execute: () => this.custody.transferFrom(asset, user, amount),
			compensate: () => this.custody.transfer(asset, user, amount),
			failure: (cause) =>
				new EngineError(
					`Custody transfer of ${asset} from ${user} failed`,
					"TRANSFER_FAILED",
					{ asset, from: user, to: this.config.engineAccount, amount },
					{ cause },
				),
		});
		this.logger.debug(
			`${user} deposits ${formatUnits(amount)} ${asset} (position ${formatUnits(balance)})`,
		);
	}

	stageRedeem(
		tx: EngineTransaction,
		asset: AssetId,
		amount: bigint,
		from: AccountId,
		to: AccountId,
	): void {
		requireMoreThanZero(amount);
		requireAccount(from, "from");
		requireAccount(to, "to");
		this.registry.requireRegistered(asset);

		const available = tx.view.collateralOf(from, asset);
		if (available < amount) {
			throw new EngineError(
				`${from} holds ${available} ${asset}, cannot redeem ${amount}`,
				"INSUFFICIENT_COLLATERAL",
				{ user: from, asset, available, requested: amount },
			);
		}
		this.store.setCollateral(from, asset, available - amount);
		tx.emit({
			name: COLLATERAL_REDEEMED_ID,
			payload: {
				eventId: nanoid(8),
				from,
				to,
				asset,
				amount,
				redeemedAt: new Date().toISOString(),
			},
		});
		tx.stage({
			description: `release ${asset} to ${to}`,
			execute: () => this.custody.transfer(asset, to, amount),
			failure: (cause) =>
				new EngineError(
					`Custody release of ${asset} to ${to} failed`,
					"TRANSFER_FAILED",
					{ asset, from: this.config.engineAccount, to, amount },
					{ cause },
				),
		});
		this.logger.debug(
			`${from} redeems ${formatUnits(amount)} ${asset} to ${to}`,
		);
	}

	/** Total USD value (18 decimals) of the user's collateral. */
	accountCollateralValueUsd(user: AccountId): bigint {
		return this.collateralValueUsdIn(this.runner.readView(), user);
	}

	collateralValueUsdIn(view: LedgerView, user: AccountId): bigint {
		let total = 0n;
		for (const asset of this.registry.registeredAssets()) {
			const amount = view.collateralOf(user, asset);
			total += this.usdValue(asset, amount);
		}
		return total;
	}

	usdValue(asset: AssetId, amount: bigint): bigint {
		return usdValueOf(this.prices.priceOf(asset), amount);
	}

	tokenAmountFromUsd(asset: AssetId, usdAmount: bigint): bigint {
		return tokenAmountFromUsdOf(this.prices.priceOf(asset), usdAmount);
	}

	collateralBalanceOfUser(asset: AssetId, user: AccountId): bigint {
		return this.runner.readView().collateralOf(user, asset);
	}

	registeredAssets(): readonly AssetId[] {
		return this.registry.registeredAssets();
	}

	priceFeedOf(asset: AssetId): PriceFeedId {
		return this.registry.priceFeedOf(asset);
	}
}
