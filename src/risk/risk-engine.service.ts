import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { nanoid } from "nanoid";

import engineConfig from "../config/engine.config";
import {
	AccountId,
	AssetId,
	LIABILITY_BURNED_ID,
	LIABILITY_MINTED_ID,
	POSITION_LIQUIDATED_ID,
} from "../common/engine.event";
import { EngineError } from "../common/errors";
import {
	ADDITIONAL_FEED_PRECISION,
	PRECISION,
	RiskPolicy,
	formatUnits,
	healthFactorOf,
	isHealthy,
	liquidationBonusOf,
} from "../common/fixed-point";
import { requireAccount, requireMoreThanZero } from "../common/guards";
import { EngineTransaction } from "../engine/engine-transaction";
import { TransactionRunner } from "../engine/transaction-runner";
import { CollateralLedgerService } from "../ledger/collateral-ledger.service";
import {
	LEDGER_STORE,
	LedgerView,
	TransactionalLedgerStore,
} from "../ledger/ledger-store";
import { LIABILITY_TOKEN, LiabilityToken } from "../liability/liability-token";
import { ASSET_REGISTRY, AssetRegistry } from "../registry/asset-registry";

export type AccountInformation = {
	/** Liability minted, 18 decimals */
	minted: bigint;
	/** Collateral value in USD, 18 decimals */
	collateralValueUsd: bigint;
};

export type LiquidationResult = {
	collateralSeized: bigint;
	bonusCollateral: bigint;
	healthFactorBefore: bigint;
	healthFactorAfter: bigint;
};

/**
 * Liability accounting, health factor policy and liquidation.
 *
 * Every public mutating method is one atomic operation: ledger writes and
 * risk checks happen first, collaborator calls are settled last, and any
 * failure leaves no trace in the ledger.
 */
@Injectable()
export class RiskEngineService {
	private readonly logger = new Logger(RiskEngineService.name);
	private readonly policy: RiskPolicy;

	constructor(
		@Inject(LEDGER_STORE) private readonly store: TransactionalLedgerStore,
		@Inject(ASSET_REGISTRY) private readonly registry: AssetRegistry,
		@Inject(LIABILITY_TOKEN) private readonly token: LiabilityToken,
		@Inject(engineConfig.KEY)
		private readonly config: ConfigType<typeof engineConfig>,
		private readonly ledger: CollateralLedgerService,
		private readonly runner: TransactionRunner,
	) {
		this.policy = {
			liquidationThreshold: config.liquidationThreshold,
			liquidationBonus: config.liquidationBonus,
			liquidationPrecision: config.liquidationPrecision,
			minHealthFactor: config.minHealthFactor,
		};
	}

	mint(user: AccountId, amount: bigint): void {
		this.runner.run("mint", (tx) => this.stageMint(tx, user, amount));
	}

	/**
	 * Reduce `onBehalfOf`'s debt by `amount`, destroying the same amount of
	 * tokens taken from `payer`.
	 */
	burn(amount: bigint, onBehalfOf: AccountId, payer: AccountId): void {
		this.runner.run("burn", (tx) =>
			this.stageBurn(tx, amount, onBehalfOf, payer),
		);
	}

	/** Burn the caller's own debt with the caller's own tokens. */
	burnLiability(user: AccountId, amount: bigint): void {
		this.runner.run("burnLiability", (tx) => {
			this.stageBurn(tx, amount, user, user);
			this.requireHealthy(tx.view, user);
		});
	}

	/** Withdraw own collateral, keeping the health factor above minimum. */
	redeemCollateral(user: AccountId, asset: AssetId, amount: bigint): void {
		this.runner.run("redeemCollateral", (tx) => {
			this.ledger.stageRedeem(tx, asset, amount, user, user);
			this.requireHealthy(tx.view, user);
		});
	}

	depositAndMint(
		user: AccountId,
		asset: AssetId,
		amountCollateral: bigint,
		amountLiability: bigint,
	): void {
		this.runner.run("depositAndMint", (tx) => {
			this.ledger.stageDeposit(tx, user, asset, amountCollateral);
			this.stageMint(tx, user, amountLiability);
		});
	}

	redeemForBurn(
		user: AccountId,
		asset: AssetId,
		amountCollateral: bigint,
		amountLiability: bigint,
	): void {
		this.runner.run("redeemForBurn", (tx) => {
			this.stageBurn(tx, amountLiability, user, user);
			this.ledger.stageRedeem(tx, asset, amountCollateral, user, user);
			this.requireHealthy(tx.view, user);
		});
	}

	/**
	 * Cover `debtToCover` of an unhealthy user's debt with the liquidator's
	 * tokens, in exchange for the equivalent collateral plus the liquidation
	 * bonus.
	 *
	 * @throws EngineError `HEALTH_FACTOR_OK` if the user is not liquidatable,
	 * `HEALTH_FACTOR_NOT_IMPROVED` if the user ends no healthier, and
	 * `HEALTH_FACTOR_BROKEN` if the liquidator is left below minimum.
	 */
	liquidate(
		liquidator: AccountId,
		asset: AssetId,
		user: AccountId,
		debtToCover: bigint,
	): LiquidationResult {
		return this.runner.run("liquidate", (tx) => {
			requireMoreThanZero(debtToCover, "debtToCover");
			requireAccount(liquidator, "liquidator");
			requireAccount(user);
			this.registry.requireRegistered(asset);

			const healthFactorBefore = this.healthFactorIn(tx.view, user);
			if (isHealthy(healthFactorBefore, this.policy)) {
				throw new EngineError(
					`${user} is healthy and cannot be liquidated`,
					"HEALTH_FACTOR_OK",
					{ user, healthFactor: healthFactorBefore },
				);
			}

			const tokenAmountFromDebtCovered = this.ledger.tokenAmountFromUsd(
				asset,
				debtToCover,
			);
			const bonusCollateral = liquidationBonusOf(
				tokenAmountFromDebtCovered,
				this.policy,
			);
			const collateralSeized = tokenAmountFromDebtCovered + bonusCollateral;

			// dust debt can convert to no collateral; the debt is still burned
			if (collateralSeized > 0n) {
				this.ledger.stageRedeem(
					tx,
					asset,
					collateralSeized,
					user,
					liquidator,
				);
			}
			this.stageBurn(tx, debtToCover, user, liquidator);

			const healthFactorAfter = this.healthFactorIn(tx.view, user);
			if (healthFactorAfter <= healthFactorBefore) {
				throw new EngineError(
					`Liquidation of ${user} did not improve the health factor`,
					"HEALTH_FACTOR_NOT_IMPROVED",
					{ user, healthFactorBefore, healthFactorAfter },
				);
			}
			this.requireHealthy(tx.view, liquidator);

			tx.emit({
				name: POSITION_LIQUIDATED_ID,
				payload: {
					eventId: nanoid(8),
					liquidator,
					user,
					asset,
					debtCovered: debtToCover,
					collateralSeized,
					healthFactorBefore,
					healthFactorAfter,
					liquidatedAt: new Date().toISOString(),
				},
			});
			this.logger.log(
				`${liquidator} liquidates ${user}: covers ${formatUnits(debtToCover)} debt for ${formatUnits(collateralSeized)} ${asset}, health ${formatUnits(healthFactorBefore)} -> ${formatUnits(healthFactorAfter)}`,
			);
			return {
				collateralSeized,
				bonusCollateral,
				healthFactorBefore,
				healthFactorAfter,
			};
		});
	}

	healthFactor(user: AccountId): bigint {
		return this.healthFactorIn(this.runner.readView(), user);
	}

	accountInformation(user: AccountId): AccountInformation {
		const view = this.runner.readView();
		return {
			minted: view.mintedOf(user),
			collateralValueUsd: this.ledger.collateralValueUsdIn(view, user),
		};
	}

	calculateHealthFactor(minted: bigint, collateralValueUsd: bigint): bigint {
		return healthFactorOf(minted, collateralValueUsd, this.policy);
	}

	precision(): bigint {
		return PRECISION;
	}

	additionalFeedPrecision(): bigint {
		return ADDITIONAL_FEED_PRECISION;
	}

	liquidationThreshold(): bigint {
		return this.policy.liquidationThreshold;
	}

	liquidationBonus(): bigint {
		return this.policy.liquidationBonus;
	}

	liquidationPrecision(): bigint {
		return this.policy.liquidationPrecision;
	}

	minHealthFactor(): bigint {
		return this.policy.minHealthFactor;
	}

	engineAccount(): AccountId {
		return this.config.engineAccount;
	}

	private stageMint(tx: EngineTransaction, user: AccountId, amount: bigint) {
		requireMoreThanZero(amount);
		requireAccount(user);

		this.store.setMinted(user, tx.view.mintedOf(user) + amount);
		this.requireHealthy(tx.view, user);

		tx.emit({
			name: LIABILITY_MINTED_ID,
			payload: {
				eventId: nanoid(8),
				user,
				amount,
				mintedAt: new Date().toISOString(),
			},
		});
		tx.stage({
			description: `issue liability to ${user}`,
			execute: () => this.token.issue(user, amount),
			failure: (cause) =>
				new EngineError(
					`Issuing ${amount} liability to ${user} failed`,
					"MINT_FAILED",
					{ user, amount },
					{ cause },
				),
		});
		this.logger.debug(`${user} mints ${formatUnits(amount)}`);
	}

	private stageBurn(
		tx: EngineTransaction,
		amount: bigint,
		onBehalfOf: AccountId,
		payer: AccountId,
	) {
		requireMoreThanZero(amount);
		requireAccount(onBehalfOf, "onBehalfOf");
		requireAccount(payer, "payer");

		const minted = tx.view.mintedOf(onBehalfOf);
		if (minted < amount) {
			throw new EngineError(
				`${onBehalfOf} has minted ${minted}, cannot burn ${amount}`,
				"BURN_AMOUNT_EXCEEDS_MINTED",
				{ user: onBehalfOf, minted, requested: amount },
			);
		}
		this.store.setMinted(onBehalfOf, minted - amount);

		tx.emit({
			name: LIABILITY_BURNED_ID,
			payload: {
				eventId: nanoid(8),
				onBehalfOf,
				payer,
				amount,
				burnedAt: new Date().toISOString(),
			},
		});
		tx.stage({
			description: `pull liability from ${payer}`,
			execute: () => this.token.transferFrom(payer, amount),
			compensate: () => this.token.transfer(payer, amount),
			failure: (cause) =>
				new EngineError(
					`Pulling ${amount} liability from ${payer} failed`,
					"TRANSFER_FAILED",
					{ from: payer, to: this.config.engineAccount, amount },
					{ cause },
				),
		});
		tx.stage({
			description: "destroy pulled liability",
			execute: () => {
				this.token.destroy(amount);
				return true;
			},
			compensate: () => this.token.issue(this.config.engineAccount, amount),
			failure: (cause) =>
				new EngineError(
					`Destroying ${amount} liability failed`,
					"TRANSFER_FAILED",
					{ amount },
					{ cause },
				),
		});
		this.logger.debug(
			`${payer} burns ${formatUnits(amount)} on behalf of ${onBehalfOf}`,
		);
	}

	private healthFactorIn(view: LedgerView, user: AccountId): bigint {
		return healthFactorOf(
			view.mintedOf(user),
			this.ledger.collateralValueUsdIn(view, user),
			this.policy,
		);
	}

	private requireHealthy(view: LedgerView, user: AccountId): void {
		const healthFactor = this.healthFactorIn(view, user);
		if (!isHealthy(healthFactor, this.policy)) {
			throw new EngineError(
				`Health factor of ${user} would fall to ${formatUnits(healthFactor)}`,
				"HEALTH_FACTOR_BROKEN",
				{
					user,
					healthFactor,
					minHealthFactor: this.policy.minHealthFactor,
				},
			);
		}
	}
}
