import { DynamicModule, Logger, Module } from "@nestjs/common";
import { ConfigModule, ConfigType } from "@nestjs/config";

import engineConfig, { EngineConfig } from "../config/engine.config";
import { ASSET_CUSTODY, AssetCustody } from "../custody/asset-custody";
import { CollateralLedgerService } from "../ledger/collateral-ledger.service";
import { LEDGER_STORE } from "../ledger/ledger-store";
import { MemoryLedgerStore } from "../ledger/memory-ledger-store";
import { LIABILITY_TOKEN, LiabilityToken } from "../liability/liability-token";
import { OraclePriceService } from "../oracle/oracle-price.service";
import {
	CLOCK,
	Clock,
	PRICE_ORACLE,
	PriceOracle,
	systemClock,
} from "../oracle/price-oracle";
import { ASSET_REGISTRY, AssetRegistry } from "../registry/asset-registry";
import { RiskEngineService } from "../risk/risk-engine.service";
import { TransactionRunner } from "./transaction-runner";

export interface EngineModuleOptions {
	oracle: PriceOracle;
	custody: AssetCustody;
	liabilityToken: LiabilityToken;
	/** Defaults to the system clock */
	clock?: Clock;
}

export const ENGINE_OPTIONS = Symbol("ENGINE_OPTIONS");

export type EngineModuleOptionsFactory = (
	config: EngineConfig,
) => EngineModuleOptions;

/**
 * One engine instance: its own ledger store, registry and execution lock.
 * Requires `EventEmitterModule.forRoot()` in the importing application.
 */
@Module({})
export class EngineModule {
	static register(
		options: EngineModuleOptions | EngineModuleOptionsFactory,
	): DynamicModule {
		return {
			module: EngineModule,
			imports: [ConfigModule.forFeature(engineConfig)],
			providers: [
				{
					provide: ENGINE_OPTIONS,
					inject: [engineConfig.KEY],
					useFactory: (cfg: ConfigType<typeof engineConfig>) =>
						typeof options === "function" ? options(cfg) : options,
				},
				{
					provide: PRICE_ORACLE,
					inject: [ENGINE_OPTIONS],
					useFactory: (o: EngineModuleOptions) => o.oracle,
				},
				{
					provide: ASSET_CUSTODY,
					inject: [ENGINE_OPTIONS],
					useFactory: (o: EngineModuleOptions) => o.custody,
				},
				{
					provide: LIABILITY_TOKEN,
					inject: [ENGINE_OPTIONS],
					useFactory: (o: EngineModuleOptions) => o.liabilityToken,
				},
				{
					provide: CLOCK,
					inject: [ENGINE_OPTIONS],
					useFactory: (o: EngineModuleOptions): Clock => o.clock ?? systemClock,
				},
				{ provide: LEDGER_STORE, useFactory: () => new MemoryLedgerStore() },
				{
					provide: ASSET_REGISTRY,
					inject: [engineConfig.KEY],
					useFactory: (cfg: ConfigType<typeof engineConfig>) => {
						const registry = AssetRegistry.fromEntries(cfg.collateralAssets);
						Logger.log(
							`Collateral assets: ${cfg.collateralAssets.map((e) => `${e.asset}=${e.priceFeed}`).join(", ")}`,
							EngineModule.name,
						);
						return registry;
					},
				},
				OraclePriceService,
				TransactionRunner,
				CollateralLedgerService,
				RiskEngineService,
			],
			exports: [
				CollateralLedgerService,
				RiskEngineService,
				ASSET_REGISTRY,
				LEDGER_STORE,
			],
		};
	}
}
