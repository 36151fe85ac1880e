/**
 * Collateral Engine
 *
 * Over-collateralized synthetic-asset accounting: collateral positions,
 * liability accounts, health factor policy and liquidation.
 *
 * @example
 * ```typescript
 * @Module({
 *   imports: [
 *     ConfigModule.forRoot({ isGlobal: true }),
 *     EventEmitterModule.forRoot(),
 *     EngineModule.register(({ engineAccount }) => ({
 *       oracle: myOracle,
 *       custody: myCustody,
 *       liabilityToken: myToken,
 *     })),
 *   ],
 * })
 * class AppModule {}
 *
 * const engine = app.get(RiskEngineService);
 * engine.depositAndMint("alice", "weth", 10n * PRECISION, 7_500n * PRECISION);
 * ```
 */

// Errors and events
export {
	type EngineErrorCode,
	EngineError,
	isEngineError,
	toError,
} from "./common/errors";
export * from "./common/engine.event";

// Fixed-point math
export {
	type RiskPolicy,
	PRECISION,
	ADDITIONAL_FEED_PRECISION,
	HEALTH_FACTOR_INFINITE,
	DEFAULT_RISK_POLICY,
	usdValueOf,
	tokenAmountFromUsdOf,
	healthFactorOf,
	liquidationBonusOf,
	isHealthy,
	formatUnits,
} from "./common/fixed-point";

// Configuration
export {
	default as engineConfig,
	type EngineConfig,
	type CollateralAssetEntry,
	EngineEnvironment,
	parseEngineConfig,
} from "./config/engine.config";

// Registry
export {
	type PriceFeedId,
	ASSET_REGISTRY,
	AssetRegistry,
} from "./registry/asset-registry";

// Collaborators
export {
	type PriceOracle,
	type PriceReading,
	type Clock,
	PRICE_ORACLE,
	CLOCK,
	systemClock,
} from "./oracle/price-oracle";
export { StaticPriceOracle } from "./oracle/static-price-oracle";
export { OraclePriceService } from "./oracle/oracle-price.service";
export { type AssetCustody, ASSET_CUSTODY } from "./custody/asset-custody";
export {
	type CustodyTransfer,
	MemoryAssetCustody,
} from "./custody/memory-asset-custody";
export {
	type LiabilityToken,
	LIABILITY_TOKEN,
} from "./liability/liability-token";
export {
	LiabilityTokenError,
	MemoryLiabilityToken,
} from "./liability/memory-liability-token";

// Ledger
export {
	type LedgerView,
	type LedgerStore,
	type TransactionalLedgerStore,
	LEDGER_STORE,
	LedgerStoreError,
} from "./ledger/ledger-store";
export { MemoryLedgerStore } from "./ledger/memory-ledger-store";
export { CollateralLedgerService } from "./ledger/collateral-ledger.service";

// Engine
export {
	type Interaction,
	EngineTransaction,
} from "./engine/engine-transaction";
export { TransactionRunner } from "./engine/transaction-runner";
export {
	type EngineModuleOptions,
	type EngineModuleOptionsFactory,
	ENGINE_OPTIONS,
	EngineModule,
} from "./engine/engine.module";
export {
	type AccountInformation,
	type LiquidationResult,
	RiskEngineService,
} from "./risk/risk-engine.service";
