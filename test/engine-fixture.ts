import { Test, TestingModule } from "@nestjs/testing";
import { ConfigModule } from "@nestjs/config";
import { EventEmitter2, EventEmitterModule } from "@nestjs/event-emitter";

import engineConfig, { EngineConfig } from "../src/config/engine.config";
import { DEFAULT_RISK_POLICY, PRECISION } from "../src/common/fixed-point";
import { MemoryAssetCustody } from "../src/custody/memory-asset-custody";
import { EngineModule } from "../src/engine/engine.module";
import { CollateralLedgerService } from "../src/ledger/collateral-ledger.service";
import { LEDGER_STORE } from "../src/ledger/ledger-store";
import { MemoryLedgerStore } from "../src/ledger/memory-ledger-store";
import { MemoryLiabilityToken } from "../src/liability/memory-liability-token";
import { StaticPriceOracle } from "../src/oracle/static-price-oracle";
import { RiskEngineService } from "../src/risk/risk-engine.service";

export const ENGINE = "engine";
export const WETH = "weth";
export const WBTC = "wbtc";
export const ETH_USD = "eth-usd";
export const BTC_USD = "btc-usd";
export const NOW = 1_750_000_000;

export const ALICE = "alice";
export const BOB = "bob";

/** Whole units to an 18-decimal amount. */
export const units = (n: bigint): bigint => n * PRECISION;

/** Whole dollars to an 8-decimal oracle price. */
export const dollars = (n: bigint): bigint => n * 10n ** 8n;

export const TEST_CONFIG: EngineConfig = {
	engineAccount: ENGINE,
	collateralAssets: [
		{ asset: WETH, priceFeed: ETH_USD },
		{ asset: WBTC, priceFeed: BTC_USD },
	],
	...DEFAULT_RISK_POLICY,
	oracleTimeoutSeconds: 10_800,
};

export type EngineFixture = {
	moduleRef: TestingModule;
	ledger: CollateralLedgerService;
	engine: RiskEngineService;
	store: MemoryLedgerStore;
	events: EventEmitter2;
	oracle: StaticPriceOracle;
	custody: MemoryAssetCustody;
	token: MemoryLiabilityToken;
	clock: { now: number };
};

/**
 * Engine wired to in-memory collaborators. WETH is priced at $3,000 and
 * WBTC at $60,000; ALICE and BOB each hold 100 WETH and 10 WBTC outside
 * the engine.
 */
export async function createEngineFixture(
	config: Partial<EngineConfig> = {},
): Promise<EngineFixture> {
	const clock = { now: NOW };
	const oracle = new StaticPriceOracle(() => clock.now);
	oracle.setPrice(ETH_USD, dollars(3_000n));
	oracle.setPrice(BTC_USD, dollars(60_000n));

	const custody = new MemoryAssetCustody(ENGINE);
	const token = new MemoryLiabilityToken(ENGINE);
	for (const user of [ALICE, BOB]) {
		custody.fund(WETH, user, units(100n));
		custody.fund(WBTC, user, units(10n));
	}

	const moduleRef = await Test.createTestingModule({
		imports: [
			ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
			EventEmitterModule.forRoot(),
			EngineModule.register({
				oracle,
				custody,
				liabilityToken: token,
				clock: () => clock.now,
			}),
		],
	})
		.overrideProvider(engineConfig.KEY)
		.useValue({ ...TEST_CONFIG, ...config })
		.compile();

	return {
		moduleRef,
		ledger: moduleRef.get(CollateralLedgerService),
		engine: moduleRef.get(RiskEngineService),
		store: moduleRef.get<MemoryLedgerStore>(LEDGER_STORE),
		events: moduleRef.get(EventEmitter2),
		oracle,
		custody,
		token,
		clock,
	};
}
