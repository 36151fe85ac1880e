import { registerAs } from "@nestjs/config";
import {
	IsNotEmpty,
	IsNumberString,
	IsString,
	Matches,
	validateSync,
} from "class-validator";

import { RiskPolicy } from "../common/fixed-point";

export type CollateralAssetEntry = {
	asset: string;
	priceFeed: string;
};

export type EngineConfig = RiskPolicy & {
	engineAccount: string;
	collateralAssets: CollateralAssetEntry[];
	oracleTimeoutSeconds: number;
};

const ASSET_LIST_PATTERN = /^[^:,\s]+:[^:,\s]+(,[^:,\s]+:[^:,\s]+)*$/;

export class EngineEnvironment {
	@IsString()
	@IsNotEmpty()
	ENGINE_ACCOUNT = "engine";

	@Matches(ASSET_LIST_PATTERN, {
		message:
			"ENGINE_COLLATERAL_ASSETS must be a comma separated list of asset:feed pairs",
	})
	ENGINE_COLLATERAL_ASSETS = "weth:eth-usd,wbtc:btc-usd";

	@IsNumberString({ no_symbols: true })
	ENGINE_LIQUIDATION_THRESHOLD = "50";

	@IsNumberString({ no_symbols: true })
	ENGINE_LIQUIDATION_BONUS = "10";

	@IsNumberString({ no_symbols: true })
	ENGINE_LIQUIDATION_PRECISION = "100";

	@IsNumberString({ no_symbols: true })
	ENGINE_MIN_HEALTH_FACTOR = "1000000000000000000";

	@IsNumberString({ no_symbols: true })
	ENGINE_ORACLE_TIMEOUT_SECONDS = "10800"; // 3 hours
}

type EnvSource = Record<string, string | undefined>;

export function parseEngineConfig(env: EnvSource): EngineConfig {
	const environment = new EngineEnvironment();
	for (const key of Object.keys(environment)) {
		const value = env[key];
		if (value !== undefined && value !== "") {
			Reflect.set(environment, key, value);
		}
	}

	const errors = validateSync(environment);
	if (errors.length > 0) {
		const violations = errors.flatMap((e) =>
			Object.values(e.constraints ?? {}),
		);
		throw new Error(`Invalid engine configuration: ${violations.join("; ")}`);
	}

	const liquidationPrecision = BigInt(environment.ENGINE_LIQUIDATION_PRECISION);
	if (liquidationPrecision === 0n) {
		throw new Error(
			"Invalid engine configuration: ENGINE_LIQUIDATION_PRECISION must be positive",
		);
	}

	return {
		engineAccount: environment.ENGINE_ACCOUNT,
		collateralAssets: environment.ENGINE_COLLATERAL_ASSETS.split(",").map(
			(pair) => {
				const [asset, priceFeed] = pair.split(":");
				return { asset, priceFeed };
			},
		),
		liquidationThreshold: BigInt(environment.ENGINE_LIQUIDATION_THRESHOLD),
		liquidationBonus: BigInt(environment.ENGINE_LIQUIDATION_BONUS),
		liquidationPrecision,
		minHealthFactor: BigInt(environment.ENGINE_MIN_HEALTH_FACTOR),
		oracleTimeoutSeconds: Number(environment.ENGINE_ORACLE_TIMEOUT_SECONDS),
	};
}

export default registerAs("engine", (): EngineConfig =>
	parseEngineConfig(process.env),
);
