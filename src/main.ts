import "reflect-metadata";
import "dotenv/config";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { AppModule } from "./app.module";
import { RiskEngineService } from "./risk/risk-engine.service";

async function bootstrap() {
	const app = await NestFactory.createApplicationContext(AppModule);
	app.enableShutdownHooks();

	const engine = app.get(RiskEngineService);
	Logger.log(
		`Engine ready: custody account ${engine.engineAccount()}, liquidation threshold ${engine.liquidationThreshold()}/${engine.liquidationPrecision()}, bonus ${engine.liquidationBonus()}/${engine.liquidationPrecision()}`,
		"Bootstrap",
	);
}

bootstrap().catch((err: unknown) => {
	Logger.error("Engine failed to start", err instanceof Error ? err.stack : err);
	process.exitCode = 1;
});
