import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { MemoryAssetCustody } from "./custody/memory-asset-custody";
import { EngineModule } from "./engine/engine.module";
import { MemoryLiabilityToken } from "./liability/memory-liability-token";
import { StaticPriceOracle } from "./oracle/static-price-oracle";

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true }),
		EventEmitterModule.forRoot(),
		EngineModule.register(({ engineAccount }) => ({
			oracle: new StaticPriceOracle(),
			custody: new MemoryAssetCustody(engineAccount),
			liabilityToken: new MemoryLiabilityToken(engineAccount),
		})),
	],
})
export class AppModule {}
