import { ConfigModule, ConfigService } from "@nestjs/config";
import { MiddlewareConsumer, Module, NestModule } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { EscrowsModule } from "./escrows/escrows.module";
import { LedgerModule } from "./ledger/ledger.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => {
				const isTest = cfg.get<string>("NODE_ENV") === "test";
				return {
					type: "better-sqlite3",
					database: isTest
						? ":memory:"
						: (cfg.get<string>("SQLITE_DB_PATH") ?? "escrow.sqlite"),
					synchronize: true,
					logging: cfg.get<string>("DB_LOGGING") === "true",
					autoLoadEntities: true,
				};
			},
		}),
		LedgerModule,
		EscrowsModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer.apply(RequestLoggingMiddleware).forRoutes("*");
	}
}
