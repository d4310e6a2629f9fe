import { Logger, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { CUSTODY_LEDGER } from "./ledger.constants";
import {
	InMemoryLedgerService,
	parseOpeningBalances,
} from "./in-memory-ledger.service";

@Module({
	imports: [ConfigModule.forRoot()],
	providers: [
		{
			provide: InMemoryLedgerService,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => {
				const ledger = new InMemoryLedgerService();
				const openings = parseOpeningBalances(
					cfg.get<string>("LEDGER_OPENING_BALANCES"),
				);
				for (const [principal, amount] of openings) {
					ledger.credit(principal, amount);
				}
				if (openings.length > 0) {
					Logger.log(
						`Ledger opened with ${openings.length} funded principal(s)`,
						"LedgerModule",
					);
				}
				return ledger;
			},
		},
		{ provide: CUSTODY_LEDGER, useExisting: InMemoryLedgerService },
	],
	exports: [CUSTODY_LEDGER, InMemoryLedgerService],
})
export class LedgerModule {}
