import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { CLOCK, SystemClock } from "../common/clock";
import { LedgerModule } from "../ledger/ledger.module";
import { EscrowRecord } from "./escrow-record.entity";
import { EscrowRegistryService } from "./escrow-registry.service";
import { EscrowAuditService } from "./escrow-audit.service";
import { EscrowsController } from "./escrows.controller";

@Module({
	imports: [TypeOrmModule.forFeature([EscrowRecord]), LedgerModule],
	providers: [
		EscrowRegistryService,
		EscrowAuditService,
		{ provide: CLOCK, useClass: SystemClock },
	],
	controllers: [EscrowsController],
	exports: [EscrowRegistryService, EscrowAuditService],
})
export class EscrowsModule {}
