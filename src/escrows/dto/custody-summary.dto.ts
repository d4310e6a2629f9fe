import { ApiProperty } from "@nestjs/swagger";

export class CustodySummaryDto {
	@ApiProperty({ description: "Escrows currently funded or disputed" })
	recordsInCustody!: number;

	@ApiProperty({ description: "Sum of their amounts" })
	totalInCustody!: number;

	@ApiProperty({ description: "Value the custody ledger reports holding" })
	ledgerBalance!: number;
}
