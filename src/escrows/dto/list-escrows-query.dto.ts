import { ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	IsIn,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Max,
	Min,
} from "class-validator";
import { ESCROW_STATUS, EscrowStatus } from "../escrow-record.entity";

export class ListEscrowsQueryDto {
	@ApiPropertyOptional({
		description: "Max items to return (1-100)",
		minimum: 1,
		maximum: 100,
		default: 20,
	})
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(1)
	@Max(100)
	limit?: number;

	@ApiPropertyOptional({ description: "Opaque cursor from previous page" })
	@IsOptional()
	@IsString()
	cursor?: string;

	@ApiPropertyOptional({
		description: "Only escrows where this principal is buyer, seller or arbiter",
	})
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	party?: string;

	@ApiPropertyOptional({ enum: [...ESCROW_STATUS] })
	@IsOptional()
	@IsIn([...ESCROW_STATUS])
	status?: EscrowStatus;
}
