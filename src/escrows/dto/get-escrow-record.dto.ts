import { ApiProperty } from "@nestjs/swagger";
import {
	ESCROW_STATUS,
	EscrowRecord,
	EscrowStatus,
} from "../escrow-record.entity";
import {
	allowedActions,
	ESCROW_ACTIONS,
	EscrowAction,
} from "../escrow-state-machine";

export class GetEscrowRecordDto {
	@ApiProperty({ example: 12 })
	id!: number;

	@ApiProperty({ description: "Principal that created and funds the escrow" })
	buyer!: string;

	@ApiProperty({ description: "Principal paid on release" })
	seller!: string;

	@ApiProperty({ description: "Principal that resolves disputes" })
	arbiter!: string;

	@ApiProperty({
		minimum: 0,
		description: "Amount held, in the smallest unit. Zero once settled.",
	})
	amount!: number;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	deadline!: number;

	@ApiProperty()
	description!: string;

	@ApiProperty({ enum: [...ESCROW_STATUS] })
	status!: EscrowStatus;

	@ApiProperty()
	isDisputed!: boolean;

	@ApiProperty({
		description: "Actions allowed from the current status",
		enum: [...ESCROW_ACTIONS],
		isArray: true,
	})
	allowedActions!: EscrowAction[];

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	updatedAt!: number;
}

export function toEscrowRecordDto(record: EscrowRecord): GetEscrowRecordDto {
	return {
		id: record.id,
		buyer: record.buyer,
		seller: record.seller,
		arbiter: record.arbiter,
		amount: record.amount,
		deadline: record.deadline.getTime(),
		description: record.description,
		status: record.status,
		isDisputed: record.isDisputed,
		allowedActions: allowedActions(record.status),
		createdAt: record.createdAt.getTime(),
		updatedAt: record.updatedAt.getTime(),
	};
}
