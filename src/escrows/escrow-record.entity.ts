import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";

export const ESCROW_STATUS = [
	// recorded, nothing in custody yet
	"created",
	// buyer's value is held in custody
	"funded",
	// paid out to the seller (terminal)
	"released",
	// paid back to the buyer (terminal)
	"refunded",
	// frozen until the arbiter decides
	"disputed",
] as const;
export type EscrowStatus = (typeof ESCROW_STATUS)[number];

@Entity("escrow_records")
export class EscrowRecord {
	// AUTOINCREMENT on sqlite: ids are never reused
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	buyer!: string;

	@Index()
	@Column({ type: "text" })
	seller!: string;

	@Index()
	@Column({ type: "text" })
	arbiter!: string;

	@Column({ type: "integer" })
	amount!: number;

	@Column({ type: "datetime" })
	deadline!: Date;

	@Column({ type: "text", default: "" })
	description!: string;

	@Index()
	@Column({ type: "text", enum: ESCROW_STATUS })
	status!: EscrowStatus;

	@Column({ type: "boolean", default: false })
	isDisputed!: boolean;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
