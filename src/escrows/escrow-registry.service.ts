import { AsyncLocalStorage } from "node:async_hooks";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { Brackets, DataSource, EntityManager } from "typeorm";
import { nanoid } from "nanoid";

import { CLOCK, Clock } from "../common/clock";
import {
	DepositFailureError,
	EscrowNotFoundError,
	InvalidStateError,
	SettlementFailureError,
	toError,
} from "../common/errors";
import {
	ESCROW_CREATED_ID,
	ESCROW_DISPUTE_REQUESTED_ID,
	ESCROW_FUNDED_ID,
	ESCROW_RELEASED_ID,
	ESCROW_RESOLVED_ID,
	EscrowCreated,
	EscrowDisputeRequested,
	EscrowFunded,
	EscrowId,
	EscrowNotification,
	EscrowReleased,
	EscrowResolved,
} from "../common/escrow.event";
import {
	Cursor,
	cursorToString,
	emptyCursor,
} from "../common/dto/envelopes";
import { CUSTODY_LEDGER } from "../ledger/ledger.constants";
import {
	CustodyLedger,
	Principal,
	TransferResult,
} from "../ledger/ledger.types";
import { EscrowRecord, EscrowStatus } from "./escrow-record.entity";
import {
	assertRecordInvariants,
	checkCreate,
	checkFund,
	checkRelease,
	checkRequestDispute,
	checkResolve,
	CreateEscrowInput,
	PreconditionResult,
} from "./escrow-rules";
import { CUSTODY_STATUSES } from "./escrow-state-machine";

type UnitOfWork = {
	manager: EntityManager;
	// notifications to publish once the outermost unit commits
	pending: EscrowNotification[];
	// joined from inside a ledger call of an enclosing unit
	nested: boolean;
};

export type EscrowQueryFilter = {
	party?: Principal;
	status?: EscrowStatus;
};

export type CustodySummary = {
	recordsInCustody: number;
	totalInCustody: number;
	ledgerBalance: number;
};

/**
 * Owns every escrow record and is the only code that changes one.
 *
 * Operations run one at a time. Each is a single database transaction that
 * covers the precondition check, the state write and the ledger call, so a
 * failed ledger call leaves the record as it was. The state is written before
 * the ledger is called; a collaborator that calls back into the registry from
 * inside the ledger call joins the running transaction and sees the new state.
 */
@Injectable()
export class EscrowRegistryService {
	private readonly logger = new Logger(EscrowRegistryService.name);
	private readonly unit = new AsyncLocalStorage<UnitOfWork>();
	private queue: Promise<void> = Promise.resolve();

	constructor(
		private readonly dataSource: DataSource,
		@Inject(CUSTODY_LEDGER) private readonly ledger: CustodyLedger,
		@Inject(CLOCK) private readonly clock: Clock,
		private readonly events: EventEmitter2,
	) {}

	async create(
		caller: Principal,
		input: CreateEscrowInput,
	): Promise<EscrowRecord> {
		return this.exclusive(async ({ manager, pending }) => {
			const now = this.clock.now();
			const terms = this.enforce(checkCreate(caller, input, now));
			const repository = manager.getRepository(EscrowRecord);
			const record = await repository.save(
				repository.create({
					...terms,
					status: "created",
					isDisputed: false,
				}),
			);
			this.logger.log(
				`Escrow ${record.id} created by ${caller} for ${record.amount}, seller ${record.seller}, arbiter ${record.arbiter}`,
			);
			pending.push({
				name: ESCROW_CREATED_ID,
				payload: {
					eventId: nanoid(4),
					escrowId: record.id,
					buyer: record.buyer,
					seller: record.seller,
					arbiter: record.arbiter,
					amount: record.amount,
					deadline: record.deadline.toISOString(),
					description: record.description,
					createdAt: now.toISOString(),
				} satisfies EscrowCreated,
			});
			return record;
		});
	}

	/**
	 * Moves `value` from the buyer into custody. The record is `funded`
	 * before the ledger is asked for the deposit.
	 */
	async fund(
		caller: Principal,
		id: EscrowId,
		value: number,
	): Promise<EscrowRecord> {
		return this.exclusive(async ({ manager, pending, nested }) => {
			const now = this.clock.now();
			const record = await this.load(manager, id);
			const funded = this.enforce(checkFund(caller, record, value, now));
			this.refuseNestedSettlement(nested, record, "fund");
			record.status = funded;
			await manager.save(record);

			const receipt = await this.callLedger(() =>
				this.ledger.deposit(record.buyer, value),
			);
			if (!receipt.ok) {
				this.logger.warn(`Deposit for escrow ${id} failed: ${receipt.reason}`);
				throw new DepositFailureError(
					id,
					record.buyer,
					value,
					receipt.reason,
					receipt.cause,
				);
			}

			this.logger.log(`Escrow ${id} funded with ${value}`);
			pending.push({
				name: ESCROW_FUNDED_ID,
				payload: {
					eventId: nanoid(4),
					escrowId: id,
					buyer: record.buyer,
					amount: value,
					reference: receipt.reference,
					fundedAt: now.toISOString(),
				} satisfies EscrowFunded,
			});
			return record;
		});
	}

	async release(caller: Principal, id: EscrowId): Promise<EscrowRecord> {
		return this.exclusive(async ({ manager, pending, nested }) => {
			const now = this.clock.now();
			const record = await this.load(manager, id);
			const released = this.enforce(checkRelease(caller, record));
			this.refuseNestedSettlement(nested, record, "release");

			const payout = record.amount;
			record.status = released;
			record.amount = 0;
			await manager.save(record);

			const reference = await this.payOut(id, record.seller, payout);
			this.logger.log(`Escrow ${id} released ${payout} to ${record.seller}`);
			pending.push({
				name: ESCROW_RELEASED_ID,
				payload: {
					eventId: nanoid(4),
					escrowId: id,
					seller: record.seller,
					amount: payout,
					reference,
					releasedAt: now.toISOString(),
				} satisfies EscrowReleased,
			});
			return record;
		});
	}

	/** Freezes the custody until the arbiter decides. No value moves. */
	async requestDispute(
		caller: Principal,
		id: EscrowId,
	): Promise<EscrowRecord> {
		return this.exclusive(async ({ manager, pending }) => {
			const now = this.clock.now();
			const record = await this.load(manager, id);
			record.status = this.enforce(checkRequestDispute(caller, record, now));
			record.isDisputed = true;
			await manager.save(record);

			this.logger.log(`Escrow ${id} disputed by ${caller}`);
			pending.push({
				name: ESCROW_DISPUTE_REQUESTED_ID,
				payload: {
					eventId: nanoid(4),
					escrowId: id,
					buyer: record.buyer,
					requestedAt: now.toISOString(),
				} satisfies EscrowDisputeRequested,
			});
			return record;
		});
	}

	async resolve(
		caller: Principal,
		id: EscrowId,
		releaseToSeller: boolean,
	): Promise<EscrowRecord> {
		return this.exclusive(async ({ manager, pending, nested }) => {
			const now = this.clock.now();
			const record = await this.load(manager, id);
			const outcome = this.enforce(
				checkResolve(caller, record, releaseToSeller),
			);
			this.refuseNestedSettlement(nested, record, "resolve");

			const payout = record.amount;
			const recipient = releaseToSeller ? record.seller : record.buyer;
			record.status = outcome;
			record.amount = 0;
			record.isDisputed = false;
			await manager.save(record);

			const reference = await this.payOut(id, recipient, payout);
			this.logger.log(
				`Escrow ${id} resolved by ${caller}: ${outcome}, ${payout} to ${recipient}`,
			);
			pending.push({
				name: ESCROW_RESOLVED_ID,
				payload: {
					eventId: nanoid(4),
					escrowId: id,
					arbiter: record.arbiter,
					releaseToSeller,
					recipient,
					amount: payout,
					reference,
					resolvedAt: now.toISOString(),
				} satisfies EscrowResolved,
			});
			return record;
		});
	}

	async getById(id: EscrowId): Promise<EscrowRecord> {
		return this.exclusive(({ manager }) => this.load(manager, id));
	}

	async list(
		filter: EscrowQueryFilter,
		limit: number,
		cursor: Cursor = emptyCursor,
	): Promise<{
		items: EscrowRecord[];
		nextCursor?: string;
		total: number;
	}> {
		const take = Math.min(Math.max(limit, 1), 100);
		return this.exclusive(async ({ manager }) => {
			const qb = manager
				.getRepository(EscrowRecord)
				.createQueryBuilder("e");

			if (filter.party) {
				const party = filter.party;
				qb.andWhere(
					new Brackets((w) => {
						w.where("e.buyer = :party", { party })
							.orWhere("e.seller = :party", { party })
							.orWhere("e.arbiter = :party", { party });
					}),
				);
			}
			if (filter.status) {
				qb.andWhere("e.status = :status", { status: filter.status });
			}

			const total = await qb.getCount();

			if (cursor.idBefore !== undefined) {
				qb.andWhere("e.id < :idBefore", { idBefore: cursor.idBefore });
			}
			const rows = await qb.orderBy("e.id", "DESC").take(take).getMany();
			rows.forEach(assertRecordInvariants);

			let nextCursor: string | undefined;
			if (rows.length === take) {
				nextCursor = cursorToString(rows[rows.length - 1].id);
			}
			return { items: rows, nextCursor, total };
		});
	}

	/**
	 * What the records say is in custody next to what the ledger holds. The
	 * ledger balance never exceeds the recorded total.
	 */
	async custodySummary(): Promise<CustodySummary> {
		return this.exclusive(async ({ manager }) => {
			const row = await manager
				.getRepository(EscrowRecord)
				.createQueryBuilder("e")
				.select("COUNT(e.id)", "records")
				.addSelect("COALESCE(SUM(e.amount), 0)", "total")
				.where("e.status IN (:...statuses)", { statuses: CUSTODY_STATUSES })
				.getRawOne<{ records: number | string; total: number | string }>();
			return {
				recordsInCustody: Number(row?.records ?? 0),
				totalInCustody: Number(row?.total ?? 0),
				ledgerBalance: await this.ledger.custodyBalance(),
			};
		});
	}

	private async load(
		manager: EntityManager,
		id: EscrowId,
	): Promise<EscrowRecord> {
		const record = await manager.findOne(EscrowRecord, { where: { id } });
		if (!record) {
			throw new EscrowNotFoundError(id);
		}
		assertRecordInvariants(record);
		return record;
	}

	private enforce<T>(result: PreconditionResult<T>): T {
		if (!result.ok) {
			this.logger.debug(`Rejected: ${result.error.code} ${result.error.message}`);
			throw result.error;
		}
		return result.value;
	}

	/**
	 * A savepoint rolls back rows, not ledger movements. Value may only move
	 * in a unit that commits or rolls back as a whole.
	 */
	private refuseNestedSettlement(
		nested: boolean,
		record: EscrowRecord,
		attempted: string,
	): void {
		if (nested) {
			this.logger.warn(
				`Refused ${attempted} of escrow ${record.id} from inside a ledger call`,
			);
			throw new InvalidStateError(
				record.id,
				record.status,
				`${attempted} from inside a ledger call`,
			);
		}
	}

	private async payOut(
		id: EscrowId,
		recipient: Principal,
		amount: number,
	): Promise<string> {
		const receipt = await this.callLedger(() =>
			this.ledger.transfer(recipient, amount),
		);
		if (!receipt.ok) {
			this.logger.warn(
				`Settlement for escrow ${id} failed, rolling back: ${receipt.reason}`,
			);
			throw new SettlementFailureError(
				id,
				recipient,
				amount,
				receipt.reason,
				receipt.cause,
			);
		}
		return receipt.reference;
	}

	private async callLedger(
		call: () => Promise<TransferResult>,
	): Promise<TransferResult> {
		try {
			return await call();
		} catch (e) {
			const error = toError(e);
			this.logger.error(`Ledger call threw: ${error.message}`, error.stack);
			return { ok: false, reason: error.message, cause: error };
		}
	}

	private exclusive<T>(work: (unit: UnitOfWork) => Promise<T>): Promise<T> {
		const current = this.unit.getStore();
		if (current) {
			return this.joinUnit(current, work);
		}
		const result = this.queue.then(() => this.runUnit(work));
		// the next unit waits for this one whether it commits or not
		this.queue = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}

	private async runUnit<T>(
		work: (unit: UnitOfWork) => Promise<T>,
	): Promise<T> {
		const pending: EscrowNotification[] = [];
		const result = await this.dataSource.transaction((manager) =>
			this.unit.run({ manager, pending, nested: false }, () =>
				work({ manager, pending, nested: false }),
			),
		);
		for (const notification of pending) {
			this.events.emit(notification.name, notification.payload);
		}
		return result;
	}

	// Re-entry from a ledger call: a savepoint inside the running transaction.
	private async joinUnit<T>(
		outer: UnitOfWork,
		work: (unit: UnitOfWork) => Promise<T>,
	): Promise<T> {
		const pending: EscrowNotification[] = [];
		const result = await outer.manager.transaction((manager) =>
			this.unit.run({ manager, pending, nested: true }, () =>
				work({ manager, pending, nested: true }),
			),
		);
		outer.pending.push(...pending);
		return result;
	}
}
