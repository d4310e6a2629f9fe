import { InternalServerErrorException } from "@nestjs/common";
import {
	AmountMismatchError,
	DeadlineExpiredError,
	DeadlineNotReachedError,
	EscrowError,
	InvalidInputError,
	InvalidStateError,
	UnauthorizedCallerError,
} from "../common/errors";
import { Principal } from "../ledger/ledger.types";
import { EscrowRecord, EscrowStatus } from "./escrow-record.entity";
import {
	CUSTODY_STATUSES,
	EscrowAction,
	isFinalStatus,
	nextStatus,
} from "./escrow-state-machine";

export type Rejection = { ok: false; error: EscrowError };
export type PreconditionResult<T> = { ok: true; value: T } | Rejection;

const pass = <T>(value: T): PreconditionResult<T> => ({ ok: true, value });
const fail = (error: EscrowError): Rejection => ({ ok: false, error });

export type Parties = Pick<EscrowRecord, "buyer" | "seller" | "arbiter">;

export const isBuyer = (caller: Principal, record: Parties): boolean =>
	caller === record.buyer;

export const isSeller = (caller: Principal, record: Parties): boolean =>
	caller === record.seller;

export const isArbiter = (caller: Principal, record: Parties): boolean =>
	caller === record.arbiter;

export type CreateEscrowInput = {
	seller: Principal | null | undefined;
	arbiter: Principal | null | undefined;
	amount: number;
	deadline: Date;
	description?: string;
};

/** Terms of an escrow after `checkCreate` accepted them. */
export type EscrowTerms = {
	buyer: Principal;
	seller: Principal;
	arbiter: Principal;
	amount: number;
	deadline: Date;
	description: string;
};

function isPresent(
	principal: Principal | null | undefined,
): principal is Principal {
	return typeof principal === "string" && principal.trim() !== "";
}

export function checkCreate(
	caller: Principal,
	input: CreateEscrowInput,
	now: Date,
): PreconditionResult<EscrowTerms> {
	const { seller, arbiter, amount, deadline } = input;
	if (!isPresent(seller) || !isPresent(arbiter)) {
		return fail(new InvalidInputError("seller and arbiter are required"));
	}
	if (caller === seller) {
		return fail(new InvalidInputError("buyer and seller must differ"));
	}
	if (caller === arbiter) {
		return fail(new InvalidInputError("buyer and arbiter must differ"));
	}
	if (seller === arbiter) {
		return fail(new InvalidInputError("seller and arbiter must differ"));
	}
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		return fail(
			new InvalidInputError(`amount must be a positive integer, got ${amount}`),
		);
	}
	if (!(deadline instanceof Date) || Number.isNaN(deadline.getTime())) {
		return fail(new InvalidInputError("deadline must be a valid date"));
	}
	if (deadline.getTime() <= now.getTime()) {
		return fail(new InvalidInputError("deadline must be in the future"));
	}
	return pass({
		buyer: caller,
		seller,
		arbiter,
		amount,
		deadline,
		description: input.description ?? "",
	});
}

function transition(
	record: EscrowRecord,
	action: EscrowAction,
): PreconditionResult<EscrowStatus> {
	const to = nextStatus(record.status, action);
	return to === undefined
		? fail(new InvalidStateError(record.id, record.status, action))
		: pass(to);
}

function terminal(
	record: EscrowRecord,
	action: EscrowAction,
): Rejection | undefined {
	return isFinalStatus(record.status)
		? fail(new InvalidStateError(record.id, record.status, action))
		: undefined;
}

export function checkFund(
	caller: Principal,
	record: EscrowRecord,
	value: number,
	now: Date,
): PreconditionResult<EscrowStatus> {
	const final = terminal(record, "fund");
	if (final) {
		return final;
	}
	if (!isBuyer(caller, record)) {
		return fail(new UnauthorizedCallerError(record.id, caller, "buyer"));
	}
	const to = transition(record, "fund");
	if (!to.ok) {
		return to;
	}
	if (value !== record.amount) {
		return fail(new AmountMismatchError(record.id, record.amount, value));
	}
	if (now.getTime() > record.deadline.getTime()) {
		return fail(new DeadlineExpiredError(record.id, record.deadline));
	}
	return to;
}

export function checkRelease(
	caller: Principal,
	record: EscrowRecord,
): PreconditionResult<EscrowStatus> {
	const final = terminal(record, "release");
	if (final) {
		return final;
	}
	if (!isSeller(caller, record)) {
		return fail(new UnauthorizedCallerError(record.id, caller, "seller"));
	}
	const to = transition(record, "release");
	if (!to.ok) {
		return to;
	}
	if (record.isDisputed) {
		return fail(new InvalidStateError(record.id, "disputed", "release"));
	}
	return to;
}

/**
 * Status first, then the deadline, then the role: before the deadline nobody
 * can dispute a funded escrow, whoever asks.
 */
export function checkRequestDispute(
	caller: Principal,
	record: EscrowRecord,
	now: Date,
): PreconditionResult<EscrowStatus> {
	const final = terminal(record, "request-dispute");
	if (final) {
		return final;
	}
	if (!CUSTODY_STATUSES.includes(record.status)) {
		return transition(record, "request-dispute");
	}
	if (now.getTime() <= record.deadline.getTime()) {
		return fail(new DeadlineNotReachedError(record.id, record.deadline));
	}
	if (!isBuyer(caller, record)) {
		return fail(new UnauthorizedCallerError(record.id, caller, "buyer"));
	}
	return transition(record, "request-dispute");
}

export function checkResolve(
	caller: Principal,
	record: EscrowRecord,
	releaseToSeller: boolean,
): PreconditionResult<EscrowStatus> {
	const action: EscrowAction = releaseToSeller
		? "resolve-to-seller"
		: "resolve-to-buyer";
	const final = terminal(record, action);
	if (final) {
		return final;
	}
	if (!isArbiter(caller, record)) {
		return fail(new UnauthorizedCallerError(record.id, caller, "arbiter"));
	}
	return transition(record, action);
}

/**
 * Throws if a stored record breaks the escrow invariants. Such a record is
 * never handed to a reader.
 */
export function assertRecordInvariants(record: EscrowRecord): void {
	const violations: string[] = [];
	if (
		record.buyer === record.seller ||
		record.buyer === record.arbiter ||
		record.seller === record.arbiter
	) {
		violations.push("principals are not distinct");
	}
	if (isFinalStatus(record.status) !== (record.amount === 0)) {
		violations.push(`amount ${record.amount} with status ${record.status}`);
	}
	if (record.amount < 0) {
		violations.push(`negative amount ${record.amount}`);
	}
	if (record.isDisputed !== (record.status === "disputed")) {
		violations.push(
			`isDisputed=${record.isDisputed} with status ${record.status}`,
		);
	}
	if (violations.length > 0) {
		throw new InternalServerErrorException(
			`Escrow ${record.id} is inconsistent: ${violations.join(", ")}`,
		);
	}
}
