import {
	BadGatewayException,
	BadRequestException,
	ForbiddenException,
	HttpException,
	NotFoundException,
	UnprocessableEntityException,
} from "@nestjs/common";

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

export const ESCROW_ERROR_CODES = [
	"NotFound",
	"Unauthorized",
	"InvalidState",
	"InvalidInput",
	"AmountMismatch",
	"DeadlineExpired",
	"DeadlineNotReached",
	"SettlementFailure",
	"DepositFailure",
] as const;
export type EscrowErrorCode = (typeof ESCROW_ERROR_CODES)[number];

/**
 * A rejected escrow operation. Every implementation is also a Nest
 * `HttpException`, so the HTTP layer renders it with the matching status.
 */
export interface EscrowError extends HttpException {
	readonly code: EscrowErrorCode;
}

const KNOWN_CODES: readonly string[] = ESCROW_ERROR_CODES;

export function isEscrowError(err: unknown): err is EscrowError {
	return (
		err instanceof HttpException &&
		"code" in err &&
		typeof err.code === "string" &&
		KNOWN_CODES.includes(err.code)
	);
}

export class EscrowNotFoundError
	extends NotFoundException
	implements EscrowError
{
	readonly code = "NotFound";

	constructor(readonly escrowId: number) {
		super(`Escrow ${escrowId} not found`);
	}
}

export class UnauthorizedCallerError
	extends ForbiddenException
	implements EscrowError
{
	readonly code = "Unauthorized";

	constructor(
		readonly escrowId: number,
		readonly caller: string,
		readonly requiredRole: "buyer" | "seller" | "arbiter",
	) {
		super(`Only the ${requiredRole} can perform this operation on escrow ${escrowId}`);
	}
}

export class InvalidStateError
	extends UnprocessableEntityException
	implements EscrowError
{
	readonly code = "InvalidState";

	constructor(
		readonly escrowId: number,
		readonly current: string,
		readonly attempted: string,
	) {
		super(`Escrow ${escrowId} is ${current}, cannot ${attempted}`);
	}
}

export class InvalidInputError
	extends BadRequestException
	implements EscrowError
{
	readonly code = "InvalidInput";

	constructor(reason: string) {
		super(reason);
	}
}

export class AmountMismatchError
	extends BadRequestException
	implements EscrowError
{
	readonly code = "AmountMismatch";

	constructor(
		readonly escrowId: number,
		readonly expected: number,
		readonly received: number,
	) {
		super(
			`Escrow ${escrowId} must be funded with exactly ${expected}, received ${received}`,
		);
	}
}

export class DeadlineExpiredError
	extends UnprocessableEntityException
	implements EscrowError
{
	readonly code = "DeadlineExpired";

	constructor(
		readonly escrowId: number,
		readonly deadline: Date,
	) {
		super(`Escrow ${escrowId} deadline ${deadline.toISOString()} has passed`);
	}
}

export class DeadlineNotReachedError
	extends UnprocessableEntityException
	implements EscrowError
{
	readonly code = "DeadlineNotReached";

	constructor(
		readonly escrowId: number,
		readonly deadline: Date,
	) {
		super(
			`Escrow ${escrowId} can only be disputed after ${deadline.toISOString()}`,
		);
	}
}

export class SettlementFailureError
	extends BadGatewayException
	implements EscrowError
{
	readonly code = "SettlementFailure";

	constructor(
		readonly escrowId: number,
		readonly recipient: string,
		readonly amount: number,
		reason: string,
		cause?: Error,
	) {
		super(
			`Settlement of ${amount} to ${recipient} for escrow ${escrowId} failed: ${reason}`,
			{ cause },
		);
	}
}

export class DepositFailureError
	extends BadGatewayException
	implements EscrowError
{
	readonly code = "DepositFailure";

	constructor(
		readonly escrowId: number,
		readonly depositor: string,
		readonly amount: number,
		reason: string,
		cause?: Error,
	) {
		super(
			`Deposit of ${amount} from ${depositor} for escrow ${escrowId} failed: ${reason}`,
			{ cause },
		);
	}
}
