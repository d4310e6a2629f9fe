export type Principal = string;

export type TransferResult =
	| { ok: true; reference: string }
	| { ok: false; reason: string; cause?: Error };

/**
 * Moves value in and out of the registry's custody.
 *
 * Implementations report a failed movement through `{ ok: false }`; a thrown
 * error is treated the same way by the registry.
 */
export interface CustodyLedger {
	/** Pulls `amount` from `from` into custody. */
	deposit(from: Principal, amount: number): Promise<TransferResult>;
	/** Pays `amount` out of custody to `to`. */
	transfer(to: Principal, amount: number): Promise<TransferResult>;
	/** Value currently held in custody. */
	custodyBalance(): Promise<number>;
}
