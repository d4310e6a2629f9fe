import { Injectable, Logger } from "@nestjs/common";
import { nanoid } from "nanoid";
import { CustodyLedger, Principal, TransferResult } from "./ledger.types";

/**
 * In-process custody ledger: principal balances plus a single custody
 * account owned by the registry.
 */
@Injectable()
export class InMemoryLedgerService implements CustodyLedger {
	private readonly logger = new Logger(InMemoryLedgerService.name);
	private readonly balances = new Map<Principal, number>();
	private custody = 0;

	credit(principal: Principal, amount: number): void {
		if (!Number.isSafeInteger(amount) || amount <= 0) {
			throw new Error(`Cannot credit ${principal} with ${amount}`);
		}
		this.balances.set(principal, this.balanceOf(principal) + amount);
	}

	balanceOf(principal: Principal): number {
		return this.balances.get(principal) ?? 0;
	}

	async deposit(from: Principal, amount: number): Promise<TransferResult> {
		const available = this.balanceOf(from);
		if (available < amount) {
			return {
				ok: false,
				reason: `insufficient balance for ${from}: ${available} < ${amount}`,
			};
		}
		this.balances.set(from, available - amount);
		this.custody += amount;
		const reference = nanoid(16);
		this.logger.debug(`deposit ${reference}: ${from} -> custody ${amount}`);
		return { ok: true, reference };
	}

	async transfer(to: Principal, amount: number): Promise<TransferResult> {
		if (this.custody < amount) {
			return {
				ok: false,
				reason: `custody holds ${this.custody}, cannot pay out ${amount}`,
			};
		}
		this.custody -= amount;
		this.balances.set(to, this.balanceOf(to) + amount);
		const reference = nanoid(16);
		this.logger.debug(`transfer ${reference}: custody -> ${to} ${amount}`);
		return { ok: true, reference };
	}

	async custodyBalance(): Promise<number> {
		return this.custody;
	}
}

/**
 * Parses `LEDGER_OPENING_BALANCES`, e.g. `alice:1000,bob:250`.
 */
export function parseOpeningBalances(
	raw: string | undefined,
): Array<[Principal, number]> {
	if (!raw || raw.trim() === "") {
		return [];
	}
	return raw.split(",").map((entry): [Principal, number] => {
		const separator = entry.lastIndexOf(":");
		const principal = entry.slice(0, separator).trim();
		const amount = Number(entry.slice(separator + 1));
		if (separator <= 0 || principal === "" || !Number.isSafeInteger(amount)) {
			throw new Error(`Invalid LEDGER_OPENING_BALANCES entry "${entry}"`);
		}
		return [principal, amount];
	});
}
