import { Clock } from "../src/common/clock";

export const ONE_DAY_MS = 24 * 60 * 60 * 1000;

/** One unit of value expressed in the smallest unit (6 decimals). */
export const ONE = 1_000_000;

export const BUYER = "buyer-principal";
export const SELLER = "seller-principal";
export const ARBITER = "arbiter-principal";
export const STRANGER = "stranger-principal";

/** Clock that only moves when told to. */
export class FakeClock implements Clock {
	private current: Date;

	constructor(start: Date | string = "2030-01-01T00:00:00.000Z") {
		this.current = new Date(start);
	}

	now(): Date {
		return new Date(this.current.getTime());
	}

	advance(ms: number): void {
		this.current = new Date(this.current.getTime() + ms);
	}

	set(to: Date): void {
		this.current = new Date(to.getTime());
	}
}

export function daysFrom(clock: Clock, days: number): Date {
	return new Date(clock.now().getTime() + days * ONE_DAY_MS);
}
