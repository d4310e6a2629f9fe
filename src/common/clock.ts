import { Injectable } from "@nestjs/common";

export const CLOCK = "CLOCK";

/**
 * Source of the operation-time "now". Read once per operation; the engine
 * keeps no timers of its own.
 */
export interface Clock {
	now(): Date;
}

@Injectable()
export class SystemClock implements Clock {
	now(): Date {
		return new Date();
	}
}
