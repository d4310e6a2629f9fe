/**
 * Escrow State Machine Configuration
 *
 * The transition table is the single source of truth for which status an
 * action leads to. Preconditions in `escrow-rules.ts` consult it; the registry
 * writes whatever status it yields.
 */

import { ESCROW_STATUS, EscrowStatus } from "./escrow-record.entity";

export const ESCROW_ACTIONS = [
	"fund",
	"release",
	"request-dispute",
	"resolve-to-seller",
	"resolve-to-buyer",
] as const;
export type EscrowAction = (typeof ESCROW_ACTIONS)[number];

export interface StateDefinition {
	name: EscrowStatus;
	/** Actions allowed from this state */
	allowedActions: EscrowAction[];
	/** No transition leaves a final state */
	isFinal: boolean;
	description: string;
}

export interface StateTransition {
	from: EscrowStatus;
	action: EscrowAction;
	to: EscrowStatus;
}

export interface StateMachineConfig {
	initialState: EscrowStatus;
	states: StateDefinition[];
	transitions: StateTransition[];
}

function createState(
	name: EscrowStatus,
	allowedActions: EscrowAction[],
	options: { isFinal?: boolean; description: string },
): StateDefinition {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

function createTransition(
	from: EscrowStatus,
	action: EscrowAction,
	to: EscrowStatus,
): StateTransition {
	return { from, action, to };
}

/**
 * States:
 * - created: recorded, waiting for the buyer to fund
 * - funded: value in custody, seller may release, buyer may dispute after the deadline
 * - disputed: frozen, only the arbiter may act
 * - released: paid to the seller (terminal)
 * - refunded: paid back to the buyer (terminal)
 */
export const ESCROW_STATE_MACHINE: StateMachineConfig = {
	initialState: "created",
	states: [
		createState("created", ["fund"], {
			description: "Escrow recorded, waiting for the buyer's deposit",
		}),
		createState("funded", ["release", "request-dispute"], {
			description: "Deposit held in custody",
		}),
		createState("disputed", ["resolve-to-seller", "resolve-to-buyer"], {
			description: "Buyer contested after the deadline, awaiting the arbiter",
		}),
		createState("released", [], {
			isFinal: true,
			description: "Custody paid out to the seller",
		}),
		createState("refunded", [], {
			isFinal: true,
			description: "Custody paid back to the buyer",
		}),
	],
	transitions: [
		createTransition("created", "fund", "funded"),
		createTransition("funded", "release", "released"),
		createTransition("funded", "request-dispute", "disputed"),
		createTransition("disputed", "resolve-to-seller", "released"),
		createTransition("disputed", "resolve-to-buyer", "refunded"),
	],
};

/** Statuses whose `amount` is backed by value in custody. */
export const CUSTODY_STATUSES: readonly EscrowStatus[] = ESCROW_STATUS.filter(
	(status) => status === "funded" || status === "disputed",
);

/**
 * Target status of `action` from `status`, or `undefined` when the
 * transition is not in the table.
 */
export function nextStatus(
	status: EscrowStatus,
	action: EscrowAction,
): EscrowStatus | undefined {
	return ESCROW_STATE_MACHINE.transitions.find(
		(t) => t.from === status && t.action === action,
	)?.to;
}

export function isFinalStatus(status: EscrowStatus): boolean {
	return (
		ESCROW_STATE_MACHINE.states.find((s) => s.name === status)?.isFinal ??
		false
	);
}

export function allowedActions(status: EscrowStatus): EscrowAction[] {
	const state = ESCROW_STATE_MACHINE.states.find((s) => s.name === status);
	return state?.allowedActions ?? [];
}
