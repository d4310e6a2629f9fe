import { ESCROW_STATUS } from "./escrow-record.entity";
import {
	allowedActions,
	CUSTODY_STATUSES,
	ESCROW_ACTIONS,
	ESCROW_STATE_MACHINE,
	isFinalStatus,
	nextStatus,
} from "./escrow-state-machine";

describe("ESCROW_STATE_MACHINE", () => {
	it("starts in created", () => {
		expect(ESCROW_STATE_MACHINE.initialState).toBe("created");
	});

	it("defines every status exactly once", () => {
		const names = ESCROW_STATE_MACHINE.states.map((s) => s.name);
		expect([...names].sort()).toEqual([...ESCROW_STATUS].sort());
	});

	it("only allows actions that have a transition", () => {
		for (const state of ESCROW_STATE_MACHINE.states) {
			for (const action of state.allowedActions) {
				expect(nextStatus(state.name, action)).toBeDefined();
			}
		}
	});

	it("has no transition out of a final state", () => {
		for (const status of ESCROW_STATUS.filter(isFinalStatus)) {
			for (const action of ESCROW_ACTIONS) {
				expect(nextStatus(status, action)).toBeUndefined();
			}
			expect(allowedActions(status)).toEqual([]);
		}
	});

	it.each([
		["created", "fund", "funded"],
		["funded", "release", "released"],
		["funded", "request-dispute", "disputed"],
		["disputed", "resolve-to-seller", "released"],
		["disputed", "resolve-to-buyer", "refunded"],
	] as const)("%s --%s--> %s", (from, action, to) => {
		expect(nextStatus(from, action)).toBe(to);
	});

	it("rejects transitions that are not in the table", () => {
		expect(nextStatus("created", "release")).toBeUndefined();
		expect(nextStatus("funded", "fund")).toBeUndefined();
		expect(nextStatus("disputed", "release")).toBeUndefined();
		expect(nextStatus("created", "resolve-to-buyer")).toBeUndefined();
	});

	it("marks released and refunded as final", () => {
		expect(ESCROW_STATUS.filter(isFinalStatus)).toEqual(["released", "refunded"]);
	});

	it("holds custody while funded or disputed", () => {
		expect(CUSTODY_STATUSES).toEqual(["funded", "disputed"]);
	});
});
