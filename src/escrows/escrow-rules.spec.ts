import { EscrowRecord } from "./escrow-record.entity";
import {
	assertRecordInvariants,
	checkCreate,
	checkFund,
	checkRelease,
	checkRequestDispute,
	checkResolve,
	CreateEscrowInput,
	isArbiter,
	isBuyer,
	isSeller,
	PreconditionResult,
} from "./escrow-rules";

const BUYER = "buyer-principal";
const SELLER = "seller-principal";
const ARBITER = "arbiter-principal";
const STRANGER = "stranger-principal";

const NOW = new Date("2030-01-01T00:00:00.000Z");
const DEADLINE = new Date("2030-01-02T00:00:00.000Z");

function record(overrides: Partial<EscrowRecord> = {}): EscrowRecord {
	return Object.assign(new EscrowRecord(), {
		id: 7,
		buyer: BUYER,
		seller: SELLER,
		arbiter: ARBITER,
		amount: 1_000,
		deadline: DEADLINE,
		description: "",
		status: "created",
		isDisputed: false,
		createdAt: NOW,
		updatedAt: NOW,
		...overrides,
	});
}

function codeOf<T>(result: PreconditionResult<T>): string {
	return result.ok ? "ok" : result.error.code;
}

describe("escrow rules", () => {
	describe("role predicates", () => {
		const parties = { buyer: BUYER, seller: SELLER, arbiter: ARBITER };

		it("recognise each role only for its own principal", () => {
			expect(isBuyer(BUYER, parties)).toBe(true);
			expect(isBuyer(SELLER, parties)).toBe(false);
			expect(isSeller(SELLER, parties)).toBe(true);
			expect(isSeller(ARBITER, parties)).toBe(false);
			expect(isArbiter(ARBITER, parties)).toBe(true);
			expect(isArbiter(BUYER, parties)).toBe(false);
		});
	});

	describe("checkCreate", () => {
		const valid: CreateEscrowInput = {
			seller: SELLER,
			arbiter: ARBITER,
			amount: 1_000,
			deadline: DEADLINE,
			description: "three crates of apples",
		};

		it("accepts valid terms and makes the caller the buyer", () => {
			const result = checkCreate(BUYER, valid, NOW);
			expect(result).toEqual({
				ok: true,
				value: {
					buyer: BUYER,
					seller: SELLER,
					arbiter: ARBITER,
					amount: 1_000,
					deadline: DEADLINE,
					description: "three crates of apples",
				},
			});
		});

		it("defaults a missing description to an empty string", () => {
			const result = checkCreate(BUYER, { ...valid, description: undefined }, NOW);
			expect(result.ok && result.value.description).toBe("");
		});

		const invalid: Array<[string, Partial<CreateEscrowInput>, string]> = [
			["null seller", { seller: null }, "seller and arbiter are required"],
			["blank arbiter", { arbiter: "  " }, "seller and arbiter are required"],
			["buyer as seller", { seller: BUYER }, "buyer and seller must differ"],
			["buyer as arbiter", { arbiter: BUYER }, "buyer and arbiter must differ"],
			["seller as arbiter", { arbiter: SELLER }, "seller and arbiter must differ"],
			["zero amount", { amount: 0 }, "amount must be a positive integer, got 0"],
			["negative amount", { amount: -5 }, "amount must be a positive integer, got -5"],
			["fractional amount", { amount: 1.5 }, "amount must be a positive integer, got 1.5"],
			["deadline equal to now", { deadline: NOW }, "deadline must be in the future"],
			["invalid deadline", { deadline: new Date("nope") }, "deadline must be a valid date"],
		];

		it.each(invalid)("rejects %s", (_label, overrides, message) => {
			const result = checkCreate(BUYER, { ...valid, ...overrides }, NOW);
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("InvalidInput");
				expect(result.error.message).toBe(message);
			}
		});

		it("reports the first failing check", () => {
			const result = checkCreate(
				BUYER,
				{ ...valid, seller: null, amount: -1, deadline: NOW },
				NOW,
			);
			expect(!result.ok && result.error.message).toBe(
				"seller and arbiter are required",
			);
		});
	});

	describe("checkFund", () => {
		it("moves created to funded for the buyer with the exact amount", () => {
			expect(checkFund(BUYER, record(), 1_000, NOW)).toEqual({
				ok: true,
				value: "funded",
			});
		});

		it("allows funding exactly at the deadline", () => {
			expect(codeOf(checkFund(BUYER, record(), 1_000, DEADLINE))).toBe("ok");
		});

		it("rejects anyone but the buyer", () => {
			expect(codeOf(checkFund(SELLER, record(), 1_000, NOW))).toBe(
				"Unauthorized",
			);
		});

		it("rejects a second funding", () => {
			expect(
				codeOf(checkFund(BUYER, record({ status: "funded" }), 1_000, NOW)),
			).toBe("InvalidState");
		});

		it.each([999, 1_001])("rejects a deposit of %d", (value) => {
			expect(codeOf(checkFund(BUYER, record(), value, NOW))).toBe(
				"AmountMismatch",
			);
		});

		it("rejects funding after the deadline", () => {
			const late = new Date(DEADLINE.getTime() + 1);
			expect(codeOf(checkFund(BUYER, record(), 1_000, late))).toBe(
				"DeadlineExpired",
			);
		});
	});

	describe("checkRelease", () => {
		it("lets the seller release a funded escrow", () => {
			expect(checkRelease(SELLER, record({ status: "funded" }))).toEqual({
				ok: true,
				value: "released",
			});
		});

		it("rejects the buyer and the arbiter", () => {
			const funded = record({ status: "funded" });
			expect(codeOf(checkRelease(BUYER, funded))).toBe("Unauthorized");
			expect(codeOf(checkRelease(ARBITER, funded))).toBe("Unauthorized");
		});

		it("rejects an unfunded or disputed escrow", () => {
			expect(codeOf(checkRelease(SELLER, record()))).toBe("InvalidState");
			expect(
				codeOf(
					checkRelease(SELLER, record({ status: "disputed", isDisputed: true })),
				),
			).toBe("InvalidState");
		});

		it("rejects a funded escrow flagged as disputed", () => {
			const result = checkRelease(
				SELLER,
				record({ status: "funded", isDisputed: true }),
			);
			expect(!result.ok && result.error.message).toBe(
				"Escrow 7 is disputed, cannot release",
			);
		});
	});

	describe("checkRequestDispute", () => {
		const afterDeadline = new Date(DEADLINE.getTime() + 1);

		it("lets the buyer dispute a funded escrow after the deadline", () => {
			expect(
				checkRequestDispute(BUYER, record({ status: "funded" }), afterDeadline),
			).toEqual({ ok: true, value: "disputed" });
		});

		it.each([BUYER, SELLER, ARBITER, STRANGER])(
			"rejects %s before or at the deadline",
			(caller) => {
				const funded = record({ status: "funded" });
				expect(codeOf(checkRequestDispute(caller, funded, NOW))).toBe(
					"DeadlineNotReached",
				);
				expect(codeOf(checkRequestDispute(caller, funded, DEADLINE))).toBe(
					"DeadlineNotReached",
				);
			},
		);

		it("rejects anyone but the buyer after the deadline", () => {
			expect(
				codeOf(
					checkRequestDispute(SELLER, record({ status: "funded" }), afterDeadline),
				),
			).toBe("Unauthorized");
		});

		it("rejects an unfunded escrow before and after the deadline", () => {
			expect(codeOf(checkRequestDispute(BUYER, record(), afterDeadline))).toBe(
				"InvalidState",
			);
			const early = checkRequestDispute(STRANGER, record(), NOW);
			expect(!early.ok && early.error.message).toBe(
				"Escrow 7 is created, cannot request-dispute",
			);
		});
	});

	describe("checkResolve", () => {
		const disputed = record({ status: "disputed", isDisputed: true });

		it("maps the verdict to released or refunded", () => {
			expect(checkResolve(ARBITER, disputed, true)).toEqual({
				ok: true,
				value: "released",
			});
			expect(checkResolve(ARBITER, disputed, false)).toEqual({
				ok: true,
				value: "refunded",
			});
		});

		it("rejects anyone but the arbiter", () => {
			expect(codeOf(checkResolve(BUYER, disputed, false))).toBe("Unauthorized");
		});

		it("rejects an escrow that is not disputed", () => {
			expect(
				codeOf(checkResolve(ARBITER, record({ status: "funded" }), true)),
			).toBe("InvalidState");
		});
	});

	describe("terminal records", () => {
		const settled = [
			record({ status: "released", amount: 0 }),
			record({ status: "refunded", amount: 0 }),
		];
		const late = new Date(DEADLINE.getTime() + 1);

		it.each(settled)("reject every transition on a $status record", (r) => {
			for (const caller of [BUYER, SELLER, ARBITER, STRANGER]) {
				expect(codeOf(checkFund(caller, r, 1_000, NOW))).toBe("InvalidState");
				expect(codeOf(checkRelease(caller, r))).toBe("InvalidState");
				expect(codeOf(checkRequestDispute(caller, r, NOW))).toBe("InvalidState");
				expect(codeOf(checkRequestDispute(caller, r, late))).toBe("InvalidState");
				expect(codeOf(checkResolve(caller, r, true))).toBe("InvalidState");
				expect(codeOf(checkResolve(caller, r, false))).toBe("InvalidState");
			}
		});
	});

	describe("assertRecordInvariants", () => {
		it("accepts consistent records", () => {
			expect(() => assertRecordInvariants(record())).not.toThrow();
			expect(() =>
				assertRecordInvariants(record({ status: "refunded", amount: 0 })),
			).not.toThrow();
		});

		it("rejects a settled record that still holds an amount", () => {
			expect(() =>
				assertRecordInvariants(record({ status: "released" })),
			).toThrow("Escrow 7 is inconsistent: amount 1000 with status released");
		});

		it("rejects a dispute flag that disagrees with the status", () => {
			expect(() =>
				assertRecordInvariants(record({ status: "funded", isDisputed: true })),
			).toThrow("Escrow 7 is inconsistent: isDisputed=true with status funded");
		});
	});
});
