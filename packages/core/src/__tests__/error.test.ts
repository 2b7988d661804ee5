import { describe, expect, it } from "vitest";
import { BASE_ERROR_CODES, createErrorCodes, LedgerError } from "../error/index.js";

describe("LedgerError", () => {
	describe("constructor", () => {
		it("creates an error with the given code and message", () => {
			const error = new LedgerError("NOT_FOUND", "Account not found");
			expect(error.code).toBe("NOT_FOUND");
			expect(error.message).toBe("Account not found");
		});

		it("is an instance of Error and LedgerError", () => {
			const error = new LedgerError("INTERNAL", "Something went wrong");
			expect(error).toBeInstanceOf(Error);
			expect(error).toBeInstanceOf(LedgerError);
			expect(error.name).toBe("LedgerError");
		});

		it("defaults to status 500 and non-transient", () => {
			const error = new LedgerError("CUSTOM", "custom");
			expect(error.status).toBe(500);
			expect(error.transient).toBe(false);
		});

		it("keeps the cause", () => {
			const cause = new Error("connection reset");
			const error = LedgerError.unavailable("Storage unavailable", cause);
			expect(error.cause).toBe(cause);
		});
	});

	describe("static factories", () => {
		it.each([
			["invalidArgument", LedgerError.invalidArgument(), "INVALID_ARGUMENT", 400, false],
			["notFound", LedgerError.notFound(), "NOT_FOUND", 404, false],
			["insufficientFunds", LedgerError.insufficientFunds(), "INSUFFICIENT_FUNDS", 409, true],
			[
				"selfTransferNotAllowed",
				LedgerError.selfTransferNotAllowed(),
				"SELF_TRANSFER_NOT_ALLOWED",
				400,
				false,
			],
			[
				"idempotencyConflict",
				LedgerError.idempotencyConflict(),
				"IDEMPOTENCY_CONFLICT",
				409,
				false,
			],
			[
				"idempotencyInProgress",
				LedgerError.idempotencyInProgress(),
				"IDEMPOTENCY_IN_PROGRESS",
				409,
				true,
			],
			["unavailable", LedgerError.unavailable(), "UNAVAILABLE", 503, true],
			["internal", LedgerError.internal(), "INTERNAL", 500, false],
		] as const)("%s", (_name, error, code, status, transient) => {
			expect(error.code).toBe(code);
			expect(error.status).toBe(status);
			expect(error.transient).toBe(transient);
			expect(error.message).toBe(BASE_ERROR_CODES[code].message);
		});

		it("attaches details to insufficientFunds", () => {
			const error = LedgerError.insufficientFunds("short", { accountId: "a1", shortfall: 40 });
			expect(error.details).toEqual({ accountId: "a1", shortfall: 40 });
		});
	});

	describe("fromCode", () => {
		it("uses the registry message and status", () => {
			const error = LedgerError.fromCode("IDEMPOTENCY_CONFLICT");
			expect(error.message).toBe("Idempotency key reused with a different request");
			expect(error.status).toBe(409);
		});

		it("accepts a message override", () => {
			const error = LedgerError.fromCode("NOT_FOUND", { message: "Account acc-1 not found" });
			expect(error.message).toBe("Account acc-1 not found");
			expect(error.status).toBe(404);
		});
	});

	describe("is", () => {
		it("narrows by code", () => {
			const error: unknown = LedgerError.notFound();
			expect(LedgerError.is(error)).toBe(true);
			expect(LedgerError.is(error, "NOT_FOUND")).toBe(true);
			expect(LedgerError.is(error, "INTERNAL")).toBe(false);
			expect(LedgerError.is(new Error("plain"))).toBe(false);
		});
	});

	it("keeps InsufficientFunds and IdempotencyConflict distinct although both map to 409", () => {
		expect(BASE_ERROR_CODES.INSUFFICIENT_FUNDS.status).toBe(
			BASE_ERROR_CODES.IDEMPOTENCY_CONFLICT.status,
		);
		expect(LedgerError.insufficientFunds().code).not.toBe(LedgerError.idempotencyConflict().code);
	});
});

describe("createErrorCodes", () => {
	it("returns a frozen registry", () => {
		const codes = createErrorCodes({ INVOICE_LOCKED: { message: "Invoice is locked", status: 423 } });
		expect(Object.isFrozen(codes)).toBe(true);
		expect(codes.INVOICE_LOCKED.status).toBe(423);
	});
});
