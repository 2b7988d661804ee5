import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export {
	BASE_ERROR_CODES,
	type BaseErrorCode,
	createErrorCodes,
	type RawErrorCode,
} from "./codes.js";

export type LedgerErrorCode = BaseErrorCode;

export class LedgerError extends Error {
	readonly code: string;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether the condition may change between attempts. A transient failure never
	 * consumes the idempotency key, so the caller may retry with the same key.
	 */
	readonly transient: boolean;

	constructor(
		code: string,
		message: string,
		options?: {
			cause?: unknown;
			status?: number;
			transient?: boolean;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? 500;
		this.transient = options?.transient ?? false;
		this.details = options?.details;
		this.name = "LedgerError";
	}

	/**
	 * Create a LedgerError from a typed error code.
	 * Uses the default message and status from BASE_ERROR_CODES.
	 */
	static fromCode(
		code: LedgerErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): LedgerError {
		const raw = BASE_ERROR_CODES[code];
		return new LedgerError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			status: raw.status,
			transient: raw.transient,
			details: options?.details,
		});
	}

	static is(error: unknown, code?: LedgerErrorCode): error is LedgerError {
		return error instanceof LedgerError && (code === undefined || error.code === code);
	}

	// --- Transient ---

	static insufficientFunds(message = "Insufficient funds", details?: Record<string, unknown>) {
		return new LedgerError("INSUFFICIENT_FUNDS", message, { status: 409, transient: true, details });
	}

	static idempotencyInProgress(
		message = "A request with this idempotency key is still in progress",
	) {
		return new LedgerError("IDEMPOTENCY_IN_PROGRESS", message, { status: 409, transient: true });
	}

	static unavailable(message = "Storage unavailable", cause?: unknown) {
		return new LedgerError("UNAVAILABLE", message, { cause, status: 503, transient: true });
	}

	// --- Deterministic ---

	static invalidArgument(message = "Invalid argument", cause?: unknown) {
		return new LedgerError("INVALID_ARGUMENT", message, { cause, status: 400, transient: false });
	}

	static notFound(message = "Resource not found", cause?: unknown) {
		return new LedgerError("NOT_FOUND", message, { cause, status: 404, transient: false });
	}

	static selfTransferNotAllowed(message = "Source and destination must differ") {
		return new LedgerError("SELF_TRANSFER_NOT_ALLOWED", message, {
			status: 400,
			transient: false,
		});
	}

	static idempotencyConflict(message = "Idempotency key reused with a different request") {
		return new LedgerError("IDEMPOTENCY_CONFLICT", message, { status: 409, transient: false });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new LedgerError("INTERNAL", message, { cause, status: 500, transient: false });
	}
}
