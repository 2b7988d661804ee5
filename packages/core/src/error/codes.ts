// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Error code registry with HTTP status codes and default messages.
// Transport layers read `status`; callers read `transient` to decide on retries.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether the condition may change between attempts.
	 *
	 * - `true`: retrying later may succeed (funds may arrive, a lock may free up).
	 * - `false` (default): the same request will always fail the same way.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient: the ledger state or the storage may change
	INSUFFICIENT_FUNDS: { message: "Insufficient funds", status: 409, transient: true },
	IDEMPOTENCY_IN_PROGRESS: {
		message: "A request with this idempotency key is still in progress",
		status: 409,
		transient: true,
	},
	UNAVAILABLE: { message: "Storage unavailable", status: 503, transient: true },

	// Deterministic: the same request fails the same way
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400, transient: false },
	NOT_FOUND: { message: "Resource not found", status: 404, transient: false },
	SELF_TRANSFER_NOT_ALLOWED: {
		message: "Source and destination must differ",
		status: 400,
		transient: false,
	},
	IDEMPOTENCY_CONFLICT: {
		message: "Idempotency key reused with a different request",
		status: 409,
		transient: false,
	},
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;

/**
 * Create typed error codes for an embedding application. Returns a frozen object.
 *
 * @example
 * ```ts
 * export const BILLING_ERROR_CODES = createErrorCodes({
 *   INVOICE_LOCKED: { message: "Invoice is locked", status: 423 },
 * });
 * ```
 */
export function createErrorCodes<T extends Record<string, RawErrorCode>>(codes: T): Readonly<T> {
	return Object.freeze(codes);
}
