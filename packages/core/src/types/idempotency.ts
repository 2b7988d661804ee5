export type IdempotencyStatus = "pending" | "completed";

/** Operations that accept an idempotency key. Keys are scoped per route. */
export type IdempotentRoute = "deposit" | "withdraw" | "transfer";

export interface IdempotencyRecord {
	route: IdempotentRoute;
	key: string;
	fingerprint: string;
	status: IdempotencyStatus;
	/** Deterministically serialized result, set on completion */
	resultData: string | null;
	createdAt: string;
	completedAt: string | null;
	/** Completed records are reusable until this instant */
	expiresAt: string;
}

export type ReservationResult<T> =
	| { status: "reserved" }
	| { status: "existing"; result: T }
	| { status: "conflict" }
	| { status: "in_progress" };
