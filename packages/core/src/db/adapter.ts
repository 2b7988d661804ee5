// =============================================================================
// LEDGER ADAPTER INTERFACE
// =============================================================================
// Storage seam for the ledger. Managers only speak this interface, so the
// in-memory and PostgreSQL backings are interchangeable. Model names are the
// snake_case table names; field names are camelCase and adapters convert.

import type { LockNamespace } from "../utils/lock.js";

export interface Where {
	field: string;
	operator: WhereOperator;
	value: unknown;
}

export type WhereOperator =
	| "eq"
	| "ne"
	| "gt"
	| "gte"
	| "lt"
	| "lte"
	| "in"
	| "is_null"
	| "is_not_null";

export interface SortBy {
	field: string;
	direction: "asc" | "desc";
}

export interface LedgerAdapter {
	id: string;

	// CRUD operations
	create<T extends Record<string, unknown>>(data: { model: string; data: T }): Promise<T>;

	findOne<T>(data: { model: string; where: Where[]; forUpdate?: boolean }): Promise<T | null>;

	findMany<T>(data: {
		model: string;
		where?: Where[];
		limit?: number;
		/** One key or a list of keys applied in order */
		sortBy?: SortBy | SortBy[];
	}): Promise<T[]>;

	update<T>(data: {
		model: string;
		where: Where[];
		update: Record<string, unknown>;
	}): Promise<T | null>;

	/** Returns the number of deleted rows. */
	delete(data: { model: string; where: Where[] }): Promise<number>;

	count(data: { model: string; where?: Where[] }): Promise<number>;

	// Atomicity and mutual exclusion
	/**
	 * Run `fn` in one storage transaction. Every write inside becomes visible
	 * together on success and none of them does when `fn` throws.
	 */
	transaction<T>(fn: (tx: LedgerTransactionAdapter) => Promise<T>): Promise<T>;

	/**
	 * Exclusive lock on `key` within `namespace`, held until the enclosing
	 * transaction ends. Keys in different namespaces never conflict.
	 * Outside a transaction the lock is released as soon as it is acquired.
	 */
	advisoryLock(namespace: LockNamespace, key: number): Promise<void>;

	// Adapter capabilities
	options?: LedgerAdapterOptions;
}

export type LedgerTransactionAdapter = Omit<LedgerAdapter, "transaction">;

export interface LedgerAdapterOptions {
	supportsAdvisoryLocks: boolean;
	supportsForUpdate: boolean;
	supportsReturning: boolean;
	dialectName: "postgres" | "memory";
	/** PostgreSQL schema for table name qualification. Set by the ledger context. */
	schema?: string;
	/** Lock wait bound in ms. Read on every transaction. */
	lockTimeoutMs?: number;
}
