import type { LedgerAdapter } from "../db/adapter.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface TallybookLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

/** Time source for entry and account timestamps. */
export interface LedgerClock {
	now(): Date;
}

export interface TallybookOptions {
	/** Storage adapter instance or factory function */
	database: LedgerAdapter | (() => LedgerAdapter);

	/** Custom logger. Default: console logger at `info` */
	logger?: TallybookLogger;

	/** Time source. Default: monotonic wall clock */
	clock?: LedgerClock;

	/** ID generator for accounts, entries and transfers. Default: random UUID */
	generateId?: () => string;

	/** PostgreSQL schema name for all ledger tables. Default: "tallybook" */
	schema?: string;

	/** Advanced configuration */
	advanced?: TallybookAdvancedOptions;
}

export interface TallybookAdvancedOptions {
	/** How long a completed idempotency record is replayed, in ms. Default: 24h */
	idempotencyTTL?: number;
	/** Age after which a pending reservation counts as abandoned, in ms. Default: 30s */
	reservationTimeoutMs?: number;
	/** Lock wait bound in ms, applied by adapters that support it. Default: 3000 */
	lockTimeoutMs?: number;
	/** Largest single amount in minor units. Default: 100_000_000_000 */
	maxTransactionAmount?: number;
	/** Statement page size when none is requested. Default: 50 */
	statementDefaultLimit?: number;
	/** Largest statement page size. Default: 200 */
	statementMaxLimit?: number;
	/** HMAC key for statement cursors. Default: random per process */
	cursorSecret?: string;
}
