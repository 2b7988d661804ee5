import type { LedgerAdapter } from "../db/adapter.js";
import type { LedgerClock, TallybookLogger } from "./config.js";

export interface TallybookContext {
	adapter: LedgerAdapter;
	options: ResolvedTallybookOptions;
	logger: TallybookLogger;
	clock: LedgerClock;
	generateId: () => string;
}

export interface ResolvedTallybookOptions {
	/** PostgreSQL schema for all ledger tables */
	schema: string;
	advanced: ResolvedAdvancedOptions;
}

export interface ResolvedAdvancedOptions {
	idempotencyTTL: number;
	reservationTimeoutMs: number;
	lockTimeoutMs: number;
	maxTransactionAmount: number;
	statementDefaultLimit: number;
	statementMaxLimit: number;
	cursorSecret: string;
}
