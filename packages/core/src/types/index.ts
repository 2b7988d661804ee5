export type { Account } from "./account.js";
export type {
	LedgerClock,
	LogLevel,
	TallybookAdvancedOptions,
	TallybookLogger,
	TallybookOptions,
} from "./config.js";
export type {
	ResolvedAdvancedOptions,
	ResolvedTallybookOptions,
	TallybookContext,
} from "./context.js";
export type { EntryType, LedgerEntry } from "./entry.js";
export type {
	IdempotencyRecord,
	IdempotencyStatus,
	IdempotentRoute,
	ReservationResult,
} from "./idempotency.js";
export type { CursorPayload, StatementPage, StatementParams } from "./pagination.js";
export type { TransferResult } from "./transfer.js";
