// =============================================================================
// ROW MAPPERS
// =============================================================================
// Adapters hand back camelCase rows whose scalar types depend on the backing
// store: PostgreSQL returns BIGINT as strings and TIMESTAMPTZ as Dates. These
// mappers produce the public shapes with plain numbers and ISO strings.

import type {
	Account,
	EntryType,
	IdempotencyRecord,
	IdempotentRoute,
	LedgerEntry,
	TransferResult,
} from "@tallybook/core";
import { LedgerError } from "@tallybook/core";

type Timestamp = Date | string;
type BigIntColumn = number | string;

export interface AccountRow {
	id: string;
	ownerName: string;
	balance: BigIntColumn;
	createdAt: Timestamp;
}

export interface EntryRow {
	id: string;
	ts: Timestamp;
	accountId: string;
	amount: BigIntColumn;
	type: string;
	ref: string | null;
	transferId: string | null;
	balanceAfter: BigIntColumn;
}

export interface IdempotencyRow {
	route: string;
	key: string;
	fingerprint: string;
	status: string;
	resultData: string | null;
	createdAt: Timestamp;
	completedAt: Timestamp | null;
	expiresAt: Timestamp;
}

function toIso(value: Timestamp): string {
	return new Date(value).toISOString();
}

function toSafeInteger(value: BigIntColumn, column: string): number {
	const n = Number(value);
	if (!Number.isSafeInteger(n)) {
		throw LedgerError.internal(`Column "${column}" holds a value outside the safe integer range`);
	}
	return n;
}

function toEntryType(value: string): EntryType {
	if (value === "DEBIT" || value === "CREDIT") return value;
	throw LedgerError.internal(`Unknown entry type "${value}"`);
}

function toRoute(value: string): IdempotentRoute {
	if (value === "deposit" || value === "withdraw" || value === "transfer") return value;
	throw LedgerError.internal(`Unknown idempotency route "${value}"`);
}

export function rawToAccount(row: AccountRow): Account {
	return {
		id: row.id,
		ownerName: row.ownerName,
		balance: toSafeInteger(row.balance, "balance"),
		createdAt: toIso(row.createdAt),
	};
}

export function rawToEntry(row: EntryRow): LedgerEntry {
	return {
		id: row.id,
		ts: toIso(row.ts),
		accountId: row.accountId,
		amount: toSafeInteger(row.amount, "amount"),
		type: toEntryType(row.type),
		ref: row.ref ?? null,
		transferId: row.transferId ?? null,
		balanceAfter: toSafeInteger(row.balanceAfter, "balance_after"),
	};
}

export function rawToIdempotencyRecord(row: IdempotencyRow): IdempotencyRecord {
	return {
		route: toRoute(row.route),
		key: row.key,
		fingerprint: row.fingerprint,
		status: row.status === "completed" ? "completed" : "pending",
		resultData: row.resultData ?? null,
		createdAt: toIso(row.createdAt),
		completedAt: row.completedAt ? toIso(row.completedAt) : null,
		expiresAt: toIso(row.expiresAt),
	};
}

// =============================================================================
// STORED RESULT PARSERS
// =============================================================================
// Idempotency records keep results as JSON text. Replays parse them back
// into the public shapes, checking every field on the way.

function field(source: unknown, name: string): unknown {
	if (typeof source !== "object" || source === null) {
		throw LedgerError.internal("Stored idempotent result is not an object");
	}
	return Reflect.get(source, name);
}

function stringField(source: unknown, name: string): string {
	const value = field(source, name);
	if (typeof value !== "string") {
		throw LedgerError.internal(`Stored idempotent result has no string "${name}"`);
	}
	return value;
}

function nullableStringField(source: unknown, name: string): string | null {
	const value = field(source, name);
	if (value === null) return null;
	if (typeof value !== "string") {
		throw LedgerError.internal(`Stored idempotent result has an invalid "${name}"`);
	}
	return value;
}

function integerField(source: unknown, name: string): number {
	const value = field(source, name);
	if (typeof value !== "number" || !Number.isSafeInteger(value)) {
		throw LedgerError.internal(`Stored idempotent result has no integer "${name}"`);
	}
	return value;
}

export function parseStoredAccount(value: unknown): Account {
	return {
		id: stringField(value, "id"),
		ownerName: stringField(value, "ownerName"),
		balance: integerField(value, "balance"),
		createdAt: stringField(value, "createdAt"),
	};
}

function parseStoredEntry(value: unknown): LedgerEntry {
	return {
		id: stringField(value, "id"),
		ts: stringField(value, "ts"),
		accountId: stringField(value, "accountId"),
		amount: integerField(value, "amount"),
		type: toEntryType(stringField(value, "type")),
		ref: nullableStringField(value, "ref"),
		transferId: nullableStringField(value, "transferId"),
		balanceAfter: integerField(value, "balanceAfter"),
	};
}

export function parseStoredTransfer(value: unknown): TransferResult {
	return {
		transferId: stringField(value, "transferId"),
		amount: integerField(value, "amount"),
		debit: parseStoredEntry(field(value, "debit")),
		credit: parseStoredEntry(field(value, "credit")),
		source: parseStoredAccount(field(value, "source")),
		destination: parseStoredAccount(field(value, "destination")),
	};
}
