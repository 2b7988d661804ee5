// =============================================================================
// TABLE DEFINITIONS
// =============================================================================
// Storage layout for the ledger. Model names used with the adapter are the
// table names below; adapters convert column names to camelCase fields.

export interface ColumnDefinition {
	type: "text" | "integer" | "bigint" | "timestamp";
	primaryKey?: boolean;
	notNull?: boolean;
	default?: string;
	/** SQL boolean expression added as a column CHECK constraint */
	check?: string;
	references?: { table: string; column: string };
}

export interface TableDefinition {
	columns: Record<string, ColumnDefinition>;
	/** Composite primary key, when no single column carries `primaryKey` */
	primaryKey?: string[];
	indexes?: Array<{ name: string; columns: string[]; unique?: boolean }>;
	/** Rows are append-only: UPDATE and DELETE are rejected by a trigger */
	immutable?: boolean;
}

export const MODELS = {
	account: "account",
	entry: "ledger_entry",
	idempotency: "idempotency_record",
} as const;

export const CORE_TABLES: Record<string, TableDefinition> = {
	[MODELS.account]: {
		columns: {
			id: { type: "text", primaryKey: true, notNull: true },
			owner_name: { type: "text", notNull: true, check: "length(owner_name) BETWEEN 1 AND 255" },
			balance: { type: "bigint", notNull: true, default: "0", check: "balance >= 0" },
			created_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
	},
	[MODELS.entry]: {
		columns: {
			id: { type: "text", primaryKey: true, notNull: true },
			ts: { type: "timestamp", notNull: true },
			account_id: {
				type: "text",
				notNull: true,
				references: { table: MODELS.account, column: "id" },
			},
			amount: { type: "bigint", notNull: true, check: "amount > 0" },
			type: { type: "text", notNull: true, check: "type IN ('DEBIT', 'CREDIT')" },
			ref: { type: "text" },
			transfer_id: { type: "text" },
			balance_after: { type: "bigint", notNull: true, check: "balance_after >= 0" },
		},
		indexes: [
			{ name: "idx_ledger_entry_account_ts", columns: ["account_id", "ts DESC", "id DESC"] },
			{ name: "idx_ledger_entry_transfer", columns: ["transfer_id"] },
		],
		immutable: true,
	},
	[MODELS.idempotency]: {
		columns: {
			route: { type: "text", notNull: true },
			key: { type: "text", notNull: true, check: "length(key) BETWEEN 1 AND 255" },
			fingerprint: { type: "text", notNull: true },
			status: { type: "text", notNull: true, check: "status IN ('pending', 'completed')" },
			result_data: { type: "text" },
			created_at: { type: "timestamp", notNull: true, default: "NOW()" },
			completed_at: { type: "timestamp" },
			expires_at: { type: "timestamp", notNull: true },
		},
		primaryKey: ["route", "key"],
		indexes: [{ name: "idx_idempotency_record_expires", columns: ["expires_at"] }],
	},
};
