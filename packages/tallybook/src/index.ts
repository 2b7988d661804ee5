export type {
	Account,
	EntryType,
	LedgerAdapter,
	LedgerEntry,
	StatementPage,
	StatementParams,
	TallybookContext,
	TallybookLogger,
	TallybookOptions,
	TransferResult,
} from "@tallybook/core";
export { LedgerError } from "@tallybook/core";
export * from "./api/index.js";
export { defineTallybookConfig, validateConfig } from "./config/index.js";
export { generateMigrationSql } from "./db/migration.js";
export { CORE_TABLES, MODELS } from "./db/schema.js";
export type { ColumnDefinition, TableDefinition } from "./db/schema.js";
export type { BalanceChangeParams, TransferParams } from "./managers/transaction-manager.js";
export type { Tallybook } from "./tallybook/base.js";
export { createTallybook } from "./tallybook/base.js";
