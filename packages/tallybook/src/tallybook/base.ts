// =============================================================================
// TALLYBOOK -- Main entry point
// =============================================================================
// Creates the Tallybook instance that provides the full ledger API.

import type {
	Account,
	LedgerEntry,
	StatementPage,
	StatementParams,
	TallybookContext,
	TallybookOptions,
	TransferResult,
} from "@tallybook/core";
import { validateConfig } from "../config/index.js";
import { buildContext } from "../context/context.js";
import * as accounts from "../managers/account-manager.js";
import { cleanupExpiredIdempotencyRecords } from "../managers/idempotency.js";
import { listEntries } from "../managers/statement-manager.js";
import * as transactions from "../managers/transaction-manager.js";

// =============================================================================
// TALLYBOOK INTERFACE
// =============================================================================

export interface Tallybook {
	accounts: {
		create: (params: { ownerName: string }) => Promise<Account>;
		get: (accountId: string) => Promise<Account>;
	};
	transactions: {
		deposit: (params: transactions.BalanceChangeParams) => Promise<Account>;
		withdraw: (params: transactions.BalanceChangeParams) => Promise<Account>;
		transfer: (params: transactions.TransferParams) => Promise<TransferResult>;
	};
	statements: {
		list: (accountId: string, params?: StatementParams) => Promise<StatementPage<LedgerEntry>>;
	};
	idempotency: {
		/** Delete expired records and abandoned reservations. */
		cleanupExpired: () => Promise<{ deleted: number }>;
	};
	$context: Promise<TallybookContext>;
	$options: TallybookOptions;
}

// =============================================================================
// CREATE TALLYBOOK
// =============================================================================

export function createTallybook(options: TallybookOptions): Tallybook {
	// Configuration errors surface here rather than on the first call
	validateConfig(options);

	const ctxPromise = buildContext(options);
	const getCtx = () => ctxPromise;

	return {
		accounts: {
			create: async (params) => {
				const ctx = await getCtx();
				return accounts.createAccount(ctx, params);
			},
			get: async (accountId) => {
				const ctx = await getCtx();
				return accounts.getAccount(ctx, accountId);
			},
		},
		transactions: {
			deposit: async (params) => {
				const ctx = await getCtx();
				return transactions.deposit(ctx, params);
			},
			withdraw: async (params) => {
				const ctx = await getCtx();
				return transactions.withdraw(ctx, params);
			},
			transfer: async (params) => {
				const ctx = await getCtx();
				return transactions.transfer(ctx, params);
			},
		},
		statements: {
			list: async (accountId, params) => {
				const ctx = await getCtx();
				return listEntries(ctx, accountId, params);
			},
		},
		idempotency: {
			cleanupExpired: async () => {
				const ctx = await getCtx();
				return cleanupExpiredIdempotencyRecords(ctx);
			},
		},
		$context: ctxPromise,
		$options: options,
	};
}
