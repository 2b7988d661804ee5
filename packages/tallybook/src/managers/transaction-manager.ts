// =============================================================================
// TRANSACTION MANAGER
// =============================================================================
// deposit, withdraw and transfer. Each runs as one storage transaction:
// idempotency lookup, account locks, balance changes, idempotency commit.
// Any failure rolls the whole transaction back, reservation included.

import type {
	Account,
	IdempotentRoute,
	LedgerTransactionAdapter,
	TallybookContext,
	TransferResult,
} from "@tallybook/core";
import { computeFingerprint, LedgerError } from "@tallybook/core";
import { withStorageGuard } from "../infrastructure/storage-guard.js";
import { lockAccounts } from "./account-manager.js";
import { applyEntry } from "./entry-manager.js";
import { commitIdempotency, lookupOrReserve, releaseIdempotency } from "./idempotency.js";
import { parseStoredAccount, parseStoredTransfer } from "./row-mappers.js";
import {
	validateAccountId,
	validateAmount,
	validateIdempotencyKey,
	validateMemo,
} from "./validation.js";

export interface BalanceChangeParams {
	accountId: string;
	idempotencyKey: string;
	/** Minor units, positive */
	amount: number;
	memo?: string | null;
}

export interface TransferParams {
	idempotencyKey: string;
	sourceAccountId: string;
	destinationAccountId: string;
	/** Minor units, positive */
	amount: number;
	memo?: string | null;
}

// =============================================================================
// IDEMPOTENT EXECUTION
// =============================================================================

interface IdempotentOperation<T> {
	route: IdempotentRoute;
	key: string;
	/** Semantically relevant request fields */
	request: Record<string, unknown>;
	parseResult: (value: unknown) => T;
	execute: (tx: LedgerTransactionAdapter) => Promise<T>;
}

async function runIdempotent<T>(
	ctx: TallybookContext,
	op: IdempotentOperation<T>,
): Promise<{ result: T; replayed: boolean }> {
	const target = { route: op.route, key: op.key };
	const fingerprint = computeFingerprint({ route: op.route, ...op.request });

	try {
		return await withStorageGuard(ctx, op.route, () =>
			ctx.adapter.transaction(async (tx) => {
				const reservation = await lookupOrReserve(tx, ctx, { ...target, fingerprint }, op.parseResult);

				switch (reservation.status) {
					case "existing":
						return { result: reservation.result, replayed: true };
					case "conflict":
						throw LedgerError.idempotencyConflict(
							`Idempotency key "${op.key}" was already used for a different ${op.route} request`,
						);
					case "in_progress":
						throw LedgerError.idempotencyInProgress();
					case "reserved":
						break;
				}

				try {
					const result = await op.execute(tx);
					await commitIdempotency(tx, ctx, { ...target, result });
					return { result, replayed: false };
				} catch (error) {
					await releaseIdempotency(tx, target);
					throw error;
				}
			}),
		);
	} catch (error) {
		if (error instanceof LedgerError && error.code !== "UNAVAILABLE") {
			ctx.logger.warn(`${op.route}.rejected`, { code: error.code, reason: error.message });
		}
		throw error;
	}
}

// =============================================================================
// OPERATIONS
// =============================================================================

export async function deposit(ctx: TallybookContext, params: BalanceChangeParams): Promise<Account> {
	const accountId = validateAccountId(params.accountId);
	const key = validateIdempotencyKey(params.idempotencyKey);
	const amount = validateAmount(ctx, params.amount);
	const memo = validateMemo(params.memo);

	const { result, replayed } = await runIdempotent(ctx, {
		route: "deposit",
		key,
		request: { accountId, amount, memo },
		parseResult: parseStoredAccount,
		execute: async (tx) => {
			await lockAccounts(tx, [accountId]);
			const { account } = await applyEntry(tx, ctx, {
				accountId,
				amount,
				type: "CREDIT",
				ref: memo,
				transferId: null,
			});
			return account;
		},
	});

	ctx.logger.info(replayed ? "deposit.replayed" : "deposit.applied", {
		accountId,
		amount,
		balance: result.balance,
	});
	return result;
}

export async function withdraw(ctx: TallybookContext, params: BalanceChangeParams): Promise<Account> {
	const accountId = validateAccountId(params.accountId);
	const key = validateIdempotencyKey(params.idempotencyKey);
	const amount = validateAmount(ctx, params.amount);
	const memo = validateMemo(params.memo);

	const { result, replayed } = await runIdempotent(ctx, {
		route: "withdraw",
		key,
		request: { accountId, amount, memo },
		parseResult: parseStoredAccount,
		execute: async (tx) => {
			await lockAccounts(tx, [accountId]);
			const { account } = await applyEntry(tx, ctx, {
				accountId,
				amount,
				type: "DEBIT",
				ref: memo,
				transferId: null,
			});
			return account;
		},
	});

	ctx.logger.info(replayed ? "withdraw.replayed" : "withdraw.applied", {
		accountId,
		amount,
		balance: result.balance,
	});
	return result;
}

/**
 * Move `amount` from source to destination as one DEBIT and one CREDIT
 * sharing a transfer id. Both accounts are locked in global order first;
 * a failed debit means the credit is never attempted.
 */
export async function transfer(
	ctx: TallybookContext,
	params: TransferParams,
): Promise<TransferResult> {
	const key = validateIdempotencyKey(params.idempotencyKey);
	const sourceAccountId = validateAccountId(params.sourceAccountId, "Source account id");
	const destinationAccountId = validateAccountId(
		params.destinationAccountId,
		"Destination account id",
	);
	const amount = validateAmount(ctx, params.amount);
	const memo = validateMemo(params.memo);

	const { result, replayed } = await runIdempotent(ctx, {
		route: "transfer",
		key,
		request: { sourceAccountId, destinationAccountId, amount, memo },
		parseResult: parseStoredTransfer,
		execute: async (tx) => {
			if (sourceAccountId === destinationAccountId) {
				throw LedgerError.selfTransferNotAllowed();
			}
			await lockAccounts(tx, [sourceAccountId, destinationAccountId]);

			const transferId = ctx.generateId();
			const debit = await applyEntry(tx, ctx, {
				accountId: sourceAccountId,
				amount,
				type: "DEBIT",
				ref: memo,
				transferId,
			});
			const credit = await applyEntry(tx, ctx, {
				accountId: destinationAccountId,
				amount,
				type: "CREDIT",
				ref: memo,
				transferId,
			});

			return {
				transferId,
				amount,
				debit: debit.entry,
				credit: credit.entry,
				source: debit.account,
				destination: credit.account,
			};
		},
	});

	ctx.logger.info(replayed ? "transfer.replayed" : "transfer.applied", {
		transferId: result.transferId,
		sourceAccountId,
		destinationAccountId,
		amount,
	});
	return result;
}
