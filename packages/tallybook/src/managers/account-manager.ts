// =============================================================================
// ACCOUNT MANAGER
// =============================================================================
// Account records: creation, lookup, and exclusive access for writers.

import type { Account, LedgerTransactionAdapter, TallybookContext } from "@tallybook/core";
import { LedgerError, orderedAccountLockKeys } from "@tallybook/core";
import { MODELS } from "../db/schema.js";
import { withStorageGuard } from "../infrastructure/storage-guard.js";
import { type AccountRow, rawToAccount } from "./row-mappers.js";
import { validateAccountId, validateOwnerName } from "./validation.js";

export async function createAccount(
	ctx: TallybookContext,
	params: { ownerName: string },
): Promise<Account> {
	const ownerName = validateOwnerName(params.ownerName);

	const row = await withStorageGuard(ctx, "createAccount", () =>
		ctx.adapter.create({
			model: MODELS.account,
			data: {
				id: ctx.generateId(),
				ownerName,
				balance: 0,
				createdAt: ctx.clock.now(),
			},
		}),
	);
	const account = rawToAccount(row);

	ctx.logger.info("account.created", { accountId: account.id, ownerName });
	return account;
}

export async function getAccount(ctx: TallybookContext, accountId: string): Promise<Account> {
	validateAccountId(accountId);

	const row = await withStorageGuard(ctx, "getAccount", () =>
		ctx.adapter.findOne<AccountRow>({
			model: MODELS.account,
			where: [{ field: "id", operator: "eq", value: accountId }],
		}),
	);
	if (!row) throw LedgerError.notFound(`Account ${accountId} not found`);
	return rawToAccount(row);
}

/**
 * Take exclusive access to every listed account for the rest of `tx`.
 *
 * Advisory locks are acquired in ascending lock-key order, then the rows are
 * read FOR UPDATE in ascending id order. All writers go through here, so
 * lock acquisition order is the same everywhere.
 */
export async function lockAccounts(
	tx: LedgerTransactionAdapter,
	accountIds: string[],
): Promise<void> {
	for (const key of orderedAccountLockKeys(accountIds)) {
		await tx.advisoryLock("account", key);
	}

	for (const id of [...new Set(accountIds)].sort()) {
		const row = await tx.findOne<AccountRow>({
			model: MODELS.account,
			where: [{ field: "id", operator: "eq", value: id }],
			forUpdate: true,
		});
		if (!row) throw LedgerError.notFound(`Account ${id} not found`);
	}
}
