// =============================================================================
// ENTRY MANAGER
// =============================================================================
// The only code path that changes a balance. Every change writes exactly one
// immutable entry in the same storage transaction.

import type {
	Account,
	EntryType,
	LedgerEntry,
	LedgerTransactionAdapter,
	TallybookContext,
} from "@tallybook/core";
import { LedgerError } from "@tallybook/core";
import { MODELS } from "../db/schema.js";
import { checkCreditWithinRange, checkSufficientFunds } from "./balance-check.js";
import { type AccountRow, rawToAccount, rawToEntry } from "./row-mappers.js";

export interface ApplyEntryParams {
	accountId: string;
	amount: number;
	type: EntryType;
	ref: string | null;
	transferId: string | null;
}

/**
 * Apply one signed balance change and append its entry.
 *
 * The caller must hold the account's lock (see `lockAccounts`) inside `tx`.
 * A DEBIT that would overdraw the account fails before anything is written.
 */
export async function applyEntry(
	tx: LedgerTransactionAdapter,
	ctx: TallybookContext,
	params: ApplyEntryParams,
): Promise<{ entry: LedgerEntry; account: Account }> {
	const { accountId, amount, type, ref, transferId } = params;
	const where = [{ field: "id", operator: "eq" as const, value: accountId }];

	const row = await tx.findOne<AccountRow>({ model: MODELS.account, where, forUpdate: true });
	if (!row) throw LedgerError.notFound(`Account ${accountId} not found`);
	const current = rawToAccount(row);

	if (type === "DEBIT") {
		checkSufficientFunds({ accountId, balance: current.balance, amount });
	} else {
		checkCreditWithinRange({ balance: current.balance, amount });
	}
	const balanceAfter = type === "DEBIT" ? current.balance - amount : current.balance + amount;

	const updated = await tx.update<AccountRow>({
		model: MODELS.account,
		where,
		update: { balance: balanceAfter },
	});
	if (!updated) throw LedgerError.notFound(`Account ${accountId} not found`);

	const entryRow = await tx.create({
		model: MODELS.entry,
		data: {
			id: ctx.generateId(),
			ts: ctx.clock.now(),
			accountId,
			amount,
			type,
			ref,
			transferId,
			balanceAfter,
		},
	});

	return { entry: rawToEntry(entryRow), account: rawToAccount(updated) };
}
