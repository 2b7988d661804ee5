import type { LedgerEntry } from "@tallybook/core";
import { MODELS, type Tallybook } from "tallybook";

/**
 * Assert that a specific account has the expected balance.
 */
export async function assertAccountBalance(
	tallybook: Tallybook,
	accountId: string,
	expectedBalance: number,
): Promise<void> {
	const account = await tallybook.accounts.get(accountId);
	if (account.balance !== expectedBalance) {
		throw new Error(
			`Account ${accountId}: expected balance ${expectedBalance}, got ${account.balance}`,
		);
	}
}

/**
 * Assert that the balances of `accountIds` add up to `expectedTotal`.
 * Transfers between them must leave the total unchanged.
 */
export async function assertBalancesConserved(
	tallybook: Tallybook,
	accountIds: string[],
	expectedTotal: number,
): Promise<void> {
	let total = 0;
	for (const id of accountIds) {
		const account = await tallybook.accounts.get(id);
		if (account.balance < 0) {
			throw new Error(`Account ${id} has a negative balance: ${account.balance}`);
		}
		total += account.balance;
	}
	if (total !== expectedTotal) {
		throw new Error(`Balances sum to ${total}, expected ${expectedTotal}`);
	}
}

/**
 * Assert that a transfer wrote exactly one DEBIT and one CREDIT of the same
 * amount, on two different accounts.
 */
export async function assertTransferPair(tallybook: Tallybook, transferId: string): Promise<void> {
	const ctx = await tallybook.$context;
	const entries = await ctx.adapter.findMany<Pick<LedgerEntry, "accountId" | "type" | "amount">>({
		model: MODELS.entry,
		where: [{ field: "transferId", operator: "eq", value: transferId }],
	});

	if (entries.length !== 2) {
		throw new Error(`Transfer ${transferId}: expected 2 entries, found ${entries.length}`);
	}
	const debit = entries.find((e) => e.type === "DEBIT");
	const credit = entries.find((e) => e.type === "CREDIT");
	if (!debit || !credit) {
		throw new Error(`Transfer ${transferId}: expected one DEBIT and one CREDIT`);
	}
	if (Number(debit.amount) !== Number(credit.amount)) {
		throw new Error(
			`Transfer ${transferId}: DEBIT ${debit.amount} does not match CREDIT ${credit.amount}`,
		);
	}
	if (debit.accountId === credit.accountId) {
		throw new Error(`Transfer ${transferId}: both entries on account ${debit.accountId}`);
	}
}
