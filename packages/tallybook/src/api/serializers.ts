// =============================================================================
// SERIALIZERS: Public ledger shapes to snake_case wire JSON
// =============================================================================

import type { Account, LedgerEntry, StatementPage, TransferResult } from "@tallybook/core";

export function serializeAccount(account: Account) {
	return {
		id: account.id,
		owner_name: account.ownerName,
		balance: account.balance,
		created_at: account.createdAt,
	};
}

export function serializeEntry(entry: LedgerEntry) {
	return {
		id: entry.id,
		ts: entry.ts,
		account_id: entry.accountId,
		amount: entry.amount,
		type: entry.type,
		ref: entry.ref,
		transfer_id: entry.transferId,
	};
}

export function serializeTransfer(result: TransferResult) {
	return {
		transfer_id: result.transferId,
		amount: result.amount,
		source: serializeAccount(result.source),
		dest: serializeAccount(result.destination),
		debit: serializeEntry(result.debit),
		credit: serializeEntry(result.credit),
	};
}

export function serializeStatement(page: StatementPage<LedgerEntry>) {
	return {
		items: page.items.map(serializeEntry),
		next_cursor: page.nextCursor,
	};
}
