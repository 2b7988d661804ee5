export type EntryType = "DEBIT" | "CREDIT";

/** Immutable record of one balance change. */
export interface LedgerEntry {
	id: string;
	/** ISO-8601 UTC */
	ts: string;
	accountId: string;
	/** Always positive; the sign comes from `type`. */
	amount: number;
	type: EntryType;
	/** Caller memo */
	ref: string | null;
	/** Shared by the two legs of a transfer, null otherwise */
	transferId: string | null;
	/** Account balance right after this entry was applied */
	balanceAfter: number;
}
