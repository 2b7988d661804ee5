import type { Account } from "./account.js";
import type { LedgerEntry } from "./entry.js";

export interface TransferResult {
	transferId: string;
	amount: number;
	debit: LedgerEntry;
	credit: LedgerEntry;
	/** Source account after the debit */
	source: Account;
	/** Destination account after the credit */
	destination: Account;
}
