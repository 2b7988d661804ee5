// =============================================================================
// ARGUMENT VALIDATION
// =============================================================================
// Runs before any storage access, so invalid requests never reserve a key.

import type { TallybookContext } from "@tallybook/core";
import { isValidAmount, LedgerError } from "@tallybook/core";

export const MAX_OWNER_NAME_LENGTH = 255;
export const MAX_IDEMPOTENCY_KEY_LENGTH = 255;
export const MAX_MEMO_LENGTH = 1000;

export function validateAmount(ctx: TallybookContext, amount: unknown): number {
	const max = ctx.options.advanced.maxTransactionAmount;
	if (!isValidAmount(amount, max)) {
		throw LedgerError.invalidArgument(`Amount must be a positive integer no greater than ${max}`);
	}
	return amount;
}

export function validateIdempotencyKey(key: unknown): string {
	if (typeof key !== "string" || key.length === 0) {
		throw LedgerError.invalidArgument("Idempotency key is required");
	}
	if (key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
		throw LedgerError.invalidArgument(
			`Idempotency key must be at most ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
		);
	}
	return key;
}

export function validateMemo(memo: unknown): string | null {
	if (memo === undefined || memo === null) return null;
	if (typeof memo !== "string") {
		throw LedgerError.invalidArgument("Memo must be a string");
	}
	if (memo.length > MAX_MEMO_LENGTH) {
		throw LedgerError.invalidArgument(`Memo must be at most ${MAX_MEMO_LENGTH} characters`);
	}
	return memo;
}

export function validateAccountId(accountId: unknown, label = "Account id"): string {
	if (typeof accountId !== "string" || accountId.length === 0) {
		throw LedgerError.invalidArgument(`${label} is required`);
	}
	return accountId;
}

export function validateOwnerName(ownerName: unknown): string {
	if (typeof ownerName !== "string") {
		throw LedgerError.invalidArgument("Owner name must be a string");
	}
	const trimmed = ownerName.trim();
	if (trimmed.length === 0) {
		throw LedgerError.invalidArgument("Owner name must not be empty");
	}
	if (trimmed.length > MAX_OWNER_NAME_LENGTH) {
		throw LedgerError.invalidArgument(
			`Owner name must be at most ${MAX_OWNER_NAME_LENGTH} characters`,
		);
	}
	return trimmed;
}
