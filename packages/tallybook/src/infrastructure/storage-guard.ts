// =============================================================================
// STORAGE GUARD
// =============================================================================
// Domain failures pass through untouched. Anything else thrown while talking
// to storage (driver errors, lock timeouts, lost connections) is reported as
// UNAVAILABLE so callers never mistake it for a ledger outcome.

import type { TallybookContext } from "@tallybook/core";
import { LedgerError } from "@tallybook/core";

export async function withStorageGuard<T>(
	ctx: TallybookContext,
	operation: string,
	fn: () => Promise<T>,
): Promise<T> {
	try {
		return await fn();
	} catch (error) {
		if (error instanceof LedgerError) throw error;
		ctx.logger.error("storage.failure", {
			operation,
			error: error instanceof Error ? error.message : String(error),
		});
		throw LedgerError.unavailable(`Storage unavailable during ${operation}`, error);
	}
}
