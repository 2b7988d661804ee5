/**
 * Advisory lock classes, each with its own keyspace. Acquisition order is
 * idempotency before account; a transaction holds at most one idempotency lock.
 */
export const LOCK_NAMESPACES = {
	idempotency: 1,
	account: 2,
} as const;

export type LockNamespace = keyof typeof LOCK_NAMESPACES;

/** Deterministic 32-bit hash for pg_advisory_xact_lock key */
export function hashLockKey(input: string): number {
	let hash = 0;
	for (let i = 0; i < input.length; i++) {
		const char = input.charCodeAt(i);
		hash = ((hash << 5) - hash + char) | 0;
	}
	return hash;
}

export function accountLockKey(accountId: string): number {
	return hashLockKey(accountId);
}

export function idempotencyLockKey(route: string, key: string): number {
	return hashLockKey(`${route}:${key}`);
}

/**
 * Lock keys for a set of accounts in the global acquisition order:
 * ascending numeric key, duplicates removed. Every writer locks in this
 * order, so two transfers in opposite directions cannot deadlock.
 */
export function orderedAccountLockKeys(accountIds: string[]): number[] {
	const keys = new Set(accountIds.map(accountLockKey));
	return [...keys].sort((a, b) => a - b);
}
