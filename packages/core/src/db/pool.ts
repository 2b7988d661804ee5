// =============================================================================
// POOL TYPES & CONSTANTS: Shared across SQL adapter pool modules
// =============================================================================

import type { LedgerAdapter } from "./adapter.js";

/**
 * Minimal interface for a pg-compatible connection pool.
 * Matches the `pg.Pool` surface we need without importing `pg` types.
 */
export interface PoolLike {
	end(): Promise<void>;
	totalCount: number;
	idleCount: number;
	waitingCount: number;
}

export interface PoolStats {
	totalCount: number;
	idleCount: number;
	/** Clients checked out (in use) */
	activeCount: number;
	/** Callers waiting for a client */
	waitingCount: number;
}

export interface PooledAdapterResult {
	adapter: LedgerAdapter;
	/** Shut down the pool. Call once during application shutdown. */
	close: () => Promise<void>;
	stats: () => PoolStats;
}

/**
 * Pool settings for a single ledger API instance.
 * Spread into `new Pool()` and override as needed.
 */
export const RECOMMENDED_POOL_CONFIG = {
	max: 20,
	idleTimeoutMillis: 30_000,
	connectionTimeoutMillis: 10_000,
	statement_timeout: 30_000,
} as const;

export function getPoolStats(pool: PoolLike): PoolStats {
	return {
		totalCount: pool.totalCount,
		idleCount: pool.idleCount,
		activeCount: pool.totalCount - pool.idleCount,
		waitingCount: pool.waitingCount,
	};
}

/**
 * Create a PooledAdapterResult. When `destroyFn` is given it owns the pool's
 * shutdown (Kysely's `destroy()` ends the pool it was built on).
 */
export function createPooledAdapterResult(
	adapter: LedgerAdapter,
	pool: PoolLike,
	destroyFn?: () => Promise<void>,
): PooledAdapterResult {
	let closed = false;
	return {
		adapter,
		close: async () => {
			if (closed) return;
			closed = true;
			if (destroyFn) await destroyFn();
			else await pool.end();
		},
		stats: () => getPoolStats(pool),
	};
}
