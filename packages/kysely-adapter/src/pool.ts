// =============================================================================
// CONNECTION POOL
// =============================================================================

import type { PooledAdapterResult, PoolLike } from "@tallybook/core";
import { createPooledAdapterResult } from "@tallybook/core";
import type { Kysely } from "kysely";
import { type KyselyAdapterOptions, kyselyAdapter } from "./adapter.js";

export type { PooledAdapterResult, PoolLike, PoolStats } from "@tallybook/core";
export { RECOMMENDED_POOL_CONFIG } from "@tallybook/core";

export interface KyselyPooledAdapterConfig<DB> extends KyselyAdapterOptions {
	/** A pg.Pool instance (or compatible pool) */
	pool: PoolLike;
	/** A Kysely instance created from the same pool */
	db: Kysely<DB>;
}

/**
 * Wrap a pool + Kysely instance into a LedgerAdapter with monitoring and shutdown.
 *
 * @example
 * ```ts
 * const pool = new Pool({ ...RECOMMENDED_POOL_CONFIG, connectionString });
 * const db = new Kysely({ dialect: new PostgresDialect({ pool }) });
 *
 * const { adapter, close, stats } = createPooledAdapter({ pool, db });
 * const ledger = createTallybook({ database: adapter });
 *
 * // On shutdown:
 * await close();
 * ```
 */
export function createPooledAdapter<DB>(config: KyselyPooledAdapterConfig<DB>): PooledAdapterResult {
	const { pool, db, ...options } = config;
	return createPooledAdapterResult(kyselyAdapter(db, options), pool, () => db.destroy());
}
