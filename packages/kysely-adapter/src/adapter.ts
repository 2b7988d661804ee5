// =============================================================================
// KYSELY ADAPTER: LedgerAdapter implementation backed by Kysely + PostgreSQL
// =============================================================================
// CRUD SQL comes from the shared builder in @tallybook/core; this module only
// runs it through Kysely's `sql` template, which keeps every value a bound
// parameter. Locks are transaction-scoped PostgreSQL advisory locks in the
// two-key form, one class id per lock namespace.

import type { LedgerAdapter, LedgerAdapterOptions, LedgerTransactionAdapter, SqlExecutor } from "@tallybook/core";
import type { LockNamespace } from "@tallybook/core";
import { buildSqlAdapterMethods, LOCK_NAMESPACES } from "@tallybook/core";
import type { Kysely, RawBuilder, Transaction } from "kysely";
import { sql } from "kysely";

export interface KyselyAdapterOptions {
	/**
	 * Upper bound for lock waits inside a transaction, in ms. Applied with
	 * `SET LOCAL lock_timeout`. Default: no bound.
	 */
	lockTimeoutMs?: number;
	/** PostgreSQL schema for table names. Overridden by the ledger's `schema` option. */
	schema?: string;
}

/**
 * Build a Kysely sql template from a query string with $N placeholders.
 * Text between placeholders is raw SQL; every placeholder becomes a bound value.
 */
export function buildKyselySql<T>(query: string, params: unknown[]): RawBuilder<T> {
	const chunks: RawBuilder<unknown>[] = [];
	let lastIdx = 0;
	const regex = /\$(\d+)/g;

	for (let match = regex.exec(query); match !== null; match = regex.exec(query)) {
		if (match.index > lastIdx) {
			chunks.push(sql.raw(query.slice(lastIdx, match.index)));
		}
		const paramIndex = Number.parseInt(match[1] ?? "0", 10) - 1;
		chunks.push(sql`${params[paramIndex]}`);
		lastIdx = match.index + match[0].length;
	}

	if (lastIdx < query.length) {
		chunks.push(sql.raw(query.slice(lastIdx)));
	}

	return sql<T>`${sql.join(chunks, sql.raw(""))}`;
}

function createExecutor<DB>(db: Kysely<DB> | Transaction<DB>): SqlExecutor {
	return {
		query: async <T>(query: string, params: unknown[]): Promise<T[]> => {
			const result = await buildKyselySql<T>(query, params).execute(db);
			return [...result.rows];
		},
		mutate: async (query: string, params: unknown[]): Promise<number> => {
			const result = await buildKyselySql(query, params).execute(db);
			return Number(result.numAffectedRows ?? 0n);
		},
		advisoryLock: async (namespace: LockNamespace, key: number): Promise<void> => {
			await sql`SELECT pg_advisory_xact_lock(${LOCK_NAMESPACES[namespace]}, ${key})`.execute(db);
		},
	};
}

/**
 * Create a LedgerAdapter backed by a Kysely database instance.
 *
 * @example
 * ```ts
 * import { Kysely, PostgresDialect } from "kysely";
 * import { Pool } from "pg";
 * import { kyselyAdapter } from "@tallybook/kysely-adapter";
 *
 * const db = new Kysely({ dialect: new PostgresDialect({ pool: new Pool({ connectionString }) }) });
 * const adapter = kyselyAdapter(db, { lockTimeoutMs: 3000 });
 * ```
 */
export function kyselyAdapter<DB>(db: Kysely<DB>, config: KyselyAdapterOptions = {}): LedgerAdapter {
	const options: LedgerAdapterOptions = {
		supportsAdvisoryLocks: true,
		supportsForUpdate: true,
		supportsReturning: true,
		dialectName: "postgres",
		schema: config.schema ?? "public",
		lockTimeoutMs: config.lockTimeoutMs,
	};
	const getSchema = () => options.schema ?? "public";

	return {
		id: "kysely",
		...buildSqlAdapterMethods(createExecutor(db), getSchema),

		transaction: async <T>(fn: (tx: LedgerTransactionAdapter) => Promise<T>): Promise<T> => {
			return db
				.transaction()
				.setIsolationLevel("read committed")
				.execute(async (trx) => {
					if (options.lockTimeoutMs !== undefined) {
						await sql`SELECT set_config('lock_timeout', ${`${options.lockTimeoutMs}ms`}, true)`.execute(
							trx,
						);
					}
					const txAdapter: LedgerTransactionAdapter = {
						id: "kysely",
						...buildSqlAdapterMethods(createExecutor(trx), getSchema),
						options,
					};
					return fn(txAdapter);
				});
		},

		options,
	};
}
