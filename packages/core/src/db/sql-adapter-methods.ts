// =============================================================================
// SQL ADAPTER METHODS: Shared CRUD logic for SQL-backed adapters
// =============================================================================
// The SQL for CRUD is the same whatever runs it. Each SQL adapter only has to
// provide a SqlExecutor; everything else is built here.

import type { LedgerTransactionAdapter, SortBy, Where } from "./adapter.js";
import {
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	toSnakeCase,
	toSortList,
} from "./adapter-utils.js";
import { createTableResolver } from "./schema-prefix.js";
import type { LockNamespace } from "../utils/lock.js";

export interface SqlExecutor {
	/** Execute a statement that returns rows. */
	query<T = Record<string, unknown>>(sql: string, params: unknown[]): Promise<T[]>;
	/** Execute an INSERT/UPDATE/DELETE and return affected row count. */
	mutate(sql: string, params: unknown[]): Promise<number>;
	/** Acquire a transaction-scoped advisory lock. */
	advisoryLock(namespace: LockNamespace, key: number): Promise<void>;
}

function orderByClause(sortBy: SortBy | SortBy[] | undefined): string {
	const keys = toSortList(sortBy);
	if (keys.length === 0) return "";
	const parts = keys.map((s) => `"${toSnakeCase(s.field)}" ${s.direction === "desc" ? "DESC" : "ASC"}`);
	return ` ORDER BY ${parts.join(", ")}`;
}

/**
 * Build the standard adapter methods from a SqlExecutor.
 * Returns everything a LedgerTransactionAdapter needs except `id` and `options`.
 */
export function buildSqlAdapterMethods(
	executor: SqlExecutor,
	getSchema: () => string,
): Omit<LedgerTransactionAdapter, "id" | "options"> {
	return {
		create: async <T extends Record<string, unknown>>({
			model,
			data,
		}: {
			model: string;
			data: T;
		}): Promise<T> => {
			const t = createTableResolver(getSchema());
			const snakeData = keysToSnake(data);
			const columns = Object.keys(snakeData);
			if (columns.length === 0) {
				throw new Error(`Cannot insert empty data into ${model}`);
			}

			const columnList = columns.map((c) => `"${c}"`).join(", ");
			const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
			const rows = await executor.query(
				`INSERT INTO ${t(model)} (${columnList}) VALUES (${placeholders}) RETURNING *`,
				Object.values(snakeData),
			);
			const row = rows[0];
			if (!row) {
				throw new Error(`Insert into ${model} returned no rows`);
			}
			return keysToCamel(row) as T;
		},

		findOne: async <T>({
			model,
			where,
			forUpdate,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			const lockSuffix = forUpdate ? " FOR UPDATE" : "";
			const rows = await executor.query(
				`SELECT * FROM ${t(model)} WHERE ${clause} LIMIT 1${lockSuffix}`,
				params,
			);
			const row = rows[0];
			if (!row) return null;
			return keysToCamel(row) as T;
		},

		findMany: async <T>({
			model,
			where,
			limit,
			sortBy,
		}: {
			model: string;
			where?: Where[];
			limit?: number;
			sortBy?: SortBy | SortBy[];
		}): Promise<T[]> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause}${orderByClause(sortBy)}`;

			if (limit !== undefined) {
				params.push(limit);
				query += ` LIMIT $${params.length}`;
			}

			const rows = await executor.query(query, params);
			return rows.map((r) => keysToCamel(r) as T);
		},

		update: async <T>({
			model,
			where,
			update: updateData,
		}: {
			model: string;
			where: Where[];
			update: Record<string, unknown>;
		}): Promise<T | null> => {
			const snakeData = keysToSnake(updateData);
			const setCols = Object.keys(snakeData);
			if (setCols.length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const setClause = setCols.map((c, i) => `"${c}" = $${i + 1}`).join(", ");
			const { clause, params } = buildWhereClause(where, setCols.length + 1);
			const t = createTableResolver(getSchema());
			const rows = await executor.query(
				`UPDATE ${t(model)} SET ${setClause} WHERE ${clause} RETURNING *`,
				[...Object.values(snakeData), ...params],
			);
			const row = rows[0];
			if (!row) return null;
			return keysToCamel(row) as T;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			return executor.mutate(`DELETE FROM ${t(model)} WHERE ${clause}`, params);
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			const rows = await executor.query<{ count: number }>(
				`SELECT COUNT(*)::int AS count FROM ${t(model)} WHERE ${clause}`,
				params,
			);
			return rows[0]?.count ?? 0;
		},

		advisoryLock: (namespace: LockNamespace, key: number) => executor.advisoryLock(namespace, key),
	};
}
