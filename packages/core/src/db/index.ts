export type {
	LedgerAdapter,
	LedgerAdapterOptions,
	LedgerTransactionAdapter,
	SortBy,
	Where,
	WhereOperator,
} from "./adapter.js";
export {
	buildWhereClause,
	inValues,
	keysToCamel,
	keysToSnake,
	toCamelCase,
	toSnakeCase,
	toSortList,
} from "./adapter-utils.js";
export {
	createPooledAdapterResult,
	getPoolStats,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
export { createTableResolver, isValidSchemaName } from "./schema-prefix.js";
export { buildSqlAdapterMethods, type SqlExecutor } from "./sql-adapter-methods.js";
