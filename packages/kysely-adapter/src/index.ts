export { buildKyselySql, type KyselyAdapterOptions, kyselyAdapter } from "./adapter.js";
export {
	createPooledAdapter,
	type KyselyPooledAdapterConfig,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
