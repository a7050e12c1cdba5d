export { kyselyDriver } from "./driver.js";
export {
	createPooledDriver,
	type KyselyPooledDriverConfig,
	type PooledDriver,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
