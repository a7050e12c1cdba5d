export { createPgDriver, type PgClientLike, type PgPoolLike, pgDriver } from "./driver.js";
export { getPoolStats, type PooledDriver, type PoolStats, RECOMMENDED_POOL_CONFIG } from "@rowbind/core/db";
