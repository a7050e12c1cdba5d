// =============================================================================
// CONNECTION POOL CONFIGURATION
// =============================================================================
// Pool monitoring and shutdown for a Kysely instance built on a pg pool.
// Pool types, constants, and helpers are shared from @rowbind/core/db.

import { getPoolStats, type PooledDriver, type PoolLike } from "@rowbind/core/db";
import type { Kysely } from "kysely";
import { kyselyDriver } from "./driver.js";

// Re-export shared pool types and constants for convenience
export type { PooledDriver, PoolLike, PoolStats } from "@rowbind/core/db";
export { RECOMMENDED_POOL_CONFIG } from "@rowbind/core/db";

export interface KyselyPooledDriverConfig {
	/** A pg.Pool instance (or compatible pool) */
	pool: PoolLike;
	/** A Kysely database instance created from the same pool */
	// biome-ignore lint/suspicious/noExplicitAny: Kysely generic type varies by schema
	db: Kysely<any>;
}

/**
 * Wrap a pool + Kysely instance into a driver with monitoring and shutdown.
 * `close()` destroys the Kysely instance, which ends the pool it was built on.
 *
 * @example
 * ```ts
 * import { Pool } from "pg";
 * import { Kysely, PostgresDialect } from "kysely";
 * import { createPooledDriver, RECOMMENDED_POOL_CONFIG } from "@rowbind/kysely-adapter";
 *
 * const pool = new Pool({
 *   ...RECOMMENDED_POOL_CONFIG,
 *   connectionString: process.env.DATABASE_URL,
 * });
 * const db = new Kysely({ dialect: new PostgresDialect({ pool }) });
 *
 * const driver = createPooledDriver({ pool, db });
 * const dbMap = createDbMap({ dialect: "postgres", driver });
 *
 * // On shutdown:
 * await dbMap.close();
 * ```
 */
export function createPooledDriver(config: KyselyPooledDriverConfig): PooledDriver {
	const { pool, db } = config;
	const driver = kyselyDriver(db);
	return {
		...driver,
		close: () => db.destroy(),
		stats: () => getPoolStats(pool),
	};
}
