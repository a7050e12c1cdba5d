// =============================================================================
// NODE-POSTGRES DRIVER — SqlDriver implementation backed by a pg Pool
// =============================================================================
// Autocommit statements go through `pool.query`. A transaction checks out one
// client for its whole lifetime and always returns it to the pool, on commit,
// on rollback, and when BEGIN itself fails.

import {
	type ExecResult,
	getPoolStats,
	type PooledDriver,
	type Row,
	RECOMMENDED_POOL_CONFIG,
	type SqlTransactionHandle,
} from "@rowbind/core/db";
import pg, { type PoolConfig } from "pg";

interface PgResult {
	rows: Row[];
	rowCount: number | null;
}

/** The client surface a transaction needs. Matches `pg.PoolClient`. */
export interface PgClientLike {
	query(text: string, values?: unknown[]): Promise<PgResult>;
	release(err?: Error | boolean): void;
}

/** The pool surface the driver needs. Matches `pg.Pool`. */
export interface PgPoolLike {
	query(text: string, values?: unknown[]): Promise<PgResult>;
	connect(): Promise<PgClientLike>;
	end(): Promise<void>;
	totalCount: number;
	idleCount: number;
	waitingCount: number;
}

function toExecResult(result: PgResult): ExecResult {
	return { rowsAffected: result.rowCount ?? 0 };
}

async function beginOn(pool: PgPoolLike): Promise<SqlTransactionHandle> {
	const client = await pool.connect();
	try {
		await client.query("BEGIN");
	} catch (error) {
		client.release(error instanceof Error ? error : true);
		throw error;
	}

	let released = false;

	async function finish(command: "COMMIT" | "ROLLBACK"): Promise<void> {
		// Destroying the client after a failed COMMIT already ended the transaction.
		if (released) return;
		released = true;
		try {
			await client.query(command);
		} catch (error) {
			// A client that failed to end its transaction is not reused.
			client.release(error instanceof Error ? error : true);
			throw error;
		}
		client.release();
	}

	return {
		query: async (sql, params) => (await client.query(sql, params)).rows,
		execute: async (sql, params) => toExecResult(await client.query(sql, params)),
		commit: () => finish("COMMIT"),
		rollback: () => finish("ROLLBACK"),
	};
}

/**
 * Create a SqlDriver over an existing pool.
 *
 * @example
 * ```ts
 * import pg from "pg";
 * import { createDbMap } from "@rowbind/core";
 * import { pgDriver } from "@rowbind/pg-adapter";
 *
 * const pool = new pg.Pool({ connectionString: process.env.DATABASE_URL });
 * const dbMap = createDbMap({ dialect: "postgres", driver: pgDriver(pool) });
 * ```
 */
export function pgDriver(pool: PgPoolLike): PooledDriver {
	return {
		id: "pg",
		query: async (sql, params) => (await pool.query(sql, params)).rows,
		execute: async (sql, params) => toExecResult(await pool.query(sql, params)),
		begin: () => beginOn(pool),
		close: () => pool.end(),
		stats: () => getPoolStats(pool),
	};
}

/**
 * Create a pool with the recommended settings (overridable through `config`)
 * and wrap it in a driver.
 */
export function createPgDriver(config: PoolConfig): PooledDriver {
	const pool = new pg.Pool({ ...RECOMMENDED_POOL_CONFIG, ...config });
	return pgDriver(pool);
}
