// =============================================================================
// KYSELY DRIVER — SqlDriver implementation backed by Kysely
// =============================================================================
// Statements arrive fully rendered by the dialect, so they run as raw compiled
// queries: Kysely only supplies the connection, pooling and transaction
// handling of whichever Kysely dialect the instance was built with.

import type { ExecResult, Row, SqlConnection, SqlDriver, SqlTransactionHandle } from "@rowbind/core/db";
import { CompiledQuery, type Kysely } from "kysely";

function toExecResult(numAffectedRows: bigint | undefined, insertId: bigint | undefined): ExecResult {
	return {
		rowsAffected: numAffectedRows === undefined ? 0 : Number(numAffectedRows),
		insertId,
	};
}

/**
 * Build the query/execute pair for a Kysely instance or transaction.
 */
// biome-ignore lint/suspicious/noExplicitAny: Kysely generic type varies by schema
function buildConnection(db: Kysely<any>): SqlConnection {
	return {
		query: async (sql: string, params: unknown[]): Promise<Row[]> => {
			const result = await db.executeQuery<Row>(CompiledQuery.raw(sql, params));
			return result.rows;
		},

		execute: async (sql: string, params: unknown[]): Promise<ExecResult> => {
			const result = await db.executeQuery(CompiledQuery.raw(sql, params));
			return toExecResult(result.numAffectedRows, result.insertId);
		},
	};
}

/**
 * Create a SqlDriver from a Kysely instance.
 *
 * @example
 * ```ts
 * import SQLite from "better-sqlite3";
 * import { Kysely, SqliteDialect } from "kysely";
 * import { createDbMap } from "@rowbind/core";
 * import { kyselyDriver } from "@rowbind/kysely-adapter";
 *
 * const db = new Kysely({ dialect: new SqliteDialect({ database: new SQLite("app.db") }) });
 * const dbMap = createDbMap({ dialect: "sqlite", driver: kyselyDriver(db) });
 * ```
 */
// biome-ignore lint/suspicious/noExplicitAny: Kysely generic type varies by schema
export function kyselyDriver(db: Kysely<any>): SqlDriver {
	return {
		id: "kysely",
		...buildConnection(db),

		begin: async (): Promise<SqlTransactionHandle> => {
			const trx = await db.startTransaction().execute();
			return {
				...buildConnection(trx),
				commit: async () => {
					await trx.commit().execute();
				},
				rollback: async () => {
					await trx.rollback().execute();
				},
			};
		},

		close: () => db.destroy(),
	};
}
