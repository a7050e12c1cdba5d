// =============================================================================
// DBMAP — entry point binding a registry, a dialect and a driver
// =============================================================================

import { createRowBinder } from "../binder/bind.js";
import type { SqlDialect } from "../db/dialect.js";
import { getDialect } from "../db/dialects/index.js";
import type { SqlDriver } from "../db/driver.js";
import { InvalidArgumentError } from "../error/index.js";
import { noopLogger } from "../logger/noop-logger.js";
import type { RecordClass } from "../registry/fields.js";
import { createRegistry, type TypeRegistry } from "../registry/registry.js";
import type { TableMap } from "../registry/table-map.js";
import { createStatementCache } from "../statement/builder.js";
import { buildCreateIndexes, buildCreateTable, buildDropTable, buildTruncate } from "../statement/ddl.js";
import type { DbMapOptions, RowbindLogger } from "../types/config.js";
import { buildExecutorMethods, type ExecutorContext, type SqlExecutor } from "./executor.js";
import { createTracer } from "./trace.js";
import { createTransaction, type Transaction } from "./transaction.js";

export interface DbMap extends SqlExecutor {
	readonly dialect: SqlDialect;
	readonly driver: SqlDriver;
	readonly registry: TypeRegistry;
	readonly logger: RowbindLogger;

	/** Register a record class. See `TypeRegistry.register`. */
	register<T extends object>(type: RecordClass<T>, tableName?: string, schemaName?: string): TableMap<T>;
	tableFor(record: object): TableMap;

	begin(): Promise<Transaction>;
	/**
	 * Run `fn` in a transaction. Commits when it resolves; rolls back and
	 * rethrows when it rejects.
	 */
	transaction<R>(fn: (tx: Transaction) => Promise<R>): Promise<R>;

	/** Log every statement at debug level, to `logger` or the DbMap's logger. */
	traceOn(logger?: RowbindLogger): void;
	traceOff(): void;

	createTables(): Promise<void>;
	createTablesIfNotExists(): Promise<void>;
	dropTables(): Promise<void>;
	dropTablesIfExists(): Promise<void>;
	truncateTables(): Promise<void>;
	createIndexes(): Promise<void>;

	/** Close the driver's pool, if it has one. */
	close(): Promise<void>;
}

function resolveDialect(dialect: DbMapOptions["dialect"] | undefined): SqlDialect {
	if (!dialect) {
		throw new InvalidArgumentError("createDbMap requires a dialect");
	}
	return typeof dialect === "string" ? getDialect(dialect) : dialect;
}

/**
 * Create a DbMap.
 *
 * @example
 * ```ts
 * import { createDbMap } from "@rowbind/core";
 * import { kyselyDriver } from "@rowbind/kysely-adapter";
 *
 * const dbMap = createDbMap({ dialect: "sqlite", driver: kyselyDriver(db) });
 * dbMap.register(Invoice);
 * await dbMap.createTablesIfNotExists();
 * ```
 */
export function createDbMap(options: DbMapOptions): DbMap {
	const dialect = resolveDialect(options.dialect);
	const { driver } = options;
	if (!driver) {
		throw new InvalidArgumentError("createDbMap requires a driver");
	}

	const logger = options.logger ?? noopLogger;
	const registry = options.registry ?? createRegistry();
	const tracer = createTracer(typeof options.trace === "object" ? options.trace : {});
	if (options.trace) tracer.on(logger);

	const ctx: ExecutorContext = {
		dialect,
		registry,
		plans: createStatementCache(dialect),
		binder: createRowBinder(registry, options.typeConverter),
		typeConverter: options.typeConverter,
	};
	const connection = tracer.wrap(driver);

	async function runAll(statements: string[]): Promise<void> {
		for (const sql of statements) {
			await connection.execute(sql, []);
		}
	}

	/** Registered tables, frozen: DDL fixes their shape like a query does. */
	function frozenTables(): TableMap[] {
		const tables = [...registry.tables()];
		for (const table of tables) table.freeze();
		return tables;
	}

	async function begin(): Promise<Transaction> {
		const handle = await driver.begin();
		return createTransaction(ctx, handle, tracer);
	}

	const dbMap: DbMap = {
		...buildExecutorMethods(ctx, connection, () => dbMap),

		dialect,
		driver,
		registry,
		logger,

		register<T extends object>(type: RecordClass<T>, tableName?: string, schemaName?: string) {
			return registry.register(type, tableName, schemaName);
		},
		tableFor: (record) => registry.tableFor(record),

		begin,

		async transaction<R>(fn: (tx: Transaction) => Promise<R>): Promise<R> {
			const tx = await begin();
			try {
				const result = await fn(tx);
				if (tx.active) await tx.commit();
				return result;
			} catch (error) {
				if (tx.active) {
					try {
						await tx.rollback();
					} catch (rollbackError) {
						logger.error("rollback failed", {
							error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
						});
					}
				}
				throw error;
			}
		},

		traceOn(traceLogger) {
			tracer.on(traceLogger ?? logger);
		},

		traceOff() {
			tracer.off();
		},

		createTables: () => runAll(frozenTables().flatMap((t) => buildCreateTable(t, dialect, false))),
		createTablesIfNotExists: () =>
			runAll(frozenTables().flatMap((t) => buildCreateTable(t, dialect, true))),
		dropTables: () => runAll(frozenTables().reverse().map((t) => buildDropTable(t, dialect, false))),
		dropTablesIfExists: () =>
			runAll(frozenTables().reverse().map((t) => buildDropTable(t, dialect, true))),
		truncateTables: () => runAll(frozenTables().map((t) => buildTruncate(t, dialect))),
		createIndexes: () => runAll(frozenTables().flatMap((t) => buildCreateIndexes(t, dialect))),

		async close() {
			logger.debug("closing driver", { driver: driver.id });
			await driver.close?.();
		},
	};

	return dbMap;
}
