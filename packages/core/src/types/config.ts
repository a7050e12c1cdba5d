import type { DialectName, SqlDialect } from "../db/dialect.js";
import type { SqlDriver } from "../db/driver.js";
import type { ColumnMap } from "../registry/table-map.js";
import type { TypeRegistry } from "../registry/registry.js";

export interface DbMapOptions {
	/** SQL dialect instance or the name of a built-in one. */
	dialect: SqlDialect | DialectName;

	/** Connectivity capability. See `@rowbind/kysely-adapter` and `@rowbind/pg-adapter`. */
	driver: SqlDriver;

	/** Custom logger. Default: discards everything. */
	logger?: RowbindLogger;

	/** Log every statement at debug level. Default: off */
	trace?: boolean | TraceOptions;

	/** Per-column value conversion hook. */
	typeConverter?: TypeConverter;

	/** Share an existing registry instead of creating a fresh one. */
	registry?: TypeRegistry;
}

export interface TraceOptions {
	/** Statements slower than this are logged at warn level. Default: 200 */
	slowQueryMs?: number;
}

/**
 * Converts field values on their way to and from the database, e.g. to store
 * an object as JSON text or an enum as an integer.
 */
export interface TypeConverter {
	/** Value to bind for a field. Return the input unchanged to skip. */
	toDb(value: unknown, column: ColumnMap): unknown;
	/**
	 * Field value for a column value. Return `{ value }` to replace kind
	 * coercion, or `undefined` to fall through to it.
	 */
	fromDb(value: unknown, column: ColumnMap): { value: unknown } | undefined;
}

export interface RowbindLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
