// =============================================================================
// SQL DIALECT INTERFACE
// =============================================================================
// Abstracts engine-specific SQL syntax so that the statement builder, the
// executor and the DDL helpers emit portable SQL. Each supported database
// provides one stateless implementation; nothing outside a dialect ever
// branches on the engine name.

import type { ColumnKind, ColumnType } from "../types/column.js";

export type DialectName = "postgres" | "mysql" | "sqlite";

/**
 * How an INSERT reports the key generated for an auto-increment column.
 * - `returning`: the statement carries a RETURNING clause and yields a row.
 * - `last-insert-id`: the driver reports the id in its execution result.
 */
export type InsertKeyStrategy = "returning" | "last-insert-id";

export interface IndexMethodClause {
	/** Text placed between the table name and the column list. */
	beforeColumns: string;
	/** Text placed after the column list. */
	afterColumns: string;
}

export interface SqlDialect {
	/** Dialect identifier. */
	readonly name: DialectName;

	readonly insertKeyStrategy: InsertKeyStrategy;

	/** Quote an identifier, doubling any embedded quote character. */
	quoteField(name: string): string;

	/** Schema-qualified, quoted table reference. */
	quotedTableForQuery(schema: string | undefined, table: string): string;

	/** Positional parameter placeholder. 1-indexed: paramPlaceholder(1) → "$1" or "?". */
	paramPlaceholder(index: number): string;

	/** SQL type name for a column, e.g. "varchar(200)" or "serial". */
	toSqlType(column: ColumnType): string;

	/** Keyword appended to an auto-increment primary key column definition. */
	autoIncrStr(): string;

	/** RETURNING clause for INSERT. Empty when unsupported. */
	returning(columns: string[]): string;

	/** What follows the table in an INSERT that supplies no columns. */
	emptyInsertValues(): string;

	/** Text appended to CREATE TABLE, e.g. a storage engine clause. */
	createTableSuffix(): string;

	/** Where an index method ("btree", "hash") goes in CREATE INDEX. */
	indexMethod(method: string | undefined): IndexMethodClause;

	/** Statement prefix that empties a table. */
	truncateClause(): string;

	/** CREATE SCHEMA statement, or null when the engine has no schemas. */
	createSchema(schema: string): string | null;

	ifTableExists(command: string): string;

	ifTableNotExists(command: string): string;

	savepoint(name: string): string;

	rollbackToSavepoint(name: string): string;

	releaseSavepoint(name: string): string;

	/** Normalize a field value into something the engine's driver can bind. */
	bindValue(kind: ColumnKind, value: unknown): unknown;
}
