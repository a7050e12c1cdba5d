// =============================================================================
// POSTGRESQL DIALECT
// =============================================================================
// Implements SqlDialect for PostgreSQL 12+.

import type { ColumnType } from "../../types/column.js";
import type { SqlDialect } from "../dialect.js";

function quote(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

export const postgresDialect: SqlDialect = {
	name: "postgres",

	insertKeyStrategy: "returning",

	quoteField: quote,

	quotedTableForQuery(schema: string | undefined, table: string): string {
		return schema ? `${quote(schema)}.${quote(table)}` : quote(table);
	},

	paramPlaceholder(index: number): string {
		return `$${index}`;
	},

	toSqlType(column: ColumnType): string {
		switch (column.kind) {
			case "integer":
				return column.autoIncrement ? "serial" : "integer";
			case "bigint":
				return column.autoIncrement ? "bigserial" : "bigint";
			case "float":
				return "double precision";
			case "boolean":
				return "boolean";
			case "binary":
				return "bytea";
			case "timestamp":
				return "timestamp with time zone";
			case "text":
				return column.maxSize > 0 ? `varchar(${column.maxSize})` : "text";
		}
	},

	autoIncrStr(): string {
		// serial/bigserial carry the sequence themselves
		return "";
	},

	returning(columns: string[]): string {
		return `RETURNING ${columns.map(quote).join(", ")}`;
	},

	emptyInsertValues(): string {
		return "DEFAULT VALUES";
	},

	createTableSuffix(): string {
		return "";
	},

	indexMethod(method: string | undefined) {
		return { beforeColumns: method ? ` USING ${method}` : "", afterColumns: "" };
	},

	truncateClause(): string {
		return "TRUNCATE";
	},

	createSchema(schema: string): string | null {
		return `CREATE SCHEMA IF NOT EXISTS ${quote(schema)}`;
	},

	ifTableExists(command: string): string {
		return `${command} IF EXISTS`;
	},

	ifTableNotExists(command: string): string {
		return `${command} IF NOT EXISTS`;
	},

	savepoint(name: string): string {
		return `SAVEPOINT ${quote(name)}`;
	},

	rollbackToSavepoint(name: string): string {
		return `ROLLBACK TO SAVEPOINT ${quote(name)}`;
	},

	releaseSavepoint(name: string): string {
		return `RELEASE SAVEPOINT ${quote(name)}`;
	},

	bindValue(_kind, value: unknown): unknown {
		// node-postgres serializes booleans, Dates, Buffers and bigints itself
		return value;
	},
};
