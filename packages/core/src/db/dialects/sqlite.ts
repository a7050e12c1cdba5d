// =============================================================================
// SQLITE DIALECT
// =============================================================================
// Implements SqlDialect for SQLite 3.
// Suitable for local development, tests, and embedded deployments.

import type { ColumnKind, ColumnType } from "../../types/column.js";
import type { SqlDialect } from "../dialect.js";

function quote(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

export const sqliteDialect: SqlDialect = {
	name: "sqlite",

	insertKeyStrategy: "last-insert-id",

	quoteField: quote,

	quotedTableForQuery(schema: string | undefined, table: string): string {
		// A schema here is the name of an attached database.
		return schema ? `${quote(schema)}.${quote(table)}` : quote(table);
	},

	paramPlaceholder(_index: number): string {
		return "?";
	},

	toSqlType(column: ColumnType): string {
		switch (column.kind) {
			case "integer":
			case "bigint":
			case "boolean":
				return "integer";
			case "float":
				return "real";
			case "binary":
				return "blob";
			case "timestamp":
				return "datetime";
			case "text":
				return column.maxSize > 0 ? `varchar(${column.maxSize})` : "text";
		}
	},

	autoIncrStr(): string {
		return "AUTOINCREMENT";
	},

	returning(_columns: string[]): string {
		// Keys come back through last_insert_rowid().
		return "";
	},

	emptyInsertValues(): string {
		return "DEFAULT VALUES";
	},

	createTableSuffix(): string {
		return "";
	},

	indexMethod(_method: string | undefined) {
		// SQLite has a single index implementation.
		return { beforeColumns: "", afterColumns: "" };
	},

	truncateClause(): string {
		// No TRUNCATE; an unqualified DELETE takes the truncate fast path.
		return "DELETE FROM";
	},

	createSchema(_schema: string): string | null {
		return null;
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

	bindValue(kind: ColumnKind, value: unknown): unknown {
		if (value === null || value === undefined) return null;
		// The sqlite3 bindings accept numbers, strings, bigints, buffers and null only.
		if (typeof value === "boolean") return value ? 1 : 0;
		if (value instanceof Date) return value.toISOString();
		if (kind === "binary" && value instanceof Uint8Array && !Buffer.isBuffer(value)) {
			return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
		}
		return value;
	},
};
