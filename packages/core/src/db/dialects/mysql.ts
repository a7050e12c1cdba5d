// =============================================================================
// MYSQL DIALECT
// =============================================================================
// Implements SqlDialect for MySQL 8.0+.

import type { ColumnType } from "../../types/column.js";
import type { SqlDialect } from "../dialect.js";

export interface MysqlDialectOptions {
	/** Storage engine for CREATE TABLE. Default: "InnoDB" */
	engine?: string;
	/** Default character set for CREATE TABLE. Default: "utf8mb4" */
	encoding?: string;
}

function quote(name: string): string {
	return `\`${name.replace(/`/g, "``")}\``;
}

/**
 * Build a MySQL dialect with a custom storage engine or charset.
 *
 * @example
 * ```ts
 * const dialect = createMysqlDialect({ engine: "MyISAM", encoding: "latin1" });
 * ```
 */
export function createMysqlDialect(options: MysqlDialectOptions = {}): SqlDialect {
	const { engine = "InnoDB", encoding = "utf8mb4" } = options;

	return {
		name: "mysql",

		// MySQL does not support RETURNING; the driver reports LAST_INSERT_ID().
		insertKeyStrategy: "last-insert-id",

		quoteField: quote,

		quotedTableForQuery(schema: string | undefined, table: string): string {
			return schema ? `${quote(schema)}.${quote(table)}` : quote(table);
		},

		paramPlaceholder(_index: number): string {
			return "?";
		},

		toSqlType(column: ColumnType): string {
			switch (column.kind) {
				case "integer":
					return "int";
				case "bigint":
					return "bigint";
				case "float":
					return "double";
				case "boolean":
					return "boolean";
				case "binary":
					return "mediumblob";
				case "timestamp":
					return "datetime(6)";
				case "text":
					return `varchar(${column.maxSize > 0 ? column.maxSize : 255})`;
			}
		},

		autoIncrStr(): string {
			return "AUTO_INCREMENT";
		},

		returning(_columns: string[]): string {
			return "";
		},

		emptyInsertValues(): string {
			return "() VALUES ()";
		},

		createTableSuffix(): string {
			return ` ENGINE=${engine} DEFAULT CHARSET=${encoding}`;
		},

		indexMethod(method: string | undefined) {
			return { beforeColumns: "", afterColumns: method ? ` USING ${method}` : "" };
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
			return value;
		},
	};
}

export const mysqlDialect: SqlDialect = createMysqlDialect();
