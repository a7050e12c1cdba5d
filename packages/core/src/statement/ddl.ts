// =============================================================================
// DDL — CREATE / DROP / TRUNCATE / CREATE INDEX for registered tables
// =============================================================================
// Intended for tests and bootstrapping. Schema evolution belongs to a
// migration tool.

import type { SqlDialect } from "../db/dialect.js";
import type { ColumnMap, TableMap } from "../registry/table-map.js";

function tableRef(table: TableMap, dialect: SqlDialect): string {
	return dialect.quotedTableForQuery(table.schemaName, table.tableName);
}

function columnList(columns: readonly ColumnMap[], dialect: SqlDialect): string {
	return columns.map((c) => dialect.quoteField(c.columnName)).join(", ");
}

function columnDefinition(column: ColumnMap, table: TableMap, dialect: SqlDialect): string {
	let def = `${dialect.quoteField(column.columnName)} ${dialect.toSqlType(column)}`;
	if (column.autoIncrement && table.autoIncrement) {
		def += " NOT NULL PRIMARY KEY";
		const keyword = dialect.autoIncrStr();
		if (keyword) def += ` ${keyword}`;
		return def;
	}
	if (column.notNull) def += " NOT NULL";
	if (column.unique) def += " UNIQUE";
	return def;
}

/**
 * Statements creating one table: a CREATE SCHEMA first when the table has a
 * schema and the engine supports schemas, then the CREATE TABLE.
 */
export function buildCreateTable(table: TableMap, dialect: SqlDialect, ifNotExists: boolean): string[] {
	const statements: string[] = [];
	if (table.schemaName) {
		const schema = dialect.createSchema(table.schemaName);
		if (schema) statements.push(schema);
	}

	const lines = table.mappedColumns.map((c) => columnDefinition(c, table, dialect));
	if (!table.autoIncrement && table.keys.length > 0) {
		lines.push(`PRIMARY KEY (${columnList(table.keys, dialect)})`);
	}
	for (const group of table.uniqueTogether) {
		lines.push(`UNIQUE (${columnList(group, dialect)})`);
	}

	const command = ifNotExists ? dialect.ifTableNotExists("CREATE TABLE") : "CREATE TABLE";
	statements.push(
		`${command} ${tableRef(table, dialect)} (${lines.join(", ")})${dialect.createTableSuffix()}`,
	);
	return statements;
}

export function buildDropTable(table: TableMap, dialect: SqlDialect, ifExists: boolean): string {
	const command = ifExists ? dialect.ifTableExists("DROP TABLE") : "DROP TABLE";
	return `${command} ${tableRef(table, dialect)}`;
}

export function buildTruncate(table: TableMap, dialect: SqlDialect): string {
	return `${dialect.truncateClause()} ${tableRef(table, dialect)}`;
}

export function buildCreateIndexes(table: TableMap, dialect: SqlDialect): string[] {
	return table.indexes.map((index) => {
		const { beforeColumns, afterColumns } = dialect.indexMethod(index.method);
		const command = index.unique ? "CREATE UNIQUE INDEX" : "CREATE INDEX";
		return `${command} ${dialect.quoteField(index.name)} ON ${tableRef(table, dialect)}${beforeColumns} (${columnList(index.columns, dialect)})${afterColumns}`;
	});
}
