// =============================================================================
// STATEMENT BUILDER
// =============================================================================
// Renders Insert/Update/Delete/Get/Exists SQL for a TableMap through a dialect.
// Every statement lists columns in declaration order, so positional parameter
// order is deterministic. Each plan carries the ordered parameter sources the
// executor reads from a record at execution time.

import { InvalidArgumentError } from "../error/index.js";
import type { SqlDialect } from "../db/dialect.js";
import type { ColumnMap, TableMap } from "../registry/table-map.js";

/**
 * Where a positional parameter's value comes from:
 * - `value`: the column's current value on the record.
 * - `initial-version`: the first version of a new row.
 * - `next-version`: the record's version plus one.
 */
export interface PlanParam {
	readonly column: ColumnMap;
	readonly source: "value" | "initial-version" | "next-version";
}

export interface StatementPlan {
	readonly sql: string;
	readonly params: readonly PlanParam[];
}

export interface InsertPlan extends StatementPlan {
	/** Auto-increment key to write back after the insert. */
	readonly keyColumn?: ColumnMap;
	/** True when the generated key comes back as a RETURNING row. */
	readonly returnsKey: boolean;
}

/** Renders positional placeholders with a running 1-based index. */
function placeholders(dialect: SqlDialect): () => string {
	let index = 0;
	return () => dialect.paramPlaceholder(++index);
}

function tableRef(table: TableMap, dialect: SqlDialect): string {
	return dialect.quotedTableForQuery(table.schemaName, table.tableName);
}

function requireKeys(table: TableMap, operation: string): readonly ColumnMap[] {
	if (table.keys.length === 0) {
		throw new InvalidArgumentError(
			`${operation} needs a primary key, but table ${table.tableName} has none`,
			{ table: table.tableName, operation },
		);
	}
	return table.keys;
}

function whereClause(
	columns: readonly ColumnMap[],
	dialect: SqlDialect,
	next: () => string,
): string {
	return columns.map((c) => `${dialect.quoteField(c.columnName)} = ${next()}`).join(" AND ");
}

export function buildInsert(table: TableMap, dialect: SqlDialect): InsertPlan {
	const next = placeholders(dialect);
	const keyColumn = table.autoIncrement ? table.keys[0] : undefined;
	const columns = table.mappedColumns.filter((c) => !c.autoIncrement);

	let sql =
		columns.length === 0
			? `INSERT INTO ${tableRef(table, dialect)} ${dialect.emptyInsertValues()}`
			: `INSERT INTO ${tableRef(table, dialect)} (${columns
					.map((c) => dialect.quoteField(c.columnName))
					.join(", ")}) VALUES (${columns.map(() => next()).join(", ")})`;

	const returnsKey = keyColumn !== undefined && dialect.insertKeyStrategy === "returning";
	if (keyColumn && returnsKey) {
		sql += ` ${dialect.returning([keyColumn.columnName])}`;
	}

	return {
		sql,
		params: columns.map(
			(column): PlanParam => ({
				column,
				source: column === table.versionColumn ? "initial-version" : "value",
			}),
		),
		keyColumn,
		returnsKey,
	};
}

/**
 * UPDATE over every non-key mapped column (or those passing `filter`). With a
 * version column the SET writes the next version and the WHERE pins the
 * current one.
 */
export function buildUpdate(
	table: TableMap,
	dialect: SqlDialect,
	filter?: (column: ColumnMap) => boolean,
): StatementPlan {
	const keys = requireKeys(table, "Update");
	const version = table.versionColumn;
	const next = placeholders(dialect);

	const setColumns = table.mappedColumns.filter(
		(c) => !c.primaryKey && c !== version && (filter ? filter(c) : true),
	);
	if (setColumns.length === 0 && !version) {
		throw new InvalidArgumentError(`Table ${table.tableName} has no updatable columns`, {
			table: table.tableName,
		});
	}

	const assignments: string[] = [];
	const params: PlanParam[] = [];
	for (const column of table.mappedColumns) {
		if (column === version) {
			assignments.push(`${dialect.quoteField(column.columnName)} = ${next()}`);
			params.push({ column, source: "next-version" });
		} else if (setColumns.includes(column)) {
			assignments.push(`${dialect.quoteField(column.columnName)} = ${next()}`);
			params.push({ column, source: "value" });
		}
	}

	const whereColumns = version ? [...keys, version] : [...keys];
	const where = whereClause(whereColumns, dialect, next);
	for (const column of whereColumns) params.push({ column, source: "value" });

	return {
		sql: `UPDATE ${tableRef(table, dialect)} SET ${assignments.join(", ")} WHERE ${where}`,
		params,
	};
}

export function buildDelete(table: TableMap, dialect: SqlDialect): StatementPlan {
	const keys = requireKeys(table, "Delete");
	const version = table.versionColumn;
	const whereColumns = version ? [...keys, version] : [...keys];
	const where = whereClause(whereColumns, dialect, placeholders(dialect));

	return {
		sql: `DELETE FROM ${tableRef(table, dialect)} WHERE ${where}`,
		params: whereColumns.map((column) => ({ column, source: "value" as const })),
	};
}

/** SELECT every mapped column by primary key. Params are the key columns. */
export function buildGet(table: TableMap, dialect: SqlDialect): StatementPlan {
	const keys = requireKeys(table, "Get");
	const columns = table.mappedColumns.map((c) => dialect.quoteField(c.columnName)).join(", ");
	const where = whereClause(keys, dialect, placeholders(dialect));

	return {
		sql: `SELECT ${columns} FROM ${tableRef(table, dialect)} WHERE ${where}`,
		params: keys.map((column) => ({ column, source: "value" as const })),
	};
}

export function buildExists(table: TableMap, dialect: SqlDialect): StatementPlan {
	const keys = requireKeys(table, "Exists");
	const where = whereClause(keys, dialect, placeholders(dialect));

	return {
		sql: `SELECT 1 AS ${dialect.quoteField("present")} FROM ${tableRef(table, dialect)} WHERE ${where}`,
		params: keys.map((column) => ({ column, source: "value" as const })),
	};
}

// =============================================================================
// PLAN CACHE
// =============================================================================

export interface StatementCache {
	insert(table: TableMap): InsertPlan;
	update(table: TableMap): StatementPlan;
	delete(table: TableMap): StatementPlan;
	get(table: TableMap): StatementPlan;
	exists(table: TableMap): StatementPlan;
}

type PlanKind = keyof StatementCache;

/**
 * Memoize plans per TableMap for one dialect. Building a plan freezes the
 * table: its metadata can no longer change under a cached statement.
 */
export function createStatementCache(dialect: SqlDialect): StatementCache {
	const plans = new WeakMap<TableMap, Map<Exclude<PlanKind, "insert">, StatementPlan>>();

	function memo(
		kind: Exclude<PlanKind, "insert">,
		table: TableMap,
		build: (table: TableMap, dialect: SqlDialect) => StatementPlan,
	): StatementPlan {
		table.freeze();
		let forTable = plans.get(table);
		if (!forTable) {
			forTable = new Map();
			plans.set(table, forTable);
		}
		const cached = forTable.get(kind);
		if (cached) return cached;
		const plan = build(table, dialect);
		forTable.set(kind, plan);
		return plan;
	}

	const insertPlans = new WeakMap<TableMap, InsertPlan>();

	return {
		insert(table) {
			table.freeze();
			const cached = insertPlans.get(table);
			if (cached) return cached;
			const plan = buildInsert(table, dialect);
			insertPlans.set(table, plan);
			return plan;
		},
		update: (table) => memo("update", table, buildUpdate),
		delete: (table) => memo("delete", table, buildDelete),
		get: (table) => memo("get", table, buildGet),
		exists: (table) => memo("exists", table, buildExists),
	};
}
