// =============================================================================
// SQL EXECUTOR — CRUD, ad hoc queries and scalar selects
// =============================================================================
// DbMap and Transaction expose the same operation set. Both are built from
// `buildExecutorMethods()` over a connection: the driver itself for a DbMap,
// a transaction handle for a Transaction.

import { bindScalar, bindScalars, type RowBinder, type ScalarKind, type ScalarTypes } from "../binder/bind.js";
import { coerceValue } from "../binder/coerce.js";
import type { SqlDialect } from "../db/dialect.js";
import type { ExecResult, Row, SqlConnection } from "../db/driver.js";
import {
	BatchOperationError,
	BindingError,
	InvalidArgumentError,
	MultipleRowsError,
	NotFoundError,
	OptimisticLockError,
	TypeMismatchError,
} from "../error/index.js";
import type { RecordClass } from "../registry/fields.js";
import type { TypeRegistry } from "../registry/registry.js";
import type { ColumnMap, TableMap } from "../registry/table-map.js";
import { buildUpdate, type PlanParam, type StatementCache, type StatementPlan } from "../statement/builder.js";
import { type ColumnResolver, prepareQuery } from "../statement/named-params.js";
import type { TypeConverter } from "../types/config.js";
import { setPath } from "../utils/accessor.js";
import { runHook } from "./hooks.js";

/** Selects the columns an `updateColumns()` call writes. */
export type ColumnFilter = (column: ColumnMap) => boolean;

export interface SqlExecutor {
	/** Insert records, writing generated keys and initial versions back onto them. */
	insert(...records: object[]): Promise<void>;
	/** Update records by primary key. Resolves to the number of rows updated. */
	update(...records: object[]): Promise<number>;
	/** Update only the columns accepted by `filter`. */
	updateColumns(filter: ColumnFilter, ...records: object[]): Promise<number>;
	/** Delete records by primary key. Resolves to the number of rows deleted. */
	delete(...records: object[]): Promise<number>;
	/** Fetch one record by primary key. Rejects with NotFoundError when absent. */
	get<T extends object>(type: RecordClass<T>, ...keys: unknown[]): Promise<T>;
	exists<T extends object>(type: RecordClass<T>, ...keys: unknown[]): Promise<boolean>;

	select<T extends object>(type: RecordClass<T>, sql: string, ...args: unknown[]): Promise<T[]>;
	selectOne<T extends object>(type: RecordClass<T>, sql: string, ...args: unknown[]): Promise<T>;
	selectValues<K extends ScalarKind>(
		kind: K,
		sql: string,
		...args: unknown[]
	): Promise<Array<ScalarTypes[K] | null>>;
	selectInt(sql: string, ...args: unknown[]): Promise<number>;
	selectNullInt(sql: string, ...args: unknown[]): Promise<number | null>;
	selectFloat(sql: string, ...args: unknown[]): Promise<number>;
	selectNullFloat(sql: string, ...args: unknown[]): Promise<number | null>;
	selectStr(sql: string, ...args: unknown[]): Promise<string>;
	selectNullStr(sql: string, ...args: unknown[]): Promise<string | null>;

	exec(sql: string, ...args: unknown[]): Promise<ExecResult>;
}

/** State shared by a DbMap and every Transaction it begins. */
export interface ExecutorContext {
	readonly dialect: SqlDialect;
	readonly registry: TypeRegistry;
	readonly plans: StatementCache;
	readonly binder: RowBinder;
	readonly typeConverter?: TypeConverter;
}

function bumpVersion(column: ColumnMap, current: unknown): number | bigint {
	if (typeof current === "bigint") return current + 1n;
	if (typeof current === "number") return current + 1;
	throw new InvalidArgumentError(`Version field ${column.fieldName} does not hold a number`, {
		field: column.fieldName,
	});
}

function initialVersion(column: ColumnMap): number | bigint {
	return column.kind === "bigint" ? 1n : 1;
}

/**
 * Build the executor operations over `connection`.
 *
 * @param self - The object hooks receive, so they run in the caller's scope.
 * @param guard - Runs before every operation; a Transaction uses it to refuse
 *   work once it has ended.
 */
export function buildExecutorMethods(
	ctx: ExecutorContext,
	connection: SqlConnection,
	self: () => SqlExecutor,
	guard: () => void = () => {},
): SqlExecutor {
	const { dialect, registry, plans, binder, typeConverter } = ctx;

	function toDriver(column: ColumnMap, value: unknown): unknown {
		const converted = typeConverter ? typeConverter.toDb(value, column) : value;
		return dialect.bindValue(column.kind, converted === undefined ? null : converted);
	}

	function adHocValue(kind: ColumnMap["kind"], value: unknown, column?: ColumnMap): unknown {
		if (column) return toDriver(column, value);
		return dialect.bindValue(kind, value === undefined ? null : value);
	}

	const columnsOf: ColumnResolver = (type) => binder.columnsFor(type).mappedColumns;

	function paramValue(column: ColumnMap, source: PlanParam["source"], record: object): unknown {
		switch (source) {
			case "initial-version":
				return initialVersion(column);
			case "next-version":
				return bumpVersion(column, column.read(record));
			case "value":
				return column.read(record);
		}
	}

	function planParams(plan: StatementPlan, record: object): unknown[] {
		return plan.params.map(({ column, source }: PlanParam) => toDriver(column, paramValue(column, source, record)));
	}

	function keyParams(table: TableMap, plan: StatementPlan, keys: readonly unknown[]): unknown[] {
		if (keys.length !== table.keys.length) {
			throw new InvalidArgumentError(
				`Table ${table.tableName} has ${table.keys.length} key column(s), got ${keys.length} key value(s)`,
				{ table: table.tableName, expected: table.keys.length, actual: keys.length },
			);
		}
		return plan.params.map(({ column }, i) => toDriver(column, keys[i]));
	}

	/** All records of one call must map to the same table. */
	function sameTable(records: readonly object[]): TableMap {
		const tables = records.map((record) => registry.tableFor(record));
		const [first] = tables;
		if (!first) throw new InvalidArgumentError("No records given");
		tables.forEach((table, index) => {
			if (table !== first) throw new TypeMismatchError(first.tableName, table.tableName, index);
		});
		return first;
	}

	async function eachRecord(
		operation: string,
		records: readonly object[],
		run: (table: TableMap, record: object) => Promise<number>,
	): Promise<number> {
		guard();
		if (records.length === 0) return 0;
		const table = sameTable(records);

		let total = 0;
		for (const [index, record] of records.entries()) {
			try {
				total += await run(table, record);
			} catch (error) {
				if (records.length === 1) throw error;
				throw new BatchOperationError(operation, table.tableName, index, error);
			}
		}
		return total;
	}

	function writeKey(column: ColumnMap, record: object, value: unknown, table: TableMap): void {
		if (value === null || value === undefined) {
			throw new BindingError(`Insert into ${table.tableName} reported no generated key`, {
				table: table.tableName,
			});
		}
		setPath(record, column.path, column.containers, coerceValue(column.kind, value, column.columnName));
	}

	async function insertOne(table: TableMap, record: object): Promise<number> {
		await runHook(record, "preInsert", self());

		const plan = plans.insert(table);
		const params = planParams(plan, record);
		const key = plan.keyColumn;

		if (key && plan.returnsKey) {
			const rows = await connection.query(plan.sql, params);
			const row = rows[0];
			writeKey(key, record, row ? (row[key.columnName] ?? Object.values(row)[0]) : undefined, table);
		} else {
			const result = await connection.execute(plan.sql, params);
			if (key) writeKey(key, record, result.insertId, table);
		}

		const version = table.versionColumn;
		if (version) setPath(record, version.path, version.containers, initialVersion(version));

		await runHook(record, "postInsert", self());
		return 1;
	}

	async function updateOne(table: TableMap, record: object, plan: StatementPlan): Promise<number> {
		await runHook(record, "preUpdate", self());

		const result = await connection.execute(plan.sql, planParams(plan, record));
		const version = table.versionColumn;
		if (version) {
			const current = version.read(record);
			if (result.rowsAffected === 0) {
				throw new OptimisticLockError(table.tableName, table.keyValues(record), Number(current));
			}
			setPath(record, version.path, version.containers, bumpVersion(version, current));
		}

		await runHook(record, "postUpdate", self());
		return result.rowsAffected;
	}

	async function deleteOne(table: TableMap, record: object): Promise<number> {
		await runHook(record, "preDelete", self());

		const plan = plans.delete(table);
		const result = await connection.execute(plan.sql, planParams(plan, record));
		const version = table.versionColumn;
		if (version && result.rowsAffected === 0) {
			throw new OptimisticLockError(
				table.tableName,
				table.keyValues(record),
				Number(version.read(record)),
			);
		}

		await runHook(record, "postDelete", self());
		return result.rowsAffected;
	}

	async function query(sql: string, args: readonly unknown[]): Promise<Row[]> {
		guard();
		const prepared = prepareQuery(sql, args, dialect, adHocValue, columnsOf);
		return connection.query(prepared.sql, prepared.params);
	}

	async function postGetAll<T extends object>(records: T[]): Promise<T[]> {
		for (const record of records) {
			await runHook(record, "postGet", self());
		}
		return records;
	}

	async function scalar<K extends ScalarKind>(
		kind: K,
		sql: string,
		args: readonly unknown[],
	): Promise<ScalarTypes[K] | null> {
		return bindScalar(kind, await query(sql, args));
	}

	return {
		async insert(...records) {
			await eachRecord("insert", records, insertOne);
		},

		update(...records) {
			return eachRecord("update", records, (table, record) =>
				updateOne(table, record, plans.update(table)),
			);
		},

		updateColumns(filter, ...records) {
			return eachRecord("update", records, (table, record) => {
				table.freeze();
				return updateOne(table, record, buildUpdate(table, dialect, filter));
			});
		},

		delete(...records) {
			return eachRecord("delete", records, deleteOne);
		},

		async get<T extends object>(type: RecordClass<T>, ...keys: unknown[]): Promise<T> {
			guard();
			const table = registry.tableForType(type);
			const plan = plans.get(table);
			const rows = await connection.query(plan.sql, keyParams(table, plan, keys));

			const [row] = rows;
			if (!row) {
				throw new NotFoundError(
					`No ${table.tableName} row for key (${keys.map(String).join(", ")})`,
					{ table: table.tableName, keys },
				);
			}
			if (rows.length > 1) throw new MultipleRowsError(rows.length, { table: table.tableName });

			const record = binder.bindRow(table, row);
			await runHook(record, "postGet", self());
			return record;
		},

		async exists<T extends object>(type: RecordClass<T>, ...keys: unknown[]): Promise<boolean> {
			guard();
			const table = registry.tableForType(type);
			const plan = plans.exists(table);
			const rows = await connection.query(plan.sql, keyParams(table, plan, keys));
			return rows.length > 0;
		},

		async select<T extends object>(type: RecordClass<T>, sql: string, ...args: unknown[]): Promise<T[]> {
			const rows = await query(sql, args);
			return postGetAll(binder.bindRows(type, rows));
		},

		async selectOne<T extends object>(type: RecordClass<T>, sql: string, ...args: unknown[]): Promise<T> {
			const rows = await query(sql, args);
			if (rows.length === 0) throw new NotFoundError(undefined, { sql });
			if (rows.length > 1) throw new MultipleRowsError(rows.length, { sql });
			const [record] = await postGetAll(binder.bindRows(type, rows));
			if (!record) throw new NotFoundError(undefined, { sql });
			return record;
		},

		async selectValues<K extends ScalarKind>(kind: K, sql: string, ...args: unknown[]) {
			return bindScalars(kind, await query(sql, args));
		},

		async selectInt(sql, ...args) {
			return (await scalar("int", sql, args)) ?? 0;
		},
		selectNullInt: (sql, ...args) => scalar("int", sql, args),
		async selectFloat(sql, ...args) {
			return (await scalar("float", sql, args)) ?? 0;
		},
		selectNullFloat: (sql, ...args) => scalar("float", sql, args),
		async selectStr(sql, ...args) {
			return (await scalar("string", sql, args)) ?? "";
		},
		selectNullStr: (sql, ...args) => scalar("string", sql, args),

		async exec(sql, ...args) {
			guard();
			const prepared = prepareQuery(sql, args, dialect, adHocValue, columnsOf);
			return connection.execute(prepared.sql, prepared.params);
		},
	};
}
