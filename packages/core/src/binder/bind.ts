// =============================================================================
// RESULT BINDER
// =============================================================================
// Maps arbitrary result rows onto record instances or scalars. Result columns
// match fields by column name, then by property name, case-insensitively.
// Binding is strict: a result column with no matching field is an error, so a
// typo in a SELECT list never silently drops data.

import type { Row } from "../db/driver.js";
import { BindingError, MultipleRowsError } from "../error/index.js";
import { describeFields, type RecordClass } from "../registry/fields.js";
import type { TypeRegistry } from "../registry/registry.js";
import { type ColumnMap, isTableOf, TableMap } from "../registry/table-map.js";
import type { TypeConverter } from "../types/config.js";
import { setPath } from "../utils/accessor.js";
import {
	coerceBigInt,
	coerceBoolean,
	coerceFloat,
	coerceInteger,
	coerceText,
	coerceValue,
} from "./coerce.js";

export type ScalarKind = "int" | "bigint" | "float" | "string" | "boolean";

export interface ScalarTypes {
	int: number;
	bigint: bigint;
	float: number;
	string: string;
	boolean: boolean;
}

const SCALAR_CONVERTERS: { [K in ScalarKind]: (value: unknown, column: string) => ScalarTypes[K] } = {
	int: coerceInteger,
	bigint: coerceBigInt,
	float: coerceFloat,
	string: coerceText,
	boolean: coerceBoolean,
};

export interface RowBinder {
	/** Column metadata used to bind `type`: its registered TableMap, or an ad hoc one. */
	columnsFor<T extends object>(type: RecordClass<T>): TableMap<T>;
	/** Bind every row onto a new instance of `type`. */
	bindRows<T extends object>(type: RecordClass<T>, rows: readonly Row[]): T[];
	/** Bind one row onto a new instance of the table's class. */
	bindRow<T extends object>(table: TableMap<T>, row: Row): T;
}

type BindPlan = ReadonlyArray<readonly [resultColumn: string, column: ColumnMap]>;

function matchColumn(mapped: readonly ColumnMap[], resultColumn: string): ColumnMap | undefined {
	const lower = resultColumn.toLowerCase();
	return (
		mapped.find((c) => c.columnName.toLowerCase() === lower) ??
		mapped.find(
			(c) =>
				c.fieldName.toLowerCase() === lower ||
				(c.path[c.path.length - 1] ?? "").toLowerCase() === lower,
		)
	);
}

function planFor(table: TableMap, resultColumns: readonly string[]): BindPlan {
	const mapped = table.mappedColumns;
	const plan: Array<readonly [string, ColumnMap]> = [];
	const unmatched: string[] = [];
	for (const name of resultColumns) {
		const column = matchColumn(mapped, name);
		if (column) plan.push([name, column]);
		else unmatched.push(name);
	}
	if (unmatched.length > 0) {
		throw new BindingError(
			`No field of ${table.type.name} matches result column(s): ${unmatched.join(", ")}`,
			{ type: table.type.name, columns: unmatched },
		);
	}
	return plan;
}

export function createRowBinder(registry: TypeRegistry, converter?: TypeConverter): RowBinder {
	const adHoc = new WeakMap<RecordClass, TableMap>();

	function columnsFor<T extends object>(type: RecordClass<T>): TableMap<T> {
		const registered = registry.lookupType(type);
		if (registered) {
			registered.freeze();
			return registered;
		}
		const cached = adHoc.get(type);
		if (cached && isTableOf(cached, type)) return cached;
		const descriptors = describeFields(type);
		const table = new TableMap(type, type.tableName ?? type.name, undefined, descriptors, () => {});
		table.freeze();
		adHoc.set(type, table);
		return table;
	}

	function assign(record: object, column: ColumnMap, raw: unknown): void {
		const converted = converter?.fromDb(raw, column);
		if (converted) {
			setPath(record, column.path, column.containers, converted.value);
			return;
		}
		if (raw === null || raw === undefined) {
			if (column.nullable) setPath(record, column.path, column.containers, null);
			return;
		}
		const value = coerceValue(column.kind, raw, column.columnName);
		setPath(record, column.path, column.containers, value);
	}

	function apply<T extends object>(table: TableMap<T>, plan: BindPlan, row: Row): T {
		const record = new table.type();
		for (const [name, column] of plan) {
			assign(record, column, row[name]);
		}
		return record;
	}

	return {
		columnsFor,

		bindRows<T extends object>(type: RecordClass<T>, rows: readonly Row[]): T[] {
			const first = rows[0];
			if (!first) return [];
			const table = columnsFor(type);
			const plan = planFor(table, Object.keys(first));
			return rows.map((row) => apply(table, plan, row));
		},

		bindRow<T extends object>(table: TableMap<T>, row: Row): T {
			return apply(table, planFor(table, Object.keys(row)), row);
		},
	};
}

// =============================================================================
// SCALARS
// =============================================================================

function singleValue(row: Row): [column: string, value: unknown] {
	const entries = Object.entries(row);
	const entry = entries[0];
	if (!entry || entries.length !== 1) {
		throw new BindingError(`Expected a single-column result, got ${entries.length} columns`, {
			columns: entries.map(([name]) => name),
		});
	}
	return entry;
}

/** Scalar from at most one single-column row. `null` for no row or a NULL value. */
export function bindScalar<K extends ScalarKind>(kind: K, rows: readonly Row[]): ScalarTypes[K] | null {
	if (rows.length > 1) throw new MultipleRowsError(rows.length);
	const row = rows[0];
	if (!row) return null;
	const [column, value] = singleValue(row);
	if (value === null || value === undefined) return null;
	return SCALAR_CONVERTERS[kind](value, column);
}

/** One scalar per row of a single-column result. NULL values stay `null`. */
export function bindScalars<K extends ScalarKind>(
	kind: K,
	rows: readonly Row[],
): Array<ScalarTypes[K] | null> {
	return rows.map((row) => {
		const [column, value] = singleValue(row);
		return value === null || value === undefined ? null : SCALAR_CONVERTERS[kind](value, column);
	});
}
