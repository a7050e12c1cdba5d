import { describe, expect, it } from "vitest";
import { bindScalar, bindScalars, createRowBinder } from "../binder/bind.js";
import {
	coerceBigInt,
	coerceBinary,
	coerceBoolean,
	coerceDate,
	coerceFloat,
	coerceInteger,
	coerceText,
} from "../binder/coerce.js";
import { BindingError, MultipleRowsError } from "../error/index.js";
import { defineFields, field } from "../registry/fields.js";
import { createRegistry } from "../registry/registry.js";
import type { TypeConverter } from "../types/config.js";
import { Doc, Note, Stamp } from "./records.js";

class RegionTotal {
	label = "";
	total = 0;
	average: number | null = null;

	static readonly fields = defineFields<RegionTotal>({
		label: field.text("label"),
		total: field.integer("total_count"),
		average: field.float("avg", { nullable: true }),
	});
}

describe("coercion", () => {
	it("parses integers from driver strings and bigints", () => {
		expect(coerceInteger("42", "n")).toBe(42);
		expect(coerceInteger(7n, "n")).toBe(7);
		expect(() => coerceInteger("4.2", "n")).toThrow('Cannot convert "4.2" to integer for column "n"');
		expect(() => coerceInteger("abc", "n")).toThrow(BindingError);
	});

	it("refuses integers a number cannot hold exactly", () => {
		expect(coerceInteger("9007199254740991", "id")).toBe(9007199254740991);
		expect(() => coerceInteger("9007199254740993", "id")).toThrow(
			'Value "9007199254740993" for column "id" is outside the safe integer range; map the field as bigint',
		);
		expect(() => coerceInteger(2n ** 60n, "id")).toThrow(BindingError);
	});

	it("parses floats", () => {
		expect(coerceFloat("1.5e2", "f")).toBe(150);
		expect(coerceFloat(true, "f")).toBe(1);
	});

	it("keeps bigints exact", () => {
		expect(coerceBigInt("9007199254740993", "b")).toBe(9007199254740993n);
		expect(coerceBigInt(12, "b")).toBe(12n);
		expect(() => coerceBigInt(1.5, "b")).toThrow('Cannot convert number to bigint for column "b"');
	});

	it("accepts the usual boolean spellings", () => {
		expect(coerceBoolean(1, "flag")).toBe(true);
		expect(coerceBoolean(0n, "flag")).toBe(false);
		expect(coerceBoolean(" Yes ", "flag")).toBe(true);
		expect(coerceBoolean("f", "flag")).toBe(false);
		expect(() => coerceBoolean(2, "flag")).toThrow('Cannot convert number to boolean for column "flag"');
	});

	it("parses timestamps from text and epoch millis", () => {
		expect(coerceDate("2024-05-06T07:08:09.000Z", "d").toISOString()).toBe("2024-05-06T07:08:09.000Z");
		expect(coerceDate(0, "d").toISOString()).toBe("1970-01-01T00:00:00.000Z");
		expect(() => coerceDate("not a date", "d")).toThrow('Cannot convert "not a date" to timestamp for column "d"');
	});

	it("converts text and binary", () => {
		expect(coerceText(new Uint8Array([104, 105]), "t")).toBe("hi");
		expect(coerceText(12n, "t")).toBe("12");
		expect(coerceBinary("hi", "b")).toEqual(new Uint8Array([104, 105]));
		expect(() => coerceText({}, "t")).toThrow('Cannot convert object to text for column "t"');
	});
});

describe("createRowBinder", () => {
	it("matches result columns by column name, case-insensitively", () => {
		const binder = createRowBinder(createRegistry());
		const [totals] = binder.bindRows(RegionTotal, [{ LABEL: "north", Total_Count: "3", avg: 1.25 }]);
		expect(totals).toBeInstanceOf(RegionTotal);
		expect(totals).toMatchObject({ label: "north", total: 3, average: 1.25 });
	});

	it("falls back to the property name", () => {
		const binder = createRowBinder(createRegistry());
		const [totals] = binder.bindRows(RegionTotal, [{ total: 8 }]);
		expect(totals?.total).toBe(8);
		expect(totals?.label).toBe("");
	});

	it("rejects result columns no field matches", () => {
		const binder = createRowBinder(createRegistry());
		expect(() => binder.bindRows(RegionTotal, [{ label: "x", extra: 1, other: 2 }])).toThrow(
			"No field of RegionTotal matches result column(s): extra, other",
		);
	});

	it("binds NULL as null only for nullable fields", () => {
		const binder = createRowBinder(createRegistry());
		const [totals] = binder.bindRows(RegionTotal, [{ label: null, avg: null }]);
		expect(totals?.label).toBe("");
		expect(totals?.average).toBeNull();
	});

	it("creates embedded containers from their class", () => {
		const registry = createRegistry();
		const table = registry.register(Doc);
		const doc = createRowBinder(registry).bindRow(table, {
			id: 1,
			created_by: "ops",
			created_at: "2024-02-03T04:05:06.000Z",
		});
		expect(doc.stamp).toBeInstanceOf(Stamp);
		expect(doc.stamp.by).toBe("ops");
		expect(doc.stamp.at.toISOString()).toBe("2024-02-03T04:05:06.000Z");
	});

	it("freezes a registered type on first use", () => {
		const registry = createRegistry();
		const table = registry.register(Note);
		const binder = createRowBinder(registry);
		expect(binder.columnsFor(Note)).toBe(table);
		expect(table.isFrozen).toBe(true);
	});

	it("caches ad hoc metadata per class", () => {
		const binder = createRowBinder(createRegistry());
		const first = binder.columnsFor(RegionTotal);
		expect(binder.columnsFor(RegionTotal)).toBe(first);
		expect(first.isFrozen).toBe(true);
	});

	it("returns no records for no rows", () => {
		expect(createRowBinder(createRegistry()).bindRows(RegionTotal, [])).toEqual([]);
	});

	it("lets a type converter take over a column", () => {
		const converter: TypeConverter = {
			toDb: (value) => value,
			fromDb: (value, column) =>
				column.columnName === "label" && typeof value === "string" ? { value: value.toUpperCase() } : undefined,
		};
		const [totals] = createRowBinder(createRegistry(), converter).bindRows(RegionTotal, [
			{ label: "south", total_count: "2" },
		]);
		expect(totals).toMatchObject({ label: "SOUTH", total: 2 });
	});
});

describe("scalars", () => {
	it("binds a single value", () => {
		expect(bindScalar("int", [{ count: "12" }])).toBe(12);
		expect(bindScalar("string", [{ n: 5 }])).toBe("5");
		expect(bindScalar("boolean", [{ b: 1 }])).toBe(true);
	});

	it("returns null for no row or a NULL value", () => {
		expect(bindScalar("int", [])).toBeNull();
		expect(bindScalar("float", [{ v: null }])).toBeNull();
	});

	it("rejects several rows or several columns", () => {
		expect(() => bindScalar("int", [{ v: 1 }, { v: 2 }])).toThrow(MultipleRowsError);
		expect(() => bindScalar("int", [{ a: 1, b: 2 }])).toThrow("Expected a single-column result, got 2 columns");
	});

	it("binds one value per row", () => {
		expect(bindScalars("bigint", [{ v: "1" }, { v: null }, { v: 3 }])).toEqual([1n, null, 3n]);
	});
});
