// =============================================================================
// VALUE COERCION — driver values to field values, by semantic kind
// =============================================================================
// Drivers disagree on representations: node-postgres returns int8 and numeric
// as strings, SQLite stores booleans as 0/1 and timestamps as text. Coercion
// normalizes them to the JavaScript type the field's kind declares.

import { BindingError } from "../error/index.js";
import type { ColumnKind } from "../types/column.js";

const NUMERIC = /^\s*[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?\s*$/;
const TRUE_STRINGS = new Set(["t", "true", "1", "y", "yes"]);
const FALSE_STRINGS = new Set(["f", "false", "0", "n", "no"]);

function fail(kind: ColumnKind, value: unknown, column: string): never {
	const shown = typeof value === "string" ? JSON.stringify(value) : typeof value;
	throw new BindingError(`Cannot convert ${shown} to ${kind} for column "${column}"`, {
		column,
		kind,
	});
}

function toNumber(kind: ColumnKind, value: unknown, column: string): number {
	if (typeof value === "number") return value;
	if (typeof value === "bigint") return Number(value);
	if (typeof value === "boolean") return value ? 1 : 0;
	if (typeof value === "string" && NUMERIC.test(value)) return Number(value);
	return fail(kind, value, column);
}

export function coerceBigInt(value: unknown, column: string): bigint {
	if (typeof value === "bigint") return value;
	if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
	if (typeof value === "string" && /^\s*[-+]?\d+\s*$/.test(value)) return BigInt(value.trim());
	return fail("bigint", value, column);
}

export function coerceBoolean(value: unknown, column: string): boolean {
	if (typeof value === "boolean") return value;
	if (value === 0 || value === 0n) return false;
	if (value === 1 || value === 1n) return true;
	if (typeof value === "string") {
		const lower = value.trim().toLowerCase();
		if (TRUE_STRINGS.has(lower)) return true;
		if (FALSE_STRINGS.has(lower)) return false;
	}
	return fail("boolean", value, column);
}

export function coerceDate(value: unknown, column: string): Date {
	const date =
		value instanceof Date
			? value
			: typeof value === "string" || typeof value === "number"
				? new Date(value)
				: undefined;
	if (!date || Number.isNaN(date.getTime())) return fail("timestamp", value, column);
	return date;
}

export function coerceText(value: unknown, column: string): string {
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
		return String(value);
	}
	if (value instanceof Date) return value.toISOString();
	if (value instanceof Uint8Array) return new TextDecoder().decode(value);
	return fail("text", value, column);
}

export function coerceBinary(value: unknown, column: string): Uint8Array {
	if (value instanceof Uint8Array) return value;
	if (typeof value === "string") return new TextEncoder().encode(value);
	return fail("binary", value, column);
}

export function coerceInteger(value: unknown, column: string): number {
	const n = toNumber("integer", value, column);
	if (!Number.isInteger(n)) return fail("integer", value, column);
	if (!Number.isSafeInteger(n)) {
		const shown = typeof value === "string" ? JSON.stringify(value) : String(value);
		throw new BindingError(
			`Value ${shown} for column "${column}" is outside the safe integer range; map the field as bigint`,
			{ column, kind: "integer" },
		);
	}
	return n;
}

export function coerceFloat(value: unknown, column: string): number {
	return toNumber("float", value, column);
}

/** Convert a non-null driver value into the JavaScript type of `kind`. */
export function coerceValue(kind: ColumnKind, value: unknown, column: string): unknown {
	switch (kind) {
		case "integer":
			return coerceInteger(value, column);
		case "float":
			return coerceFloat(value, column);
		case "bigint":
			return coerceBigInt(value, column);
		case "boolean":
			return coerceBoolean(value, column);
		case "timestamp":
			return coerceDate(value, column);
		case "text":
			return coerceText(value, column);
		case "binary":
			return coerceBinary(value, column);
	}
}
