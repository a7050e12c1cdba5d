// =============================================================================
// QUERY ARGUMENTS — positional and named parameters for ad hoc SQL
// =============================================================================
// Positional arguments pass through in order; the SQL already uses the
// dialect's marker style. A single plain-object (or Map, or mapped record)
// argument switches to named mode: every `:name` marker becomes a dialect
// placeholder and its value is looked up by name. Array values expand into a
// placeholder list, so `id IN (:ids)` works with any number of ids.
//
// The scanner leaves quoted strings, quoted identifiers, comments and
// PostgreSQL `::type` casts untouched.

import type { SqlDialect } from "../db/dialect.js";
import { InvalidArgumentError } from "../error/index.js";
import { describeFields, isRecordClass, type RecordClass } from "../registry/fields.js";
import type { ColumnMap } from "../registry/table-map.js";
import type { ColumnKind } from "../types/column.js";
import { kindOfValue } from "../types/column.js";
import { getPath } from "../utils/accessor.js";

export interface PreparedQuery {
	sql: string;
	params: unknown[];
}

/**
 * Converts one value into what the driver binds. `column` is set when the
 * value was read from a mapped record field.
 */
export type ValueBinder = (kind: ColumnKind, value: unknown, column?: ColumnMap) => unknown;

/** Mapped columns of a record class, used to read named values off a record. */
export type ColumnResolver = (type: RecordClass) => readonly ColumnMap[];

type NamedHit = { found: true; value: unknown; kind: ColumnKind; column?: ColumnMap };
type NamedLookup = (name: string) => NamedHit | { found: false };

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function isMappedRecord(value: unknown): value is object {
	return typeof value === "object" && value !== null && isRecordClass(value.constructor);
}

function byColumnOrProperty<C extends { columnName: string; path: readonly string[] }>(
	columns: readonly C[],
	name: string,
): C | undefined {
	const lower = name.toLowerCase();
	return (
		columns.find((c) => c.columnName.toLowerCase() === lower) ??
		columns.find((c) => (c.path[c.path.length - 1] ?? "").toLowerCase() === lower)
	);
}

function lookupFor(arg: unknown, columnsOf?: ColumnResolver): NamedLookup | undefined {
	if (arg instanceof Map) {
		return (name) =>
			arg.has(name) ? { found: true, value: arg.get(name), kind: kindOfValue(arg.get(name)) } : { found: false };
	}
	if (isPlainObject(arg)) {
		return (name) =>
			Object.hasOwn(arg, name)
				? { found: true, value: arg[name], kind: kindOfValue(arg[name]) }
				: { found: false };
	}
	if (isMappedRecord(arg) && isRecordClass(arg.constructor)) {
		if (columnsOf) {
			const columns = columnsOf(arg.constructor);
			return (name) => {
				const column = byColumnOrProperty(columns, name);
				return column
					? { found: true, value: column.read(arg), kind: column.kind, column }
					: { found: false };
			};
		}
		const descriptors = describeFields(arg.constructor).filter((d) => !d.transient);
		return (name) => {
			const match = byColumnOrProperty(descriptors, name);
			return match
				? { found: true, value: getPath(arg, match.path), kind: match.kind }
				: { found: false };
		};
	}
	return undefined;
}

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;

/**
 * Rewrite `:name` markers into positional placeholders.
 *
 * @example
 * ```ts
 * expandNamedQuery("SELECT * FROM t WHERE id IN (:ids)", postgresDialect, lookup, bind);
 * // { sql: "SELECT * FROM t WHERE id IN ($1, $2)", params: [1, 2] }
 * ```
 */
function expandNamedQuery(
	sql: string,
	dialect: SqlDialect,
	lookup: NamedLookup,
	bind: ValueBinder,
): PreparedQuery {
	const params: unknown[] = [];
	let out = "";
	let i = 0;

	const placeholder = (value: unknown, kind: ColumnKind, column?: ColumnMap) => {
		params.push(bind(kind, value, column));
		return dialect.paramPlaceholder(params.length);
	};

	while (i < sql.length) {
		const ch = sql.charAt(i);

		// Quoted strings and identifiers: copy through to the closing quote.
		if (ch === "'" || ch === '"' || ch === "`") {
			let end = i + 1;
			while (end < sql.length) {
				if (sql.charAt(end) === ch) {
					if (sql.charAt(end + 1) === ch) {
						end += 2;
						continue;
					}
					break;
				}
				end++;
			}
			out += sql.slice(i, end + 1);
			i = end + 1;
			continue;
		}

		if (ch === "-" && sql.charAt(i + 1) === "-") {
			const end = sql.indexOf("\n", i);
			const stop = end === -1 ? sql.length : end;
			out += sql.slice(i, stop);
			i = stop;
			continue;
		}

		if (ch === "/" && sql.charAt(i + 1) === "*") {
			const end = sql.indexOf("*/", i + 2);
			const stop = end === -1 ? sql.length : end + 2;
			out += sql.slice(i, stop);
			i = stop;
			continue;
		}

		if (ch === ":" && sql.charAt(i + 1) === ":") {
			out += "::";
			i += 2;
			continue;
		}

		if (ch === ":" && NAME_START.test(sql.charAt(i + 1))) {
			let end = i + 1;
			while (end < sql.length && NAME_PART.test(sql.charAt(end))) end++;
			const name = sql.slice(i + 1, end);
			const hit = lookup(name);
			if (!hit.found) {
				throw new InvalidArgumentError(`Missing value for named parameter :${name}`, {
					parameter: name,
				});
			}
			if (hit.column) {
				// A field value binds as one parameter, whatever its shape.
				out += placeholder(hit.value, hit.kind, hit.column);
			} else if (Array.isArray(hit.value)) {
				if (hit.value.length === 0) {
					throw new InvalidArgumentError(`Named parameter :${name} is an empty list`, {
						parameter: name,
					});
				}
				out += hit.value.map((v: unknown) => placeholder(v, kindOfValue(v))).join(", ");
			} else {
				out += placeholder(hit.value, hit.kind);
			}
			i = end;
			continue;
		}

		out += ch;
		i++;
	}

	return { sql: out, params };
}

/**
 * Turn the variadic arguments of select/exec into SQL and driver parameters.
 *
 * @param columnsOf - When given, named values read off a mapped record are
 *   bound with their ColumnMap, so field conversions apply.
 */
export function prepareQuery(
	sql: string,
	args: readonly unknown[],
	dialect: SqlDialect,
	bind: ValueBinder,
	columnsOf?: ColumnResolver,
): PreparedQuery {
	if (args.length === 1) {
		const lookup = lookupFor(args[0], columnsOf);
		if (lookup) return expandNamedQuery(sql, dialect, lookup, bind);
	}
	return { sql, params: args.map((arg) => bind(kindOfValue(arg), arg)) };
}
