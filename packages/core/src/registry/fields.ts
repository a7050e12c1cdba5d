// =============================================================================
// FIELD DESCRIPTORS
// =============================================================================
// A record class declares its mapped fields through a static `fields` set:
//
//   class Invoice {
//     id = 0;
//     memo = "";
//     static readonly fields = defineFields<Invoice>({
//       id: field.integer("id, primarykey, autoincrement"),
//       memo: field.text("memo, size:200"),
//     });
//   }
//
// `describeFields()` flattens that set (recursing into embedded classes) into
// an ordered descriptor list, computed once per class and cached.

import { RegistrationError } from "../error/index.js";
import type { ColumnKind } from "../types/column.js";
import { isIntegerKind } from "../types/column.js";
import { parseTag } from "./tag.js";

export interface FieldOptions {
	/** Column accepts NULL, and a NULL result binds as `null`. */
	nullable?: boolean;
}

export interface ColumnFieldDef {
	readonly type: "column";
	readonly kind: ColumnKind;
	readonly tag: string;
	readonly nullable: boolean;
}

export interface EmbeddedFieldDef {
	readonly type: "embedded";
	readonly target: RecordClass;
}

export interface TransientFieldDef {
	readonly type: "transient";
}

export type FieldDef = ColumnFieldDef | EmbeddedFieldDef | TransientFieldDef;

export type FieldSet<T> = { readonly [K in keyof T]?: FieldDef };

/** A class whose instances can be written to and read from table rows. */
export interface RecordClass<T extends object = object> {
	new (): T;
	readonly name: string;
	readonly fields: FieldSet<T>;
	/** Default table name when `register()` is given none. */
	readonly tableName?: string;
}

function column(kind: ColumnKind) {
	return (tag = "", options: FieldOptions = {}): ColumnFieldDef => ({
		type: "column",
		kind,
		tag,
		nullable: options.nullable ?? false,
	});
}

export const field = {
	integer: column("integer"),
	bigint: column("bigint"),
	float: column("float"),
	text: column("text"),
	boolean: column("boolean"),
	binary: column("binary"),
	timestamp: column("timestamp"),
	/** Flatten another record class's fields into this one. */
	embedded: (target: RecordClass): EmbeddedFieldDef => ({ type: "embedded", target }),
	transient: (): TransientFieldDef => ({ type: "transient" }),
};

/** True for a class that declares static field descriptors. */
export function isRecordClass(value: unknown): value is RecordClass {
	return typeof value === "function" && typeof Reflect.get(value, "fields") === "object";
}

export function defineFields<T>(fields: FieldSet<T>): FieldSet<T> {
	return Object.freeze(fields);
}

// =============================================================================
// FLATTENED DESCRIPTORS
// =============================================================================

export interface FieldDescriptor {
	/** Property path from the record root; longer than 1 for embedded fields. */
	readonly path: readonly string[];
	/** Classes to instantiate for each intermediate path segment. */
	readonly containers: readonly RecordClass[];
	readonly columnName: string;
	readonly kind: ColumnKind;
	readonly maxSize: number;
	readonly primaryKey: boolean;
	readonly autoIncrement: boolean;
	readonly transient: boolean;
	readonly nullable: boolean;
	readonly notNull: boolean;
	readonly unique: boolean;
	readonly version: boolean;
}

const cache = new WeakMap<RecordClass, readonly FieldDescriptor[]>();

export function describeFields(type: RecordClass): readonly FieldDescriptor[] {
	const cached = cache.get(type);
	if (cached) return cached;

	if (typeof type.fields !== "object" || type.fields === null) {
		throw new RegistrationError(`Type ${type.name} declares no static fields`, {
			type: type.name,
		});
	}

	const descriptors = flatten(type, [], [], new Set());
	assertUniqueColumns(type, descriptors);
	cache.set(type, descriptors);
	return descriptors;
}

function flatten(
	type: RecordClass,
	prefix: readonly string[],
	containers: readonly RecordClass[],
	visiting: Set<RecordClass>,
): FieldDescriptor[] {
	if (visiting.has(type)) {
		throw new RegistrationError(`Type ${type.name} embeds itself`, { type: type.name });
	}
	visiting.add(type);

	const out: FieldDescriptor[] = [];
	for (const [property, def] of Object.entries<FieldDef | undefined>(type.fields)) {
		if (!def) continue;
		const path = [...prefix, property];
		const fieldName = path.join(".");

		if (def.type === "embedded") {
			out.push(...flatten(def.target, path, [...containers, def.target], visiting));
			continue;
		}

		if (def.type === "transient") {
			out.push(transientDescriptor(path, containers, property));
			continue;
		}

		const tag = parseTag(def.tag, fieldName);
		if (tag.transient) {
			out.push(transientDescriptor(path, containers, property, def.kind));
			continue;
		}

		const autoIncrement = tag.autoIncrement;
		if (autoIncrement && !isIntegerKind(def.kind)) {
			throw new RegistrationError(
				`Field "${fieldName}" of ${type.name} is autoincrement but not an integer column`,
				{ type: type.name, field: fieldName },
			);
		}
		if (tag.version && !isIntegerKind(def.kind)) {
			throw new RegistrationError(
				`Field "${fieldName}" of ${type.name} is a version column but not an integer column`,
				{ type: type.name, field: fieldName },
			);
		}

		const primaryKey = tag.primaryKey || autoIncrement;
		out.push({
			path,
			containers,
			columnName: tag.columnName ?? property,
			kind: def.kind,
			maxSize: tag.maxSize,
			primaryKey,
			autoIncrement,
			transient: false,
			nullable: def.nullable && !tag.notNull && !primaryKey,
			notNull: tag.notNull || primaryKey,
			unique: tag.unique,
			version: tag.version,
		});
	}

	visiting.delete(type);
	return out;
}

function transientDescriptor(
	path: string[],
	containers: readonly RecordClass[],
	property: string,
	kind: ColumnKind = "text",
): FieldDescriptor {
	return {
		path,
		containers,
		columnName: property,
		kind,
		maxSize: 0,
		primaryKey: false,
		autoIncrement: false,
		transient: true,
		nullable: true,
		notNull: false,
		unique: false,
		version: false,
	};
}

function assertUniqueColumns(type: RecordClass, descriptors: readonly FieldDescriptor[]): void {
	const seen = new Map<string, string>();
	for (const d of descriptors) {
		if (d.transient) continue;
		const key = d.columnName.toLowerCase();
		const previous = seen.get(key);
		if (previous !== undefined) {
			throw new RegistrationError(
				`Type ${type.name} maps column "${d.columnName}" twice (${previous} and ${d.path.join(".")})`,
				{ type: type.name, column: d.columnName },
			);
		}
		seen.set(key, d.path.join("."));
	}
}
