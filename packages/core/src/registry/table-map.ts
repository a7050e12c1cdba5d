// =============================================================================
// TABLE & COLUMN MAPS
// =============================================================================
// In-memory metadata binding one record class to one table. Builder methods
// configure it during setup; the first query or DDL call freezes it, and any
// later mutation throws TableFrozenError. Frozen maps are only ever read, so
// they are shared freely across concurrent callers.

import { RegistrationError, TableFrozenError } from "../error/index.js";
import type { ColumnKind, ColumnType } from "../types/column.js";
import { isIntegerKind } from "../types/column.js";
import { getPath } from "../utils/accessor.js";
import type { FieldDescriptor, RecordClass } from "./fields.js";

export class ColumnMap implements ColumnType {
	readonly path: readonly string[];
	readonly containers: readonly RecordClass[];
	readonly kind: ColumnKind;
	readonly nullable: boolean;

	#columnName: string;
	#maxSize: number;
	#transient: boolean;
	#notNull: boolean;
	#unique: boolean;
	#primaryKey = false;
	#autoIncrement = false;

	constructor(
		private readonly table: TableMap,
		descriptor: FieldDescriptor,
	) {
		this.path = descriptor.path;
		this.containers = descriptor.containers;
		this.kind = descriptor.kind;
		this.nullable = descriptor.nullable;
		this.#columnName = descriptor.columnName;
		this.#maxSize = descriptor.maxSize;
		this.#transient = descriptor.transient;
		this.#notNull = descriptor.notNull;
		this.#unique = descriptor.unique;
	}

	/** Dotted property path, e.g. "audit.created". */
	get fieldName(): string {
		return this.path.join(".");
	}

	get columnName(): string {
		return this.#columnName;
	}

	get maxSize(): number {
		return this.#maxSize;
	}

	get transient(): boolean {
		return this.#transient;
	}

	get notNull(): boolean {
		return this.#notNull;
	}

	get unique(): boolean {
		return this.#unique;
	}

	get primaryKey(): boolean {
		return this.#primaryKey;
	}

	get autoIncrement(): boolean {
		return this.#autoIncrement;
	}

	rename(columnName: string): this {
		this.table.assertMutable("rename a column");
		this.table.assertColumnNameFree(columnName, this);
		this.#columnName = columnName;
		return this;
	}

	setTransient(transient: boolean): this {
		this.table.assertMutable("change a transient flag");
		if (transient && this.#primaryKey) {
			throw new RegistrationError(`Primary key ${this.fieldName} cannot be transient`, {
				table: this.table.tableName,
				field: this.fieldName,
			});
		}
		if (transient && this.table.versionColumn === this) {
			throw new RegistrationError(`Version column ${this.fieldName} cannot be transient`, {
				table: this.table.tableName,
				field: this.fieldName,
			});
		}
		this.#transient = transient;
		return this;
	}

	setMaxSize(size: number): this {
		this.table.assertMutable("change a column size");
		if (!Number.isInteger(size) || size < 0) {
			throw new RegistrationError(`Invalid size ${size} for ${this.fieldName}`, {
				table: this.table.tableName,
				field: this.fieldName,
			});
		}
		this.#maxSize = size;
		return this;
	}

	setNotNull(notNull: boolean): this {
		this.table.assertMutable("change a not-null flag");
		this.#notNull = notNull;
		return this;
	}

	setUnique(unique: boolean): this {
		this.table.assertMutable("change a unique flag");
		this.#unique = unique;
		return this;
	}

	/** @internal Called by TableMap.setKeys. */
	markKey(primaryKey: boolean, autoIncrement: boolean): void {
		this.#primaryKey = primaryKey;
		this.#autoIncrement = autoIncrement;
		if (primaryKey) this.#notNull = true;
	}

	read(record: object): unknown {
		return getPath(record, this.path);
	}
}

export interface IndexMap {
	readonly name: string;
	/** Index method such as "btree" or "hash"; engines without methods ignore it. */
	readonly method?: string;
	readonly unique: boolean;
	readonly columns: readonly ColumnMap[];
}

/** Registry callback that keeps (schema, table) names unique. */
export type NameGuard = (table: TableMap, schemaName: string | undefined, tableName: string) => void;

export class TableMap<T extends object = object> {
	readonly type: RecordClass<T>;
	readonly columns: readonly ColumnMap[];

	#tableName: string;
	#schemaName: string | undefined;
	#keys: ColumnMap[] = [];
	#versionColumn: ColumnMap | undefined;
	#uniqueTogether: ColumnMap[][] = [];
	#indexes: IndexMap[] = [];
	#frozen = false;

	constructor(
		type: RecordClass<T>,
		tableName: string,
		schemaName: string | undefined,
		descriptors: readonly FieldDescriptor[],
		private readonly guard: NameGuard,
	) {
		this.type = type;
		this.#tableName = tableName;
		this.#schemaName = schemaName;
		this.columns = descriptors.map((d) => new ColumnMap(this, d));

		const autoIncrement = descriptors.filter((d) => d.autoIncrement);
		if (autoIncrement.length > 1) {
			throw new RegistrationError(
				`Table ${tableName} declares ${autoIncrement.length} autoincrement columns; at most one is allowed`,
				{ table: tableName },
			);
		}
		const keyFields = descriptors.filter((d) => d.primaryKey).map((d) => d.path.join("."));
		if (keyFields.length > 0) {
			this.applyKeys(autoIncrement.length === 1, keyFields);
		}

		const versions = descriptors.filter((d) => d.version);
		if (versions.length > 1) {
			throw new RegistrationError(
				`Table ${tableName} declares ${versions.length} version columns; at most one is allowed`,
				{ table: tableName, fields: versions.map((d) => d.path.join(".")) },
			);
		}
		const version = versions[0];
		if (version) {
			this.#versionColumn = this.requireColumn(version.path.join("."));
		}
	}

	get tableName(): string {
		return this.#tableName;
	}

	get schemaName(): string | undefined {
		return this.#schemaName;
	}

	get keys(): readonly ColumnMap[] {
		return this.#keys;
	}

	/** True when the single key column is generated by the database. */
	get autoIncrement(): boolean {
		return this.#keys.length === 1 && this.#keys[0]?.autoIncrement === true;
	}

	get versionColumn(): ColumnMap | undefined {
		return this.#versionColumn;
	}

	get uniqueTogether(): readonly (readonly ColumnMap[])[] {
		return this.#uniqueTogether;
	}

	get indexes(): readonly IndexMap[] {
		return this.#indexes;
	}

	get isFrozen(): boolean {
		return this.#frozen;
	}

	/** Columns that take part in SQL generation and result binding. */
	get mappedColumns(): readonly ColumnMap[] {
		return this.columns.filter((c) => !c.transient);
	}

	setTableName(tableName: string): this {
		this.assertMutable("be renamed");
		this.guard(this, this.#schemaName, tableName);
		this.#tableName = tableName;
		return this;
	}

	setSchemaName(schemaName: string | undefined): this {
		this.assertMutable("change schema");
		this.guard(this, schemaName, this.#tableName);
		this.#schemaName = schemaName;
		return this;
	}

	/**
	 * Declare the primary key. With `autoIncrement`, exactly one integer field
	 * is allowed and its value is generated by the database on insert.
	 */
	setKeys(autoIncrement: boolean, ...fieldNames: string[]): this {
		this.assertMutable("change its keys");
		this.applyKeys(autoIncrement, fieldNames);
		return this;
	}

	setVersionCol(fieldName: string): this {
		this.assertMutable("change its version column");
		const column = this.requireColumn(fieldName);
		if (!isIntegerKind(column.kind)) {
			throw new RegistrationError(
				`Version column ${fieldName} of ${this.#tableName} must be an integer column`,
				{ table: this.#tableName, field: fieldName },
			);
		}
		if (column.transient || column.primaryKey) {
			throw new RegistrationError(
				`Version column ${fieldName} of ${this.#tableName} cannot be transient or part of the key`,
				{ table: this.#tableName, field: fieldName },
			);
		}
		this.#versionColumn = column;
		return this;
	}

	setUniqueTogether(...fieldNames: string[]): this {
		this.assertMutable("add a unique constraint");
		if (fieldNames.length < 2) {
			throw new RegistrationError("setUniqueTogether needs at least two fields", {
				table: this.#tableName,
			});
		}
		this.#uniqueTogether.push(fieldNames.map((f) => this.requireColumn(f)));
		return this;
	}

	addIndex(name: string, fieldNames: string[], options: { method?: string; unique?: boolean } = {}): this {
		this.assertMutable("add an index");
		if (this.#indexes.some((idx) => idx.name === name)) {
			throw new RegistrationError(`Index ${name} already exists on ${this.#tableName}`, {
				table: this.#tableName,
				index: name,
			});
		}
		if (fieldNames.length === 0) {
			throw new RegistrationError(`Index ${name} needs at least one field`, {
				table: this.#tableName,
				index: name,
			});
		}
		this.#indexes.push({
			name,
			method: options.method,
			unique: options.unique ?? false,
			columns: fieldNames.map((f) => this.requireColumn(f)),
		});
		return this;
	}

	/** Configure one column. Accepts a property name or a dotted embedded path. */
	columnMap(fieldName: string): ColumnMap {
		return this.requireColumn(fieldName);
	}

	findColumn(fieldName: string): ColumnMap | undefined {
		const exact = this.columns.find((c) => c.fieldName === fieldName);
		if (exact) return exact;
		const byProperty = this.columns.filter((c) => c.path[c.path.length - 1] === fieldName);
		return byProperty.length === 1 ? byProperty[0] : undefined;
	}

	/** Values of the key columns, in key order. */
	keyValues(record: object): unknown[] {
		return this.#keys.map((k) => k.read(record));
	}

	freeze(): void {
		this.#frozen = true;
	}

	/** @internal */
	assertMutable(mutation: string): void {
		if (this.#frozen) {
			throw new TableFrozenError(this.#tableName, mutation);
		}
	}

	/** @internal */
	assertColumnNameFree(columnName: string, self: ColumnMap): void {
		const lower = columnName.toLowerCase();
		const clash = this.columns.find(
			(c) => c !== self && !c.transient && c.columnName.toLowerCase() === lower,
		);
		if (clash) {
			throw new RegistrationError(
				`Column name ${columnName} is already used by ${clash.fieldName} on ${this.#tableName}`,
				{ table: this.#tableName, column: columnName },
			);
		}
	}

	private requireColumn(fieldName: string): ColumnMap {
		const column = this.findColumn(fieldName);
		if (!column) {
			throw new RegistrationError(`No field ${fieldName} mapped on ${this.type.name}`, {
				table: this.#tableName,
				field: fieldName,
			});
		}
		return column;
	}

	private applyKeys(autoIncrement: boolean, fieldNames: string[]): void {
		if (fieldNames.length === 0) {
			throw new RegistrationError(`setKeys on ${this.#tableName} needs at least one field`, {
				table: this.#tableName,
			});
		}
		if (autoIncrement && fieldNames.length > 1) {
			throw new RegistrationError(
				`Table ${this.#tableName}: an autoincrement key must be a single column, got ${fieldNames.length}`,
				{ table: this.#tableName, fields: fieldNames },
			);
		}

		const keys = fieldNames.map((f) => this.requireColumn(f));
		for (const key of keys) {
			if (key.transient) {
				throw new RegistrationError(`Key ${key.fieldName} of ${this.#tableName} is transient`, {
					table: this.#tableName,
					field: key.fieldName,
				});
			}
			if (autoIncrement && !isIntegerKind(key.kind)) {
				throw new RegistrationError(
					`Key ${key.fieldName} of ${this.#tableName} is autoincrement but not an integer column`,
					{ table: this.#tableName, field: key.fieldName },
				);
			}
			if (key === this.#versionColumn) {
				throw new RegistrationError(
					`Key ${key.fieldName} of ${this.#tableName} is already the version column`,
					{ table: this.#tableName, field: key.fieldName },
				);
			}
		}

		for (const column of this.columns) column.markKey(false, false);
		for (const key of keys) key.markKey(true, autoIncrement);
		this.#keys = keys;
	}
}

/** Narrow a TableMap to the record class it maps. */
export function isTableOf<T extends object>(table: TableMap, type: RecordClass<T>): table is TableMap<T> {
	return table.type === type;
}
