// =============================================================================
// TYPE REGISTRY
// =============================================================================
// Owns the TableMaps of one DbMap. Table-name uniqueness is scoped to a single
// registry instance, so independent registries coexist in one process.

import { RegistrationError, UnregisteredTypeError } from "../error/index.js";
import { describeFields, type RecordClass } from "./fields.js";
import { isTableOf, TableMap } from "./table-map.js";

/**
 * Capability for records whose table is chosen per instance. `tableName()`
 * names a table registered for the record's class.
 */
export interface DynamicTable {
	tableName(): string;
	/** Optional schema qualifier for the table name. */
	schemaName?(): string | undefined;
}

export interface TypeRegistry {
	/**
	 * Register a record class under a table name. Falls back to the class's
	 * static `tableName` when none is given.
	 */
	register<T extends object>(type: RecordClass<T>, tableName?: string, schemaName?: string): TableMap<T>;
	/** Resolve the TableMap for a record instance. */
	tableFor(record: object): TableMap;
	/** First TableMap registered for a class. */
	tableForType<T extends object>(type: RecordClass<T>): TableMap<T>;
	/** Like `tableForType`, but `undefined` for an unregistered class. */
	lookupType<T extends object>(type: RecordClass<T>): TableMap<T> | undefined;
	/** Look a TableMap up by name. */
	table(tableName: string, schemaName?: string): TableMap | undefined;
	/** All TableMaps in registration order. */
	tables(): readonly TableMap[];
}

function qualifiedName(schemaName: string | undefined, tableName: string): string {
	return schemaName ? `${schemaName}.${tableName}` : tableName;
}

function isDynamicTable(record: object): record is DynamicTable {
	return typeof Reflect.get(record, "tableName") === "function";
}

export function createRegistry(): TypeRegistry {
	const tables: TableMap[] = [];
	const byType = new Map<object, TableMap[]>();

	const guard = (self: TableMap, schemaName: string | undefined, tableName: string): void => {
		const wanted = qualifiedName(schemaName, tableName);
		const clash = tables.find(
			(t) => t !== self && qualifiedName(t.schemaName, t.tableName) === wanted,
		);
		if (clash) {
			throw new RegistrationError(`Table ${wanted} is already registered for ${clash.type.name}`, {
				table: wanted,
			});
		}
	};

	function lookupType<T extends object>(type: RecordClass<T>): TableMap<T> | undefined {
		return byType.get(type)?.find((t) => isTableOf(t, type));
	}

	function lookup(tableName: string, schemaName?: string): TableMap | undefined {
		const wanted = qualifiedName(schemaName, tableName);
		return tables.find((t) => qualifiedName(t.schemaName, t.tableName) === wanted);
	}

	return {
		register<T extends object>(
			type: RecordClass<T>,
			tableName?: string,
			schemaName?: string,
		): TableMap<T> {
			const name = tableName ?? type.tableName;
			if (!name) {
				throw new RegistrationError(
					`No table name for ${type.name}: pass one to register() or declare a static tableName`,
					{ type: type.name },
				);
			}

			const descriptors = describeFields(type);
			const table = new TableMap(type, name, schemaName, descriptors, guard);
			guard(table, schemaName, name);

			tables.push(table);
			const list = byType.get(type) ?? [];
			list.push(table);
			byType.set(type, list);
			return table;
		},

		tableFor(record: object): TableMap {
			if (isDynamicTable(record)) {
				const name = record.tableName();
				const schema = record.schemaName?.();
				const table = lookup(name, schema);
				if (!table) throw new UnregisteredTypeError(`${record.constructor.name} (table ${name})`);
				return table;
			}
			const tablesForType = byType.get(record.constructor);
			const table = tablesForType?.[0];
			if (!table) throw new UnregisteredTypeError(record.constructor.name);
			return table;
		},

		tableForType<T extends object>(type: RecordClass<T>): TableMap<T> {
			const table = lookupType(type);
			if (!table) throw new UnregisteredTypeError(type.name);
			return table;
		},

		lookupType,

		table: lookup,

		tables(): readonly TableMap[] {
			return tables;
		},
	};
}
