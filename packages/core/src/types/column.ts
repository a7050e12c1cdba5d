// Semantic column types. Every dialect maps each kind to one SQL type name.
export type ColumnKind =
	| "integer"
	| "bigint"
	| "float"
	| "text"
	| "boolean"
	| "binary"
	| "timestamp";

/** The part of a column's metadata a dialect needs to render its SQL type. */
export interface ColumnType {
	readonly kind: ColumnKind;
	/** Maximum length for text columns. 0 means unbounded. */
	readonly maxSize: number;
	readonly autoIncrement: boolean;
}

export function isIntegerKind(kind: ColumnKind): boolean {
	return kind === "integer" || kind === "bigint";
}

/** Best-effort kind of an ad hoc parameter value with no column behind it. */
export function kindOfValue(value: unknown): ColumnKind {
	if (typeof value === "boolean") return "boolean";
	if (typeof value === "bigint") return "bigint";
	if (typeof value === "number") return Number.isInteger(value) ? "integer" : "float";
	if (value instanceof Date) return "timestamp";
	if (value instanceof Uint8Array) return "binary";
	return "text";
}
