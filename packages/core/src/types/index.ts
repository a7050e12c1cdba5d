export { type ColumnKind, type ColumnType, isIntegerKind, kindOfValue } from "./column.js";
export type { DbMapOptions, RowbindLogger, TraceOptions, TypeConverter } from "./config.js";
