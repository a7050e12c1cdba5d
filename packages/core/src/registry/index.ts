export {
	type ColumnFieldDef,
	defineFields,
	describeFields,
	type EmbeddedFieldDef,
	type FieldDef,
	type FieldDescriptor,
	type FieldOptions,
	type FieldSet,
	field,
	isRecordClass,
	type RecordClass,
	type TransientFieldDef,
} from "./fields.js";
export { createRegistry, type DynamicTable, type TypeRegistry } from "./registry.js";
export { ColumnMap, type IndexMap, isTableOf, type NameGuard, TableMap } from "./table-map.js";
export { type ParsedTag, parseTag } from "./tag.js";
