export {
	bindScalar,
	bindScalars,
	createRowBinder,
	type RowBinder,
	type ScalarKind,
	type ScalarTypes,
} from "./bind.js";
export { coerceValue } from "./coerce.js";
