export {
	DType,
	DTypeKind,
	getDTypeName,
	isIntegerDType,
	isNumericDType,
	parseDTypeName,
	toDType,
} from "./dtypes.ts";
export type { DTypeLike } from "./dtypes.ts";
export { err, ok, unwrap, unwrapErr } from "./result.ts";
export type { Result } from "./result.ts";
export {
	createSchema,
	formatSchema,
	getColumnNames,
	hasColumn,
	schemasEqual,
} from "./schema.ts";
export type { ColumnDef, Schema } from "./schema.ts";
