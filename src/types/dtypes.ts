/**
 * Column data types produced by the CSV reader.
 *
 * Each DType maps to one storage representation:
 * - Numeric types use TypedArrays directly
 * - Date is milliseconds since the Unix epoch (BigInt64Array)
 * - Category is a signed 32-bit hash of the field text (Int32Array)
 * - String keeps the decoded text
 */

export enum DTypeKind {
	Int32 = 0,
	Int64 = 1,
	Float32 = 2,
	Float64 = 3,
	Boolean = 4,
	Date = 5,
	Category = 6,
	String = 7,
}

/** DType descriptor */
export interface DType<K extends DTypeKind = DTypeKind> {
	readonly kind: K;
}

function dtype<K extends DTypeKind>(kind: K): DType<K> {
	return { kind };
}

/**
 * DType factory with convenient accessors.
 *
 * Usage:
 *   DType.int32
 *   DType.category
 */
export const DType = {
	int32: dtype(DTypeKind.Int32),
	int64: dtype(DTypeKind.Int64),
	float32: dtype(DTypeKind.Float32),
	float64: dtype(DTypeKind.Float64),
	boolean: dtype(DTypeKind.Boolean),
	date: dtype(DTypeKind.Date),
	category: dtype(DTypeKind.Category),
	string: dtype(DTypeKind.String),
} as const;

/** Names accepted wherever a dtype can be given as text */
const DTYPE_ALIASES: ReadonlyMap<string, DType> = new Map<string, DType>([
	["int", DType.int32],
	["int32", DType.int32],
	["short", DType.int32],
	["long", DType.int64],
	["int64", DType.int64],
	["float", DType.float32],
	["float32", DType.float32],
	["double", DType.float64],
	["float64", DType.float64],
	["bool", DType.boolean],
	["boolean", DType.boolean],
	["date", DType.date],
	["datetime", DType.date],
	["timestamp", DType.date],
	["category", DType.category],
	["str", DType.string],
	["string", DType.string],
]);

/** A dtype or one of its textual aliases */
export type DTypeLike = DType | string;

/** Resolve a dtype alias, case-insensitively. Returns undefined for unknown names. */
export function parseDTypeName(name: string): DType | undefined {
	return DTYPE_ALIASES.get(name.trim().toLowerCase());
}

export function toDType(value: DTypeLike): DType | undefined {
	return typeof value === "string" ? parseDTypeName(value) : value;
}

/** Check if a DType is an integer type */
export function isIntegerDType(dtype: DType): boolean {
	return dtype.kind === DTypeKind.Int32 || dtype.kind === DTypeKind.Int64;
}

/** Check if a DType is numeric (accepts number text) */
export function isNumericDType(dtype: DType): boolean {
	return dtype.kind >= DTypeKind.Int32 && dtype.kind <= DTypeKind.Float64;
}

/** Get readable name for DTypeKind */
export function getDTypeName(kind: DTypeKind): string {
	switch (kind) {
		case DTypeKind.Int32:
			return "int32";
		case DTypeKind.Int64:
			return "int64";
		case DTypeKind.Float32:
			return "float32";
		case DTypeKind.Float64:
			return "float64";
		case DTypeKind.Boolean:
			return "bool";
		case DTypeKind.Date:
			return "date";
		case DTypeKind.Category:
			return "category";
		case DTypeKind.String:
			return "str";
		default:
			return "unknown";
	}
}
