import { SchemaError } from "../errors/schema-error.ts";
import { type DType, DTypeKind } from "../types/dtypes.ts";
import {
	createNullBitmap,
	getNullCount,
	isNull,
	type NullBitmap,
	setNull,
} from "../utils/nulls.ts";

/** Typed storage of a column, tagged by dtype kind */
export type ColumnData =
	| { readonly kind: DTypeKind.Int32 | DTypeKind.Category; readonly values: Int32Array }
	| { readonly kind: DTypeKind.Int64 | DTypeKind.Date; readonly values: BigInt64Array }
	| { readonly kind: DTypeKind.Float32; readonly values: Float32Array }
	| { readonly kind: DTypeKind.Float64; readonly values: Float64Array }
	| { readonly kind: DTypeKind.Boolean; readonly values: Uint8Array }
	| { readonly kind: DTypeKind.String; readonly values: readonly string[] };

/** A single present value as exposed by Column.get() */
export type CellValue = number | bigint | boolean | string;

/**
 * Column represents a single finished, immutable column.
 * Values live in typed storage; the null bitmap marks missing entries.
 */
export class Column {
	readonly name: string;
	readonly data: ColumnData;
	readonly nulls: NullBitmap;
	readonly length: number;

	constructor(name: string, data: ColumnData, nulls: NullBitmap) {
		if (nulls.length !== data.values.length) {
			throw new SchemaError(
				`column '${name}' has ${data.values.length} values but ${nulls.length} validity entries`,
			);
		}
		this.name = name;
		this.data = data;
		this.nulls = nulls;
		this.length = data.values.length;
	}

	get dtype(): DType {
		return { kind: this.data.kind };
	}

	/** Raw typed storage (NA slots hold zero or an empty string) */
	get values(): ColumnData["values"] {
		return this.data.values;
	}

	get nullCount(): number {
		return getNullCount(this.nulls);
	}

	isNull(index: number): boolean {
		return isNull(this.nulls, index);
	}

	/** Value at index, or null when missing */
	get(index: number): CellValue | null {
		if (index < 0 || index >= this.length) {
			throw new RangeError(
				`index ${index} out of bounds for column '${this.name}' of length ${this.length}`,
			);
		}
		if (isNull(this.nulls, index)) return null;

		const data = this.data;
		switch (data.kind) {
			case DTypeKind.Boolean:
				return data.values[index] === 1;
			default:
				return data.values[index];
		}
	}

	toArray(): (CellValue | null)[] {
		const out: (CellValue | null)[] = new Array(this.length);
		for (let i = 0; i < this.length; i++) {
			out[i] = this.get(i);
		}
		return out;
	}

	/** Concatenate same-typed columns in order */
	static concat(name: string, parts: readonly Column[]): Column {
		const first = parts[0];
		if (first === undefined) {
			throw new SchemaError(`no parts to concatenate for column '${name}'`);
		}
		for (const part of parts) {
			if (part.data.kind !== first.data.kind) {
				throw new SchemaError(`column '${name}' has differing dtypes across parts`);
			}
		}

		let length = 0;
		for (const part of parts) length += part.length;

		const nulls = createNullBitmap(length);
		let offset = 0;
		for (const part of parts) {
			for (let i = 0; i < part.length; i++) {
				if (isNull(part.nulls, i)) setNull(nulls, offset + i);
			}
			offset += part.length;
		}

		return new Column(name, concatData(first.data.kind, parts, length), nulls);
	}
}

function concatData(
	kind: DTypeKind,
	parts: readonly Column[],
	length: number,
): ColumnData {
	const values = parts.map((part) => part.data.values);
	switch (kind) {
		case DTypeKind.Int32:
		case DTypeKind.Category:
			return {
				kind,
				values: concatNumeric(values, new Int32Array(length), isInt32Array),
			};
		case DTypeKind.Float32:
			return {
				kind,
				values: concatNumeric(values, new Float32Array(length), isFloat32Array),
			};
		case DTypeKind.Float64:
			return {
				kind,
				values: concatNumeric(values, new Float64Array(length), isFloat64Array),
			};
		case DTypeKind.Boolean:
			return {
				kind,
				values: concatNumeric(values, new Uint8Array(length), isUint8Array),
			};
		case DTypeKind.Int64:
		case DTypeKind.Date: {
			const out = new BigInt64Array(length);
			let offset = 0;
			for (const part of values) {
				if (!(part instanceof BigInt64Array)) throw storageMismatch();
				out.set(part, offset);
				offset += part.length;
			}
			return { kind, values: out };
		}
		case DTypeKind.String: {
			const out: string[] = [];
			for (const part of values) {
				if (!isStringArray(part)) throw storageMismatch();
				for (const value of part) out.push(value);
			}
			return { kind, values: out };
		}
	}
}

type Storage = ColumnData["values"];

function concatNumeric<A extends Int32Array | Float32Array | Float64Array | Uint8Array>(
	parts: readonly Storage[],
	out: A,
	guard: (values: Storage) => values is A,
): A {
	let offset = 0;
	for (const part of parts) {
		if (!guard(part)) throw storageMismatch();
		out.set(part, offset);
		offset += part.length;
	}
	return out;
}

const isInt32Array = (v: Storage): v is Int32Array => v instanceof Int32Array;
const isFloat32Array = (v: Storage): v is Float32Array => v instanceof Float32Array;
const isFloat64Array = (v: Storage): v is Float64Array => v instanceof Float64Array;
const isUint8Array = (v: Storage): v is Uint8Array => v instanceof Uint8Array;
const isStringArray = (v: Storage): v is readonly string[] => Array.isArray(v);

function storageMismatch(): SchemaError {
	return new SchemaError("column storage does not match its dtype");
}
