/**
 * Field text to typed column values.
 *
 * One converter is chosen per column when the schema is fixed and reused
 * for every row of that column.
 */

import {
	BigIntColumnBuffer,
	type ColumnBuffer,
	NumericColumnBuffer,
	StringColumnBuffer,
} from "../../buffer/column-buffer.ts";
import { Column, type ColumnData } from "../../core/column.ts";
import { ConversionError } from "../../errors/conversion-error.ts";
import { type DType, DTypeKind, getDTypeName } from "../../types/dtypes.ts";
import { parseDateTime } from "../../utils/datetime.ts";
import { hashCategory } from "../../utils/hash.ts";
import type { NumberFormat } from "./numeric.ts";
import { parseFloatText, parseInt32Text, parseInt64Text } from "./numeric.ts";
import type { ResolvedCsvOptions } from "./options.ts";
import type { CsvRow, Tokenizer } from "./tokenizer.ts";

/** Settings shared by every converter of a read */
export interface ValueContext {
	readonly naValues: ReadonlySet<string>;
	readonly naFilter: boolean;
	/** Lower-cased boolean tokens */
	readonly trueValues: ReadonlySet<string>;
	readonly falseValues: ReadonlySet<string>;
	readonly format: NumberFormat;
	readonly dayFirst: boolean;
	readonly capacity: number;
}

export function createValueContext(
	options: ResolvedCsvOptions,
	capacity: number,
): ValueContext {
	return {
		naValues: options.naValues,
		naFilter: options.naFilter,
		trueValues: options.trueValues,
		falseValues: options.falseValues,
		format: { decimal: options.decimal, thousands: options.thousands },
		dayFirst: options.dayFirst,
		capacity,
	};
}

/** Blank text (quoted blanks included) and NA tokens are missing */
export function isNa(text: string, ctx: ValueContext): boolean {
	return ctx.naFilter && (text.trim() === "" || ctx.naValues.has(text));
}

/** Case-insensitive boolean token lookup */
export function parseBoolean(text: string, ctx: ValueContext): boolean | undefined {
	const lower = text.toLowerCase();
	if (ctx.trueValues.has(lower)) return true;
	if (ctx.falseValues.has(lower)) return false;
	return undefined;
}

/** Appends one column's values */
export interface ColumnConverter {
	readonly dtype: DType;
	/** Append a non-missing field; false when the text does not fit the dtype */
	append(text: string): boolean;
	appendNull(): void;
	finish(name: string): Column;
}

function converter<T, S>(
	dtype: DType,
	buffer: ColumnBuffer<T, S>,
	parse: (text: string) => T | undefined,
	build: (values: S) => ColumnData,
): ColumnConverter {
	return {
		dtype,
		append(text: string): boolean {
			const value = parse(text);
			if (value === undefined) return false;
			buffer.append(value);
			return true;
		},
		appendNull(): void {
			buffer.appendNull();
		},
		finish(name: string): Column {
			const { values, nulls } = buffer.finish();
			return new Column(name, build(values), nulls);
		},
	};
}

/** Boolean tokens in numeric columns read as 1 and 0 */
function boolAsNumber(text: string, ctx: ValueContext): number | undefined {
	const b = parseBoolean(text, ctx);
	return b === undefined ? undefined : b ? 1 : 0;
}

export function createConverter(dtype: DType, ctx: ValueContext): ColumnConverter {
	const { capacity, format } = ctx;
	switch (dtype.kind) {
		case DTypeKind.Int32:
			return converter(
				dtype,
				new NumericColumnBuffer((n) => new Int32Array(n), capacity),
				(t) => parseInt32Text(t, format) ?? boolAsNumber(t, ctx),
				(values) => ({ kind: DTypeKind.Int32, values }),
			);
		case DTypeKind.Int64:
			return converter(
				dtype,
				new BigIntColumnBuffer(capacity),
				(t) => {
					const value = parseInt64Text(t, format);
					if (value !== undefined) return value;
					const b = boolAsNumber(t, ctx);
					return b === undefined ? undefined : BigInt(b);
				},
				(values) => ({ kind: DTypeKind.Int64, values }),
			);
		case DTypeKind.Float32:
			return converter(
				dtype,
				new NumericColumnBuffer((n) => new Float32Array(n), capacity),
				(t) => parseFloatText(t, format) ?? boolAsNumber(t, ctx),
				(values) => ({ kind: DTypeKind.Float32, values }),
			);
		case DTypeKind.Float64:
			return converter(
				dtype,
				new NumericColumnBuffer((n) => new Float64Array(n), capacity),
				(t) => parseFloatText(t, format) ?? boolAsNumber(t, ctx),
				(values) => ({ kind: DTypeKind.Float64, values }),
			);
		case DTypeKind.Boolean:
			return converter(
				dtype,
				new NumericColumnBuffer((n) => new Uint8Array(n), capacity),
				(t) => boolAsNumber(t, ctx),
				(values) => ({ kind: DTypeKind.Boolean, values }),
			);
		case DTypeKind.Date:
			return converter(
				dtype,
				new BigIntColumnBuffer(capacity),
				(t) => {
					const ms = parseDateTime(t, ctx.dayFirst);
					return Number.isNaN(ms) ? undefined : BigInt(ms);
				},
				(values) => ({ kind: DTypeKind.Date, values }),
			);
		case DTypeKind.Category:
			return converter(
				dtype,
				new NumericColumnBuffer((n) => new Int32Array(n), capacity),
				hashCategory,
				(values) => ({ kind: DTypeKind.Category, values }),
			);
		case DTypeKind.String:
			return converter(
				dtype,
				new StringColumnBuffer(capacity),
				(t) => t,
				(values) => ({ kind: DTypeKind.String, values }),
			);
	}
}

/** One output column: where it comes from in the file and how to read it */
export interface ColumnPlan {
	readonly name: string;
	readonly dtype: DType;
	/** Field position in the file row */
	readonly fileIndex: number;
}

/**
 * Converts selected data rows into output columns.
 */
export class ValueParser {
	private readonly columns: readonly ColumnPlan[];
	private readonly converters: readonly ColumnConverter[];
	private readonly ctx: ValueContext;
	private readonly tokenizer: Tokenizer;

	constructor(columns: readonly ColumnPlan[], ctx: ValueContext, tokenizer: Tokenizer) {
		this.columns = columns;
		this.ctx = ctx;
		this.tokenizer = tokenizer;
		this.converters = columns.map((col) => createConverter(col.dtype, ctx));
	}

	/** Convert one data row; throws ConversionError on text that does not fit */
	acceptRow(row: CsvRow, rowIndex: number): void {
		for (const [j, col] of this.columns.entries()) {
			const conv = this.converters[j];
			if (conv === undefined) continue;

			const span = row.fields[col.fileIndex];
			if (span === undefined) {
				conv.appendNull();
				continue;
			}

			const text = this.tokenizer.decodeField(span);
			if (isNa(text, this.ctx)) {
				conv.appendNull();
			} else if (!conv.append(text)) {
				if (this.ctx.naFilter) {
					throw new ConversionError(
						rowIndex,
						col.name,
						j,
						getDTypeName(col.dtype.kind),
						text,
					);
				}
				conv.appendNull();
			}
		}
	}

	finish(): Column[] {
		return this.columns.map((col, j) => {
			const conv = this.converters[j];
			if (conv === undefined) {
				throw new RangeError(`no converter for column '${col.name}'`);
			}
			return conv.finish(col.name);
		});
	}
}
