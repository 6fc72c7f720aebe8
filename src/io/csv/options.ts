/**
 * CSV read options and their validation.
 */

import { getConfig } from "../../core/config/config.ts";
import { ConfigurationError } from "../../errors/configuration-error.ts";
import { type DType, type DTypeLike, toDType } from "../../types/dtypes.ts";
import { err, ok, type Result } from "../../types/result.ts";

/** Byte codes used by the tokenizer */
export const BYTES = {
	LF: 10,
	CR: 13,
	SPACE: 32,
	TAB: 9,
	QUOTE: 34,
	COMMA: 44,
	SEMICOLON: 59,
	PIPE: 124,
	HASH: 35,
} as const;

/** Window of the input to read; see byte-range.ts */
export interface ByteRange {
	readonly offset: number;
	readonly length: number;
}

/** Per-column dtypes: by file position, or by column name */
export type DTypesOption =
	| readonly DTypeLike[]
	| Readonly<Record<string, DTypeLike>>;

/**
 * CSV parsing options.
 */
export interface CsvReadOptions {
	/** Field delimiter, a single character (default: ",") */
	delimiter?: string;
	/** Alias of delimiter */
	sep?: string;
	/** Split fields on runs of spaces and tabs */
	delimWhitespace?: boolean;
	/** Detect the delimiter from the first data lines */
	sniffDelimiter?: boolean;

	/** Quote character (default: '"') */
	quoteChar?: string;
	/** Honour quote characters (default: true) */
	quoting?: boolean;
	/** Lines whose first non-blank character is this are dropped */
	commentChar?: string;
	/** Drop empty lines before counting rows (default: true) */
	skipBlankLines?: boolean;

	/** Header row after skipped rows, "infer" (row 0 unless names are given) or "none" (default: "infer") */
	header?: number | "infer" | "none";
	/** Number of leading rows to skip, or the indices of rows to skip */
	skipRows?: number | readonly number[];
	/** Number of trailing data rows to drop */
	skipFooter?: number;
	/** Maximum number of data rows to read */
	nRows?: number;

	/** Column names; replaces any header row */
	names?: readonly string[];
	/** Column dtypes; missing entries are inferred */
	dtypes?: DTypesOption;
	/** Prefix for generated column names */
	prefix?: string;
	/** Columns to return, by name or file position */
	useCols?: readonly (number | string)[];
	/** Column to mark as the row index, by name or position among returned columns */
	indexCol?: number | string | false;

	/** Decimal separator (default: ".") */
	decimal?: string;
	/** Thousands separator stripped from numbers */
	thousands?: string;
	/** Extra tokens parsed as true */
	trueValues?: readonly string[];
	/** Extra tokens parsed as false */
	falseValues?: readonly string[];
	/** Extra tokens parsed as missing */
	naValues?: readonly string[];
	/** Include the default missing-value tokens (default: true) */
	keepDefaultNa?: boolean;
	/** Detect missing values at all (default: true) */
	naFilter?: boolean;
	/** Read d/m/y instead of m/d/y for ambiguous dates */
	dayFirst?: boolean;

	/** Read only rows starting inside this window */
	byteRange?: ByteRange;
	/** Data rows used for column detection and dtype inference (default: configure()) */
	sampleRows?: number;
}

export type HeaderOption = number | "infer" | "none";

export type DTypeSpec =
	| { readonly kind: "list"; readonly dtypes: readonly DType[] }
	| { readonly kind: "map"; readonly dtypes: ReadonlyMap<string, DType> };

/** Resolved CSV options with byte codes for internal use */
export interface ResolvedCsvOptions {
	/** Delimiter byte; null for whitespace runs; undefined when it must be sniffed */
	delimiter: number | null | undefined;
	quote: number;
	quoting: boolean;
	comment: number | null;
	skipBlankLines: boolean;
	header: HeaderOption;
	skipRows: number | ReadonlySet<number>;
	skipFooter: number;
	nRows: number;
	names: readonly string[] | null;
	dtypes: DTypeSpec | null;
	prefix: string | null;
	useCols: readonly (number | string)[] | null;
	indexCol: number | string | null;
	decimal: string;
	thousands: string | null;
	trueValues: ReadonlySet<string>;
	falseValues: ReadonlySet<string>;
	naValues: ReadonlySet<string>;
	naFilter: boolean;
	dayFirst: boolean;
	byteRange: ByteRange | null;
	sampleRows: number;
}

/** Default CSV options */
export const DEFAULT_CSV_OPTIONS = {
	delimiter: ",",
	quoteChar: '"',
	quoting: true,
	skipBlankLines: true,
	header: "infer",
	skipFooter: 0,
	nRows: Number.POSITIVE_INFINITY,
	decimal: ".",
	keepDefaultNa: true,
	naFilter: true,
	dayFirst: false,
} as const;

/** Tokens read as missing unless keepDefaultNa is false */
export const DEFAULT_NA_VALUES: ReadonlySet<string> = new Set([
	"",
	"#N/A",
	"#N/A N/A",
	"#NA",
	"-1.#IND",
	"-1.#QNAN",
	"-NaN",
	"-nan",
	"1.#IND",
	"1.#QNAN",
	"N/A",
	"NA",
	"NULL",
	"NaN",
	"n/a",
	"nan",
	"null",
]);

/** Boolean tokens always recognised, compared lower-cased */
export const DEFAULT_TRUE_VALUES: readonly string[] = ["True", "TRUE"];
export const DEFAULT_FALSE_VALUES: readonly string[] = ["False", "FALSE"];

/**
 * Validate user options and convert them to the internal form.
 * Conflicts are reported here, before any input is read.
 */
export function resolveOptions(
	options: CsvReadOptions = {},
): Result<ResolvedCsvOptions, ConfigurationError> {
	try {
		return ok(resolveOrThrow(options));
	} catch (e) {
		if (e instanceof ConfigurationError) return err(e);
		throw e;
	}
}

function resolveOrThrow(options: CsvReadOptions): ResolvedCsvOptions {
	const delimiter = resolveDelimiter(options);

	const skipFooter = options.skipFooter ?? DEFAULT_CSV_OPTIONS.skipFooter;
	requireCount("skipFooter", skipFooter);
	if (skipFooter > 0 && options.nRows !== undefined) {
		throw new ConfigurationError(
			["skipFooter", "nRows"],
			"skipFooter needs the whole input while nRows stops early",
			"use one of skipFooter or nRows",
		);
	}
	if (skipFooter > 0 && options.byteRange !== undefined) {
		throw new ConfigurationError(
			["skipFooter", "byteRange"],
			"skipFooter cannot be applied to a window that may not reach the end of input",
		);
	}

	const nRows = options.nRows ?? DEFAULT_CSV_OPTIONS.nRows;
	if (options.nRows !== undefined) requireCount("nRows", nRows);

	const quoteChar = options.quoteChar ?? DEFAULT_CSV_OPTIONS.quoteChar;
	const quote = singleByte("quoteChar", quoteChar);
	const comment =
		options.commentChar === undefined
			? null
			: singleByte("commentChar", options.commentChar);

	const decimal = options.decimal ?? DEFAULT_CSV_OPTIONS.decimal;
	singleByte("decimal", decimal);
	const thousands = options.thousands ?? null;
	if (thousands !== null) {
		singleByte("thousands", thousands);
		if (thousands === decimal) {
			throw new ConfigurationError(
				["decimal", "thousands"],
				`decimal and thousands separators are both '${decimal}'`,
			);
		}
	}
	if (typeof delimiter === "number") {
		if (decimal.charCodeAt(0) === delimiter) {
			throw new ConfigurationError(
				["decimal", "delimiter"],
				`decimal separator '${decimal}' is also the delimiter`,
			);
		}
		if (thousands !== null && thousands.charCodeAt(0) === delimiter) {
			throw new ConfigurationError(
				["thousands", "delimiter"],
				`thousands separator '${thousands}' is also the delimiter`,
			);
		}
		if (quote === delimiter) {
			throw new ConfigurationError(
				["quoteChar", "delimiter"],
				`quote character '${quoteChar}' is also the delimiter`,
			);
		}
	}

	const header = options.header ?? DEFAULT_CSV_OPTIONS.header;
	if (typeof header === "number") requireCount("header", header);

	const skipRows = resolveSkipRows(options.skipRows);
	const names = resolveNames(options.names);
	const byteRange = resolveByteRange(options.byteRange);

	const sampleRows = options.sampleRows ?? getConfig().inferenceSampleRows;
	if (!(sampleRows >= 1)) {
		throw new ConfigurationError(["sampleRows"], "sampleRows must be at least 1");
	}

	const naFilter = options.naFilter ?? DEFAULT_CSV_OPTIONS.naFilter;
	const keepDefaultNa = options.keepDefaultNa ?? DEFAULT_CSV_OPTIONS.keepDefaultNa;
	const naValues = new Set<string>(keepDefaultNa ? DEFAULT_NA_VALUES : []);
	for (const token of options.naValues ?? []) naValues.add(token);

	return {
		delimiter,
		quote,
		quoting: options.quoting ?? DEFAULT_CSV_OPTIONS.quoting,
		comment,
		skipBlankLines: options.skipBlankLines ?? DEFAULT_CSV_OPTIONS.skipBlankLines,
		header,
		skipRows,
		skipFooter,
		nRows,
		names,
		dtypes: resolveDTypes(options.dtypes),
		prefix: options.prefix ?? null,
		useCols: options.useCols ?? null,
		indexCol:
			options.indexCol === undefined || options.indexCol === false
				? null
				: options.indexCol,
		decimal,
		thousands,
		trueValues: lowerSet(DEFAULT_TRUE_VALUES, options.trueValues),
		falseValues: lowerSet(DEFAULT_FALSE_VALUES, options.falseValues),
		naValues: naFilter ? naValues : new Set<string>(),
		naFilter,
		dayFirst: options.dayFirst ?? DEFAULT_CSV_OPTIONS.dayFirst,
		byteRange,
		sampleRows,
	};
}

function resolveDelimiter(options: CsvReadOptions): number | null | undefined {
	const { delimiter, sep } = options;
	if (delimiter !== undefined && sep !== undefined && delimiter !== sep) {
		throw new ConfigurationError(
			["delimiter", "sep"],
			`delimiter '${delimiter}' and sep '${sep}' disagree`,
			"sep is an alias of delimiter; pass only one",
		);
	}
	const explicit = delimiter ?? sep;

	if (options.delimWhitespace === true) {
		if (explicit !== undefined) {
			throw new ConfigurationError(
				[delimiter !== undefined ? "delimiter" : "sep", "delimWhitespace"],
				"an explicit delimiter cannot be combined with delimWhitespace",
			);
		}
		if (options.sniffDelimiter === true) {
			throw new ConfigurationError(
				["sniffDelimiter", "delimWhitespace"],
				"sniffDelimiter cannot be combined with delimWhitespace",
			);
		}
		return null;
	}

	if (options.sniffDelimiter === true) {
		if (explicit !== undefined) {
			throw new ConfigurationError(
				["sniffDelimiter", "delimiter"],
				"sniffDelimiter cannot be combined with an explicit delimiter",
			);
		}
		return undefined;
	}

	return singleByte("delimiter", explicit ?? DEFAULT_CSV_OPTIONS.delimiter);
}

function singleByte(option: string, value: string): number {
	const code = value.charCodeAt(0);
	if (value.length !== 1 || code > 127) {
		throw new ConfigurationError(
			[option],
			`${option} must be a single ASCII character, got '${value}'`,
		);
	}
	if (code === BYTES.LF || code === BYTES.CR) {
		throw new ConfigurationError([option], `${option} cannot be a line terminator`);
	}
	return code;
}

function requireCount(option: string, value: number): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new ConfigurationError(
			[option],
			`${option} must be a non-negative integer, got ${value}`,
		);
	}
}

function resolveSkipRows(
	skipRows: number | readonly number[] | undefined,
): number | ReadonlySet<number> {
	if (skipRows === undefined) return 0;
	if (typeof skipRows === "number") {
		requireCount("skipRows", skipRows);
		return skipRows;
	}
	for (const index of skipRows) requireCount("skipRows", index);
	return new Set(skipRows);
}

function resolveNames(names: readonly string[] | undefined): readonly string[] | null {
	if (names === undefined) return null;
	const seen = new Set<string>();
	for (const name of names) {
		if (seen.has(name)) {
			throw new ConfigurationError(["names"], `duplicate column name '${name}'`);
		}
		seen.add(name);
	}
	return names;
}

function resolveByteRange(range: ByteRange | undefined): ByteRange | null {
	if (range === undefined) return null;
	requireCount("byteRange.offset", range.offset);
	requireCount("byteRange.length", range.length);
	return { offset: range.offset, length: range.length };
}

function resolveDTypes(dtypes: DTypesOption | undefined): DTypeSpec | null {
	if (dtypes === undefined) return null;
	if (isDTypeList(dtypes)) {
		return { kind: "list", dtypes: dtypes.map((d, i) => requireDType(d, `${i}`)) };
	}
	const map = new Map<string, DType>();
	for (const [name, d] of Object.entries(dtypes)) {
		map.set(name, requireDType(d, name));
	}
	return { kind: "map", dtypes: map };
}

function isDTypeList(
	dtypes: DTypesOption,
): dtypes is readonly DTypeLike[] {
	return Array.isArray(dtypes);
}

function requireDType(value: DTypeLike, column: string): DType {
	const dtype = toDType(value);
	if (dtype === undefined) {
		throw new ConfigurationError(
			["dtypes"],
			`unknown dtype '${String(value)}' for column '${column}'`,
			"use one of int32, int64, float32, float64, bool, date, category, str",
		);
	}
	return dtype;
}

function lowerSet(
	defaults: readonly string[],
	extra: readonly string[] | undefined,
): ReadonlySet<string> {
	const set = new Set<string>();
	for (const token of defaults) set.add(token.toLowerCase());
	for (const token of extra ?? []) set.add(token.toLowerCase());
	return set;
}
