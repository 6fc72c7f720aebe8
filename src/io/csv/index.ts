export { findRowStart, resolveWindow, splitByteRanges } from "./byte-range.ts";
export { resolveDialect, sniffDelimiter, SNIFF_CANDIDATES } from "./dialect.ts";
export { ColumnTypeStats, inferColumnType } from "./inference.ts";
export { normalizeNumber, parseFloatText, parseInt32Text, parseInt64Text } from "./numeric.ts";
export type { NumberFormat } from "./numeric.ts";
export {
	DEFAULT_CSV_OPTIONS,
	DEFAULT_FALSE_VALUES,
	DEFAULT_NA_VALUES,
	DEFAULT_TRUE_VALUES,
	resolveOptions,
} from "./options.ts";
export type {
	ByteRange,
	CsvReadOptions,
	DTypesOption,
	HeaderOption,
	ResolvedCsvOptions,
} from "./options.ts";
export {
	parseCsvBytes,
	parseCsvSegmented,
	readCsv,
	readCsvFromString,
	readCsvSegmented,
} from "./reader.ts";
export { RowSelector } from "./row-selector.ts";
export type { RowSelection, SelectedRow } from "./row-selector.ts";
export {
	generatedNames,
	headerNames,
	mangleDuplicates,
	resolveLayout,
} from "./schema-resolver.ts";
export type { ResolvedLayout } from "./schema-resolver.ts";
export { RowKind, Tokenizer } from "./tokenizer.ts";
export type { ByteWindow, CsvRow, Dialect, FieldSpan } from "./tokenizer.ts";
export { createConverter, createValueContext, ValueParser } from "./value-parser.ts";
export type { ColumnConverter, ColumnPlan, ValueContext } from "./value-parser.ts";
