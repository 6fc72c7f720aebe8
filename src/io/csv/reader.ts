/**
 * CSV reading entry points.
 *
 * A read resolves its byte window and dialect, fixes the layout (names and
 * dtypes) from the header and a sample, then converts every selected data
 * row. Errors raised by any stage end the read and are returned as the
 * failed Result.
 */

import { getConfig } from "../../core/config/config.ts";
import { Table } from "../../core/table.ts";
import { KolumnaError } from "../../errors/base.ts";
import { ConfigurationError } from "../../errors/configuration-error.ts";
import type { DType } from "../../types/dtypes.ts";
import { err, ok, type Result } from "../../types/result.ts";
import { type CsvSource, loadSource } from "../source.ts";
import { isLeadingRange, resolveWindow } from "./byte-range.ts";
import { resolveDialect } from "./dialect.ts";
import {
	type CsvReadOptions,
	type ResolvedCsvOptions,
	resolveOptions,
} from "./options.ts";
import { type RowSelection, RowSelector } from "./row-selector.ts";
import { type ResolvedLayout, resolveLayout, rowSelection } from "./schema-resolver.ts";
import { type ByteWindow, type Dialect, RowKind, Tokenizer } from "./tokenizer.ts";
import { createValueContext, type ValueContext, ValueParser } from "./value-parser.ts";

const encoder = new TextEncoder();

/**
 * Read a CSV file, buffer or stream into a Table.
 *
 * @example
 * ```ts
 * const result = await readCsv("./trades.csv", { dtypes: { price: "float64" } });
 * if (result.ok) console.log(result.data.rowCount);
 * else console.error(result.error.format());
 * ```
 */
export async function readCsv(
	source: CsvSource,
	options?: CsvReadOptions,
): Promise<Result<Table, KolumnaError>> {
	const resolved = resolveOptions(options);
	if (!resolved.ok) return resolved;

	try {
		const bytes = await loadSource(source);
		return ok(parseCsvBytes(bytes, resolved.data));
	} catch (e) {
		if (e instanceof KolumnaError) return err(e);
		throw e;
	}
}

/** Read CSV text (or bytes) held in memory. */
export function readCsvFromString(
	input: string | Uint8Array,
	options?: CsvReadOptions,
): Result<Table, KolumnaError> {
	const resolved = resolveOptions(options);
	if (!resolved.ok) return resolved;

	const bytes = typeof input === "string" ? encoder.encode(input) : input;
	return capture(() => parseCsvBytes(bytes, resolved.data));
}

/**
 * Read a source as consecutive windows of about `segmentBytes`, each cut
 * at a row start, and concatenate them. Names, dtypes and the dialect are
 * resolved once over the whole input, so the result equals a single full
 * read.
 */
export async function readCsvSegmented(
	source: CsvSource,
	segmentBytes: number,
	options?: CsvReadOptions,
): Promise<Result<Table, KolumnaError>> {
	const resolved = resolveOptions(options);
	if (!resolved.ok) return resolved;

	try {
		checkSegmented(segmentBytes, resolved.data);
		const bytes = await loadSource(source);
		return ok(parseCsvSegmented(bytes, segmentBytes, resolved.data));
	} catch (e) {
		if (e instanceof KolumnaError) return err(e);
		throw e;
	}
}

function capture(read: () => Table): Result<Table, KolumnaError> {
	try {
		return ok(read());
	} catch (e) {
		if (e instanceof KolumnaError) return err(e);
		throw e;
	}
}

/** Parse one window of `bytes` (the whole input unless byteRange is set). */
export function parseCsvBytes(bytes: Uint8Array, options: ResolvedCsvOptions): Table {
	const window = resolveWindow(bytes, options.byteRange);
	const dialect = resolveDialect(bytes, window, options);
	return parseWindow(bytes, dialect, window, isLeadingRange(options.byteRange), options);
}

function parseWindow(
	bytes: Uint8Array,
	dialect: Dialect,
	window: ByteWindow,
	leading: boolean,
	options: ResolvedCsvOptions,
): Table {
	const tokenizer = new Tokenizer(bytes, dialect, window);
	const ctx = createValueContext(options, getConfig().initialColumnCapacity);

	const layout = resolveLayout(tokenizer, options, leading, ctx);
	return convertRows(tokenizer, layout, options, leading, ctx);
}

function convertRows(
	tokenizer: Tokenizer,
	layout: ResolvedLayout,
	options: ResolvedCsvOptions,
	leading: boolean,
	ctx: ValueContext,
): Table {
	const parser = new ValueParser(layout.columns, ctx, tokenizer);
	const selector = new RowSelector(rowSelection(options, leading));

	for (const selected of selector.select(tokenizer.rows())) {
		if (selected.role === "data") parser.acceptRow(selected.row, selected.index);
	}
	return new Table(layout.schema, parser.finish(), layout.indexColumn);
}

export function parseCsvSegmented(
	bytes: Uint8Array,
	segmentBytes: number,
	options: ResolvedCsvOptions,
): Table {
	checkSegmented(segmentBytes, options);

	const whole = { start: 0, stop: bytes.length };
	const dialect = resolveDialect(bytes, whole, options);
	const ctx = createValueContext(options, getConfig().initialColumnCapacity);
	const tokenizer = new Tokenizer(bytes, dialect, whole);
	const layout = resolveLayout(tokenizer, options, true, ctx);

	const fixed: ResolvedCsvOptions = {
		...options,
		delimiter: dialect.delimiter,
		names: layout.fileNames,
		dtypes: {
			kind: "map",
			dtypes: new Map(layout.columns.map((col): [string, DType] => [col.name, col.dtype])),
		},
	};

	// the first window holds the header and every skipped row
	const lead = Math.max(segmentBytes, prefixEnd(tokenizer, rowSelection(options, true)));
	const tables = segmentWindows(tokenizer, lead, segmentBytes).map((window) =>
		parseWindow(bytes, dialect, window, window.start === 0, {
			...fixed,
			header: window.start === 0 ? (layout.headerRow ?? "none") : "none",
		}),
	);
	return Table.concat(tables);
}

function checkSegmented(segmentBytes: number, options: ResolvedCsvOptions): void {
	if (options.byteRange !== null) {
		throw new ConfigurationError(
			["byteRange"],
			"segmented reads choose their own byte ranges",
		);
	}
	if (options.nRows !== Number.POSITIVE_INFINITY || options.skipFooter > 0) {
		throw new ConfigurationError(
			options.skipFooter > 0 ? ["skipFooter"] : ["nRows"],
			"row limits cannot be split across byte ranges",
			"read with readCsv() instead",
		);
	}
	if (!Number.isInteger(segmentBytes) || segmentBytes < 1) {
		throw new ConfigurationError(
			["segmentBytes"],
			`segment size must be a positive integer, got ${segmentBytes}`,
		);
	}
}

/**
 * Cut the input at the first row start at or after `lead`, then at the
 * first row start at or after each further multiple of `segmentBytes`.
 * Row starts come from tokenizing the whole input, so a quoted field
 * spanning a nominal boundary stays in one window.
 */
function segmentWindows(tokenizer: Tokenizer, lead: number, segmentBytes: number): ByteWindow[] {
	const size = tokenizer.bytes.length;
	const windows: ByteWindow[] = [];
	let start = 0;
	let boundary = lead;
	for (const row of tokenizer.rows()) {
		if (row.start < boundary) continue;
		if (row.start > start) windows.push({ start, stop: row.start });
		start = row.start;
		while (boundary <= row.start) boundary += segmentBytes;
	}
	if (start < size || windows.length === 0) windows.push({ start, stop: size });
	return windows;
}

/** Byte offset just past the header row and the last skipped row */
function prefixEnd(tokenizer: Tokenizer, selection: RowSelection): number {
	const { headerRow, skipRows, skipBlankLines } = selection;
	let lastSkipped = typeof skipRows === "number" ? skipRows - 1 : -1;
	if (typeof skipRows !== "number") {
		for (const index of skipRows) if (index > lastSkipped) lastSkipped = index;
	}

	let end = 0;
	let rowIndex = 0;
	let keptIndex = 0;
	for (const row of tokenizer.rows()) {
		if (row.kind === RowKind.Comment) continue;
		if (row.kind === RowKind.Blank && skipBlankLines) continue;

		const index = rowIndex++;
		const skipped =
			typeof skipRows === "number" ? index < skipRows : skipRows.has(index);
		if (!skipped && (headerRow === null || keptIndex++ > headerRow)) {
			if (index > lastSkipped) break;
			continue;
		}
		end = row.end;
	}
	return end;
}
