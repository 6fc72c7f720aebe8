/**
 * Fixes column names, the selected columns and their dtypes for a read.
 *
 * Names come from `names`, the header row, the dtypes list length or the
 * widest sampled row, in that order. Dtypes missing from `dtypes` are
 * inferred from a sample of data rows; when every selected column has an
 * explicit dtype and the names are known, no data row is scanned.
 * A whole-input read with nothing to infer from fails; a byte-range read
 * yields a zero-row table instead.
 */

import { ConfigurationError } from "../../errors/configuration-error.ts";
import { EmptyInputError } from "../../errors/empty-input.ts";
import { DType } from "../../types/dtypes.ts";
import { createSchema, type Schema } from "../../types/schema.ts";
import { unwrap } from "../../types/result.ts";
import { ColumnTypeStats } from "./inference.ts";
import type { ResolvedCsvOptions } from "./options.ts";
import { RowSelector, type RowSelection } from "./row-selector.ts";
import type { Tokenizer } from "./tokenizer.ts";
import type { ColumnPlan, ValueContext } from "./value-parser.ts";

export interface ResolvedLayout {
	/** Names of every column in the file */
	readonly fileNames: readonly string[];
	/** Header position used, or null when no header row was consumed */
	readonly headerRow: number | null;
	/** Output columns in file order */
	readonly columns: readonly ColumnPlan[];
	readonly schema: Schema;
	readonly indexColumn: string | null;
}

/** Header row position implied by the options */
export function headerPosition(options: ResolvedCsvOptions): number | null {
	const { header } = options;
	if (header === "none") return null;
	if (header === "infer") return options.names === null ? 0 : null;
	return header;
}

/** Row selection for a read; header and skipRows only apply to the leading range */
export function rowSelection(
	options: ResolvedCsvOptions,
	leading: boolean,
): RowSelection {
	return {
		headerRow: leading ? headerPosition(options) : null,
		skipRows: leading ? options.skipRows : 0,
		skipBlankLines: options.skipBlankLines,
		nRows: options.nRows,
		skipFooter: options.skipFooter,
	};
}

/** Empty header fields become "Unnamed: <index>", then duplicates are mangled */
export function headerNames(fields: readonly string[]): string[] {
	return mangleDuplicates(
		fields.map((field, i) => (field === "" ? `Unnamed: ${i}` : field)),
	);
}

/** Rename repeats left to right as name.1, name.2, ...; first occurrence kept */
export function mangleDuplicates(names: readonly string[]): string[] {
	const used = new Set<string>();
	const nextSuffix = new Map<string, number>();
	const out: string[] = [];

	for (const name of names) {
		if (!used.has(name)) {
			used.add(name);
			out.push(name);
			continue;
		}
		let n = nextSuffix.get(name) ?? 1;
		while (used.has(`${name}.${n}`)) n++;
		const mangled = `${name}.${n}`;
		nextSuffix.set(name, n + 1);
		used.add(mangled);
		out.push(mangled);
	}
	return out;
}

/** "0", "1", ... or prefix + index */
export function generatedNames(count: number, prefix: string | null): string[] {
	return Array.from({ length: count }, (_, i) => `${prefix ?? ""}${i}`);
}

export function resolveLayout(
	tokenizer: Tokenizer,
	options: ResolvedCsvOptions,
	leading: boolean,
	ctx: ValueContext,
): ResolvedLayout {
	const selection = rowSelection(options, leading);
	const rows = new RowSelector(selection).select(tokenizer.rows());

	try {
		let next = rows.next();
		let header: string[] | null = null;
		if (!next.done && next.value.role === "header") {
			header = tokenizer.decodeRow(next.value.row);
			next = rows.next();
		}

		const { dtypes } = options;
		let fileNames: readonly string[] | null = options.names;
		if (fileNames === null && header !== null) fileNames = headerNames(header);
		if (fileNames === null && dtypes?.kind === "list") {
			fileNames = generatedNames(dtypes.dtypes.length, options.prefix);
		}

		const needsSample =
			fileNames === null ||
			selectColumns(fileNames, options).some(
				(i) => explicitDType(fileNames ?? [], i, options) === undefined,
			);

		const stats: ColumnTypeStats[] = [];
		let width = 0;
		let sampled = 0;
		if (needsSample) {
			while (!next.done && sampled < options.sampleRows) {
				const selected = next.value;
				if (selected.role === "data") {
					const { fields } = selected.row;
					width = Math.max(width, fields.length);
					for (const [k, span] of fields.entries()) {
						let column = stats[k];
						if (column === undefined) {
							column = new ColumnTypeStats(ctx);
							stats[k] = column;
						}
						column.observe(tokenizer.decodeField(span));
					}
					sampled++;
				}
				next = rows.next();
			}
		}

		const names = fileNames ?? generatedNames(width, options.prefix);
		validateDTypes(names, options);

		const selectedIndices = selectColumns(names, options);
		const missing = selectedIndices.filter(
			(i) => explicitDType(names, i, options) === undefined,
		);
		// a byte-range window may hold no row start at all; its missing dtypes fall back to str
		if (sampled === 0 && options.byteRange === null && (missing.length > 0 || dtypes === null)) {
			throw new EmptyInputError(missing.map((i) => names[i] ?? `${i}`));
		}

		const columns: ColumnPlan[] = selectedIndices.map((fileIndex) => ({
			name: names[fileIndex] ?? `${fileIndex}`,
			fileIndex,
			dtype:
				explicitDType(names, fileIndex, options) ??
				inferredDType(stats[fileIndex]),
		}));

		const schema = unwrap(
			createSchema(columns.map(({ name, dtype }) => ({ name, dtype }))),
		);

		return {
			fileNames: names,
			headerRow: header === null ? null : selection.headerRow,
			columns,
			schema,
			indexColumn: resolveIndexColumn(columns, options),
		};
	} finally {
		rows.return(undefined);
	}
}

function inferredDType(stats: ColumnTypeStats | undefined): DType {
	// no sampled row reached this column: every value is missing
	return stats === undefined ? DType.string : stats.resolve();
}

function explicitDType(
	names: readonly string[],
	fileIndex: number,
	options: ResolvedCsvOptions,
): DType | undefined {
	const { dtypes } = options;
	if (dtypes === null) return undefined;
	if (dtypes.kind === "list") return dtypes.dtypes[fileIndex];
	const name = names[fileIndex];
	return name === undefined ? undefined : dtypes.dtypes.get(name);
}

function validateDTypes(names: readonly string[], options: ResolvedCsvOptions): void {
	const { dtypes } = options;
	if (dtypes === null) return;
	if (dtypes.kind === "list") {
		if (dtypes.dtypes.length > names.length) {
			throw new ConfigurationError(
				["dtypes"],
				`dtypes lists ${dtypes.dtypes.length} entries but the input has ${names.length} columns`,
			);
		}
		return;
	}
	for (const name of dtypes.dtypes.keys()) {
		if (!names.includes(name)) {
			throw new ConfigurationError(
				["dtypes"],
				`dtype given for unknown column '${name}'`,
				`columns are: ${names.map((n) => `'${n}'`).join(", ")}`,
			);
		}
	}
}

/** File positions of the output columns, ascending */
function selectColumns(
	names: readonly string[],
	options: ResolvedCsvOptions,
): number[] {
	const { useCols } = options;
	if (useCols === null) return names.map((_, i) => i);

	const indices = new Set<number>();
	for (const col of useCols) {
		const index = typeof col === "number" ? col : names.indexOf(col);
		if (!Number.isInteger(index) || index < 0 || index >= names.length) {
			throw new ConfigurationError(
				["useCols"],
				`column ${typeof col === "number" ? col : `'${col}'`} is not in the input`,
			);
		}
		indices.add(index);
	}
	return [...indices].sort((a, b) => a - b);
}

function resolveIndexColumn(
	columns: readonly ColumnPlan[],
	options: ResolvedCsvOptions,
): string | null {
	const { indexCol } = options;
	if (indexCol === null) return null;
	const column =
		typeof indexCol === "number"
			? columns[indexCol]
			: columns.find((col) => col.name === indexCol);
	if (column === undefined) {
		throw new ConfigurationError(
			["indexCol"],
			`index column ${typeof indexCol === "number" ? indexCol : `'${indexCol}'`} is not among the returned columns`,
		);
	}
	return column.name;
}
