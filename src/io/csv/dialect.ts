import { getConfig } from "../../core/config/config.ts";
import { BYTES, type ResolvedCsvOptions } from "./options.ts";
import { type ByteWindow, type Dialect, RowKind, Tokenizer } from "./tokenizer.ts";

/** Delimiters tried by sniffing, in order of preference; null is whitespace */
export const SNIFF_CANDIDATES: readonly (number | null)[] = [
	BYTES.COMMA,
	BYTES.SEMICOLON,
	BYTES.TAB,
	BYTES.PIPE,
	null,
];

/** Build the dialect for a read, sniffing the delimiter when asked to. */
export function resolveDialect(
	bytes: Uint8Array,
	window: ByteWindow,
	options: ResolvedCsvOptions,
): Dialect {
	const base = {
		quote: options.quote,
		quoting: options.quoting,
		comment: options.comment,
	};
	if (options.delimiter !== undefined) {
		return { ...base, delimiter: options.delimiter };
	}
	const delimiter = sniffDelimiter(
		bytes,
		window,
		{ ...base, delimiter: BYTES.COMMA },
		getConfig().sniffSampleRows,
	);
	return { ...base, delimiter };
}

/**
 * Pick the first candidate that splits every sampled data line into the
 * same number (> 1) of fields. Falls back to comma.
 */
export function sniffDelimiter(
	bytes: Uint8Array,
	window: ByteWindow,
	dialect: Dialect,
	sampleRows: number,
): number | null {
	for (const candidate of SNIFF_CANDIDATES) {
		const tokenizer = new Tokenizer(bytes, { ...dialect, delimiter: candidate }, window);
		const counts = sampleFieldCounts(tokenizer, sampleRows);
		const [first] = counts;
		if (first !== undefined && first > 1 && counts.every((c) => c === first)) {
			return candidate;
		}
	}
	return BYTES.COMMA;
}

function sampleFieldCounts(tokenizer: Tokenizer, limit: number): number[] {
	const counts: number[] = [];
	for (const row of tokenizer.rows()) {
		if (row.kind !== RowKind.Data) continue;
		counts.push(row.fields.length);
		if (counts.length >= limit) break;
	}
	return counts;
}
