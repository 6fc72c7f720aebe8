/**
 * Byte-level CSV tokenizer.
 *
 * Splits a window of the input into rows of field spans. Rows are produced
 * lazily and every call to rows() starts again from the window start.
 */

import { MalformedQuotingError } from "../../errors/malformed-quoting.ts";
import { BYTES } from "./options.ts";

/** Field/row splitting conventions */
export interface Dialect {
	/** Delimiter byte; null splits on runs of spaces and tabs */
	readonly delimiter: number | null;
	readonly quote: number;
	readonly quoting: boolean;
	readonly comment: number | null;
}

/** Rows whose first byte lies in [start, stop) belong to the window */
export interface ByteWindow {
	readonly start: number;
	readonly stop: number;
}

export enum RowKind {
	Data = 0,
	Blank = 1,
	Comment = 2,
}

/** Byte span of one field, trimmed and with enclosing quotes removed */
export interface FieldSpan {
	readonly start: number;
	readonly end: number;
	readonly quoted: boolean;
}

export interface CsvRow {
	readonly kind: RowKind;
	/** Offset of the row's first byte */
	readonly start: number;
	/** Offset just past the row terminator */
	readonly end: number;
	readonly fields: readonly FieldSpan[];
}

const decoder = new TextDecoder();

export class Tokenizer {
	readonly bytes: Uint8Array;
	readonly dialect: Dialect;
	readonly window: ByteWindow;

	constructor(bytes: Uint8Array, dialect: Dialect, window?: ByteWindow) {
		this.bytes = bytes;
		this.dialect = dialect;
		this.window = window ?? { start: 0, stop: bytes.length };
	}

	/** Lazily produce every row starting inside the window. */
	*rows(): Generator<CsvRow> {
		const stop = Math.min(this.window.stop, this.bytes.length);
		let pos = this.window.start;

		while (pos < stop) {
			const row = this.readRow(pos);
			yield row;
			pos = row.end;
		}
	}

	/** Decoded text of a field, with doubled quotes unescaped */
	decodeField(span: FieldSpan): string {
		const text = decoder.decode(this.bytes.subarray(span.start, span.end));
		if (!span.quoted) return text;
		const quote = String.fromCharCode(this.dialect.quote);
		return text.replaceAll(quote + quote, quote);
	}

	/** Decoded text of every field of a row */
	decodeRow(row: CsvRow): string[] {
		return row.fields.map((span) => this.decodeField(span));
	}

	private readRow(rowStart: number): CsvRow {
		const { bytes, dialect } = this;
		const len = bytes.length;

		let p = rowStart;
		while (p < len && this.isPadding(bytes[p] ?? 0)) p++;
		const first = bytes[p];

		if (dialect.comment !== null && first === dialect.comment) {
			const end = lineEnd(bytes, p);
			return { kind: RowKind.Comment, start: rowStart, end, fields: [] };
		}
		if (
			first === undefined ||
			first === BYTES.LF ||
			(first === BYTES.CR && bytes[p + 1] === BYTES.LF)
		) {
			const end = lineEnd(bytes, p);
			return {
				kind: RowKind.Blank,
				start: rowStart,
				end,
				fields: [{ start: rowStart, end: rowStart, quoted: false }],
			};
		}

		return dialect.delimiter === null
			? this.readWhitespaceRow(rowStart)
			: this.readDelimitedRow(rowStart, dialect.delimiter);
	}

	private readDelimitedRow(rowStart: number, delimiter: number): CsvRow {
		const { bytes } = this;
		const { quote, quoting } = this.dialect;
		const len = bytes.length;
		const fields: FieldSpan[] = [];
		let fieldStart = rowStart;
		let inQuotes = false;
		let i = rowStart;

		for (; i < len; i++) {
			const b = bytes[i];
			if (quoting && b === quote) {
				inQuotes = !inQuotes;
			} else if (inQuotes) {
				// part of the quoted value
			} else if (b === delimiter) {
				fields.push(this.span(fieldStart, i));
				fieldStart = i + 1;
			} else if (b === BYTES.LF) {
				break;
			}
		}

		if (inQuotes) throw new MalformedQuotingError(rowStart);

		let fieldEnd = i;
		if (fieldEnd > fieldStart && bytes[fieldEnd - 1] === BYTES.CR) fieldEnd--;
		fields.push(this.span(fieldStart, fieldEnd));

		return {
			kind: RowKind.Data,
			start: rowStart,
			end: i < len ? i + 1 : len,
			fields,
		};
	}

	private readWhitespaceRow(rowStart: number): CsvRow {
		const { bytes } = this;
		const { quote, quoting } = this.dialect;
		const len = bytes.length;
		const fields: FieldSpan[] = [];
		let fieldStart = -1;
		let inQuotes = false;
		let i = rowStart;

		for (; i < len; i++) {
			const b = bytes[i] ?? 0;
			if (quoting && b === quote) {
				if (fieldStart < 0) fieldStart = i;
				inQuotes = !inQuotes;
				continue;
			}
			if (inQuotes) continue;
			if (b === BYTES.LF) break;

			const separator =
				b === BYTES.SPACE ||
				b === BYTES.TAB ||
				(b === BYTES.CR && bytes[i + 1] === BYTES.LF);
			if (separator) {
				if (fieldStart >= 0) {
					fields.push(this.span(fieldStart, i));
					fieldStart = -1;
				}
			} else if (fieldStart < 0) {
				fieldStart = i;
			}
		}

		if (inQuotes) throw new MalformedQuotingError(rowStart);
		if (fieldStart >= 0) fields.push(this.span(fieldStart, i));

		return {
			kind: RowKind.Data,
			start: rowStart,
			end: i < len ? i + 1 : len,
			fields,
		};
	}

	/** Trim spaces/tabs and strip one enclosing quote pair */
	private span(start: number, end: number): FieldSpan {
		const { bytes } = this;
		let s = start;
		let e = end;
		while (s < e && isSpaceOrTab(bytes[s] ?? 0)) s++;
		while (e > s && isSpaceOrTab(bytes[e - 1] ?? 0)) e--;

		const { quote, quoting } = this.dialect;
		if (quoting && e - s >= 2 && bytes[s] === quote && bytes[e - 1] === quote) {
			return { start: s + 1, end: e - 1, quoted: true };
		}
		return { start: s, end: e, quoted: false };
	}

	/** Leading bytes ignored when classifying a line */
	private isPadding(b: number): boolean {
		if (b === this.dialect.delimiter) return false;
		return isSpaceOrTab(b);
	}
}

function isSpaceOrTab(b: number): boolean {
	return b === BYTES.SPACE || b === BYTES.TAB;
}

/** Offset just past the LF ending the line that contains `from` */
function lineEnd(bytes: Uint8Array, from: number): number {
	const lf = bytes.indexOf(BYTES.LF, from);
	return lf === -1 ? bytes.length : lf + 1;
}
