import { KolumnaError } from "./base.ts";

/**
 * Error returned when a quoted field is still open at the end of the input.
 */
export class MalformedQuotingError extends KolumnaError {
	readonly code = "MALFORMED_QUOTING";
	/** Byte offset of the row holding the open quote */
	readonly byteOffset: number;

	constructor(byteOffset: number) {
		super("unterminated quoted field", "close the quote, or set quoting: false");
		this.name = "MalformedQuotingError";
		this.byteOffset = byteOffset;
	}

	protected override _getExpression(): string {
		return `row starting at byte ${this.byteOffset}`;
	}

	protected override _getDetail(): string {
		return "end of input reached inside a quoted field";
	}
}
