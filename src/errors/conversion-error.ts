import { KolumnaError } from "./base.ts";

/**
 * Error returned when a field cannot be parsed as its column's dtype.
 */
export class ConversionError extends KolumnaError {
	readonly code = "CONVERSION_FAILURE";
	/** Data row index within the read (0-based, after header and skipped rows) */
	readonly rowIndex: number;
	readonly column: string;
	readonly columnIndex: number;
	readonly dtype: string;
	/** Field text as read */
	readonly value: string;

	constructor(
		rowIndex: number,
		column: string,
		columnIndex: number,
		dtype: string,
		value: string,
	) {
		super(
			"conversion failed",
			"pass dtypes to override the inferred type, or naValues to mark the token as missing",
		);
		this.name = "ConversionError";
		this.rowIndex = rowIndex;
		this.column = column;
		this.columnIndex = columnIndex;
		this.dtype = dtype;
		this.value = value;
	}

	protected override _getExpression(): string {
		return `row ${this.rowIndex}, column '${this.column}' (#${this.columnIndex})`;
	}

	protected override _getDetail(): string {
		return `cannot parse '${this.value}' as ${this.dtype}`;
	}
}
