import { KolumnaError } from "./base.ts";

/**
 * Error thrown when accessing a non-existent column.
 */
export class ColumnNotFoundError extends KolumnaError {
	readonly code = "COLUMN_NOT_FOUND";
	readonly column: string;
	readonly available: readonly string[];

	constructor(column: string, available: readonly string[]) {
		const hint =
			available.length > 0
				? `available columns are: ${available.map((c) => `'${c}'`).join(", ")}`
				: "table has no columns";

		super("column not found", hint);
		this.name = "ColumnNotFoundError";
		this.column = column;
		this.available = available;
	}

	protected override _getExpression(): string {
		return `table.column('${this.column}')`;
	}

	protected override _getDetail(): string {
		return `column '${this.column}' does not exist in table`;
	}
}
