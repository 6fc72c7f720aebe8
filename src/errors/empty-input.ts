import { KolumnaError } from "./base.ts";

/**
 * Error returned when there are no data rows to infer column types from.
 */
export class EmptyInputError extends KolumnaError {
	readonly code = "EMPTY_INPUT_NO_DTYPE";
	/** Columns left without a dtype */
	readonly columns: readonly string[];

	constructor(columns: readonly string[]) {
		super(
			"cannot infer column types from empty input",
			"pass explicit dtypes for every column",
		);
		this.name = "EmptyInputError";
		this.columns = columns;
	}

	protected override _getExpression(): string {
		return "readCsv(source, { dtypes: ... })";
	}

	protected override _getDetail(): string {
		if (this.columns.length === 0) return "input has no data rows and no columns";
		return `no data rows to infer ${this.columns.map((c) => `'${c}'`).join(", ")}`;
	}
}
