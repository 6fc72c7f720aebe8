import { KolumnaError } from "./base.ts";

/**
 * Error returned when the input path is missing or is not a regular file.
 */
export class InputNotFoundError extends KolumnaError {
	readonly code = "INPUT_NOT_FOUND";
	readonly path: string;
	readonly reason: string;

	constructor(path: string, reason: string) {
		super("input not found", "check that the path exists and points to a file");
		this.name = "InputNotFoundError";
		this.path = path;
		this.reason = reason;
	}

	protected override _getExpression(): string {
		return `readCsv('${this.path}')`;
	}

	protected override _getDetail(): string {
		return `cannot read '${this.path}': ${this.reason}`;
	}
}
