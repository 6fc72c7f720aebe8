import { KolumnaError } from "./base.ts";

/**
 * Error thrown when schemas disagree.
 */
export class SchemaError extends KolumnaError {
	readonly code = "SCHEMA_MISMATCH";
	readonly detail: string;

	constructor(detail: string, hint?: string) {
		super("schema error", hint);
		this.name = "SchemaError";
		this.detail = detail;
	}

	protected override _getDetail(): string {
		return this.detail;
	}
}
