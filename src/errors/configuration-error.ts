import { KolumnaError } from "./base.ts";

/**
 * Error returned when read options are invalid or conflict with each other.
 */
export class ConfigurationError extends KolumnaError {
	readonly code = "CONFIGURATION_CONFLICT";
	/** Option names involved in the conflict */
	readonly options: readonly string[];
	readonly detail: string;

	constructor(options: readonly string[], detail: string, hint?: string) {
		super("invalid read options", hint);
		this.name = "ConfigurationError";
		this.options = options;
		this.detail = detail;
	}

	protected override _getExpression(): string {
		return `readCsv(source, { ${this.options.map((o) => `${o}: ...`).join(", ")} })`;
	}

	protected override _getDetail(): string {
		return this.detail;
	}
}
