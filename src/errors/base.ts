/** Source position of the code that raised an error */
export interface ErrorLocation {
	readonly file: string;
	readonly line: number;
	readonly column: number;
}

/**
 * Base error class for all Kolumna errors.
 * Provides formatted error output with location tracking and hints.
 */
export class KolumnaError extends Error {
	readonly hint?: string;
	readonly location?: ErrorLocation;

	constructor(message: string, hint?: string) {
		super(message);
		this.name = "KolumnaError";
		this.hint = hint;
		this.location = this._extractLocation();
	}

	private _extractLocation(): ErrorLocation | undefined {
		const stack = this.stack;
		if (!stack) return undefined;

		for (const line of stack.split("\n")) {
			if (line.includes("node_modules") || line.includes("Error")) continue;

			const match =
				line.match(/at .+? \((.+?):(\d+):(\d+)\)/) ??
				line.match(/at (.+?):(\d+):(\d+)/);
			if (match === null) continue;

			const [, file, row, column] = match;
			if (file === undefined || row === undefined || column === undefined) {
				continue;
			}
			return {
				file,
				line: Number.parseInt(row, 10),
				column: Number.parseInt(column, 10),
			};
		}
		return undefined;
	}

	format(): string {
		const lines: string[] = [];

		const loc = this.location
			? ` at ${this.location.file.split("/").slice(-1)[0]}:${this.location.line}:${this.location.column}`
			: "";

		lines.push(`error: ${this.message}${loc}`);
		lines.push(`  --> ${this._getExpression()}`);
		lines.push("   |");
		lines.push(`   └── ${this._getDetail()}`);

		if (this.hint) {
			lines.push("");
			lines.push(`help: ${this.hint}`);
		}

		return lines.join("\n");
	}

	protected _getExpression(): string {
		return "(expression)";
	}

	protected _getDetail(): string {
		return this.message;
	}
}
