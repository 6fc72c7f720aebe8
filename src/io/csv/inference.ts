import { DType } from "../../types/dtypes.ts";
import { parseDateTime } from "../../utils/datetime.ts";
import { parseFloatText, parseInt64Text } from "./numeric.ts";
import { isNa, parseBoolean, type ValueContext } from "./value-parser.ts";

/**
 * Running type evidence for one column.
 *
 * Every non-missing sample rules candidates out; the resolved dtype is the
 * first candidate still standing in the order Int64, Float64, Bool, Date,
 * falling back to String. Columns without samples are String.
 */
export class ColumnTypeStats {
	private readonly ctx: ValueContext;
	private samples = 0;
	private canInt = true;
	private canFloat = true;
	private canBool = true;
	private canDate = true;

	constructor(ctx: ValueContext) {
		this.ctx = ctx;
	}

	/** Number of non-missing values seen */
	get sampleCount(): number {
		return this.samples;
	}

	observe(text: string): void {
		if (isNa(text, this.ctx)) return;
		this.samples++;

		const { format } = this.ctx;
		if (this.canInt && parseInt64Text(text, format) === undefined) {
			this.canInt = false;
		}
		if (this.canFloat && parseFloatText(text, format) === undefined) {
			this.canFloat = false;
		}
		// Token match only: "1" and "0" are numbers, never booleans
		if (this.canBool && parseBoolean(text, this.ctx) === undefined) {
			this.canBool = false;
		}
		if (this.canDate && Number.isNaN(parseDateTime(text, this.ctx.dayFirst))) {
			this.canDate = false;
		}
	}

	resolve(): DType {
		if (this.samples === 0) return DType.string;
		if (this.canInt) return DType.int64;
		if (this.canFloat) return DType.float64;
		if (this.canBool) return DType.boolean;
		if (this.canDate) return DType.date;
		return DType.string;
	}
}

/** Infer a dtype from sample texts */
export function inferColumnType(samples: readonly string[], ctx: ValueContext): DType {
	const stats = new ColumnTypeStats(ctx);
	for (const text of samples) stats.observe(text);
	return stats.resolve();
}
