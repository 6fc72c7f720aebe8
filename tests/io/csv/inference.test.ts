import { describe, expect, test } from "vitest";
import { ColumnTypeStats, inferColumnType } from "../../../src/io/csv/inference.ts";
import { type CsvReadOptions, resolveOptions } from "../../../src/io/csv/options.ts";
import { createValueContext, type ValueContext } from "../../../src/io/csv/value-parser.ts";
import { DType } from "../../../src/types/dtypes.ts";
import { unwrap } from "../../../src/types/result.ts";

function context(options: CsvReadOptions = {}): ValueContext {
	return createValueContext(unwrap(resolveOptions(options)), 8);
}

describe("inferColumnType", () => {
	test("integers become int64", () => {
		expect(inferColumnType(["1", "-2", "+3"], context())).toEqual(DType.int64);
	});

	test("any fraction makes the column float64", () => {
		expect(inferColumnType(["1", "2.5"], context())).toEqual(DType.float64);
		expect(inferColumnType(["1e3"], context())).toEqual(DType.float64);
		expect(inferColumnType(["1", "inf"], context())).toEqual(DType.float64);
	});

	test("boolean tokens become bool", () => {
		expect(inferColumnType(["True", "false", "TRUE"], context())).toEqual(DType.boolean);
	});

	test("numbers that look like flags stay numeric", () => {
		expect(inferColumnType(["3977", "4329"], context())).toEqual(DType.int64);
		expect(inferColumnType(["1", "0"], context())).toEqual(DType.int64);
	});

	test("custom boolean tokens", () => {
		const ctx = context({ trueValues: ["yes"], falseValues: ["no"] });
		expect(inferColumnType(["Yes", "no"], ctx)).toEqual(DType.boolean);
	});

	test("dates become date", () => {
		expect(inferColumnType(["2024-01-01", "2024-01-25 10:30"], context())).toEqual(DType.date);
	});

	test("mixed values fall back to str", () => {
		expect(inferColumnType(["1", "x"], context())).toEqual(DType.string);
		expect(inferColumnType(["true", "2024-01-01"], context())).toEqual(DType.string);
	});

	test("missing values are ignored", () => {
		expect(inferColumnType(["", "NA", "4"], context())).toEqual(DType.int64);
	});

	test("an all-missing column is str", () => {
		const stats = new ColumnTypeStats(context());
		stats.observe("");
		stats.observe("NaN");
		expect(stats.sampleCount).toBe(0);
		expect(stats.resolve()).toEqual(DType.string);
	});

	test("NA tokens are values when filtering is off", () => {
		expect(inferColumnType(["1", "NA"], context({ naFilter: false }))).toEqual(DType.string);
	});

	test("number format affects inference", () => {
		expect(inferColumnType(["1,5", "2"], context({ decimal: ",", delimiter: ";" }))).toEqual(
			DType.float64,
		);
	});
});
