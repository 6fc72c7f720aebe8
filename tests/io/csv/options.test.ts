import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../../../src/errors/index.ts";
import { BYTES, resolveOptions } from "../../../src/io/csv/options.ts";
import { DType } from "../../../src/types/dtypes.ts";
import { unwrap, unwrapErr } from "../../../src/types/result.ts";

describe("resolveOptions", () => {
	test("applies defaults", () => {
		const opts = unwrap(resolveOptions());
		expect(opts.delimiter).toBe(BYTES.COMMA);
		expect(opts.quote).toBe(BYTES.QUOTE);
		expect(opts.header).toBe("infer");
		expect(opts.skipBlankLines).toBe(true);
		expect(opts.nRows).toBe(Number.POSITIVE_INFINITY);
		expect(opts.naValues.has("NA")).toBe(true);
		expect(opts.naValues.has("")).toBe(true);
		expect(opts.trueValues).toEqual(new Set(["true"]));
		expect(opts.falseValues).toEqual(new Set(["false"]));
		expect(opts.indexCol).toBeNull();
	});

	test("delimiter and delimWhitespace conflict", () => {
		const error = unwrapErr(resolveOptions({ delimiter: ";", delimWhitespace: true }));
		expect(error).toBeInstanceOf(ConfigurationError);
		expect(error.options).toEqual(["delimiter", "delimWhitespace"]);
	});

	test("sep is an alias of delimiter", () => {
		expect(unwrap(resolveOptions({ sep: "|" })).delimiter).toBe(BYTES.PIPE);
		expect(unwrapErr(resolveOptions({ sep: "|", delimiter: "," })).options).toEqual([
			"delimiter",
			"sep",
		]);
		expect(unwrapErr(resolveOptions({ sep: "\t", delimWhitespace: true })).options).toEqual([
			"sep",
			"delimWhitespace",
		]);
	});

	test("delimWhitespace resolves to null, sniffing to undefined", () => {
		expect(unwrap(resolveOptions({ delimWhitespace: true })).delimiter).toBeNull();
		expect(unwrap(resolveOptions({ sniffDelimiter: true })).delimiter).toBeUndefined();
		expect(resolveOptions({ sniffDelimiter: true, delimiter: ";" }).ok).toBe(false);
	});

	test("skipFooter conflicts with nRows and byteRange", () => {
		expect(unwrapErr(resolveOptions({ skipFooter: 1, nRows: 3 })).options).toEqual([
			"skipFooter",
			"nRows",
		]);
		expect(
			unwrapErr(resolveOptions({ skipFooter: 1, byteRange: { offset: 0, length: 10 } }))
				.options,
		).toEqual(["skipFooter", "byteRange"]);
		expect(resolveOptions({ skipFooter: 0, nRows: 3 }).ok).toBe(true);
	});

	test("single-character options", () => {
		expect(resolveOptions({ delimiter: "::" }).ok).toBe(false);
		expect(resolveOptions({ quoteChar: "" }).ok).toBe(false);
		expect(resolveOptions({ commentChar: "\n" }).ok).toBe(false);
		expect(unwrap(resolveOptions({ commentChar: "#" })).comment).toBe(BYTES.HASH);
	});

	test("separators must differ", () => {
		expect(resolveOptions({ decimal: ",", thousands: "," }).ok).toBe(false);
		expect(resolveOptions({ decimal: "," }).ok).toBe(false);
		expect(resolveOptions({ decimal: ",", delimiter: ";" }).ok).toBe(true);
		expect(unwrapErr(resolveOptions({ thousands: "," })).options).toEqual([
			"thousands",
			"delimiter",
		]);
		expect(resolveOptions({ thousands: ",", delimiter: ";" }).ok).toBe(true);
		expect(unwrapErr(resolveOptions({ quoteChar: "|", sep: "|" })).options).toEqual([
			"quoteChar",
			"delimiter",
		]);
	});

	test("counts must be non-negative integers", () => {
		expect(resolveOptions({ nRows: -1 }).ok).toBe(false);
		expect(resolveOptions({ skipRows: 1.5 }).ok).toBe(false);
		expect(resolveOptions({ header: -2 }).ok).toBe(false);
		expect(resolveOptions({ byteRange: { offset: -1, length: 3 } }).ok).toBe(false);
	});

	test("skipRows list becomes a set", () => {
		expect(unwrap(resolveOptions({ skipRows: [0, 2] })).skipRows).toEqual(new Set([0, 2]));
	});

	test("duplicate names are rejected", () => {
		expect(resolveOptions({ names: ["a", "a"] }).ok).toBe(false);
	});

	test("dtypes accept aliases by position or name", () => {
		const list = unwrap(resolveOptions({ dtypes: ["int", DType.date] })).dtypes;
		expect(list).toEqual({ kind: "list", dtypes: [DType.int32, DType.date] });

		const map = unwrap(resolveOptions({ dtypes: { a: "double" } })).dtypes;
		expect(map).toEqual({ kind: "map", dtypes: new Map([["a", DType.float64]]) });

		expect(unwrapErr(resolveOptions({ dtypes: ["decimal"] })).options).toEqual(["dtypes"]);
	});

	test("NA handling switches", () => {
		const noDefaults = unwrap(resolveOptions({ keepDefaultNa: false, naValues: ["-"] }));
		expect([...noDefaults.naValues]).toEqual(["-"]);

		const noFilter = unwrap(resolveOptions({ naFilter: false, naValues: ["-"] }));
		expect(noFilter.naValues.size).toBe(0);
	});

	test("boolean tokens are lower-cased", () => {
		const opts = unwrap(resolveOptions({ trueValues: ["Yes"], falseValues: ["NO"] }));
		expect(opts.trueValues).toEqual(new Set(["true", "yes"]));
		expect(opts.falseValues).toEqual(new Set(["false", "no"]));
	});

	test("indexCol false is a no-op", () => {
		expect(unwrap(resolveOptions({ indexCol: false })).indexCol).toBeNull();
	});
});
