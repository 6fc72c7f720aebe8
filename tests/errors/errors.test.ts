import { describe, expect, test } from "vitest";
import {
	ColumnNotFoundError,
	ConfigurationError,
	ConversionError,
	EmptyInputError,
	InputNotFoundError,
	KolumnaError,
	MalformedQuotingError,
	SchemaError,
} from "../../src/errors/index.ts";

describe("Error Messages", () => {
	test("all errors share the base class", () => {
		expect(new ConversionError(0, "a", 0, "int32", "x")).toBeInstanceOf(KolumnaError);
		expect(new MalformedQuotingError(0)).toBeInstanceOf(Error);
	});

	describe("ConversionError", () => {
		test("carries row, column and text", () => {
			const error = new ConversionError(4, "price", 2, "float64", "12,5");
			expect(error.code).toBe("CONVERSION_FAILURE");
			expect(error.rowIndex).toBe(4);
			expect(error.column).toBe("price");
			expect(error.columnIndex).toBe(2);
			expect(error.value).toBe("12,5");
		});

		test("format() shows location and value", () => {
			const formatted = new ConversionError(4, "price", 2, "float64", "12,5").format();
			expect(formatted).toContain("error: conversion failed");
			expect(formatted).toContain("--> row 4, column 'price' (#2)");
			expect(formatted).toContain("└── cannot parse '12,5' as float64");
			expect(formatted).toContain("help: pass dtypes");
		});
	});

	test("InputNotFoundError names the path", () => {
		const error = new InputNotFoundError("/data/missing.csv", "no such file");
		expect(error.code).toBe("INPUT_NOT_FOUND");
		expect(error.format()).toContain("cannot read '/data/missing.csv': no such file");
	});

	test("ConfigurationError lists the options involved", () => {
		const error = new ConfigurationError(["skipFooter", "nRows"], "pick one");
		expect(error.code).toBe("CONFIGURATION_CONFLICT");
		expect(error.format()).toContain("--> readCsv(source, { skipFooter: ..., nRows: ... })");
		expect(error.format()).toContain("└── pick one");
	});

	test("EmptyInputError names columns without dtypes", () => {
		const error = new EmptyInputError(["a", "b"]);
		expect(error.code).toBe("EMPTY_INPUT_NO_DTYPE");
		expect(error.format()).toContain("no data rows to infer 'a', 'b'");
		expect(new EmptyInputError([]).format()).toContain("input has no data rows and no columns");
	});

	test("MalformedQuotingError reports the row offset", () => {
		const error = new MalformedQuotingError(17);
		expect(error.byteOffset).toBe(17);
		expect(error.format()).toContain("row starting at byte 17");
	});

	test("ColumnNotFoundError suggests available columns", () => {
		const formatted = new ColumnNotFoundError("salary", ["name", "age"]).format();
		expect(formatted).toContain("--> table.column('salary')");
		expect(formatted).toContain("help: available columns are: 'name', 'age'");
	});

	test("SchemaError shows its detail", () => {
		expect(new SchemaError("mismatch here").format()).toContain("└── mismatch here");
	});
});
