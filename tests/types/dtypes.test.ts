import { describe, expect, test } from "vitest";
import {
	DType,
	DTypeKind,
	getDTypeName,
	isIntegerDType,
	isNumericDType,
	parseDTypeName,
	toDType,
} from "../../src/types/dtypes.ts";

describe("parseDTypeName", () => {
	test("resolves aliases", () => {
		expect(parseDTypeName("int")).toBe(DType.int32);
		expect(parseDTypeName("short")).toBe(DType.int32);
		expect(parseDTypeName("long")).toBe(DType.int64);
		expect(parseDTypeName("float")).toBe(DType.float32);
		expect(parseDTypeName("double")).toBe(DType.float64);
		expect(parseDTypeName("bool")).toBe(DType.boolean);
		expect(parseDTypeName("datetime")).toBe(DType.date);
		expect(parseDTypeName("category")).toBe(DType.category);
		expect(parseDTypeName("str")).toBe(DType.string);
	});

	test("is case-insensitive and trims", () => {
		expect(parseDTypeName(" Float64 ")).toBe(DType.float64);
	});

	test("returns undefined for unknown names", () => {
		expect(parseDTypeName("decimal128")).toBeUndefined();
	});
});

describe("toDType", () => {
	test("passes DType values through", () => {
		expect(toDType(DType.date)).toBe(DType.date);
		expect(toDType("int64")).toBe(DType.int64);
	});
});

describe("predicates", () => {
	test("integer and numeric kinds", () => {
		expect(isIntegerDType(DType.int32)).toBe(true);
		expect(isIntegerDType(DType.float64)).toBe(false);
		expect(isNumericDType(DType.float32)).toBe(true);
		expect(isNumericDType(DType.boolean)).toBe(false);
		expect(isNumericDType(DType.category)).toBe(false);
	});
});

describe("getDTypeName", () => {
	test("names every kind", () => {
		expect(getDTypeName(DTypeKind.Int32)).toBe("int32");
		expect(getDTypeName(DTypeKind.Boolean)).toBe("bool");
		expect(getDTypeName(DTypeKind.String)).toBe("str");
	});
});
