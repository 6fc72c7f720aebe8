import { describe, expect, test } from "vitest";
import { SchemaError } from "../../src/errors/index.ts";
import { DType } from "../../src/types/dtypes.ts";
import {
	createSchema,
	formatSchema,
	getColumnNames,
	hasColumn,
	schemasEqual,
} from "../../src/types/schema.ts";
import { unwrap } from "../../src/types/result.ts";

describe("createSchema", () => {
	test("builds column map in order", () => {
		const result = createSchema([
			{ name: "id", dtype: DType.int32 },
			{ name: "price", dtype: DType.float64 },
		]);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.data.columnCount).toBe(2);
			expect(result.data.columnMap.get("price")).toBe(1);
			expect(getColumnNames(result.data)).toEqual(["id", "price"]);
			expect(hasColumn(result.data, "id")).toBe(true);
			expect(hasColumn(result.data, "qty")).toBe(false);
		}
	});

	test("rejects duplicate names", () => {
		const result = createSchema([
			{ name: "a", dtype: DType.int32 },
			{ name: "a", dtype: DType.string },
		]);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(SchemaError);
			expect(result.error.detail).toBe("duplicate column name 'a'");
		}
	});
});

describe("schemasEqual", () => {
	test("compares names and dtypes", () => {
		const a = unwrap(createSchema([{ name: "x", dtype: DType.int64 }]));
		const b = unwrap(createSchema([{ name: "x", dtype: DType.int64 }]));
		const c = unwrap(createSchema([{ name: "x", dtype: DType.float64 }]));
		expect(schemasEqual(a, b)).toBe(true);
		expect(schemasEqual(a, c)).toBe(false);
	});
});

describe("formatSchema", () => {
	test("lists columns with dtype names", () => {
		const schema = unwrap(
			createSchema([
				{ name: "when", dtype: DType.date },
				{ name: "tag", dtype: DType.category },
			]),
		);
		expect(formatSchema(schema)).toBe("Schema {\n  when: date\n  tag: category\n}");
	});
});
