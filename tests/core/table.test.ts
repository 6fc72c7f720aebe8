import { describe, expect, test } from "vitest";
import { Column } from "../../src/core/column.ts";
import { Table } from "../../src/core/table.ts";
import { ColumnNotFoundError, SchemaError } from "../../src/errors/index.ts";
import { DType, DTypeKind } from "../../src/types/dtypes.ts";
import { unwrap } from "../../src/types/result.ts";
import { createSchema } from "../../src/types/schema.ts";
import { createNullBitmap } from "../../src/utils/nulls.ts";

function makeTable(ids: number[], names: string[], indexColumn: string | null = null): Table {
	const schema = unwrap(
		createSchema([
			{ name: "id", dtype: DType.int32 },
			{ name: "name", dtype: DType.string },
		]),
	);
	return new Table(
		schema,
		[
			new Column("id", { kind: DTypeKind.Int32, values: Int32Array.from(ids) }, createNullBitmap(ids.length)),
			new Column("name", { kind: DTypeKind.String, values: names }, createNullBitmap(names.length)),
		],
		indexColumn,
	);
}

describe("Table", () => {
	test("shape, names and records", () => {
		const table = makeTable([1, 2], ["a", "b"]);
		expect(table.shape).toEqual([2, 2]);
		expect(table.columnNames).toEqual(["id", "name"]);
		expect(table.toRecords()).toEqual([
			{ id: 1, name: "a" },
			{ id: 2, name: "b" },
		]);
	});

	test("index column is left out of data columns", () => {
		const table = makeTable([1], ["a"], "id");
		expect(table.indexColumn).toBe("id");
		expect(table.dataColumnNames).toEqual(["name"]);
		expect(table.columnNames).toEqual(["id", "name"]);
	});

	test("column() throws ColumnNotFoundError", () => {
		const table = makeTable([1], ["a"]);
		expect(table.column("name").get(0)).toBe("a");
		expect(() => table.column("age")).toThrow(ColumnNotFoundError);
	});

	test("rejects columns of unequal length", () => {
		expect(() => makeTable([1, 2], ["a"])).toThrow(SchemaError);
	});

	test("concat appends rows", () => {
		const joined = Table.concat([makeTable([1], ["a"]), makeTable([2, 3], ["b", "c"])]);
		expect(joined.rowCount).toBe(3);
		expect(joined.column("id").toArray()).toEqual([1, 2, 3]);
		expect(joined.column("name").toArray()).toEqual(["a", "b", "c"]);
	});

	test("concat refuses different schemas", () => {
		const other = new Table(
			unwrap(createSchema([{ name: "id", dtype: DType.int32 }])),
			[new Column("id", { kind: DTypeKind.Int32, values: Int32Array.from([2]) }, createNullBitmap(1))],
		);
		expect(() => Table.concat([makeTable([1], ["a"]), other])).toThrow(SchemaError);
	});

	test("concat skips zero-row tables whatever their schema", () => {
		const empty = new Table(
			unwrap(createSchema([{ name: "id", dtype: DType.string }])),
			[new Column("id", { kind: DTypeKind.String, values: [] }, createNullBitmap(0))],
		);
		const joined = Table.concat([empty, makeTable([1], ["a"]), empty, makeTable([2], ["b"])]);
		expect(joined.schema.columns.map((c) => c.dtype.kind)).toEqual([DTypeKind.Int32, DTypeKind.String]);
		expect(joined.column("id").toArray()).toEqual([1, 2]);

		expect(Table.concat([empty, empty])).toBe(empty);
	});
});
