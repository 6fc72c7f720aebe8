/**
 * Schema definitions for table columns.
 *
 * A schema is the ordered list of output columns with their DTypes.
 * Names are unique once resolved.
 */

import { SchemaError } from "../errors/schema-error.ts";
import { type DType, getDTypeName } from "./dtypes.ts";
import { err, ok, type Result } from "./result.ts";

/** Single column definition */
export interface ColumnDef {
	readonly name: string;
	readonly dtype: DType;
}

/** Schema describes the structure of a Table */
export interface Schema {
	readonly columns: readonly ColumnDef[];
	readonly columnMap: ReadonlyMap<string, number>; // name -> index
	readonly columnCount: number;
}

/**
 * Create a Schema from column definitions.
 *
 * Example:
 *   const schema = createSchema([
 *     { name: "id", dtype: DType.int32 },
 *     { name: "amount", dtype: DType.float64 },
 *   ]);
 */
export function createSchema(
	defs: readonly ColumnDef[],
): Result<Schema, SchemaError> {
	const columnMap = new Map<string, number>();

	for (const [i, def] of defs.entries()) {
		if (columnMap.has(def.name)) {
			return err(new SchemaError(`duplicate column name '${def.name}'`));
		}
		columnMap.set(def.name, i);
	}

	return ok({
		columns: [...defs],
		columnMap,
		columnCount: defs.length,
	});
}

/** Get column names as array */
export function getColumnNames(schema: Schema): string[] {
	return schema.columns.map((col) => col.name);
}

/** Check if schema contains a column */
export function hasColumn(schema: Schema, name: string): boolean {
	return schema.columnMap.has(name);
}

/** Same names and dtypes, in the same order */
export function schemasEqual(a: Schema, b: Schema): boolean {
	if (a.columnCount !== b.columnCount) return false;
	return a.columns.every((col, i) => {
		const other = b.columns[i];
		return (
			other !== undefined &&
			other.name === col.name &&
			other.dtype.kind === col.dtype.kind
		);
	});
}

/** Format schema for display */
export function formatSchema(schema: Schema): string {
	const lines = ["Schema {"];
	for (const col of schema.columns) {
		lines.push(`  ${col.name}: ${getDTypeName(col.dtype.kind)}`);
	}
	lines.push("}");
	return lines.join("\n");
}
