import { ColumnNotFoundError } from "../errors/column-not-found.ts";
import { SchemaError } from "../errors/schema-error.ts";
import { getDTypeName } from "../types/dtypes.ts";
import {
	formatSchema,
	getColumnNames,
	type Schema,
	schemasEqual,
} from "../types/schema.ts";
import { type CellValue, Column } from "./column.ts";

/** One row as a plain object keyed by column name */
export type TableRecord = Record<string, CellValue | null>;

/**
 * Table is a schema plus one equal-length column per schema entry.
 */
export class Table {
	readonly schema: Schema;
	readonly columns: readonly Column[];
	/** Column marked as the row label, if any */
	readonly indexColumn: string | null;
	readonly rowCount: number;

	constructor(
		schema: Schema,
		columns: readonly Column[],
		indexColumn: string | null = null,
	) {
		if (columns.length !== schema.columnCount) {
			throw new SchemaError(
				`schema has ${schema.columnCount} columns but ${columns.length} were given`,
			);
		}
		const rowCount = columns[0]?.length ?? 0;
		for (const [i, column] of columns.entries()) {
			const def = schema.columns[i];
			if (def === undefined || def.name !== column.name) {
				throw new SchemaError(`column ${i} does not match the schema`);
			}
			if (def.dtype.kind !== column.data.kind) {
				throw new SchemaError(
					`column '${def.name}' holds ${getDTypeName(column.data.kind)} but the schema says ${getDTypeName(def.dtype.kind)}`,
				);
			}
			if (column.length !== rowCount) {
				throw new SchemaError(
					`column '${column.name}' has ${column.length} rows, expected ${rowCount}`,
				);
			}
		}
		if (indexColumn !== null && !schema.columnMap.has(indexColumn)) {
			throw new ColumnNotFoundError(indexColumn, getColumnNames(schema));
		}

		this.schema = schema;
		this.columns = columns;
		this.indexColumn = indexColumn;
		this.rowCount = rowCount;
	}

	get columnNames(): string[] {
		return getColumnNames(this.schema);
	}

	/** Column names without the index column */
	get dataColumnNames(): string[] {
		return this.columnNames.filter((name) => name !== this.indexColumn);
	}

	/** [rows, columns] */
	get shape(): [number, number] {
		return [this.rowCount, this.schema.columnCount];
	}

	column(name: string): Column {
		const index = this.schema.columnMap.get(name);
		const column = index === undefined ? undefined : this.columns[index];
		if (column === undefined) {
			throw new ColumnNotFoundError(name, this.columnNames);
		}
		return column;
	}

	columnAt(index: number): Column {
		const column = this.columns[index];
		if (column === undefined) {
			throw new RangeError(
				`column index ${index} out of bounds for ${this.columns.length} columns`,
			);
		}
		return column;
	}

	toRecords(): TableRecord[] {
		const records: TableRecord[] = [];
		for (let row = 0; row < this.rowCount; row++) {
			const record: TableRecord = {};
			for (const column of this.columns) {
				record[column.name] = column.get(row);
			}
			records.push(record);
		}
		return records;
	}

	toString(): string {
		return `Table(${this.rowCount} rows)\n${formatSchema(this.schema)}`;
	}

	/**
	 * Concatenate tables row-wise. Every table must share the same schema.
	 */
	static concat(tables: readonly Table[]): Table {
		const first = tables[0];
		if (first === undefined) {
			throw new SchemaError("no tables to concatenate");
		}
		// zero-row parts come from windows that hold no row start
		const parts = tables.filter((table) => table.rowCount > 0);
		const head = parts[0];
		if (head === undefined) return first;
		for (const table of parts) {
			if (!schemasEqual(head.schema, table.schema)) {
				throw new SchemaError(
					"cannot concatenate tables with different schemas",
					"read every range with the same names and dtypes",
				);
			}
		}
		if (parts.length === 1) return head;

		const columns = head.schema.columns.map((def, i) =>
			Column.concat(
				def.name,
				parts.map((table) => table.columnAt(i)),
			),
		);
		return new Table(head.schema, columns, head.indexColumn);
	}
}
