/**
 * Classifies the tokenizer's rows into header and data rows.
 *
 * Order of filtering: comment lines, blank lines (when skipped), skipRows,
 * rows before the header, the header itself, then nRows / skipFooter on
 * the data rows.
 */

import { type CsvRow, RowKind } from "./tokenizer.ts";

export interface RowSelection {
	/** Header position among rows left after skipRows; null when there is none */
	readonly headerRow: number | null;
	readonly skipRows: number | ReadonlySet<number>;
	readonly skipBlankLines: boolean;
	readonly nRows: number;
	readonly skipFooter: number;
}

export type SelectedRow =
	| { readonly role: "header"; readonly row: CsvRow }
	| { readonly role: "data"; readonly row: CsvRow; readonly index: number };

export class RowSelector {
	readonly selection: RowSelection;

	constructor(selection: RowSelection) {
		this.selection = selection;
	}

	/**
	 * Lazily select rows. Stops pulling from `rows` as soon as nRows data
	 * rows have been produced.
	 */
	*select(rows: Iterable<CsvRow>): Generator<SelectedRow> {
		const { headerRow, skipBlankLines, nRows, skipFooter } = this.selection;
		const footer: CsvRow[] = [];
		let rowIndex = 0;
		let keptIndex = 0;
		let dataIndex = 0;

		if (nRows === 0 && headerRow === null) return;

		for (const row of rows) {
			if (row.kind === RowKind.Comment) continue;
			if (row.kind === RowKind.Blank && skipBlankLines) continue;

			if (this.isSkipped(rowIndex++)) continue;

			const kept = keptIndex++;
			if (headerRow !== null && kept <= headerRow) {
				if (kept === headerRow) yield { role: "header", row };
				continue;
			}

			if (dataIndex >= nRows) return;

			if (skipFooter > 0) {
				footer.push(row);
				const ready = footer.length > skipFooter ? footer.shift() : undefined;
				if (ready !== undefined) {
					yield { role: "data", row: ready, index: dataIndex++ };
				}
				continue;
			}

			yield { role: "data", row, index: dataIndex++ };
			if (dataIndex >= nRows) return;
		}
	}

	private isSkipped(index: number): boolean {
		const { skipRows } = this.selection;
		return typeof skipRows === "number" ? index < skipRows : skipRows.has(index);
	}
}
