/**
 * Kolumna - typed CSV reading with dtype inference and byte-range reads.
 */

export { Column } from "./core/column.ts";
export type { CellValue, ColumnData } from "./core/column.ts";
export { Table } from "./core/table.ts";
export type { TableRecord } from "./core/table.ts";
export * from "./buffer/index.ts";
export * from "./core/config/index.ts";
export * from "./errors/index.ts";
export * from "./io/index.ts";
export * from "./types/index.ts";
export { hashCategory, murmurHash3, CATEGORY_HASH_SEED } from "./utils/hash.ts";
export { parseDateTime } from "./utils/datetime.ts";
