/**
 * I/O module exports
 */

export * from "./csv/index.ts";
export { loadSource } from "./source.ts";
export type { CsvSource } from "./source.ts";
