export {
	BigIntColumnBuffer,
	NumericColumnBuffer,
	StringColumnBuffer,
} from "./column-buffer.ts";
export type {
	BufferContents,
	ColumnBuffer,
	NumericStorage,
} from "./column-buffer.ts";
