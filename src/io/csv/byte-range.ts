/**
 * Byte-range windows for partitioned reads.
 *
 * A row belongs to the window holding its first byte. Recovery is a
 * two-phase scan: find the first row start at or after `offset`, then
 * accept rows until one starts at or after `offset + length`.
 */

import { BYTES, type ByteRange } from "./options.ts";
import type { ByteWindow } from "./tokenizer.ts";

/** Phase 1: first row start >= offset */
export function findRowStart(bytes: Uint8Array, offset: number): number {
	if (offset <= 0) return 0;
	if (offset >= bytes.length) return bytes.length;
	const lf = bytes.indexOf(BYTES.LF, offset - 1);
	return lf === -1 ? bytes.length : lf + 1;
}

/**
 * Resolve a requested range to the window the tokenizer reads.
 * Oversized ranges are clamped to the input.
 */
export function resolveWindow(
	bytes: Uint8Array,
	range: ByteRange | null,
): ByteWindow {
	if (range === null) return { start: 0, stop: bytes.length };

	const size = bytes.length;
	const offset = Math.min(range.offset, size);
	// Phase 2 bound: rows starting before this are ours
	const stop = Math.min(offset + range.length, size);
	const start = Math.min(findRowStart(bytes, offset), stop);
	return { start, stop };
}

/** Whether a range is the one that sees the header and skipped rows */
export function isLeadingRange(range: ByteRange | null): boolean {
	return range === null || range.offset === 0;
}

/**
 * Split `size` bytes into consecutive ranges of `segmentBytes`
 * (the last one possibly shorter).
 */
export function splitByteRanges(size: number, segmentBytes: number): ByteRange[] {
	if (!Number.isInteger(segmentBytes) || segmentBytes < 1) {
		throw new RangeError(`segment size must be a positive integer, got ${segmentBytes}`);
	}
	const ranges: ByteRange[] = [];
	for (let offset = 0; offset < size; offset += segmentBytes) {
		ranges.push({ offset, length: Math.min(segmentBytes, size - offset) });
	}
	if (ranges.length === 0) ranges.push({ offset: 0, length: 0 });
	return ranges;
}
