/**
 * Null bitmap for tracking null values efficiently
 * Uses 1 bit per value (8 values per byte); a set bit marks a null.
 */
export interface NullBitmap {
	/** Number of values tracked */
	length: number;
	/** Bitmap data (1 bit per value) */
	data: Uint8Array;
}

/**
 * Creates a new null bitmap with every value present
 * @param length - Number of values to track
 */
export function createNullBitmap(length: number): NullBitmap {
	if (length < 0) {
		throw new RangeError("Bitmap length must not be negative");
	}
	return {
		length,
		data: new Uint8Array(Math.ceil(length / 8)),
	};
}

/** Checks if a value is null. Out-of-range indices are not null. */
export function isNull(bitmap: NullBitmap, index: number): boolean {
	if (index < 0 || index >= bitmap.length) {
		return false;
	}
	const byte = bitmap.data[index >>> 3] ?? 0;
	return (byte & (1 << (index & 7))) !== 0;
}

/** Marks a value as null */
export function setNull(bitmap: NullBitmap, index: number): void {
	if (index < 0 || index >= bitmap.length) {
		return;
	}
	const byteIndex = index >>> 3;
	bitmap.data[byteIndex] = (bitmap.data[byteIndex] ?? 0) | (1 << (index & 7));
}

/** Counts the number of null values */
export function getNullCount(bitmap: NullBitmap): number {
	let count = 0;
	for (let i = 0; i < bitmap.data.length; i++) {
		let byte = bitmap.data[i] ?? 0;
		// Brian Kernighan's algorithm for counting set bits
		while (byte) {
			byte &= byte - 1;
			count++;
		}
	}
	return count;
}

/**
 * Resizes a null bitmap, preserving existing null flags
 * @param bitmap - The bitmap to resize
 * @param newLength - New length
 */
export function resizeNullBitmap(
	bitmap: NullBitmap,
	newLength: number,
): NullBitmap {
	const next = createNullBitmap(newLength);
	const copyBytes = Math.min(bitmap.data.length, next.data.length);
	next.data.set(bitmap.data.subarray(0, copyBytes));
	// Clear bits beyond the new length in the last copied byte
	for (let i = newLength; i < Math.min(bitmap.length, copyBytes * 8); i++) {
		const byteIndex = i >>> 3;
		next.data[byteIndex] = (next.data[byteIndex] ?? 0) & ~(1 << (i & 7));
	}
	return next;
}
