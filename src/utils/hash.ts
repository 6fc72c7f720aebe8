/**
 * MurmurHash3 (x86, 32-bit) used to encode category values.
 */

/** Seed for category codes; changing it changes every stored code */
export const CATEGORY_HASH_SEED = 33;

const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

const encoder = new TextEncoder();

function rotl32(x: number, r: number): number {
	return (x << r) | (x >>> (32 - r));
}

function mixK(k: number): number {
	return Math.imul(rotl32(Math.imul(k, C1), 15), C2);
}

/** Hash bytes to a signed 32-bit integer. */
export function murmurHash3(bytes: Uint8Array, seed = 0): number {
	const len = bytes.length;
	const tail = len & ~3;
	let h = seed | 0;

	for (let i = 0; i < tail; i += 4) {
		const k =
			(bytes[i] ?? 0) |
			((bytes[i + 1] ?? 0) << 8) |
			((bytes[i + 2] ?? 0) << 16) |
			((bytes[i + 3] ?? 0) << 24);
		h ^= mixK(k);
		h = rotl32(h, 13);
		h = (Math.imul(h, 5) + 0xe6546b64) | 0;
	}

	const rem = len & 3;
	if (rem > 0) {
		let k = 0;
		if (rem === 3) k ^= (bytes[tail + 2] ?? 0) << 16;
		if (rem >= 2) k ^= (bytes[tail + 1] ?? 0) << 8;
		k ^= bytes[tail] ?? 0;
		h ^= mixK(k);
	}

	h ^= len;
	h ^= h >>> 16;
	h = Math.imul(h, 0x85ebca6b);
	h ^= h >>> 13;
	h = Math.imul(h, 0xc2b2ae35);
	h ^= h >>> 16;
	return h | 0;
}

/** Category code of a field's text (UTF-8 bytes, fixed seed). */
export function hashCategory(text: string): number {
	return murmurHash3(encoder.encode(text), CATEGORY_HASH_SEED);
}
