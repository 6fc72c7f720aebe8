import { describe, expect, test } from "vitest";
import {
	createNullBitmap,
	getNullCount,
	isNull,
	resizeNullBitmap,
	setNull,
} from "../../src/utils/nulls.ts";

describe("NullBitmap", () => {
	test("starts with every value present", () => {
		const bitmap = createNullBitmap(10);
		expect(bitmap.data.length).toBe(2);
		expect(getNullCount(bitmap)).toBe(0);
	});

	test("marks and counts nulls", () => {
		const bitmap = createNullBitmap(20);
		setNull(bitmap, 0);
		setNull(bitmap, 9);
		setNull(bitmap, 19);
		expect(isNull(bitmap, 9)).toBe(true);
		expect(isNull(bitmap, 10)).toBe(false);
		expect(getNullCount(bitmap)).toBe(3);
	});

	test("ignores out-of-range indices", () => {
		const bitmap = createNullBitmap(4);
		setNull(bitmap, 7);
		expect(isNull(bitmap, 7)).toBe(false);
		expect(getNullCount(bitmap)).toBe(0);
	});

	test("allows empty bitmaps", () => {
		expect(createNullBitmap(0).data.length).toBe(0);
		expect(() => createNullBitmap(-1)).toThrow(RangeError);
	});

	test("resizing keeps flags and drops those past the new length", () => {
		const bitmap = createNullBitmap(16);
		setNull(bitmap, 2);
		setNull(bitmap, 6);
		const shrunk = resizeNullBitmap(bitmap, 5);
		expect(shrunk.length).toBe(5);
		expect(isNull(shrunk, 2)).toBe(true);
		expect(getNullCount(shrunk)).toBe(1);

		const grown = resizeNullBitmap(shrunk, 40);
		expect(isNull(grown, 2)).toBe(true);
		expect(getNullCount(grown)).toBe(1);
	});
});
