/**
 * Growable column buffers used while rows are converted.
 *
 * A buffer owns a typed backing store plus a null bitmap, doubles its
 * capacity when full, and hands back exact-length storage on finish().
 */

import {
	createNullBitmap,
	type NullBitmap,
	resizeNullBitmap,
	setNull,
} from "../utils/nulls.ts";

/** TypedArray storages holding plain numbers */
export type NumericStorage = Int32Array | Float32Array | Float64Array | Uint8Array;

/** Finished buffer contents */
export interface BufferContents<S> {
	readonly values: S;
	readonly nulls: NullBitmap;
	readonly length: number;
}

/** Common append-only interface over every storage kind */
export interface ColumnBuffer<T, S> {
	readonly length: number;
	append(value: T): void;
	appendNull(): void;
	finish(): BufferContents<S>;
}

abstract class GrowableBuffer {
	protected _length = 0;
	protected _capacity: number;
	protected nulls: NullBitmap;

	constructor(capacity: number) {
		this._capacity = Math.max(1, capacity);
		this.nulls = createNullBitmap(this._capacity);
	}

	get length(): number {
		return this._length;
	}

	/** Make room for one more value */
	protected reserve(): void {
		if (this._length < this._capacity) return;
		this._capacity *= 2;
		this.nulls = resizeNullBitmap(this.nulls, this._capacity);
		this.grow(this._capacity);
	}

	protected abstract grow(capacity: number): void;

	protected finishNulls(): NullBitmap {
		return resizeNullBitmap(this.nulls, this._length);
	}
}

/** Buffer over Int32Array, Float32Array, Float64Array or Uint8Array */
export class NumericColumnBuffer<A extends NumericStorage>
	extends GrowableBuffer
	implements ColumnBuffer<number, A>
{
	private data: NumericStorage;
	private readonly allocate: (length: number) => A;

	constructor(allocate: (length: number) => A, capacity: number) {
		super(capacity);
		this.allocate = allocate;
		this.data = allocate(this._capacity);
	}

	protected grow(capacity: number): void {
		const next = this.allocate(capacity);
		next.set(this.data);
		this.data = next;
	}

	append(value: number): void {
		this.reserve();
		this.data[this._length] = value;
		this._length++;
	}

	appendNull(): void {
		this.reserve();
		this.data[this._length] = 0;
		setNull(this.nulls, this._length);
		this._length++;
	}

	finish(): BufferContents<A> {
		const values = this.allocate(this._length);
		values.set(this.data.subarray(0, this._length));
		return { values, nulls: this.finishNulls(), length: this._length };
	}
}

/** Buffer over BigInt64Array (Int64 and Date columns) */
export class BigIntColumnBuffer
	extends GrowableBuffer
	implements ColumnBuffer<bigint, BigInt64Array>
{
	private data: BigInt64Array;

	constructor(capacity: number) {
		super(capacity);
		this.data = new BigInt64Array(this._capacity);
	}

	protected grow(capacity: number): void {
		const next = new BigInt64Array(capacity);
		next.set(this.data);
		this.data = next;
	}

	append(value: bigint): void {
		this.reserve();
		this.data[this._length] = value;
		this._length++;
	}

	appendNull(): void {
		this.reserve();
		this.data[this._length] = 0n;
		setNull(this.nulls, this._length);
		this._length++;
	}

	finish(): BufferContents<BigInt64Array> {
		return {
			values: this.data.slice(0, this._length),
			nulls: this.finishNulls(),
			length: this._length,
		};
	}
}

/** Buffer of decoded strings; nulls hold an empty string */
export class StringColumnBuffer
	extends GrowableBuffer
	implements ColumnBuffer<string, string[]>
{
	private readonly data: string[] = [];

	protected grow(_capacity: number): void {
		// arrays grow on push
	}

	append(value: string): void {
		this.reserve();
		this.data.push(value);
		this._length++;
	}

	appendNull(): void {
		this.reserve();
		this.data.push("");
		setNull(this.nulls, this._length);
		this._length++;
	}

	finish(): BufferContents<string[]> {
		return { values: this.data, nulls: this.finishNulls(), length: this._length };
	}
}
