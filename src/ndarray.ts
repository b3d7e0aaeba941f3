/**
 * Helpers for the typed-array backed NdArray used throughout the library
 */

import { isBigEndian } from './core.js';
import { FormatError } from './errors.js';
import type { DtypeName, NdArray, TypedArray, TypedArrayCtor } from './types/dtype.js';

// ============================================================================
// Dtype Tables
// ============================================================================

const DTYPE_CTORS: { [D in DtypeName]: TypedArrayCtor<D> } = {
  int8: Int8Array,
  uint8: Uint8Array,
  int16: Int16Array,
  uint16: Uint16Array,
  int32: Int32Array,
  uint32: Uint32Array,
  int64: BigInt64Array,
  uint64: BigUint64Array,
  float32: Float32Array,
  float64: Float64Array,
};

export const DTYPE_NAMES = Object.keys(DTYPE_CTORS).filter(isDtypeName);

const HOST_LITTLE_ENDIAN = !isBigEndian();

export function isDtypeName(name: string): name is DtypeName {
  return Object.prototype.hasOwnProperty.call(DTYPE_CTORS, name);
}

export function itemSize(dtype: DtypeName): number {
  return DTYPE_CTORS[dtype].BYTES_PER_ELEMENT;
}

export function isIntegerDtype(dtype: DtypeName): boolean {
  return dtype !== 'float32' && dtype !== 'float64';
}

// ============================================================================
// Construction
// ============================================================================

export function product(shape: readonly number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

export function zeros<D extends DtypeName>(dtype: D, shape: readonly number[]): NdArray<D> {
  const Ctor = DTYPE_CTORS[dtype];
  return { dtype, shape: shape.slice(), data: new Ctor(product(shape)) };
}

export function fromNumbers<D extends DtypeName>(
  dtype: D,
  values: ArrayLike<number>,
  shape: readonly number[] = [values.length]
): NdArray<D> {
  if (product(shape) !== values.length) {
    throw new RangeError(
      `Cannot shape ${values.length} values as [${shape.join(', ')}]`
    );
  }
  const out = zeros(dtype, shape);
  const data: TypedArray = out.data;
  if (data instanceof BigInt64Array || data instanceof BigUint64Array) {
    for (let i = 0; i < values.length; i++) {
      data[i] = BigInt(Math.trunc(values[i]));
    }
  } else {
    for (let i = 0; i < values.length; i++) {
      data[i] = values[i];
    }
  }
  return out;
}

/**
 * Build a 2-D array from rows of equal length, or a 1-D array from a flat list
 */
export function fromRows<D extends DtypeName>(
  dtype: D,
  rows: ReadonlyArray<number> | ReadonlyArray<ReadonlyArray<number>>
): NdArray<D> {
  const flat: number[] = [];
  let width: number | null = null;
  for (const row of rows) {
    if (typeof row === 'number') {
      flat.push(row);
      continue;
    }
    if (width === null) {
      width = row.length;
    } else if (row.length !== width) {
      throw new RangeError(`Ragged rows: expected ${width} values, got ${row.length}`);
    }
    flat.push(...row);
  }
  const shape = width === null ? [flat.length] : [rows.length, width];
  return fromNumbers(dtype, flat, shape);
}

// ============================================================================
// Element Access
// ============================================================================

export function getNumber(arr: NdArray, index: number): number {
  return Number(arr.data[index]);
}

export function toNumbers(arr: NdArray): number[] {
  const out: number[] = new Array(arr.data.length);
  for (let i = 0; i < arr.data.length; i++) {
    out[i] = Number(arr.data[i]);
  }
  return out;
}

/** Rows of a 2-D array (a 1-D array yields one single-value row per item) */
export function toRows(arr: NdArray): number[][] {
  const width = rowWidth(arr);
  const values = toNumbers(arr);
  const rows: number[][] = [];
  for (let i = 0; i < values.length; i += width) {
    rows.push(values.slice(i, i + width));
  }
  return rows;
}

// ============================================================================
// Shape Manipulation
// ============================================================================

export function rowCount(arr: NdArray): number {
  return arr.shape.length === 0 ? 1 : arr.shape[0];
}

export function rowWidth(arr: NdArray): number {
  return product(arr.shape.slice(1));
}

export function reshape<D extends DtypeName>(arr: NdArray<D>, shape: readonly number[]): NdArray<D> {
  if (product(shape) !== arr.data.length) {
    throw new FormatError(
      `Cannot reshape ${arr.data.length} values to [${shape.join(', ')}]`
    );
  }
  return { dtype: arr.dtype, shape: shape.slice(), data: arr.data };
}

export function astype<D extends DtypeName>(arr: NdArray, dtype: D): NdArray<D> {
  if (arr.dtype === dtype) {
    return fromBytes(dtype, toBytes(arr), arr.shape);
  }
  return fromNumbers(dtype, toNumbers(arr), arr.shape);
}

/** Concatenate along the first axis; the result takes the dtype of the first array */
export function concat(arrays: readonly NdArray[], dtype?: DtypeName): NdArray {
  if (arrays.length === 0) {
    throw new RangeError('concat needs at least one array');
  }
  const target = dtype ?? arrays[0].dtype;
  const trailing = arrays[0].shape.slice(1);
  let rows = 0;
  for (const a of arrays) {
    if (a.shape.slice(1).join(',') !== trailing.join(',')) {
      throw new RangeError(
        `Cannot concatenate [${a.shape.join(', ')}] with [${arrays[0].shape.join(', ')}]`
      );
    }
    rows += rowCount(a);
  }
  const out = zeros(target, [rows, ...trailing]);
  const outBytes = rawBytes(out);
  let offset = 0;
  for (const a of arrays) {
    const bytes = rawBytes(a.dtype === target ? a : astype(a, target));
    outBytes.set(bytes, offset);
    offset += bytes.byteLength;
  }
  return out;
}

/** Copy of rows [start, end) */
export function sliceRows<D extends DtypeName>(arr: NdArray<D>, start: number, end: number): NdArray<D> {
  const width = rowWidth(arr) * itemSize(arr.dtype);
  const out = zeros(arr.dtype, [end - start, ...arr.shape.slice(1)]);
  rawBytes(out).set(rawBytes(arr).subarray(start * width, end * width));
  return out;
}

/** Drop a trailing singleton axis: (n, 1) becomes (n,) */
export function squeezeColumn<D extends DtypeName>(arr: NdArray<D>): NdArray<D> {
  if (arr.shape.length === 2 && arr.shape[1] === 1) {
    return reshape(arr, [arr.shape[0]]);
  }
  return arr;
}

// ============================================================================
// Byte Conversion
// ============================================================================

function rawBytes(arr: NdArray): Uint8Array {
  return new Uint8Array(arr.data.buffer, arr.data.byteOffset, arr.data.byteLength);
}

function swapBytes(bytes: Uint8Array, size: number): void {
  if (size === 1) {
    return;
  }
  for (let i = 0; i < bytes.length; i += size) {
    for (let lo = i, hi = i + size - 1; lo < hi; lo++, hi--) {
      const tmp = bytes[lo];
      bytes[lo] = bytes[hi];
      bytes[hi] = tmp;
    }
  }
}

/**
 * Build an array from raw element bytes stored in the given byte order
 */
export function fromBytes<D extends DtypeName>(
  dtype: D,
  bytes: Uint8Array,
  shape: readonly number[],
  littleEndian: boolean = HOST_LITTLE_ENDIAN
): NdArray<D> {
  const out = zeros(dtype, shape);
  const target = rawBytes(out);
  if (bytes.byteLength !== target.byteLength) {
    throw new FormatError(
      `Expected ${target.byteLength} bytes for ${dtype}[${shape.join(', ')}], got ${bytes.byteLength}`
    );
  }
  target.set(bytes);
  if (littleEndian !== HOST_LITTLE_ENDIAN) {
    swapBytes(target, itemSize(dtype));
  }
  return out;
}

/** Copy of the element bytes in the given byte order */
export function toBytes(arr: NdArray, littleEndian: boolean = HOST_LITTLE_ENDIAN): Uint8Array {
  const bytes = rawBytes(arr).slice();
  if (littleEndian !== HOST_LITTLE_ENDIAN) {
    swapBytes(bytes, itemSize(arr.dtype));
  }
  return bytes;
}
