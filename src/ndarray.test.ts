import { describe, it, expect } from 'vitest';
import {
  astype,
  concat,
  fromBytes,
  fromNumbers,
  fromRows,
  getNumber,
  reshape,
  rowCount,
  sliceRows,
  squeezeColumn,
  toBytes,
  toNumbers,
  toRows,
  zeros,
} from './ndarray.js';
import { FormatError } from './errors.js';

describe('ndarray', () => {
  it('should build 2-D arrays from rows', () => {
    const arr = fromRows('float64', [
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
    expect(arr.shape).toEqual([3, 2]);
    expect(toNumbers(arr)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(toRows(arr)).toEqual([
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
  });

  it('should reject ragged rows', () => {
    expect(() => fromRows('int32', [[1, 2], [3]])).toThrow(RangeError);
  });

  it('should store 64-bit integers as bigints', () => {
    const arr = fromNumbers('int64', [1, -2, 3]);
    expect(arr.data).toBeInstanceOf(BigInt64Array);
    expect(arr.data[1]).toBe(-2n);
    expect(getNumber(arr, 2)).toBe(3);
  });

  it('should reshape without copying and reject size changes', () => {
    const arr = fromNumbers('int32', [1, 2, 3, 4, 5, 6]);
    const grid = reshape(arr, [2, 3]);
    expect(grid.shape).toEqual([2, 3]);
    expect(grid.data).toBe(arr.data);
    expect(() => reshape(arr, [4, 2])).toThrow(FormatError);
  });

  it('should convert dtypes', () => {
    const arr = astype(fromNumbers('float64', [1.7, -2.2]), 'int32');
    expect(arr.dtype).toBe('int32');
    expect(toNumbers(arr)).toEqual([1, -2]);
  });

  it('should concatenate along the first axis in the first dtype', () => {
    const a = fromRows('int32', [[1, 2]]);
    const b = fromRows('int64', [
      [3, 4],
      [5, 6],
    ]);
    const c = concat([a, b]);
    expect(c.dtype).toBe('int32');
    expect(c.shape).toEqual([3, 2]);
    expect(toNumbers(c)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(() => concat([a, fromNumbers('int32', [1, 2, 3])])).toThrow(RangeError);
  });

  it('should slice rows', () => {
    const arr = fromRows('float32', [[1, 2], [3, 4], [5, 6]]);
    const mid = sliceRows(arr, 1, 3);
    expect(mid.shape).toEqual([2, 2]);
    expect(toNumbers(mid)).toEqual([3, 4, 5, 6]);
  });

  it('should drop a trailing singleton column', () => {
    const arr = fromNumbers('float64', [1, 2], [2, 1]);
    expect(squeezeColumn(arr).shape).toEqual([2]);
    expect(squeezeColumn(fromNumbers('float64', [1, 2])).shape).toEqual([2]);
    expect(rowCount(zeros('int8', []))).toBe(1);
  });

  it('should encode element bytes in either byte order', () => {
    const arr = fromNumbers('uint32', [0x01020304]);
    expect(Array.from(toBytes(arr, true))).toEqual([4, 3, 2, 1]);
    expect(Array.from(toBytes(arr, false))).toEqual([1, 2, 3, 4]);
    const back = fromBytes('uint32', new Uint8Array([1, 2, 3, 4]), [1], false);
    expect(getNumber(back, 0)).toBe(0x01020304);
  });

  it('should reject byte buffers of the wrong size', () => {
    expect(() => fromBytes('float64', new Uint8Array(12), [2])).toThrow(FormatError);
  });
});
