/**
 * Numeric dtype definitions
 */

// ============================================================================
// Dtype Names
// ============================================================================

export type IntegerDtypeName =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64';

export type FloatDtypeName = 'float32' | 'float64';

export type DtypeName = IntegerDtypeName | FloatDtypeName;

// ============================================================================
// TypedArray Types
// ============================================================================

export interface TypedArrayByDtype {
  int8: Int8Array;
  uint8: Uint8Array;
  int16: Int16Array;
  uint16: Uint16Array;
  int32: Int32Array;
  uint32: Uint32Array;
  int64: BigInt64Array;
  uint64: BigUint64Array;
  float32: Float32Array;
  float64: Float64Array;
}

export type TypedArray = TypedArrayByDtype[DtypeName];

export interface TypedArrayCtor<D extends DtypeName> {
  new (length: number): TypedArrayByDtype[D];
  readonly BYTES_PER_ELEMENT: number;
}

// ============================================================================
// N-dimensional Array
// ============================================================================

/**
 * Row-major n-dimensional array backed by a typed array.
 * 64-bit integer dtypes are bigint-backed.
 */
export interface NdArray<D extends DtypeName = DtypeName> {
  dtype: D;
  shape: number[];
  data: TypedArrayByDtype[D];
}
