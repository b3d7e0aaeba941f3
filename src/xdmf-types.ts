/**
 * XDMF number types, text formats and attribute-type inference
 */

import { UnsupportedTypeError, WriteError } from './errors.js';
import { isIntegerDtype } from './ndarray.js';
import type { DtypeName, NdArray } from './types/dtype.js';

/** dtype, XDMF DataType, XDMF Precision */
const XDMF_DTYPES: ReadonlyArray<readonly [DtypeName, string, string]> = [
  ['int8', 'Char', '1'],
  ['int32', 'Int', '4'],
  ['int64', 'Int', '8'],
  ['uint8', 'UChar', '1'],
  ['uint32', 'UInt', '4'],
  ['uint64', 'UInt', '8'],
  ['float32', 'Float', '4'],
  ['float64', 'Float', '8'],
];

const TO_XDMF = new Map(XDMF_DTYPES.map(([dtype, type, precision]) => [dtype, { type, precision }]));
const FROM_XDMF = new Map(XDMF_DTYPES.map(([dtype, type, precision]) => [`${type}:${precision}`, dtype]));

export interface XdmfNumberType {
  type: string;
  precision: string;
}

export function xdmfToDtype(type: string, precision: string): DtypeName {
  const dtype = FROM_XDMF.get(`${type}:${precision}`);
  if (dtype === undefined) {
    const known = XDMF_DTYPES.map(([, t, p]) => `(${t}, ${p})`).join(', ');
    throw new UnsupportedTypeError(`Unknown XDMF number type (${type}, ${precision}); known: ${known}`);
  }
  return dtype;
}

export function dtypeToXdmf(dtype: DtypeName): XdmfNumberType {
  const pair = TO_XDMF.get(dtype);
  if (pair === undefined) {
    throw new UnsupportedTypeError(
      `dtype ${dtype} has no XDMF number type; known: ${XDMF_DTYPES.map(([d]) => d).join(', ')}`
    );
  }
  return pair;
}

// ============================================================================
// Text Formats
// ============================================================================

/** printf-style `%.<digits>e`: at least two exponent digits */
export function formatExponential(value: number, digits: number): string {
  if (!Number.isFinite(value)) {
    return Number.isNaN(value) ? 'nan' : value > 0 ? 'inf' : '-inf';
  }
  const [mantissa, exponent] = value.toExponential(digits).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  return `${mantissa}e${sign}${exponent.replace(/^[+-]/, '').padStart(2, '0')}`;
}

/** One value per line, as inline XML data items store them */
export function formatValues(arr: NdArray): string {
  const lines: string[] = new Array<string>(arr.data.length);
  if (isIntegerDtype(arr.dtype)) {
    for (let i = 0; i < arr.data.length; i++) {
      lines[i] = arr.data[i].toString();
    }
  } else {
    const digits = arr.dtype === 'float32' ? 7 : 16;
    for (let i = 0; i < arr.data.length; i++) {
      lines[i] = formatExponential(Number(arr.data[i]), digits);
    }
  }
  return lines.join('\n') + '\n';
}

/** Parse one inline token; `nan` and `inf` spellings are accepted */
export function parseValue(token: string): number {
  switch (token.toLowerCase()) {
    case 'nan':
      return NaN;
    case 'inf':
    case '+inf':
    case 'infinity':
      return Infinity;
    case '-inf':
    case '-infinity':
      return -Infinity;
    default:
      return Number(token);
  }
}

// ============================================================================
// Attribute Types
// ============================================================================

/**
 * XDMF AttributeType implied by an array's shape
 */
export function attributeType(shape: readonly number[]): string {
  if (shape.length === 1 || (shape.length === 2 && shape[1] === 1)) {
    return 'Scalar';
  }
  if (shape.length === 2 && (shape[1] === 2 || shape[1] === 3)) {
    return 'Vector';
  }
  if ((shape.length === 2 && shape[1] === 9) || (shape.length === 3 && shape[1] === 3 && shape[2] === 3)) {
    return 'Tensor';
  }
  if (shape.length === 2 && shape[1] === 6) {
    return 'Tensor6';
  }
  if (shape.length === 3) {
    return 'Matrix';
  }
  throw new WriteError(`No XDMF attribute type for an array of shape [${shape.join(', ')}]`);
}
