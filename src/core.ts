/**
 * Core utilities for binary record parsing and packing
 * Format strings use the `<` / `>` byte-order prefixes and B H I Q b h i q f d codes
 */

import { FormatError } from './errors.js';
import type { BinarySource, StructureDefinition } from './types/binary.js';

// ============================================================================
// Format Character Mappings
// ============================================================================

const BYTE_LENGTHS: Record<string, number> = {
  s: 1,
  b: 1,
  B: 1,
  h: 2,
  H: 2,
  i: 4,
  I: 4,
  l: 4,
  L: 4,
  q: 8,
  Q: 8,
  f: 4,
  d: 8,
};

type FormatToken = [count: number, char: string];

// ============================================================================
// Struct Class
// ============================================================================

class Struct {
  private bigEndian: boolean;
  private fmtSizeRegex: string;
  private compiled: Map<string, FormatToken[]>;

  constructor() {
    this.bigEndian = isBigEndian();
    const allFormats = Object.keys(BYTE_LENGTHS).join('');
    this.fmtSizeRegex = '(\\d*)([' + allFormats + '])';
    this.compiled = new Map();
  }

  private tokens(fmt: string): FormatToken[] {
    const cached = this.compiled.get(fmt);
    if (cached) {
      return cached;
    }
    const tokens: FormatToken[] = [];
    const regex = new RegExp(this.fmtSizeRegex, 'g');
    let match: RegExpExecArray | null;
    while ((match = regex.exec(fmt)) !== null) {
      tokens.push([parseInt(match[1] || '1', 10), match[2]]);
    }
    this.compiled.set(fmt, tokens);
    return tokens;
  }

  calcsize(fmt: string): number {
    let size = 0;
    for (const [n, f] of this.tokens(fmt)) {
      size += n * BYTE_LENGTHS[f];
    }
    return size;
  }

  _is_big_endian(fmt: string): boolean {
    if (/^</.test(fmt)) {
      return false;
    } else if (/^(!|>)/.test(fmt)) {
      return true;
    }
    return this.bigEndian;
  }

  /**
   * Unpack numeric fields. A format without a byte-order prefix uses host order.
   */
  unpack_from(fmt: string, buffer: BinarySource, offset: number = 0): number[] {
    const view = viewOf(buffer);
    const littleEndian = !this._is_big_endian(fmt);
    const output: number[] = [];

    for (const [n, f] of this.tokens(fmt)) {
      if (f === 's') {
        throw new Error(`unpack_from cannot decode text fields ("${fmt}"), use unpack_string`);
      }
      const size = BYTE_LENGTHS[f];
      if (offset + n * size > view.byteLength) {
        throw new FormatError(
          `Unexpected end of data: need ${n * size} bytes at offset ${offset}, have ${view.byteLength}`
        );
      }
      for (let i = 0; i < n; i++) {
        output.push(getValue(view, f, offset, littleEndian));
        offset += size;
      }
    }
    return output;
  }

  unpack_string(length: number, buffer: BinarySource, offset: number = 0): string {
    const bytes = bytesOf(buffer);
    if (offset + length > bytes.byteLength) {
      throw new FormatError(`Unexpected end of data reading ${length} characters at ${offset}`);
    }
    return new TextDecoder().decode(bytes.subarray(offset, offset + length));
  }

  pack(fmt: string, values: ArrayLike<number>): Uint8Array {
    const out = new Uint8Array(this.calcsize(fmt));
    const view = new DataView(out.buffer);
    const littleEndian = !this._is_big_endian(fmt);
    let offset = 0;
    let index = 0;

    for (const [n, f] of this.tokens(fmt)) {
      if (f === 's') {
        throw new Error(`pack cannot encode text fields ("${fmt}")`);
      }
      for (let i = 0; i < n; i++) {
        if (index >= values.length) {
          throw new Error(`pack("${fmt}") needs more than ${values.length} values`);
        }
        setValue(view, f, offset, values[index++], littleEndian);
        offset += BYTE_LENGTHS[f];
      }
    }
    return out;
  }
}

function getValue(view: DataView, f: string, offset: number, littleEndian: boolean): number {
  switch (f) {
    case 'b':
      return view.getInt8(offset);
    case 'B':
      return view.getUint8(offset);
    case 'h':
      return view.getInt16(offset, littleEndian);
    case 'H':
      return view.getUint16(offset, littleEndian);
    case 'i':
    case 'l':
      return view.getInt32(offset, littleEndian);
    case 'I':
    case 'L':
      return view.getUint32(offset, littleEndian);
    case 'q':
      return Number(view.getBigInt64(offset, littleEndian));
    case 'Q':
      return Number(view.getBigUint64(offset, littleEndian));
    case 'f':
      return view.getFloat32(offset, littleEndian);
    case 'd':
      return view.getFloat64(offset, littleEndian);
    default:
      throw new Error(`Unknown format character "${f}"`);
  }
}

function setValue(
  view: DataView,
  f: string,
  offset: number,
  value: number,
  littleEndian: boolean
): void {
  switch (f) {
    case 'b':
      view.setInt8(offset, value);
      break;
    case 'B':
      view.setUint8(offset, value);
      break;
    case 'h':
      view.setInt16(offset, value, littleEndian);
      break;
    case 'H':
      view.setUint16(offset, value, littleEndian);
      break;
    case 'i':
    case 'l':
      view.setInt32(offset, value, littleEndian);
      break;
    case 'I':
    case 'L':
      view.setUint32(offset, value, littleEndian);
      break;
    case 'q':
      view.setBigInt64(offset, BigInt(value), littleEndian);
      break;
    case 'Q':
      // addresses at or beyond 2^53 only ever mean "undefined"
      view.setBigUint64(
        offset,
        value >= Number.MAX_SAFE_INTEGER ? 0xffffffffffffffffn : BigInt(value),
        littleEndian
      );
      break;
    case 'f':
      view.setFloat32(offset, value, littleEndian);
      break;
    case 'd':
      view.setFloat64(offset, value, littleEndian);
      break;
    default:
      throw new Error(`Unknown format character "${f}"`);
  }
}

export const struct = new Struct();

// ============================================================================
// Helper Functions
// ============================================================================

export function isBigEndian(): boolean {
  const array = new Uint8Array(4);
  const view = new Uint32Array(array.buffer);
  return !((view[0] = 1) & array[0]);
}

export function assert(thing: unknown, message: string = 'Assertion failed'): asserts thing {
  if (!thing) {
    throw new FormatError(message);
  }
}

export function viewOf(buffer: BinarySource): DataView {
  return buffer instanceof Uint8Array
    ? new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
    : new DataView(buffer);
}

export function bytesOf(buffer: BinarySource): Uint8Array {
  return buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
}

// ============================================================================
// Structure Helpers
// ============================================================================

/**
 * Fields of one unpacked structure. Numeric and text fields are kept apart so
 * that callers read them without casting.
 */
export class UnpackedStruct {
  private readonly numbers = new Map<string, number>();
  private readonly strings = new Map<string, string>();

  set(key: string, value: number): void {
    this.numbers.set(key, value);
  }

  setString(key: string, value: string): void {
    this.strings.set(key, value);
  }

  get(key: string): number {
    const value = this.numbers.get(key);
    if (value === undefined) {
      throw new Error(`Structure has no numeric field "${key}"`);
    }
    return value;
  }

  getString(key: string): string {
    const value = this.strings.get(key);
    if (value === undefined) {
      throw new Error(`Structure has no text field "${key}"`);
    }
    return value;
  }
}

export function _unpack_struct_from(
  structure: StructureDefinition,
  buf: BinarySource,
  offset: number = 0
): UnpackedStruct {
  const output = new UnpackedStruct();

  for (const [key, fmt] of structure.entries()) {
    if (fmt.endsWith('s')) {
      const length = parseInt(fmt.slice(0, -1) || '1', 10);
      output.setString(key, struct.unpack_string(length, buf, offset));
    } else {
      output.set(key, struct.unpack_from('<' + fmt, buf, offset)[0]);
    }
    offset += struct.calcsize(fmt);
  }
  return output;
}

export function _structure_size(structure: StructureDefinition): number {
  const fmt = '<' + Array.from(structure.values()).join('');
  return struct.calcsize(fmt);
}

export function _padded_size(size: number, paddingMultiple: number = 8): number {
  return Math.ceil(size / paddingMultiple) * paddingMultiple;
}

/** Address value meaning "not allocated" (all bits set) */
export const UNDEFINED_ADDRESS = struct.unpack_from(
  '<Q',
  new Uint8Array([255, 255, 255, 255, 255, 255, 255, 255])
)[0];
