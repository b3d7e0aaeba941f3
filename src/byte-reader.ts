/**
 * Cursor over an in-memory file mixing text lines and binary blocks, and the
 * matching output buffer.
 */

import { struct } from './core.js';
import { FormatError } from './errors.js';
import { fromBytes, itemSize, product, toBytes } from './ndarray.js';
import type { DtypeName, NdArray } from './types/dtype.js';

const NEWLINE = 0x0a;
const decoder = new TextDecoder();
const encoder = new TextEncoder();

// ============================================================================
// ByteReader
// ============================================================================

export class ByteReader {
  readonly bytes: Uint8Array;
  private pos: number;
  // whitespace-separated values left over on the current text line
  private pending: string[];
  private pendingIndex: number;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.pos = 0;
    this.pending = [];
    this.pendingIndex = 0;
  }

  get offset(): number {
    return this.pos;
  }

  get atEnd(): boolean {
    return this.pos >= this.bytes.length && this.pendingIndex >= this.pending.length;
  }

  /**
   * Next line without its terminator, or null at end of input
   */
  readLine(): string | null {
    if (this.pendingIndex < this.pending.length) {
      const rest = this.pending.slice(this.pendingIndex).join(' ');
      this.pending = [];
      this.pendingIndex = 0;
      return rest;
    }
    if (this.pos >= this.bytes.length) {
      return null;
    }
    let end = this.bytes.indexOf(NEWLINE, this.pos);
    if (end < 0) {
      end = this.bytes.length;
    }
    let line = decoder.decode(this.bytes.subarray(this.pos, end));
    this.pos = Math.min(end + 1, this.bytes.length);
    if (line.endsWith('\r')) {
      line = line.slice(0, -1);
    }
    return line;
  }

  /** Like readLine, but running out of input is a FormatError */
  expectLine(context: string): string {
    const line = this.readLine();
    if (line === null) {
      throw new FormatError(`Unexpected end of file while reading ${context}`);
    }
    return line;
  }

  /** Parse the next non-empty line as one integer */
  readInt(context: string): number {
    let line = this.expectLine(context).trim();
    while (line === '') {
      line = this.expectLine(context).trim();
    }
    const value = Number(line.split(/\s+/)[0]);
    if (!Number.isInteger(value)) {
      throw new FormatError(`Expected an integer for ${context}, got "${line}"`);
    }
    return value;
  }

  /**
   * Read `count` whitespace-separated numbers, spanning lines as needed.
   * Values left on the last line stay available to the next read.
   */
  readTokens(count: number, context: string): number[] {
    const out: number[] = new Array(count);
    let n = 0;
    while (n < count) {
      if (this.pendingIndex >= this.pending.length) {
        const line = this.readLine();
        if (line === null) {
          throw new FormatError(`Unexpected end of file: ${context} needs ${count} values, got ${n}`);
        }
        this.pending = line.trim().split(/\s+/).filter((t) => t !== '');
        this.pendingIndex = 0;
        continue;
      }
      const token = this.pending[this.pendingIndex++];
      const value = Number(token);
      if (Number.isNaN(value)) {
        throw new FormatError(`Invalid number "${token}" in ${context}`);
      }
      out[n++] = value;
    }
    return out;
  }

  readBytes(length: number, context: string): Uint8Array {
    this.dropPending();
    if (this.pos + length > this.bytes.length) {
      throw new FormatError(
        `Unexpected end of file: ${context} needs ${length} bytes, ${this.bytes.length - this.pos} left`
      );
    }
    const out = this.bytes.subarray(this.pos, this.pos + length);
    this.pos += length;
    return out;
  }

  /** Unpack binary fields at the cursor (host byte order unless fmt says otherwise) */
  unpack(fmt: string, context: string): number[] {
    return struct.unpack_from(fmt, this.readBytes(struct.calcsize(fmt), context));
  }

  /** Read a host-order binary array */
  readArray<D extends DtypeName>(dtype: D, shape: readonly number[], context: string): NdArray<D> {
    return fromBytes(dtype, this.readBytes(product(shape) * itemSize(dtype), context), shape);
  }

  private dropPending(): void {
    this.pending = [];
    this.pendingIndex = 0;
  }
}

// ============================================================================
// ByteSink
// ============================================================================

export class ByteSink {
  private chunks: Uint8Array[];
  private length: number;

  constructor() {
    this.chunks = [];
    this.length = 0;
  }

  get byteLength(): number {
    return this.length;
  }

  bytes(chunk: Uint8Array): this {
    this.chunks.push(chunk);
    this.length += chunk.byteLength;
    return this;
  }

  text(s: string): this {
    return this.bytes(encoder.encode(s));
  }

  line(s: string): this {
    return this.text(s + '\n');
  }

  pack(fmt: string, values: ArrayLike<number>): this {
    return this.bytes(struct.pack(fmt, values));
  }

  /** Append host-order element bytes */
  array(arr: NdArray): this {
    return this.bytes(toBytes(arr));
  }

  toUint8Array(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return out;
  }
}
