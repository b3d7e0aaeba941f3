/**
 * HDF5 Filter Pipeline Implementation
 * Supports GZIP, Shuffle, and Fletcher32 filters
 */

import * as pako from 'pako';
import { struct } from './core.js';
import { FormatError } from './errors.js';
import { FilterId } from './types/hdf5.js';

/** Reverses one filter of a chunk's pipeline */
export type FilterFunction = (buf: Uint8Array, itemsize: number) => Uint8Array;

// ============================================================================
// Filter Implementations
// ============================================================================

const zlibDecompress: FilterFunction = (buf) => {
  let out: Uint8Array | undefined;
  try {
    out = pako.inflate(buf);
  } catch (error) {
    // pako throws its message as a plain string
    throw new FormatError(`Invalid deflate chunk: ${String(error)}`);
  }
  if (out === undefined) {
    throw new FormatError('Deflate chunk ends before its stream does');
  }
  return out;
};

/**
 * Shuffle filter - reverses the byte shuffling applied during compression
 */
const unshuffle: FilterFunction = (buf, itemsize) => {
  const unshuffled = new Uint8Array(buf.byteLength);
  const step = Math.floor(buf.byteLength / itemsize);

  for (let j = 0; j < itemsize; j++) {
    for (let i = 0; i < step; i++) {
      unshuffled[j + i * itemsize] = buf[j * step + i];
    }
  }

  return unshuffled;
};

const fletch32: FilterFunction = (buf) => {
  verifyFletcher32(buf);
  // Strip off 4-byte checksum from end of buffer
  return buf.subarray(0, buf.byteLength - 4);
};

/**
 * @throws FormatError if checksum verification fails
 */
function verifyFletcher32(chunk: Uint8Array): void {
  const dataLength = chunk.byteLength - 4;

  let sum1 = 0;
  let sum2 = 0;

  for (let offset = 0; offset < dataLength - 1; offset += 2) {
    const datum = chunk[offset] | (chunk[offset + 1] << 8);
    sum1 = (sum1 + datum) % 65535;
    sum2 = (sum2 + sum1) % 65535;
  }

  if (dataLength % 2 !== 0) {
    sum1 = (sum1 + chunk[dataLength - 1]) % 65535;
    sum2 = (sum2 + sum1) % 65535;
  }

  // Stored checksums are big-endian
  const [refSum1, refSum2] = struct.unpack_from('>HH', chunk, dataLength);

  if (sum1 !== refSum1 % 65535 || sum2 !== refSum2 % 65535) {
    throw new FormatError('fletcher32 checksum invalid');
  }
}

// ============================================================================
// Filter Registry
// ============================================================================

/**
 * Map of filter ID to filter function
 */
export const Filters = new Map<number, FilterFunction>([
  [FilterId.GZIP_DEFLATE, zlibDecompress],
  [FilterId.SHUFFLE, unshuffle],
  [FilterId.FLETCHER32, fletch32],
]);
