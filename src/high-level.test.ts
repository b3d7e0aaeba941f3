import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import * as pako from 'pako';
import { struct, UNDEFINED_ADDRESS } from './core.js';
import { H5Writer } from './h5-writer.js';
import { Dataset, Group, H5File } from './high-level.js';
import { FormatError, ReadError } from './errors.js';
import { fromNumbers, toNumbers } from './ndarray.js';
import { FORMAT_SIGNATURE, MessageType } from './types/hdf5.js';

describe('H5File', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'meshwire-h5-'));
    file = path.join(dir, 'store.h5');
    const writer = H5Writer.create(file);
    writer.createDataset('group/data', fromNumbers('float64', [1, 2, 3]));
    writer.close();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should report missing objects', () => {
    const h5 = H5File.open(file);
    expect(h5.dataset('group/data').name).toBe('/group/data');
    expect(() => h5.get('group/nope')).toThrow(/nope not found in group \/group/);
    expect(() => h5.get('nope')).toThrow(/nope not found in group \//);
    h5.close();
  });

  it('should not descend into datasets', () => {
    const h5 = H5File.open(file);
    expect(() => h5.get('group/data/more')).toThrow(/group\/data is a dataset, not a group/);
    expect(() => h5.dataset('group')).toThrow(/is a group, not a dataset/);
    h5.close();
  });

  it('should refuse access after close', () => {
    const h5 = H5File.open(file);
    h5.close();
    expect(h5.closed).toBe(true);
    expect(() => h5.get('group')).toThrow(ReadError);
  });

  it('should reject files without the HDF5 signature', () => {
    expect(() => new H5File(new Uint8Array(64))).toThrow(/incorrect file signature/);
  });

  it('should detect a corrupted superblock', () => {
    const bytes = new Uint8Array(readFileSync(file));
    // first byte of the base address
    bytes[12] ^= 0xff;
    expect(() => new H5File(bytes)).toThrow(FormatError);
    expect(() => new H5File(bytes)).toThrow('Superblock checksum mismatch');
  });

  it('should detect a corrupted object header', () => {
    const bytes = new Uint8Array(readFileSync(file));
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    // root group address sits at byte 36 of the superblock
    const root = Number(view.getBigUint64(36, true));
    // first byte of the first message type in the root header
    bytes[root + 10] ^= 0x01;
    expect(() => new H5File(bytes)).toThrow(/Object header checksum mismatch/);
  });
});

// ============================================================================
// Files in the version 0 layout: symbol-table groups and chunked storage
// ============================================================================

const encoder = new TextEncoder();

function cat(...parts: Array<Uint8Array | string>): Uint8Array {
  const chunks = parts.map((p) => (typeof p === 'string' ? encoder.encode(p) : p));
  const out = new Uint8Array(chunks.reduce((n, c) => n + c.byteLength, 0));
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

function padTo8(bytes: Uint8Array): Uint8Array {
  return cat(bytes, new Uint8Array((8 - (bytes.byteLength % 8)) % 8));
}

/** Append-only file image; blocks are placed in order and addressed by offset */
class FileImage {
  private readonly blocks: Uint8Array[] = [];
  size = 0;

  place(bytes: Uint8Array): number {
    const at = this.size;
    this.blocks.push(bytes);
    this.size += bytes.byteLength;
    return at;
  }

  bytes(): Uint8Array {
    return cat(...this.blocks);
  }
}

/** Version 1 object header holding the given (type, body) messages */
function objectHeaderV1(messages: Array<[MessageType, Uint8Array]>): Uint8Array {
  const bodies = messages.map(([type, body]) => {
    const padded = padTo8(body);
    return cat(struct.pack('<HHB3B', [type, padded.byteLength, 0, 0, 0, 0]), padded);
  });
  const body = cat(...bodies);
  return cat(struct.pack('<BBHIII', [1, 0, messages.length, 1, body.byteLength, 0]), body);
}

/** Local heap data segment of null-terminated names, each 8-byte aligned */
function heapSegment(names: string[]): { data: Uint8Array; offsets: Map<string, number> } {
  const offsets = new Map<string, number>();
  const parts: Uint8Array[] = [new Uint8Array(8)];
  let size = 8;
  for (const name of names) {
    offsets.set(name, size);
    const part = padTo8(cat(name, new Uint8Array(1)));
    parts.push(part);
    size += part.byteLength;
  }
  return { data: cat(...parts), offsets };
}

interface SymbolEntry {
  name: string;
  /** Object header address, or the soft link value */
  target: number | string;
}

/** Place a local heap, a symbol table node and a group B-tree; returns the symbol table message */
function placeSymbolTable(image: FileImage, entries: SymbolEntry[]): Uint8Array {
  const softValues = entries.flatMap((e) => (typeof e.target === 'string' ? [e.target] : []));
  const heap = heapSegment([...entries.map((e) => e.name), ...softValues]);
  const offsetOf = (name: string): number => heap.offsets.get(name) ?? 0;

  const heapData = image.place(heap.data);
  const heapAddress = image.place(
    cat('HEAP', struct.pack('<4B3Q', [0, 0, 0, 0, heap.data.byteLength, UNDEFINED_ADDRESS, heapData]))
  );

  const records = entries.map((e) =>
    typeof e.target === 'string'
      ? struct.pack('<QQIII3I', [offsetOf(e.name), UNDEFINED_ADDRESS, 2, 0, offsetOf(e.target), 0, 0, 0])
      : struct.pack('<QQIII3I', [offsetOf(e.name), e.target, 0, 0, 0, 0, 0, 0])
  );
  const snod = image.place(cat('SNOD', struct.pack('<BBH', [1, 0, entries.length]), ...records));

  const btree = image.place(
    cat('TREE', struct.pack('<BBH2Q3Q', [0, 0, 1, UNDEFINED_ADDRESS, UNDEFINED_ADDRESS, 0, snod, 0]))
  );
  return struct.pack('<2Q', [btree, heapAddress]);
}

function dataspace(dims: number[]): Uint8Array {
  return cat(struct.pack('<BBBBI', [1, dims.length, 0, 0, 0]), struct.pack(`<${dims.length}Q`, dims));
}

const FLOAT64_LE = cat(struct.pack('<BBBBI', [0x11, 0x20, 0x3f, 0, 8]), struct.pack('<HHBBBBI', [0, 64, 52, 11, 0, 52, 1023]));
const INT32_BE = cat(struct.pack('<BBBBI', [0x10, 0x09, 0, 0, 4]), struct.pack('<HH', [0, 32]));

/** Byte shuffle as the HDF5 shuffle filter applies it */
function shuffle(bytes: Uint8Array, itemsize: number): Uint8Array {
  const count = bytes.byteLength / itemsize;
  const out = new Uint8Array(bytes.byteLength);
  for (let i = 0; i < count; i++) {
    for (let j = 0; j < itemsize; j++) {
      out[j * count + i] = bytes[i * itemsize + j];
    }
  }
  return out;
}

/**
 * Root group (symbol table) with:
 *   values  float64[5], chunks of 3, shuffle + deflate
 *   ids     int32[2, 2], big-endian, contiguous
 *   sub/    group holding `inner`, a second hard link to `ids`
 *   alias   soft link to /values
 *   dir     soft link to /sub
 */
function legacyFile(): Uint8Array {
  const image = new FileImage();
  const superblockSize = 56 + 40;
  image.place(new Uint8Array(superblockSize));

  const chunks = [
    [0.5, 1.5, 2.5],
    [3.5, 4.5, 0],
  ].map((values) => pako.deflate(shuffle(struct.pack('<3d', values), 8)));
  const chunkAddresses = chunks.map((chunk) => image.place(chunk));
  const chunkTree = image.place(
    cat(
      'TREE',
      struct.pack('<BBH2Q', [1, 0, 2, UNDEFINED_ADDRESS, UNDEFINED_ADDRESS]),
      struct.pack('<2I2QQ', [chunks[0].byteLength, 0, 0, 0, chunkAddresses[0]]),
      struct.pack('<2I2QQ', [chunks[1].byteLength, 0, 3, 0, chunkAddresses[1]]),
      struct.pack('<2I2Q', [0, 0, 6, 0])
    )
  );
  const filters = cat(
    struct.pack('<BBHI', [1, 2, 0, 0]),
    struct.pack('<4H2I', [2, 0, 1, 1, 8, 0]),
    struct.pack('<4H2I', [1, 0, 1, 1, 4, 0])
  );
  const values = image.place(
    objectHeaderV1([
      [MessageType.DATASPACE, dataspace([5])],
      [MessageType.DATATYPE, FLOAT64_LE],
      [MessageType.FILTER_PIPELINE, filters],
      [MessageType.DATA_LAYOUT, cat(struct.pack('<BBB', [3, 2, 2]), struct.pack('<Q2I', [chunkTree, 3, 8]))],
    ])
  );

  const idsData = image.place(struct.pack('>4i', [1, -2, 3, 400]));
  const ids = image.place(
    objectHeaderV1([
      [MessageType.DATASPACE, dataspace([2, 2])],
      [MessageType.DATATYPE, INT32_BE],
      [MessageType.DATA_LAYOUT, cat(struct.pack('<BB', [3, 1]), struct.pack('<2Q', [idsData, 16]))],
    ])
  );

  const sub = image.place(
    objectHeaderV1([[MessageType.SYMBOL_TABLE, placeSymbolTable(image, [{ name: 'inner', target: ids }])]])
  );

  const rootTable = placeSymbolTable(image, [
    { name: 'alias', target: '/values' },
    { name: 'dir', target: '/sub' },
    { name: 'ids', target: ids },
    { name: 'sub', target: sub },
    { name: 'values', target: values },
  ]);
  const root = image.place(objectHeaderV1([[MessageType.SYMBOL_TABLE, rootTable]]));

  const bytes = image.bytes();
  bytes.set(
    cat(
      FORMAT_SIGNATURE,
      struct.pack('<8BHHI4Q', [0, 0, 0, 0, 0, 8, 8, 0, 4, 16, 0, 0, UNDEFINED_ADDRESS, bytes.byteLength, UNDEFINED_ADDRESS]),
      struct.pack('<QQIII3I', [0, root, 0, 0, 0, 0, 0, 0])
    ),
    0
  );
  return bytes;
}

describe('H5File on version 0 files', () => {
  it('should list symbol table links in storage order', () => {
    const h5 = new H5File(legacyFile());
    expect(h5.keys).toEqual(['alias', 'dir', 'ids', 'sub', 'values']);
    expect(h5.get('sub')).toBeInstanceOf(Group);
    expect(h5.get('values')).toBeInstanceOf(Dataset);
  });

  it('should read a chunked dataset through shuffle and deflate', () => {
    const values = new H5File(legacyFile()).dataset('values');
    expect(values.shape).toEqual([5]);
    expect(values.dtype).toBe('float64');
    expect(toNumbers(values.value)).toEqual([0.5, 1.5, 2.5, 3.5, 4.5]);
  });

  it('should read big-endian contiguous data', () => {
    const ids = new H5File(legacyFile()).dataset('ids');
    expect(ids.shape).toEqual([2, 2]);
    expect(ids.dtype).toBe('int32');
    expect(toNumbers(ids.value)).toEqual([1, -2, 3, 400]);
  });

  it('should walk nested symbol table groups', () => {
    const inner = new H5File(legacyFile()).dataset('/sub/inner');
    expect(inner.name).toBe('/sub/inner');
    expect(toNumbers(inner.value)).toEqual([1, -2, 3, 400]);
  });

  it('should follow soft links to datasets and groups', () => {
    const h5 = new H5File(legacyFile());
    const alias = h5.dataset('alias');
    expect(alias.name).toBe('/values');
    expect(toNumbers(alias.value)).toEqual([0.5, 1.5, 2.5, 3.5, 4.5]);
    expect(h5.dataset('dir/inner').name).toBe('/sub/inner');
    expect(() => h5.get('alias/more')).toThrow(FormatError);
    expect(() => h5.get('alias/more')).toThrow('/values is a dataset, not a group');
  });

  it('should reject a chunk whose deflate checksum does not match', () => {
    const bytes = legacyFile();
    const firstChunk = pako.deflate(shuffle(struct.pack('<3d', [0.5, 1.5, 2.5]), 8));
    // the first chunk follows the 96-byte superblock and ends with its adler32
    bytes[96 + firstChunk.byteLength - 1] ^= 0xff;
    expect(() => new H5File(bytes).dataset('values').value).toThrow(FormatError);
    expect(() => new H5File(bytes).dataset('values').value).toThrow(/Invalid deflate chunk/);
  });
});
