/**
 * Gmsh `.msh` entry points: header negotiation and version dispatch
 */

import { readFileSync, writeFileSync } from 'fs';
import { ByteReader } from './byte-reader.js';
import { debugLog } from './debug.js';
import { FormatError, UnsupportedVersionError } from './errors.js';
import { gmsh22 } from './gmsh22.js';
import { gmsh40 } from './gmsh40.js';
import { gmsh41 } from './gmsh41.js';
import type { Mesh } from './mesh.js';
import type { GmshHeader, GmshReadOptions, GmshVersionCodec, GmshWriteOptions } from './types/gmsh.js';

const READERS: Readonly<Record<string, GmshVersionCodec>> = {
  '2': gmsh22,
  '4': gmsh40,
  '4.0': gmsh40,
  '4.1': gmsh41,
};

const WRITERS: Readonly<Record<string, GmshVersionCodec>> = {
  '2': gmsh22,
  '4': gmsh41,
  '4.0': gmsh40,
  '4.1': gmsh41,
};

/**
 * Pick the codec for a version string: exact key first, then its major part
 */
export function selectCodec(table: Readonly<Record<string, GmshVersionCodec>>, version: string): GmshVersionCodec {
  const exact = table[version];
  if (exact !== undefined) {
    return exact;
  }
  const major = table[version.split('.')[0]];
  if (major !== undefined) {
    return major;
  }
  throw new UnsupportedVersionError(version, Object.keys(table).sort());
}

// ============================================================================
// Header
// ============================================================================

/**
 * Consume leading `$Comments` blocks and the `$MeshFormat` section
 */
export function readHeader(reader: ByteReader): GmshHeader {
  let line = (reader.readLine() ?? '').trim();
  while (line === '$Comments') {
    while (line !== '$EndComments') {
      const next = reader.readLine();
      if (next === null) {
        throw new FormatError('$Comments has no $EndComments marker');
      }
      line = next.trim();
    }
    line = (reader.readLine() ?? '').trim();
  }
  if (line !== '$MeshFormat') {
    throw new FormatError(`Expected $MeshFormat, got "${line.slice(0, 40)}"`);
  }

  const words = reader.expectLine('$MeshFormat').trim().split(/\s+/);
  if (words.length < 3) {
    throw new FormatError(`Malformed $MeshFormat declaration "${words.join(' ')}"`);
  }
  const [version, mode, size] = words;
  if (mode !== '0' && mode !== '1') {
    throw new FormatError(`File type must be 0 (ASCII) or 1 (binary), got "${mode}"`);
  }
  const dataSize = Number(size);
  if (!Number.isInteger(dataSize)) {
    throw new FormatError(`Invalid data size "${size}" in $MeshFormat`);
  }
  const isAscii = mode === '0';

  if (!isAscii) {
    const [one] = reader.unpack('i', 'binary endianness marker');
    if (one !== 1) {
      throw new FormatError(`Binary endianness marker is ${one}, expected 1`);
    }
  }

  let end = reader.readLine();
  while (end !== null && end.trim() !== '$EndMeshFormat') {
    end = reader.readLine();
  }
  if (end === null) {
    throw new FormatError('$MeshFormat has no $EndMeshFormat marker');
  }
  return { version, dataSize, isAscii };
}

// ============================================================================
// Public API
// ============================================================================

export function decodeGmsh(bytes: Uint8Array, options: GmshReadOptions = {}): Mesh {
  const reader = new ByteReader(bytes);
  const header = readHeader(reader);
  const codec = selectCodec(READERS, header.version);
  debugLog(
    options.debug,
    `gmsh: version ${header.version} (${header.isAscii ? 'ascii' : 'binary'}, size_t ${header.dataSize}) -> ${codec.version}`
  );
  return codec.read(reader, header, options);
}

/**
 * Encode a mesh. Fails before producing any output when the mesh holds data
 * the chosen version cannot represent.
 */
export function encodeGmsh(mesh: Mesh, options: GmshWriteOptions = {}): Uint8Array {
  const { version = '4.1', binary = true } = options;
  return selectCodec(WRITERS, version).write(mesh, binary, options);
}

export function readGmsh(path: string, options: GmshReadOptions = {}): Mesh {
  return decodeGmsh(readFileSync(path), options);
}

/**
 * Write a mesh to `path`. The file is only created once encoding succeeded.
 */
export function writeGmsh(path: string, mesh: Mesh, options: GmshWriteOptions = {}): void {
  const bytes = encodeGmsh(mesh, options);
  writeFileSync(path, bytes);
  debugLog(options.debug, `gmsh: wrote ${bytes.byteLength} bytes to ${path}`);
}

export const gmshReaders = READERS;
export const gmshWriters = WRITERS;
