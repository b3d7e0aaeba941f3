/**
 * Gmsh codec type definitions
 */

import type { ByteReader } from '../byte-reader.js';
import type { Mesh } from '../mesh.js';

export interface GmshReadOptions {
  /** Trace skipped sections and block counts */
  debug?: boolean;
}

export interface GmshWriteOptions {
  /**
   * Format version, matched exactly and then by its major part
   * @default '4.1'
   */
  version?: string;
  /** @default true */
  binary?: boolean;
  debug?: boolean;
}

/** Declaration found in `$MeshFormat` */
export interface GmshHeader {
  version: string;
  /** Declared word size (size of size_t) */
  dataSize: number;
  isAscii: boolean;
}

/** Decode/encode pair for one format version */
export interface GmshVersionCodec {
  readonly version: string;
  read(reader: ByteReader, header: GmshHeader, options: GmshReadOptions): Mesh;
  write(mesh: Mesh, binary: boolean, options: GmshWriteOptions): Uint8Array;
}
