/**
 * HDF5 Core Type Definitions
 */

import type { DtypeName } from './dtype.js';

// ============================================================================
// Constants
// ============================================================================

/** HDF5 format signature bytes: \x89HDF\r\n\x1a\n */
export const FORMAT_SIGNATURE = new Uint8Array([137, 72, 68, 70, 13, 10, 26, 10]);

// ============================================================================
// Datatype Classes (IV.A.2.d)
// ============================================================================

export enum DatatypeClass {
  FIXED_POINT = 0,
  FLOATING_POINT = 1,
  TIME = 2,
  STRING = 3,
  BITFIELD = 4,
  OPAQUE = 5,
  COMPOUND = 6,
  REFERENCE = 7,
  ENUMERATED = 8,
  VARIABLE_LENGTH = 9,
  ARRAY = 10,
}

// ============================================================================
// Message Types (IV.A.2)
// ============================================================================

export enum MessageType {
  NIL = 0x0000,
  DATASPACE = 0x0001,
  LINK_INFO = 0x0002,
  DATATYPE = 0x0003,
  FILL_VALUE_OLD = 0x0004,
  FILL_VALUE = 0x0005,
  LINK = 0x0006,
  EXTERNAL_FILE_LIST = 0x0007,
  DATA_LAYOUT = 0x0008,
  BOGUS = 0x0009,
  GROUP_INFO = 0x000a,
  FILTER_PIPELINE = 0x000b,
  ATTRIBUTE = 0x000c,
  OBJECT_COMMENT = 0x000d,
  OBJECT_MODIFICATION_TIME_OLD = 0x000e,
  SHARED_MESSAGE_TABLE = 0x000f,
  OBJECT_CONTINUATION = 0x0010,
  SYMBOL_TABLE = 0x0011,
  OBJECT_MODIFICATION_TIME = 0x0012,
  BTREE_K_VALUES = 0x0013,
  DRIVER_INFO = 0x0014,
  ATTRIBUTE_INFO = 0x0015,
  OBJECT_REFERENCE_COUNT = 0x0016,
}

// ============================================================================
// Data Layout Classes
// ============================================================================

export enum LayoutClass {
  COMPACT = 0,
  CONTIGUOUS = 1,
  CHUNKED = 2,
  VIRTUAL = 3,
}

// ============================================================================
// Filter IDs (IV.A.2.l)
// ============================================================================

export enum FilterId {
  RESERVED = 0,
  GZIP_DEFLATE = 1,
  SHUFFLE = 2,
  FLETCHER32 = 3,
  SZIP = 4,
  NBIT = 5,
  SCALEOFFSET = 6,
}

// ============================================================================
// Parsed Structures
// ============================================================================

/** One message in an object header, located in the file buffer */
export interface HeaderMessage {
  type: number;
  size: number;
  flags: number;
  /** Absolute offset of the message body */
  offset: number;
}

/** Numeric element type of a dataset */
export interface H5Datatype {
  dtype: DtypeName;
  littleEndian: boolean;
}

export interface FilterInfo {
  id: number;
  name: string | null;
  optional: boolean;
  clientData: number[];
}

/** Key of a raw-data chunk in a version 1 B-tree */
export interface ChunkKey {
  /** Stored (possibly filtered) size in bytes */
  size: number;
  filterMask: number;
  /** Element offsets of the chunk, one per dimension plus the element-size dimension */
  offset: number[];
}

/** Hard links resolve to an object header address, soft links to a path */
export type LinkTarget = number | string;

/** Links of a group, in storage order */
export type Links = Map<string, LinkTarget>;
