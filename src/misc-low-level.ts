/**
 * Low-level HDF5 structures
 * SuperBlock, Heap, SymbolTable
 */

import { metadataChecksum } from './checksum.js';
import { _structure_size, _unpack_struct_from, assert, struct, UNDEFINED_ADDRESS } from './core.js';
import type { UnpackedStruct } from './core.js';
import { FormatError } from './errors.js';
import type { StructureDefinition } from './types/binary.js';
import { FORMAT_SIGNATURE } from './types/hdf5.js';
import type { Links } from './types/hdf5.js';

// ============================================================================
// Structure Definitions
// ============================================================================

// Version 0 SUPERBLOCK
const SUPERBLOCK_V0: StructureDefinition = new Map([
  ['format_signature', '8s'],
  ['superblock_version', 'B'],
  ['free_storage_version', 'B'],
  ['root_group_version', 'B'],
  ['reserved_0', 'B'],
  ['shared_header_version', 'B'],
  ['offset_size', 'B'],
  ['length_size', 'B'],
  ['reserved_1', 'B'],
  ['group_leaf_node_k', 'H'],
  ['group_internal_node_k', 'H'],
  ['file_consistency_flags', 'L'],
  ['base_address_lower', 'Q'],
  ['free_space_address', 'Q'],
  ['end_of_file_address', 'Q'],
  ['driver_information_address', 'Q'],
]);
const SUPERBLOCK_V0_SIZE = _structure_size(SUPERBLOCK_V0);

// Version 2/3 SUPERBLOCK
export const SUPERBLOCK_V2_V3: StructureDefinition = new Map([
  ['format_signature', '8s'],
  ['superblock_version', 'B'],
  ['offset_size', 'B'],
  ['length_size', 'B'],
  ['file_consistency_flags', 'B'],
  ['base_address', 'Q'],
  ['superblock_extension_address', 'Q'],
  ['end_of_file_address', 'Q'],
  ['root_group_address', 'Q'],
  ['superblock_checksum', 'I'],
]);
export const SUPERBLOCK_V2_V3_SIZE = _structure_size(SUPERBLOCK_V2_V3);

// Symbol Table Entry
const SYMBOL_TABLE_ENTRY: StructureDefinition = new Map([
  ['link_name_offset', 'Q'],
  ['object_header_address', 'Q'],
  ['cache_type', 'I'],
  ['reserved', 'I'],
  ['scratch_link_offset', 'I'],
  ['scratch', '12s'],
]);
const SYMBOL_TABLE_ENTRY_SIZE = _structure_size(SYMBOL_TABLE_ENTRY);

// Symbol Table Node
const SYMBOL_TABLE_NODE: StructureDefinition = new Map([
  ['signature', '4s'],
  ['version', 'B'],
  ['reserved_0', 'B'],
  ['symbols', 'H'],
]);
const SYMBOL_TABLE_NODE_SIZE = _structure_size(SYMBOL_TABLE_NODE);

// Local Heap
const LOCAL_HEAP: StructureDefinition = new Map([
  ['signature', '4s'],
  ['version', 'B'],
  ['reserved', '3s'],
  ['data_segment_size', 'Q'],
  ['offset_to_free_list', 'Q'],
  ['address_of_data_segment', 'Q'],
]);

// ============================================================================
// SuperBlock Class
// ============================================================================

function hasSignature(fh: Uint8Array, offset: number): boolean {
  if (fh.byteLength < offset + FORMAT_SIGNATURE.length) {
    return false;
  }
  return FORMAT_SIGNATURE.every((byte, i) => fh[offset + i] === byte);
}

export class SuperBlock {
  version: number;
  private _contents: UnpackedStruct;
  private _end_of_sblock: number;
  private _fh: Uint8Array;

  constructor(fh: Uint8Array, offset: number) {
    if (!hasSignature(fh, offset)) {
      throw new FormatError('Not an HDF5 file: incorrect file signature');
    }
    const versionHint = struct.unpack_from('<B', fh, offset + 8)[0];
    let contents: UnpackedStruct;

    if (versionHint === 0) {
      contents = _unpack_struct_from(SUPERBLOCK_V0, fh, offset);
      this._end_of_sblock = offset + SUPERBLOCK_V0_SIZE;
    } else if (versionHint === 2 || versionHint === 3) {
      contents = _unpack_struct_from(SUPERBLOCK_V2_V3, fh, offset);
      this._end_of_sblock = offset + SUPERBLOCK_V2_V3_SIZE;
      const stored = contents.get('superblock_checksum');
      const computed = metadataChecksum(fh.subarray(offset, this._end_of_sblock - 4));
      if (stored !== computed) {
        throw new FormatError('Superblock checksum mismatch');
      }
    } else {
      throw new FormatError('Unsupported superblock version: ' + versionHint.toFixed());
    }

    if (contents.get('offset_size') !== 8 || contents.get('length_size') !== 8) {
      throw new FormatError('File uses non-64-bit addressing');
    }

    this.version = contents.get('superblock_version');
    this._contents = contents;
    this._fh = fh;
  }

  get offset_to_dataobjects(): number {
    if (this.version === 0) {
      const symTable = new SymbolTable(this._fh, this._end_of_sblock, true);
      return symTable.group_offset;
    }
    return this._contents.get('root_group_address');
  }
}

// ============================================================================
// Heap Class
// ============================================================================

export class Heap {
  data: Uint8Array;

  constructor(fh: Uint8Array, offset: number) {
    const localHeap = _unpack_struct_from(LOCAL_HEAP, fh, offset);
    assert(localHeap.getString('signature') === 'HEAP', 'Local heap signature not found');
    assert(localHeap.get('version') === 0, 'Unsupported local heap version');

    const dataOffset = localHeap.get('address_of_data_segment');
    const dataSize = localHeap.get('data_segment_size');
    this.data = fh.subarray(dataOffset, dataOffset + dataSize);
  }

  get_object_name(offset: number): string {
    const end = this.data.indexOf(0, offset);
    return struct.unpack_string((end < 0 ? this.data.length : end) - offset, this.data, offset);
  }
}

// ============================================================================
// SymbolTable Class
// ============================================================================

export class SymbolTable {
  entries: UnpackedStruct[];
  /** Object header of the single entry of a root symbol table */
  group_offset: number;
  private _names: Map<UnpackedStruct, string>;

  constructor(fh: Uint8Array, offset: number, root: boolean = false) {
    let symbols: number;

    if (root) {
      // The root symbol table has no Symbol table node header
      // and contains only a single entry
      symbols = 1;
    } else {
      const node = _unpack_struct_from(SYMBOL_TABLE_NODE, fh, offset);
      if (node.getString('signature') !== 'SNOD') {
        throw new FormatError('incorrect node type');
      }
      symbols = node.get('symbols');
      offset += SYMBOL_TABLE_NODE_SIZE;
    }

    const entries: UnpackedStruct[] = [];
    for (let i = 0; i < symbols; i++) {
      entries.push(_unpack_struct_from(SYMBOL_TABLE_ENTRY, fh, offset));
      offset += SYMBOL_TABLE_ENTRY_SIZE;
    }

    this.group_offset = root ? entries[0].get('object_header_address') : UNDEFINED_ADDRESS;
    this.entries = entries;
    this._names = new Map();
  }

  assign_name(heap: Heap): void {
    for (const entry of this.entries) {
      this._names.set(entry, heap.get_object_name(entry.get('link_name_offset')));
    }
  }

  get_links(heap: Heap): Links {
    const links: Links = new Map();

    for (const entry of this.entries) {
      const cacheType = entry.get('cache_type');
      const linkName = this._names.get(entry) ?? heap.get_object_name(entry.get('link_name_offset'));

      if (cacheType === 0 || cacheType === 1) {
        links.set(linkName, entry.get('object_header_address'));
      } else if (cacheType === 2) {
        // soft link: the scratch pad holds the heap offset of the link value
        links.set(linkName, heap.get_object_name(entry.get('scratch_link_offset')));
      }
    }

    return links;
  }
}
