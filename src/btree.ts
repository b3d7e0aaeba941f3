/**
 * HDF5 version 1 B-Trees: group nodes and raw data chunk nodes
 */

import { _structure_size, _unpack_struct_from, struct } from './core.js';
import type { UnpackedStruct } from './core.js';
import { FormatError, UnsupportedTypeError } from './errors.js';
import { Filters } from './filters.js';
import { product } from './ndarray.js';
import type { StructureDefinition } from './types/binary.js';
import type { ChunkKey, FilterInfo } from './types/hdf5.js';

interface BTreeNode<K> {
  header: UnpackedStruct;
  node_level: number;
  keys: K[];
  addresses: number[];
}

const B_LINK_NODE: StructureDefinition = new Map([
  ['signature', '4s'],
  ['node_type', 'B'],
  ['node_level', 'B'],
  ['entries_used', 'H'],
  ['left_sibling', 'Q'],
  ['right_sibling', 'Q'],
]);
const B_LINK_NODE_SIZE = _structure_size(B_LINK_NODE);

// ============================================================================
// B-Tree V1
// ============================================================================

abstract class BTreeV1<K> {
  protected fh: Uint8Array;
  protected offset: number;
  protected depth: number;
  protected all_nodes: Map<number, BTreeNode<K>[]>;
  protected abstract readonly NODE_TYPE: number;

  constructor(fh: Uint8Array, offset: number) {
    this.fh = fh;
    this.offset = offset;
    this.depth = 0;
    this.all_nodes = new Map();
  }

  protected init(): void {
    this.all_nodes = new Map();
    const rootNode = this._read_node(this.offset, null);
    this._add_node(rootNode);
    this.depth = rootNode.node_level;
    this._read_children();
  }

  private _read_children(): void {
    for (let nodeLevel = this.depth; nodeLevel > 0; nodeLevel--) {
      for (const parentNode of this.all_nodes.get(nodeLevel) ?? []) {
        for (const childAddr of parentNode.addresses) {
          this._add_node(this._read_node(childAddr, nodeLevel - 1));
        }
      }
    }
  }

  private _add_node(node: BTreeNode<K>): void {
    const level = this.all_nodes.get(node.node_level);
    if (level) {
      level.push(node);
    } else {
      this.all_nodes.set(node.node_level, [node]);
    }
  }

  protected _read_node_header(offset: number, nodeLevel: number | null): UnpackedStruct {
    const node = _unpack_struct_from(B_LINK_NODE, this.fh, offset);
    if (node.getString('signature') !== 'TREE') {
      throw new FormatError('B-tree node signature not found');
    }
    if (node.get('node_type') !== this.NODE_TYPE) {
      throw new FormatError('B-tree node type does not match');
    }
    if (nodeLevel !== null && node.get('node_level') !== nodeLevel) {
      throw new FormatError('node level does not match');
    }
    return node;
  }

  private _read_node(offset: number, nodeLevel: number | null): BTreeNode<K> {
    const header = this._read_node_header(offset, nodeLevel);
    const node: BTreeNode<K> = { header, node_level: header.get('node_level'), keys: [], addresses: [] };
    this._read_entries(node, offset + B_LINK_NODE_SIZE);
    return node;
  }

  protected abstract _read_entries(node: BTreeNode<K>, offset: number): void;

  protected leaves(): BTreeNode<K>[] {
    return this.all_nodes.get(0) ?? [];
  }
}

// ============================================================================
// B-Tree V1 Groups (Type 0)
// ============================================================================

export class BTreeV1Groups extends BTreeV1<number> {
  protected readonly NODE_TYPE = 0;

  constructor(fh: Uint8Array, offset: number) {
    super(fh, offset);
    this.init();
  }

  protected _read_entries(node: BTreeNode<number>, offset: number): void {
    const entriesUsed = node.header.get('entries_used');
    for (let i = 0; i < entriesUsed; i++) {
      const [key, address] = struct.unpack_from('<2Q', this.fh, offset);
      offset += 16;
      node.keys.push(key);
      node.addresses.push(address);
    }
    // N+1 key
    node.keys.push(struct.unpack_from('<Q', this.fh, offset)[0]);
  }

  symbol_table_addresses(): number[] {
    return this.leaves().flatMap((node) => node.addresses);
  }
}

// ============================================================================
// B-Tree V1 Raw Data Chunks (Type 1)
// ============================================================================

export class BTreeV1RawDataChunks extends BTreeV1<ChunkKey> {
  protected readonly NODE_TYPE = 1;
  private dims: number;

  /**
   * @param dims - dataset rank plus one (the element-size dimension)
   */
  constructor(fh: Uint8Array, offset: number, dims: number) {
    super(fh, offset);
    this.dims = dims;
    this.init();
  }

  protected _read_entries(node: BTreeNode<ChunkKey>, offset: number): void {
    const entriesUsed = node.header.get('entries_used');
    const fmt = '<' + this.dims.toFixed() + 'Q';
    const fmtSize = struct.calcsize(fmt);

    for (let i = 0; i < entriesUsed; i++) {
      const [chunkSize, filterMask] = struct.unpack_from('<2I', this.fh, offset);
      offset += 8;
      const chunkOffset = struct.unpack_from(fmt, this.fh, offset);
      offset += fmtSize;
      const chunkAddress = struct.unpack_from('<Q', this.fh, offset)[0];
      offset += 8;

      node.keys.push({ size: chunkSize, filterMask, offset: chunkOffset });
      node.addresses.push(chunkAddress);
    }
  }

  /**
   * Assemble the element bytes of the whole dataset, row-major, in the
   * byte order of the file
   */
  construct_data_from_chunks(
    chunkShape: number[],
    dataShape: number[],
    itemSize: number,
    filterPipeline: FilterInfo[] | null
  ): Uint8Array {
    const rank = dataShape.length;
    const chunkCount = product(chunkShape);
    const chunkBufferSize = chunkCount * itemSize;
    const out = new Uint8Array(product(dataShape) * itemSize);

    const dataStrides: number[] = new Array<number>(rank);
    let stride = 1;
    for (let d = rank - 1; d >= 0; d--) {
      dataStrides[d] = stride;
      stride *= dataShape[d];
    }

    for (const node of this.leaves()) {
      node.keys.forEach((key, ik) => {
        const addr = node.addresses[ik];
        let chunk: Uint8Array;
        if (filterPipeline === null) {
          chunk = this.fh.subarray(addr, addr + chunkBufferSize);
        } else {
          chunk = this._filter_chunk(this.fh.subarray(addr, addr + key.size), key.filterMask, filterPipeline, itemSize);
        }
        if (chunk.byteLength < chunkBufferSize) {
          throw new FormatError('Chunk is shorter than its declared shape');
        }

        const cpos = new Array<number>(rank).fill(0);
        for (let ci = 0; ci < chunkCount; ci++) {
          let inbounds = true;
          let ai = 0;
          for (let d = 0; d < rank; d++) {
            const p = key.offset[d] + cpos[d];
            if (p >= dataShape[d]) {
              inbounds = false;
              break;
            }
            ai += p * dataStrides[d];
          }
          if (inbounds) {
            out.set(chunk.subarray(ci * itemSize, (ci + 1) * itemSize), ai * itemSize);
          }
          for (let d = rank - 1; d >= 0; d--) {
            cpos[d] += 1;
            if (cpos[d] < chunkShape[d]) break;
            cpos[d] = 0;
          }
        }
      });
    }

    return out;
  }

  private _filter_chunk(
    chunkBuffer: Uint8Array,
    filterMask: number,
    filterPipeline: FilterInfo[],
    itemsize: number
  ): Uint8Array {
    let buf = chunkBuffer;

    for (let filterIndex = filterPipeline.length - 1; filterIndex >= 0; filterIndex--) {
      // Skip if bit is set in filter_mask
      if (filterMask & (1 << filterIndex)) {
        continue;
      }
      const filterId = filterPipeline[filterIndex].id;
      const filterFn = Filters.get(filterId);
      if (filterFn === undefined) {
        throw new UnsupportedTypeError('Filter with id ' + filterId.toFixed() + ' not supported');
      }
      buf = filterFn(buf, itemsize);
    }

    return buf;
  }
}
