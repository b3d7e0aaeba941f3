/**
 * HDF5 DataObjects - object header parsing, links and dataset storage
 */

import { BTreeV1Groups, BTreeV1RawDataChunks } from './btree.js';
import { metadataChecksum } from './checksum.js';
import {
  _padded_size,
  _structure_size,
  _unpack_struct_from,
  assert,
  struct,
  UNDEFINED_ADDRESS,
} from './core.js';
import type { UnpackedStruct } from './core.js';
import { DatatypeMessage } from './datatype-msg.js';
import { FormatError, UnsupportedTypeError } from './errors.js';
import { Heap, SymbolTable } from './misc-low-level.js';
import { fromBytes, itemSize, product, zeros } from './ndarray.js';
import type { StructureDefinition } from './types/binary.js';
import type { NdArray } from './types/dtype.js';
import { LayoutClass, MessageType } from './types/hdf5.js';
import type { FilterInfo, H5Datatype, HeaderMessage, LinkTarget, Links } from './types/hdf5.js';

// ============================================================================
// Structure Definitions
// ============================================================================

const OBJECT_HEADER_V1: StructureDefinition = new Map([
  ['version', 'B'],
  ['reserved', 'B'],
  ['total_header_messages', 'H'],
  ['object_reference_count', 'I'],
  ['object_header_size', 'I'],
  ['padding', 'I'],
]);
const OBJECT_HEADER_V1_SIZE = _structure_size(OBJECT_HEADER_V1);

const OBJECT_HEADER_V2: StructureDefinition = new Map([
  ['signature', '4s'],
  ['version', 'B'],
  ['flags', 'B'],
]);
const OBJECT_HEADER_V2_SIZE = _structure_size(OBJECT_HEADER_V2);

const DATASPACE_MSG_HEADER_V1: StructureDefinition = new Map([
  ['version', 'B'],
  ['dimensionality', 'B'],
  ['flags', 'B'],
  ['reserved_0', 'B'],
  ['reserved_1', 'I'],
]);
const DATASPACE_MSG_HEADER_V1_SIZE = _structure_size(DATASPACE_MSG_HEADER_V1);

const DATASPACE_MSG_HEADER_V2: StructureDefinition = new Map([
  ['version', 'B'],
  ['dimensionality', 'B'],
  ['flags', 'B'],
  ['type', 'B'],
]);
const DATASPACE_MSG_HEADER_V2_SIZE = _structure_size(DATASPACE_MSG_HEADER_V2);

const HEADER_MSG_INFO_V1: StructureDefinition = new Map([
  ['type', 'H'],
  ['size', 'H'],
  ['flags', 'B'],
  ['reserved', '3s'],
]);
const HEADER_MSG_INFO_V1_SIZE = _structure_size(HEADER_MSG_INFO_V1);

const HEADER_MSG_INFO_V2: StructureDefinition = new Map([
  ['type', 'B'],
  ['size', 'H'],
  ['flags', 'B'],
]);
const HEADER_MSG_INFO_V2_SIZE = _structure_size(HEADER_MSG_INFO_V2);

const SYMBOL_TABLE_MSG: StructureDefinition = new Map([
  ['btree_address', 'Q'],
  ['heap_address', 'Q'],
]);

const LINK_INFO_MSG: StructureDefinition = new Map([
  ['heap_address', 'Q'],
  ['name_btree_address', 'Q'],
]);

const FILTER_PIPELINE_DESCR_V1: StructureDefinition = new Map([
  ['filter_id', 'H'],
  ['name_length', 'H'],
  ['flags', 'H'],
  ['client_data_values', 'H'],
]);
const FILTER_PIPELINE_DESCR_V1_SIZE = _structure_size(FILTER_PIPELINE_DESCR_V1);

// ============================================================================
// Helper Functions
// ============================================================================

function determine_data_shape(buf: Uint8Array, offset: number): number[] {
  const version = struct.unpack_from('<B', buf, offset)[0];
  let header: UnpackedStruct;

  if (version === 1) {
    header = _unpack_struct_from(DATASPACE_MSG_HEADER_V1, buf, offset);
    offset += DATASPACE_MSG_HEADER_V1_SIZE;
  } else if (version === 2) {
    header = _unpack_struct_from(DATASPACE_MSG_HEADER_V2, buf, offset);
    offset += DATASPACE_MSG_HEADER_V2_SIZE;
  } else {
    throw new FormatError('unknown dataspace message version ' + version.toFixed());
  }

  const ndims = header.get('dimensionality');
  return ndims === 0 ? [] : struct.unpack_from('<' + ndims.toFixed() + 'Q', buf, offset);
}

// ============================================================================
// DataObjects Class
// ============================================================================

export class DataObjects {
  fh: Uint8Array;
  msgs: HeaderMessage[];
  offset: number;
  private _filter_pipeline: FilterInfo[] | null | undefined;

  constructor(fh: Uint8Array, offset: number) {
    const versionHint = struct.unpack_from('<B', fh, offset)[0];

    this.fh = fh;
    this.offset = offset;
    if (versionHint === 1) {
      this.msgs = this._parse_v1_objects(fh, offset);
    } else if (versionHint === 'O'.charCodeAt(0)) {
      this.msgs = this._parse_v2_objects(fh, offset);
    } else {
      throw new FormatError('unknown Data Object Header at offset ' + offset.toFixed());
    }
  }

  find_msg_type(msgType: MessageType): HeaderMessage[] {
    return this.msgs.filter((m) => m.type === msgType);
  }

  private _first_msg(msgType: MessageType): HeaderMessage {
    const [msg] = this.find_msg_type(msgType);
    if (msg === undefined) {
      throw new FormatError(`Object header has no ${MessageType[msgType]} message`);
    }
    return msg;
  }

  get is_dataset(): boolean {
    return this.find_msg_type(MessageType.DATASPACE).length > 0;
  }

  get datatype(): H5Datatype {
    return new DatatypeMessage(this.fh, this._first_msg(MessageType.DATATYPE).offset).datatype;
  }

  get shape(): number[] {
    return determine_data_shape(this.fh, this._first_msg(MessageType.DATASPACE).offset);
  }

  get filter_pipeline(): FilterInfo[] | null {
    if (this._filter_pipeline !== undefined) {
      return this._filter_pipeline;
    }

    const filterMsgs = this.find_msg_type(MessageType.FILTER_PIPELINE);
    if (!filterMsgs.length) {
      this._filter_pipeline = null;
      return this._filter_pipeline;
    }

    let offset = filterMsgs[0].offset;
    const [version, nfilters] = struct.unpack_from('<2B', this.fh, offset);
    offset += 2;

    const filters: FilterInfo[] = [];

    if (version === 1) {
      offset += struct.calcsize('<HI');

      for (let i = 0; i < nfilters; i++) {
        const info = _unpack_struct_from(FILTER_PIPELINE_DESCR_V1, this.fh, offset);
        offset += FILTER_PIPELINE_DESCR_V1_SIZE;

        const nameLength = info.get('name_length');
        const paddedNameLength = _padded_size(nameLength, 8);
        const name = nameLength > 0 ? struct.unpack_string(nameLength, this.fh, offset).replace(/\0+$/, '') : null;
        offset += paddedNameLength;

        const clientDataValues = info.get('client_data_values');
        const clientData =
          clientDataValues > 0 ? struct.unpack_from('<' + clientDataValues.toFixed() + 'I', this.fh, offset) : [];
        offset += 4 * clientDataValues;
        if (clientDataValues % 2) {
          offset += 4;
        }

        filters.push({ id: info.get('filter_id'), name, optional: (info.get('flags') & 1) > 0, clientData });
      }
    } else if (version === 2) {
      for (let nf = 0; nf < nfilters; nf++) {
        const id = struct.unpack_from('<H', this.fh, offset)[0];
        offset += 2;

        let nameLength = 0;
        if (id > 255) {
          nameLength = struct.unpack_from('<H', this.fh, offset)[0];
          offset += 2;
        }

        const [flags, numClientValues] = struct.unpack_from('<2H', this.fh, offset);
        offset += 4;

        let name: string | null = null;
        if (nameLength > 0) {
          name = struct.unpack_string(nameLength, this.fh, offset).replace(/\0+$/, '');
          offset += nameLength;
        }

        const clientData =
          numClientValues > 0 ? struct.unpack_from('<' + numClientValues.toFixed() + 'I', this.fh, offset) : [];
        offset += 4 * numClientValues;

        filters.push({ id, name, optional: (flags & 1) > 0, clientData });
      }
    } else {
      throw new FormatError(`filter pipeline version ${version} is not supported`);
    }

    this._filter_pipeline = filters;
    return this._filter_pipeline;
  }

  // ==========================================================================
  // Object headers
  // ==========================================================================

  private _parse_v1_objects(buf: Uint8Array, offset: number): HeaderMessage[] {
    const header = _unpack_struct_from(OBJECT_HEADER_V1, buf, offset);
    assert(header.get('version') === 1, 'unsupported object header version');

    const totalHeaderMessages = header.get('total_header_messages');
    let blockSize = header.get('object_header_size');
    let blockOffset = offset + OBJECT_HEADER_V1_SIZE;
    const objectHeaderBlocks: Array<[number, number]> = [[blockOffset, blockSize]];
    let currentBlock = 0;
    let localOffset = 0;

    const msgs: HeaderMessage[] = [];

    for (let i = 0; i < totalHeaderMessages; i++) {
      if (localOffset >= blockSize) {
        const next = objectHeaderBlocks[++currentBlock];
        if (next === undefined) {
          throw new FormatError('object header ends before its declared message count');
        }
        [blockOffset, blockSize] = next;
        localOffset = 0;
      }

      const info = _unpack_struct_from(HEADER_MSG_INFO_V1, buf, blockOffset + localOffset);
      const msg: HeaderMessage = {
        type: info.get('type'),
        size: info.get('size'),
        flags: info.get('flags'),
        offset: blockOffset + localOffset + HEADER_MSG_INFO_V1_SIZE,
      };

      if (msg.type === MessageType.OBJECT_CONTINUATION) {
        const [fhOff, size] = struct.unpack_from('<2Q', buf, msg.offset);
        objectHeaderBlocks.push([fhOff, size]);
      }

      localOffset += HEADER_MSG_INFO_V1_SIZE + msg.size;
      msgs.push(msg);
    }

    return msgs;
  }

  private _parse_v2_objects(buf: Uint8Array, offset: number): HeaderMessage[] {
    const [chunkSize, creationOrderSize, startOffset] = this._parse_v2_header(buf, offset);

    const checksumAt = startOffset + chunkSize;
    const stored = struct.unpack_from('<I', buf, checksumAt)[0];
    if (stored !== metadataChecksum(buf.subarray(offset, checksumAt))) {
      throw new FormatError('Object header checksum mismatch at offset ' + offset.toFixed());
    }

    const msgs: HeaderMessage[] = [];
    const objectHeaderBlocks: Array<[number, number]> = [[startOffset, chunkSize]];
    let [blockOffset, blockSize] = objectHeaderBlocks[0];
    let currentBlock = 0;
    let localOffset = 0;

    for (;;) {
      if (localOffset >= blockSize - HEADER_MSG_INFO_V2_SIZE) {
        const nextBlock = objectHeaderBlocks[++currentBlock];
        if (nextBlock === undefined) {
          break;
        }
        [blockOffset, blockSize] = nextBlock;
        localOffset = 0;
      }

      const info = _unpack_struct_from(HEADER_MSG_INFO_V2, buf, blockOffset + localOffset);
      const msg: HeaderMessage = {
        type: info.get('type'),
        size: info.get('size'),
        flags: info.get('flags'),
        offset: blockOffset + localOffset + HEADER_MSG_INFO_V2_SIZE + creationOrderSize,
      };

      if (msg.type === MessageType.OBJECT_CONTINUATION) {
        // continuation blocks start with "OCHK" and end with a checksum
        const [fhOff, size] = struct.unpack_from('<2Q', buf, msg.offset);
        objectHeaderBlocks.push([fhOff + 4, size - 4]);
      }

      localOffset += HEADER_MSG_INFO_V2_SIZE + msg.size + creationOrderSize;
      msgs.push(msg);
    }

    return msgs;
  }

  private _parse_v2_header(buf: Uint8Array, offset: number): [chunkSize: number, creationOrderSize: number, start: number] {
    const header = _unpack_struct_from(OBJECT_HEADER_V2, buf, offset);
    offset += OBJECT_HEADER_V2_SIZE;
    assert(header.getString('signature') === 'OHDR', 'object header signature not found');
    assert(header.get('version') === 2, 'unsupported object header version');

    const flags = header.get('flags');
    const creationOrderSize = flags & 0b00000100 ? 2 : 0;

    if (flags & 0b00010000) {
      // attribute phase change values
      offset += 4;
    }
    if (flags & 0b00100000) {
      // access, modification, change and birth times
      offset += 16;
    }

    const chunkFmt = ['<B', '<H', '<I', '<Q'][flags & 0b00000011];
    const chunkSize = struct.unpack_from(chunkFmt, buf, offset)[0];
    offset += struct.calcsize(chunkFmt);

    return [chunkSize, creationOrderSize, offset];
  }

  // ==========================================================================
  // Links
  // ==========================================================================

  get_links(): Links {
    return new Map(this.iter_links());
  }

  *iter_links(): Generator<[string, LinkTarget]> {
    for (const msg of this.msgs) {
      if (msg.type === MessageType.SYMBOL_TABLE) {
        yield* this._iter_links_from_symbol_tables(msg);
      } else if (msg.type === MessageType.LINK) {
        yield this._decode_link_msg(msg.offset);
      } else if (msg.type === MessageType.LINK_INFO) {
        this._check_link_info_msg(msg);
      }
    }
  }

  private *_iter_links_from_symbol_tables(symTblMsg: HeaderMessage): Generator<[string, LinkTarget]> {
    assert(symTblMsg.size === 16, 'symbol table message has the wrong size');
    const data = _unpack_struct_from(SYMBOL_TABLE_MSG, this.fh, symTblMsg.offset);
    const btree = new BTreeV1Groups(this.fh, data.get('btree_address'));
    const heap = new Heap(this.fh, data.get('heap_address'));

    for (const symbolTableAddress of btree.symbol_table_addresses()) {
      const table = new SymbolTable(this.fh, symbolTableAddress);
      table.assign_name(heap);
      yield* table.get_links(heap);
    }
  }

  private _decode_link_msg(offset: number): [string, LinkTarget] {
    const data = this.fh;
    const [version, flags] = struct.unpack_from('<2B', data, offset);
    offset += 2;
    assert(version === 1, 'unsupported link message version');

    const linkTypeFieldPresent = (flags & (2 ** 3)) > 0;
    const linkNameCharacterSetFieldPresent = (flags & (2 ** 4)) > 0;
    const ordered = (flags & (2 ** 2)) > 0;

    let linkType = 0;
    if (linkTypeFieldPresent) {
      linkType = struct.unpack_from('<B', data, offset)[0];
      offset += 1;
    }
    if (ordered) {
      offset += 8;
    }
    if (linkNameCharacterSetFieldPresent) {
      offset += 1;
    }

    const nameSizeFmt = ['<B', '<H', '<I', '<Q'][flags & 3];
    const nameSize = struct.unpack_from(nameSizeFmt, data, offset)[0];
    offset += struct.calcsize(nameSizeFmt);

    const name = struct.unpack_string(nameSize, data, offset);
    offset += nameSize;

    if (linkType === 0) {
      return [name, struct.unpack_from('<Q', data, offset)[0]];
    }
    if (linkType === 1) {
      const lengthOfSoftLinkValue = struct.unpack_from('<H', data, offset)[0];
      return [name, struct.unpack_string(lengthOfSoftLinkValue, data, offset + 2)];
    }
    throw new UnsupportedTypeError(`Link "${name}" has unsupported link type ${linkType}`);
  }

  /**
   * Compact groups list their links as messages; dense storage keeps them in
   * a fractal heap indexed by a version 2 B-tree
   */
  private _check_link_info_msg(infoMsg: HeaderMessage): void {
    let offset = infoMsg.offset;
    const [version, flags] = struct.unpack_from('<2B', this.fh, offset);
    assert(version === 0, 'unsupported link info message version');
    offset += 2;
    if ((flags & 1) > 0) {
      offset += 8;
    }
    const info = _unpack_struct_from(LINK_INFO_MSG, this.fh, offset);
    if (info.get('name_btree_address') !== UNDEFINED_ADDRESS) {
      throw new UnsupportedTypeError('Groups with dense link storage are not supported');
    }
  }

  // ==========================================================================
  // Dataset storage
  // ==========================================================================

  get_data(): NdArray {
    const { dtype, littleEndian } = this.datatype;
    const shape = this.shape;
    const msgOffset = this._first_msg(MessageType.DATA_LAYOUT).offset;
    const [version, dims, layoutClass, propertyOffset] = this._get_data_message_properties(msgOffset);
    const nbytes = product(shape) * itemSize(dtype);

    let bytes: Uint8Array;
    if (layoutClass === LayoutClass.COMPACT) {
      // versions 1 and 2 list the dimension sizes before the raw data
      const sizeOffset = version === 3 ? propertyOffset : propertyOffset + 4 * dims;
      const size = struct.unpack_from(version === 3 ? '<H' : '<I', this.fh, sizeOffset)[0];
      const dataOffset = sizeOffset + (version === 3 ? 2 : 4);
      bytes = this.fh.subarray(dataOffset, dataOffset + size);
    } else if (layoutClass === LayoutClass.CONTIGUOUS) {
      const [address] = struct.unpack_from('<Q', this.fh, propertyOffset);
      if (address === UNDEFINED_ADDRESS) {
        return zeros(dtype, shape);
      }
      bytes = this.fh.subarray(address, address + nbytes);
    } else if (layoutClass === LayoutClass.CHUNKED) {
      let chunkDims = dims;
      let address: number;
      let shapeOffset: number;
      if (version === 3) {
        [chunkDims] = struct.unpack_from('<B', this.fh, propertyOffset);
        [address] = struct.unpack_from('<Q', this.fh, propertyOffset + 1);
        shapeOffset = propertyOffset + 9;
      } else {
        [address] = struct.unpack_from('<Q', this.fh, propertyOffset);
        shapeOffset = propertyOffset + 8;
      }
      if (address === UNDEFINED_ADDRESS) {
        return zeros(dtype, shape);
      }
      const fmt = '<' + (chunkDims - 1).toFixed() + 'I';
      const chunkShape = struct.unpack_from(fmt, this.fh, shapeOffset);
      const chunkBtree = new BTreeV1RawDataChunks(this.fh, address, chunkDims);
      bytes = chunkBtree.construct_data_from_chunks(chunkShape, shape, itemSize(dtype), this.filter_pipeline);
    } else {
      throw new UnsupportedTypeError(`Unknown layout class: ${layoutClass}`);
    }

    if (bytes.byteLength !== nbytes) {
      throw new FormatError(`Dataset storage holds ${bytes.byteLength} bytes, expected ${nbytes}`);
    }
    return fromBytes(dtype, bytes, shape, littleEndian);
  }

  private _get_data_message_properties(msgOffset: number): [version: number, dims: number, layoutClass: number, propertyOffset: number] {
    const [version, arg1, arg2] = struct.unpack_from('<3B', this.fh, msgOffset);

    if (version === 1 || version === 2) {
      // version, dimensionality, layout class, five reserved bytes
      return [version, arg1, arg2, msgOffset + 8];
    }
    if (version === 3) {
      return [version, 0, arg1, msgOffset + 2];
    }
    throw new UnsupportedTypeError(`Data layout message version ${version} is not supported`);
  }
}
