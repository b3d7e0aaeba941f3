/**
 * Minimal HDF5 writer: nested groups of contiguous numeric datasets
 *
 * Files use a version 2 superblock and version 2 object headers with compact
 * link storage. The whole file is regenerated on every flush.
 */

import { writeFileSync } from 'fs';
import { ByteSink } from './byte-reader.js';
import { metadataChecksum } from './checksum.js';
import { struct, UNDEFINED_ADDRESS } from './core.js';
import { debugLog } from './debug.js';
import { WriteError } from './errors.js';
import { isIntegerDtype, itemSize, toBytes } from './ndarray.js';
import type { DtypeName, NdArray } from './types/dtype.js';
import { DatatypeClass, FORMAT_SIGNATURE, LayoutClass, MessageType } from './types/hdf5.js';

const SUPERBLOCK_SIZE = 48;

interface GroupNode {
  kind: 'group';
  children: Map<string, TreeNode>;
}

interface DatasetNode {
  kind: 'dataset';
  array: NdArray;
}

type TreeNode = GroupNode | DatasetNode;

type Message = [type: MessageType, body: Uint8Array];

export interface H5WriterOptions {
  debug?: boolean;
}

// ============================================================================
// Message Encoders
// ============================================================================

function datatypeMessage(dtype: DtypeName): Uint8Array {
  const size = itemSize(dtype);
  const sink = new ByteSink();
  if (isIntegerDtype(dtype)) {
    const signed = !dtype.startsWith('u');
    sink.pack('<4BI', [0x10 | DatatypeClass.FIXED_POINT, signed ? 0x08 : 0x00, 0, 0, size]);
    // bit offset, precision
    sink.pack('<2H', [0, 8 * size]);
  } else {
    const double = size === 8;
    // implied leading mantissa bit; sign bit location
    sink.pack('<4BI', [0x10 | DatatypeClass.FLOATING_POINT, 0x20, double ? 63 : 31, 0, size]);
    // bit offset, precision, exponent location and size, mantissa location and size, bias
    sink.pack('<2H4BI', double ? [0, 64, 52, 11, 0, 52, 1023] : [0, 32, 23, 8, 0, 23, 127]);
  }
  return sink.toUint8Array();
}

function dataspaceMessage(shape: readonly number[]): Uint8Array {
  const sink = new ByteSink();
  sink.pack('<4B', [2, shape.length, 0, shape.length === 0 ? 0 : 1]);
  if (shape.length > 0) {
    sink.pack('<' + shape.length.toFixed() + 'Q', shape);
  }
  return sink.toUint8Array();
}

function linkMessage(name: string, address: number): Uint8Array {
  const encoded = new TextEncoder().encode(name);
  const wide = encoded.byteLength > 255;
  const sink = new ByteSink();
  sink.pack('<2B', [1, wide ? 1 : 0]);
  sink.pack(wide ? '<H' : '<B', [encoded.byteLength]);
  sink.bytes(encoded);
  sink.pack('<Q', [address]);
  return sink.toUint8Array();
}

function groupMessages(links: ReadonlyArray<[string, number]>): Message[] {
  const messages: Message[] = [
    [MessageType.LINK_INFO, struct.pack('<2B2Q', [0, 0, UNDEFINED_ADDRESS, UNDEFINED_ADDRESS])],
    [MessageType.GROUP_INFO, struct.pack('<2B', [0, 0])],
  ];
  for (const [name, address] of links) {
    messages.push([MessageType.LINK, linkMessage(name, address)]);
  }
  return messages;
}

function datasetMessages(array: NdArray, dataAddress: number, dataSize: number): Message[] {
  return [
    [MessageType.DATASPACE, dataspaceMessage(array.shape)],
    [MessageType.DATATYPE, datatypeMessage(array.dtype)],
    // late allocation, fill written only when set, no fill value
    [MessageType.FILL_VALUE, struct.pack('<2B', [3, 0x0a])],
    [MessageType.DATA_LAYOUT, struct.pack('<2B2Q', [3, LayoutClass.CONTIGUOUS, dataAddress, dataSize])],
  ];
}

/**
 * Version 2 object header with all messages in chunk 0
 */
function objectHeader(messages: readonly Message[]): Uint8Array {
  const body = new ByteSink();
  for (const [type, data] of messages) {
    body.pack('<BHB', [type, data.byteLength, 0]).bytes(data);
  }
  const sink = new ByteSink();
  sink.text('OHDR').pack('<2BI', [2, 0x02, body.byteLength]).bytes(body.toUint8Array());
  const header = sink.toUint8Array();
  return new ByteSink().bytes(header).pack('<I', [metadataChecksum(header)]).toUint8Array();
}

function superblock(eofAddress: number, rootAddress: number): Uint8Array {
  const sink = new ByteSink();
  sink.bytes(FORMAT_SIGNATURE);
  sink.pack('<4B4Q', [2, 8, 8, 0, 0, UNDEFINED_ADDRESS, eofAddress, rootAddress]);
  const head = sink.toUint8Array();
  return new ByteSink().bytes(head).pack('<I', [metadataChecksum(head)]).toUint8Array();
}

// ============================================================================
// H5Writer Class
// ============================================================================

export class H5Writer {
  readonly path: string;
  private readonly root: GroupNode;
  private readonly debug: boolean | undefined;
  private closed: boolean;

  private constructor(path: string, options: H5WriterOptions) {
    this.path = path;
    this.root = { kind: 'group', children: new Map() };
    this.debug = options.debug;
    this.closed = false;
  }

  /** Create (or truncate) the file at `path` with an empty root group */
  static create(path: string, options: H5WriterOptions = {}): H5Writer {
    const writer = new H5Writer(path, options);
    writer.flush();
    return writer;
  }

  /**
   * Add a dataset at a slash-separated path, creating intermediate groups
   */
  createDataset(path: string, array: NdArray): void {
    if (this.closed) {
      throw new WriteError(`HDF5 file ${this.path} is closed`);
    }
    const parts = path.split('/').filter((p) => p !== '');
    const name = parts.pop();
    if (name === undefined) {
      throw new WriteError(`Invalid dataset path "${path}"`);
    }

    let group = this.root;
    for (const part of parts) {
      const child = group.children.get(part);
      if (child === undefined) {
        const created: GroupNode = { kind: 'group', children: new Map() };
        group.children.set(part, created);
        group = created;
      } else if (child.kind === 'group') {
        group = child;
      } else {
        throw new WriteError(`Cannot create "${path}": "${part}" is a dataset`);
      }
    }
    if (group.children.has(name)) {
      throw new WriteError(`Object "${path}" already exists`);
    }
    group.children.set(name, { kind: 'dataset', array });
  }

  /** Serialize the current tree to disk */
  flush(): void {
    const sink = new ByteSink();
    // the superblock is prepended once the root address is known
    const place = (bytes: Uint8Array): number => {
      const address = SUPERBLOCK_SIZE + sink.byteLength;
      sink.bytes(bytes);
      return address;
    };

    const serialize = (node: TreeNode): number => {
      if (node.kind === 'dataset') {
        const data = toBytes(node.array, true);
        const address = data.byteLength > 0 ? place(data) : UNDEFINED_ADDRESS;
        return place(objectHeader(datasetMessages(node.array, address, data.byteLength)));
      }
      const links: Array<[string, number]> = [];
      for (const [name, child] of node.children) {
        links.push([name, serialize(child)]);
      }
      return place(objectHeader(groupMessages(links)));
    };

    const rootAddress = serialize(this.root);
    const eof = SUPERBLOCK_SIZE + sink.byteLength;
    const file = new ByteSink().bytes(superblock(eof, rootAddress)).bytes(sink.toUint8Array());
    writeFileSync(this.path, file.toUint8Array());
    debugLog(this.debug, `hdf5: wrote ${eof} bytes to ${this.path}`);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.flush();
    this.closed = true;
  }
}
