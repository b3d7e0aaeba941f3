/**
 * XDMF DataItem resolution (read) and emission (write) across the XML,
 * Binary and HDF heavy-data formats
 */

import { existsSync, readFileSync, statSync, writeFileSync } from 'fs';
import * as path from 'path';
import { isBigEndian } from './core.js';
import { debugLog } from './debug.js';
import { FormatError, WriteError } from './errors.js';
import { H5Writer } from './h5-writer.js';
import { Dataset, H5File } from './high-level.js';
import type { Group } from './high-level.js';
import { fromBytes, isIntegerDtype, itemSize, product, toBytes, zeros } from './ndarray.js';
import { dtypeToXdmf, formatValues, parseValue, xdmfToDtype } from './xdmf-types.js';
import { attr, requireAttr, xmlNode } from './xml.js';
import type { XmlNode } from './xml.js';
import type { NdArray, TypedArray } from './types/dtype.js';
import type { DataFormat, DataItemDescriptor, Endianness } from './types/xdmf.js';

const INTEGER_TOKEN = /^[+-]?\d+$/;

export const DATA_FORMATS: readonly DataFormat[] = ['XML', 'Binary', 'HDF'];

export function isDataFormat(value: string): value is DataFormat {
  return value === 'XML' || value === 'Binary' || value === 'HDF';
}

function isEndianness(value: string): value is Endianness {
  return value === 'Little' || value === 'Big' || value === 'Native';
}

/**
 * Validate the attributes of a `<DataItem>`
 */
export function describeDataItem(el: Element): DataItemDescriptor {
  const dimensions = requireAttr(el, 'Dimensions')
    .trim()
    .split(/\s+/)
    .map((d) => {
      const n = Number(d);
      if (!Number.isInteger(n) || n < 0) {
        throw new FormatError(`Invalid DataItem dimension "${d}"`);
      }
      return n;
    });

  const dataType = attr(el, 'DataType');
  const numberType = attr(el, 'NumberType');
  if (dataType !== null && numberType !== null) {
    throw new FormatError('DataItem has both DataType and NumberType');
  }
  const dtype = xdmfToDtype(dataType ?? numberType ?? 'Float', attr(el, 'Precision') ?? '4');

  const format = attr(el, 'Format') ?? 'XML';
  if (!isDataFormat(format)) {
    throw new FormatError(`Unknown XDMF Format "${format}" (use ${DATA_FORMATS.join(', ')})`);
  }

  const endian = attr(el, 'Endian') ?? 'Native';
  if (!isEndianness(endian)) {
    throw new FormatError(`Unknown XDMF Endian "${endian}" (use Little, Big, Native)`);
  }

  return { format, dtype, dimensions, endian, text: el.textContent ?? '' };
}

// ============================================================================
// Resolver
// ============================================================================

/**
 * Materializes DataItems of one document. HDF5 stores are opened on first
 * use and kept until `close()`.
 */
export class DataItemResolver {
  private readonly baseDir: string;
  private readonly stores: Map<string, H5File>;
  private readonly debug: boolean | undefined;

  constructor(xdmfPath: string, debug?: boolean) {
    this.baseDir = path.dirname(xdmfPath);
    this.stores = new Map();
    this.debug = debug;
  }

  resolve(el: Element): NdArray {
    const item = describeDataItem(el);
    debugLog(this.debug, `xdmf: ${item.format} data item ${item.dtype}[${item.dimensions.join(', ')}]`);
    switch (item.format) {
      case 'XML':
        return this.readInline(item);
      case 'Binary':
        return this.readBinary(item);
      case 'HDF':
        return this.readHdf(item);
    }
  }

  private readInline(item: DataItemDescriptor): NdArray {
    const tokens = item.text.split(/\s+/).filter((t) => t !== '');
    const expected = product(item.dimensions);
    if (tokens.length !== expected) {
      throw new FormatError(
        `Inline DataItem holds ${tokens.length} values, Dimensions "${item.dimensions.join(' ')}" need ${expected}`
      );
    }
    const invalid = (token: string): FormatError =>
      new FormatError(`Invalid ${item.dtype} value "${token}" in inline DataItem`);
    const out = zeros(item.dtype, item.dimensions);
    const data: TypedArray = out.data;

    if (data instanceof BigInt64Array || data instanceof BigUint64Array) {
      // parsed as bigint so 64-bit items keep every digit
      for (let i = 0; i < tokens.length; i++) {
        if (!INTEGER_TOKEN.test(tokens[i])) {
          throw invalid(tokens[i]);
        }
        data[i] = BigInt(tokens[i]);
      }
    } else if (isIntegerDtype(item.dtype)) {
      for (let i = 0; i < tokens.length; i++) {
        if (!INTEGER_TOKEN.test(tokens[i])) {
          throw invalid(tokens[i]);
        }
        data[i] = Number(tokens[i]);
      }
    } else {
      for (let i = 0; i < tokens.length; i++) {
        const value = parseValue(tokens[i]);
        if (Number.isNaN(value) && tokens[i].toLowerCase() !== 'nan') {
          throw invalid(tokens[i]);
        }
        data[i] = value;
      }
    }
    return out;
  }

  private readBinary(item: DataItemDescriptor): NdArray {
    const file = path.resolve(this.baseDir, item.text.trim());
    if (!existsSync(file)) {
      throw new FormatError(`Binary data file ${file} does not exist`);
    }
    const expected = product(item.dimensions) * itemSize(item.dtype);
    const size = statSync(file).size;
    if (size !== expected) {
      throw new FormatError(
        `Binary data file ${file} holds ${size} bytes, ${item.dtype}[${item.dimensions.join(', ')}] needs ${expected}`
      );
    }
    const littleEndian = item.endian === 'Native' ? !isBigEndian() : item.endian === 'Little';
    return fromBytes(item.dtype, readFileSync(file), item.dimensions, littleEndian);
  }

  private readHdf(item: DataItemDescriptor): NdArray {
    const token = item.text.trim();
    const colon = token.lastIndexOf(':');
    if (colon < 0) {
      throw new FormatError(`HDF DataItem "${token}" is not of the form file:/path`);
    }
    const fileName = token.slice(0, colon);
    const h5path = token.slice(colon + 1);
    if (!h5path.startsWith('/')) {
      throw new FormatError(`HDF path "${h5path}" must start with "/"`);
    }

    let node: Group | Dataset = this.store(path.resolve(this.baseDir, fileName));
    for (const key of h5path.slice(1).split('/')) {
      if (node instanceof Dataset) {
        throw new FormatError(`${node.name} in ${fileName} is a dataset, not a group`);
      }
      node = node.get(key);
    }
    if (!(node instanceof Dataset)) {
      throw new FormatError(`${h5path} in ${fileName} is a group, not a dataset`);
    }
    return node.value;
  }

  private store(file: string): H5File {
    const cached = this.stores.get(file);
    if (cached !== undefined) {
      return cached;
    }
    if (!existsSync(file)) {
      throw new FormatError(`HDF5 file ${file} does not exist`);
    }
    const opened = H5File.open(file, { debug: this.debug });
    this.stores.set(file, opened);
    return opened;
  }

  /** Number of HDF5 stores currently open */
  get openStores(): number {
    return this.stores.size;
  }

  close(): void {
    for (const store of this.stores.values()) {
      store.close();
    }
    this.stores.clear();
  }
}

// ============================================================================
// Emitter
// ============================================================================

/**
 * Writes arrays in one heavy-data format and returns the `<DataItem>` that
 * references them. Sidecar files and store datasets are numbered by one
 * counter for the whole session.
 */
export class DataItemEmitter {
  readonly format: DataFormat;
  private readonly dir: string;
  private readonly stem: string;
  private readonly debug: boolean | undefined;
  private counter: number;
  private h5: H5Writer | null;

  constructor(xdmfPath: string, format: DataFormat, debug?: boolean) {
    const parsed = path.parse(xdmfPath);
    this.format = format;
    this.dir = parsed.dir;
    this.stem = parsed.name;
    this.debug = debug;
    this.counter = 0;
    this.h5 = format === 'HDF' ? H5Writer.create(this.h5FileName(), { debug }) : null;
  }

  private h5FileName(): string {
    return path.join(this.dir, `${this.stem}.h5`);
  }

  emit(array: NdArray): XmlNode {
    const { type, precision } = dtypeToXdmf(array.dtype);
    return xmlNode(
      'DataItem',
      {
        DataType: type,
        Dimensions: array.shape.join(' '),
        Format: this.format,
        Precision: precision,
      },
      this.store(array)
    );
  }

  private store(array: NdArray): string {
    switch (this.format) {
      case 'XML':
        return formatValues(array);
      case 'Binary': {
        const name = `${this.stem}${this.counter++}.bin`;
        writeFileSync(path.join(this.dir, name), toBytes(array));
        debugLog(this.debug, `xdmf: wrote ${name}`);
        return name;
      }
      case 'HDF': {
        if (this.h5 === null) {
          throw new WriteError('HDF5 store is closed');
        }
        const name = `data${this.counter++}`;
        this.h5.createDataset(name, array);
        return `${this.stem}.h5:/${name}`;
      }
    }
  }

  flush(): void {
    this.h5?.flush();
  }

  close(): void {
    this.h5?.close();
    this.h5 = null;
  }
}
