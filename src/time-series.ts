/**
 * XDMF 3 time series: one mesh shared by a temporal collection of frames,
 * each frame carrying a time value and point/cell attributes.
 */

import { readFileSync, writeFileSync } from 'fs';
import { cellTypeFromXdmf, xdmfNameOf } from './cell-types.js';
import { DataItemEmitter, DataItemResolver, DATA_FORMATS, isDataFormat } from './data-item.js';
import { debugLog } from './debug.js';
import { FormatError, ReadError, WriteError } from './errors.js';
import { cellDataFromRaw, rawFromCellData } from './mesh.js';
import { readMixedCells, writeMixedCells } from './mixed-cells.js';
import { reshape, rowCount } from './ndarray.js';
import { attributeType } from './xdmf-types.js';
import { attr, childElements, onlyChild, parseXml, requireAttr, serializeXml, subNode, xmlNode } from './xml.js';
import type { XmlNode } from './xml.js';
import type { NdArray } from './types/dtype.js';
import type { CellBlocks, CellData, PointData } from './types/mesh.js';
import type {
  DataFormat,
  DataFrame,
  PointsCells,
  TimeSeriesReaderOptions,
  TimeSeriesWriterOptions,
} from './types/xdmf.js';

const XINCLUDE_NS = 'http://www.w3.org/2003/XInclude';
const MESH_GRID_NAME = 'mesh';
const MESH_XPOINTER = `xpointer(//Grid[@Name="${MESH_GRID_NAME}"]/*[self::Topology or self::Geometry])`;

// ============================================================================
// Reader
// ============================================================================

export class TimeSeriesReader {
  readonly filename: string;
  private readonly meshGrid: Element;
  private readonly frames: Element[];
  private readonly resolver: DataItemResolver;
  private readonly debug: boolean | undefined;
  private cells: CellBlocks | null;
  private closed: boolean;

  constructor(path: string, options: TimeSeriesReaderOptions = {}) {
    this.filename = path;
    this.debug = options.debug;
    this.cells = null;
    this.closed = false;

    const root = parseXml(readFileSync(path, 'utf-8'), path).documentElement;
    if (root === null || root.nodeName !== 'Xdmf') {
      throw new FormatError(`${path}: root element must be <Xdmf>, found <${root?.nodeName ?? ''}>`);
    }
    const version = requireAttr(root, 'Version');
    if (version.split('.')[0] !== '3') {
      throw new FormatError(`${path}: unsupported XDMF version "${version}" (only 3.x is read)`);
    }

    const domains = childElements(root);
    if (domains.length !== 1 || domains[0].nodeName !== 'Domain') {
      throw new FormatError(`${path}: <Xdmf> must hold exactly one <Domain>`);
    }
    const grids = childElements(domains[0]);

    const collection = grids.filter((g) => attr(g, 'GridType') === 'Collection').pop();
    if (collection === undefined) {
      throw new FormatError(`${path}: no temporal collection grid`);
    }
    if (collection.nodeName !== 'Grid') {
      throw new FormatError(`${path}: collection must be a <Grid>, found <${collection.nodeName}>`);
    }
    const collectionType = attr(collection, 'CollectionType');
    if (collectionType !== 'Temporal') {
      throw new FormatError(`${path}: collection grid has CollectionType "${collectionType ?? ''}", expected Temporal`);
    }
    this.frames = childElements(collection).filter((el) => el.nodeName === 'Grid');

    const isUniform = (g: Element): boolean => attr(g, 'GridType') === 'Uniform';
    const meshGrid = grids.filter(isUniform).pop() ?? this.frames.find(isUniform);
    if (meshGrid === undefined) {
      throw new FormatError(`${path}: no uniform grid holds the mesh`);
    }
    if (meshGrid.nodeName !== 'Grid') {
      throw new FormatError(`${path}: mesh must be a <Grid>, found <${meshGrid.nodeName}>`);
    }
    this.meshGrid = meshGrid;
    this.resolver = new DataItemResolver(path, options.debug);
    debugLog(this.debug, `xdmf: ${path} has ${this.frames.length} frame(s)`);
  }

  get numSteps(): number {
    return this.frames.length;
  }

  readPointsCells(): PointsCells {
    this.assertOpen();
    let points: NdArray | null = null;
    const cells: CellBlocks = {};

    for (const el of childElements(this.meshGrid)) {
      if (el.nodeName === 'Geometry') {
        const geometryType = attr(el, 'GeometryType');
        if (geometryType !== null && geometryType !== 'XY' && geometryType !== 'XYZ') {
          throw new FormatError(`Unsupported GeometryType "${geometryType}" (use XY, XYZ)`);
        }
        points = this.resolver.resolve(onlyChild(el, 'DataItem'));
      } else if (el.nodeName === 'Topology') {
        const data = this.resolver.resolve(onlyChild(el, 'DataItem'));
        const topologyType = topologyTypeOf(el);
        if (topologyType === 'Mixed') {
          Object.assign(cells, readMixedCells(data));
        } else {
          const cellType = cellTypeFromXdmf(topologyType);
          cells[cellType.name] =
            data.shape.length === 2 ? data : reshape(data, [data.data.length / cellType.arity, cellType.arity]);
        }
      }
    }

    if (points === null) {
      throw new FormatError(`${this.filename}: mesh grid has no <Geometry>`);
    }
    this.cells = cells;
    return { points, cells };
  }

  readData(k: number): DataFrame {
    this.assertOpen();
    if (this.cells === null) {
      throw new ReadError('readPointsCells() must be called before readData()');
    }
    if (!Number.isInteger(k) || k < 0 || k >= this.frames.length) {
      throw new RangeError(`Frame index ${k} out of range [0, ${this.frames.length})`);
    }

    let time: number | null = null;
    const pointData: PointData = {};
    const rawCellData: Record<string, NdArray> = {};

    for (const el of childElements(this.frames[k])) {
      if (el.nodeName === 'Time') {
        const value = requireAttr(el, 'Value');
        time = Number(value);
        if (value.trim() === '' || Number.isNaN(time)) {
          throw new FormatError(`Invalid Time Value "${value}" in frame ${k}`);
        }
      } else if (el.nodeName === 'Attribute') {
        const name = requireAttr(el, 'Name');
        const center = attr(el, 'Center');
        const data = this.resolver.resolve(onlyChild(el, 'DataItem'));
        if (center === 'Node') {
          pointData[name] = data;
        } else if (center === 'Cell') {
          rawCellData[name] = data;
        } else {
          throw new FormatError(`Attribute "${name}" has Center "${center ?? ''}" (use Node, Cell)`);
        }
      }
    }

    if (time === null) {
      throw new FormatError(`Frame ${k} has no <Time>`);
    }
    return { time, pointData, cellData: cellDataFromRaw(this.cells, rawCellData) };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ReadError(`Time series ${this.filename} is closed`);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.resolver.close();
  }
}

function topologyTypeOf(el: Element): string {
  const type = attr(el, 'Type');
  const topologyType = attr(el, 'TopologyType');
  if (type !== null && topologyType !== null) {
    throw new FormatError('<Topology> has both Type and TopologyType');
  }
  const value = type ?? topologyType;
  if (value === null) {
    throw new FormatError('<Topology> has neither Type nor TopologyType');
  }
  return value;
}

// ============================================================================
// Writer
// ============================================================================

export class TimeSeriesWriter {
  readonly filename: string;
  readonly dataFormat: DataFormat;
  private readonly prettyXml: boolean;
  private readonly root: XmlNode;
  private readonly domain: XmlNode;
  private readonly collection: XmlNode;
  private readonly emitter: DataItemEmitter;
  private cells: CellBlocks | null;
  private closed: boolean;

  constructor(path: string, options: TimeSeriesWriterOptions = {}) {
    const dataFormat = options.dataFormat ?? 'HDF';
    if (!isDataFormat(dataFormat)) {
      throw new WriteError(`Unknown data format "${dataFormat}" (use ${DATA_FORMATS.join(', ')})`);
    }
    this.filename = path;
    this.dataFormat = dataFormat;
    this.prettyXml = options.prettyXml ?? true;
    this.cells = null;
    this.closed = false;

    this.root = xmlNode('Xdmf', { Version: '3.0', 'xmlns:xi': XINCLUDE_NS });
    this.domain = subNode(this.root, 'Domain');
    this.collection = subNode(this.domain, 'Grid', {
      Name: 'TimeSeries',
      GridType: 'Collection',
      CollectionType: 'Temporal',
    });
    this.emitter = new DataItemEmitter(path, dataFormat, options.debug);
  }

  writePointsCells(points: NdArray, cells: CellBlocks): void {
    this.assertOpen();
    if (this.cells !== null) {
      throw new WriteError(`Mesh already written to ${this.filename}`);
    }
    const width = points.shape.length === 2 ? points.shape[1] : 0;
    if (width !== 2 && width !== 3) {
      throw new WriteError(`Points must be N × 2 or N × 3, got [${points.shape.join(', ')}]`);
    }
    const blocks = Object.entries(cells);
    const topologyName = blocks.length === 1 ? xdmfNameOf(blocks[0][0]) : null;

    const grid = xmlNode('Grid', { Name: MESH_GRID_NAME, GridType: 'Uniform' });
    subNode(grid, 'Geometry', { GeometryType: width === 2 ? 'XY' : 'XYZ' }).children.push(
      this.emitter.emit(points)
    );

    if (topologyName !== null) {
      const block = blocks[0][1];
      subNode(grid, 'Topology', {
        TopologyType: topologyName,
        NumberOfElements: String(rowCount(block)),
      }).children.push(this.emitter.emit(block));
    } else if (blocks.length > 1) {
      const mixed = writeMixedCells(cells);
      subNode(grid, 'Topology', {
        TopologyType: 'Mixed',
        NumberOfElements: String(mixed.numCells),
      }).children.push(this.emitter.emit(mixed.data));
    }

    this.domain.children.push(grid);
    this.cells = cells;
    this.write();
  }

  writeData(t: number, pointData: PointData = {}, cellData: CellData = {}): void {
    this.assertOpen();
    if (this.cells === null) {
      throw new WriteError('writePointsCells() must be called before writeData()');
    }
    const pointFields = Object.entries(pointData).map(([name, data]) => [name, data, attributeType(data.shape)] as const);
    const cellFields = Object.entries(rawFromCellData(this.cells, cellData)).map(
      ([name, data]) => [name, data, attributeType(data.shape)] as const
    );

    const frame = xmlNode('Grid');
    subNode(frame, 'xi:include', { xpointer: MESH_XPOINTER });
    subNode(frame, 'Time', { Value: String(t) });
    for (const [name, data, type] of pointFields) {
      subNode(frame, 'Attribute', { Name: name, AttributeType: type, Center: 'Node' }).children.push(
        this.emitter.emit(data)
      );
    }
    for (const [name, data, type] of cellFields) {
      subNode(frame, 'Attribute', { Name: name, AttributeType: type, Center: 'Cell' }).children.push(
        this.emitter.emit(data)
      );
    }

    this.collection.children.push(frame);
    this.write();
  }

  private write(): void {
    writeFileSync(this.filename, serializeXml(this.root, this.prettyXml));
    this.emitter.flush();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new WriteError(`Time series ${this.filename} is closed`);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    writeFileSync(this.filename, serializeXml(this.root, this.prettyXml));
    this.emitter.close();
  }
}

// ============================================================================
// Scoped helpers
// ============================================================================

/**
 * Open a reader, run `fn` and close the reader whether or not `fn` throws
 */
export function withTimeSeriesReader<T>(
  path: string,
  fn: (reader: TimeSeriesReader) => T,
  options?: TimeSeriesReaderOptions
): T {
  const reader = new TimeSeriesReader(path, options);
  try {
    return fn(reader);
  } finally {
    reader.close();
  }
}

export function withTimeSeriesWriter<T>(
  path: string,
  fn: (writer: TimeSeriesWriter) => T,
  options?: TimeSeriesWriterOptions
): T {
  const writer = new TimeSeriesWriter(path, options);
  try {
    return fn(writer);
  } finally {
    writer.close();
  }
}
