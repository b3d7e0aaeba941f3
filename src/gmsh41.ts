/**
 * Gmsh MSH 4.1 reader and writer
 *
 * Node blocks list all their tags before their coordinates, and element
 * records use `size_t` fields whose width follows the declared data size.
 * Each node's entity (dimension, tag) is kept as `gmsh:dim_tags` point data;
 * each element's entity tag as `gmsh:geometrical` cell data, and the entity's
 * first physical tag as `gmsh:physical` when `$Entities` is present.
 */

import { ByteSink } from './byte-reader.js';
import type { ByteReader } from './byte-reader.js';
import { canonicalToGmshOrder, cellTypeFromGmsh, getCellType, gmshCodeOf, gmshToCanonicalOrder } from './cell-types.js';
import { debugLog } from './debug.js';
import { FormatError } from './errors.js';
import {
  CellAccumulator,
  DIM_TAGS_FIELD,
  FieldReader,
  FieldWriter,
  NodeTagIndex,
  dataSectionsOf,
  expectSectionEnd,
  forEachSection,
  maxCellDimension,
  permuteColumns,
  physicalTagOf,
  pointsAs3d,
  readData,
  readEntities,
  readPhysicalNames,
  warnDroppedTags,
  writeData,
  writeHeader,
  writePhysicalNames,
} from './gmsh-sections.js';
import type { EntityPhysicals } from './gmsh-sections.js';
import { Mesh, cellDataFromRaw } from './mesh.js';
import { fromNumbers, rowCount, toNumbers } from './ndarray.js';
import type { NdArray } from './types/dtype.js';
import type { GmshHeader, GmshReadOptions, GmshVersionCodec, GmshWriteOptions } from './types/gmsh.js';
import type { FieldData, PointData } from './types/mesh.js';

interface ReadState {
  physicals: EntityPhysicals | null;
  points: NdArray | null;
  dimTags: NdArray | null;
  nodeIndex: NodeTagIndex | null;
}

// ============================================================================
// Reading
// ============================================================================

function read(reader: ByteReader, header: GmshHeader, options: GmshReadOptions): Mesh {
  const fields = new FieldReader(reader, header.isAscii, header.dataSize);
  const fieldData: FieldData = {};
  const pointData: PointData = {};
  const cellDataRaw: Record<string, NdArray> = {};
  const cells = new CellAccumulator();
  const state: ReadState = { physicals: null, points: null, dimTags: null, nodeIndex: null };

  forEachSection(
    reader,
    (name) => {
      switch (name) {
        case 'PhysicalNames':
          readPhysicalNames(reader, fieldData);
          return true;
        case 'Entities':
          state.physicals = readEntities(fields, reader, 3);
          return true;
        case 'Nodes':
          readNodes(fields, reader, state);
          debugLog(options.debug, `gmsh: read ${state.points ? rowCount(state.points) : 0} nodes`);
          return true;
        case 'Elements':
          readElements(fields, reader, cells, state.physicals);
          debugLog(options.debug, `gmsh: read ${cells.numCells} elements`);
          return true;
        case 'NodeData':
          readData(reader, name, pointData, header.isAscii);
          return true;
        case 'ElementData':
          readData(reader, name, cellDataRaw, header.isAscii);
          return true;
        default:
          return false;
      }
    },
    options.debug
  );

  if (state.points === null || state.nodeIndex === null || state.dimTags === null) {
    throw new FormatError('Gmsh file has no $Nodes section');
  }
  pointData[DIM_TAGS_FIELD] = state.dimTags;
  const { cells: cellBlocks, cellData } = cells.build(state.nodeIndex, gmshToCanonicalOrder);
  Object.assign(cellData, cellDataFromRaw(cellBlocks, cellDataRaw));

  return new Mesh(state.points, cellBlocks, { pointData, cellData, fieldData });
}

function readNodes(fields: FieldReader, reader: ByteReader, state: ReadState): void {
  const [numBlocks, numNodes] = fields.sizes(4, '$Nodes header');
  const tags: number[] = [];
  const coords: number[] = [];
  const dimTags: number[] = [];

  for (let b = 0; b < numBlocks; b++) {
    const [entityDim, entityTag, parametric] = fields.ints(3, '$Nodes block header');
    const [count] = fields.sizes(1, '$Nodes block size');
    if (parametric !== 0) {
      throw new FormatError('Parametric nodes are not supported');
    }
    tags.push(...fields.sizes(count, '$Nodes tags'));
    coords.push(...fields.doubles(3 * count, '$Nodes coordinates'));
    for (let i = 0; i < count; i++) {
      dimTags.push(entityDim, entityTag);
    }
  }
  if (tags.length !== numNodes) {
    throw new FormatError(`$Nodes declares ${numNodes} nodes but its blocks hold ${tags.length}`);
  }
  expectSectionEnd(reader, 'Nodes');

  state.points = fromNumbers('float64', coords, [numNodes, 3]);
  state.dimTags = fromNumbers('int32', dimTags, [numNodes, 2]);
  state.nodeIndex = new NodeTagIndex(tags);
}

function readElements(
  fields: FieldReader,
  reader: ByteReader,
  cells: CellAccumulator,
  physicals: EntityPhysicals | null
): void {
  const [numBlocks] = fields.sizes(4, '$Elements header');

  for (let b = 0; b < numBlocks; b++) {
    const [entityDim, entityTag, code] = fields.ints(3, '$Elements block header');
    const [count] = fields.sizes(1, '$Elements block size');
    const cellType = cellTypeFromGmsh(code);
    const width = 1 + cellType.arity;
    const data = fields.sizes(count * width, '$Elements block');

    const nodes: number[] = [];
    for (let r = 0; r < count; r++) {
      for (let k = 1; k < width; k++) {
        nodes.push(data[r * width + k]);
      }
    }
    const physical = physicalTagOf(physicals, entityDim, entityTag);
    cells.add(
      cellType.name,
      cellType.arity,
      nodes,
      physical === null ? null : new Array<number>(count).fill(physical),
      new Array<number>(count).fill(entityTag)
    );
  }
  expectSectionEnd(reader, 'Elements');
}

// ============================================================================
// Writing
// ============================================================================

function write(mesh: Mesh, binary: boolean, options: GmshWriteOptions): Uint8Array {
  const { nodeData, elementData } = dataSectionsOf(mesh);
  warnDroppedTags(mesh, '4.1');

  const sink = new ByteSink();
  writeHeader(sink, '4.1', binary, 8);
  writePhysicalNames(sink, mesh.fieldData);
  writeNodes(sink, mesh, binary);
  writeElements(sink, mesh, binary);
  for (const [name, data] of Object.entries(nodeData)) {
    writeData(sink, 'NodeData', name, data, binary);
  }
  for (const [name, data] of Object.entries(elementData)) {
    writeData(sink, 'ElementData', name, data, binary);
  }
  debugLog(options.debug, `gmsh: encoded ${sink.byteLength} bytes (4.1, ${binary ? 'binary' : 'ascii'})`);
  return sink.toUint8Array();
}

function writeNodes(sink: ByteSink, mesh: Mesh, binary: boolean): void {
  const coords = pointsAs3d(mesh.points);
  const n = coords.length / 3;
  const fields = new FieldWriter(sink, binary);
  const tags = Array.from({ length: n }, (_, i) => i + 1);

  sink.line('$Nodes');
  fields.sizes([1, n, n > 0 ? 1 : 0, n]);
  fields.ints([maxCellDimension(mesh), 0, 0]);
  fields.sizes([n]);
  if (binary) {
    fields.sizes(tags).doubles(coords);
  } else {
    for (const tag of tags) fields.sizes([tag]);
    for (let i = 0; i < n; i++) fields.doubles(coords.slice(3 * i, 3 * i + 3));
  }
  fields.endBinary();
  sink.line('$EndNodes');
}

function writeElements(sink: ByteSink, mesh: Mesh, binary: boolean): void {
  const fields = new FieldWriter(sink, binary);
  const total = mesh.numCells;
  sink.line('$Elements');
  fields.sizes([Object.keys(mesh.cells).length, total, total > 0 ? 1 : 0, total]);

  let index = 1;
  for (const [cellTypeName, block] of Object.entries(mesh.cells)) {
    const cellType = getCellType(cellTypeName);
    const count = rowCount(block);
    fields.ints([cellType.dimension, 0, gmshCodeOf(cellTypeName)]);
    fields.sizes([count]);

    const nodes = toNumbers(permuteColumns(block, canonicalToGmshOrder(cellTypeName)));
    const rows: number[] = [];
    for (let r = 0; r < count; r++) {
      const row = [index + r];
      for (let k = 0; k < cellType.arity; k++) row.push(nodes[r * cellType.arity + k] + 1);
      if (binary) {
        rows.push(...row);
      } else {
        fields.sizes(row);
      }
    }
    if (binary) {
      fields.sizes(rows);
    }
    index += count;
  }
  fields.endBinary();
  sink.line('$EndElements');
}

export const gmsh41: GmshVersionCodec = { version: '4.1', read, write };
