/**
 * Gmsh MSH 2.2 reader and writer
 */

import { ByteSink } from './byte-reader.js';
import type { ByteReader } from './byte-reader.js';
import { canonicalToGmshOrder, cellTypeFromGmsh, getCellType, gmshCodeOf, gmshToCanonicalOrder } from './cell-types.js';
import { struct } from './core.js';
import { debugLog } from './debug.js';
import { FormatError } from './errors.js';
import {
  CellAccumulator,
  NodeTagIndex,
  dataSectionsOf,
  expectSectionEnd,
  forEachSection,
  permuteColumns,
  pointsAs3d,
  readData,
  readPhysicalNames,
  writeData,
  writeHeader,
  writePhysicalNames,
} from './gmsh-sections.js';
import { Mesh, cellDataFromRaw } from './mesh.js';
import { fromNumbers, rowCount, toNumbers } from './ndarray.js';
import type { NdArray } from './types/dtype.js';
import type { GmshHeader, GmshReadOptions, GmshVersionCodec, GmshWriteOptions } from './types/gmsh.js';
import type { FieldData, PeriodicEntry, PointData } from './types/mesh.js';

const NODE_RECORD = 'i3d';
const NODE_RECORD_SIZE = struct.calcsize(NODE_RECORD);

// ============================================================================
// Reading
// ============================================================================

interface ReadState {
  points: NdArray | null;
  nodeIndex: NodeTagIndex | null;
  periodic: PeriodicEntry[] | null;
}

function read(reader: ByteReader, header: GmshHeader, options: GmshReadOptions): Mesh {
  const fieldData: FieldData = {};
  const pointData: PointData = {};
  const cellDataRaw: Record<string, NdArray> = {};
  const cells = new CellAccumulator();
  const state: ReadState = { points: null, nodeIndex: null, periodic: null };

  forEachSection(
    reader,
    (name) => {
      switch (name) {
        case 'PhysicalNames':
          readPhysicalNames(reader, fieldData);
          return true;
        case 'Nodes':
          readNodes(reader, header.isAscii, state);
          debugLog(options.debug, `gmsh: read ${state.points ? rowCount(state.points) : 0} nodes`);
          return true;
        case 'Elements':
          readElements(reader, header.isAscii, cells);
          debugLog(options.debug, `gmsh: read ${cells.numCells} elements`);
          return true;
        case 'Periodic':
          state.periodic = readPeriodic(reader);
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

  if (state.points === null || state.nodeIndex === null) {
    throw new FormatError('Gmsh file has no $Nodes section');
  }
  const { cells: cellBlocks, cellData } = cells.build(state.nodeIndex, gmshToCanonicalOrder);
  Object.assign(cellData, cellDataFromRaw(cellBlocks, cellDataRaw));

  return new Mesh(state.points, cellBlocks, {
    pointData,
    cellData,
    fieldData,
    gmshPeriodic: state.periodic,
  });
}

function readNodes(reader: ByteReader, isAscii: boolean, state: ReadState): void {
  const numNodes = reader.readInt('$Nodes count');
  const tags = new Array<number>(numNodes);
  const coords = new Array<number>(3 * numNodes);

  if (isAscii) {
    const values = reader.readTokens(4 * numNodes, '$Nodes');
    for (let i = 0; i < numNodes; i++) {
      tags[i] = values[4 * i];
      coords[3 * i] = values[4 * i + 1];
      coords[3 * i + 1] = values[4 * i + 2];
      coords[3 * i + 2] = values[4 * i + 3];
    }
  } else {
    const bytes = reader.readBytes(numNodes * NODE_RECORD_SIZE, '$Nodes');
    for (let i = 0; i < numNodes; i++) {
      const [index, x, y, z] = struct.unpack_from(NODE_RECORD, bytes, i * NODE_RECORD_SIZE);
      if (index !== i + 1) {
        throw new FormatError(`$Nodes record ${i} has index ${index}, expected ${i + 1}`);
      }
      tags[i] = index;
      coords[3 * i] = x;
      coords[3 * i + 1] = y;
      coords[3 * i + 2] = z;
    }
  }
  expectSectionEnd(reader, 'Nodes');

  state.points = fromNumbers('float64', coords, [numNodes, 3]);
  state.nodeIndex = new NodeTagIndex(tags);
}

function readElements(reader: ByteReader, isAscii: boolean, cells: CellAccumulator): void {
  const total = reader.readInt('$Elements count');

  if (isAscii) {
    for (let i = 0; i < total; i++) {
      const values = reader.readTokens(3, '$Elements');
      const numTags = values[2];
      const tags = reader.readTokens(numTags, '$Elements tags');
      const cellType = cellTypeFromGmsh(values[1]);
      const nodes = reader.readTokens(cellType.arity, '$Elements nodes');
      cells.add(
        cellType.name,
        cellType.arity,
        nodes,
        numTags > 0 ? [tags[0]] : null,
        numTags > 1 ? [tags[1]] : null
      );
    }
  } else {
    let read = 0;
    while (read < total) {
      const [code, count, numTags] = reader.unpack('3i', '$Elements block header');
      const cellType = cellTypeFromGmsh(code);
      const width = 1 + numTags + cellType.arity;
      const data = toNumbers(reader.readArray('int32', [count * width], '$Elements block'));
      const nodes: number[] = [];
      const physical: number[] = [];
      const geometrical: number[] = [];
      for (let r = 0; r < count; r++) {
        const row = r * width;
        if (numTags > 0) physical.push(data[row + 1]);
        if (numTags > 1) geometrical.push(data[row + 2]);
        for (let k = 0; k < cellType.arity; k++) {
          nodes.push(data[row + 1 + numTags + k]);
        }
      }
      cells.add(
        cellType.name,
        cellType.arity,
        nodes,
        numTags > 0 ? physical : null,
        numTags > 1 ? geometrical : null
      );
      read += count;
    }
  }
  expectSectionEnd(reader, 'Elements');
}

function readPeriodic(reader: ByteReader): PeriodicEntry[] {
  const periodic: PeriodicEntry[] = [];
  const count = reader.readInt('$Periodic count');
  for (let i = 0; i < count; i++) {
    const [dim, slaveTag, masterTag] = reader.readTokens(3, '$Periodic entity line');
    let line = reader.expectLine('$Periodic').trim();
    let affine: number[] | null = null;
    if (line.startsWith('Affine')) {
      affine = line
        .slice('Affine'.length)
        .trim()
        .split(/\s+/)
        .filter((t) => t !== '')
        .map(Number);
      line = reader.expectLine('$Periodic').trim();
    }
    const numNodes = Number(line);
    if (!Number.isInteger(numNodes)) {
      throw new FormatError(`Expected a node pair count in $Periodic, got "${line}"`);
    }
    const pairs = reader.readTokens(2 * numNodes, '$Periodic node pairs').map((tag) => tag - 1);
    periodic.push({
      dim,
      tags: [slaveTag, masterTag],
      affine,
      nodes: fromNumbers('int32', pairs, [numNodes, 2]),
    });
  }
  expectSectionEnd(reader, 'Periodic');
  return periodic;
}

// ============================================================================
// Writing
// ============================================================================

function write(mesh: Mesh, binary: boolean, options: GmshWriteOptions): Uint8Array {
  const { nodeData, elementData } = dataSectionsOf(mesh);

  const sink = new ByteSink();
  writeHeader(sink, '2.2', binary, 8);
  writePhysicalNames(sink, mesh.fieldData);
  writeNodes(sink, mesh.points, binary);
  writeElements(sink, mesh, binary);
  if (mesh.gmshPeriodic !== null) {
    writePeriodic(sink, mesh.gmshPeriodic);
  }
  for (const [name, data] of Object.entries(nodeData)) {
    writeData(sink, 'NodeData', name, data, binary);
  }
  for (const [name, data] of Object.entries(elementData)) {
    writeData(sink, 'ElementData', name, data, binary);
  }
  debugLog(options.debug, `gmsh: encoded ${sink.byteLength} bytes (2.2, ${binary ? 'binary' : 'ascii'})`);
  return sink.toUint8Array();
}

function writeNodes(sink: ByteSink, points: NdArray, binary: boolean): void {
  const coords = pointsAs3d(points);
  const n = coords.length / 3;
  sink.line('$Nodes');
  sink.line(String(n));
  if (binary) {
    for (let i = 0; i < n; i++) {
      sink.pack(NODE_RECORD, [i + 1, coords[3 * i], coords[3 * i + 1], coords[3 * i + 2]]);
    }
    sink.line('');
  } else {
    for (let i = 0; i < n; i++) {
      sink.line(`${i + 1} ${coords[3 * i]} ${coords[3 * i + 1]} ${coords[3 * i + 2]}`);
    }
  }
  sink.line('$EndNodes');
}

function writeElements(sink: ByteSink, mesh: Mesh, binary: boolean): void {
  sink.line('$Elements');
  sink.line(String(mesh.numCells));

  let index = 1;
  for (const [cellTypeName, block] of Object.entries(mesh.cells)) {
    const cellType = getCellType(cellTypeName);
    const code = gmshCodeOf(cellTypeName);
    if (binary && block.dtype !== 'int32') {
      console.warn(`Binary Gmsh needs int32 node indices (got ${block.dtype}). Converting.`);
    }
    const nodes = toNumbers(permuteColumns(block, canonicalToGmshOrder(cellTypeName)));
    const physical = mesh.cellData['gmsh:physical']?.[cellTypeName];
    const geometrical = mesh.cellData['gmsh:geometrical']?.[cellTypeName];
    const tagColumns: number[][] = [];
    if (physical || geometrical) {
      tagColumns.push(physical ? toNumbers(physical) : new Array<number>(rowCount(block)).fill(0));
    }
    if (geometrical) {
      tagColumns.push(toNumbers(geometrical));
    }

    const count = rowCount(block);
    if (binary) {
      sink.pack('3i', [code, count, tagColumns.length]);
      const rows: number[] = [];
      for (let r = 0; r < count; r++) {
        rows.push(index + r);
        for (const column of tagColumns) rows.push(column[r]);
        for (let k = 0; k < cellType.arity; k++) rows.push(nodes[r * cellType.arity + k] + 1);
      }
      sink.array(fromNumbers('int32', rows));
    } else {
      for (let r = 0; r < count; r++) {
        const words = [index + r, code, tagColumns.length];
        for (const column of tagColumns) words.push(column[r]);
        for (let k = 0; k < cellType.arity; k++) words.push(nodes[r * cellType.arity + k] + 1);
        sink.line(words.join(' '));
      }
    }
    index += count;
  }
  if (binary) {
    sink.line('');
  }
  sink.line('$EndElements');
}

function writePeriodic(sink: ByteSink, periodic: readonly PeriodicEntry[]): void {
  sink.line('$Periodic');
  sink.line(String(periodic.length));
  for (const entry of periodic) {
    sink.line(`${entry.dim} ${entry.tags[0]} ${entry.tags[1]}`);
    if (entry.affine !== null) {
      sink.line('Affine ' + entry.affine.map(String).join(' '));
    }
    const pairs = toNumbers(entry.nodes);
    sink.line(String(pairs.length / 2));
    for (let i = 0; i < pairs.length; i += 2) {
      sink.line(`${pairs[i] + 1} ${pairs[i + 1] + 1}`);
    }
  }
  sink.line('$EndPeriodic');
}

export const gmsh22: GmshVersionCodec = { version: '2.2', read, write };
