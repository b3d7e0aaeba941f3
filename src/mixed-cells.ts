/**
 * Translation between grouped cell blocks and the flat XDMF mixed topology
 * stream `(index, nodes...)`
 */

import { cellTypeFromXdmfIndex, getCellType, xdmfIndexOf } from './cell-types.js';
import { FormatError } from './errors.js';
import { fromNumbers, getNumber, rowCount, toNumbers } from './ndarray.js';
import type { DtypeName, NdArray } from './types/dtype.js';
import type { CellBlocks } from './types/mesh.js';

/** Polylines carry their node count; only two-node lines are supported */
const LINE_NODE_COUNT = 2;

export interface MixedStream {
  data: NdArray;
  numCells: number;
  /** Length of the flat stream: sum of (arity + 1) over cells, plus one per line */
  dimension: number;
}

/**
 * Group a mixed stream by cell type. Types keep the order in which they
 * first appear; cells keep their order within each type.
 */
export function readMixedCells(stream: NdArray): CellBlocks {
  const groups = new Map<string, number[]>();
  const n = stream.data.length;
  let i = 0;

  while (i < n) {
    const cellType = cellTypeFromXdmfIndex(getNumber(stream, i));
    i += 1;
    if (cellType.name === 'line') {
      const count = getNumber(stream, i);
      if (count !== LINE_NODE_COUNT) {
        throw new FormatError(`Polyline with ${count} nodes in mixed topology; only 2 are supported`);
      }
      i += 1;
    }
    if (i + cellType.arity > n) {
      throw new FormatError(
        `Mixed topology ends inside a ${cellType.name} cell (needs ${cellType.arity} nodes, ${n - i} left)`
      );
    }
    let nodes = groups.get(cellType.name);
    if (nodes === undefined) {
      nodes = [];
      groups.set(cellType.name, nodes);
    }
    for (let k = 0; k < cellType.arity; k++) {
      nodes.push(getNumber(stream, i + k));
    }
    i += cellType.arity;
  }

  const cells: CellBlocks = {};
  for (const [name, nodes] of groups) {
    const arity = getCellType(name).arity;
    cells[name] = fromNumbers(stream.dtype, nodes, [nodes.length / arity, arity]);
  }
  return cells;
}

/**
 * Flatten cell blocks into a mixed stream, in block order
 */
export function writeMixedCells(cells: CellBlocks): MixedStream {
  const blocks = Object.entries(cells);
  const dtype: DtypeName = blocks.length > 0 ? blocks[0][1].dtype : 'int64';
  const flat: number[] = [];
  let numCells = 0;

  for (const [name, block] of blocks) {
    const index = xdmfIndexOf(name);
    const arity = getCellType(name).arity;
    const nodes = toNumbers(block);
    const count = rowCount(block);
    for (let r = 0; r < count; r++) {
      flat.push(index);
      if (name === 'line') {
        flat.push(LINE_NODE_COUNT);
      }
      for (let k = 0; k < arity; k++) {
        flat.push(nodes[r * arity + k]);
      }
    }
    numCells += count;
  }

  return { data: fromNumbers(dtype, flat), numCells, dimension: flat.length };
}
