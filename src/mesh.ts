/**
 * In-memory mesh container shared by all codecs
 */

import { FormatError, WriteError } from './errors.js';
import { concat, rowCount, sliceRows } from './ndarray.js';
import type { NdArray } from './types/dtype.js';
import type {
  CellBlocks,
  CellData,
  FieldData,
  MeshInit,
  PeriodicEntry,
  PointData,
} from './types/mesh.js';

export class Mesh {
  points: NdArray;
  cells: CellBlocks;
  pointData: PointData;
  cellData: CellData;
  fieldData: FieldData;
  gmshPeriodic: PeriodicEntry[] | null;

  constructor(points: NdArray, cells: CellBlocks, init: MeshInit = {}) {
    this.points = points;
    this.cells = cells;
    this.pointData = init.pointData ?? {};
    this.cellData = init.cellData ?? {};
    this.fieldData = init.fieldData ?? {};
    this.gmshPeriodic = init.gmshPeriodic ?? null;
  }

  get numPoints(): number {
    return rowCount(this.points);
  }

  get numCells(): number {
    return Object.values(this.cells).reduce((sum, block) => sum + rowCount(block), 0);
  }

  get cellTypes(): string[] {
    return Object.keys(this.cells);
  }
}

/**
 * Split flat per-cell arrays (ordered like the cell blocks) into per-type arrays
 */
export function cellDataFromRaw(cells: CellBlocks, raw: Record<string, NdArray>): CellData {
  const total = Object.values(cells).reduce((sum, block) => sum + rowCount(block), 0);
  const cellData: CellData = {};

  for (const [name, data] of Object.entries(raw)) {
    if (rowCount(data) !== total) {
      throw new FormatError(
        `Cell data "${name}" has ${rowCount(data)} entries but the mesh has ${total} cells`
      );
    }
    const perType: Record<string, NdArray> = {};
    let start = 0;
    for (const [cellType, block] of Object.entries(cells)) {
      const end = start + rowCount(block);
      perType[cellType] = sliceRows(data, start, end);
      start = end;
    }
    cellData[name] = perType;
  }
  return cellData;
}

/**
 * Concatenate per-type cell data back into one flat array per field, in the
 * order of the cell blocks. Every field must cover every cell block row for row.
 */
export function rawFromCellData(cells: CellBlocks, cellData: CellData): Record<string, NdArray> {
  const raw: Record<string, NdArray> = {};
  for (const [name, perType] of Object.entries(cellData)) {
    for (const cellType of Object.keys(perType)) {
      if (!(cellType in cells)) {
        throw new WriteError(`Cell data "${name}" has an entry for "${cellType}", which the mesh does not have`);
      }
    }
    const blocks = Object.entries(cells).map(([cellType, block]) => {
      const data: NdArray | undefined = perType[cellType];
      if (data === undefined) {
        throw new WriteError(`Cell data "${name}" has no entry for cell type "${cellType}"`);
      }
      if (rowCount(data) !== rowCount(block)) {
        throw new WriteError(
          `Cell data "${name}" has ${rowCount(data)} ${cellType} entries but the mesh has ${rowCount(block)} ${cellType} cells`
        );
      }
      return data;
    });
    if (blocks.length > 0) {
      raw[name] = concat(blocks);
    }
  }
  return raw;
}
