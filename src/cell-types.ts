/**
 * Cell-type descriptor table
 *
 * Loaded once from data/cell-types.json and indexed by canonical name, Gmsh
 * element code, XDMF topology name and XDMF mixed index.
 */

import { readFileSync } from 'fs';
import { UnsupportedCellTypeError } from './errors.js';
import type { CellTypeDescriptor } from './types/mesh.js';

// ============================================================================
// Table Loading
// ============================================================================

const TABLE_URL = new URL('../data/cell-types.json', import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function parseDescriptor(entry: unknown): CellTypeDescriptor {
  if (
    !isRecord(entry) ||
    typeof entry.name !== 'string' ||
    typeof entry.arity !== 'number' ||
    typeof entry.dimension !== 'number' ||
    !(entry.gmsh === null || typeof entry.gmsh === 'number') ||
    !isStringList(entry.xdmf) ||
    !(entry.xdmfIndex === null || typeof entry.xdmfIndex === 'number') ||
    !(entry.gmshNodeOrder === null || isNumberList(entry.gmshNodeOrder))
  ) {
    throw new Error(`Malformed cell type entry: ${JSON.stringify(entry)}`);
  }
  return Object.freeze({
    name: entry.name,
    arity: entry.arity,
    dimension: entry.dimension,
    gmsh: entry.gmsh,
    xdmf: entry.xdmf,
    xdmfIndex: entry.xdmfIndex,
    gmshNodeOrder: entry.gmshNodeOrder,
  });
}

function loadTable(): CellTypeDescriptor[] {
  const raw: unknown = JSON.parse(readFileSync(TABLE_URL, 'utf-8'));
  if (!isRecord(raw) || !Array.isArray(raw.cellTypes)) {
    throw new Error(`${TABLE_URL.pathname} has no "cellTypes" list`);
  }
  return raw.cellTypes.map(parseDescriptor);
}

const CELL_TYPES: readonly CellTypeDescriptor[] = Object.freeze(loadTable());

const BY_NAME = new Map(CELL_TYPES.map((d) => [d.name, d]));
const BY_GMSH = new Map<number, CellTypeDescriptor>();
const BY_XDMF_NAME = new Map<string, CellTypeDescriptor>();
const BY_XDMF_INDEX = new Map<number, CellTypeDescriptor>();

for (const d of CELL_TYPES) {
  if (d.gmsh !== null) BY_GMSH.set(d.gmsh, d);
  if (d.xdmfIndex !== null) BY_XDMF_INDEX.set(d.xdmfIndex, d);
  for (const name of d.xdmf) BY_XDMF_NAME.set(name, d);
}

// ============================================================================
// Lookups
// ============================================================================

export function cellTypeNames(): string[] {
  return CELL_TYPES.map((d) => d.name);
}

export function getCellType(name: string): CellTypeDescriptor {
  const d = BY_NAME.get(name);
  if (!d) {
    throw new UnsupportedCellTypeError(`Unknown cell type "${name}"`);
  }
  return d;
}

export function cellTypeFromGmsh(code: number): CellTypeDescriptor {
  const d = BY_GMSH.get(code);
  if (!d) {
    throw new UnsupportedCellTypeError(`Unknown Gmsh element type ${code}`);
  }
  return d;
}

export function gmshCodeOf(name: string): number {
  const d = getCellType(name);
  if (d.gmsh === null) {
    throw new UnsupportedCellTypeError(`Cell type "${name}" has no Gmsh equivalent`);
  }
  return d.gmsh;
}

export function cellTypeFromXdmf(topologyType: string): CellTypeDescriptor {
  const d = BY_XDMF_NAME.get(topologyType);
  if (!d) {
    throw new UnsupportedCellTypeError(
      `Unknown XDMF topology type "${topologyType}" (known: ${Array.from(BY_XDMF_NAME.keys()).join(', ')})`
    );
  }
  return d;
}

export function xdmfNameOf(name: string): string {
  const d = getCellType(name);
  if (d.xdmf.length === 0) {
    throw new UnsupportedCellTypeError(`Cell type "${name}" has no XDMF equivalent`);
  }
  return d.xdmf[0];
}

export function cellTypeFromXdmfIndex(index: number): CellTypeDescriptor {
  const d = BY_XDMF_INDEX.get(index);
  if (!d) {
    throw new UnsupportedCellTypeError(`Unknown XDMF mixed topology index ${index}`);
  }
  return d;
}

export function xdmfIndexOf(name: string): number {
  const d = getCellType(name);
  if (d.xdmfIndex === null) {
    throw new UnsupportedCellTypeError(`Cell type "${name}" cannot appear in a mixed topology`);
  }
  return d.xdmfIndex;
}

// ============================================================================
// Gmsh Node Ordering
// ============================================================================

/** Column permutation from Gmsh node order to canonical order, or null */
export function gmshToCanonicalOrder(name: string): number[] | null {
  return getCellType(name).gmshNodeOrder;
}

/** Column permutation from canonical node order to Gmsh order, or null */
export function canonicalToGmshOrder(name: string): number[] | null {
  const order = getCellType(name).gmshNodeOrder;
  if (order === null) {
    return null;
  }
  const inverse = new Array<number>(order.length);
  order.forEach((source, target) => {
    inverse[source] = target;
  });
  return inverse;
}
