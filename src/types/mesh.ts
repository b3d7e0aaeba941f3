/**
 * Mesh container type definitions
 */

import type { NdArray } from './dtype.js';

/** Canonical cell type name → K × arity node-index array, in insertion order */
export type CellBlocks = Record<string, NdArray>;

/** Field name → cell type → array aligned with that type's cells */
export type CellData = Record<string, Record<string, NdArray>>;

/** Field name → array aligned with the points */
export type PointData = Record<string, NdArray>;

/** Physical group name → [id, dimension] */
export type FieldData = Record<string, readonly number[]>;

/** One `$Periodic` entry of a Gmsh 2.2 file */
export interface PeriodicEntry {
  /** Dimension of the periodic entities */
  dim: number;
  /** [slave entity tag, master entity tag] */
  tags: [number, number];
  /** 16 coefficients of the affine transform, or null when absent */
  affine: number[] | null;
  /** K × 2 pairs of 0-based [slave node, master node] */
  nodes: NdArray;
}

export interface MeshInit {
  pointData?: PointData;
  cellData?: CellData;
  fieldData?: FieldData;
  gmshPeriodic?: PeriodicEntry[] | null;
}

/** Static record of one canonical cell type */
export interface CellTypeDescriptor {
  name: string;
  /** Number of nodes per cell */
  arity: number;
  /** Topological dimension */
  dimension: number;
  /** Gmsh element type code, null when Gmsh has none */
  gmsh: number | null;
  /** XDMF topology names; the first one is written */
  xdmf: string[];
  /** Index in an XDMF mixed topology stream */
  xdmfIndex: number | null;
  /** canonical[j] = gmsh[gmshNodeOrder[j]] when Gmsh numbers the nodes differently */
  gmshNodeOrder: number[] | null;
}
