/**
 * XDMF time-series type definitions
 */

import type { NdArray } from './dtype.js';
import type { CellBlocks, CellData, PointData } from './mesh.js';

/** Where the heavy data of a DataItem lives */
export type DataFormat = 'XML' | 'Binary' | 'HDF';

export type Endianness = 'Little' | 'Big' | 'Native';

/** Validated attributes and text of one `<DataItem>` */
export interface DataItemDescriptor {
  format: DataFormat;
  dtype: NdArray['dtype'];
  dimensions: number[];
  endian: Endianness;
  /** Inline values, a sidecar file name, or `file:/path` into an HDF5 store */
  text: string;
}

export interface TimeSeriesReaderOptions {
  /** Trace opened stores and resolved data items */
  debug?: boolean;
}

export interface TimeSeriesWriterOptions {
  /** @default 'HDF' */
  dataFormat?: string;
  /** Indent the XML document @default true */
  prettyXml?: boolean;
  debug?: boolean;
}

export interface PointsCells {
  points: NdArray;
  cells: CellBlocks;
}

/** One time step of a series */
export interface DataFrame {
  time: number;
  pointData: PointData;
  cellData: CellData;
}
