/**
 * meshwire - Gmsh and XDMF mesh file I/O in pure TypeScript
 *
 * Main entry point exporting all public APIs
 */

// Mesh container
export { Mesh, cellDataFromRaw, rawFromCellData } from './mesh.js';

// Gmsh
export { readGmsh, writeGmsh, decodeGmsh, encodeGmsh, readHeader, gmshReaders, gmshWriters } from './gmsh.js';

// XDMF time series
export {
  TimeSeriesReader,
  TimeSeriesWriter,
  withTimeSeriesReader,
  withTimeSeriesWriter,
} from './time-series.js';
export { describeDataItem, DATA_FORMATS } from './data-item.js';
export { readMixedCells, writeMixedCells } from './mixed-cells.js';
export type { MixedStream } from './mixed-cells.js';
export { attributeType, xdmfToDtype, dtypeToXdmf } from './xdmf-types.js';

// HDF5 store
export { H5File, Group, Dataset } from './high-level.js';
export type { H5OpenOptions } from './high-level.js';
export { H5Writer } from './h5-writer.js';
export type { H5WriterOptions } from './h5-writer.js';

// Cell types
export {
  cellTypeNames,
  getCellType,
  cellTypeFromGmsh,
  gmshCodeOf,
  cellTypeFromXdmf,
  xdmfNameOf,
  cellTypeFromXdmfIndex,
  xdmfIndexOf,
} from './cell-types.js';

// Arrays
export {
  DTYPE_NAMES,
  zeros,
  fromNumbers,
  fromRows,
  toNumbers,
  toRows,
  getNumber,
  reshape,
  astype,
  concat,
} from './ndarray.js';

// Errors
export {
  MeshError,
  FormatError,
  ReadError,
  WriteError,
  UnsupportedVersionError,
  UnsupportedTypeError,
  UnsupportedCellTypeError,
} from './errors.js';

// Debug utilities
export { debugLog, debugWarn } from './debug.js';

// Types
export type * from './types/index.js';
