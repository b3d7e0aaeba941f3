/**
 * Public type definitions
 */

export * from './dtype.js';
export * from './mesh.js';
export * from './gmsh.js';
export * from './xdmf.js';
export type { H5Datatype, Links, LinkTarget } from './hdf5.js';
