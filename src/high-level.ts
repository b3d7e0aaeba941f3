/**
 * High-level HDF5 API
 * Provides Group, H5File and Dataset for reading HDF5 files
 */

import { readFileSync } from 'fs';
import { DataObjects } from './dataobjects.js';
import { debugLog } from './debug.js';
import { FormatError, ReadError } from './errors.js';
import { SuperBlock } from './misc-low-level.js';
import type { DtypeName, NdArray } from './types/dtype.js';
import type { Links } from './types/hdf5.js';

// ============================================================================
// Utility Functions
// ============================================================================

function normpath(path: string): string {
  return path.replace(/\/(\/)+/g, '/');
}

export interface H5OpenOptions {
  /** Enable debug logging */
  debug?: boolean;
}

// ============================================================================
// Group Class
// ============================================================================

/**
 * An HDF5 Group which may hold datasets or other groups.
 */
export class Group {
  name: string;
  protected _fh: Uint8Array;
  protected _links: Links;
  protected _dataobjects: DataObjects;

  constructor(name: string, dataobjects: DataObjects, fh: Uint8Array) {
    this.name = name;
    this._fh = fh;
    this._links = dataobjects.get_links();
    this._dataobjects = dataobjects;
  }

  get keys(): string[] {
    return Array.from(this._links.keys());
  }

  /**
   * Get a child object by path, relative to this group or absolute from the root
   */
  get(y: string): Group | Dataset {
    const path = normpath(y);
    if (path === '.' || path === '') {
      return this;
    }
    if (path.startsWith('/')) {
      return this._root().get(path.slice(1));
    }

    const slash = path.indexOf('/');
    const next_obj = slash < 0 ? path : path.slice(0, slash);
    const additional_obj = slash < 0 ? '.' : path.slice(slash + 1);

    const link_target = this._links.get(next_obj);
    if (link_target === undefined) {
      throw new FormatError(`${next_obj} not found in group ${this.name}`);
    }

    if (typeof link_target === 'string') {
      // soft link: resolve the stored path, then continue below it
      const target = this.get(link_target);
      if (target instanceof Dataset) {
        if (additional_obj !== '.') {
          throw new FormatError(`${target.name} is a dataset, not a group`);
        }
        return target;
      }
      return target.get(additional_obj);
    }

    const obj_name = normpath(this.name + '/' + next_obj);
    const dataobjs = new DataObjects(this._fh, link_target);
    if (dataobjs.is_dataset) {
      if (additional_obj !== '.') {
        throw new FormatError(obj_name + ' is a dataset, not a group');
      }
      return new Dataset(obj_name, dataobjs);
    }
    return new Group(obj_name, dataobjs, this._fh).get(additional_obj);
  }

  /** Dataset at `path`; a group there is a FormatError */
  dataset(path: string): Dataset {
    const obj = this.get(path);
    if (!(obj instanceof Dataset)) {
      throw new FormatError(`${obj.name} is a group, not a dataset`);
    }
    return obj;
  }

  protected _root(): Group {
    const superblock = new SuperBlock(this._fh, 0);
    return new Group('/', new DataObjects(this._fh, superblock.offset_to_dataobjects), this._fh);
  }
}

// ============================================================================
// H5File Class
// ============================================================================

/**
 * An open HDF5 file. The whole file is read into memory; H5File is also
 * the root group.
 */
export class H5File extends Group {
  filename: string;
  private _closed: boolean;

  constructor(fh: Uint8Array, filename: string = '') {
    const superblock = new SuperBlock(fh, 0);
    super('/', new DataObjects(fh, superblock.offset_to_dataobjects), fh);
    this.filename = filename;
    this._closed = false;
  }

  static open(path: string, options: H5OpenOptions = {}): H5File {
    const bytes = readFileSync(path);
    debugLog(options.debug, `hdf5: opened ${path} (${bytes.byteLength} bytes)`);
    return new H5File(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength), path);
  }

  get closed(): boolean {
    return this._closed;
  }

  get(y: string): Group | Dataset {
    if (this._closed) {
      throw new ReadError(`HDF5 file ${this.filename} is closed`);
    }
    return super.get(y);
  }

  close(): void {
    this._closed = true;
    this._fh = new Uint8Array(0);
  }

  protected _root(): Group {
    return this;
  }
}

// ============================================================================
// Dataset Class
// ============================================================================

/**
 * A HDF5 Dataset containing an n-dimensional numeric array.
 */
export class Dataset {
  name: string;
  _dataobjects: DataObjects;

  constructor(name: string, dataobjects: DataObjects) {
    this.name = name;
    this._dataobjects = dataobjects;
  }

  get value(): NdArray {
    return this._dataobjects.get_data();
  }

  get shape(): number[] {
    return this._dataobjects.shape;
  }

  get dtype(): DtypeName {
    return this._dataobjects.datatype.dtype;
  }
}
