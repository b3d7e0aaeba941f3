/**
 * Error taxonomy shared by every codec in the library.
 *
 * All errors are fatal to the read or write call that raised them. Messages
 * name the offending value and, where a table lookup failed, the accepted ones.
 */

/** Base class for every error raised by this library */
export class MeshError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MeshError';
  }
}

/** Structural violation of a file: bad markers, counts, attributes or sentinels */
export class FormatError extends MeshError {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

/** Reader API used out of order (e.g. frame data before points and cells) */
export class ReadError extends MeshError {
  constructor(message: string) {
    super(message);
    this.name = 'ReadError';
  }
}

/** Caller data violates an output constraint of the target format */
export class WriteError extends MeshError {
  constructor(message: string) {
    super(message);
    this.name = 'WriteError';
  }
}

export class UnsupportedVersionError extends MeshError {
  constructor(
    public readonly requested: string,
    public readonly available: string[]
  ) {
    super(`Unsupported mesh format version "${requested}" (available: ${available.join(', ')})`);
    this.name = 'UnsupportedVersionError';
  }
}

export class UnsupportedTypeError extends MeshError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedTypeError';
  }
}

export class UnsupportedCellTypeError extends MeshError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedCellTypeError';
  }
}
