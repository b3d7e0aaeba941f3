/**
 * HDF5 Datatype Message Parser
 * Maps the datatype message of a dataset onto a numeric dtype
 */

import { _structure_size, _unpack_struct_from } from './core.js';
import type { UnpackedStruct } from './core.js';
import { FormatError, UnsupportedTypeError } from './errors.js';
import type { StructureDefinition } from './types/binary.js';
import type { DtypeName } from './types/dtype.js';
import { DatatypeClass } from './types/hdf5.js';
import type { H5Datatype } from './types/hdf5.js';

// ============================================================================
// Structure Definitions
// ============================================================================

export const DATATYPE_MSG: StructureDefinition = new Map([
  ['class_and_version', 'B'],
  ['class_bit_field_0', 'B'],
  ['class_bit_field_1', 'B'],
  ['class_bit_field_2', 'B'],
  ['size', 'I'],
]);
export const DATATYPE_MSG_SIZE = _structure_size(DATATYPE_MSG);

const FIXED_POINT_DTYPES: Record<number, [signed: DtypeName, unsigned: DtypeName]> = {
  1: ['int8', 'uint8'],
  2: ['int16', 'uint16'],
  4: ['int32', 'uint32'],
  8: ['int64', 'uint64'],
};

// ============================================================================
// DatatypeMessage Class
// ============================================================================

/**
 * Representation of a HDF5 Datatype Message
 * Contents and layout defined in IV.A.2.d of the HDF5 specification
 */
export class DatatypeMessage {
  buf: Uint8Array;
  offset: number;
  datatype: H5Datatype;

  constructor(buf: Uint8Array, offset: number) {
    this.buf = buf;
    this.offset = offset;
    this.datatype = this.determine_dtype();
  }

  determine_dtype(): H5Datatype {
    const datatypeMsg = _unpack_struct_from(DATATYPE_MSG, this.buf, this.offset);
    this.offset += DATATYPE_MSG_SIZE;

    // Last 4 bits determine datatype class
    const datatypeClass = datatypeMsg.get('class_and_version') & 0x0f;

    switch (datatypeClass) {
      case DatatypeClass.FIXED_POINT:
        return this._determine_dtype_fixed_point(datatypeMsg);

      case DatatypeClass.FLOATING_POINT:
        return this._determine_dtype_floating_point(datatypeMsg);

      case DatatypeClass.ENUMERATED:
        // the base type follows the enumeration header
        return this.determine_dtype();

      case DatatypeClass.TIME:
      case DatatypeClass.STRING:
      case DatatypeClass.BITFIELD:
      case DatatypeClass.OPAQUE:
      case DatatypeClass.COMPOUND:
      case DatatypeClass.REFERENCE:
      case DatatypeClass.VARIABLE_LENGTH:
      case DatatypeClass.ARRAY:
        throw new UnsupportedTypeError(
          `HDF5 datatype class ${DatatypeClass[datatypeClass]} is not a numeric type`
        );

      default:
        throw new FormatError('Invalid datatype class ' + datatypeClass.toFixed());
    }
  }

  private _determine_dtype_fixed_point(datatypeMsg: UnpackedStruct): H5Datatype {
    const lengthInBytes = datatypeMsg.get('size');
    const pair = FIXED_POINT_DTYPES[lengthInBytes];
    if (pair === undefined) {
      throw new UnsupportedTypeError(`Unsupported integer size ${lengthInBytes}`);
    }
    const bitField = datatypeMsg.get('class_bit_field_0');
    const signed = (bitField & 0x08) > 0;

    // 4-byte fixed-point property description (not read, assumed IEEE standard)
    this.offset += 4;

    return { dtype: signed ? pair[0] : pair[1], littleEndian: (bitField & 0x01) === 0 };
  }

  private _determine_dtype_floating_point(datatypeMsg: UnpackedStruct): H5Datatype {
    const lengthInBytes = datatypeMsg.get('size');
    if (lengthInBytes !== 4 && lengthInBytes !== 8) {
      throw new UnsupportedTypeError(`Unsupported floating point size ${lengthInBytes}`);
    }
    const bitField = datatypeMsg.get('class_bit_field_0');

    // 12-bytes floating-point property description (not read, assumed IEEE standard)
    this.offset += 12;

    return {
      dtype: lengthInBytes === 4 ? 'float32' : 'float64',
      littleEndian: (bitField & 0x01) === 0,
    };
  }
}
