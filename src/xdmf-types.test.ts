import { describe, it, expect } from 'vitest';
import {
  attributeType,
  dtypeToXdmf,
  formatExponential,
  formatValues,
  parseValue,
  xdmfToDtype,
} from './xdmf-types.js';
import { UnsupportedTypeError, WriteError } from './errors.js';
import { fromNumbers } from './ndarray.js';

describe('XDMF number types', () => {
  it('should map DataType and Precision pairs to dtypes', () => {
    expect(xdmfToDtype('Float', '8')).toBe('float64');
    expect(xdmfToDtype('Int', '4')).toBe('int32');
    expect(xdmfToDtype('UChar', '1')).toBe('uint8');
    expect(dtypeToXdmf('int64')).toEqual({ type: 'Int', precision: '8' });
  });

  it('should list the known pairs when a pair is unknown', () => {
    expect(() => xdmfToDtype('Float', '2')).toThrow(UnsupportedTypeError);
    expect(() => xdmfToDtype('Float', '2')).toThrow(/\(Float, 4\)/);
    expect(() => dtypeToXdmf('int16')).toThrow(UnsupportedTypeError);
  });
});

describe('XDMF text values', () => {
  it('should format exponents with at least two digits', () => {
    expect(formatExponential(1, 7)).toBe('1.0000000e+00');
    expect(formatExponential(-0.00125, 3)).toBe('-1.250e-03');
    expect(formatExponential(1e100, 2)).toBe('1.00e+100');
    expect(formatExponential(NaN, 3)).toBe('nan');
    expect(formatExponential(-Infinity, 3)).toBe('-inf');
  });

  it('should write one value per line', () => {
    expect(formatValues(fromNumbers('int32', [1, -2]))).toBe('1\n-2\n');
    expect(formatValues(fromNumbers('float32', [0.5]))).toBe('5.0000000e-01\n');
    expect(formatValues(fromNumbers('float64', [2]))).toBe('2.0000000000000000e+00\n');
  });

  it('should parse nan and inf spellings', () => {
    expect(parseValue('NaN')).toBeNaN();
    expect(parseValue('inf')).toBe(Infinity);
    expect(parseValue('-Infinity')).toBe(-Infinity);
    expect(parseValue('1.5e-01')).toBe(0.15);
  });
});

describe('attributeType', () => {
  it('should infer the attribute type from the shape', () => {
    expect(attributeType([4])).toBe('Scalar');
    expect(attributeType([4, 1])).toBe('Scalar');
    expect(attributeType([4, 2])).toBe('Vector');
    expect(attributeType([4, 3])).toBe('Vector');
    expect(attributeType([4, 6])).toBe('Tensor6');
    expect(attributeType([4, 9])).toBe('Tensor');
    expect(attributeType([4, 3, 3])).toBe('Tensor');
    expect(attributeType([4, 2, 5])).toBe('Matrix');
  });

  it('should reject shapes without an attribute type', () => {
    expect(() => attributeType([4, 5])).toThrow(WriteError);
    expect(() => attributeType([2, 2, 2, 2])).toThrow(WriteError);
  });
});
