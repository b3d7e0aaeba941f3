import { describe, it, expect } from 'vitest';
import { readMixedCells, writeMixedCells } from './mixed-cells.js';
import { FormatError, UnsupportedCellTypeError } from './errors.js';
import { fromNumbers, fromRows, toNumbers } from './ndarray.js';

describe('writeMixedCells', () => {
  it('should prefix each cell with its index and lines with their node count', () => {
    const stream = writeMixedCells({
      triangle: fromRows('int32', [[0, 1, 2]]),
      line: fromRows('int32', [
        [0, 1],
        [1, 2],
      ]),
    });
    expect(toNumbers(stream.data)).toEqual([4, 0, 1, 2, 2, 2, 0, 1, 2, 2, 1, 2]);
    expect(stream.data.dtype).toBe('int32');
    expect(stream.numCells).toBe(3);
    expect(stream.dimension).toBe(12);
  });

  it('should size the stream as the sum of arity plus one, plus one per line', () => {
    const stream = writeMixedCells({
      tetra: fromRows('int64', [
        [0, 1, 2, 3],
        [1, 2, 3, 4],
      ]),
      vertex: fromRows('int64', [[4]]),
    });
    // 2 × (4 + 1) + (1 + 1)
    expect(stream.dimension).toBe(12);
    expect(stream.numCells).toBe(3);
  });
});

describe('readMixedCells', () => {
  it('should group cells by type in first-seen order', () => {
    const cells = readMixedCells(fromNumbers('int32', [2, 2, 0, 1, 4, 0, 1, 2, 2, 2, 1, 2]));
    expect(Object.keys(cells)).toEqual(['line', 'triangle']);
    expect(cells.line.shape).toEqual([2, 2]);
    expect(toNumbers(cells.line)).toEqual([0, 1, 1, 2]);
    expect(toNumbers(cells.triangle)).toEqual([0, 1, 2]);
    expect(cells.line.dtype).toBe('int32');
  });

  it('should read back what it wrote', () => {
    const quad = fromRows('int64', [[0, 1, 2, 3]]);
    const triangle = fromRows('int64', [[3, 2, 4]]);
    const cells = readMixedCells(writeMixedCells({ quad, triangle }).data);
    expect(toNumbers(cells.quad)).toEqual([0, 1, 2, 3]);
    expect(toNumbers(cells.triangle)).toEqual([3, 2, 4]);
  });

  it('should reject polylines with other than two nodes', () => {
    expect(() => readMixedCells(fromNumbers('int32', [2, 3, 0, 1, 2]))).toThrow(FormatError);
  });

  it('should reject a truncated stream', () => {
    expect(() => readMixedCells(fromNumbers('int32', [4, 0, 1]))).toThrow(FormatError);
  });

  it('should reject unknown indices', () => {
    expect(() => readMixedCells(fromNumbers('int32', [3, 0, 1]))).toThrow(UnsupportedCellTypeError);
  });
});
