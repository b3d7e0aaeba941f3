import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { H5Writer } from './h5-writer.js';
import { H5File, Dataset, Group } from './high-level.js';
import { WriteError } from './errors.js';
import { fromNumbers, fromRows, toNumbers } from './ndarray.js';

describe('H5Writer', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'meshwire-h5-'));
    file = path.join(dir, 'store.h5');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should create an empty root group immediately', () => {
    H5Writer.create(file);
    const h5 = H5File.open(file);
    expect(h5.keys).toEqual([]);
    h5.close();
  });

  it('should start with a version 2 superblock', () => {
    H5Writer.create(file).close();
    const bytes = readFileSync(file);
    expect(Array.from(bytes.subarray(0, 8))).toEqual([0x89, 0x48, 0x44, 0x46, 0x0d, 0x0a, 0x1a, 0x0a]);
    expect(bytes[8]).toBe(2);
  });

  it('should write datasets the reader can read back', () => {
    const writer = H5Writer.create(file);
    writer.createDataset('points', fromRows('float64', [[0, 0.5, 1], [2, 2.5, 3]]));
    writer.createDataset('cells', fromRows('int64', [[0, 1, 2], [-5, 2 ** 40, 7]]));
    writer.createDataset('weights', fromNumbers('float32', [0.25, -1.5]));
    writer.createDataset('flags', fromNumbers('uint8', [1, 0, 255]));
    writer.close();

    const h5 = H5File.open(file);
    expect(h5.keys).toEqual(['points', 'cells', 'weights', 'flags']);

    const points = h5.dataset('points');
    expect(points.shape).toEqual([2, 3]);
    expect(points.dtype).toBe('float64');
    expect(toNumbers(points.value)).toEqual([0, 0.5, 1, 2, 2.5, 3]);

    const cells = h5.dataset('cells');
    expect(cells.dtype).toBe('int64');
    expect(toNumbers(cells.value)).toEqual([0, 1, 2, -5, 2 ** 40, 7]);

    expect(h5.dataset('weights').dtype).toBe('float32');
    expect(toNumbers(h5.dataset('weights').value)).toEqual([0.25, -1.5]);
    expect(h5.dataset('flags').dtype).toBe('uint8');
    expect(toNumbers(h5.dataset('flags').value)).toEqual([1, 0, 255]);
    h5.close();
  });

  it('should create intermediate groups for nested paths', () => {
    const writer = H5Writer.create(file);
    writer.createDataset('/mesh/cells/triangle', fromRows('int32', [[0, 1, 2]]));
    writer.createDataset('mesh/points', fromRows('float64', [[1, 2, 3]]));
    writer.close();

    const h5 = H5File.open(file);
    expect(h5.keys).toEqual(['mesh']);
    const mesh = h5.get('mesh');
    expect(mesh).toBeInstanceOf(Group);
    if (mesh instanceof Group) {
      expect(mesh.keys).toEqual(['cells', 'points']);
      expect(mesh.get('cells/triangle')).toBeInstanceOf(Dataset);
      // absolute paths resolve from the root
      expect(toNumbers(mesh.dataset('/mesh/points').value)).toEqual([1, 2, 3]);
    }
    expect(toNumbers(h5.dataset('mesh/cells/triangle').value)).toEqual([0, 1, 2]);
    h5.close();
  });

  it('should store empty arrays without data', () => {
    const writer = H5Writer.create(file);
    writer.createDataset('empty', fromNumbers('float64', []));
    writer.close();

    const h5 = H5File.open(file);
    const empty = h5.dataset('empty');
    expect(empty.shape).toEqual([0]);
    expect(empty.value.data.length).toBe(0);
    h5.close();
  });

  it('should rewrite the file on every flush', () => {
    const writer = H5Writer.create(file);
    writer.createDataset('a', fromNumbers('int32', [1]));
    writer.flush();
    expect(H5File.open(file).keys).toEqual(['a']);
    writer.createDataset('b', fromNumbers('int32', [2]));
    writer.flush();
    expect(H5File.open(file).keys).toEqual(['a', 'b']);
    writer.close();
  });

  it('should reject duplicate names', () => {
    const writer = H5Writer.create(file);
    writer.createDataset('a', fromNumbers('int32', [1]));
    expect(() => writer.createDataset('a', fromNumbers('int32', [2]))).toThrow(WriteError);
    expect(() => writer.createDataset('a/b', fromNumbers('int32', [2]))).toThrow(/"a" is a dataset/);
    expect(() => writer.createDataset('/', fromNumbers('int32', [2]))).toThrow(WriteError);
    writer.close();
  });

  it('should refuse new datasets once closed', () => {
    const writer = H5Writer.create(file);
    writer.close();
    writer.close();
    expect(() => writer.createDataset('a', fromNumbers('int32', [1]))).toThrow(WriteError);
  });
});
