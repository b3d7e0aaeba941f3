import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import {
  TimeSeriesReader,
  TimeSeriesWriter,
  withTimeSeriesReader,
  withTimeSeriesWriter,
} from './time-series.js';
import { FormatError, ReadError, UnsupportedCellTypeError, WriteError } from './errors.js';
import { H5File } from './high-level.js';
import { fromNumbers, fromRows, toNumbers } from './ndarray.js';

const points = fromRows('float64', [
  [0, 0, 0],
  [1, 0, 0],
  [1, 1, 0],
  [0, 1, 0.5],
]);
const triangles = fromRows('int32', [
  [0, 1, 2],
  [0, 2, 3],
]);

describe('TimeSeriesWriter and TimeSeriesReader', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'meshwire-xdmf-'));
    file = path.join(dir, 'series.xdmf');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  for (const dataFormat of ['XML', 'Binary', 'HDF']) {
    it(`should round-trip a series with ${dataFormat} data`, () => {
      withTimeSeriesWriter(
        file,
        (writer) => {
          writer.writePointsCells(points, { triangle: triangles });
          writer.writeData(
            0,
            { u: fromNumbers('float64', [0.5, 1.5, 2.5, 3.5]) },
            { c: { triangle: fromNumbers('float64', [10, 20]) } }
          );
          writer.writeData(1.5, { v: fromRows('float32', [[1, 0], [0, 1], [1, 1], [0, 0]]) });
        },
        { dataFormat }
      );

      withTimeSeriesReader(file, (reader) => {
        expect(reader.numSteps).toBe(2);
        const mesh = reader.readPointsCells();
        expect(mesh.points.shape).toEqual([4, 3]);
        expect(toNumbers(mesh.points)).toEqual(toNumbers(points));
        expect(Object.keys(mesh.cells)).toEqual(['triangle']);
        expect(mesh.cells.triangle.dtype).toBe('int32');
        expect(toNumbers(mesh.cells.triangle)).toEqual([0, 1, 2, 0, 2, 3]);

        const first = reader.readData(0);
        expect(first.time).toBe(0);
        expect(toNumbers(first.pointData.u)).toEqual([0.5, 1.5, 2.5, 3.5]);
        expect(toNumbers(first.cellData.c.triangle)).toEqual([10, 20]);

        const second = reader.readData(1);
        expect(second.time).toBe(1.5);
        expect(second.pointData.v.dtype).toBe('float32');
        expect(second.pointData.v.shape).toEqual([4, 2]);
        expect(toNumbers(second.pointData.v)).toEqual([1, 0, 0, 1, 1, 1, 0, 0]);
        expect(second.cellData).toEqual({});
      });
    });
  }

  it('should write the mesh grid and frames as XDMF 3', () => {
    const writer = new TimeSeriesWriter(file, { dataFormat: 'XML' });
    writer.writePointsCells(points, { triangle: triangles });
    writer.writeData(2, { u: fromNumbers('float64', [1, 2, 3, 4]) });
    writer.close();

    const text = readFileSync(file, 'utf-8');
    expect(text.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<Xdmf Version="3.0" xmlns:xi="http://www.w3.org/2003/XInclude">\n')).toBe(true);
    expect(text).toContain('  <Domain>\n    <Grid Name="TimeSeries" GridType="Collection" CollectionType="Temporal">\n');
    expect(text).toContain('    <Grid Name="mesh" GridType="Uniform">\n      <Geometry GeometryType="XYZ">\n');
    expect(text).toContain('<Topology TopologyType="Triangle" NumberOfElements="2">');
    expect(text).toContain('<DataItem DataType="Int" Dimensions="2 3" Format="XML" Precision="4">0\n1\n2\n0\n2\n3\n</DataItem>');
    expect(text).toContain(
      '<xi:include xpointer="xpointer(//Grid[@Name=&quot;mesh&quot;]/*[self::Topology or self::Geometry])"/>'
    );
    expect(text).toContain('<Time Value="2"/>');
    expect(text).toContain('<Attribute Name="u" AttributeType="Scalar" Center="Node">');
  });

  it('should write compact XML when asked', () => {
    withTimeSeriesWriter(file, (writer) => writer.writePointsCells(points, { triangle: triangles }), {
      dataFormat: 'XML',
      prettyXml: false,
    });
    const text = readFileSync(file, 'utf-8');
    expect(text.split('\n')[1].startsWith('<Xdmf Version="3.0" xmlns:xi="http://www.w3.org/2003/XInclude"><Domain><Grid')).toBe(true);
  });

  it('should write several cell types as a mixed topology', () => {
    const cells = {
      triangle: triangles,
      quad: fromRows('int32', [[0, 1, 2, 3]]),
    };
    withTimeSeriesWriter(
      file,
      (writer) => {
        writer.writePointsCells(points, cells);
        writer.writeData(0, {}, { area: { triangle: fromNumbers('float64', [0.5, 0.5]), quad: fromNumbers('float64', [1]) } });
      },
      { dataFormat: 'XML' }
    );

    const text = readFileSync(file, 'utf-8');
    expect(text).toContain('<Topology TopologyType="Mixed" NumberOfElements="3">');
    // 2 × (3 + 1) + (4 + 1)
    expect(text).toContain('<DataItem DataType="Int" Dimensions="13" Format="XML" Precision="4">');

    withTimeSeriesReader(file, (reader) => {
      const mesh = reader.readPointsCells();
      expect(Object.keys(mesh.cells)).toEqual(['triangle', 'quad']);
      expect(toNumbers(mesh.cells.quad)).toEqual([0, 1, 2, 3]);
      const frame = reader.readData(0);
      expect(toNumbers(frame.cellData.area.triangle)).toEqual([0.5, 0.5]);
      expect(toNumbers(frame.cellData.area.quad)).toEqual([1]);
    });
  });

  it('should order cell data by cell block, not by its own keys', () => {
    const cells = {
      line: fromRows('int32', [[0, 1]]),
      triangle: triangles,
    };
    withTimeSeriesWriter(
      file,
      (writer) => {
        writer.writePointsCells(points, cells);
        writer.writeData(0, {}, { c: { triangle: fromNumbers('float64', [10, 20]), line: fromNumbers('float64', [30]) } });
      },
      { dataFormat: 'XML' }
    );

    withTimeSeriesReader(file, (reader) => {
      expect(Object.keys(reader.readPointsCells().cells)).toEqual(['line', 'triangle']);
      const frame = reader.readData(0);
      expect(toNumbers(frame.cellData.c.line)).toEqual([30]);
      expect(toNumbers(frame.cellData.c.triangle)).toEqual([10, 20]);
    });
  });

  it('should refuse cell data missing a cell type and write no frame', () => {
    const writer = new TimeSeriesWriter(file, { dataFormat: 'XML' });
    writer.writePointsCells(points, { line: fromRows('int32', [[0, 1]]), triangle: triangles });
    expect(() => writer.writeData(0, {}, { c: { triangle: fromNumbers('float64', [10, 20]) } })).toThrow(
      new WriteError('Cell data "c" has no entry for cell type "line"')
    );
    writer.close();
    expect(withTimeSeriesReader(file, (reader) => reader.numSteps)).toBe(0);
  });

  it('should share one counter between sidecar files', () => {
    withTimeSeriesWriter(
      file,
      (writer) => {
        writer.writePointsCells(points, { triangle: triangles });
        writer.writeData(0, { u: fromNumbers('float64', [1, 2, 3, 4]) });
      },
      { dataFormat: 'Binary' }
    );
    expect(['series0.bin', 'series1.bin', 'series2.bin'].map((f) => existsSync(path.join(dir, f)))).toEqual([
      true,
      true,
      true,
    ]);
    expect(existsSync(path.join(dir, 'series3.bin'))).toBe(false);
  });

  it('should keep HDF data in a single store named after the document', () => {
    withTimeSeriesWriter(file, (writer) => {
      writer.writePointsCells(points, { triangle: triangles });
      writer.writeData(0, { u: fromNumbers('float64', [1, 2, 3, 4]) });
    });
    const h5 = H5File.open(path.join(dir, 'series.h5'));
    expect(h5.keys).toEqual(['data0', 'data1', 'data2']);
    expect(h5.dataset('data0').shape).toEqual([4, 3]);
    h5.close();
    expect(readFileSync(file, 'utf-8')).toContain('>series.h5:/data2</DataItem>');
  });

  it('should write planar points as XY geometry', () => {
    const planar = fromRows('float64', [[0, 0], [1, 0], [0, 1]]);
    withTimeSeriesWriter(file, (writer) => writer.writePointsCells(planar, { triangle: fromRows('int32', [[0, 1, 2]]) }), {
      dataFormat: 'XML',
    });
    expect(readFileSync(file, 'utf-8')).toContain('<Geometry GeometryType="XY">');
    const mesh = withTimeSeriesReader(file, (reader) => reader.readPointsCells());
    expect(mesh.points.shape).toEqual([3, 2]);
  });

  it('should reject points that are neither 2-D nor 3-D', () => {
    const writer = new TimeSeriesWriter(file, { dataFormat: 'XML' });
    expect(() => writer.writePointsCells(fromRows('float64', [[0, 0, 0, 0]]), {})).toThrow(WriteError);
    writer.close();
  });

  it('should reject an unknown data format', () => {
    expect(() => new TimeSeriesWriter(file, { dataFormat: 'JSON' })).toThrow(
      'Unknown data format "JSON" (use XML, Binary, HDF)'
    );
  });

  it('should reject cell types without an XDMF name', () => {
    const writer = new TimeSeriesWriter(file, { dataFormat: 'XML' });
    expect(() => writer.writePointsCells(points, { blob: triangles })).toThrow(UnsupportedCellTypeError);
    writer.close();
  });

  it('should require the mesh before any frame and leave the document unchanged', () => {
    const writer = new TimeSeriesWriter(file, { dataFormat: 'XML' });
    expect(() => writer.writeData(0, { u: fromNumbers('float64', [1, 2, 3, 4]) })).toThrow(WriteError);
    writer.writePointsCells(points, { triangle: triangles });
    expect(() => writer.writePointsCells(points, { triangle: triangles })).toThrow(/already written/);
    writer.close();

    withTimeSeriesReader(file, (reader) => {
      expect(reader.numSteps).toBe(0);
    });
  });

  it('should reject attribute shapes without an XDMF attribute type', () => {
    const writer = new TimeSeriesWriter(file, { dataFormat: 'XML' });
    writer.writePointsCells(points, { triangle: triangles });
    expect(() => writer.writeData(0, { bad: fromNumbers('float64', new Array<number>(20).fill(0), [4, 5]) })).toThrow(
      WriteError
    );
    writer.close();
    expect(withTimeSeriesReader(file, (reader) => reader.numSteps)).toBe(0);
  });

  it('should close the writer when the callback throws', () => {
    expect(() =>
      withTimeSeriesWriter(
        file,
        () => {
          throw new Error('boom');
        },
        { dataFormat: 'XML' }
      )
    ).toThrow('boom');
    expect(existsSync(file)).toBe(true);
  });

  it('should refuse writes after close', () => {
    const writer = new TimeSeriesWriter(file, { dataFormat: 'XML' });
    writer.close();
    writer.close();
    expect(() => writer.writePointsCells(points, { triangle: triangles })).toThrow(WriteError);
  });

  it('should enforce the reading order and frame range', () => {
    withTimeSeriesWriter(
      file,
      (writer) => {
        writer.writePointsCells(points, { triangle: triangles });
        writer.writeData(0);
      },
      { dataFormat: 'XML' }
    );
    const reader = new TimeSeriesReader(file);
    expect(() => reader.readData(0)).toThrow(ReadError);
    reader.readPointsCells();
    expect(() => reader.readData(1)).toThrow(RangeError);
    expect(() => reader.readData(-1)).toThrow(RangeError);
    expect(reader.readData(0).time).toBe(0);
    reader.close();
    reader.close();
    expect(() => reader.readPointsCells()).toThrow(ReadError);
  });
});

describe('TimeSeriesReader on hand-written documents', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'meshwire-xdmf-'));
    file = path.join(dir, 'doc.xdmf');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const meshGrid = `
    <Grid Name="mesh" GridType="Uniform">
      <Geometry GeometryType="XY">
        <DataItem Dimensions="3 2" NumberType="Float" Precision="8">0 0 1 0 0 1</DataItem>
      </Geometry>
      <Topology Type="Triangle">
        <DataItem Dimensions="1 3" DataType="Int">0 1 2</DataItem>
      </Topology>
    </Grid>`;

  const frame = (body: string): string => `<Grid>${body}</Grid>`;

  const document = (domain: string, version = '3.0'): string =>
    `<?xml version="1.0"?>\n<Xdmf Version="${version}"><Domain>${domain}</Domain></Xdmf>\n`;

  const collection = (frames: string, type = 'Temporal'): string =>
    `<Grid GridType="Collection" CollectionType="${type}">${frames}</Grid>`;

  const open = (xml: string): TimeSeriesReader => {
    writeFileSync(file, xml);
    return new TimeSeriesReader(file);
  };

  it('should read defaults and aliases', () => {
    const reader = open(
      document(
        meshGrid +
          collection(
            frame(
              '<Time Value="0.25"/><!-- note --><Attribute Name="p" Center="Node"><DataItem Dimensions="3">1 2 3</DataItem></Attribute>'
            )
          )
      )
    );
    const mesh = reader.readPointsCells();
    expect(mesh.points.dtype).toBe('float64');
    expect(mesh.cells.triangle.dtype).toBe('int32');
    const data = reader.readData(0);
    expect(data.time).toBe(0.25);
    expect(data.pointData.p.dtype).toBe('float32');
    expect(toNumbers(data.pointData.p)).toEqual([1, 2, 3]);
    reader.close();
  });

  it('should find a mesh grid nested in the collection', () => {
    const nested = meshGrid.replace('<Grid Name="mesh" GridType="Uniform">', '<Grid Name="mesh" GridType="Uniform"><Time Value="0"/>');
    const reader = open(document(collection(nested + frame('<Time Value="1"/>'))));
    expect(reader.numSteps).toBe(2);
    expect(toNumbers(reader.readPointsCells().cells.triangle)).toEqual([0, 1, 2]);
    expect(reader.readData(1).time).toBe(1);
    reader.close();
  });

  it('should prefer the mesh grid beside the collection over a nested one', () => {
    const nested = meshGrid
      .replace('<Grid Name="mesh" GridType="Uniform">', '<Grid Name="other" GridType="Uniform"><Time Value="0"/>')
      .replace('0 0 1 0 0 1', '5 5 6 5 5 6');
    const reader = open(document(meshGrid + collection(nested)));
    expect(toNumbers(reader.readPointsCells().points)).toEqual([0, 0, 1, 0, 0, 1]);
    reader.close();
  });

  it('should reshape a flat topology by the cell arity', () => {
    const flat = meshGrid.replace('Dimensions="1 3" DataType="Int">0 1 2', 'Dimensions="6" DataType="Int">0 1 2 2 1 0');
    const reader = open(document(flat + collection('')));
    expect(reader.readPointsCells().cells.triangle.shape).toEqual([2, 3]);
    reader.close();
  });

  it('should reject documents that are not XDMF 3', () => {
    expect(() => open('not xml at all')).toThrow(FormatError);
    expect(() => open('<Other Version="3.0"/>')).toThrow(/root element must be <Xdmf>/);
    expect(() => open(document(meshGrid + collection(''), '2.0'))).toThrow(/unsupported XDMF version "2.0"/);
    expect(() => open('<Xdmf Version="3.0"><Domain/><Domain/></Xdmf>')).toThrow(/exactly one <Domain>/);
  });

  it('should require a temporal collection and a uniform mesh grid', () => {
    expect(() => open(document(meshGrid))).toThrow(/no temporal collection grid/);
    expect(() => open(document(meshGrid + collection('', 'Spatial')))).toThrow(/expected Temporal/);
    expect(() => open(document(collection(frame('<Time Value="0"/>'))))).toThrow(/no uniform grid holds the mesh/);
  });

  it('should reject malformed topology and geometry', () => {
    const both = meshGrid.replace('<Topology Type="Triangle">', '<Topology Type="Triangle" TopologyType="Triangle">');
    expect(() => open(document(both + collection(''))).readPointsCells()).toThrow(/both Type and TopologyType/);

    const badGeometry = meshGrid.replace('GeometryType="XY"', 'GeometryType="X_Y_Z"');
    expect(() => open(document(badGeometry + collection(''))).readPointsCells()).toThrow(/Unsupported GeometryType/);

    const twoItems = meshGrid.replace('0 1 2</DataItem>', '0 1 2</DataItem><DataItem Dimensions="1">0</DataItem>');
    expect(() => open(document(twoItems + collection(''))).readPointsCells()).toThrow(/exactly one <DataItem>/);

    const unknown = meshGrid.replace('Type="Triangle"', 'Type="Blob"');
    expect(() => open(document(unknown + collection(''))).readPointsCells()).toThrow(UnsupportedCellTypeError);
  });

  it('should reject malformed frames', () => {
    const attribute = (center: string): string =>
      `<Attribute Name="p" Center="${center}"><DataItem Dimensions="3">1 2 3</DataItem></Attribute>`;

    const noTime = open(document(meshGrid + collection(frame(attribute('Node')))));
    noTime.readPointsCells();
    expect(() => noTime.readData(0)).toThrow(/Frame 0 has no <Time>/);

    const badCenter = open(document(meshGrid + collection(frame('<Time Value="0"/>' + attribute('Edge')))));
    badCenter.readPointsCells();
    expect(() => badCenter.readData(0)).toThrow(/Center "Edge"/);

    const badTime = open(document(meshGrid + collection(frame('<Time Value="soon"/>'))));
    badTime.readPointsCells();
    expect(() => badTime.readData(0)).toThrow(/Invalid Time Value "soon"/);

    const badCells = open(document(meshGrid + collection(frame('<Time Value="0"/>' + attribute('Cell')))));
    badCells.readPointsCells();
    expect(() => badCells.readData(0)).toThrow(/has 3 entries but the mesh has 1 cells/);
  });
});
