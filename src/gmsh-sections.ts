/**
 * Section codecs shared by every Gmsh format version:
 * section framing, $PhysicalNames, $NodeData and $ElementData
 */

import type { ByteReader, ByteSink } from './byte-reader.js';
import type { Mesh } from './mesh.js';
import { rawFromCellData } from './mesh.js';
import { getCellType } from './cell-types.js';
import { isBigEndian } from './core.js';
import { debugLog } from './debug.js';
import { FormatError, WriteError } from './errors.js';
import { fromNumbers, getNumber, product, rowCount, squeezeColumn, toNumbers } from './ndarray.js';
import type { DtypeName, NdArray } from './types/dtype.js';
import type { CellBlocks, CellData, FieldData } from './types/mesh.js';

/** Component counts Gmsh accepts in a data section */
export const ALLOWED_COMPONENTS: readonly number[] = [1, 3, 9];

const INT32_SIZE = 4;
const FLOAT64_SIZE = 8;
const HOST_LITTLE_ENDIAN = !isBigEndian();

// ============================================================================
// Section Framing
// ============================================================================

/**
 * Walk the `$Name ... $EndName` sections of a file. `visit` returns false for
 * sections it does not handle; those are skipped up to their end marker.
 */
export function forEachSection(
  reader: ByteReader,
  visit: (name: string) => boolean,
  debug?: boolean
): void {
  let line = reader.readLine();
  while (line !== null) {
    const marker = line.trim();
    if (marker !== '') {
      if (!marker.startsWith('$')) {
        throw new FormatError(`Expected a section marker, got "${truncate(marker)}"`);
      }
      const name = marker.slice(1);
      if (!visit(name)) {
        debugLog(debug, `gmsh: skipping section $${name}`);
        skipSection(reader, name);
      }
    }
    line = reader.readLine();
  }
}

/** Consume lines up to and including `$End<name>` */
export function skipSection(reader: ByteReader, name: string): void {
  const end = '$End' + name;
  let line = reader.readLine();
  while (line !== null && line.trim() !== end) {
    line = reader.readLine();
  }
  if (line === null) {
    throw new FormatError(`Section $${name} has no ${end} marker`);
  }
}

/** The next non-blank line must be `$End<name>` */
export function expectSectionEnd(reader: ByteReader, name: string): void {
  const end = '$End' + name;
  let line = reader.readLine();
  while (line !== null && line.trim() === '') {
    line = reader.readLine();
  }
  if (line === null) {
    throw new FormatError(`Section $${name} has no ${end} marker`);
  }
  if (line.trim() !== end) {
    throw new FormatError(`Expected ${end}, got "${truncate(line.trim())}"`);
  }
}

/** `$MeshFormat` block; binary files add the host-order integer 1 */
export function writeHeader(sink: ByteSink, version: string, binary: boolean, dataSize: number): void {
  sink.line('$MeshFormat');
  sink.line(`${version} ${binary ? 1 : 0} ${dataSize}`);
  if (binary) {
    sink.pack('i', [1]);
    sink.line('');
  }
  sink.line('$EndMeshFormat');
}

function truncate(s: string): string {
  return s.length > 40 ? s.slice(0, 40) + '...' : s;
}

/** Split a line on whitespace, keeping quoted words together and dropping the quotes */
export function splitQuoted(line: string): string[] {
  const words: string[] = [];
  const regex = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(line)) !== null) {
    words.push(match[1] ?? match[2] ?? match[3]);
  }
  return words;
}

// ============================================================================
// $PhysicalNames
// ============================================================================

export function readPhysicalNames(reader: ByteReader, fieldData: FieldData): void {
  const count = reader.readInt('$PhysicalNames count');
  for (let i = 0; i < count; i++) {
    const words = splitQuoted(reader.expectLine('$PhysicalNames'));
    const dim = Number(words[0]);
    const id = Number(words[1]);
    if (words.length < 3 || !Number.isInteger(dim) || !Number.isInteger(id)) {
      throw new FormatError(`Malformed physical name entry: ${words.join(' ')}`);
    }
    fieldData[words[2]] = [id, dim];
  }
  expectSectionEnd(reader, 'PhysicalNames');
}

export function writePhysicalNames(sink: ByteSink, fieldData: FieldData): void {
  const entries: Array<[dim: number, id: number, name: string]> = [];
  for (const [name, value] of Object.entries(fieldData)) {
    if (value.length !== 2 || !Number.isFinite(value[0]) || !Number.isFinite(value[1])) {
      console.warn(`Field data entry "${name}" is not an (id, dimension) pair; skipping it.`);
      continue;
    }
    entries.push([Math.trunc(value[1]), Math.trunc(value[0]), name]);
  }
  if (entries.length === 0) {
    return;
  }
  entries.sort((a, b) => a[0] - b[0] || a[1] - b[1] || (a[2] < b[2] ? -1 : a[2] > b[2] ? 1 : 0));

  sink.line('$PhysicalNames');
  sink.line(String(entries.length));
  for (const [dim, id, name] of entries) {
    sink.line(`${dim} ${id} "${name}"`);
  }
  sink.line('$EndPhysicalNames');
}

// ============================================================================
// $NodeData / $ElementData
// ============================================================================

/**
 * Read one data section (the `$NodeData` or `$ElementData` marker already consumed)
 * into `dataDict`, keyed by the first string tag.
 */
export function readData(
  reader: ByteReader,
  tag: string,
  dataDict: Record<string, NdArray>,
  isAscii: boolean
): void {
  const numStringTags = reader.readInt(`$${tag} string tag count`);
  const stringTags: string[] = [];
  for (let i = 0; i < numStringTags; i++) {
    stringTags.push(reader.expectLine(`$${tag} string tags`).trim().replace(/"/g, ''));
  }
  // real tags normally hold a single time value, which is not kept
  const numRealTags = reader.readInt(`$${tag} real tag count`);
  for (let i = 0; i < numRealTags; i++) {
    reader.expectLine(`$${tag} real tags`);
  }
  const numIntegerTags = reader.readInt(`$${tag} integer tag count`);
  const integerTags: number[] = [];
  for (let i = 0; i < numIntegerTags; i++) {
    integerTags.push(reader.readInt(`$${tag} integer tags`));
  }
  if (stringTags.length < 1) {
    throw new FormatError(`$${tag} has no name tag`);
  }
  if (integerTags.length < 3) {
    throw new FormatError(`$${tag} needs at least 3 integer tags, got ${integerTags.length}`);
  }
  const components = integerTags[1];
  const items = integerTags[2];

  const values = new Float64Array(items * components);
  if (isAscii) {
    const tokens = reader.readTokens(items * (1 + components), `$${tag} values`);
    for (let i = 0; i < items; i++) {
      for (let c = 0; c < components; c++) {
        values[i * components + c] = tokens[i * (1 + components) + 1 + c];
      }
    }
  } else {
    const recordSize = INT32_SIZE + FLOAT64_SIZE * components;
    const bytes = reader.readBytes(items * recordSize, `$${tag} records`);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    for (let i = 0; i < items; i++) {
      const base = i * recordSize;
      const index = view.getInt32(base, HOST_LITTLE_ENDIAN);
      if (index !== i + 1) {
        throw new FormatError(
          `$${tag} "${stringTags[0]}": record ${i} has index ${index}, expected ${i + 1}`
        );
      }
      for (let c = 0; c < components; c++) {
        values[i * components + c] = view.getFloat64(
          base + INT32_SIZE + FLOAT64_SIZE * c,
          HOST_LITTLE_ENDIAN
        );
      }
    }
  }

  skipSection(reader, tag);

  // a (n, 1) field cannot be told apart from (n,) in this format
  dataDict[stringTags[0]] = squeezeColumn(fromNumbers('float64', values, [items, components]));
}

export function numComponents(data: NdArray): number {
  return data.shape.length > 1 ? product(data.shape.slice(1)) : 1;
}

/** Reject fields Gmsh cannot store, before anything is emitted */
export function checkDataComponents(name: string, data: NdArray): void {
  const components = numComponents(data);
  if (!ALLOWED_COMPONENTS.includes(components)) {
    throw new WriteError(
      `Gmsh only permits ${ALLOWED_COMPONENTS.join(', ')} components per data field ` +
        `("${name}" has ${components})`
    );
  }
}

export function writeData(
  sink: ByteSink,
  tag: string,
  name: string,
  data: NdArray,
  binary: boolean
): void {
  checkDataComponents(name, data);
  const components = numComponents(data);
  const items = rowCount(data);

  sink.line('$' + tag);
  sink.line('1');
  sink.line(`"${name}"`);
  sink.line('1');
  sink.line('0.0');
  sink.line('3');
  // time step, components, items
  sink.line('0');
  sink.line(String(components));
  sink.line(String(items));

  const values = toNumbers(data);
  if (binary) {
    const recordSize = INT32_SIZE + FLOAT64_SIZE * components;
    const out = new Uint8Array(items * recordSize);
    const view = new DataView(out.buffer);
    for (let i = 0; i < items; i++) {
      const base = i * recordSize;
      view.setInt32(base, i + 1, HOST_LITTLE_ENDIAN);
      for (let c = 0; c < components; c++) {
        view.setFloat64(
          base + INT32_SIZE + FLOAT64_SIZE * c,
          values[i * components + c],
          HOST_LITTLE_ENDIAN
        );
      }
    }
    sink.bytes(out);
    sink.line('');
  } else {
    for (let i = 0; i < items; i++) {
      const row = values.slice(i * components, (i + 1) * components);
      sink.line(`${i + 1} ${row.map(String).join(' ')}`);
    }
  }
  sink.line('$End' + tag);
}

// ============================================================================
// Shared Array Helpers
// ============================================================================

/**
 * Map node tags to 0-based point indices. Dense 1..N tags map to tag - 1.
 */
export class NodeTagIndex {
  private readonly lookup: Map<number, number> | null;

  constructor(tags: ArrayLike<number>) {
    let dense = true;
    for (let i = 0; i < tags.length; i++) {
      if (tags[i] !== i + 1) {
        dense = false;
        break;
      }
    }
    if (dense) {
      this.lookup = null;
    } else {
      this.lookup = new Map();
      for (let i = 0; i < tags.length; i++) {
        this.lookup.set(tags[i], i);
      }
    }
  }

  indexOf(tag: number): number {
    if (this.lookup === null) {
      return tag - 1;
    }
    const index = this.lookup.get(tag);
    if (index === undefined) {
      throw new FormatError(`Element references unknown node ${tag}`);
    }
    return index;
  }
}

/** out[:, j] = arr[:, order[j]] */
export function permuteColumns<D extends DtypeName>(arr: NdArray<D>, order: readonly number[] | null): NdArray<D> {
  if (order === null) {
    return arr;
  }
  const width = arr.shape[1];
  const rows = arr.shape[0];
  const src = toNumbers(arr);
  const dst: number[] = new Array(src.length);
  for (let r = 0; r < rows; r++) {
    for (let j = 0; j < width; j++) {
      dst[r * width + j] = src[r * width + order[j]];
    }
  }
  return fromNumbers(arr.dtype, dst, arr.shape);
}

/** Point coordinates as N × 3, padding planar points with z = 0 */
export function pointsAs3d(points: NdArray): number[] {
  const width = points.shape[1];
  const rows = rowCount(points);
  if (width === 3) {
    return toNumbers(points);
  }
  if (width !== 2) {
    throw new WriteError(`Gmsh requires 2-D or 3-D points, got ${width} coordinates per point`);
  }
  console.warn('Gmsh requires 3D points, but 2D points given. Appending 0 third component.');
  const out: number[] = new Array(rows * 3);
  for (let i = 0; i < rows; i++) {
    out[3 * i] = getNumber(points, 2 * i);
    out[3 * i + 1] = getNumber(points, 2 * i + 1);
    out[3 * i + 2] = 0;
  }
  return out;
}

/** Names of cell data fields written as element tags rather than $ElementData */
export const TAG_FIELDS: readonly string[] = ['gmsh:physical', 'gmsh:geometrical'];

/** Point data holding per-node entity (dim, tag) pairs, never written as $NodeData */
export const DIM_TAGS_FIELD = 'gmsh:dim_tags';

/**
 * Fields to emit as $NodeData / $ElementData, checked before anything is encoded
 */
export function dataSectionsOf(mesh: Mesh): {
  nodeData: Record<string, NdArray>;
  elementData: Record<string, NdArray>;
} {
  const nodeData: Record<string, NdArray> = {};
  for (const [name, data] of Object.entries(mesh.pointData)) {
    if (name !== DIM_TAGS_FIELD) {
      checkDataComponents(name, data);
      nodeData[name] = data;
    }
  }
  const elementData = rawFromCellData(
    mesh.cells,
    Object.fromEntries(Object.entries(mesh.cellData).filter(([name]) => !TAG_FIELDS.includes(name)))
  );
  for (const [name, data] of Object.entries(elementData)) {
    checkDataComponents(name, data);
  }
  return { nodeData, elementData };
}

/** The 4.x writers put every element on entity 0 and write no $Entities */
export function warnDroppedTags(mesh: Mesh, version: string): void {
  const dropped = TAG_FIELDS.filter((name) => name in mesh.cellData);
  if (dropped.length > 0) {
    console.warn(`Gmsh ${version} writer drops cell data ${dropped.join(', ')} (elements are written on entity 0)`);
  }
}

/** Highest topological dimension among the mesh's cell types */
export function maxCellDimension(mesh: Mesh): number {
  let dim = 0;
  for (const cellType of mesh.cellTypes) {
    dim = Math.max(dim, getCellType(cellType).dimension);
  }
  return dim;
}

// ============================================================================
// Typed Fields (4.x)
// ============================================================================

/**
 * Reads `int`, `size_t` and `double` fields either as ASCII words or as
 * host-order binary values, with `size_t` as wide as the declared word size.
 */
export class FieldReader {
  private readonly reader: ByteReader;
  private readonly isAscii: boolean;
  private readonly sizeT: string;

  constructor(reader: ByteReader, isAscii: boolean, dataSize: number) {
    this.reader = reader;
    this.isAscii = isAscii;
    if (dataSize === 4) {
      this.sizeT = 'I';
    } else if (dataSize === 8) {
      this.sizeT = 'Q';
    } else {
      throw new FormatError(`Unsupported data size ${dataSize} (expected 4 or 8)`);
    }
  }

  ints(count: number, context: string): number[] {
    return this.isAscii ? this.reader.readTokens(count, context) : this.reader.unpack(`${count}i`, context);
  }

  sizes(count: number, context: string): number[] {
    return this.isAscii
      ? this.reader.readTokens(count, context)
      : this.reader.unpack(`${count}${this.sizeT}`, context);
  }

  doubles(count: number, context: string): number[] {
    return this.isAscii ? this.reader.readTokens(count, context) : this.reader.unpack(`${count}d`, context);
  }
}

/** Write-side counterpart of FieldReader; `size_t` is always 8 bytes */
export class FieldWriter {
  private readonly sink: ByteSink;
  private readonly binary: boolean;

  constructor(sink: ByteSink, binary: boolean) {
    this.sink = sink;
    this.binary = binary;
  }

  ints(values: readonly number[]): this {
    return this.write('i', values);
  }

  sizes(values: readonly number[]): this {
    return this.write('Q', values);
  }

  doubles(values: readonly number[]): this {
    return this.write('d', values);
  }

  /** End of a binary block: a newline before the closing marker */
  endBinary(): void {
    if (this.binary) {
      this.sink.line('');
    }
  }

  private write(fmt: string, values: readonly number[]): this {
    if (this.binary) {
      this.sink.pack(`${values.length}${fmt}`, values);
    } else {
      this.sink.line(values.map(String).join(' '));
    }
    return this;
  }
}

// ============================================================================
// $Entities (4.x)
// ============================================================================

/** Physical tags of each entity, indexed by entity dimension then entity tag */
export type EntityPhysicals = Array<Map<number, number[]>>;

/**
 * Read `$Entities`. Points carry `pointBoxSize` bounding values (6 in 4.0,
 * 3 in 4.1); curves, surfaces and volumes carry 6 and list their bounding entities.
 */
export function readEntities(fields: FieldReader, reader: ByteReader, pointBoxSize: number): EntityPhysicals {
  const counts = fields.sizes(4, '$Entities counts');
  const physicals: EntityPhysicals = [];
  for (let dim = 0; dim < 4; dim++) {
    const byTag = new Map<number, number[]>();
    for (let i = 0; i < counts[dim]; i++) {
      const [tag] = fields.ints(1, '$Entities tag');
      fields.doubles(dim === 0 ? pointBoxSize : 6, '$Entities bounding box');
      const [numPhysicals] = fields.sizes(1, '$Entities physical count');
      byTag.set(tag, fields.ints(numPhysicals, '$Entities physical tags'));
      if (dim > 0) {
        const [numBounding] = fields.sizes(1, '$Entities bounding count');
        fields.ints(numBounding, '$Entities bounding tags');
      }
    }
    physicals.push(byTag);
  }
  expectSectionEnd(reader, 'Entities');
  return physicals;
}

/** First physical tag of an entity, or null when unknown */
export function physicalTagOf(physicals: EntityPhysicals | null, dim: number, tag: number): number | null {
  const tags = physicals?.[dim]?.get(tag);
  return tags !== undefined && tags.length > 0 ? tags[0] : null;
}

// ============================================================================
// Element Accumulation
// ============================================================================

interface PendingBlock {
  arity: number;
  count: number;
  // raw node tags in Gmsh node order
  nodeTags: number[];
  physical: number[];
  geometrical: number[];
}

/**
 * Collects element blocks as they are read. Blocks of one cell type are
 * concatenated in order of appearance; types keep their first-seen order.
 */
export class CellAccumulator {
  private readonly blocks = new Map<string, PendingBlock>();

  add(
    cellType: string,
    arity: number,
    nodeTags: ArrayLike<number>,
    physical?: ArrayLike<number> | null,
    geometrical?: ArrayLike<number> | null
  ): void {
    let block = this.blocks.get(cellType);
    if (!block) {
      block = { arity, count: 0, nodeTags: [], physical: [], geometrical: [] };
      this.blocks.set(cellType, block);
    }
    const count = nodeTags.length / arity;
    for (let i = 0; i < nodeTags.length; i++) block.nodeTags.push(nodeTags[i]);
    if (physical) for (let i = 0; i < physical.length; i++) block.physical.push(physical[i]);
    if (geometrical) for (let i = 0; i < geometrical.length; i++) block.geometrical.push(geometrical[i]);
    block.count += count;
  }

  get numCells(): number {
    let n = 0;
    for (const block of this.blocks.values()) n += block.count;
    return n;
  }

  /**
   * Remap node tags to point indices and reorder nodes into canonical order.
   * Tag arrays become int32 cell data when every cell of the type has one.
   */
  build(
    nodeIndex: NodeTagIndex,
    toCanonical: (cellType: string) => readonly number[] | null
  ): { cells: CellBlocks; cellData: CellData } {
    const cells: CellBlocks = {};
    const physical: Record<string, NdArray> = {};
    const geometrical: Record<string, NdArray> = {};

    for (const [cellType, block] of this.blocks) {
      const indices = block.nodeTags.map((tag) => nodeIndex.indexOf(tag));
      const gmshOrder = fromNumbers('int32', indices, [block.count, block.arity]);
      cells[cellType] = permuteColumns(gmshOrder, toCanonical(cellType));
      if (block.physical.length === block.count) {
        physical[cellType] = fromNumbers('int32', block.physical);
      }
      if (block.geometrical.length === block.count) {
        geometrical[cellType] = fromNumbers('int32', block.geometrical);
      }
    }

    const cellData: CellData = {};
    if (Object.keys(physical).length > 0) cellData['gmsh:physical'] = physical;
    if (Object.keys(geometrical).length > 0) cellData['gmsh:geometrical'] = geometrical;
    return { cells, cellData };
  }
}
