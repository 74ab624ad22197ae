/**
 * Meshes: vertex buffers plus how to draw them.
 *
 * A mesh only names buffers by key; the draw list resolves them at flush
 * time. Shader attributes are matched to vertex formats by name.
 */

import { ERROR_CODES, GraphicsError, assertPositiveInteger } from "../errors";
import {
  VERTEX_TYPE_SIZE,
  type DrawMode,
  type IndexType,
  type VertexType,
} from "../gl/enums";
import type { BufferKey } from "../resources/ResourceKey";

export interface VertexFormat {
  /** Shader attribute name this format feeds */
  name: string;
  /** Byte offset within one vertex */
  offset: number;
  /** Number of components (1, 2, 3, or 4) */
  size: 1 | 2 | 3 | 4;
  type: VertexType;
  /** Whether to normalize integer values (default: false) */
  normalized?: boolean;
}

export interface AttachedAttributes {
  buffer: BufferKey;
  formats: readonly VertexFormat[];
  /** 0 advances per vertex, n advances every n instances */
  step: number;
  /** Bytes between consecutive elements */
  stride: number;
}

export interface DrawRange {
  /** First vertex (or index) */
  start: number;
  count: number;
}

export interface IndexInfo {
  buffer: BufferKey;
  type: IndexType;
}

export interface MeshDrawInfo {
  mode: DrawMode;
  /** Absent: the whole buffer */
  range?: DrawRange;
  indices?: IndexInfo;
  instanceCount: number;
}

/** Mesh capability */
export interface Mesh {
  attributes(): readonly AttachedAttributes[];
  drawInfo(): MeshDrawInfo;
}

/** Per-vertex data: the buffer, its formats and stride */
export interface VertexData {
  buffer: BufferKey;
  formats: readonly VertexFormat[];
  stride: number;
}

export interface PackedAttribute {
  name: string;
  size: 1 | 2 | 3 | 4;
  /** Default: float */
  type?: VertexType;
  normalized?: boolean;
}

/** Lay attributes out back to back and compute the stride */
export function packFormats(attributes: readonly PackedAttribute[]): {
  formats: VertexFormat[];
  stride: number;
} {
  const formats: VertexFormat[] = [];
  let offset = 0;
  for (const attribute of attributes) {
    const type = attribute.type ?? "float";
    formats.push({
      name: attribute.name,
      offset,
      size: attribute.size,
      type,
      normalized: attribute.normalized ?? false,
    });
    offset += attribute.size * VERTEX_TYPE_SIZE[type];
  }
  return { formats, stride: offset };
}

function validateVertexData(data: VertexData): void {
  assertPositiveInteger(data.stride, "Vertex stride");
  for (const format of data.formats) {
    if (!Number.isInteger(format.size) || format.size < 1 || format.size > 4) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Vertex format "${format.name}" size must be 1..4, got ${format.size}`
      );
    }
    const end = format.offset + format.size * VERTEX_TYPE_SIZE[format.type];
    const { offset } = format;
    if (!Number.isInteger(offset) || offset < 0 || end > data.stride) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Vertex format "${format.name}" at offset ${offset} ` +
          `does not fit stride ${data.stride}`
      );
    }
  }
}

function validateRange(range: DrawRange | undefined): void {
  if (!range) return;
  const { start, count } = range;
  const valid = (n: number) => Number.isInteger(n) && n >= 0;
  if (!valid(start) || !valid(count)) {
    throw new GraphicsError(
      ERROR_CODES.INVALID_DIMENSIONS,
      `Draw range must be non-negative integers, got start=${start} count=${count}`
    );
  }
}

export interface VertexMeshOptions extends VertexData {
  /** Default: triangles */
  mode?: DrawMode;
  range?: DrawRange;
}

/** Non-indexed mesh */
export class VertexMesh implements Mesh {
  readonly vertices: VertexData;
  private mode: DrawMode;
  private range: DrawRange | undefined;

  constructor(options: VertexMeshOptions) {
    validateVertexData(options);
    validateRange(options.range);
    const { buffer, formats, stride } = options;
    this.vertices = { buffer, formats, stride };
    this.mode = options.mode ?? "triangles";
    this.range = options.range;
  }

  setDrawMode(mode: DrawMode): void {
    this.mode = mode;
  }

  /** Limit drawing to a vertex range; undefined draws the whole buffer */
  setDrawRange(range: DrawRange | undefined): void {
    validateRange(range);
    this.range = range;
  }

  attributes(): readonly AttachedAttributes[] {
    return [{ ...this.vertices, step: 0 }];
  }

  drawInfo(): MeshDrawInfo {
    return { mode: this.mode, range: this.range, instanceCount: 1 };
  }
}

export interface IndexedMeshOptions {
  vertices: VertexData;
  indices: IndexInfo;
  /** Default: triangles */
  mode?: DrawMode;
  range?: DrawRange;
}

/** Indexed mesh; the draw range counts indices */
export class IndexedMesh implements Mesh {
  readonly vertices: VertexData;
  readonly indices: IndexInfo;
  private mode: DrawMode;
  private range: DrawRange | undefined;

  constructor(options: IndexedMeshOptions) {
    validateVertexData(options.vertices);
    validateRange(options.range);
    this.vertices = { ...options.vertices };
    this.indices = { ...options.indices };
    this.mode = options.mode ?? "triangles";
    this.range = options.range;
  }

  setDrawMode(mode: DrawMode): void {
    this.mode = mode;
  }

  setDrawRange(range: DrawRange | undefined): void {
    validateRange(range);
    this.range = range;
  }

  attributes(): readonly AttachedAttributes[] {
    return [{ ...this.vertices, step: 0 }];
  }

  drawInfo(): MeshDrawInfo {
    return {
      mode: this.mode,
      range: this.range,
      indices: this.indices,
      instanceCount: 1,
    };
  }
}

/** Draws another mesh several times, with per-instance attributes */
export class InstancedMesh implements Mesh {
  readonly mesh: Mesh;
  readonly instances: VertexData;
  private _instanceCount: number;

  constructor(mesh: Mesh, instances: VertexData, instanceCount: number) {
    validateVertexData(instances);
    this.mesh = mesh;
    this.instances = { ...instances };
    this._instanceCount = 0;
    this.setInstanceCount(instanceCount);
  }

  get instanceCount(): number {
    return this._instanceCount;
  }

  setInstanceCount(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Instance count must be a non-negative integer, got ${count}`
      );
    }
    this._instanceCount = count;
  }

  attributes(): readonly AttachedAttributes[] {
    return [...this.mesh.attributes(), { ...this.instances, step: 1 }];
  }

  drawInfo(): MeshDrawInfo {
    return { ...this.mesh.drawInfo(), instanceCount: this._instanceCount };
  }
}
