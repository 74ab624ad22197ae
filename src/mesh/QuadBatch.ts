/**
 * Quad Batch
 *
 * A fixed number of quads in one vertex buffer, drawn with a single indexed
 * call. Each quad is four vertices in the order
 *
 *   0---3
 *   | / |
 *   1---2
 *
 * and the u16 index buffer is written once at creation.
 */

import { ERROR_CODES, GraphicsError, assertPositiveInteger } from "../errors";
import type { BufferType, BufferUsage } from "../gl/enums";
import type { BufferKey } from "../resources/ResourceKey";
import { IndexedMesh, packFormats, type PackedAttribute } from "./Mesh";

/** Index pattern of one quad, relative to its first vertex */
export const QUAD_INDICES = [0, 1, 3, 1, 2, 3] as const;

/** Largest capacity whose vertices u16 indices can address */
export const MAX_QUAD_BATCH_CAPACITY = 65536 / 4;

/** Four vertices of interleaved floats, top-left first and counter-clockwise */
export type Quad = ArrayLike<number>;

/** The buffer operations a batch needs from its owner */
export interface QuadBatchOwner {
  createBuffer(
    sizeOrData: number | ArrayBufferView,
    type: BufferType,
    usage?: BufferUsage
  ): BufferKey;
  writeBuffer(key: BufferKey, data: ArrayBufferView, byteOffset?: number): void;
  readBuffer(key: BufferKey): Uint8Array;
  uploadBuffer(key: BufferKey): boolean;
  destroyBuffer(key: BufferKey): void;
}

export interface QuadBatchOptions {
  /** Maximum number of quads */
  capacity: number;
  /** Float attributes of one vertex, packed back to back */
  attributes: readonly PackedAttribute[];
  /** Vertex buffer usage (default: dynamic) */
  usage?: BufferUsage;
}

/** Build the index data for `capacity` quads */
export function quadIndices(capacity: number): Uint16Array {
  const indices = new Uint16Array(capacity * QUAD_INDICES.length);
  for (let quad = 0; quad < capacity; quad++) {
    const first = quad * 4;
    for (let i = 0; i < QUAD_INDICES.length; i++) {
      indices[quad * QUAD_INDICES.length + i] = first + QUAD_INDICES[i]!;
    }
  }
  return indices;
}

export class QuadBatch {
  readonly capacity: number;
  /** Floats in one vertex */
  readonly floatsPerVertex: number;
  readonly mesh: IndexedMesh;

  private readonly owner: QuadBatchOwner;
  private readonly vertexBuffer: BufferKey;
  private readonly indexBuffer: BufferKey;
  private readonly stride: number;
  private _count = 0;
  private _destroyed = false;

  constructor(owner: QuadBatchOwner, options: QuadBatchOptions) {
    const { capacity } = options;
    assertPositiveInteger(capacity, "Quad batch capacity");
    if (capacity > MAX_QUAD_BATCH_CAPACITY) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Quad batch capacity ${capacity} exceeds ${MAX_QUAD_BATCH_CAPACITY}`
      );
    }
    for (const attribute of options.attributes) {
      if ((attribute.type ?? "float") !== "float") {
        throw new GraphicsError(
          ERROR_CODES.INVALID_DIMENSIONS,
          `Quad batch attribute "${attribute.name}" must be float`
        );
      }
    }

    const { formats, stride } = packFormats(options.attributes);
    this.owner = owner;
    this.capacity = capacity;
    this.stride = stride;
    this.floatsPerVertex = stride / 4;

    this.vertexBuffer = owner.createBuffer(
      capacity * 4 * stride,
      "vertex",
      options.usage ?? "dynamic"
    );
    this.indexBuffer = owner.createBuffer(
      quadIndices(capacity),
      "index",
      "static"
    );
    this.mesh = new IndexedMesh({
      vertices: { buffer: this.vertexBuffer, formats, stride },
      indices: { buffer: this.indexBuffer, type: "u16" },
      range: { start: 0, count: 0 },
    });
  }

  /** Number of quads drawn */
  get count(): number {
    return this._count;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /**
   * Append a quad and return its index.
   *
   * @throws GraphicsError BufferOverflow when the batch is full
   */
  push(quad: Quad): number {
    this.checkAlive();
    if (this._count >= this.capacity) {
      throw new GraphicsError(
        ERROR_CODES.BUFFER_OVERFLOW,
        `Quad batch is full (capacity ${this.capacity})`
      );
    }
    const index = this._count;
    this.write(index, quad);
    this._count++;
    this.updateRange();
    return index;
  }

  /** Overwrite the quad at `index` */
  insert(index: number, quad: Quad): void {
    this.checkAlive();
    this.checkIndex(index);
    this.write(index, quad);
  }

  /** The vertices of the quad at `index`, or undefined past the end */
  get(index: number): Float32Array | undefined {
    this.checkAlive();
    if (!Number.isInteger(index) || index < 0 || index >= this._count) {
      return undefined;
    }
    const bytes = this.owner.readBuffer(this.vertexBuffer);
    const start = index * 4 * this.stride;
    return new Float32Array(bytes.slice(start, start + 4 * this.stride).buffer);
  }

  /** Drop every quad; the vertex data stays until overwritten */
  clear(): void {
    this.checkAlive();
    this._count = 0;
    this.updateRange();
  }

  /** Send pending vertex writes now and return the mesh to draw */
  unmap(): IndexedMesh {
    this.checkAlive();
    this.owner.uploadBuffer(this.vertexBuffer);
    return this.mesh;
  }

  destroy(): void {
    if (this._destroyed) return;
    this.owner.destroyBuffer(this.vertexBuffer);
    this.owner.destroyBuffer(this.indexBuffer);
    this._destroyed = true;
  }

  private write(index: number, quad: Quad): void {
    const expected = 4 * this.floatsPerVertex;
    if (quad.length !== expected) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Quad must have ${expected} floats, got ${quad.length}`
      );
    }
    const data = Float32Array.from(quad);
    this.owner.writeBuffer(this.vertexBuffer, data, index * 4 * this.stride);
  }

  private updateRange(): void {
    const count = this._count * QUAD_INDICES.length;
    this.mesh.setDrawRange({ start: 0, count });
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._count) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Quad index ${index} out of range 0..${this._count - 1}`
      );
    }
  }

  private checkAlive(): void {
    if (this._destroyed) {
      throw new GraphicsError(
        ERROR_CODES.CONTEXT_DESTROYED,
        "QuadBatch has been destroyed"
      );
    }
  }
}
