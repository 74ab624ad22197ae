/**
 * GPU buffer with a CPU shadow copy.
 *
 * Writes land in the shadow copy and widen the modified range; `upload()`
 * sends that range to the backend with a strategy picked by the usage hint.
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import {
  BUFFER_TARGET_MAP,
  BUFFER_USAGE_MAP,
  type BufferType,
  type BufferUsage,
} from "../gl/enums";
import type { StateCache, BindableBuffer } from "../state/StateCache";
import type { BufferKey } from "./ResourceKey";

export interface ModifiedRange {
  offset: number;
  length: number;
}

export class BufferResource implements BindableBuffer {
  readonly gl: WebGL2RenderingContext;
  readonly key: BufferKey;
  readonly handle: WebGLBuffer;
  readonly type: BufferType;
  readonly usage: BufferUsage;

  private data: Uint8Array;
  private modifiedStart = 0;
  private modifiedEnd = 0;
  /** End byte -> number of recorded draws reserving up to it */
  private reservations = new Map<number, number>();
  private _destroyed = false;

  constructor(
    gl: WebGL2RenderingContext,
    key: BufferKey,
    handle: WebGLBuffer,
    type: BufferType,
    usage: BufferUsage,
    data: Uint8Array
  ) {
    this.gl = gl;
    this.key = key;
    this.handle = handle;
    this.type = type;
    this.usage = usage;
    this.data = data;
  }

  get size(): number {
    return this.data.byteLength;
  }

  get target(): GLenum {
    return BUFFER_TARGET_MAP[this.type];
  }

  /** Bytes written since the last upload, or null when clean */
  get modifiedRange(): ModifiedRange | null {
    if (this.modifiedEnd <= this.modifiedStart) return null;
    return {
      offset: this.modifiedStart,
      length: this.modifiedEnd - this.modifiedStart,
    };
  }

  /** Highest byte any recorded draw still reserves (0 when none) */
  get reservedEnd(): number {
    let end = 0;
    for (const reserved of this.reservations.keys()) {
      if (reserved > end) end = reserved;
    }
    return end;
  }

  /** Allocate the backend store and fill it with the shadow copy */
  specify(cache: StateCache): void {
    cache.bindBuffer(this.type, this);
    this.gl.bufferData(this.target, this.data, BUFFER_USAGE_MAP[this.usage]);
    this.markClean();
  }

  /** Copy bytes into the shadow copy */
  write(source: ArrayBufferView, byteOffset: number = 0): void {
    const bytes = new Uint8Array(
      source.buffer,
      source.byteOffset,
      source.byteLength
    );
    const end = byteOffset + bytes.byteLength;
    if (!Number.isInteger(byteOffset) || byteOffset < 0 || end > this.size) {
      throw new GraphicsError(
        ERROR_CODES.BUFFER_OVERFLOW,
        `Write of ${bytes.byteLength} bytes at offset ${byteOffset} ` +
          `overflows buffer of ${this.size} bytes`
      );
    }
    if (bytes.byteLength === 0) return;

    this.data.set(bytes, byteOffset);
    if (this.modifiedRange === null) {
      this.modifiedStart = byteOffset;
      this.modifiedEnd = end;
    } else {
      this.modifiedStart = Math.min(this.modifiedStart, byteOffset);
      this.modifiedEnd = Math.max(this.modifiedEnd, end);
    }
  }

  read(): Uint8Array {
    return this.data.slice();
  }

  /**
   * Send pending writes to the backend.
   *
   * - stream: orphan the store and write every byte
   * - static: write only the modified range
   * - dynamic: orphan when at least a third of the buffer changed, otherwise
   *   write the range
   *
   * Returns false when there was nothing to send.
   */
  upload(cache: StateCache): boolean {
    const range = this.modifiedRange;
    if (!range || this.size === 0) return false;

    const offset = Math.min(range.offset, Math.max(0, this.size - 1));
    const length = Math.min(
      range.length,
      Math.max(0, this.size - range.offset)
    );

    cache.bindBuffer(this.type, this);
    switch (this.usage) {
      case "stream":
        this.orphan();
        break;
      case "static":
        this.gl.bufferSubData(this.target, offset, this.data, offset, length);
        break;
      case "dynamic":
        if (length >= Math.floor(this.size / 3)) {
          this.orphan();
        } else {
          this.gl.bufferSubData(this.target, offset, this.data, offset, length);
        }
        break;
    }
    this.markClean();
    return true;
  }

  /**
   * Change the size. Bytes [0, min(old, new)) are kept, new bytes are zero,
   * and the whole store is re-specified.
   */
  resize(newSize: number, cache: StateCache): void {
    const reserved = this.reservedEnd;
    if (newSize < reserved) {
      throw new GraphicsError(
        ERROR_CODES.BUFFER_OVERFLOW,
        `Cannot shrink buffer to ${newSize} bytes: ` +
          `recorded draws read up to byte ${reserved}`
      );
    }

    const next = new Uint8Array(newSize);
    next.set(this.data.subarray(0, Math.min(this.size, newSize)));
    this.data = next;
    this.specify(cache);
  }

  reserve(endByte: number): void {
    this.reservations.set(endByte, (this.reservations.get(endByte) ?? 0) + 1);
  }

  release(endByte: number): void {
    const count = this.reservations.get(endByte);
    if (count === undefined) return;
    if (count <= 1) {
      this.reservations.delete(endByte);
    } else {
      this.reservations.set(endByte, count - 1);
    }
  }

  /** Delete the backend buffer */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteBuffer(this.handle);
    this.reservations.clear();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  private orphan(): void {
    this.gl.bufferData(this.target, this.size, BUFFER_USAGE_MAP[this.usage]);
    this.gl.bufferSubData(this.target, 0, this.data);
  }

  private markClean(): void {
    this.modifiedStart = 0;
    this.modifiedEnd = 0;
  }
}
