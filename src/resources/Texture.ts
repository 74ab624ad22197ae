/**
 * 2D texture resource.
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import * as GL from "../gl/constants";
import type { StateCache, BindableTexture } from "../state/StateCache";
import type { Rect } from "../state/PipelineSettings";
import {
  PIXEL_FORMATS,
  magFilterToGL,
  minFilterToGL,
  wrapToGL,
  type PixelFormat,
  type TextureFilter,
  type TextureWrap,
} from "./formats";
import type { TextureKey } from "./ResourceKey";

/** Unit used when a texture is bound only to upload or configure it */
const UPLOAD_UNIT = 0;

export interface TextureSettings {
  width: number;
  height: number;
  /** Default: rgba8 */
  format?: PixelFormat;
  filter?: Partial<TextureFilter>;
  wrap?: Partial<TextureWrap>;
  /** Generate mipmaps after every full upload (default: false) */
  mipmaps?: boolean;
  /** Initial pixels; null or absent allocates uninitialized storage */
  data?: ArrayBufferView | null;
}

export interface TextureInfo {
  width: number;
  height: number;
  format: PixelFormat;
  filter: TextureFilter;
  wrap: TextureWrap;
  mipmaps: boolean;
}

export class TextureResource implements BindableTexture {
  readonly gl: WebGL2RenderingContext;
  readonly key: TextureKey;
  readonly handle: WebGLTexture;
  readonly width: number;
  readonly height: number;
  readonly format: PixelFormat;
  readonly mipmaps: boolean;

  private _filter: TextureFilter;
  private _wrap: TextureWrap;
  /** Parameter values last sent to the backend */
  private params = new Map<GLenum, GLenum>();
  private _destroyed = false;

  constructor(
    gl: WebGL2RenderingContext,
    key: TextureKey,
    handle: WebGLTexture,
    info: TextureInfo
  ) {
    this.gl = gl;
    this.key = key;
    this.handle = handle;
    this.width = info.width;
    this.height = info.height;
    this.format = info.format;
    this.mipmaps = info.mipmaps;
    this._filter = { ...info.filter };
    this._wrap = { ...info.wrap };
  }

  get info(): TextureInfo {
    return {
      width: this.width,
      height: this.height,
      format: this.format,
      filter: { ...this._filter },
      wrap: { ...this._wrap },
      mipmaps: this.mipmaps,
    };
  }

  /** Allocate storage, upload initial pixels and send every parameter */
  allocate(cache: StateCache, data: ArrayBufferView | null): void {
    const { internalFormat, format, type } = PIXEL_FORMATS[this.format];
    if (data) this.checkDataSize(data, this.width, this.height);

    cache.bindTexture(UPLOAD_UNIT, this);
    this.gl.texImage2D(
      GL.GL_TEXTURE_2D,
      0,
      internalFormat,
      this.width,
      this.height,
      0,
      format,
      type,
      data
    );
    this.applyParameters();
    if (data && this.mipmaps) {
      this.gl.generateMipmap(GL.GL_TEXTURE_2D);
    }
  }

  /** Replace all pixels, or the pixels of a sub-region */
  setData(cache: StateCache, data: ArrayBufferView, region?: Rect): void {
    const { format, type } = PIXEL_FORMATS[this.format];
    const { x, y, width, height } = region ?? {
      x: 0,
      y: 0,
      width: this.width,
      height: this.height,
    };

    if (
      !Number.isInteger(x) ||
      !Number.isInteger(y) ||
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      x < 0 ||
      y < 0 ||
      width <= 0 ||
      height <= 0 ||
      x + width > this.width ||
      y + height > this.height
    ) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Region ${width}x${height} at (${x}, ${y}) ` +
          `does not fit texture of ${this.width}x${this.height}`
      );
    }
    this.checkDataSize(data, width, height);

    cache.bindTexture(UPLOAD_UNIT, this);
    this.gl.texSubImage2D(
      GL.GL_TEXTURE_2D,
      0,
      x,
      y,
      width,
      height,
      format,
      type,
      data
    );
    if (this.mipmaps) {
      this.gl.generateMipmap(GL.GL_TEXTURE_2D);
    }
  }

  setFilter(cache: StateCache, filter: Partial<TextureFilter>): void {
    this._filter = { ...this._filter, ...filter };
    this.sendParameters(cache);
  }

  setWrap(cache: StateCache, wrap: Partial<TextureWrap>): void {
    this._wrap = { ...this._wrap, ...wrap };
    this.sendParameters(cache);
  }

  /** Delete the backend texture */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteTexture(this.handle);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /** Bind only when some parameter actually differs */
  private sendParameters(cache: StateCache): void {
    if (this.pendingParameters().length === 0) return;
    cache.bindTexture(UPLOAD_UNIT, this);
    this.applyParameters();
  }

  private applyParameters(): void {
    for (const [pname, value] of this.pendingParameters()) {
      this.gl.texParameteri(GL.GL_TEXTURE_2D, pname, value);
      this.params.set(pname, value);
    }
  }

  private pendingParameters(): Array<[GLenum, GLenum]> {
    const wanted: Array<[GLenum, GLenum]> = [
      [GL.GL_TEXTURE_MIN_FILTER, minFilterToGL(this._filter)],
      [GL.GL_TEXTURE_MAG_FILTER, magFilterToGL(this._filter.mag)],
      [GL.GL_TEXTURE_WRAP_S, wrapToGL(this._wrap.s)],
      [GL.GL_TEXTURE_WRAP_T, wrapToGL(this._wrap.t)],
    ];
    return wanted.filter(([pname, value]) => this.params.get(pname) !== value);
  }

  private checkDataSize(
    data: ArrayBufferView,
    width: number,
    height: number
  ): void {
    const expected = width * height * PIXEL_FORMATS[this.format].bytesPerPixel;
    if (data.byteLength < expected) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Expected at least ${expected} bytes of ${this.format} pixels ` +
          `for ${width}x${height}, got ${data.byteLength}`
      );
    }
  }
}
