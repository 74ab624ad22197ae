/**
 * ResourceRegistry - owner of every backend object.
 *
 * Resources are addressed by generational keys. Destroying a resource tells
 * the state cache to forget it, deletes the backend object and bumps the slot
 * generation, in that order. Any binding needed while creating or uploading
 * goes through the cache so the mirror never diverges from the backend.
 */

import { ERROR_CODES, GraphicsError, assertPositiveInteger } from "../errors";
import * as GL from "../gl/constants";
import type { BufferType, BufferUsage } from "../gl/enums";
import type { Rect } from "../state/PipelineSettings";
import type { StateCache } from "../state/StateCache";
import { BufferResource } from "./Buffer";
import { createProgram, reflectAttributes, reflectUniforms } from "./compile";
import {
  DEFAULT_TEXTURE_FILTER,
  DEFAULT_TEXTURE_WRAP,
  type PixelFormat,
  type TextureFilter,
  type TextureWrap,
} from "./formats";
import { FramebufferResource } from "./Framebuffer";
import {
  keyToString,
  type BufferKey,
  type FramebufferKey,
  type ResourceKind,
  type ShaderKey,
  type TextureKey,
} from "./ResourceKey";
import { ShaderResource } from "./Shader";
import { SlotMap } from "./SlotMap";
import { TextureResource, type TextureSettings } from "./Texture";

export interface FramebufferSettings {
  width: number;
  height: number;
  /** Color attachment format (default: rgba8) */
  format?: PixelFormat;
  filter?: Partial<TextureFilter>;
  wrap?: Partial<TextureWrap>;
  /** Attach a depth renderbuffer (default: false) */
  depth?: boolean;
  /** Attach a stencil buffer, packed with depth (default: false) */
  stencil?: boolean;
}

export class ResourceRegistry {
  readonly gl: WebGL2RenderingContext;
  readonly cache: StateCache;

  private buffers = new SlotMap<"buffer", BufferResource>("buffer");
  private textures = new SlotMap<"texture", TextureResource>("texture");
  private shaders = new SlotMap<"shader", ShaderResource>("shader");
  private framebuffers = new SlotMap<"framebuffer", FramebufferResource>(
    "framebuffer"
  );

  constructor(gl: WebGL2RenderingContext, cache: StateCache) {
    this.gl = gl;
    this.cache = cache;
  }

  // ==================== Buffers ====================

  /**
   * Create a buffer of `size` bytes (zero-filled) or holding a copy of `data`.
   */
  createBuffer(
    sizeOrData: number | ArrayBufferView,
    type: BufferType,
    usage: BufferUsage = "static"
  ): BufferKey {
    let data: Uint8Array;
    if (typeof sizeOrData === "number") {
      if (!Number.isInteger(sizeOrData) || sizeOrData < 0) {
        throw new GraphicsError(
          ERROR_CODES.INVALID_DIMENSIONS,
          `Buffer size must be a non-negative integer, got ${sizeOrData}`
        );
      }
      data = new Uint8Array(sizeOrData);
    } else {
      data = new Uint8Array(sizeOrData.byteLength);
      data.set(
        new Uint8Array(
          sizeOrData.buffer,
          sizeOrData.byteOffset,
          sizeOrData.byteLength
        )
      );
    }

    const handle = this.gl.createBuffer();
    if (!handle) {
      throw new GraphicsError(
        ERROR_CODES.RESOURCE_CREATION,
        "Failed to create WebGL buffer"
      );
    }

    const key = this.buffers.insertWith(
      (k) => new BufferResource(this.gl, k, handle, type, usage, data)
    );
    this.buffers.get(key).specify(this.cache);
    return key;
  }

  getBuffer(key: BufferKey): BufferResource {
    return this.buffers.get(key);
  }

  hasBuffer(key: BufferKey): boolean {
    return this.buffers.has(key);
  }

  /** Copy bytes into the buffer's shadow copy; sent on the next upload */
  writeBuffer(
    key: BufferKey,
    data: ArrayBufferView,
    byteOffset: number = 0
  ): void {
    this.buffers.get(key).write(data, byteOffset);
  }

  /** Send pending writes to the backend; false when there were none */
  uploadBuffer(key: BufferKey): boolean {
    return this.buffers.get(key).upload(this.cache);
  }

  readBuffer(key: BufferKey): Uint8Array {
    return this.buffers.get(key).read();
  }

  resizeBuffer(key: BufferKey, newSize: number): void {
    if (!Number.isInteger(newSize) || newSize < 0) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Buffer size must be a non-negative integer, got ${newSize}`
      );
    }
    this.buffers.get(key).resize(newSize, this.cache);
  }

  /** Record that a pending draw reads the buffer up to `endByte` */
  reserveBuffer(key: BufferKey, endByte: number): void {
    this.buffers.get(key).reserve(endByte);
  }

  releaseBuffer(key: BufferKey, endByte: number): void {
    // The buffer may already be gone when a recorded draw is discarded
    if (!this.buffers.has(key)) return;
    this.buffers.get(key).release(endByte);
  }

  destroyBuffer(key: BufferKey): void {
    const buffer = this.buffers.get(key);
    this.cache.forget(key);
    buffer.destroy();
    this.buffers.remove(key);
  }

  // ==================== Textures ====================

  createTexture(settings: TextureSettings): TextureKey {
    const { width, height } = settings;
    assertPositiveInteger(width, "Texture width");
    assertPositiveInteger(height, "Texture height");

    const handle = this.gl.createTexture();
    if (!handle) {
      throw new GraphicsError(
        ERROR_CODES.RESOURCE_CREATION,
        "Failed to create WebGL texture"
      );
    }

    const texture = (key: TextureKey) =>
      new TextureResource(this.gl, key, handle, {
        width,
        height,
        format: settings.format ?? "rgba8",
        filter: { ...DEFAULT_TEXTURE_FILTER, ...settings.filter },
        wrap: { ...DEFAULT_TEXTURE_WRAP, ...settings.wrap },
        mipmaps: settings.mipmaps ?? false,
      });

    let key: TextureKey;
    try {
      key = this.textures.insertWith((k) => {
        const resource = texture(k);
        resource.allocate(this.cache, settings.data ?? null);
        return resource;
      });
    } catch (error) {
      this.gl.deleteTexture(handle);
      throw error;
    }
    return key;
  }

  getTexture(key: TextureKey): TextureResource {
    return this.textures.get(key);
  }

  hasTexture(key: TextureKey): boolean {
    return this.textures.has(key);
  }

  /** Replace the whole image, or a sub-region of it */
  setTextureData(key: TextureKey, data: ArrayBufferView, region?: Rect): void {
    this.textures.get(key).setData(this.cache, data, region);
  }

  setTextureFilter(key: TextureKey, filter: Partial<TextureFilter>): void {
    this.textures.get(key).setFilter(this.cache, filter);
  }

  setTextureWrap(key: TextureKey, wrap: Partial<TextureWrap>): void {
    this.textures.get(key).setWrap(this.cache, wrap);
  }

  destroyTexture(key: TextureKey): void {
    const texture = this.textures.get(key);
    this.cache.forget(key);
    texture.destroy();
    this.textures.remove(key);
  }

  // ==================== Shaders ====================

  /**
   * Compile, link and reflect a program.
   *
   * @throws GraphicsError CompileError or LinkError with the backend log; no
   *   key is issued and nothing is left allocated.
   */
  createShader(vertexSource: string, fragmentSource: string): ShaderKey {
    const program = createProgram(this.gl, vertexSource, fragmentSource);
    const attributes = reflectAttributes(this.gl, program);
    const uniforms = reflectUniforms(this.gl, program);
    return this.shaders.insertWith(
      (key) => new ShaderResource(this.gl, key, program, attributes, uniforms)
    );
  }

  getShader(key: ShaderKey): ShaderResource {
    return this.shaders.get(key);
  }

  hasShader(key: ShaderKey): boolean {
    return this.shaders.has(key);
  }

  destroyShader(key: ShaderKey): void {
    const shader = this.shaders.get(key);
    this.cache.forget(key);
    shader.destroy();
    this.shaders.remove(key);
  }

  // ==================== Framebuffers ====================

  /**
   * Create an offscreen target with a color texture and an optional depth
   * (and stencil) renderbuffer. The new target is cleared to transparent and
   * the previously bound target is restored.
   */
  createFramebuffer(settings: FramebufferSettings): FramebufferKey {
    const { width, height } = settings;
    assertPositiveInteger(width, "Framebuffer width");
    assertPositiveInteger(height, "Framebuffer height");

    const colorKey = this.createTexture({
      width,
      height,
      format: settings.format ?? "rgba8",
      filter: settings.filter,
      wrap: settings.wrap,
      data: null,
    });

    const handle = this.gl.createFramebuffer();
    if (!handle) {
      this.destroyTexture(colorKey);
      throw new GraphicsError(
        ERROR_CODES.RESOURCE_CREATION,
        "Failed to create WebGL framebuffer"
      );
    }

    const wantsDepth = settings.depth ?? false;
    const wantsStencil = settings.stencil ?? false;
    let renderbuffer: WebGLRenderbuffer | null = null;
    if (wantsDepth || wantsStencil) {
      renderbuffer = this.gl.createRenderbuffer();
      if (!renderbuffer) {
        this.gl.deleteFramebuffer(handle);
        this.destroyTexture(colorKey);
        throw new GraphicsError(
          ERROR_CODES.RESOURCE_CREATION,
          "Failed to create WebGL renderbuffer"
        );
      }
    }

    const previous = this.boundFramebuffer();
    const colorTexture = this.textures.get(colorKey);

    try {
      return this.framebuffers.insertWith((key) => {
        const framebuffer = new FramebufferResource(
          this.gl,
          key,
          handle,
          colorKey,
          renderbuffer,
          width,
          height
        );

        this.cache.bindTarget(framebuffer);
        this.gl.framebufferTexture2D(
          GL.GL_FRAMEBUFFER,
          GL.GL_COLOR_ATTACHMENT0,
          GL.GL_TEXTURE_2D,
          colorTexture.handle,
          0
        );

        if (renderbuffer) {
          const packed = wantsStencil;
          this.gl.bindRenderbuffer(GL.GL_RENDERBUFFER, renderbuffer);
          this.gl.renderbufferStorage(
            GL.GL_RENDERBUFFER,
            packed ? GL.GL_DEPTH24_STENCIL8 : GL.GL_DEPTH_COMPONENT24,
            width,
            height
          );
          this.gl.framebufferRenderbuffer(
            GL.GL_FRAMEBUFFER,
            packed ? GL.GL_DEPTH_STENCIL_ATTACHMENT : GL.GL_DEPTH_ATTACHMENT,
            GL.GL_RENDERBUFFER,
            renderbuffer
          );
          this.gl.bindRenderbuffer(GL.GL_RENDERBUFFER, null);
        }

        const status = this.gl.checkFramebufferStatus(GL.GL_FRAMEBUFFER);
        if (status !== GL.GL_FRAMEBUFFER_COMPLETE) {
          console.error(
            `[ResourceRegistry] Framebuffer ${width}x${height} incomplete: ` +
              `status=0x${status.toString(16)}, ` +
              `color=${keyToString(colorKey)}, ` +
              `depth=${wantsDepth}, stencil=${wantsStencil}`
          );
          throw new GraphicsError(
            ERROR_CODES.INCOMPLETE_FRAMEBUFFER,
            `Framebuffer incomplete (status 0x${status.toString(16)})`
          );
        }

        this.clearTarget(wantsDepth, wantsStencil);
        this.cache.bindTarget(previous);
        return framebuffer;
      });
    } catch (error) {
      this.cache.bindTarget(previous);
      this.gl.deleteFramebuffer(handle);
      if (renderbuffer) this.gl.deleteRenderbuffer(renderbuffer);
      this.destroyTexture(colorKey);
      throw error;
    }
  }

  getFramebuffer(key: FramebufferKey): FramebufferResource {
    return this.framebuffers.get(key);
  }

  /**
   * A framebuffer that can be drawn into: live, with its color texture live.
   *
   * @throws GraphicsError StaleHandle when either has been destroyed
   */
  getRenderTarget(key: FramebufferKey): FramebufferResource {
    const framebuffer = this.framebuffers.get(key);
    this.textures.get(framebuffer.colorTexture);
    return framebuffer;
  }

  hasFramebuffer(key: FramebufferKey): boolean {
    return this.framebuffers.has(key);
  }

  /** Destroy the target, its renderbuffer and its color texture */
  destroyFramebuffer(key: FramebufferKey): void {
    const framebuffer = this.framebuffers.get(key);
    this.cache.forget(key);
    framebuffer.destroy();
    this.framebuffers.remove(key);
    if (this.textures.has(framebuffer.colorTexture)) {
      this.destroyTexture(framebuffer.colorTexture);
    }
  }

  // ==================== Lifecycle ====================

  /** Number of live resources, of one kind or in total */
  liveCount(kind?: ResourceKind): number {
    switch (kind) {
      case "buffer":
        return this.buffers.size;
      case "texture":
        return this.textures.size;
      case "shader":
        return this.shaders.size;
      case "framebuffer":
        return this.framebuffers.size;
      case undefined:
        return (
          this.buffers.size +
          this.textures.size +
          this.shaders.size +
          this.framebuffers.size
        );
    }
  }

  /** Release every live resource */
  destroyAll(): void {
    const live = this.liveCount();
    if (live > 0) {
      console.warn(
        `[ResourceRegistry] Releasing ${live} live resources ` +
          `(buffers=${this.buffers.size}, textures=${this.textures.size}, ` +
          `shaders=${this.shaders.size}, framebuffers=${this.framebuffers.size})`
      );
    }

    for (const framebuffer of this.framebuffers.drain()) {
      this.cache.forget(framebuffer.key);
      framebuffer.destroy();
    }
    for (const texture of this.textures.drain()) {
      this.cache.forget(texture.key);
      texture.destroy();
    }
    for (const shader of this.shaders.drain()) {
      this.cache.forget(shader.key);
      shader.destroy();
    }
    for (const buffer of this.buffers.drain()) {
      this.cache.forget(buffer.key);
      buffer.destroy();
    }
  }

  // ==================== Internals ====================

  /**
   * The live framebuffer the cache has bound; null for the backbuffer or when
   * unknown
   */
  private boundFramebuffer(): FramebufferResource | null {
    const bound = this.cache.boundTarget;
    if (!bound || !this.framebuffers.has(bound)) return null;
    return this.framebuffers.get(bound);
  }

  private clearTarget(depth: boolean, stencil: boolean): void {
    let mask = GL.GL_COLOR_BUFFER_BIT;
    this.cache.setScissor(null);
    this.cache.setClearColor([0, 0, 0, 0]);
    if (depth) {
      this.cache.setDepthWriteMask(true);
      this.cache.setClearDepth(1);
      mask |= GL.GL_DEPTH_BUFFER_BIT;
    }
    if (stencil) {
      this.cache.setStencilWriteMask(0xff);
      this.cache.setClearStencil(0);
      mask |= GL.GL_STENCIL_BUFFER_BIT;
    }
    this.gl.clear(mask);
  }
}
