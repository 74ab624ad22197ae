/**
 * GraphicsContext - owns the registry, the state cache, the per-program
 * uniform caches and a default draw list for one WebGL2 context.
 */

import {
  DrawList,
  type DrawListContext,
  type DrawListOptions,
  type DrawOptions,
} from "./draw/DrawList";
import type { ClearSettings, FlushStats } from "./draw/DrawCommand";
import { ERROR_CODES, GraphicsError, assertPositiveInteger } from "./errors";
import * as GL from "./gl/constants";
import type { BufferType, BufferUsage } from "./gl/enums";
import type { Mesh } from "./mesh/Mesh";
import { QuadBatch, type QuadBatchOptions } from "./mesh/QuadBatch";
import {
  keyToString,
  type BufferKey,
  type ShaderKey,
} from "./resources/ResourceKey";
import {
  ResourceRegistry,
  type FramebufferSettings,
} from "./resources/ResourceRegistry";
import type { TextureSettings } from "./resources/Texture";
import type { Shader, UniformValue } from "./shader/Shader";
import { ShaderProgram } from "./shader/ShaderProgram";
import { ShaderState } from "./shader/ShaderState";
import { StateCache, type StateChange } from "./state/StateCache";
import type { PipelineSettings } from "./state/PipelineSettings";
import { Canvas } from "./texture/Canvas";
import { Image } from "./texture/Image";
import { isTexture } from "./texture/Texture";

export interface GraphicsContextOptions {
  gl: WebGL2RenderingContext;
  /** Texture units to track (default: queried from the context) */
  maxTextureUnits?: number;
  /** Vertex attribute locations to track (default: queried from the context) */
  maxVertexAttributes?: number;
  /** Settings every draw starts from */
  defaults?: PipelineSettings;
  /** Reorder runs of reorder-safe opaque draws (default: false) */
  reorder?: boolean;
  /** Log flush stats (default: false) */
  debug?: boolean;
}

/** Used when the context does not report its limits */
export const DEFAULT_MAX_TEXTURE_UNITS = 16;
export const DEFAULT_MAX_VERTEX_ATTRIBUTES = 16;

function queryLimit(
  gl: WebGL2RenderingContext,
  pname: GLenum,
  fallback: number
): number {
  const value: unknown = gl.getParameter(pname);
  return typeof value === "number" && value > 0 ? value : fallback;
}

export class GraphicsContext implements DrawListContext {
  readonly gl: WebGL2RenderingContext;
  readonly cache: StateCache;
  readonly registry: ResourceRegistry;

  private readonly options: GraphicsContextOptions;
  private readonly vertexArray: WebGLVertexArrayObject;
  private readonly drawList: DrawList;
  private shaderStates = new Map<string, ShaderState>();
  private _destroyed = false;

  constructor(options: GraphicsContextOptions) {
    const gl = options.gl;
    this.gl = gl;
    this.options = { ...options };

    const maxTextureUnits =
      options.maxTextureUnits ??
      queryLimit(
        gl,
        GL.GL_MAX_COMBINED_TEXTURE_IMAGE_UNITS,
        DEFAULT_MAX_TEXTURE_UNITS
      );
    const maxVertexAttributes =
      options.maxVertexAttributes ??
      queryLimit(gl, GL.GL_MAX_VERTEX_ATTRIBS, DEFAULT_MAX_VERTEX_ATTRIBUTES);
    assertPositiveInteger(maxTextureUnits, "maxTextureUnits");
    assertPositiveInteger(maxVertexAttributes, "maxVertexAttributes");

    // Attribute state lives in a single VAO for the lifetime of the context
    const vertexArray = gl.createVertexArray();
    if (!vertexArray) {
      throw new GraphicsError(
        ERROR_CODES.RESOURCE_CREATION,
        "Failed to create vertex array"
      );
    }
    this.vertexArray = vertexArray;
    gl.bindVertexArray(vertexArray);

    this.cache = new StateCache(gl, { maxTextureUnits, maxVertexAttributes });
    this.registry = new ResourceRegistry(gl, this.cache);
    this.drawList = this.createDrawList();
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /** A separate draw list sharing this context's resources and cache */
  createDrawList(options: DrawListOptions = {}): DrawList {
    this.checkAlive();
    return new DrawList(this, {
      defaults: options.defaults ?? this.options.defaults,
      reorder: options.reorder ?? this.options.reorder,
      debug: options.debug ?? this.options.debug,
    });
  }

  // ==================== Buffers ====================

  createBuffer(
    sizeOrData: number | ArrayBufferView,
    type: BufferType,
    usage?: BufferUsage
  ): BufferKey {
    this.checkAlive();
    return this.registry.createBuffer(sizeOrData, type, usage);
  }

  writeBuffer(
    key: BufferKey,
    data: ArrayBufferView,
    byteOffset?: number
  ): void {
    this.checkAlive();
    this.registry.writeBuffer(key, data, byteOffset);
  }

  uploadBuffer(key: BufferKey): boolean {
    this.checkAlive();
    return this.registry.uploadBuffer(key);
  }

  readBuffer(key: BufferKey): Uint8Array {
    this.checkAlive();
    return this.registry.readBuffer(key);
  }

  resizeBuffer(key: BufferKey, newSize: number): void {
    this.checkAlive();
    this.registry.resizeBuffer(key, newSize);
  }

  destroyBuffer(key: BufferKey): void {
    this.checkAlive();
    this.registry.destroyBuffer(key);
  }

  /** A fixed-capacity batch of quads over this context's buffers */
  createQuadBatch(options: QuadBatchOptions): QuadBatch {
    this.checkAlive();
    return new QuadBatch(this, options);
  }

  // ==================== Shaders ====================

  createShader(vertexSource: string, fragmentSource: string): ShaderProgram {
    this.checkAlive();
    const key = this.registry.createShader(vertexSource, fragmentSource);
    const resource = this.registry.getShader(key);
    const state = new ShaderState(this.gl, this.cache, resource);
    this.shaderStates.set(keyToString(key), state);
    return new ShaderProgram(state);
  }

  /** @throws GraphicsError StaleHandle or NotFound for a dead shader */
  shaderState(key: ShaderKey): ShaderState {
    this.checkAlive();
    this.registry.getShader(key);
    const state = this.shaderStates.get(keyToString(key));
    if (!state) {
      throw new GraphicsError(
        ERROR_CODES.NOT_FOUND,
        `No uniform state for ${keyToString(key)}`
      );
    }
    return state;
  }

  destroyShader(shader: Shader): void {
    this.checkAlive();
    this.registry.destroyShader(shader.key);
    this.shaderStates.delete(keyToString(shader.key));
  }

  /**
   * Upload a uniform right away, skipping values equal to the last upload.
   * A texture is bound to the sampler's unit first.
   */
  setUniform(shader: Shader, name: string, value: UniformValue): StateChange {
    const state = this.shaderState(shader.key);
    state.validate(name, value);
    if (!isTexture(value)) {
      return state.setUniform(name, value);
    }

    const unit = state.samplerUnit(name);
    if (unit === undefined) {
      throw new GraphicsError(
        ERROR_CODES.UNIFORM_TYPE_MISMATCH,
        `Uniform "${name}": texture value for a non-sampler uniform`
      );
    }
    const texture = this.registry.getTexture(value.textureKey());
    const bound = this.cache.bindTexture(unit, texture);
    const uploaded = state.setUniform(name, unit);
    const changed = bound === "changed" || uploaded === "changed";
    return changed ? "changed" : "unchanged";
  }

  // ==================== Textures ====================

  createImage(settings: TextureSettings): Image {
    this.checkAlive();
    return new Image(this.registry, this.registry.createTexture(settings));
  }

  destroyImage(image: Image): void {
    this.checkAlive();
    this.registry.destroyTexture(image.key);
  }

  createCanvas(settings: FramebufferSettings): Canvas {
    this.checkAlive();
    return new Canvas(this.registry, this.registry.createFramebuffer(settings));
  }

  destroyCanvas(canvas: Canvas): void {
    this.checkAlive();
    this.registry.destroyFramebuffer(canvas.key);
  }

  // ==================== Drawing ====================

  clear(settings?: ClearSettings): void {
    this.checkAlive();
    this.drawList.clear(settings);
  }

  draw(
    shader: Shader,
    mesh: Mesh,
    settings?: PipelineSettings,
    options?: DrawOptions
  ): void {
    this.checkAlive();
    this.drawList.draw(shader, mesh, settings, options);
  }

  flush(): FlushStats {
    this.checkAlive();
    return this.drawList.flush();
  }

  /** Flush the frame; the browser presents the backbuffer when the task ends */
  present(): FlushStats {
    return this.flush();
  }

  /** Forget all mirrored state, after something else touched the context */
  invalidateState(): void {
    this.checkAlive();
    this.cache.invalidate();
    for (const state of this.shaderStates.values()) {
      state.invalidate();
    }
    this.gl.bindVertexArray(this.vertexArray);
  }

  /** Clean up all resources */
  destroy(): void {
    if (this._destroyed) return;
    this.drawList.discard();
    this.registry.destroyAll();
    this.shaderStates.clear();
    this.gl.bindVertexArray(null);
    this.gl.deleteVertexArray(this.vertexArray);
    this._destroyed = true;
  }

  private checkAlive(): void {
    if (this._destroyed) {
      throw new GraphicsError(
        ERROR_CODES.CONTEXT_DESTROYED,
        "GraphicsContext has been destroyed"
      );
    }
  }
}
