/**
 * StateCache - CPU mirror of the backend's binding and pipeline state.
 *
 * Every setter compares the requested value with the mirrored one and only
 * issues backend calls for the sub-fields that differ. An `undefined` mirror
 * value means "unknown" and never compares equal, so the first set after
 * construction or `invalidate()` always reaches the backend.
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import * as GL from "../gl/constants";
import {
  BLEND_EQUATION_MAP,
  BLEND_FACTOR_MAP,
  BUFFER_TARGET_MAP,
  COMPARE_FUNCTION_MAP,
  CULL_FACE_MAP,
  STENCIL_OPERATION_MAP,
  WINDING_MAP,
  type BufferType,
} from "../gl/enums";
import {
  keyEquals,
  type BufferKey,
  type FramebufferKey,
  type ResourceKey,
  type ShaderKey,
  type TextureKey,
} from "../resources/ResourceKey";
import {
  rectEqual,
  validateRect,
  type BlendEquation,
  type BlendFactor,
  type BlendState,
  type Color,
  type CompareFunction,
  type CullFace,
  type CullingState,
  type DepthState,
  type PolygonOffsetState,
  type Rect,
  type StencilOperation,
  type StencilState,
  type Winding,
} from "./PipelineSettings";

export type StateChange = "changed" | "unchanged";

/** Anything the cache can bind: a registry resource's key and backend object */
export interface Bindable<K extends ResourceKey, H> {
  readonly key: K;
  readonly handle: H;
}

export type BindableShader = Bindable<ShaderKey, WebGLProgram>;
export type BindableTexture = Bindable<TextureKey, WebGLTexture>;
export type BindableBuffer = Bindable<BufferKey, WebGLBuffer>;
export type BindableFramebuffer = Bindable<FramebufferKey, WebGLFramebuffer>;

/** One vertex attribute location's pointer setup */
export interface VertexAttributeBinding {
  location: number;
  buffer: BindableBuffer;
  size: number;
  /** GL component type */
  type: GLenum;
  normalized: boolean;
  stride: number;
  offset: number;
  /** Use vertexAttribIPointer (integer attributes) */
  integer: boolean;
  /** 0 = per vertex, 1 = per instance */
  divisor: number;
}

export interface AttributePointerState {
  buffer: BufferKey;
  size: number;
  type: GLenum;
  normalized: boolean;
  stride: number;
  offset: number;
  integer: boolean;
  divisor: number;
}

interface BlendFuncState {
  srcRGB: BlendFactor;
  dstRGB: BlendFactor;
  srcAlpha: BlendFactor;
  dstAlpha: BlendFactor;
}

interface StencilFuncState {
  func: CompareFunction;
  ref: number;
  readMask: number;
}

interface StencilOpState {
  fail: StencilOperation;
  depthFail: StencilOperation;
  pass: StencilOperation;
}

/** Read-only copy of the mirror; `undefined` = unknown */
export interface StateSnapshot {
  shader: ShaderKey | null | undefined;
  activeUnit: number | undefined;
  textures: ReadonlyArray<TextureKey | null | undefined>;
  buffers: Readonly<Record<BufferType, BufferKey | null | undefined>>;
  target: FramebufferKey | null | undefined;
  viewport: Rect | undefined;
  scissorEnabled: boolean | undefined;
  scissorBox: Rect | undefined;
  blendEnabled: boolean | undefined;
  blendFunc: Readonly<BlendFuncState> | undefined;
  blendEquation: readonly [BlendEquation, BlendEquation] | undefined;
  blendColor: Color | undefined;
  depthEnabled: boolean | undefined;
  depthFunc: CompareFunction | undefined;
  depthWriteMask: boolean | undefined;
  depthRange: readonly [number, number] | undefined;
  stencilEnabled: boolean | undefined;
  stencilFunc: Readonly<StencilFuncState> | undefined;
  stencilOp: Readonly<StencilOpState> | undefined;
  stencilWriteMask: number | undefined;
  cullEnabled: boolean | undefined;
  cullFace: CullFace | undefined;
  frontFace: Winding | undefined;
  polygonOffsetEnabled: boolean | undefined;
  polygonOffset: Readonly<PolygonOffsetState> | undefined;
  attributesEnabled: ReadonlyArray<boolean | undefined>;
  attributePointers: ReadonlyArray<Readonly<AttributePointerState> | undefined>;
  clearColor: Color | undefined;
  clearDepth: number | undefined;
  clearStencil: number | undefined;
}

export type StateAxis =
  | "shader"
  | "texture"
  | "buffer"
  | "target"
  | "viewport"
  | "scissor"
  | "blend"
  | "depth"
  | "stencil"
  | "culling"
  | "polygonOffset"
  | "attributes"
  | "clearValues";

export interface AxisStats {
  changed: number;
  unchanged: number;
}

export interface StateCacheStats {
  changed: number;
  unchanged: number;
  byAxis: Record<StateAxis, AxisStats>;
}

export interface StateCacheOptions {
  /** Number of texture units that can be bound */
  maxTextureUnits: number;
  /** Number of vertex attribute locations */
  maxVertexAttributes: number;
}

const BUFFER_SLOTS: readonly BufferType[] = ["vertex", "index", "uniform"];

function colorEqual(a: Color | undefined, b: Color): boolean {
  return (
    a !== undefined &&
    a[0] === b[0] &&
    a[1] === b[1] &&
    a[2] === b[2] &&
    a[3] === b[3]
  );
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function emptyStats(): StateCacheStats {
  const axis = (): AxisStats => ({ changed: 0, unchanged: 0 });
  return {
    changed: 0,
    unchanged: 0,
    byAxis: {
      shader: axis(),
      texture: axis(),
      buffer: axis(),
      target: axis(),
      viewport: axis(),
      scissor: axis(),
      blend: axis(),
      depth: axis(),
      stencil: axis(),
      culling: axis(),
      polygonOffset: axis(),
      attributes: axis(),
      clearValues: axis(),
    },
  };
}

export class StateCache {
  readonly gl: WebGL2RenderingContext;
  readonly maxTextureUnits: number;
  readonly maxVertexAttributes: number;

  private shader: BindableShader | null | undefined;
  private activeUnit: number | undefined;
  private textures: (TextureKey | null | undefined)[];
  private buffers: Record<BufferType, BufferKey | null | undefined>;
  private target: FramebufferKey | null | undefined;
  private viewport: Rect | undefined;
  private scissorEnabled: boolean | undefined;
  private scissorBox: Rect | undefined;
  private blendEnabled: boolean | undefined;
  private blendFunc: BlendFuncState | undefined;
  private blendEquation: readonly [BlendEquation, BlendEquation] | undefined;
  private blendColor: Color | undefined;
  private depthEnabled: boolean | undefined;
  private depthFunc: CompareFunction | undefined;
  private depthWriteMask: boolean | undefined;
  private depthRange: readonly [number, number] | undefined;
  private stencilEnabled: boolean | undefined;
  private stencilFunc: StencilFuncState | undefined;
  private stencilOp: StencilOpState | undefined;
  private stencilWriteMask: number | undefined;
  private cullEnabled: boolean | undefined;
  private cullFace: CullFace | undefined;
  private frontFace: Winding | undefined;
  private polygonOffsetEnabled: boolean | undefined;
  private polygonOffset: PolygonOffsetState | undefined;
  private attributesEnabled: (boolean | undefined)[];
  private attributePointers: (AttributePointerState | undefined)[];
  private clearColor: Color | undefined;
  private clearDepth: number | undefined;
  private clearStencil: number | undefined;

  private _stats = emptyStats();

  constructor(gl: WebGL2RenderingContext, options: StateCacheOptions) {
    this.gl = gl;
    this.maxTextureUnits = options.maxTextureUnits;
    this.maxVertexAttributes = options.maxVertexAttributes;
    this.textures = new Array<TextureKey | null | undefined>(
      this.maxTextureUnits
    ).fill(undefined);
    this.buffers = { vertex: undefined, index: undefined, uniform: undefined };
    this.attributesEnabled = new Array<boolean | undefined>(
      this.maxVertexAttributes
    ).fill(undefined);
    this.attributePointers = new Array<AttributePointerState | undefined>(
      this.maxVertexAttributes
    ).fill(undefined);
  }

  // ==================== Bindings ====================

  bindShader(shader: BindableShader | null): StateChange {
    if (this.shader !== undefined && keyEquals(this.shader?.key, shader?.key)) {
      return this.tally("shader", false);
    }
    this.gl.useProgram(shader ? shader.handle : null);
    this.shader = shader;
    return this.tally("shader", true);
  }

  /** Currently bound shader, `null` for none, `undefined` when unknown */
  get boundShader(): BindableShader | null | undefined {
    return this.shader;
  }

  isShaderBound(key: ShaderKey): boolean {
    return (
      this.shader !== undefined &&
      this.shader !== null &&
      keyEquals(this.shader.key, key)
    );
  }

  bindTexture(unit: number, texture: BindableTexture | null): StateChange {
    this.checkUnit(unit);
    const current = this.textures[unit];
    if (current !== undefined && keyEquals(current, texture?.key)) {
      return this.tally("texture", false);
    }
    this.selectUnit(unit);
    this.gl.bindTexture(GL.GL_TEXTURE_2D, texture ? texture.handle : null);
    this.textures[unit] = texture ? texture.key : null;
    return this.tally("texture", true);
  }

  bindBuffer(slot: BufferType, buffer: BindableBuffer | null): StateChange {
    const current = this.buffers[slot];
    if (current !== undefined && keyEquals(current, buffer?.key)) {
      return this.tally("buffer", false);
    }
    this.gl.bindBuffer(BUFFER_TARGET_MAP[slot], buffer ? buffer.handle : null);
    this.buffers[slot] = buffer ? buffer.key : null;
    return this.tally("buffer", true);
  }

  /** Bind an offscreen framebuffer, or `null` for the default backbuffer */
  bindTarget(framebuffer: BindableFramebuffer | null): StateChange {
    if (this.target !== undefined && keyEquals(this.target, framebuffer?.key)) {
      return this.tally("target", false);
    }
    this.gl.bindFramebuffer(
      GL.GL_FRAMEBUFFER,
      framebuffer ? framebuffer.handle : null
    );
    this.target = framebuffer ? framebuffer.key : null;
    return this.tally("target", true);
  }

  /** Bound target key, `null` for the backbuffer, `undefined` when unknown */
  get boundTarget(): FramebufferKey | null | undefined {
    return this.target;
  }

  // ==================== Pipeline state ====================

  setViewport(rect: Rect): StateChange {
    validateRect(rect, "viewport");
    if (this.viewport && rectEqual(this.viewport, rect)) {
      return this.tally("viewport", false);
    }
    this.gl.viewport(rect.x, rect.y, rect.width, rect.height);
    this.viewport = { ...rect };
    return this.tally("viewport", true);
  }

  /** Enable scissoring with the given box, or disable it with `null` */
  setScissor(rect: Rect | null): StateChange {
    let changed = false;
    if (rect === null) {
      if (this.scissorEnabled !== false) {
        this.gl.disable(GL.GL_SCISSOR_TEST);
        this.scissorEnabled = false;
        changed = true;
      }
      return this.tally("scissor", changed);
    }

    validateRect(rect, "scissor");
    if (this.scissorEnabled !== true) {
      this.gl.enable(GL.GL_SCISSOR_TEST);
      this.scissorEnabled = true;
      changed = true;
    }
    if (!this.scissorBox || !rectEqual(this.scissorBox, rect)) {
      this.gl.scissor(rect.x, rect.y, rect.width, rect.height);
      this.scissorBox = { ...rect };
      changed = true;
    }
    return this.tally("scissor", changed);
  }

  setBlend(blend: BlendState | null): StateChange {
    let changed = false;
    if (blend === null) {
      if (this.blendEnabled !== false) {
        this.gl.disable(GL.GL_BLEND);
        this.blendEnabled = false;
        changed = true;
      }
      return this.tally("blend", changed);
    }

    if (this.blendEnabled !== true) {
      this.gl.enable(GL.GL_BLEND);
      this.blendEnabled = true;
      changed = true;
    }

    const func = this.blendFunc;
    if (
      !func ||
      func.srcRGB !== blend.srcRGB ||
      func.dstRGB !== blend.dstRGB ||
      func.srcAlpha !== blend.srcAlpha ||
      func.dstAlpha !== blend.dstAlpha
    ) {
      this.gl.blendFuncSeparate(
        BLEND_FACTOR_MAP[blend.srcRGB],
        BLEND_FACTOR_MAP[blend.dstRGB],
        BLEND_FACTOR_MAP[blend.srcAlpha],
        BLEND_FACTOR_MAP[blend.dstAlpha]
      );
      this.blendFunc = {
        srcRGB: blend.srcRGB,
        dstRGB: blend.dstRGB,
        srcAlpha: blend.srcAlpha,
        dstAlpha: blend.dstAlpha,
      };
      changed = true;
    }

    const equation = this.blendEquation;
    if (
      !equation ||
      equation[0] !== blend.equationRGB ||
      equation[1] !== blend.equationAlpha
    ) {
      this.gl.blendEquationSeparate(
        BLEND_EQUATION_MAP[blend.equationRGB],
        BLEND_EQUATION_MAP[blend.equationAlpha]
      );
      this.blendEquation = [blend.equationRGB, blend.equationAlpha];
      changed = true;
    }

    if (!colorEqual(this.blendColor, blend.color)) {
      const [r, g, b, a] = blend.color;
      this.gl.blendColor(r, g, b, a);
      this.blendColor = [r, g, b, a];
      changed = true;
    }

    return this.tally("blend", changed);
  }

  setDepth(depth: DepthState | null): StateChange {
    let changed = false;
    if (depth === null) {
      if (this.depthEnabled !== false) {
        this.gl.disable(GL.GL_DEPTH_TEST);
        this.depthEnabled = false;
        changed = true;
      }
      return this.tally("depth", changed);
    }

    if (this.depthEnabled !== true) {
      this.gl.enable(GL.GL_DEPTH_TEST);
      this.depthEnabled = true;
      changed = true;
    }
    if (this.depthFunc !== depth.func) {
      this.gl.depthFunc(COMPARE_FUNCTION_MAP[depth.func]);
      this.depthFunc = depth.func;
      changed = true;
    }
    if (this.applyDepthWriteMask(depth.writeMask)) {
      changed = true;
    }

    const near = clamp01(depth.range[0]);
    const far = clamp01(depth.range[1]);
    const range = this.depthRange;
    if (!range || range[0] !== near || range[1] !== far) {
      this.gl.depthRange(near, far);
      this.depthRange = [near, far];
      changed = true;
    }
    return this.tally("depth", changed);
  }

  /** Depth write mask on its own, for clears under any depth state */
  setDepthWriteMask(mask: boolean): StateChange {
    return this.tally("depth", this.applyDepthWriteMask(mask));
  }

  setStencil(stencil: StencilState | null): StateChange {
    let changed = false;
    if (stencil === null) {
      if (this.stencilEnabled !== false) {
        this.gl.disable(GL.GL_STENCIL_TEST);
        this.stencilEnabled = false;
        changed = true;
      }
      return this.tally("stencil", changed);
    }

    if (this.stencilEnabled !== true) {
      this.gl.enable(GL.GL_STENCIL_TEST);
      this.stencilEnabled = true;
      changed = true;
    }

    const func = this.stencilFunc;
    if (
      !func ||
      func.func !== stencil.func ||
      func.ref !== stencil.ref ||
      func.readMask !== stencil.readMask
    ) {
      this.gl.stencilFunc(
        COMPARE_FUNCTION_MAP[stencil.func],
        stencil.ref,
        stencil.readMask
      );
      this.stencilFunc = {
        func: stencil.func,
        ref: stencil.ref,
        readMask: stencil.readMask,
      };
      changed = true;
    }

    const op = this.stencilOp;
    if (
      !op ||
      op.fail !== stencil.fail ||
      op.depthFail !== stencil.depthFail ||
      op.pass !== stencil.pass
    ) {
      this.gl.stencilOp(
        STENCIL_OPERATION_MAP[stencil.fail],
        STENCIL_OPERATION_MAP[stencil.depthFail],
        STENCIL_OPERATION_MAP[stencil.pass]
      );
      this.stencilOp = {
        fail: stencil.fail,
        depthFail: stencil.depthFail,
        pass: stencil.pass,
      };
      changed = true;
    }

    if (this.applyStencilWriteMask(stencil.writeMask)) {
      changed = true;
    }
    return this.tally("stencil", changed);
  }

  /** Stencil write mask on its own */
  setStencilWriteMask(mask: number): StateChange {
    return this.tally("stencil", this.applyStencilWriteMask(mask));
  }

  setCulling(culling: CullingState | null): StateChange {
    let changed = false;
    if (culling === null) {
      if (this.cullEnabled !== false) {
        this.gl.disable(GL.GL_CULL_FACE);
        this.cullEnabled = false;
        changed = true;
      }
      return this.tally("culling", changed);
    }

    if (this.cullEnabled !== true) {
      this.gl.enable(GL.GL_CULL_FACE);
      this.cullEnabled = true;
      changed = true;
    }
    if (this.cullFace !== culling.face) {
      this.gl.cullFace(CULL_FACE_MAP[culling.face]);
      this.cullFace = culling.face;
      changed = true;
    }
    if (this.frontFace !== culling.winding) {
      this.gl.frontFace(WINDING_MAP[culling.winding]);
      this.frontFace = culling.winding;
      changed = true;
    }
    return this.tally("culling", changed);
  }

  /** Enable depth bias for filled polygons, or disable it with `null` */
  setPolygonOffset(offset: PolygonOffsetState | null): StateChange {
    let changed = false;
    if (offset === null) {
      if (this.polygonOffsetEnabled !== false) {
        this.gl.disable(GL.GL_POLYGON_OFFSET_FILL);
        this.polygonOffsetEnabled = false;
        changed = true;
      }
      return this.tally("polygonOffset", changed);
    }

    if (this.polygonOffsetEnabled !== true) {
      this.gl.enable(GL.GL_POLYGON_OFFSET_FILL);
      this.polygonOffsetEnabled = true;
      changed = true;
    }
    const current = this.polygonOffset;
    if (
      !current ||
      current.factor !== offset.factor ||
      current.units !== offset.units
    ) {
      this.gl.polygonOffset(offset.factor, offset.units);
      this.polygonOffset = { factor: offset.factor, units: offset.units };
      changed = true;
    }
    return this.tally("polygonOffset", changed);
  }

  // ==================== Vertex input ====================

  /**
   * Enable exactly the given attribute locations and point each at its buffer.
   * Every other location is disabled.
   */
  setVertexAttributes(
    bindings: readonly VertexAttributeBinding[]
  ): StateChange {
    let changed = false;
    const wanted = new Array<VertexAttributeBinding | undefined>(
      this.maxVertexAttributes
    ).fill(undefined);
    for (const binding of bindings) {
      const { location } = binding;
      if (
        !Number.isInteger(location) ||
        location < 0 ||
        location >= this.maxVertexAttributes
      ) {
        throw new GraphicsError(
          ERROR_CODES.INVALID_DIMENSIONS,
          `Vertex attribute location ${location} ` +
            `out of range 0..${this.maxVertexAttributes - 1}`
        );
      }
      wanted[location] = binding;
    }

    for (let location = 0; location < this.maxVertexAttributes; location++) {
      const binding = wanted[location];
      const enabled = this.attributesEnabled[location];

      if (!binding) {
        if (enabled !== false) {
          this.gl.disableVertexAttribArray(location);
          this.attributesEnabled[location] = false;
          changed = true;
        }
        continue;
      }

      if (enabled !== true) {
        this.gl.enableVertexAttribArray(location);
        this.attributesEnabled[location] = true;
        changed = true;
      }

      const pointer = this.attributePointers[location];
      if (
        !pointer ||
        !keyEquals(pointer.buffer, binding.buffer.key) ||
        pointer.size !== binding.size ||
        pointer.type !== binding.type ||
        pointer.normalized !== binding.normalized ||
        pointer.stride !== binding.stride ||
        pointer.offset !== binding.offset ||
        pointer.integer !== binding.integer
      ) {
        this.bindBuffer("vertex", binding.buffer);
        if (binding.integer) {
          this.gl.vertexAttribIPointer(
            location,
            binding.size,
            binding.type,
            binding.stride,
            binding.offset
          );
        } else {
          this.gl.vertexAttribPointer(
            location,
            binding.size,
            binding.type,
            binding.normalized,
            binding.stride,
            binding.offset
          );
        }
        changed = true;
      }

      if (!pointer || pointer.divisor !== binding.divisor) {
        this.gl.vertexAttribDivisor(location, binding.divisor);
        changed = true;
      }

      this.attributePointers[location] = {
        buffer: binding.buffer.key,
        size: binding.size,
        type: binding.type,
        normalized: binding.normalized,
        stride: binding.stride,
        offset: binding.offset,
        integer: binding.integer,
        divisor: binding.divisor,
      };
    }

    return this.tally("attributes", changed);
  }

  // ==================== Clear values ====================

  setClearColor(color: Color): StateChange {
    if (colorEqual(this.clearColor, color)) {
      return this.tally("clearValues", false);
    }
    const [r, g, b, a] = color;
    this.gl.clearColor(r, g, b, a);
    this.clearColor = [r, g, b, a];
    return this.tally("clearValues", true);
  }

  setClearDepth(depth: number): StateChange {
    if (this.clearDepth === depth) {
      return this.tally("clearValues", false);
    }
    this.gl.clearDepth(depth);
    this.clearDepth = depth;
    return this.tally("clearValues", true);
  }

  setClearStencil(stencil: number): StateChange {
    if (this.clearStencil === stencil) {
      return this.tally("clearValues", false);
    }
    this.gl.clearStencil(stencil);
    this.clearStencil = stencil;
    return this.tally("clearValues", true);
  }

  // ==================== Invalidation ====================

  /** Mark every axis unknown */
  invalidate(): void {
    this.shader = undefined;
    this.activeUnit = undefined;
    this.textures.fill(undefined);
    for (const slot of BUFFER_SLOTS) {
      this.buffers[slot] = undefined;
    }
    this.target = undefined;
    this.viewport = undefined;
    this.scissorEnabled = undefined;
    this.scissorBox = undefined;
    this.blendEnabled = undefined;
    this.blendFunc = undefined;
    this.blendEquation = undefined;
    this.blendColor = undefined;
    this.depthEnabled = undefined;
    this.depthFunc = undefined;
    this.depthWriteMask = undefined;
    this.depthRange = undefined;
    this.stencilEnabled = undefined;
    this.stencilFunc = undefined;
    this.stencilOp = undefined;
    this.stencilWriteMask = undefined;
    this.cullEnabled = undefined;
    this.cullFace = undefined;
    this.frontFace = undefined;
    this.polygonOffsetEnabled = undefined;
    this.polygonOffset = undefined;
    this.attributesEnabled.fill(undefined);
    this.attributePointers.fill(undefined);
    this.clearColor = undefined;
    this.clearDepth = undefined;
    this.clearStencil = undefined;
  }

  /**
   * Drop every mirror entry that refers to a resource about to be destroyed.
   *
   * Deleting a bound buffer, texture or framebuffer unbinds it in the backend,
   * so those entries become `null`. A deleted program stays current until
   * another is bound, and attribute pointers keep referring to the dead
   * buffer, so those become unknown.
   */
  forget(key: ResourceKey): void {
    switch (key.kind) {
      case "buffer":
        for (const slot of BUFFER_SLOTS) {
          if (keyEquals(this.buffers[slot], key)) this.buffers[slot] = null;
        }
        for (let i = 0; i < this.attributePointers.length; i++) {
          if (keyEquals(this.attributePointers[i]?.buffer, key)) {
            this.attributePointers[i] = undefined;
          }
        }
        break;
      case "texture":
        for (let i = 0; i < this.textures.length; i++) {
          if (keyEquals(this.textures[i], key)) this.textures[i] = null;
        }
        break;
      case "framebuffer":
        if (keyEquals(this.target, key)) this.target = null;
        break;
      case "shader":
        if (keyEquals(this.shader?.key, key)) this.shader = undefined;
        break;
    }
  }

  // ==================== Diagnostics ====================

  snapshot(): StateSnapshot {
    return {
      shader:
        this.shader === undefined ? undefined : (this.shader?.key ?? null),
      activeUnit: this.activeUnit,
      textures: this.textures.slice(),
      buffers: { ...this.buffers },
      target: this.target,
      viewport: this.viewport,
      scissorEnabled: this.scissorEnabled,
      scissorBox: this.scissorBox,
      blendEnabled: this.blendEnabled,
      blendFunc: this.blendFunc,
      blendEquation: this.blendEquation,
      blendColor: this.blendColor,
      depthEnabled: this.depthEnabled,
      depthFunc: this.depthFunc,
      depthWriteMask: this.depthWriteMask,
      depthRange: this.depthRange,
      stencilEnabled: this.stencilEnabled,
      stencilFunc: this.stencilFunc,
      stencilOp: this.stencilOp,
      stencilWriteMask: this.stencilWriteMask,
      cullEnabled: this.cullEnabled,
      cullFace: this.cullFace,
      frontFace: this.frontFace,
      polygonOffsetEnabled: this.polygonOffsetEnabled,
      polygonOffset: this.polygonOffset,
      attributesEnabled: this.attributesEnabled.slice(),
      attributePointers: this.attributePointers.slice(),
      clearColor: this.clearColor,
      clearDepth: this.clearDepth,
      clearStencil: this.clearStencil,
    };
  }

  get stats(): StateCacheStats {
    return this._stats;
  }

  resetStats(): void {
    this._stats = emptyStats();
  }

  // ==================== Internals ====================

  private applyDepthWriteMask(mask: boolean): boolean {
    if (this.depthWriteMask === mask) return false;
    this.gl.depthMask(mask);
    this.depthWriteMask = mask;
    return true;
  }

  private applyStencilWriteMask(mask: number): boolean {
    if (this.stencilWriteMask === mask) return false;
    this.gl.stencilMask(mask);
    this.stencilWriteMask = mask;
    return true;
  }

  private selectUnit(unit: number): void {
    if (this.activeUnit === unit) return;
    this.gl.activeTexture(GL.GL_TEXTURE0 + unit);
    this.activeUnit = unit;
  }

  private checkUnit(unit: number): void {
    if (!Number.isInteger(unit) || unit < 0 || unit >= this.maxTextureUnits) {
      throw new GraphicsError(
        ERROR_CODES.INVALID_DIMENSIONS,
        `Texture unit ${unit} out of range 0..${this.maxTextureUnits - 1}`
      );
    }
  }

  private tally(axis: StateAxis, changed: boolean): StateChange {
    const axisStats = this._stats.byAxis[axis];
    if (changed) {
      axisStats.changed++;
      this._stats.changed++;
      return "changed";
    }
    axisStats.unchanged++;
    this._stats.unchanged++;
    return "unchanged";
  }
}
