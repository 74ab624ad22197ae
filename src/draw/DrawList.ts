/**
 * DrawList - records clears and draws, then replays them through the state
 * cache on flush.
 *
 * Recording validates and snapshots; it never touches the backend. Flushing
 * resolves every command first, so a stale key or an out-of-range draw fails
 * the whole flush before any call is issued.
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import {
  DRAW_MODE_MAP,
  INDEX_TYPE_MAP,
  INDEX_TYPE_SIZE,
  VERTEX_TYPE_MAP,
} from "../gl/enums";
import * as GL from "../gl/constants";
import type { Mesh, MeshDrawInfo } from "../mesh/Mesh";
import type { BufferResource } from "../resources/Buffer";
import type { FramebufferResource } from "../resources/Framebuffer";
import {
  keyToString,
  type BufferKey,
  type ShaderKey,
} from "../resources/ResourceKey";
import type { ResourceRegistry } from "../resources/ResourceRegistry";
import type { TextureResource } from "../resources/Texture";
import type { Shader, UniformValue } from "../shader/Shader";
import type { ShaderState } from "../shader/ShaderState";
import { convertUniform } from "../shader/uniforms";
import {
  mergeSettings,
  validateRect,
  validateSettings,
  type PipelineSettings,
} from "../state/PipelineSettings";
import type { StateCache, VertexAttributeBinding } from "../state/StateCache";
import { isTexture } from "../texture/Texture";
import {
  DEFAULT_CLEAR_COLOR,
  DEFAULT_CLEAR_DEPTH,
  DEFAULT_CLEAR_STENCIL,
  type BufferReservation,
  type ClearCommand,
  type ClearSettings,
  type Command,
  type DrawCommand,
  type FlushStats,
  type RecordedUniform,
} from "./DrawCommand";
import { reorderCommands } from "./sortKey";

/** What a draw list needs from its owner */
export interface DrawListContext {
  readonly gl: WebGL2RenderingContext;
  readonly registry: ResourceRegistry;
  readonly cache: StateCache;
  /** @throws GraphicsError StaleHandle or NotFound for a dead shader */
  shaderState(key: ShaderKey): ShaderState;
}

export interface DrawListOptions {
  /** Settings every draw starts from (default: none, inherit the cache) */
  defaults?: PipelineSettings;
  /** Sort runs of reorder-safe opaque draws by state (default: false) */
  reorder?: boolean;
  /** Log a line with the stats of every flush (default: false) */
  debug?: boolean;
}

export const DEFAULT_DRAW_LIST_OPTIONS: Required<DrawListOptions> = {
  defaults: {},
  reorder: false,
  debug: false,
};

export interface DrawOptions {
  /** Per-draw uniform values, on top of the shader's defaults */
  uniforms?: Readonly<Record<string, UniformValue>>;
  /** The draw may be reordered within a run of equal settings */
  reorderSafe?: boolean;
}

interface ResolvedSampler {
  name: string;
  unit: number;
  texture: TextureResource | null;
}

interface ResolvedDraw {
  command: DrawCommand;
  state: ShaderState;
  target: FramebufferResource | null | undefined;
  samplers: ResolvedSampler[];
  attributes: VertexAttributeBinding[];
  uploads: BufferResource[];
  indexBuffer: BufferResource | null;
  start: number;
  count: number;
}

interface ResolvedClear {
  command: ClearCommand;
  target: FramebufferResource | null | undefined;
}

type Resolved = ResolvedDraw | ResolvedClear;

function isResolvedDraw(resolved: Resolved): resolved is ResolvedDraw {
  return resolved.command.kind === "draw";
}

function overflow(
  buffer: BufferResource,
  start: number,
  end: number
): GraphicsError {
  const name = keyToString(buffer.key);
  return new GraphicsError(
    ERROR_CODES.BUFFER_OVERFLOW,
    `Draw reads bytes [${start}, ${end}) of ${name} which has ${buffer.size} bytes`
  );
}

/** The buffer a draw range indexes into and the size of one element */
function drawnBuffer(
  command: Pick<DrawCommand, "attributes" | "drawInfo">
): { buffer: BufferKey; elementSize: number } | null {
  const indices = command.drawInfo.indices;
  if (indices) {
    const elementSize = INDEX_TYPE_SIZE[indices.type];
    return { buffer: indices.buffer, elementSize };
  }
  const perVertex = command.attributes.find((attached) => attached.step === 0);
  if (!perVertex) return null;
  return { buffer: perVertex.buffer, elementSize: perVertex.stride };
}

export class DrawList {
  private readonly context: DrawListContext;
  private readonly options: Required<DrawListOptions>;
  private recorded: Command[] = [];

  constructor(context: DrawListContext, options: DrawListOptions = {}) {
    this.context = context;
    this.options = {
      defaults: options.defaults ?? DEFAULT_DRAW_LIST_OPTIONS.defaults,
      reorder: options.reorder ?? DEFAULT_DRAW_LIST_OPTIONS.reorder,
      debug: options.debug ?? DEFAULT_DRAW_LIST_OPTIONS.debug,
    };
    validateSettings(this.options.defaults);
  }

  get length(): number {
    return this.recorded.length;
  }

  commands(): readonly Command[] {
    return this.recorded;
  }

  // ==================== Recording ====================

  /**
   * Record a clear. An omitted target or scissor falls back to the list
   * defaults, then to the backbuffer and no scissor; a clear never inherits
   * what the previous command left bound.
   */
  clear(settings: ClearSettings = {}): void {
    const { defaults } = this.options;
    const target =
      settings.target !== undefined
        ? settings.target
        : (defaults.target ?? null);
    const scissor =
      settings.scissor !== undefined
        ? settings.scissor
        : (defaults.scissor ?? null);
    if (target) this.context.registry.getRenderTarget(target);
    if (scissor) validateRect(scissor, "scissor");

    const { color, depth, stencil } = settings;
    this.recorded.push({
      kind: "clear",
      color: color === undefined ? DEFAULT_CLEAR_COLOR : color,
      depth: depth === undefined ? DEFAULT_CLEAR_DEPTH : depth,
      stencil: stencil === undefined ? DEFAULT_CLEAR_STENCIL : stencil,
      settings: { target, scissor },
    });
  }

  /**
   * Record a draw of `mesh` with `shader`.
   *
   * @throws GraphicsError for dead keys, bad dimensions, unknown uniforms or
   *   values that do not fit their uniform; nothing is recorded then.
   */
  draw(
    shader: Shader,
    mesh: Mesh,
    settings: PipelineSettings = {},
    options: DrawOptions = {}
  ): void {
    const { registry } = this.context;
    const state = this.context.shaderState(shader.key);

    validateSettings(settings);
    const merged = mergeSettings(this.options.defaults, settings);
    if (merged.target) registry.getRenderTarget(merged.target);

    const attributes = mesh.attributes().map((attached) => ({
      ...attached,
      formats: [...attached.formats],
    }));
    for (const attached of attributes) {
      registry.getBuffer(attached.buffer);
    }
    const info = mesh.drawInfo();
    const drawInfo: MeshDrawInfo = {
      ...info,
      range: info.range ? { ...info.range } : undefined,
      indices: info.indices ? { ...info.indices } : undefined,
    };
    if (drawInfo.indices) registry.getBuffer(drawInfo.indices.buffer);

    const uniforms = new Map<string, RecordedUniform>();
    const values = new Map<string, UniformValue>(
      shader.uniformDefaults?.() ?? []
    );
    for (const [name, value] of Object.entries(options.uniforms ?? {})) {
      values.set(name, value);
    }
    for (const [name, value] of values) {
      state.validate(name, value);
      if (isTexture(value)) {
        const texture = value.textureKey();
        registry.getTexture(texture);
        this.checkSamplerUnit(name, state.samplerUnit(name));
        uniforms.set(name, { kind: "texture", texture });
      } else {
        const { type } = state.uniform(name);
        const data = convertUniform(name, type, value);
        uniforms.set(name, { kind: "data", data });
      }
    }

    let reservation: BufferReservation | null = null;
    const drawn = drawnBuffer({ attributes, drawInfo });
    if (drawn && drawInfo.range) {
      const { start, count } = drawInfo.range;
      const endByte = (start + count) * drawn.elementSize;
      registry.reserveBuffer(drawn.buffer, endByte);
      reservation = { buffer: drawn.buffer, endByte };
    }

    this.recorded.push({
      kind: "draw",
      shader: shader.key,
      uniforms,
      attributes,
      drawInfo,
      settings: merged,
      reorderSafe: options.reorderSafe ?? false,
      reservation,
    });
  }

  /** Drop every recorded command without issuing anything */
  discard(): void {
    const recorded = this.recorded;
    this.recorded = [];
    this.release(recorded);
  }

  // ==================== Flushing ====================

  /**
   * Issue every recorded command in order, then empty the list. The list is
   * emptied and reservations released also when resolution fails.
   */
  flush(): FlushStats {
    const recorded = this.recorded;
    this.recorded = [];

    const { cache } = this.context;
    const changedBefore = cache.stats.changed;
    const unchangedBefore = cache.stats.unchanged;
    const stats: FlushStats = {
      commands: recorded.length,
      draws: 0,
      clears: 0,
      stateChanges: 0,
      elidedChanges: 0,
      uniformUploads: 0,
    };

    try {
      const ordered = this.options.reorder
        ? reorderCommands(recorded)
        : recorded;
      const resolved = ordered.map((command) => this.resolve(command));

      for (const entry of resolved) {
        if (isResolvedDraw(entry)) {
          this.replayDraw(entry, stats);
        } else {
          this.replayClear(entry);
          stats.clears++;
        }
      }
    } finally {
      this.release(recorded);
    }

    stats.stateChanges = cache.stats.changed - changedBefore;
    stats.elidedChanges = cache.stats.unchanged - unchangedBefore;
    if (this.options.debug) {
      console.log(
        `[DrawList] flush: ${stats.commands} commands, ${stats.draws} draws, ` +
          `${stats.clears} clears, ${stats.stateChanges} state changes ` +
          `(${stats.elidedChanges} elided), ${stats.uniformUploads} uniform uploads`
      );
    }
    return stats;
  }

  private release(commands: readonly Command[]): void {
    const { registry } = this.context;
    for (const command of commands) {
      if (command.kind !== "draw" || !command.reservation) continue;
      const { buffer, endByte } = command.reservation;
      registry.releaseBuffer(buffer, endByte);
    }
  }

  private resolveTarget(
    settings: PipelineSettings
  ): FramebufferResource | null | undefined {
    const { target } = settings;
    if (target === undefined || target === null) return target;
    return this.context.registry.getRenderTarget(target);
  }

  /** A texture sampler needs a unit the cache can bind */
  private checkSamplerUnit(name: string, unit: number | undefined): void {
    const { maxTextureUnits } = this.context.cache;
    if (unit === undefined || unit < maxTextureUnits) return;
    throw new GraphicsError(
      ERROR_CODES.INVALID_DIMENSIONS,
      `Sampler uniform "${name}" needs texture unit ${unit}, ` +
        `but only ${maxTextureUnits} are available`
    );
  }

  private resolve(command: Command): Resolved {
    if (command.kind === "clear") {
      return { command, target: this.resolveTarget(command.settings) };
    }

    const { registry } = this.context;
    const state = this.context.shaderState(command.shader);
    const target = this.resolveTarget(command.settings);
    const { drawInfo } = command;

    const samplers: ResolvedSampler[] = [];
    for (const name of state.samplers()) {
      const uniform = command.uniforms.get(name);
      const unit = state.samplerUnit(name);
      if (!uniform || unit === undefined) {
        throw new GraphicsError(
          ERROR_CODES.MISSING_UNIFORM,
          `Sampler uniform "${name}" has no texture`
        );
      }
      let texture: TextureResource | null = null;
      if (uniform.kind === "texture") {
        texture = registry.getTexture(uniform.texture);
        this.checkSamplerUnit(name, unit);
      }
      samplers.push({ name, unit, texture });
    }

    const uploads = new Map<string, BufferResource>();
    const attributes: VertexAttributeBinding[] = [];
    for (const attached of command.attributes) {
      const buffer = registry.getBuffer(attached.buffer);
      uploads.set(keyToString(buffer.key), buffer);

      if (attached.step > 0 && drawInfo.instanceCount > 0) {
        const instances = Math.ceil(drawInfo.instanceCount / attached.step);
        const end = instances * attached.stride;
        if (end > buffer.size) throw overflow(buffer, 0, end);
      }
    }
    for (const attribute of state.shader.attributes) {
      for (const attached of command.attributes) {
        const format = attached.formats.find((f) => f.name === attribute.name);
        if (!format) continue;
        attributes.push({
          location: attribute.location,
          buffer: registry.getBuffer(attached.buffer),
          size: format.size,
          type: VERTEX_TYPE_MAP[format.type],
          normalized: format.normalized ?? false,
          stride: attached.stride,
          offset: format.offset,
          integer: format.type === "int" || format.type === "uint",
          divisor: attached.step,
        });
        break;
      }
    }

    let indexBuffer: BufferResource | null = null;
    if (drawInfo.indices) {
      indexBuffer = registry.getBuffer(drawInfo.indices.buffer);
      uploads.set(keyToString(indexBuffer.key), indexBuffer);
    }

    let start = drawInfo.range?.start ?? 0;
    let count = drawInfo.range?.count ?? 0;
    const drawn = drawnBuffer(command);
    if (drawn) {
      const buffer = registry.getBuffer(drawn.buffer);
      if (drawInfo.range) {
        const end = (start + count) * drawn.elementSize;
        if (end > buffer.size) {
          throw overflow(buffer, start * drawn.elementSize, end);
        }
      } else {
        start = 0;
        count = Math.floor(buffer.size / drawn.elementSize);
      }
    }

    return {
      command,
      state,
      target,
      samplers,
      attributes,
      uploads: [...uploads.values()],
      indexBuffer,
      start,
      count,
    };
  }

  private applySettings(
    settings: PipelineSettings,
    target: FramebufferResource | null | undefined
  ): void {
    const { cache } = this.context;
    if (target !== undefined) cache.bindTarget(target);
    if (settings.viewport) cache.setViewport(settings.viewport);
    if (settings.scissor !== undefined) cache.setScissor(settings.scissor);
    if (settings.blend !== undefined) cache.setBlend(settings.blend);
    if (settings.depth !== undefined) cache.setDepth(settings.depth);
    if (settings.stencil !== undefined) cache.setStencil(settings.stencil);
    if (settings.culling !== undefined) cache.setCulling(settings.culling);
    if (settings.polygonOffset !== undefined) {
      cache.setPolygonOffset(settings.polygonOffset);
    }
  }

  private replayClear({ command, target }: ResolvedClear): void {
    const { cache, gl } = this.context;
    this.applySettings(command.settings, target);

    let mask = 0;
    if (command.color !== null) {
      cache.setClearColor(command.color);
      mask |= GL.GL_COLOR_BUFFER_BIT;
    }
    if (command.depth !== null) {
      cache.setDepthWriteMask(true);
      cache.setClearDepth(command.depth);
      mask |= GL.GL_DEPTH_BUFFER_BIT;
    }
    if (command.stencil !== null) {
      cache.setStencilWriteMask(0xff);
      cache.setClearStencil(command.stencil);
      mask |= GL.GL_STENCIL_BUFFER_BIT;
    }
    if (mask !== 0) gl.clear(mask);
  }

  private replayDraw(draw: ResolvedDraw, stats: FlushStats): void {
    const { cache, gl } = this.context;
    const { command, state } = draw;
    this.applySettings(command.settings, draw.target);

    cache.bindShader(state.shader);

    for (const sampler of draw.samplers) {
      if (!sampler.texture) continue;
      cache.bindTexture(sampler.unit, sampler.texture);
      const change = state.setUniform(sampler.name, sampler.unit);
      if (change === "changed") stats.uniformUploads++;
    }
    // Samplers given a unit number arrive here as plain data
    for (const [name, uniform] of command.uniforms) {
      if (uniform.kind !== "data") continue;
      const change = state.setUniform(name, uniform.data);
      if (change === "changed") stats.uniformUploads++;
    }

    for (const buffer of draw.uploads) {
      buffer.upload(cache);
    }
    cache.setVertexAttributes(draw.attributes);

    const { drawInfo } = command;
    const mode = DRAW_MODE_MAP[drawInfo.mode];
    const instanced = drawInfo.instanceCount !== 1;
    if (draw.indexBuffer) cache.bindBuffer("index", draw.indexBuffer);
    if (draw.count === 0 || drawInfo.instanceCount === 0) return;

    if (drawInfo.indices) {
      const type = INDEX_TYPE_MAP[drawInfo.indices.type];
      const offset = draw.start * INDEX_TYPE_SIZE[drawInfo.indices.type];
      if (instanced) {
        gl.drawElementsInstanced(
          mode,
          draw.count,
          type,
          offset,
          drawInfo.instanceCount
        );
      } else {
        gl.drawElements(mode, draw.count, type, offset);
      }
    } else if (instanced) {
      gl.drawArraysInstanced(
        mode,
        draw.start,
        draw.count,
        drawInfo.instanceCount
      );
    } else {
      gl.drawArrays(mode, draw.start, draw.count);
    }
    stats.draws++;
  }
}
