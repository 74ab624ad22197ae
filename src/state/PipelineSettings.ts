/**
 * Per-draw pipeline settings.
 *
 * Every field is independently optional. `undefined` inherits whatever state
 * the previous command left behind and never causes a backend call. A set value
 * forces that state. For axes that can be switched off, `null` forces "off"
 * (and for `target`, the default backbuffer).
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import { keyEquals, type FramebufferKey } from "../resources/ResourceKey";

/** RGBA color with components in 0..1 */
export type Color = readonly [number, number, number, number];

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export type BlendFactor =
  | "zero"
  | "one"
  | "src-color"
  | "one-minus-src-color"
  | "dst-color"
  | "one-minus-dst-color"
  | "src-alpha"
  | "one-minus-src-alpha"
  | "dst-alpha"
  | "one-minus-dst-alpha"
  | "constant-color"
  | "one-minus-constant-color"
  | "constant-alpha"
  | "one-minus-constant-alpha"
  | "src-alpha-saturate";

export type BlendEquation =
  | "add"
  | "subtract"
  | "reverse-subtract"
  | "min"
  | "max";

export interface BlendState {
  readonly srcRGB: BlendFactor;
  readonly dstRGB: BlendFactor;
  readonly srcAlpha: BlendFactor;
  readonly dstAlpha: BlendFactor;
  readonly equationRGB: BlendEquation;
  readonly equationAlpha: BlendEquation;
  /** Constant blend color, used by the constant-* factors */
  readonly color: Color;
}

export type CompareFunction =
  | "never"
  | "less"
  | "equal"
  | "less-equal"
  | "greater"
  | "not-equal"
  | "greater-equal"
  | "always";

export interface DepthState {
  readonly func: CompareFunction;
  readonly writeMask: boolean;
  /** Depth range [near, far], each clamped to 0..1 when applied */
  readonly range: readonly [number, number];
}

export type StencilOperation =
  | "keep"
  | "zero"
  | "replace"
  | "increment"
  | "increment-wrap"
  | "decrement"
  | "decrement-wrap"
  | "invert";

export interface StencilState {
  readonly func: CompareFunction;
  readonly ref: number;
  readonly readMask: number;
  readonly writeMask: number;
  readonly fail: StencilOperation;
  readonly depthFail: StencilOperation;
  readonly pass: StencilOperation;
}

export type CullFace = "front" | "back" | "front-and-back";
export type Winding = "cw" | "ccw";

export interface CullingState {
  readonly face: CullFace;
  readonly winding: Winding;
}

/** Depth bias added to filled polygons: factor * slope + units * r */
export interface PolygonOffsetState {
  readonly factor: number;
  readonly units: number;
}

export interface PipelineSettings {
  readonly viewport?: Rect;
  readonly blend?: BlendState | null;
  readonly depth?: DepthState | null;
  readonly stencil?: StencilState | null;
  readonly scissor?: Rect | null;
  readonly target?: FramebufferKey | null;
  readonly culling?: CullingState | null;
  readonly polygonOffset?: PolygonOffsetState | null;
}

export const PIPELINE_FIELDS = [
  "viewport",
  "blend",
  "depth",
  "stencil",
  "scissor",
  "target",
  "culling",
  "polygonOffset",
] as const satisfies ReadonlyArray<keyof PipelineSettings>;

/** Replace blending: src * 1 + dst * 0 */
export const DEFAULT_BLEND_STATE: BlendState = {
  srcRGB: "one",
  dstRGB: "zero",
  srcAlpha: "one",
  dstAlpha: "zero",
  equationRGB: "add",
  equationAlpha: "add",
  color: [0, 0, 0, 0],
};

export const DEFAULT_DEPTH_STATE: DepthState = {
  func: "less",
  writeMask: true,
  range: [0, 1],
};

export const DEFAULT_STENCIL_STATE: StencilState = {
  func: "always",
  ref: 0,
  readMask: 0xff,
  writeMask: 0xff,
  fail: "keep",
  depthFail: "keep",
  pass: "keep",
};

export const DEFAULT_CULLING_STATE: CullingState = {
  face: "back",
  winding: "ccw",
};

export const DEFAULT_POLYGON_OFFSET_STATE: PolygonOffsetState = {
  factor: 0,
  units: 0,
};

/** Build settings from an all-unset baseline */
export function pipelineSettings(
  overrides: PipelineSettings = {}
): PipelineSettings {
  return withSettings({}, overrides);
}

/** Copy `base` and override the fields `overrides` sets */
export function withSettings(
  base: PipelineSettings,
  overrides: PipelineSettings
): PipelineSettings {
  return mergeSettings(base, overrides);
}

/**
 * Compose two settings values field by field: the override's value wherever it
 * is set (including `null`), the base's value otherwise.
 */
export function mergeSettings(
  base: PipelineSettings,
  override: PipelineSettings
): PipelineSettings {
  const merged: {
    -readonly [F in keyof PipelineSettings]: PipelineSettings[F];
  } = {};
  for (const field of PIPELINE_FIELDS) {
    const value = override[field] !== undefined ? override[field] : base[field];
    if (value !== undefined) {
      assignField(merged, field, value);
    }
  }
  return merged;
}

function assignField<F extends keyof PipelineSettings>(
  target: { -readonly [K in keyof PipelineSettings]: PipelineSettings[K] },
  field: F,
  value: PipelineSettings[F]
): void {
  target[field] = value;
}

// ==================== Equality ====================

function colorEqual(a: Color, b: Color): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

export function rectEqual(a: Rect, b: Rect): boolean {
  return (
    a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height
  );
}

export function blendStateEqual(a: BlendState, b: BlendState): boolean {
  return (
    a.srcRGB === b.srcRGB &&
    a.dstRGB === b.dstRGB &&
    a.srcAlpha === b.srcAlpha &&
    a.dstAlpha === b.dstAlpha &&
    a.equationRGB === b.equationRGB &&
    a.equationAlpha === b.equationAlpha &&
    colorEqual(a.color, b.color)
  );
}

export function depthStateEqual(a: DepthState, b: DepthState): boolean {
  return (
    a.func === b.func &&
    a.writeMask === b.writeMask &&
    a.range[0] === b.range[0] &&
    a.range[1] === b.range[1]
  );
}

export function stencilStateEqual(a: StencilState, b: StencilState): boolean {
  return (
    a.func === b.func &&
    a.ref === b.ref &&
    a.readMask === b.readMask &&
    a.writeMask === b.writeMask &&
    a.fail === b.fail &&
    a.depthFail === b.depthFail &&
    a.pass === b.pass
  );
}

export function cullingStateEqual(a: CullingState, b: CullingState): boolean {
  return a.face === b.face && a.winding === b.winding;
}

export function polygonOffsetStateEqual(
  a: PolygonOffsetState,
  b: PolygonOffsetState
): boolean {
  return a.factor === b.factor && a.units === b.units;
}

/** Compare two optional/nullable values with a value-equality function */
function optionalEqual<T>(
  a: T | null | undefined,
  b: T | null | undefined,
  eq: (x: T, y: T) => boolean
): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (a === null || b === null) return a === b;
  return eq(a, b);
}

export function settingsEqual(
  a: PipelineSettings,
  b: PipelineSettings
): boolean {
  return (
    optionalEqual(a.viewport, b.viewport, rectEqual) &&
    optionalEqual(a.blend, b.blend, blendStateEqual) &&
    optionalEqual(a.depth, b.depth, depthStateEqual) &&
    optionalEqual(a.stencil, b.stencil, stencilStateEqual) &&
    optionalEqual(a.scissor, b.scissor, rectEqual) &&
    optionalEqual(a.target, b.target, keyEquals) &&
    optionalEqual(a.culling, b.culling, cullingStateEqual) &&
    optionalEqual(a.polygonOffset, b.polygonOffset, polygonOffsetStateEqual)
  );
}

// ==================== Validation ====================

export function validateRect(rect: Rect, what: string): void {
  const { x, y, width, height } = rect;
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new GraphicsError(
      ERROR_CODES.INVALID_DIMENSIONS,
      `${what} origin must be finite, got (${x}, ${y})`
    );
  }
  if (
    !Number.isFinite(width) ||
    !Number.isFinite(height) ||
    width <= 0 ||
    height <= 0
  ) {
    throw new GraphicsError(
      ERROR_CODES.INVALID_DIMENSIONS,
      `${what} size must be positive, got ${width}x${height}`
    );
  }
}

/** Reject zero or negative viewport/scissor sizes and non-finite offsets */
export function validateSettings(settings: PipelineSettings): void {
  if (settings.viewport) validateRect(settings.viewport, "viewport");
  if (settings.scissor) validateRect(settings.scissor, "scissor");
  const offset = settings.polygonOffset;
  if (!offset) return;
  if (!Number.isFinite(offset.factor) || !Number.isFinite(offset.units)) {
    throw new GraphicsError(
      ERROR_CODES.INVALID_DIMENSIONS,
      `polygon offset must be finite, ` +
        `got factor=${offset.factor} units=${offset.units}`
    );
  }
}
