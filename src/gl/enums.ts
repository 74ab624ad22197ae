/**
 * Lookup tables from the library's string enums to GL enum values.
 */

import type {
  BlendEquation,
  BlendFactor,
  CompareFunction,
  CullFace,
  StencilOperation,
  Winding,
} from "../state/PipelineSettings";
import * as GL from "./constants";

export type BufferType = "vertex" | "index" | "uniform";
export type BufferUsage = "static" | "dynamic" | "stream";
export type VertexType =
  | "float"
  | "byte"
  | "ubyte"
  | "short"
  | "ushort"
  | "int"
  | "uint";
export type IndexType = "u16" | "u32";
export type DrawMode =
  | "points"
  | "lines"
  | "line-loop"
  | "line-strip"
  | "triangles"
  | "triangle-strip"
  | "triangle-fan";

export const BUFFER_TARGET_MAP: Record<BufferType, GLenum> = {
  vertex: GL.GL_ARRAY_BUFFER,
  index: GL.GL_ELEMENT_ARRAY_BUFFER,
  uniform: GL.GL_UNIFORM_BUFFER,
};

export const BUFFER_USAGE_MAP: Record<BufferUsage, GLenum> = {
  static: GL.GL_STATIC_DRAW,
  dynamic: GL.GL_DYNAMIC_DRAW,
  stream: GL.GL_STREAM_DRAW,
};

export const VERTEX_TYPE_MAP: Record<VertexType, GLenum> = {
  float: GL.GL_FLOAT,
  byte: GL.GL_BYTE,
  ubyte: GL.GL_UNSIGNED_BYTE,
  short: GL.GL_SHORT,
  ushort: GL.GL_UNSIGNED_SHORT,
  int: GL.GL_INT,
  uint: GL.GL_UNSIGNED_INT,
};

/** Size in bytes of one component */
export const VERTEX_TYPE_SIZE: Record<VertexType, number> = {
  float: 4,
  byte: 1,
  ubyte: 1,
  short: 2,
  ushort: 2,
  int: 4,
  uint: 4,
};

export const INDEX_TYPE_MAP: Record<IndexType, GLenum> = {
  u16: GL.GL_UNSIGNED_SHORT,
  u32: GL.GL_UNSIGNED_INT,
};

export const INDEX_TYPE_SIZE: Record<IndexType, number> = {
  u16: 2,
  u32: 4,
};

export const DRAW_MODE_MAP: Record<DrawMode, GLenum> = {
  points: GL.GL_POINTS,
  lines: GL.GL_LINES,
  "line-loop": GL.GL_LINE_LOOP,
  "line-strip": GL.GL_LINE_STRIP,
  triangles: GL.GL_TRIANGLES,
  "triangle-strip": GL.GL_TRIANGLE_STRIP,
  "triangle-fan": GL.GL_TRIANGLE_FAN,
};

export const BLEND_FACTOR_MAP: Record<BlendFactor, GLenum> = {
  zero: GL.GL_ZERO,
  one: GL.GL_ONE,
  "src-color": GL.GL_SRC_COLOR,
  "one-minus-src-color": GL.GL_ONE_MINUS_SRC_COLOR,
  "dst-color": GL.GL_DST_COLOR,
  "one-minus-dst-color": GL.GL_ONE_MINUS_DST_COLOR,
  "src-alpha": GL.GL_SRC_ALPHA,
  "one-minus-src-alpha": GL.GL_ONE_MINUS_SRC_ALPHA,
  "dst-alpha": GL.GL_DST_ALPHA,
  "one-minus-dst-alpha": GL.GL_ONE_MINUS_DST_ALPHA,
  "constant-color": GL.GL_CONSTANT_COLOR,
  "one-minus-constant-color": GL.GL_ONE_MINUS_CONSTANT_COLOR,
  "constant-alpha": GL.GL_CONSTANT_ALPHA,
  "one-minus-constant-alpha": GL.GL_ONE_MINUS_CONSTANT_ALPHA,
  "src-alpha-saturate": GL.GL_SRC_ALPHA_SATURATE,
};

export const BLEND_EQUATION_MAP: Record<BlendEquation, GLenum> = {
  add: GL.GL_FUNC_ADD,
  subtract: GL.GL_FUNC_SUBTRACT,
  "reverse-subtract": GL.GL_FUNC_REVERSE_SUBTRACT,
  min: GL.GL_MIN,
  max: GL.GL_MAX,
};

export const COMPARE_FUNCTION_MAP: Record<CompareFunction, GLenum> = {
  never: GL.GL_NEVER,
  less: GL.GL_LESS,
  equal: GL.GL_EQUAL,
  "less-equal": GL.GL_LEQUAL,
  greater: GL.GL_GREATER,
  "not-equal": GL.GL_NOTEQUAL,
  "greater-equal": GL.GL_GEQUAL,
  always: GL.GL_ALWAYS,
};

export const STENCIL_OPERATION_MAP: Record<StencilOperation, GLenum> = {
  keep: GL.GL_KEEP,
  zero: GL.GL_ZERO,
  replace: GL.GL_REPLACE,
  increment: GL.GL_INCR,
  "increment-wrap": GL.GL_INCR_WRAP,
  decrement: GL.GL_DECR,
  "decrement-wrap": GL.GL_DECR_WRAP,
  invert: GL.GL_INVERT,
};

export const CULL_FACE_MAP: Record<CullFace, GLenum> = {
  front: GL.GL_FRONT,
  back: GL.GL_BACK,
  "front-and-back": GL.GL_FRONT_AND_BACK,
};

export const WINDING_MAP: Record<Winding, GLenum> = {
  cw: GL.GL_CW,
  ccw: GL.GL_CCW,
};
