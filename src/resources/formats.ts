/**
 * Texture pixel formats, filters and wrap modes.
 */

import * as GL from "../gl/constants";

export type PixelFormat =
  | "r8"
  | "rgb8"
  | "rgba8"
  | "srgba8"
  | "rgba16f"
  | "rgba32f"
  | "depth16"
  | "depth24"
  | "depth24-stencil8";

export interface PixelFormatInfo {
  internalFormat: GLenum;
  format: GLenum;
  type: GLenum;
  bytesPerPixel: number;
}

export const PIXEL_FORMATS: Record<PixelFormat, PixelFormatInfo> = {
  r8: {
    internalFormat: GL.GL_R8,
    format: GL.GL_RED,
    type: GL.GL_UNSIGNED_BYTE,
    bytesPerPixel: 1,
  },
  rgb8: {
    internalFormat: GL.GL_RGB8,
    format: GL.GL_RGB,
    type: GL.GL_UNSIGNED_BYTE,
    bytesPerPixel: 3,
  },
  rgba8: {
    internalFormat: GL.GL_RGBA8,
    format: GL.GL_RGBA,
    type: GL.GL_UNSIGNED_BYTE,
    bytesPerPixel: 4,
  },
  srgba8: {
    internalFormat: GL.GL_SRGB8_ALPHA8,
    format: GL.GL_RGBA,
    type: GL.GL_UNSIGNED_BYTE,
    bytesPerPixel: 4,
  },
  rgba16f: {
    internalFormat: GL.GL_RGBA16F,
    format: GL.GL_RGBA,
    type: GL.GL_HALF_FLOAT,
    bytesPerPixel: 8,
  },
  rgba32f: {
    internalFormat: GL.GL_RGBA32F,
    format: GL.GL_RGBA,
    type: GL.GL_FLOAT,
    bytesPerPixel: 16,
  },
  depth16: {
    internalFormat: GL.GL_DEPTH_COMPONENT16,
    format: GL.GL_DEPTH_COMPONENT,
    type: GL.GL_UNSIGNED_SHORT,
    bytesPerPixel: 2,
  },
  depth24: {
    internalFormat: GL.GL_DEPTH_COMPONENT24,
    format: GL.GL_DEPTH_COMPONENT,
    type: GL.GL_UNSIGNED_INT,
    bytesPerPixel: 4,
  },
  "depth24-stencil8": {
    internalFormat: GL.GL_DEPTH24_STENCIL8,
    format: GL.GL_DEPTH_STENCIL,
    type: GL.GL_UNSIGNED_INT_24_8,
    bytesPerPixel: 4,
  },
};

export type FilterMode = "nearest" | "linear";
export type WrapMode = "clamp" | "repeat" | "mirrored-repeat";

export interface TextureFilter {
  min: FilterMode;
  mag: FilterMode;
  /** Filtering between mip levels; null samples the base level only */
  mipmap: FilterMode | null;
}

export interface TextureWrap {
  s: WrapMode;
  t: WrapMode;
}

export const DEFAULT_TEXTURE_FILTER: TextureFilter = {
  min: "linear",
  mag: "linear",
  mipmap: null,
};

export const DEFAULT_TEXTURE_WRAP: TextureWrap = {
  s: "clamp",
  t: "clamp",
};

const WRAP_MAP: Record<WrapMode, GLenum> = {
  clamp: GL.GL_CLAMP_TO_EDGE,
  repeat: GL.GL_REPEAT,
  "mirrored-repeat": GL.GL_MIRRORED_REPEAT,
};

export function wrapToGL(mode: WrapMode): GLenum {
  return WRAP_MAP[mode];
}

export function magFilterToGL(mode: FilterMode): GLenum {
  return mode === "nearest" ? GL.GL_NEAREST : GL.GL_LINEAR;
}

export function minFilterToGL(filter: TextureFilter): GLenum {
  switch (filter.mipmap) {
    case null:
      return filter.min === "nearest" ? GL.GL_NEAREST : GL.GL_LINEAR;
    case "nearest":
      return filter.min === "nearest"
        ? GL.GL_NEAREST_MIPMAP_NEAREST
        : GL.GL_LINEAR_MIPMAP_NEAREST;
    case "linear":
      return filter.min === "nearest"
        ? GL.GL_NEAREST_MIPMAP_LINEAR
        : GL.GL_LINEAR_MIPMAP_LINEAR;
  }
}
