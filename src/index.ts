/**
 * glint - a state-caching draw layer over WebGL2
 */

export const VERSION = "0.1.0";

export {
  GraphicsContext,
  DEFAULT_MAX_TEXTURE_UNITS,
  DEFAULT_MAX_VERTEX_ATTRIBUTES,
  type GraphicsContextOptions,
} from "./GraphicsContext";

// Errors
export {
  ERROR_CODES,
  GraphicsError,
  isGraphicsError,
  type GraphicsErrorCode,
} from "./errors";

// Resources
export {
  createKey,
  keyEquals,
  keyToString,
  compareKeys,
  type ResourceKind,
  type ResourceKey,
  type BufferKey,
  type TextureKey,
  type ShaderKey,
  type FramebufferKey,
} from "./resources/ResourceKey";
export { SlotMap } from "./resources/SlotMap";
export {
  ResourceRegistry,
  type FramebufferSettings,
} from "./resources/ResourceRegistry";
export { BufferResource, type ModifiedRange } from "./resources/Buffer";
export {
  TextureResource,
  type TextureSettings,
  type TextureInfo,
} from "./resources/Texture";
export { ShaderResource } from "./resources/Shader";
export { FramebufferResource } from "./resources/Framebuffer";
export type {
  AttributeInfo,
  UniformInfo,
  ShaderStage,
} from "./resources/compile";
export {
  PIXEL_FORMATS,
  DEFAULT_TEXTURE_FILTER,
  DEFAULT_TEXTURE_WRAP,
  type PixelFormat,
  type FilterMode,
  type WrapMode,
  type TextureFilter,
  type TextureWrap,
} from "./resources/formats";
export type {
  BufferType,
  BufferUsage,
  VertexType,
  IndexType,
  DrawMode,
} from "./gl/enums";

// State
export {
  StateCache,
  type StateChange,
  type StateAxis,
  type StateCacheStats,
  type StateCacheOptions,
  type StateSnapshot,
  type VertexAttributeBinding,
} from "./state/StateCache";
export {
  DEFAULT_BLEND_STATE,
  DEFAULT_DEPTH_STATE,
  DEFAULT_STENCIL_STATE,
  DEFAULT_CULLING_STATE,
  DEFAULT_POLYGON_OFFSET_STATE,
  pipelineSettings,
  withSettings,
  mergeSettings,
  settingsEqual,
  type PipelineSettings,
  type Color,
  type Rect,
  type BlendFactor,
  type BlendEquation,
  type BlendState,
  type CompareFunction,
  type DepthState,
  type StencilOperation,
  type StencilState,
  type CullFace,
  type Winding,
  type CullingState,
  type PolygonOffsetState,
} from "./state/PipelineSettings";
export { blendStateForMode, type BlendMode } from "./state/blendMode";

// Shaders
export { ShaderProgram } from "./shader/ShaderProgram";
export { ShaderState, withShader } from "./shader/ShaderState";
export type { Shader, UniformValue } from "./shader/Shader";
export type { UniformData } from "./shader/uniforms";

// Textures
export { Image } from "./texture/Image";
export { Canvas } from "./texture/Canvas";
export { isTexture, type Texture } from "./texture/Texture";

// Meshes
export {
  VertexMesh,
  IndexedMesh,
  InstancedMesh,
  packFormats,
  type Mesh,
  type VertexFormat,
  type AttachedAttributes,
  type DrawRange,
  type IndexInfo,
  type MeshDrawInfo,
  type VertexData,
  type PackedAttribute,
} from "./mesh/Mesh";
export {
  QuadBatch,
  QUAD_INDICES,
  MAX_QUAD_BATCH_CAPACITY,
  quadIndices,
  type Quad,
  type QuadBatchOptions,
  type QuadBatchOwner,
} from "./mesh/QuadBatch";

// Drawing
export {
  DrawList,
  DEFAULT_DRAW_LIST_OPTIONS,
  type DrawListContext,
  type DrawListOptions,
  type DrawOptions,
} from "./draw/DrawList";
export {
  DEFAULT_CLEAR_COLOR,
  DEFAULT_CLEAR_DEPTH,
  DEFAULT_CLEAR_STENCIL,
  type ClearSettings,
  type Command,
  type ClearCommand,
  type DrawCommand,
  type FlushStats,
} from "./draw/DrawCommand";

// Geometry
export * from "./geometry";
