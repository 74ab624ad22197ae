/**
 * Recorded draw list commands.
 *
 * Commands are plain snapshots: keys, converted uniform values and merged
 * settings. Nothing in a command refers to a backend object.
 */

import type { AttachedAttributes, MeshDrawInfo } from "../mesh/Mesh";
import type {
  BufferKey,
  FramebufferKey,
  ShaderKey,
  TextureKey,
} from "../resources/ResourceKey";
import type { UniformArray } from "../shader/uniforms";
import type { Color, PipelineSettings, Rect } from "../state/PipelineSettings";

export type RecordedUniform =
  | { readonly kind: "data"; readonly data: UniformArray }
  | { readonly kind: "texture"; readonly texture: TextureKey };

/** Byte range a recorded draw keeps alive in a buffer */
export interface BufferReservation {
  readonly buffer: BufferKey;
  readonly endByte: number;
}

export interface ClearSettings {
  /** Default: transparent black; null skips the color buffer */
  color?: Color | null;
  /** Default: 1; null skips the depth buffer */
  depth?: number | null;
  /** Default: 0; null skips the stencil buffer */
  stencil?: number | null;
  /** Default: the list's default target, else the backbuffer */
  target?: FramebufferKey | null;
  /** Default: the list's default scissor, else none */
  scissor?: Rect | null;
}

export const DEFAULT_CLEAR_COLOR: Color = [0, 0, 0, 0];
export const DEFAULT_CLEAR_DEPTH = 1;
export const DEFAULT_CLEAR_STENCIL = 0;

export interface ClearCommand {
  readonly kind: "clear";
  readonly color: Color | null;
  readonly depth: number | null;
  readonly stencil: number | null;
  /** Only target and scissor apply to clears */
  readonly settings: PipelineSettings;
}

export interface DrawCommand {
  readonly kind: "draw";
  readonly shader: ShaderKey;
  readonly uniforms: ReadonlyMap<string, RecordedUniform>;
  readonly attributes: readonly AttachedAttributes[];
  readonly drawInfo: MeshDrawInfo;
  readonly settings: PipelineSettings;
  readonly reorderSafe: boolean;
  readonly reservation: BufferReservation | null;
}

export type Command = ClearCommand | DrawCommand;

export interface FlushStats {
  commands: number;
  draws: number;
  clears: number;
  /** Cache calls that reached the backend */
  stateChanges: number;
  /** Cache calls elided as redundant */
  elidedChanges: number;
  uniformUploads: number;
}
