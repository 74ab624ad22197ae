/**
 * Shader capability: a program key plus its reflected interface.
 */

import type { AttributeInfo, UniformInfo } from "../resources/compile";
import type { ShaderKey } from "../resources/ResourceKey";
import type { Texture } from "../texture/Texture";
import type { UniformData } from "./uniforms";

/** A uniform value: plain data, or a texture for sampler uniforms */
export type UniformValue = UniformData | Texture;

export interface Shader {
  readonly key: ShaderKey;
  attributes(): readonly AttributeInfo[];
  uniforms(): readonly UniformInfo[];
  /** Per-program uniform values every draw starts from */
  uniformDefaults?(): ReadonlyMap<string, UniformValue>;
}
