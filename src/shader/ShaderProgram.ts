/**
 * ShaderProgram - registry-backed shader with per-program uniform defaults.
 */

import type { AttributeInfo, UniformInfo } from "../resources/compile";
import type { ShaderKey } from "../resources/ResourceKey";
import type { Shader, UniformValue } from "./Shader";
import type { ShaderState } from "./ShaderState";

export class ShaderProgram implements Shader {
  readonly key: ShaderKey;
  readonly state: ShaderState;

  private defaults = new Map<string, UniformValue>();

  constructor(state: ShaderState) {
    this.state = state;
    this.key = state.shader.key;
  }

  attributes(): readonly AttributeInfo[] {
    return this.state.shader.attributes;
  }

  uniforms(): readonly UniformInfo[] {
    return this.state.shader.uniforms;
  }

  /**
   * Set a default uniform value. Draws recorded afterwards start from it;
   * draws already recorded keep the value they snapshotted.
   */
  send(name: string, value: UniformValue): this {
    this.state.validate(name, value);
    this.defaults.set(name, value);
    return this;
  }

  uniformDefaults(): ReadonlyMap<string, UniformValue> {
    return this.defaults;
  }
}
