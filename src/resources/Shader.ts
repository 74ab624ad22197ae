/**
 * Linked shader program with its reflected interface.
 */

import type { BindableShader } from "../state/StateCache";
import type { AttributeInfo, UniformInfo } from "./compile";
import type { ShaderKey } from "./ResourceKey";

export class ShaderResource implements BindableShader {
  readonly gl: WebGL2RenderingContext;
  readonly key: ShaderKey;
  readonly handle: WebGLProgram;
  readonly attributes: readonly AttributeInfo[];
  readonly uniforms: readonly UniformInfo[];

  private _destroyed = false;

  constructor(
    gl: WebGL2RenderingContext,
    key: ShaderKey,
    handle: WebGLProgram,
    attributes: AttributeInfo[],
    uniforms: UniformInfo[]
  ) {
    this.gl = gl;
    this.key = key;
    this.handle = handle;
    this.attributes = attributes;
    this.uniforms = uniforms;
  }

  /** Delete the program */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteProgram(this.handle);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
