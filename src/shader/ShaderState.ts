/**
 * ShaderState - per-program uniform cache.
 *
 * Values are converted to the uniform's precision and compared bit for bit
 * with the last uploaded value; only differences reach the backend.
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import type { UniformInfo } from "../resources/compile";
import type { ShaderResource } from "../resources/Shader";
import type {
  BindableShader,
  StateCache,
  StateChange,
} from "../state/StateCache";
import { isTexture } from "../texture/Texture";
import type { UniformValue } from "./Shader";
import {
  convertUniform,
  isSamplerType,
  uniformEquals,
  uploadUniform,
  type UniformArray,
  type UniformData,
} from "./uniforms";

/**
 * Bind `shader`, run `op`, then rebind whatever was bound before, also when
 * `op` throws. An unknown previous binding is left alone.
 */
export function withShader<T>(
  cache: StateCache,
  shader: BindableShader,
  op: () => T
): T {
  const previous = cache.boundShader;
  cache.bindShader(shader);
  try {
    return op();
  } finally {
    if (previous !== undefined) {
      cache.bindShader(previous);
    }
  }
}

export class ShaderState {
  readonly gl: WebGL2RenderingContext;
  readonly cache: StateCache;
  readonly shader: ShaderResource;

  private byName = new Map<string, UniformInfo>();
  private samplerUnits = new Map<string, number>();
  private values = new Map<string, UniformArray>();
  private _uploads = 0;

  constructor(
    gl: WebGL2RenderingContext,
    cache: StateCache,
    shader: ShaderResource
  ) {
    this.gl = gl;
    this.cache = cache;
    this.shader = shader;

    for (const uniform of shader.uniforms) {
      this.byName.set(uniform.name, uniform);
      if (isSamplerType(uniform.type)) {
        this.samplerUnits.set(uniform.name, this.samplerUnits.size);
      }
    }
  }

  /** Number of uniform uploads issued */
  get uploads(): number {
    return this._uploads;
  }

  hasUniform(name: string): boolean {
    return this.byName.has(name);
  }

  /** @throws GraphicsError UnknownUniform */
  uniform(name: string): UniformInfo {
    const info = this.byName.get(name);
    if (!info) {
      throw new GraphicsError(
        ERROR_CODES.UNKNOWN_UNIFORM,
        `Shader has no active uniform "${name}"`
      );
    }
    return info;
  }

  /** Names of sampler uniforms, in declaration order */
  samplers(): string[] {
    return [...this.samplerUnits.keys()];
  }

  /** Texture unit assigned to a sampler uniform */
  samplerUnit(name: string): number | undefined {
    return this.samplerUnits.get(name);
  }

  /**
   * Check a value against the uniform's reflected type without uploading.
   *
   * @throws GraphicsError UnknownUniform or UniformTypeMismatch
   */
  validate(name: string, value: UniformValue): void {
    const info = this.uniform(name);
    if (isTexture(value)) {
      if (!isSamplerType(info.type)) {
        throw new GraphicsError(
          ERROR_CODES.UNIFORM_TYPE_MISMATCH,
          `Uniform "${name}": texture value for a non-sampler uniform`
        );
      }
      return;
    }
    convertUniform(name, info.type, value);
  }

  /**
   * Set a uniform, uploading only when the converted value differs from the
   * last upload. Sampler uniforms take the texture unit number.
   */
  setUniform(name: string, value: UniformData): StateChange {
    const info = this.uniform(name);
    const data = convertUniform(name, info.type, value);

    const previous = this.values.get(name);
    if (previous && uniformEquals(previous, data)) {
      return "unchanged";
    }

    const upload = () => uploadUniform(this.gl, info.location, info.type, data);
    if (this.cache.isShaderBound(this.shader.key)) {
      upload();
    } else {
      this.use(upload);
    }
    this.values.set(name, data);
    this._uploads++;
    return "changed";
  }

  /** Run `op` with this program bound, then restore the previous one */
  use<T>(op: () => T): T {
    return withShader(this.cache, this.shader, op);
  }

  /** Forget every cached value, e.g. after a context loss */
  invalidate(): void {
    this.values.clear();
  }
}
