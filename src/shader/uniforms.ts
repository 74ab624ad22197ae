/**
 * Uniform type table, value conversion and upload.
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import * as GL from "../gl/constants";

export type UniformKind = "float" | "int" | "uint" | "bool" | "sampler";

export interface UniformTypeInfo {
  kind: UniformKind;
  /** Number of scalar components (16 for mat4) */
  components: number;
  /** Column count for matrix types */
  matrix?: 2 | 3 | 4;
}

/** Plain uniform data: scalars, vectors and matrices */
export type UniformData =
  | number
  | boolean
  | readonly number[]
  | readonly boolean[]
  | Float32Array
  | Int32Array
  | Uint32Array;

/** Uniform data converted to the uniform's precision */
export type UniformArray = Float32Array | Int32Array | Uint32Array;

const UNIFORM_TYPES = new Map<GLenum, UniformTypeInfo>([
  [GL.GL_FLOAT, { kind: "float", components: 1 }],
  [GL.GL_FLOAT_VEC2, { kind: "float", components: 2 }],
  [GL.GL_FLOAT_VEC3, { kind: "float", components: 3 }],
  [GL.GL_FLOAT_VEC4, { kind: "float", components: 4 }],
  [GL.GL_FLOAT_MAT2, { kind: "float", components: 4, matrix: 2 }],
  [GL.GL_FLOAT_MAT3, { kind: "float", components: 9, matrix: 3 }],
  [GL.GL_FLOAT_MAT4, { kind: "float", components: 16, matrix: 4 }],
  [GL.GL_INT, { kind: "int", components: 1 }],
  [GL.GL_INT_VEC2, { kind: "int", components: 2 }],
  [GL.GL_INT_VEC3, { kind: "int", components: 3 }],
  [GL.GL_INT_VEC4, { kind: "int", components: 4 }],
  [GL.GL_UNSIGNED_INT, { kind: "uint", components: 1 }],
  [GL.GL_UNSIGNED_INT_VEC2, { kind: "uint", components: 2 }],
  [GL.GL_UNSIGNED_INT_VEC3, { kind: "uint", components: 3 }],
  [GL.GL_UNSIGNED_INT_VEC4, { kind: "uint", components: 4 }],
  [GL.GL_BOOL, { kind: "bool", components: 1 }],
  [GL.GL_BOOL_VEC2, { kind: "bool", components: 2 }],
  [GL.GL_BOOL_VEC3, { kind: "bool", components: 3 }],
  [GL.GL_BOOL_VEC4, { kind: "bool", components: 4 }],
  [GL.GL_SAMPLER_2D, { kind: "sampler", components: 1 }],
  [GL.GL_SAMPLER_3D, { kind: "sampler", components: 1 }],
  [GL.GL_SAMPLER_CUBE, { kind: "sampler", components: 1 }],
  [GL.GL_SAMPLER_2D_SHADOW, { kind: "sampler", components: 1 }],
  [GL.GL_SAMPLER_2D_ARRAY, { kind: "sampler", components: 1 }],
  [GL.GL_INT_SAMPLER_2D, { kind: "sampler", components: 1 }],
  [GL.GL_UNSIGNED_INT_SAMPLER_2D, { kind: "sampler", components: 1 }],
]);

export function uniformTypeInfo(type: GLenum): UniformTypeInfo | undefined {
  return UNIFORM_TYPES.get(type);
}

export function isSamplerType(type: GLenum): boolean {
  return UNIFORM_TYPES.get(type)?.kind === "sampler";
}

function mismatch(name: string, message: string): GraphicsError {
  return new GraphicsError(
    ERROR_CODES.UNIFORM_TYPE_MISMATCH,
    `Uniform "${name}": ${message}`
  );
}

function toNumbers(value: UniformData): number[] {
  if (typeof value === "number") return [value];
  if (typeof value === "boolean") return [value ? 1 : 0];
  const numbers: number[] = [];
  for (const component of value) {
    if (typeof component === "boolean") {
      numbers.push(component ? 1 : 0);
    } else {
      numbers.push(component);
    }
  }
  return numbers;
}

function hasBoolean(value: UniformData): boolean {
  if (typeof value === "boolean") return true;
  if (typeof value === "number") return false;
  for (const component of value) {
    if (typeof component === "boolean") return true;
  }
  return false;
}

/**
 * Convert a value to the uniform's precision.
 *
 * @throws GraphicsError UniformTypeMismatch for a wrong component count,
 *   booleans on a non-bool uniform, fractional integers or negative unsigned
 *   values.
 */
export function convertUniform(
  name: string,
  type: GLenum,
  value: UniformData
): UniformArray {
  const info = UNIFORM_TYPES.get(type);
  if (!info) {
    throw mismatch(name, `unsupported uniform type 0x${type.toString(16)}`);
  }
  if (hasBoolean(value) && info.kind !== "bool") {
    throw mismatch(name, `boolean value for a ${info.kind} uniform`);
  }

  const numbers = toNumbers(value);
  if (numbers.length !== info.components) {
    throw mismatch(
      name,
      `expected ${info.components} components, got ${numbers.length}`
    );
  }

  switch (info.kind) {
    case "float":
      return Float32Array.from(numbers);
    case "uint":
      if (numbers.some((n) => !Number.isInteger(n) || n < 0)) {
        const list = numbers.join(", ");
        throw mismatch(name, `expected non-negative integers, got [${list}]`);
      }
      return Uint32Array.from(numbers);
    case "int":
    case "bool":
    case "sampler":
      if (numbers.some((n) => !Number.isInteger(n))) {
        throw mismatch(name, `expected integers, got [${numbers.join(", ")}]`);
      }
      return Int32Array.from(numbers);
  }
}

/** Bit-exact comparison of converted values */
export function uniformEquals(a: UniformArray, b: UniformArray): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!Object.is(a[i], b[i])) return false;
  }
  return true;
}

/** Send a converted value to the currently bound program */
export function uploadUniform(
  gl: WebGL2RenderingContext,
  location: WebGLUniformLocation,
  type: GLenum,
  data: UniformArray
): void {
  const info = UNIFORM_TYPES.get(type);
  if (!info) return;

  if (data instanceof Float32Array) {
    switch (info.matrix) {
      case 2:
        gl.uniformMatrix2fv(location, false, data);
        return;
      case 3:
        gl.uniformMatrix3fv(location, false, data);
        return;
      case 4:
        gl.uniformMatrix4fv(location, false, data);
        return;
    }
    switch (info.components) {
      case 1:
        gl.uniform1fv(location, data);
        return;
      case 2:
        gl.uniform2fv(location, data);
        return;
      case 3:
        gl.uniform3fv(location, data);
        return;
      default:
        gl.uniform4fv(location, data);
        return;
    }
  }

  if (data instanceof Uint32Array) {
    switch (info.components) {
      case 1:
        gl.uniform1uiv(location, data);
        return;
      case 2:
        gl.uniform2uiv(location, data);
        return;
      case 3:
        gl.uniform3uiv(location, data);
        return;
      default:
        gl.uniform4uiv(location, data);
        return;
    }
  }

  switch (info.components) {
    case 1:
      gl.uniform1iv(location, data);
      return;
    case 2:
      gl.uniform2iv(location, data);
      return;
    case 3:
      gl.uniform3iv(location, data);
      return;
    default:
      gl.uniform4iv(location, data);
      return;
  }
}
