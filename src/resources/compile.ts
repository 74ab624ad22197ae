/**
 * Shader compilation, linking and reflection
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import * as GL from "../gl/constants";

export type ShaderStage = "vertex" | "fragment";

export interface AttributeInfo {
  name: string;
  location: number;
  /** GL type of the attribute (FLOAT_VEC2, ...) */
  type: GLenum;
  size: number;
}

export interface UniformInfo {
  /** Array elements are listed individually as `name[i]` */
  name: string;
  location: WebGLUniformLocation;
  /** GL type of one element */
  type: GLenum;
}

/** Compile a shader from source */
export function compileShader(
  gl: WebGL2RenderingContext,
  stage: ShaderStage,
  source: string
): WebGLShader {
  const shader = gl.createShader(
    stage === "vertex" ? GL.GL_VERTEX_SHADER : GL.GL_FRAGMENT_SHADER
  );
  if (!shader) {
    throw new GraphicsError(
      ERROR_CODES.RESOURCE_CREATION,
      `Failed to create ${stage} shader`
    );
  }

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, GL.GL_COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader) ?? "";
    gl.deleteShader(shader);
    throw new GraphicsError(
      ERROR_CODES.COMPILE_ERROR,
      `${stage} shader compilation failed: ${log}`
    );
  }

  return shader;
}

/** Create and link a shader program */
export function createProgram(
  gl: WebGL2RenderingContext,
  vertexSource: string,
  fragmentSource: string
): WebGLProgram {
  const vs = compileShader(gl, "vertex", vertexSource);
  let fs: WebGLShader;
  try {
    fs = compileShader(gl, "fragment", fragmentSource);
  } catch (error) {
    gl.deleteShader(vs);
    throw error;
  }

  const program = gl.createProgram();
  if (!program) {
    gl.deleteShader(vs);
    gl.deleteShader(fs);
    throw new GraphicsError(
      ERROR_CODES.RESOURCE_CREATION,
      "Failed to create program"
    );
  }

  gl.attachShader(program, vs);
  gl.attachShader(program, fs);
  gl.linkProgram(program);

  // Shaders are linked into the program now (or the link failed)
  gl.detachShader(program, vs);
  gl.detachShader(program, fs);
  gl.deleteShader(vs);
  gl.deleteShader(fs);

  if (!gl.getProgramParameter(program, GL.GL_LINK_STATUS)) {
    const log = gl.getProgramInfoLog(program) ?? "";
    gl.deleteProgram(program);
    throw new GraphicsError(
      ERROR_CODES.LINK_ERROR,
      `Program linking failed: ${log}`
    );
  }

  return program;
}

/**
 * Active vertex attributes sorted by location; built-ins without a location
 * are skipped
 */
export function reflectAttributes(
  gl: WebGL2RenderingContext,
  program: WebGLProgram
): AttributeInfo[] {
  const count: unknown = gl.getProgramParameter(
    program,
    GL.GL_ACTIVE_ATTRIBUTES
  );
  const attributes: AttributeInfo[] = [];

  for (let i = 0; i < (typeof count === "number" ? count : 0); i++) {
    const info = gl.getActiveAttrib(program, i);
    if (!info) continue;
    const location = gl.getAttribLocation(program, info.name);
    if (location < 0) continue;
    attributes.push({
      name: info.name,
      location,
      type: info.type,
      size: info.size,
    });
  }

  return attributes.sort((a, b) => a.location - b.location);
}

/**
 * Active uniforms in declaration order. Arrays are expanded to one entry per
 * element; a single-element `[0]` suffix is stripped.
 */
export function reflectUniforms(
  gl: WebGL2RenderingContext,
  program: WebGLProgram
): UniformInfo[] {
  const count: unknown = gl.getProgramParameter(program, GL.GL_ACTIVE_UNIFORMS);
  const uniforms: UniformInfo[] = [];

  for (let i = 0; i < (typeof count === "number" ? count : 0); i++) {
    const info = gl.getActiveUniform(program, i);
    if (!info) continue;

    const isArray = info.name.endsWith("[0]");
    const base = isArray ? info.name.slice(0, -3) : info.name;
    const names =
      isArray && info.size > 1
        ? Array.from(
            { length: info.size },
            (_, element) => `${base}[${element}]`
          )
        : [base];

    for (const name of names) {
      // Uniform block members have no location
      const location = gl.getUniformLocation(program, name);
      if (!location) continue;
      uniforms.push({ name, location, type: info.type });
    }
  }

  return uniforms;
}
