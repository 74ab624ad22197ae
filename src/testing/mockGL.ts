/**
 * Recording WebGL2 mock for tests.
 *
 * Every call is appended to `calls` in issue order. Object-creating calls
 * return fresh objects so handles compare by identity. Typed-array arguments
 * are copied when recorded, so later writes to a shadow buffer don't rewrite
 * history.
 */

import { vi } from "vitest";
import {
  GL_ACTIVE_ATTRIBUTES,
  GL_ACTIVE_UNIFORMS,
  GL_COMPILE_STATUS,
  GL_FRAMEBUFFER_COMPLETE,
  GL_LINK_STATUS,
  GL_MAX_COMBINED_TEXTURE_IMAGE_UNITS,
  GL_MAX_VERTEX_ATTRIBS,
  GL_VERTEX_SHADER,
} from "../gl/constants";

export interface GLCall {
  name: string;
  args: unknown[];
}

export interface MockActiveAttribute {
  name: string;
  type: number;
  size?: number;
  /** Location reported by getAttribLocation; -1 for built-ins */
  location: number;
}

export interface MockActiveUniform {
  name: string;
  type: number;
  size?: number;
}

export interface MockProgramInfo {
  attributes?: MockActiveAttribute[];
  uniforms?: MockActiveUniform[];
}

export interface MockGLOptions extends MockProgramInfo {
  maxTextureUnits?: number;
  maxVertexAttributes?: number;
  /** Stage whose compilation fails */
  failCompile?: "vertex" | "fragment";
  failLink?: boolean;
  infoLog?: string;
  framebufferStatus?: number;
  /** Make the named create* call return null */
  failCreate?:
    | "createBuffer"
    | "createTexture"
    | "createFramebuffer"
    | "createRenderbuffer"
    | "createProgram"
    | "createShader";
}

export interface MockGL {
  gl: WebGL2RenderingContext;
  calls: GLCall[];
  /** Calls with the given name, in order */
  callsTo(name: string): GLCall[];
  /** Names of every recorded call, in order */
  names(): string[];
  /** Forget recorded calls */
  reset(): void;
  /** Reflection data for programs linked from now on */
  setProgramInfo(info: MockProgramInfo): void;
  setOptions(options: Partial<MockGLOptions>): void;
}

interface MockShader {
  readonly mock: "shader";
  readonly type: number;
}

function isMockShader(value: unknown): value is MockShader {
  return (
    typeof value === "object" &&
    value !== null &&
    "mock" in value &&
    value.mock === "shader"
  );
}

function snapshotArg(arg: unknown): unknown {
  if (arg instanceof Uint8Array) return arg.slice();
  if (arg instanceof Float32Array) return arg.slice();
  if (arg instanceof Int32Array) return arg.slice();
  if (arg instanceof Uint32Array) return arg.slice();
  if (arg instanceof Uint16Array) return arg.slice();
  return arg;
}

export function createMockGL(initial: MockGLOptions = {}): MockGL {
  const calls: GLCall[] = [];
  let options: MockGLOptions = { ...initial };
  let programInfo: MockProgramInfo = {
    attributes: initial.attributes ?? [],
    uniforms: initial.uniforms ?? [],
  };
  const linked = new WeakMap<object, MockProgramInfo>();
  const uniformLocations = new Map<string, object>();
  let nextId = 1;

  const record = <A extends unknown[], R>(
    name: string,
    impl: (...args: A) => R
  ) =>
    vi.fn((...args: A): R => {
      calls.push({ name, args: args.map(snapshotArg) });
      return impl(...args);
    });

  const noop = (name: string) => record(name, () => undefined);

  const creator = (
    name: NonNullable<MockGLOptions["failCreate"]>,
    kind: string
  ) =>
    record(name, (): object | null =>
      options.failCreate === name ? null : { mock: kind, id: nextId++ }
    );

  const infoFor = (program: unknown): MockProgramInfo =>
    (typeof program === "object" && program !== null && linked.get(program)) ||
    programInfo;

  const mock = {
    // Buffers
    createBuffer: creator("createBuffer", "buffer"),
    deleteBuffer: noop("deleteBuffer"),
    bindBuffer: noop("bindBuffer"),
    bufferData: noop("bufferData"),
    bufferSubData: noop("bufferSubData"),

    // Textures
    createTexture: creator("createTexture", "texture"),
    deleteTexture: noop("deleteTexture"),
    bindTexture: noop("bindTexture"),
    activeTexture: noop("activeTexture"),
    texImage2D: noop("texImage2D"),
    texSubImage2D: noop("texSubImage2D"),
    texParameteri: noop("texParameteri"),
    generateMipmap: noop("generateMipmap"),

    // Framebuffers
    createFramebuffer: creator("createFramebuffer", "framebuffer"),
    deleteFramebuffer: noop("deleteFramebuffer"),
    bindFramebuffer: noop("bindFramebuffer"),
    framebufferTexture2D: noop("framebufferTexture2D"),
    createRenderbuffer: creator("createRenderbuffer", "renderbuffer"),
    deleteRenderbuffer: noop("deleteRenderbuffer"),
    bindRenderbuffer: noop("bindRenderbuffer"),
    renderbufferStorage: noop("renderbufferStorage"),
    framebufferRenderbuffer: noop("framebufferRenderbuffer"),
    checkFramebufferStatus: record(
      "checkFramebufferStatus",
      () => options.framebufferStatus ?? GL_FRAMEBUFFER_COMPLETE
    ),

    // Shaders
    createShader: record("createShader", (type: number): MockShader | null =>
      options.failCreate === "createShader" ? null : { mock: "shader", type }
    ),
    shaderSource: noop("shaderSource"),
    compileShader: noop("compileShader"),
    getShaderParameter: record(
      "getShaderParameter",
      (shader: unknown, pname: number) => {
        if (pname !== GL_COMPILE_STATUS || !isMockShader(shader)) return null;
        const stage = shader.type === GL_VERTEX_SHADER ? "vertex" : "fragment";
        return options.failCompile !== stage;
      }
    ),
    getShaderInfoLog: record("getShaderInfoLog", () => options.infoLog ?? ""),
    deleteShader: noop("deleteShader"),
    createProgram: creator("createProgram", "program"),
    attachShader: noop("attachShader"),
    detachShader: noop("detachShader"),
    linkProgram: record("linkProgram", (program: unknown) => {
      if (typeof program === "object" && program !== null) {
        linked.set(program, programInfo);
      }
    }),
    getProgramParameter: record(
      "getProgramParameter",
      (program: unknown, pname: number) => {
        const info = infoFor(program);
        switch (pname) {
          case GL_LINK_STATUS:
            return !options.failLink;
          case GL_ACTIVE_ATTRIBUTES:
            return info.attributes?.length ?? 0;
          case GL_ACTIVE_UNIFORMS:
            return info.uniforms?.length ?? 0;
          default:
            return null;
        }
      }
    ),
    getProgramInfoLog: record("getProgramInfoLog", () => options.infoLog ?? ""),
    deleteProgram: noop("deleteProgram"),
    useProgram: noop("useProgram"),
    getActiveAttrib: record(
      "getActiveAttrib",
      (program: unknown, index: number) => {
        const attribute = infoFor(program).attributes?.[index];
        if (!attribute) return null;
        const { name, type, size } = attribute;
        return { name, type, size: size ?? 1 };
      }
    ),
    getAttribLocation: record(
      "getAttribLocation",
      (program: unknown, name: string) => {
        const attributes = infoFor(program).attributes ?? [];
        const attribute = attributes.find((a) => a.name === name);
        return attribute ? attribute.location : -1;
      }
    ),
    getActiveUniform: record(
      "getActiveUniform",
      (program: unknown, index: number) => {
        const uniform = infoFor(program).uniforms?.[index];
        if (!uniform) return null;
        const { name, type, size } = uniform;
        return { name, type, size: size ?? 1 };
      }
    ),
    getUniformLocation: record(
      "getUniformLocation",
      (_program: unknown, name: string) => {
        let location = uniformLocations.get(name);
        if (!location) {
          location = { mock: "uniform", name };
          uniformLocations.set(name, location);
        }
        return location;
      }
    ),

    // Vertex arrays and attributes
    createVertexArray: record("createVertexArray", () => ({
      mock: "vertexArray",
      id: nextId++,
    })),
    deleteVertexArray: noop("deleteVertexArray"),
    bindVertexArray: noop("bindVertexArray"),
    enableVertexAttribArray: noop("enableVertexAttribArray"),
    disableVertexAttribArray: noop("disableVertexAttribArray"),
    vertexAttribPointer: noop("vertexAttribPointer"),
    vertexAttribIPointer: noop("vertexAttribIPointer"),
    vertexAttribDivisor: noop("vertexAttribDivisor"),

    // Uniforms
    uniform1fv: noop("uniform1fv"),
    uniform2fv: noop("uniform2fv"),
    uniform3fv: noop("uniform3fv"),
    uniform4fv: noop("uniform4fv"),
    uniform1iv: noop("uniform1iv"),
    uniform2iv: noop("uniform2iv"),
    uniform3iv: noop("uniform3iv"),
    uniform4iv: noop("uniform4iv"),
    uniform1uiv: noop("uniform1uiv"),
    uniform2uiv: noop("uniform2uiv"),
    uniform3uiv: noop("uniform3uiv"),
    uniform4uiv: noop("uniform4uiv"),
    uniformMatrix2fv: noop("uniformMatrix2fv"),
    uniformMatrix3fv: noop("uniformMatrix3fv"),
    uniformMatrix4fv: noop("uniformMatrix4fv"),

    // Fixed-function state
    enable: noop("enable"),
    disable: noop("disable"),
    viewport: noop("viewport"),
    scissor: noop("scissor"),
    blendFuncSeparate: noop("blendFuncSeparate"),
    blendEquationSeparate: noop("blendEquationSeparate"),
    blendColor: noop("blendColor"),
    depthFunc: noop("depthFunc"),
    depthMask: noop("depthMask"),
    depthRange: noop("depthRange"),
    stencilFunc: noop("stencilFunc"),
    stencilOp: noop("stencilOp"),
    stencilMask: noop("stencilMask"),
    cullFace: noop("cullFace"),
    frontFace: noop("frontFace"),
    polygonOffset: noop("polygonOffset"),

    // Clearing and drawing
    clearColor: noop("clearColor"),
    clearDepth: noop("clearDepth"),
    clearStencil: noop("clearStencil"),
    clear: noop("clear"),
    drawArrays: noop("drawArrays"),
    drawElements: noop("drawElements"),
    drawArraysInstanced: noop("drawArraysInstanced"),
    drawElementsInstanced: noop("drawElementsInstanced"),

    getParameter: record("getParameter", (pname: number) => {
      switch (pname) {
        case GL_MAX_COMBINED_TEXTURE_IMAGE_UNITS:
          return options.maxTextureUnits ?? 16;
        case GL_MAX_VERTEX_ATTRIBS:
          return options.maxVertexAttributes ?? 16;
        default:
          return null;
      }
    }),
  };

  return {
    gl: mock as unknown as WebGL2RenderingContext,
    calls,
    callsTo: (name) => calls.filter((call) => call.name === name),
    names: () => calls.map((call) => call.name),
    reset: () => {
      calls.length = 0;
    },
    setProgramInfo: (info) => {
      programInfo = {
        attributes: info.attributes ?? [],
        uniforms: info.uniforms ?? [],
      };
    },
    setOptions: (next) => {
      options = { ...options, ...next };
    },
  };
}
