import { describe, it, expect } from "vitest";
import { ShaderState } from "./ShaderState";
import { ShaderProgram } from "./ShaderProgram";
import { ResourceRegistry } from "../resources/ResourceRegistry";
import { keyEquals } from "../resources/ResourceKey";
import { StateCache } from "../state/StateCache";
import { Image } from "../texture/Image";
import { createMockGL } from "../testing/mockGL";
import { isGraphicsError } from "../errors";
import * as GL from "../gl/constants";

function setup() {
  const mock = createMockGL({
    uniforms: [
      { name: "u_scale", type: GL.GL_FLOAT },
      { name: "u_texture", type: GL.GL_SAMPLER_2D },
      { name: "u_tint", type: GL.GL_FLOAT_VEC4 },
    ],
  });
  const cache = new StateCache(mock.gl, {
    maxTextureUnits: 4,
    maxVertexAttributes: 4,
  });
  const registry = new ResourceRegistry(mock.gl, cache);
  const key = registry.createShader("vertex source", "fragment source");
  const otherKey = registry.createShader("vertex source", "fragment source");
  const state = new ShaderState(mock.gl, cache, registry.getShader(key));
  const image = new Image(
    registry,
    registry.createTexture({ width: 1, height: 1 })
  );
  mock.reset();
  return { mock, cache, registry, state, key, otherKey, image };
}

describe("ShaderState", () => {
  it("uploads only when the converted value changes", () => {
    const { mock, state } = setup();

    expect(state.setUniform("u_scale", 2)).toBe("changed");
    expect(state.setUniform("u_scale", 2)).toBe("unchanged");
    expect(state.setUniform("u_scale", 3)).toBe("changed");

    expect(mock.names()).toEqual(["useProgram", "uniform1fv", "uniform1fv"]);
    expect(state.uploads).toBe(2);
  });

  it("compares at the uniform's precision", () => {
    const { state } = setup();

    state.setUniform("u_scale", 0.1);

    expect(state.setUniform("u_scale", Math.fround(0.1))).toBe("unchanged");
  });

  it("rebinds the previous program after an upload", () => {
    const { mock, cache, registry, state, key, otherKey } = setup();
    cache.bindShader(registry.getShader(otherKey));
    mock.reset();

    state.setUniform("u_tint", [1, 1, 1, 1]);

    expect(mock.callsTo("useProgram").map((call) => call.args[0])).toEqual([
      registry.getShader(key).handle,
      registry.getShader(otherKey).handle,
    ]);
    expect(keyEquals(cache.boundShader?.key, otherKey)).toBe(true);
  });

  it("rebinds the previous program when the operation throws", () => {
    const { cache, registry, state, otherKey } = setup();
    cache.bindShader(registry.getShader(otherKey));

    expect(() =>
      state.use(() => {
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(keyEquals(cache.boundShader?.key, otherKey)).toBe(true);
  });

  it("rejects undeclared uniforms", () => {
    const { state } = setup();

    expect(() => state.setUniform("u_missing", 1)).toThrow(
      'Shader has no active uniform "u_missing"'
    );
  });

  it("assigns texture units to samplers in declaration order", () => {
    const { state } = setup();

    expect(state.samplers()).toEqual(["u_texture"]);
    expect(state.samplerUnit("u_texture")).toBe(0);
    expect(state.samplerUnit("u_scale")).toBeUndefined();
  });

  it("accepts textures only for samplers", () => {
    const { state, image } = setup();

    expect(() => state.validate("u_texture", image)).not.toThrow();
    expect(() => state.validate("u_scale", image)).toThrow(
      'Uniform "u_scale": texture value for a non-sampler uniform'
    );
  });

  it("uploads again after invalidation", () => {
    const { state } = setup();
    state.setUniform("u_scale", 2);

    state.invalidate();

    expect(state.setUniform("u_scale", 2)).toBe("changed");
  });
});

describe("ShaderProgram", () => {
  it("keeps validated defaults", () => {
    const { state, image } = setup();
    const program = new ShaderProgram(state);

    program.send("u_scale", 2).send("u_texture", image);

    expect([...program.uniformDefaults().keys()]).toEqual([
      "u_scale",
      "u_texture",
    ]);
    expect(program.uniforms().map((u) => u.name)).toEqual([
      "u_scale",
      "u_texture",
      "u_tint",
    ]);
  });

  it("rejects defaults for unknown uniforms", () => {
    const { state } = setup();
    const program = new ShaderProgram(state);

    let error: unknown;
    try {
      program.send("u_missing", 1);
    } catch (e) {
      error = e;
    }

    expect(isGraphicsError(error, "UnknownUniform")).toBe(true);
    expect(program.uniformDefaults().size).toBe(0);
  });
});
