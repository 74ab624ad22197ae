import { describe, it, expect, vi, afterEach } from "vitest";
import { GraphicsContext } from "./GraphicsContext";
import { createMockGL } from "./testing/mockGL";
import { isGraphicsError } from "./errors";
import * as GL from "./gl/constants";
import { circle, uploadMeshData } from "./geometry";

function setup(maxTextureUnits = 8) {
  const mock = createMockGL({
    maxTextureUnits,
    attributes: [{ name: "a_position", type: GL.GL_FLOAT_VEC2, location: 0 }],
    uniforms: [
      { name: "u_scale", type: GL.GL_FLOAT },
      { name: "u_texture", type: GL.GL_SAMPLER_2D },
    ],
  });
  const context = new GraphicsContext({ gl: mock.gl });
  return { mock, context };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GraphicsContext", () => {
  it("queries limits and binds a vertex array", () => {
    const { mock, context } = setup(8);

    expect(context.cache.maxTextureUnits).toBe(8);
    expect(context.cache.maxVertexAttributes).toBe(16);
    expect(mock.names()).toEqual([
      "getParameter",
      "getParameter",
      "createVertexArray",
      "bindVertexArray",
    ]);
  });

  it("prefers explicit limits", () => {
    const mock = createMockGL();
    const context = new GraphicsContext({
      gl: mock.gl,
      maxTextureUnits: 2,
      maxVertexAttributes: 3,
    });

    expect(context.cache.maxTextureUnits).toBe(2);
    expect(mock.callsTo("getParameter")).toHaveLength(0);
  });

  it("binds textures for immediate sampler uniforms", () => {
    const { mock, context } = setup();
    const shader = context.createShader("vertex source", "fragment source");
    const image = context.createImage({ width: 2, height: 2 });
    mock.reset();

    expect(context.setUniform(shader, "u_texture", image)).toBe("changed");
    expect(context.setUniform(shader, "u_texture", image)).toBe("unchanged");
    expect(mock.callsTo("uniform1iv").map((call) => call.args[1])).toEqual([
      Int32Array.from([0]),
    ]);
  });

  it("rejects textures for other uniforms", () => {
    const { context } = setup();
    const shader = context.createShader("vertex source", "fragment source");
    const image = context.createImage({ width: 2, height: 2 });

    expect(() => context.setUniform(shader, "u_scale", image)).toThrow(
      'Uniform "u_scale": texture value for a non-sampler uniform'
    );
  });

  it("re-uploads uniforms after invalidating state", () => {
    const { context } = setup();
    const shader = context.createShader("vertex source", "fragment source");
    context.setUniform(shader, "u_scale", 1);

    context.invalidateState();

    expect(context.setUniform(shader, "u_scale", 1)).toBe("changed");
  });

  it("draws generated geometry on present", () => {
    const { mock, context } = setup();
    const shader = context.createShader("vertex source", "fragment source");
    const image = context.createImage({ width: 2, height: 2 });
    const mesh = uploadMeshData(context, circle(0, 0, 1, 8));
    mock.reset();

    context.clear({ color: [0, 0, 0, 1] });
    context.draw(
      shader,
      mesh,
      { blend: null },
      { uniforms: { u_scale: 2, u_texture: image } }
    );
    const stats = context.present();

    expect(stats).toMatchObject({ commands: 2, draws: 1, clears: 1 });
    expect(mock.callsTo("drawElements")[0]?.args).toEqual([
      GL.GL_TRIANGLES,
      24,
      GL.GL_UNSIGNED_SHORT,
      0,
    ]);
  });

  it("rejects draws with destroyed shaders", () => {
    const { context } = setup();
    const shader = context.createShader("vertex source", "fragment source");
    const mesh = uploadMeshData(context, circle(0, 0, 1));

    context.destroyShader(shader);

    expect(
      isGraphicsError(
        captureError(() => context.draw(shader, mesh)),
        "StaleHandle"
      )
    ).toBe(true);
  });

  it("releases everything on destroy and refuses further use", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { mock, context } = setup();
    context.createShader("vertex source", "fragment source");
    context.createBuffer(16, "vertex");

    context.destroy();
    context.destroy();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(context.registry.liveCount()).toBe(0);
    expect(mock.callsTo("deleteVertexArray")).toHaveLength(1);
    expect(context.destroyed).toBe(true);
    expect(
      isGraphicsError(
        captureError(() => context.createBuffer(4, "vertex")),
        "ContextDestroyed"
      )
    ).toBe(true);
  });
});
