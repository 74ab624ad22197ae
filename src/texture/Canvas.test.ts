import { describe, it, expect } from "vitest";
import { GraphicsContext } from "../GraphicsContext";
import { createMockGL } from "../testing/mockGL";
import { isGraphicsError } from "../errors";
import * as GL from "../gl/constants";
import { isTexture } from "./Texture";

function createContext() {
  const mock = createMockGL();
  return { mock, context: new GraphicsContext({ gl: mock.gl }) };
}

describe("Canvas", () => {
  it("is both a target and a texture", () => {
    const { context } = createContext();

    const canvas = context.createCanvas({ width: 8, height: 4, depth: true });

    expect(isTexture(canvas)).toBe(true);
    expect(canvas.viewport()).toEqual({ x: 0, y: 0, width: 8, height: 4 });
    expect(canvas.textureInfo().width).toBe(8);
    const framebuffer = context.registry.getFramebuffer(canvas.key);
    expect(canvas.textureKey()).toEqual(framebuffer.colorTexture);
  });

  it("binds its framebuffer when used as a target", () => {
    const { mock, context } = createContext();
    const canvas = context.createCanvas({ width: 8, height: 4 });
    mock.reset();

    context.clear({ target: canvas.framebufferKey() });
    context.flush();

    expect(mock.callsTo("bindFramebuffer").map((call) => call.args)).toEqual([
      [GL.GL_FRAMEBUFFER, context.registry.getFramebuffer(canvas.key).handle],
    ]);
  });

  it("releases its color texture when destroyed", () => {
    const { context } = createContext();
    const canvas = context.createCanvas({ width: 8, height: 4 });

    context.destroyCanvas(canvas);

    let error: unknown;
    try {
      canvas.textureKey();
    } catch (e) {
      error = e;
    }
    expect(isGraphicsError(error, "StaleHandle")).toBe(true);
    expect(context.registry.liveCount()).toBe(0);
  });
});
