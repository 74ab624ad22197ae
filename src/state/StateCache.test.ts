import { describe, it, expect } from "vitest";
import {
  StateCache,
  type BindableBuffer,
  type BindableShader,
  type BindableTexture,
} from "./StateCache";
import { DEFAULT_DEPTH_STATE, DEFAULT_STENCIL_STATE } from "./PipelineSettings";
import { blendStateForMode } from "./blendMode";
import { createKey } from "../resources/ResourceKey";
import { createMockGL } from "../testing/mockGL";
import {
  GL_ARRAY_BUFFER,
  GL_BLEND,
  GL_DEPTH_TEST,
  GL_FLOAT,
  GL_GREATER,
  GL_INT,
  GL_POLYGON_OFFSET_FILL,
  GL_SCISSOR_TEST,
  GL_TEXTURE0,
  GL_TEXTURE_2D,
} from "../gl/constants";

function createCache(maxVertexAttributes = 4) {
  const mock = createMockGL();
  const cache = new StateCache(mock.gl, {
    maxTextureUnits: 8,
    maxVertexAttributes,
  });
  return { mock, cache };
}

function shader(index: number, generation = 0): BindableShader {
  return { key: createKey("shader", index, generation), handle: {} };
}

function texture(index: number, generation = 0): BindableTexture {
  return { key: createKey("texture", index, generation), handle: {} };
}

function buffer(index: number, generation = 0): BindableBuffer {
  return { key: createKey("buffer", index, generation), handle: {} };
}

describe("StateCache", () => {
  describe("bindShader", () => {
    it("only issues the first of repeated binds", () => {
      const { mock, cache } = createCache();
      const s = shader(0);

      expect(cache.bindShader(s)).toBe("changed");
      expect(cache.bindShader(s)).toBe("unchanged");
      expect(cache.bindShader(s)).toBe("unchanged");

      expect(mock.callsTo("useProgram")).toHaveLength(1);
      expect(cache.isShaderBound(s.key)).toBe(true);
    });

    it("treats a reused slot with a new generation as a different shader", () => {
      const { mock, cache } = createCache();

      cache.bindShader(shader(0, 0));
      expect(cache.bindShader(shader(0, 1))).toBe("changed");
      expect(mock.callsTo("useProgram")).toHaveLength(2);
    });

    it("rebinds after invalidate", () => {
      const { mock, cache } = createCache();
      const s = shader(0);

      cache.bindShader(s);
      cache.invalidate();
      expect(cache.bindShader(s)).toBe("changed");
      expect(mock.callsTo("useProgram")).toHaveLength(2);
    });
  });

  describe("bindTexture", () => {
    it("selects the unit and binds", () => {
      const { mock, cache } = createCache();
      const t = texture(1);

      cache.bindTexture(3, t);

      expect(mock.calls).toEqual([
        { name: "activeTexture", args: [GL_TEXTURE0 + 3] },
        { name: "bindTexture", args: [GL_TEXTURE_2D, t.handle] },
      ]);
    });

    it("caches the active unit across binds", () => {
      const { mock, cache } = createCache();

      cache.bindTexture(0, texture(0));
      cache.bindTexture(0, texture(1));

      expect(mock.callsTo("activeTexture")).toHaveLength(1);
      expect(mock.callsTo("bindTexture")).toHaveLength(2);
    });

    it("elides binding the same texture to the same unit", () => {
      const { cache } = createCache();

      cache.bindTexture(2, texture(5));
      expect(cache.bindTexture(2, texture(5))).toBe("unchanged");
      expect(cache.bindTexture(2, null)).toBe("changed");
      expect(cache.bindTexture(2, null)).toBe("unchanged");
    });

    it("rejects units outside the range", () => {
      const { cache } = createCache();

      expect(() => cache.bindTexture(8, texture(0))).toThrow(
        "Texture unit 8 out of range 0..7"
      );
      expect(() => cache.bindTexture(-1, null)).toThrow(/out of range/);
    });
  });

  describe("bindBuffer", () => {
    it("tracks each slot separately", () => {
      const { mock, cache } = createCache();
      const b = buffer(0);

      expect(cache.bindBuffer("vertex", b)).toBe("changed");
      expect(cache.bindBuffer("index", b)).toBe("changed");
      expect(cache.bindBuffer("vertex", b)).toBe("unchanged");

      expect(mock.callsTo("bindBuffer")[0]?.args).toEqual([
        GL_ARRAY_BUFFER,
        b.handle,
      ]);
      expect(mock.callsTo("bindBuffer")).toHaveLength(2);
    });
  });

  describe("setBlend", () => {
    it("enables blending and sets every sub-field once", () => {
      const { mock, cache } = createCache();
      const state = blendStateForMode("normal");

      expect(cache.setBlend(state)).toBe("changed");
      expect(mock.names()).toEqual([
        "enable",
        "blendFuncSeparate",
        "blendEquationSeparate",
        "blendColor",
      ]);
      expect(mock.calls[0]?.args).toEqual([GL_BLEND]);

      mock.reset();
      expect(cache.setBlend({ ...state })).toBe("unchanged");
      expect(mock.calls).toHaveLength(0);
    });

    it("only re-sends the sub-field that changed", () => {
      const { mock, cache } = createCache();
      const state = blendStateForMode("normal");
      cache.setBlend(state);
      mock.reset();

      cache.setBlend({ ...state, equationRGB: "max" });

      expect(mock.names()).toEqual(["blendEquationSeparate"]);
    });

    it("disables once for null", () => {
      const { mock, cache } = createCache();

      expect(cache.setBlend(null)).toBe("changed");
      expect(cache.setBlend(null)).toBe("unchanged");
      expect(mock.calls).toEqual([{ name: "disable", args: [GL_BLEND] }]);
    });
  });

  describe("setDepth", () => {
    it("only issues depthFunc when the function alone changes", () => {
      const { mock, cache } = createCache();
      cache.setDepth(DEFAULT_DEPTH_STATE);
      mock.reset();

      cache.setDepth({ ...DEFAULT_DEPTH_STATE, func: "greater" });

      expect(mock.calls).toEqual([{ name: "depthFunc", args: [GL_GREATER] }]);
    });

    it("clamps the depth range", () => {
      const { mock, cache } = createCache();

      cache.setDepth({ ...DEFAULT_DEPTH_STATE, range: [-1, 2] });

      expect(mock.callsTo("depthRange")[0]?.args).toEqual([0, 1]);
    });

    it("shares the write mask with setDepthWriteMask", () => {
      const { mock, cache } = createCache();
      cache.setDepth(DEFAULT_DEPTH_STATE);

      expect(cache.setDepthWriteMask(true)).toBe("unchanged");
      expect(cache.setDepthWriteMask(false)).toBe("changed");
      expect(mock.callsTo("depthMask").map((c) => c.args)).toEqual([
        [true],
        [false],
      ]);
    });

    it("disables the depth test for null", () => {
      const { mock, cache } = createCache();

      cache.setDepth(null);

      expect(mock.calls).toEqual([{ name: "disable", args: [GL_DEPTH_TEST] }]);
    });
  });

  describe("setStencil", () => {
    it("only issues the stencil reference change", () => {
      const { mock, cache } = createCache();
      cache.setStencil(DEFAULT_STENCIL_STATE);
      mock.reset();

      cache.setStencil({ ...DEFAULT_STENCIL_STATE, ref: 1 });

      expect(mock.names()).toEqual(["stencilFunc"]);
    });
  });

  describe("setScissor", () => {
    it("enables with a box, then disables for null", () => {
      const { mock, cache } = createCache();
      const box = { x: 1, y: 2, width: 3, height: 4 };

      cache.setScissor(box);
      cache.setScissor(box);
      cache.setScissor(null);

      expect(mock.calls).toEqual([
        { name: "enable", args: [GL_SCISSOR_TEST] },
        { name: "scissor", args: [1, 2, 3, 4] },
        { name: "disable", args: [GL_SCISSOR_TEST] },
      ]);
    });

    it("keeps the box when re-enabling", () => {
      const { mock, cache } = createCache();
      const box = { x: 0, y: 0, width: 8, height: 8 };
      cache.setScissor(box);
      cache.setScissor(null);
      mock.reset();

      cache.setScissor(box);

      expect(mock.names()).toEqual(["enable"]);
    });

    it("rejects zero-sized boxes", () => {
      const { cache } = createCache();

      const empty = { x: 0, y: 0, width: 0, height: 4 };
      expect(() => cache.setScissor(empty)).toThrow(
        "scissor size must be positive, got 0x4"
      );
    });
  });

  describe("setViewport", () => {
    it("elides identical viewports", () => {
      const { mock, cache } = createCache();

      cache.setViewport({ x: 0, y: 0, width: 10, height: 10 });
      cache.setViewport({ x: 0, y: 0, width: 10, height: 10 });

      expect(mock.callsTo("viewport")).toHaveLength(1);
    });
  });

  describe("setCulling", () => {
    it("sets face and winding", () => {
      const { mock, cache } = createCache();

      cache.setCulling({ face: "back", winding: "ccw" });
      mock.reset();
      cache.setCulling({ face: "front", winding: "ccw" });

      expect(mock.names()).toEqual(["cullFace"]);
    });
  });

  describe("setPolygonOffset", () => {
    it("enables the offset once and only resends changed values", () => {
      const { mock, cache } = createCache();

      expect(cache.setPolygonOffset({ factor: 1, units: 2 })).toBe("changed");
      expect(mock.calls).toEqual([
        { name: "enable", args: [GL_POLYGON_OFFSET_FILL] },
        { name: "polygonOffset", args: [1, 2] },
      ]);

      mock.reset();
      expect(cache.setPolygonOffset({ factor: 1, units: 2 })).toBe("unchanged");
      expect(cache.setPolygonOffset({ factor: 1, units: 4 })).toBe("changed");
      expect(mock.names()).toEqual(["polygonOffset"]);
      expect(cache.stats.byAxis.polygonOffset).toEqual({
        changed: 2,
        unchanged: 1,
      });
    });

    it("disables with null and keeps the last values", () => {
      const { mock, cache } = createCache();
      cache.setPolygonOffset({ factor: 1, units: 2 });
      mock.reset();

      cache.setPolygonOffset(null);
      cache.setPolygonOffset(null);
      cache.setPolygonOffset({ factor: 1, units: 2 });

      expect(mock.calls).toEqual([
        { name: "disable", args: [GL_POLYGON_OFFSET_FILL] },
        { name: "enable", args: [GL_POLYGON_OFFSET_FILL] },
      ]);
      expect(cache.snapshot().polygonOffset).toEqual({ factor: 1, units: 2 });
    });
  });

  describe("setVertexAttributes", () => {
    const binding = (location: number, b: BindableBuffer, offset = 0) => ({
      location,
      buffer: b,
      size: 2,
      type: GL_FLOAT,
      normalized: false,
      stride: 8,
      offset,
      integer: false,
      divisor: 0,
    });

    it("enables wanted locations and disables the rest", () => {
      const { mock, cache } = createCache(3);
      const b = buffer(0);

      cache.setVertexAttributes([binding(1, b)]);

      expect(mock.names()).toEqual([
        "disableVertexAttribArray",
        "enableVertexAttribArray",
        "bindBuffer",
        "vertexAttribPointer",
        "vertexAttribDivisor",
        "disableVertexAttribArray",
      ]);
      expect(mock.callsTo("vertexAttribPointer")[0]?.args).toEqual([
        1,
        2,
        GL_FLOAT,
        false,
        8,
        0,
      ]);
    });

    it("issues nothing for an identical layout", () => {
      const { mock, cache } = createCache(3);
      const b = buffer(0);
      cache.setVertexAttributes([binding(0, b)]);
      mock.reset();

      expect(cache.setVertexAttributes([binding(0, b)])).toBe("unchanged");
      expect(mock.calls).toHaveLength(0);
    });

    it("re-points a location whose offset changed", () => {
      const { mock, cache } = createCache(1);
      const b = buffer(0);
      cache.setVertexAttributes([binding(0, b)]);
      mock.reset();

      cache.setVertexAttributes([binding(0, b, 4)]);

      expect(mock.names()).toEqual(["vertexAttribPointer"]);
    });

    it("uses integer pointers for integer attributes", () => {
      const { mock, cache } = createCache(1);

      cache.setVertexAttributes([
        { ...binding(0, buffer(0)), type: GL_INT, integer: true },
      ]);

      expect(mock.callsTo("vertexAttribIPointer")[0]?.args).toEqual([
        0,
        2,
        GL_INT,
        8,
        0,
      ]);
      expect(mock.callsTo("vertexAttribPointer")).toHaveLength(0);
    });

    it("rejects locations past the limit", () => {
      const { cache } = createCache(2);

      expect(() => cache.setVertexAttributes([binding(2, buffer(0))])).toThrow(
        "Vertex attribute location 2 out of range 0..1"
      );
    });
  });

  describe("forget", () => {
    it("unbinds a destroyed buffer and drops pointers into it", () => {
      const { cache } = createCache(1);
      const b = buffer(0);
      cache.setVertexAttributes([
        {
          location: 0,
          buffer: b,
          size: 2,
          type: GL_FLOAT,
          normalized: false,
          stride: 8,
          offset: 0,
          integer: false,
          divisor: 0,
        },
      ]);

      cache.forget(b.key);

      const snapshot = cache.snapshot();
      expect(snapshot.buffers.vertex).toBeNull();
      expect(snapshot.attributePointers[0]).toBeUndefined();
    });

    it("marks a destroyed bound shader unknown", () => {
      const { cache } = createCache();
      const s = shader(0);
      cache.bindShader(s);

      cache.forget(s.key);

      expect(cache.snapshot().shader).toBeUndefined();
      expect(cache.isShaderBound(s.key)).toBe(false);
    });

    it("unbinds a destroyed texture from every unit", () => {
      const { cache } = createCache();
      const t = texture(0);
      cache.bindTexture(0, t);
      cache.bindTexture(4, t);

      cache.forget(t.key);

      const { textures } = cache.snapshot();
      expect(textures[0]).toBeNull();
      expect(textures[4]).toBeNull();
    });
  });

  describe("clear values", () => {
    it("elides repeated clear values", () => {
      const { mock, cache } = createCache();

      cache.setClearColor([0, 0, 0, 1]);
      cache.setClearColor([0, 0, 0, 1]);
      cache.setClearDepth(1);
      cache.setClearDepth(1);
      cache.setClearStencil(0);

      expect(mock.names()).toEqual([
        "clearColor",
        "clearDepth",
        "clearStencil",
      ]);
    });
  });

  describe("stats", () => {
    it("counts changed and unchanged calls per axis", () => {
      const { cache } = createCache();
      const s = shader(0);

      cache.bindShader(s);
      cache.bindShader(s);
      cache.setBlend(null);

      expect(cache.stats.changed).toBe(2);
      expect(cache.stats.unchanged).toBe(1);
      expect(cache.stats.byAxis.shader).toEqual({ changed: 1, unchanged: 1 });

      cache.resetStats();
      expect(cache.stats.changed).toBe(0);
    });
  });
});
