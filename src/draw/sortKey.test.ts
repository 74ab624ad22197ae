import { describe, it, expect } from "vitest";
import {
  compareDrawSortKeys,
  drawSortKeyToString,
  reorderCommands,
} from "./sortKey";
import type { Command, DrawCommand } from "./DrawCommand";
import { createKey } from "../resources/ResourceKey";
import type { PipelineSettings } from "../state/PipelineSettings";

const vertices = createKey("buffer", 0, 0);

function draw(
  shaderIndex: number,
  settings: PipelineSettings = { blend: null },
  reorderSafe = true
): DrawCommand {
  return {
    kind: "draw",
    shader: createKey("shader", shaderIndex, 0),
    uniforms: new Map(),
    attributes: [{ buffer: vertices, formats: [], step: 0, stride: 8 }],
    drawInfo: { mode: "triangles", instanceCount: 1 },
    settings,
    reorderSafe,
    reservation: null,
  };
}

function shaders(commands: readonly Command[]): (number | string)[] {
  return commands.map((command) =>
    command.kind === "draw" ? command.shader.index : command.kind
  );
}

describe("compareDrawSortKeys", () => {
  it("orders by shader, then texture, then vertex buffer", () => {
    const shader = createKey("shader", 1, 0);
    const texture = createKey("texture", 0, 0);

    expect(
      compareDrawSortKeys(
        { shader, texture: null, vertexBuffer: vertices },
        { shader, texture, vertexBuffer: vertices }
      )
    ).toBeLessThan(0);
    expect(
      compareDrawSortKeys(
        {
          shader: createKey("shader", 2, 0),
          texture: null,
          vertexBuffer: null,
        },
        { shader, texture, vertexBuffer: vertices }
      )
    ).toBeGreaterThan(0);
  });

  it("formats keys for logs", () => {
    expect(
      drawSortKeyToString({
        shader: createKey("shader", 1, 0),
        texture: null,
        vertexBuffer: vertices,
      })
    ).toBe("shader#1@0|-|buffer#0@0");
  });
});

describe("reorderCommands", () => {
  it("sorts a run of safe opaque draws stably", () => {
    const first = draw(2);
    const second = draw(1);
    const third = draw(2);

    const ordered = reorderCommands([first, second, third]);

    expect(ordered).toEqual([second, first, third]);
    expect(ordered[1]).toBe(first);
  });

  it("does not move draws across a clear or a settings change", () => {
    const clear: Command = {
      kind: "clear",
      color: [0, 0, 0, 0],
      depth: 1,
      stencil: 0,
      settings: {},
    };
    const viewport = { x: 0, y: 0, width: 4, height: 4 };

    const ordered = reorderCommands([
      draw(3),
      draw(1),
      clear,
      draw(2, { blend: null, viewport }),
      draw(1),
    ]);

    expect(shaders(ordered)).toEqual([1, 3, "clear", 2, 1]);
  });

  it("keeps unsafe and blended draws in place", () => {
    const ordered = reorderCommands([
      draw(2, { blend: null }, false),
      draw(1),
      draw(3, {}),
    ]);

    expect(shaders(ordered)).toEqual([2, 1, 3]);
  });
});
