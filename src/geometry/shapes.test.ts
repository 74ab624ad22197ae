import { describe, it, expect } from "vitest";
import { circle, rectangle, regularPolygon, CIRCLE_SEGMENTS } from "./shapes";
import { isGraphicsError } from "../errors";

describe("rectangle", () => {
  it("emits four corners and two triangles", () => {
    const result = rectangle(1, 2, 3, 4);

    expect(Array.from(result.vertices)).toEqual([1, 2, 4, 2, 4, 6, 1, 6]);
    expect(Array.from(result.indices ?? [])).toEqual([0, 1, 2, 0, 2, 3]);
  });

  it("rejects empty sizes", () => {
    expect(() => rectangle(0, 0, 0, 1)).toThrow(
      "Rectangle width must be a positive number, got 0"
    );
  });
});

describe("regularPolygon", () => {
  it("fans triangles around the center", () => {
    const result = regularPolygon(0, 0, 1, 4);

    expect(result.vertices).toHaveLength(10); // center + 4 corners
    expect(result.vertices[2]).toBeCloseTo(1);
    expect(result.vertices[3]).toBeCloseTo(0);
    expect(result.vertices[4]).toBeCloseTo(0);
    expect(result.vertices[5]).toBeCloseTo(1);
    expect(Array.from(result.indices ?? [])).toEqual([
      0, 1, 2, 0, 2, 3, 0, 3, 4, 0, 4, 1,
    ]);
  });

  it("needs at least three sides", () => {
    let error: unknown;
    try {
      regularPolygon(0, 0, 1, 2);
    } catch (e) {
      error = e;
    }
    expect(isGraphicsError(error, "InvalidDimensions")).toBe(true);
  });
});

describe("circle", () => {
  it("uses the default segment count", () => {
    const result = circle(5, 5, 2);

    expect(result.vertices).toHaveLength((CIRCLE_SEGMENTS + 1) * 2);
    expect(result.indices).toHaveLength(CIRCLE_SEGMENTS * 3);
    expect(result.vertices[0]).toBe(5);
    expect(result.vertices[2]).toBe(7);
  });
});
