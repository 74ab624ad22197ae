/**
 * Shape Geometry Generators
 *
 * 2D positions for simple filled shapes, as indexed triangles.
 */

import { assertPositive, ERROR_CODES, GraphicsError } from "../errors";
import { positionLayout } from "./layout";
import type { MeshData } from "./types";

/** Number of segments for circle approximation */
export const CIRCLE_SEGMENTS = 32;

/**
 * Axis-aligned rectangle with its corner at (x, y).
 * Vertices run counter-clockwise from the corner.
 */
export function rectangle(
  x: number,
  y: number,
  width: number,
  height: number
): MeshData {
  assertPositive(width, "Rectangle width");
  assertPositive(height, "Rectangle height");

  return {
    ...positionLayout(),
    vertices: new Float32Array([
      x, y,
      x + width, y,
      x + width, y + height,
      x, y + height,
    ]),
    indices: new Uint16Array([
      0, 1, 2,
      0, 2, 3,
    ]),
    mode: "triangles",
  };
}

/**
 * Regular polygon as a triangle fan around its center. The first corner
 * lies on the positive x axis.
 */
export function regularPolygon(
  cx: number,
  cy: number,
  radius: number,
  sides: number
): MeshData {
  assertPositive(radius, "Polygon radius");
  if (!Number.isInteger(sides) || sides < 3) {
    throw new GraphicsError(
      ERROR_CODES.INVALID_DIMENSIONS,
      `Polygon needs an integer number of sides >= 3, got ${sides}`
    );
  }

  const vertices: number[] = [cx, cy]; // Center point
  const indices: number[] = [];

  for (let i = 0; i < sides; i++) {
    const angle = (i / sides) * Math.PI * 2;
    vertices.push(cx + Math.cos(angle) * radius, cy + Math.sin(angle) * radius);
  }
  for (let i = 1; i <= sides; i++) {
    indices.push(0, i, (i % sides) + 1);
  }

  return {
    ...positionLayout(),
    vertices: new Float32Array(vertices),
    indices:
      sides + 1 > 65535 ? new Uint32Array(indices) : new Uint16Array(indices),
    mode: "triangles",
  };
}

export function circle(
  cx: number,
  cy: number,
  radius: number,
  segments: number = CIRCLE_SEGMENTS
): MeshData {
  return regularPolygon(cx, cy, radius, segments);
}
