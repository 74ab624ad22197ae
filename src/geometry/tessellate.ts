/**
 * Polygon tessellation using earcut
 */

import earcut from "earcut";
import { positionLayout } from "./layout";
import type { MeshData, Ring } from "./types";

/** Above this many vertices indices no longer fit 16 bits */
const MAX_U16_VERTICES = 65535;

/**
 * Tessellate a polygon (with optional holes) into indexed triangles.
 *
 * @param outer - Outer ring coordinates [[x,y], [x,y], ...]
 * @param holes - Optional array of hole rings
 */
export function tessellatePolygon(outer: Ring, holes: Ring[] = []): MeshData {
  // Flatten coordinates for earcut
  const coords: number[] = [];
  const holeIndices: number[] = [];

  for (const [x, y] of outer) {
    coords.push(x, y);
  }
  for (const hole of holes) {
    holeIndices.push(coords.length / 2);
    for (const [x, y] of hole) {
      coords.push(x, y);
    }
  }

  const indices = earcut(
    coords,
    holeIndices.length > 0 ? holeIndices : undefined,
    2
  );
  const wide = coords.length / 2 > MAX_U16_VERTICES;

  return {
    ...positionLayout(),
    vertices: new Float32Array(coords),
    indices: wide ? new Uint32Array(indices) : new Uint16Array(indices),
    mode: "triangles",
  };
}
