/**
 * Geometry generation types
 */

import type { DrawMode } from "../gl/enums";
import type { VertexFormat } from "../mesh/Mesh";

/** Coordinate as [x, y] */
export type Coord = [number, number];

/** Ring of coordinates (for polygons) */
export type Ring = Coord[];

/** CPU-side mesh, ready to be uploaded */
export interface MeshData {
  /** Interleaved vertex data */
  vertices: Float32Array;
  /** Triangle indices; absent for non-indexed meshes */
  indices?: Uint16Array | Uint32Array;
  formats: VertexFormat[];
  /** Bytes per vertex */
  stride: number;
  mode: DrawMode;
}
