import { packFormats, type VertexFormat } from "../mesh/Mesh";

/** Attribute name generated geometry writes positions to */
export const POSITION_ATTRIBUTE = "a_position";

/** One 2D float position per vertex */
export function positionLayout(): { formats: VertexFormat[]; stride: number } {
  return packFormats([{ name: POSITION_ATTRIBUTE, size: 2 }]);
}
