/**
 * Geometry generation utilities
 */

export * from "./types";
export { POSITION_ATTRIBUTE } from "./layout";
export { tessellatePolygon } from "./tessellate";
export { rectangle, regularPolygon, circle, CIRCLE_SEGMENTS } from "./shapes";
export { uploadMeshData } from "./upload";
