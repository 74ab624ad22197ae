/**
 * Upload generated geometry into registry buffers.
 */

import type { BufferUsage } from "../gl/enums";
import type { GraphicsContext } from "../GraphicsContext";
import { IndexedMesh, VertexMesh } from "../mesh/Mesh";
import type { MeshData } from "./types";

/**
 * Create a vertex buffer (and an index buffer when the data is indexed)
 * and wrap them in a mesh.
 */
export function uploadMeshData(
  context: GraphicsContext,
  data: MeshData,
  usage: BufferUsage = "static"
): IndexedMesh | VertexMesh {
  const buffer = context.createBuffer(data.vertices, "vertex", usage);
  const vertices = { buffer, formats: data.formats, stride: data.stride };

  if (!data.indices) {
    return new VertexMesh({ ...vertices, mode: data.mode });
  }

  const indices = context.createBuffer(data.indices, "index", usage);
  const type = data.indices instanceof Uint32Array ? "u32" : "u16";
  return new IndexedMesh({
    vertices,
    indices: { buffer: indices, type },
    mode: data.mode,
  });
}
