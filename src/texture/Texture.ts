/**
 * Texture capability: anything that resolves to a registry texture.
 */

import type { TextureInfo } from "../resources/Texture";
import type { TextureKey } from "../resources/ResourceKey";

export interface Texture {
  textureKey(): TextureKey;
  textureInfo(): TextureInfo;
}

export function isTexture(value: unknown): value is Texture {
  return (
    typeof value === "object" &&
    value !== null &&
    "textureKey" in value &&
    typeof value.textureKey === "function" &&
    "textureInfo" in value &&
    typeof value.textureInfo === "function"
  );
}
