/**
 * Image - a texture owned by the registry.
 */

import type { TextureFilter, TextureWrap } from "../resources/formats";
import type { ResourceRegistry } from "../resources/ResourceRegistry";
import type { TextureKey } from "../resources/ResourceKey";
import type { TextureInfo } from "../resources/Texture";
import type { Rect } from "../state/PipelineSettings";
import type { Texture } from "./Texture";

export class Image implements Texture {
  readonly key: TextureKey;
  private readonly registry: ResourceRegistry;

  constructor(registry: ResourceRegistry, key: TextureKey) {
    this.registry = registry;
    this.key = key;
  }

  textureKey(): TextureKey {
    return this.key;
  }

  textureInfo(): TextureInfo {
    return this.registry.getTexture(this.key).info;
  }

  get width(): number {
    return this.registry.getTexture(this.key).width;
  }

  get height(): number {
    return this.registry.getTexture(this.key).height;
  }

  /** Replace all pixels, or a sub-region */
  setData(data: ArrayBufferView, region?: Rect): void {
    this.registry.setTextureData(this.key, data, region);
  }

  setFilter(filter: Partial<TextureFilter>): void {
    this.registry.setTextureFilter(this.key, filter);
  }

  setWrap(wrap: Partial<TextureWrap>): void {
    this.registry.setTextureWrap(this.key, wrap);
  }

  destroy(): void {
    this.registry.destroyTexture(this.key);
  }
}
