/**
 * Canvas - an offscreen render target that can also be sampled.
 *
 * Pass `canvas.framebufferKey()` as a pipeline `target` to draw into it, and
 * the canvas itself as a sampler uniform to read from it.
 */

import type { ResourceRegistry } from "../resources/ResourceRegistry";
import type { FramebufferKey, TextureKey } from "../resources/ResourceKey";
import type { TextureInfo } from "../resources/Texture";
import type { Rect } from "../state/PipelineSettings";
import type { Texture } from "./Texture";

export class Canvas implements Texture {
  readonly key: FramebufferKey;
  private readonly registry: ResourceRegistry;

  constructor(registry: ResourceRegistry, key: FramebufferKey) {
    this.registry = registry;
    this.key = key;
  }

  framebufferKey(): FramebufferKey {
    return this.key;
  }

  textureKey(): TextureKey {
    return this.registry.getFramebuffer(this.key).colorTexture;
  }

  textureInfo(): TextureInfo {
    return this.registry.getTexture(this.textureKey()).info;
  }

  get width(): number {
    return this.registry.getFramebuffer(this.key).width;
  }

  get height(): number {
    return this.registry.getFramebuffer(this.key).height;
  }

  /** Full-size viewport for drawing into this canvas */
  viewport(): Rect {
    return { x: 0, y: 0, width: this.width, height: this.height };
  }

  destroy(): void {
    this.registry.destroyFramebuffer(this.key);
  }
}
