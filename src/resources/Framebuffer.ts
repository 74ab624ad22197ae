/**
 * Offscreen render target. The color attachment is a registry texture.
 */

import type { BindableFramebuffer } from "../state/StateCache";
import type { FramebufferKey, TextureKey } from "./ResourceKey";

export class FramebufferResource implements BindableFramebuffer {
  readonly gl: WebGL2RenderingContext;
  readonly key: FramebufferKey;
  readonly handle: WebGLFramebuffer;
  readonly colorTexture: TextureKey;
  /** Depth (and stencil) attachment, if any */
  readonly renderbuffer: WebGLRenderbuffer | null;
  readonly width: number;
  readonly height: number;

  private _destroyed = false;

  constructor(
    gl: WebGL2RenderingContext,
    key: FramebufferKey,
    handle: WebGLFramebuffer,
    colorTexture: TextureKey,
    renderbuffer: WebGLRenderbuffer | null,
    width: number,
    height: number
  ) {
    this.gl = gl;
    this.key = key;
    this.handle = handle;
    this.colorTexture = colorTexture;
    this.renderbuffer = renderbuffer;
    this.width = width;
    this.height = height;
  }

  /**
   * Delete the framebuffer and its renderbuffer. The color texture belongs
   * to the registry.
   */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteFramebuffer(this.handle);
    if (this.renderbuffer) {
      this.gl.deleteRenderbuffer(this.renderbuffer);
    }
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
