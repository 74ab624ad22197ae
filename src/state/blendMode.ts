/**
 * Blend Mode Presets
 *
 * Named compositing modes expressed as full BlendState values.
 */

import { DEFAULT_BLEND_STATE, type BlendState } from "./PipelineSettings";

export type BlendMode = "normal" | "add" | "multiply" | "screen" | "replace";

/**
 * Get the blend state for a named compositing mode.
 *
 * @param mode - Blend mode preset
 */
export function blendStateForMode(mode: BlendMode): BlendState {
  switch (mode) {
    case "normal":
      // Standard alpha blending: src * srcAlpha + dst * (1 - srcAlpha)
      return {
        ...DEFAULT_BLEND_STATE,
        srcRGB: "src-alpha",
        dstRGB: "one-minus-src-alpha",
        srcAlpha: "src-alpha",
        dstAlpha: "one-minus-src-alpha",
      };

    case "add":
      // Additive blending: src * srcAlpha + dst * 1
      return {
        ...DEFAULT_BLEND_STATE,
        srcRGB: "src-alpha",
        dstRGB: "one",
        srcAlpha: "src-alpha",
        dstAlpha: "one",
      };

    case "multiply":
      // RGB = dst * src, alpha = standard
      return {
        ...DEFAULT_BLEND_STATE,
        srcRGB: "dst-color",
        dstRGB: "zero",
        srcAlpha: "dst-alpha",
        dstAlpha: "one-minus-src-alpha",
      };

    case "screen":
      // 1 - (1-dst)(1-src)
      return {
        ...DEFAULT_BLEND_STATE,
        srcRGB: "one",
        dstRGB: "one-minus-src-color",
        srcAlpha: "one",
        dstAlpha: "one-minus-src-alpha",
      };

    case "replace":
      return DEFAULT_BLEND_STATE;
  }
}
