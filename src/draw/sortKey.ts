/**
 * Draw Sort Keys
 *
 * Ordering of reorderable draw commands by the state they bind, so that
 * draws sharing a shader, texture and vertex buffer end up adjacent.
 */

import {
  compareKeys,
  keyToString,
  type ResourceKey,
} from "../resources/ResourceKey";
import { settingsEqual } from "../state/PipelineSettings";
import type { Command, DrawCommand } from "./DrawCommand";

export interface DrawSortKey {
  shader: ResourceKey;
  texture: ResourceKey | null;
  vertexBuffer: ResourceKey | null;
}

/**
 * Create the sort key for a draw: its shader, the first texture it samples
 * and its first vertex buffer.
 */
export function drawSortKey(command: DrawCommand): DrawSortKey {
  let texture: ResourceKey | null = null;
  for (const uniform of command.uniforms.values()) {
    if (uniform.kind === "texture") {
      texture = uniform.texture;
      break;
    }
  }
  return {
    shader: command.shader,
    texture,
    vertexBuffer: command.attributes[0]?.buffer ?? null,
  };
}

function compareOptionalKeys(
  a: ResourceKey | null,
  b: ResourceKey | null
): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? -1 : 1;
  }
  return compareKeys(a, b);
}

/**
 * Compare sort keys: shader first, then texture, then vertex buffer.
 */
export function compareDrawSortKeys(a: DrawSortKey, b: DrawSortKey): number {
  return (
    compareKeys(a.shader, b.shader) ||
    compareOptionalKeys(a.texture, b.texture) ||
    compareOptionalKeys(a.vertexBuffer, b.vertexBuffer)
  );
}

/** e.g. "shader#0@0|texture#2@0|buffer#1@0" */
export function drawSortKeyToString(key: DrawSortKey): string {
  const part = (k: ResourceKey | null) => (k ? keyToString(k) : "-");
  return `${part(key.shader)}|${part(key.texture)}|${part(key.vertexBuffer)}`;
}

function isReorderable(command: Command): command is DrawCommand {
  return (
    command.kind === "draw" &&
    command.reorderSafe &&
    command.settings.blend === null
  );
}

/**
 * Stably sort maximal runs of consecutive reorderable draws with equal
 * settings. A draw is reorderable when it is marked safe and blending is
 * explicitly off; everything else keeps its position.
 */
export function reorderCommands(commands: readonly Command[]): Command[] {
  const result: Command[] = [];
  let i = 0;
  while (i < commands.length) {
    const first = commands[i]!;
    if (!isReorderable(first)) {
      result.push(first);
      i++;
      continue;
    }

    const run: DrawCommand[] = [first];
    let j = i + 1;
    while (j < commands.length) {
      const next = commands[j]!;
      if (!isReorderable(next)) break;
      if (!settingsEqual(next.settings, first.settings)) break;
      run.push(next);
      j++;
    }

    const keyed = run.map((command, index) => ({
      command,
      index,
      key: drawSortKey(command),
    }));
    keyed.sort(
      (a, b) => compareDrawSortKeys(a.key, b.key) || a.index - b.index
    );
    for (const entry of keyed) {
      result.push(entry.command);
    }
    i = j;
  }
  return result;
}
