/**
 * Generational resource handles.
 *
 * A key stays valid only while its generation matches the generation of the
 * slot it points at. Destroying the resource bumps the slot generation, so
 * every outstanding copy of the key fails lookup from then on.
 */

export type ResourceKind = "buffer" | "texture" | "shader" | "framebuffer";

export interface ResourceKey<K extends ResourceKind = ResourceKind> {
  readonly kind: K;
  readonly index: number;
  readonly generation: number;
}

export type BufferKey = ResourceKey<"buffer">;
export type TextureKey = ResourceKey<"texture">;
export type ShaderKey = ResourceKey<"shader">;
export type FramebufferKey = ResourceKey<"framebuffer">;

export function createKey<K extends ResourceKind>(
  kind: K,
  index: number,
  generation: number
): ResourceKey<K> {
  return Object.freeze({ kind, index, generation });
}

/**
 * Keys are equal only when kind, slot and generation all match. Two absent
 * keys (null or undefined) are equal.
 */
export function keyEquals(
  a: ResourceKey | null | undefined,
  b: ResourceKey | null | undefined
): boolean {
  if (a === b) return true;
  if (!a || !b) return !a && !b;
  return (
    a.kind === b.kind &&
    a.index === b.index &&
    a.generation === b.generation
  );
}

/** e.g. "buffer#3@2" */
export function keyToString(key: ResourceKey): string {
  return `${key.kind}#${key.index}@${key.generation}`;
}

/** Order keys by kind, then slot, then generation (used for batching) */
export function compareKeys(a: ResourceKey, b: ResourceKey): number {
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  if (a.index !== b.index) return a.index - b.index;
  return a.generation - b.generation;
}
