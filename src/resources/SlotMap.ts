/**
 * Generational arena.
 *
 * Fixed slots each holding an optional value and a generation counter.
 * Removing a value bumps the slot generation before the slot is reused, so a
 * key for the old value never resolves to the new one.
 */

import { ERROR_CODES, GraphicsError } from "../errors";
import {
  createKey,
  keyToString,
  type ResourceKey,
  type ResourceKind,
} from "./ResourceKey";

interface Slot<T> {
  generation: number;
  value: T | undefined;
}

export class SlotMap<K extends ResourceKind, T> {
  readonly kind: K;

  private slots: Slot<T>[] = [];
  private freeList: number[] = [];
  private count = 0;

  constructor(kind: K) {
    this.kind = kind;
  }

  /** Number of live values */
  get size(): number {
    return this.count;
  }

  /** Store a value and return its key */
  insert(value: T): ResourceKey<K> {
    return this.insertWith(() => value);
  }

  /**
   * Store a value built from its own key. Nothing is stored when `build`
   * throws.
   */
  insertWith(build: (key: ResourceKey<K>) => T): ResourceKey<K> {
    const reused = this.freeList[this.freeList.length - 1];
    const index = reused ?? this.slots.length;
    const key = createKey(this.kind, index, this.slots[index]?.generation ?? 0);

    const value = build(key);

    if (reused !== undefined) {
      this.freeList.pop();
      this.slots[index]!.value = value;
    } else {
      this.slots.push({ generation: 0, value });
    }
    this.count++;
    return key;
  }

  /** Whether the key refers to a live value */
  has(key: ResourceKey): boolean {
    if (key.kind !== this.kind) return false;
    const slot = this.slots[key.index];
    return (
      slot !== undefined &&
      slot.generation === key.generation &&
      slot.value !== undefined
    );
  }

  /**
   * Look up a live value.
   *
   * @throws GraphicsError NotFound for an index out of range or a key of
   *   another kind, StaleHandle when the slot generation no longer matches.
   */
  get(key: ResourceKey): T {
    return this.lookup(key).value;
  }

  /** Remove a live value and invalidate every copy of its key */
  remove(key: ResourceKey): T {
    const { slot, value } = this.lookup(key);
    slot.value = undefined;
    slot.generation++;
    this.freeList.push(key.index);
    this.count--;
    return value;
  }

  /** Iterate live values in slot order */
  *values(): IterableIterator<T> {
    for (const slot of this.slots) {
      if (slot.value !== undefined) {
        yield slot.value;
      }
    }
  }

  /** Remove every live value, invalidating all keys */
  drain(): T[] {
    const drained: T[] = [];
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i]!;
      if (slot.value === undefined) continue;
      drained.push(slot.value);
      slot.value = undefined;
      slot.generation++;
      this.freeList.push(i);
    }
    this.count = 0;
    return drained;
  }

  private lookup(key: ResourceKey): { slot: Slot<T>; value: T } {
    if (key.kind !== this.kind) {
      throw new GraphicsError(
        ERROR_CODES.NOT_FOUND,
        `Expected a ${this.kind} key, got ${keyToString(key)}`
      );
    }
    const slot = this.slots[key.index];
    if (!slot || !Number.isInteger(key.index)) {
      throw new GraphicsError(
        ERROR_CODES.NOT_FOUND,
        `No ${this.kind} slot for ${keyToString(key)}`
      );
    }
    const value = slot.value;
    if (slot.generation !== key.generation || value === undefined) {
      throw new GraphicsError(
        ERROR_CODES.STALE_HANDLE,
        `Stale ${this.kind} handle ${keyToString(key)} ` +
          `(slot is at generation ${slot.generation})`
      );
    }
    return { slot, value };
  }
}
