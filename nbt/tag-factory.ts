/**
 * Tag Factory Utilities
 *
 * Helper functions for creating materialized tag values.
 */

import { TagType, tagTypeToString } from './scanner/tag-types.js';
import type {
  ByteArrayTag,
  CompoundTag,
  IntArrayTag,
  ListTag,
  LongArrayTag,
  LongTag,
  NbtTag,
  NumberTag,
  StringTag
} from './tag-values.js';

export function byteTag(value: number): NumberTag {
  return { type: TagType.Byte, value };
}

export function shortTag(value: number): NumberTag {
  return { type: TagType.Short, value };
}

export function intTag(value: number): NumberTag {
  return { type: TagType.Int, value };
}

export function longTag(value: bigint): LongTag {
  return { type: TagType.Long, value };
}

export function floatTag(value: number): NumberTag {
  return { type: TagType.Float, value };
}

export function doubleTag(value: number): NumberTag {
  return { type: TagType.Double, value };
}

export function stringTag(value: string): StringTag {
  return { type: TagType.String, value };
}

export function byteArrayTag(value: ArrayLike<number>): ByteArrayTag {
  return { type: TagType.ByteArray, value: Int8Array.from(value) };
}

export function intArrayTag(value: ArrayLike<number>): IntArrayTag {
  return { type: TagType.IntArray, value: Int32Array.from(value) };
}

export function longArrayTag(value: ArrayLike<bigint>): LongArrayTag {
  return { type: TagType.LongArray, value: BigInt64Array.from(value) };
}

/**
 * Creates a list; every item must have the given subtype.
 */
export function listTag(subtype: TagType, items: NbtTag[] = []): ListTag {
  for (const item of items) {
    if (item.type !== subtype)
      throw new Error('listTag: expected ' + tagTypeToString(subtype) + ' items, got ' + tagTypeToString(item.type));
  }
  return { type: TagType.List, subtype, items };
}

/**
 * Creates a compound from an object literal or from [name, tag] pairs.
 * Pairs keep names such as "__proto__" intact.
 */
export function compoundTag(entries: Record<string, NbtTag> | Iterable<readonly [string, NbtTag]> = []): CompoundTag {
  const map = new Map<string, NbtTag>();
  if (isIterable(entries)) {
    for (const [name, tag] of entries)
      map.set(name, tag);
  } else {
    for (const name of Object.keys(entries))
      map.set(name, entries[name]);
  }
  return { type: TagType.Compound, entries: map };
}

function isIterable(value: object): value is Iterable<readonly [string, NbtTag]> {
  return Symbol.iterator in value;
}
