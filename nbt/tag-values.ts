/**
 * Materialized NBT values, produced by the tag reader and consumed by the
 * writer. The `type` field discriminates the union.
 */

import { TagType } from './scanner/tag-types.js';

export type NumberTagType =
  | TagType.Byte
  | TagType.Short
  | TagType.Int
  | TagType.Float
  | TagType.Double;

export interface NumberTag {
  type: NumberTagType;
  value: number;
}

export interface LongTag {
  type: TagType.Long;
  value: bigint;
}

export interface StringTag {
  type: TagType.String;
  value: string;
}

export interface ByteArrayTag {
  type: TagType.ByteArray;
  value: Int8Array;
}

export interface IntArrayTag {
  type: TagType.IntArray;
  value: Int32Array;
}

export interface LongArrayTag {
  type: TagType.LongArray;
  value: BigInt64Array;
}

export interface ListTag {
  type: TagType.List;

  /**
   * Element type; End for an empty list with no declared type. An End list
   * declaring elements has nothing to hold and is rejected by the reader.
   */
  subtype: TagType;

  items: NbtTag[];
}

export interface CompoundTag {
  type: TagType.Compound;

  /** Children by name, in file order. */
  entries: Map<string, NbtTag>;
}

export type NbtTag =
  | NumberTag
  | LongTag
  | StringTag
  | ByteArrayTag
  | IntArrayTag
  | LongArrayTag
  | ListTag
  | CompoundTag;

export type ContainerTag = ListTag | CompoundTag;

/** The root of a file: a single named tag. */
export interface NamedTag {
  name: string;
  tag: NbtTag;
}

export function isContainerTag(tag: NbtTag): tag is ContainerTag {
  return tag.type === TagType.List || tag.type === TagType.Compound;
}
