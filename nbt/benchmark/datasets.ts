/**
 * Synthetic benchmark inputs. Generation is deterministic so runs compare.
 */

import { encodeNbt } from '../nbt-writer.js';
import type { ByteOrder } from '../scanner/byte-order.js';
import { TagType } from '../scanner/tag-types.js';
import {
  byteArrayTag,
  compoundTag,
  doubleTag,
  intTag,
  listTag,
  longArrayTag,
  longTag,
  stringTag
} from '../tag-factory.js';
import type { CompoundTag, NbtTag } from '../tag-values.js';

export interface Dataset {
  name: string;
  bytes: Uint8Array;
  byteOrder: ByteOrder;
}

export const datasetNames = ['small-simple', 'entity-list', 'packed-numbers', 'deep-nesting'] as const;

export type DatasetName = typeof datasetNames[number];

function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (1103515245 * state + 12345) >>> 0;
    return state;
  };
}

function entity(next: () => number, id: number): CompoundTag {
  return compoundTag([
    ['id', stringTag('entity_' + (next() % 64))],
    ['uuid', longArrayTag([BigInt(id), BigInt(next())])],
    ['pos', listTag(TagType.Double, [doubleTag(next() / 7), doubleTag(next() / 11), doubleTag(next() / 13)])],
    ['health', intTag(next() % 20)],
    ['inventory', listTag(TagType.Compound, [
      compoundTag([['slot', intTag(0)], ['count', intTag(next() % 64)]]),
      compoundTag([['slot', intTag(1)], ['count', intTag(next() % 64)]]),
    ])],
  ]);
}

function buildRoot(name: DatasetName, next: () => number): NbtTag {
  switch (name) {
    case 'small-simple':
      return compoundTag([
        ['name', stringTag('level')],
        ['seed', longTag(4_000_000_000n)],
        ['spawn', listTag(TagType.Int, [intTag(10), intTag(64), intTag(-20)])],
      ]);

    case 'entity-list': {
      const entities: NbtTag[] = [];
      for (let i = 0; i < 2000; i++) entities.push(entity(next, i));
      return compoundTag([['entities', listTag(TagType.Compound, entities)]]);
    }

    case 'packed-numbers': {
      const values: NbtTag[] = [];
      for (let i = 0; i < 100_000; i++) values.push(intTag(next() | 0));
      return compoundTag([
        ['heights', listTag(TagType.Int, values)],
        ['blocks', byteArrayTag(new Int8Array(65536))],
      ]);
    }

    case 'deep-nesting': {
      let root: NbtTag = compoundTag([['leaf', intTag(1)]]);
      for (let depth = 0; depth < 500; depth++)
        root = depth % 2 === 0 ? listTag(TagType.Compound, [root]) : compoundTag([['child', root]]);
      return root;
    }
  }
}

export function getDataset(name: DatasetName, byteOrder: ByteOrder = 'big'): Dataset {
  const root = buildRoot(name, createRandom(12345));
  return { name, bytes: encodeNbt('', root, byteOrder), byteOrder };
}
