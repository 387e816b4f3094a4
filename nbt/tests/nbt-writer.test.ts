/**
 * Writer: exact encodings and rejected values
 */

import { describe, expect, test } from 'vitest';

import { createNbtWriter, encodeNbt } from '../nbt-writer.js';
import { TagType } from '../scanner/tag-types.js';
import { compoundTag, intTag, listTag, shortTag, stringTag } from '../tag-factory.js';
import { bytes } from './tag-listing.js';

describe('encodeNbt', () => {
  test('writes a named compound', () => {
    const encoded = encodeNbt('', compoundTag({ foo: intTag(42) }));
    expect(Array.from(encoded)).toEqual(Array.from(bytes(
      [0x0A, 0, 0],
      [0x03, 0, 3], 'foo', [0, 0, 0, 42],
      [0])));
  });

  test('writes little-endian fields', () => {
    const encoded = encodeNbt('root', compoundTag([
      ['x', shortTag(7)],
      ['items', listTag(TagType.Int, [intTag(1), intTag(2), intTag(3)])],
    ]), 'little');

    expect(Array.from(encoded)).toEqual(Array.from(bytes(
      [0x0A, 4, 0], 'root',
      [0x02, 1, 0], 'x', [7, 0],
      [0x09, 5, 0], 'items', [3, 3, 0, 0, 0], [1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0],
      [0])));
  });

  test('an empty list keeps its declared subtype', () => {
    const encoded = encodeNbt('', listTag(TagType.Compound));
    expect(Array.from(encoded)).toEqual([0x09, 0, 0, TagType.Compound, 0, 0, 0, 0]);
  });

  test('writes compound entries in insertion order', () => {
    const encoded = encodeNbt('', compoundTag([['b', stringTag('1')], ['a', stringTag('2')]]));
    expect(Array.from(encoded)).toEqual(Array.from(bytes(
      [0x0A, 0, 0],
      [0x08, 0, 1], 'b', [0, 1], '1',
      [0x08, 0, 1], 'a', [0, 1], '2',
      [0])));
  });

  test('rejects list items of another type', () => {
    expect(() => encodeNbt('', { type: TagType.List, subtype: TagType.Int, items: [stringTag('x')] }))
      .toThrow('NbtWriter: String item in a list of Int');
    expect(() => encodeNbt('', { type: TagType.List, subtype: TagType.String, items: [intTag(1)] }))
      .toThrow('NbtWriter: Int item in a list of String');
  });

  test('rejects end-typed lists with items', () => {
    expect(() => encodeNbt('', { type: TagType.List, subtype: TagType.End, items: [intTag(1)] }))
      .toThrow('NbtWriter: a list of end tags cannot have items');
  });

  test('rejects names and strings over 65535 bytes', () => {
    expect(() => encodeNbt('n'.repeat(65536), intTag(0)))
      .toThrow('NbtWriter: name is 65536 bytes, the limit is 65535');
    // three bytes per character in UTF-8
    expect(() => encodeNbt('', stringTag('世'.repeat(21846))))
      .toThrow('NbtWriter: string is 65538 bytes, the limit is 65535');
  });
});

describe('NbtWriter', () => {
  test('grows past its initial size', () => {
    const writer = createNbtWriter('big', 16);
    writer.writeNamed('', stringTag('x'.repeat(1000)));
    expect(writer.length).toBe(1005);

    const encoded = writer.finish();
    expect(encoded.length).toBe(1005);
    expect(Array.from(encoded.subarray(0, 5))).toEqual([0x08, 0, 0, 0x03, 0xE8]);
    expect(writer.length).toBe(0);
  });

  test('reset discards written bytes', () => {
    const writer = createNbtWriter();
    writer.writeNamed('a', intTag(1));
    writer.reset();
    writer.writeNamed('', shortTag(-1));
    expect(Array.from(writer.finish())).toEqual([0x02, 0, 0, 0xFF, 0xFF]);
  });

  test('several named tags go one after another', () => {
    const writer = createNbtWriter();
    writer.writeNamed('', intTag(1));
    writer.writeNamed('', intTag(2));
    expect(Array.from(writer.finish())).toEqual([0x03, 0, 0, 0, 0, 0, 1, 0x03, 0, 0, 0, 0, 0, 2]);
  });
});
