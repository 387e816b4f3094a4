/**
 * Tag vector: doubling growth, index stability, capacity limit
 */

import { describe, expect, test } from 'vitest';

import { ScanError, ScanErrorCode } from '../scanner/scan-error.js';
import { TagType } from '../scanner/tag-types.js';
import { createTagVector, type TagVectorDebugState } from '../scanner/tag-vector.js';

describe('TagVector', () => {
  test('allocates lazily and doubles from the initial capacity', () => {
    const tags = createTagVector({ initialCapacity: 2 });
    const state: Partial<TagVectorDebugState> = {};

    tags.fillDebugState(state);
    expect(state).toEqual({ length: 0, capacity: 0, growCount: 0 });

    for (let i = 0; i < 5; i++)
      expect(tags.append(TagType.Int, i * 4, 0, 0)).toBe(i);

    tags.fillDebugState(state);
    expect(state).toEqual({ length: 5, capacity: 8, growCount: 3 });
  });

  test('records survive growth unchanged', () => {
    const tags = createTagVector({ initialCapacity: 1 });
    tags.append(TagType.Compound, 7, 0, 4);
    tags.append(TagType.String, 13, 5, 1);
    tags.append(TagType.Long, 20, 0, 0);

    expect(tags.toArray()).toEqual([
      { type: TagType.Compound, payload: 7, children: 0, nameLength: 4 },
      { type: TagType.String, payload: 13, children: 5, nameLength: 1 },
      { type: TagType.Long, payload: 20, children: 0, nameLength: 0 },
    ]);
  });

  test('patchChildren rewrites only the children field', () => {
    const tags = createTagVector();
    const parent = tags.append(TagType.List, 5, 0, 2);
    tags.append(TagType.Compound, 5, 0, 0);
    tags.append(TagType.Byte, 9, 0, 1);
    tags.patchChildren(parent, tags.length - parent - 1);

    expect(tags.get(parent)).toEqual({ type: TagType.List, payload: 5, children: 2, nameLength: 2 });
    expect(tags.children(1)).toBe(0);
  });

  test('keeps the full unsigned 32-bit range of payload and children', () => {
    const tags = createTagVector();
    tags.append(TagType.List, 0xFFFFFFFF, 0xFFFFFFFE, 0xFFFF);
    expect(tags.payload(0)).toBe(4294967295);
    expect(tags.children(0)).toBe(4294967294);
    expect(tags.nameLength(0)).toBe(65535);
  });

  test('rejects indices outside the appended range', () => {
    const tags = createTagVector();
    tags.append(TagType.Byte, 3, 0, 0);
    expect(() => tags.get(1)).toThrow('TagVector: index 1 out of range 0..0');
    expect(() => tags.patchChildren(-1, 0)).toThrow(RangeError);
  });

  test('fails with OutOfMemory past maxCapacity', () => {
    const tags = createTagVector({ maxCapacity: 3 });
    tags.append(TagType.Byte, 0, 0, 0);
    tags.append(TagType.Byte, 1, 0, 0);
    tags.append(TagType.Byte, 2, 0, 0);

    let error: unknown;
    try {
      tags.append(TagType.Byte, 3, 0, 0);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ScanError);
    expect(error).toMatchObject({
      code: ScanErrorCode.OutOfMemory,
      offset: -1,
      message: 'tag vector is at its maximum capacity'
    });
    expect(tags.length).toBe(3);
  });

  test('release empties the vector', () => {
    const tags = createTagVector();
    tags.append(TagType.Int, 3, 0, 0);
    tags.release();

    const state: Partial<TagVectorDebugState> = {};
    tags.fillDebugState(state);
    expect(state.length).toBe(0);
    expect(state.capacity).toBe(0);
    expect(tags.toArray()).toEqual([]);
  });
});
