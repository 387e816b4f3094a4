/**
 * Tag type table and byte order helpers
 */

import { describe, expect, test } from 'vitest';

import { hostByteOrder, isNativeByteOrder, parseByteOrder } from '../scanner/byte-order.js';
import { ScanError, ScanErrorCode, isScanError } from '../scanner/scan-error.js';
import {
  TagType,
  elementWidth,
  isArrayTag,
  isNumericTag,
  isPackedListSubtype,
  isValidTagType,
  tagTypeToString
} from '../scanner/tag-types.js';
import { intTag, listTag } from '../tag-factory.js';

describe('tag types', () => {
  test('element widths', () => {
    expect(elementWidth(TagType.End)).toBe(0);
    expect(elementWidth(TagType.Short)).toBe(2);
    expect(elementWidth(TagType.Double)).toBe(8);
    expect(elementWidth(TagType.ByteArray)).toBe(1);
    expect(elementWidth(TagType.IntArray)).toBe(4);
    expect(elementWidth(TagType.LongArray)).toBe(8);
  });

  test('classification', () => {
    expect(isNumericTag(TagType.Long)).toBe(true);
    expect(isNumericTag(TagType.End)).toBe(false);
    expect(isPackedListSubtype(TagType.End)).toBe(true);
    expect(isPackedListSubtype(TagType.String)).toBe(false);
    expect(isArrayTag(TagType.LongArray)).toBe(true);
    expect(isArrayTag(TagType.List)).toBe(false);
    expect(isValidTagType(12)).toBe(true);
    expect(isValidTagType(13)).toBe(false);
  });

  test('names', () => {
    expect(tagTypeToString(TagType.Compound)).toBe('Compound');
    expect(tagTypeToString(13)).toBe('Unknown(13)');
  });

  test('listTag checks item types', () => {
    expect(() => listTag(TagType.Short, [intTag(1)])).toThrow('listTag: expected Short items, got Int');
  });
});

describe('byte order', () => {
  test('parses common spellings', () => {
    expect(parseByteOrder('be')).toBe('big');
    expect(parseByteOrder('>')).toBe('big');
    expect(parseByteOrder('little')).toBe('little');
    expect(parseByteOrder('<')).toBe('little');
    expect(() => parseByteOrder('middle')).toThrow('Unknown byte order: "middle"');
  });

  test('host byte order is native', () => {
    expect(isNativeByteOrder(hostByteOrder())).toBe(true);
  });
});

describe('ScanError', () => {
  test('message carries the offset when known', () => {
    expect(new ScanError(ScanErrorCode.EndOfBuffer, 12).message).toBe('unexpected end of buffer at offset 12');
    expect(new ScanError(ScanErrorCode.DepthExceeded, -1).message).toBe('maximum nesting depth exceeded');
  });

  test('isScanError filters by code', () => {
    const error = new ScanError(ScanErrorCode.OutOfMemory, 0);
    expect(isScanError(error)).toBe(true);
    expect(isScanError(error, ScanErrorCode.OutOfMemory)).toBe(true);
    expect(isScanError(error, ScanErrorCode.EndOfBuffer)).toBe(false);
    expect(isScanError(new Error('other'))).toBe(false);
  });
});
