/**
 * Tag reader - lazy access to a scanned buffer.
 *
 * Everything here works from the flat index plus the original bytes: names
 * are decoded on request, subtrees are skipped through the descendant counts
 * and values are materialized only for the records asked for. Materializing
 * a container walks its records in order with an explicit frame stack, so
 * deep input never recurses.
 */

import type { TagIndex } from './scanner/scanner.js';
import {
  TagType,
  elementWidth,
  isPackedListSubtype,
  isValidTagType,
  tagTypeToString
} from './scanner/tag-types.js';
import { isContainerTag, type ContainerTag, type NamedTag, type NbtTag } from './tag-values.js';

export interface TagReader {
  readonly index: TagIndex;
  readonly buffer: Uint8Array;

  /** Decoded name of a record, '' when unnamed. */
  name(i: number): string;

  type(i: number): TagType;

  /** Raw subtype byte of a list record. */
  listSubtype(i: number): number;

  /** Number of elements of a list record, packed or not. */
  listLength(i: number): number;

  /** Records in the subtree below `i`. */
  descendants(i: number): number;

  /** Index of the record after the subtree of `i`. */
  nextSibling(i: number): number;

  /** Records of the direct children of a compound or list (none for packed lists). */
  childIndices(i: number): number[];

  /**
   * Child of a compound by name, or -1. With repeated names the last one
   * wins, as in unpack().
   */
  find(i: number, name: string): number;

  /**
   * Record reached from the root through names and list positions, or -1.
   * Negative positions count from the end of the list. Elements of packed
   * numeric lists have no record; findValue() reaches them.
   */
  findPath(segments: readonly (string | number)[]): number;

  /** Value at a path, packed list elements included, or undefined. */
  findValue(segments: readonly (string | number)[]): NbtTag | undefined;

  /** Element `k` of a packed numeric list, decoded from the list payload. */
  listElement(i: number, k: number): NbtTag;

  /** Materialize a record and its subtree. */
  unpack(i: number): NbtTag;

  /** Name and value of the root tag. */
  root(): NamedTag;
}

const utf8 = new TextDecoder('utf-8');
const utf8Encoder = new TextEncoder();

/**
 * Bytes between the end of a tag's name and its payload offset.
 */
function payloadHeaderWidth(type: TagType): number {
  switch (type) {
    case TagType.String: return 2;
    case TagType.ByteArray:
    case TagType.IntArray:
    case TagType.LongArray: return 4;
    case TagType.List: return 5;
    default: return 0;
  }
}

export function createTagReader(buffer: Uint8Array, index: TagIndex): TagReader {
  const tags = index.tags;
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const littleEndian = index.byteOrder === 'little';

  function checkIndex(i: number): void {
    if (!(i >= 0 && i < index.count))
      throw new RangeError('TagReader: record ' + i + ' out of range 0..' + (index.count - 1));
  }

  function nameBytes(i: number): Uint8Array {
    const length = tags.nameLength(i);
    const end = tags.payload(i) - payloadHeaderWidth(tags.type(i));
    return buffer.subarray(end - length, end);
  }

  function name(i: number): string {
    checkIndex(i);
    return utf8.decode(nameBytes(i));
  }

  function type(i: number): TagType {
    return tags.type(i);
  }

  function expectType(i: number, expected: TagType, operation: string): void {
    if (tags.type(i) !== expected)
      throw new Error('TagReader: ' + operation + ' needs a ' + tagTypeToString(expected) +
        ' record, record ' + i + ' is ' + tagTypeToString(tags.type(i)));
  }

  function listSubtype(i: number): number {
    expectType(i, TagType.List, 'listSubtype');
    return buffer[tags.payload(i) - 5];
  }

  function listLength(i: number): number {
    expectType(i, TagType.List, 'listLength');
    return view.getUint32(tags.payload(i) - 4, littleEndian);
  }

  function descendants(i: number): number {
    switch (tags.type(i)) {
      case TagType.Compound:
        return tags.children(i);
      case TagType.List:
        return isPackedListSubtype(buffer[tags.payload(i) - 5]) ? 0 : tags.children(i);
      default:
        return 0;
    }
  }

  function nextSibling(i: number): number {
    return i + 1 + descendants(i);
  }

  function childIndices(i: number): number[] {
    const result: number[] = [];
    const end = nextSibling(i);
    for (let child = i + 1; child < end; child = nextSibling(child))
      result.push(child);
    return result;
  }

  function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let k = 0; k < a.length; k++) {
      if (a[k] !== b[k]) return false;
    }
    return true;
  }

  function findEncoded(i: number, encoded: Uint8Array): number {
    const end = nextSibling(i);
    let found = -1;
    for (let child = i + 1; child < end; child = nextSibling(child)) {
      if (sameBytes(nameBytes(child), encoded)) found = child;
    }
    return found;
  }

  function find(i: number, childName: string): number {
    expectType(i, TagType.Compound, 'find');
    return findEncoded(i, utf8Encoder.encode(childName));
  }

  // `element` is set when the last segment indexed a packed numeric list.
  function resolvePath(segments: readonly (string | number)[]): { record: number, element: number } {
    const miss = { record: -1, element: -1 };
    let current = 0;
    for (let s = 0; s < segments.length; s++) {
      const segment = segments[s];
      if (typeof segment === 'number') {
        if (tags.type(current) !== TagType.List) return miss;
        const length = listLength(current);
        const k = segment < 0 ? segment + length : segment;
        if (!(k >= 0 && k < length)) return miss;

        const subtype = listSubtype(current);
        if (isPackedListSubtype(subtype)) {
          if (subtype === TagType.End || s !== segments.length - 1) return miss;
          return { record: current, element: k };
        }
        current = childIndices(current)[k];
      } else {
        if (tags.type(current) !== TagType.Compound) return miss;
        current = findEncoded(current, utf8Encoder.encode(segment));
        if (current < 0) return miss;
      }
    }
    return { record: current, element: -1 };
  }

  function findPath(segments: readonly (string | number)[]): number {
    const resolved = resolvePath(segments);
    return resolved.element >= 0 ? -1 : resolved.record;
  }

  function findValue(segments: readonly (string | number)[]): NbtTag | undefined {
    const resolved = resolvePath(segments);
    if (resolved.record < 0) return undefined;
    return resolved.element >= 0 ? listElement(resolved.record, resolved.element) : unpack(resolved.record);
  }

  function readNumber(type: TagType, offset: number): NbtTag {
    switch (type) {
      case TagType.Byte:
        return { type, value: view.getInt8(offset) };
      case TagType.Short:
        return { type, value: view.getInt16(offset, littleEndian) };
      case TagType.Int:
        return { type, value: view.getInt32(offset, littleEndian) };
      case TagType.Long:
        return { type, value: view.getBigInt64(offset, littleEndian) };
      case TagType.Float:
        return { type, value: view.getFloat32(offset, littleEndian) };
      case TagType.Double:
        return { type, value: view.getFloat64(offset, littleEndian) };
    }
    throw new Error('TagReader: ' + tagTypeToString(type) + ' is not a numeric type');
  }

  function listElement(i: number, k: number): NbtTag {
    const subtype = listSubtype(i);
    if (!isPackedListSubtype(subtype) || subtype === TagType.End)
      throw new Error('TagReader: list ' + i + ' has no packed numeric elements');
    if (!(k >= 0 && k < tags.children(i)))
      throw new RangeError('TagReader: element ' + k + ' out of range for list ' + i);
    return readNumber(subtype, tags.payload(i) + k * elementWidth(subtype));
  }

  // Materialize a single record; containers with records below them come
  // back empty and are filled by unpack().
  function unpackRecord(i: number): NbtTag {
    const recordType = tags.type(i);
    const payload = tags.payload(i);
    const length = tags.children(i);

    switch (recordType) {
      case TagType.String:
        return { type: recordType, value: utf8.decode(buffer.subarray(payload, payload + length)) };

      case TagType.ByteArray: {
        const value = new Int8Array(length);
        value.set(new Int8Array(buffer.buffer, buffer.byteOffset + payload, length));
        return { type: recordType, value };
      }

      case TagType.IntArray: {
        const value = new Int32Array(length);
        for (let k = 0; k < length; k++)
          value[k] = view.getInt32(payload + k * 4, littleEndian);
        return { type: recordType, value };
      }

      case TagType.LongArray: {
        const value = new BigInt64Array(length);
        for (let k = 0; k < length; k++)
          value[k] = view.getBigInt64(payload + k * 8, littleEndian);
        return { type: recordType, value };
      }

      case TagType.List: {
        const subtype = buffer[payload - 5];
        if (!isValidTagType(subtype))
          throw new Error('TagReader: list ' + i + ' has invalid subtype ' + subtype);
        if (subtype === TagType.End && length > 0)
          throw new Error('TagReader: list ' + i + ' declares ' + length + ' end tags, which have no value');
        const items: NbtTag[] = [];
        if (isPackedListSubtype(subtype) && subtype !== TagType.End) {
          const width = elementWidth(subtype);
          for (let k = 0; k < length; k++)
            items.push(readNumber(subtype, payload + k * width));
        }
        return { type: recordType, subtype, items };
      }

      case TagType.Compound:
        return { type: recordType, entries: new Map<string, NbtTag>() };

      case TagType.End:
        throw new Error('TagReader: record ' + i + ' is an end tag');

      default:
        return readNumber(recordType, payload);
    }
  }

  function unpack(i: number): NbtTag {
    checkIndex(i);
    const last = i + descendants(i);

    const frames: { tag: ContainerTag, last: number }[] = [];
    let result: NbtTag | undefined;

    for (let j = i; j <= last; j++) {
      while (frames.length > 0 && frames[frames.length - 1].last < j)
        frames.pop();

      const value = unpackRecord(j);
      if (frames.length === 0) {
        result = value;
      } else {
        const parent = frames[frames.length - 1].tag;
        if (parent.type === TagType.Compound)
          parent.entries.set(name(j), value);
        else
          parent.items.push(value);
      }

      if (isContainerTag(value) && descendants(j) > 0)
        frames.push({ tag: value, last: j + descendants(j) });
    }

    if (!result)
      throw new Error('TagReader: record ' + i + ' produced no value');
    return result;
  }

  function root(): NamedTag {
    return { name: name(0), tag: unpack(0) };
  }

  return {
    index,
    buffer,
    name,
    type,
    listSubtype,
    listLength,
    descendants,
    nextSibling,
    childIndices,
    find,
    findPath,
    findValue,
    listElement,
    unpack,
    root,
  };
}
