/**
 * TagVector - grow-only descriptor storage for the scanner.
 *
 * Records are kept as parallel typed arrays (structure of arrays) so that a
 * scan allocates a handful of buffers rather than one object per tag. Growth
 * replaces the arrays, so callers hold positional indices and never the
 * arrays themselves.
 */

import { ScanError, ScanErrorCode } from './scan-error.js';
import { isValidTagType, type TagType } from './tag-types.js';

export interface TagDescriptor {
  /** Offset of the value bytes in the input buffer. */
  payload: number;

  /**
   * Descendant record count for compounds and non-numeric lists, element
   * count for numeric lists and arrays, byte length for strings, 0 otherwise.
   */
  children: number;

  /** Length of the name stored just before the payload, 0 when unnamed. */
  nameLength: number;

  type: TagType;
}

export interface TagVector {
  /** Append a record and return its index. */
  append(type: TagType, payload: number, children: number, nameLength: number): number;

  /** Overwrite the children field of a record appended earlier. */
  patchChildren(index: number, children: number): void;

  readonly length: number;

  type(index: number): TagType;
  payload(index: number): number;
  children(index: number): number;
  nameLength(index: number): number;

  get(index: number): TagDescriptor;
  toArray(): TagDescriptor[];

  /** Drop the storage; the vector is empty afterwards. */
  release(): void;

  fillDebugState(state: Partial<TagVectorDebugState>): void;
}

export interface TagVectorOptions {
  /** Capacity of the first allocation. */
  initialCapacity?: number;

  /**
   * Upper bound on the number of records. Growth past it fails the same way
   * as a refused allocation.
   */
  maxCapacity?: number;
}

export const DEFAULT_TAG_CAPACITY = 32;

// Typed arrays cannot hold more elements than this in current engines.
const MAX_TYPED_ARRAY_LENGTH = 2 ** 32 - 1;

export function createTagVector(options?: TagVectorOptions): TagVector {
  const initialCapacity = Math.max(1, options?.initialCapacity ?? DEFAULT_TAG_CAPACITY);
  const maxCapacity = Math.min(options?.maxCapacity ?? MAX_TYPED_ARRAY_LENGTH, MAX_TYPED_ARRAY_LENGTH);

  let capacity = 0;
  let count = 0;
  let growCount = 0;

  let payloads = new Uint32Array(0);
  let childCounts = new Uint32Array(0);
  let nameLengths = new Uint16Array(0);
  let types = new Uint8Array(0);

  function grow(): void {
    if (capacity >= maxCapacity)
      throw new ScanError(ScanErrorCode.OutOfMemory, -1, 'tag vector is at its maximum capacity');

    const next = capacity === 0 ? Math.min(initialCapacity, maxCapacity) : Math.min(capacity * 2, maxCapacity);

    let nextPayloads: Uint32Array;
    let nextChildCounts: Uint32Array;
    let nextNameLengths: Uint16Array;
    let nextTypes: Uint8Array;
    try {
      nextPayloads = new Uint32Array(next);
      nextChildCounts = new Uint32Array(next);
      nextNameLengths = new Uint16Array(next);
      nextTypes = new Uint8Array(next);
    } catch (error) {
      if (error instanceof RangeError)
        throw new ScanError(ScanErrorCode.OutOfMemory, -1, 'tag vector allocation of ' + next + ' records failed');
      throw error;
    }

    nextPayloads.set(payloads.subarray(0, count));
    nextChildCounts.set(childCounts.subarray(0, count));
    nextNameLengths.set(nameLengths.subarray(0, count));
    nextTypes.set(types.subarray(0, count));

    payloads = nextPayloads;
    childCounts = nextChildCounts;
    nameLengths = nextNameLengths;
    types = nextTypes;
    capacity = next;
    growCount++;
  }

  function append(type: TagType, payload: number, children: number, nameLength: number): number {
    if (count >= capacity) grow();

    const index = count++;
    payloads[index] = payload;
    childCounts[index] = children;
    nameLengths[index] = nameLength;
    types[index] = type;
    return index;
  }

  function checkIndex(index: number): void {
    if (!(index >= 0 && index < count))
      throw new RangeError('TagVector: index ' + index + ' out of range 0..' + (count - 1));
  }

  function patchChildren(index: number, children: number): void {
    checkIndex(index);
    childCounts[index] = children;
  }

  function typeAt(index: number): TagType {
    const value = types[index];
    if (!isValidTagType(value))
      throw new Error('TagVector: corrupt type byte ' + value + ' at record ' + index);
    return value;
  }

  function type(index: number): TagType {
    checkIndex(index);
    return typeAt(index);
  }

  function payload(index: number): number {
    checkIndex(index);
    return payloads[index];
  }

  function children(index: number): number {
    checkIndex(index);
    return childCounts[index];
  }

  function nameLength(index: number): number {
    checkIndex(index);
    return nameLengths[index];
  }

  function get(index: number): TagDescriptor {
    checkIndex(index);
    return {
      payload: payloads[index],
      children: childCounts[index],
      nameLength: nameLengths[index],
      type: typeAt(index),
    };
  }

  function toArray(): TagDescriptor[] {
    const result: TagDescriptor[] = [];
    for (let i = 0; i < count; i++)
      result.push(get(i));
    return result;
  }

  function release(): void {
    payloads = new Uint32Array(0);
    childCounts = new Uint32Array(0);
    nameLengths = new Uint16Array(0);
    types = new Uint8Array(0);
    capacity = 0;
    count = 0;
  }

  function fillDebugState(state: Partial<TagVectorDebugState>): void {
    state.length = count;
    state.capacity = capacity;
    state.growCount = growCount;
  }

  return {
    append,
    patchChildren,
    get length() { return count; },
    type,
    payload,
    children,
    nameLength,
    get,
    toArray,
    release,
    fillDebugState,
  };
}

export interface TagVectorDebugState {
  length: number;
  capacity: number;

  /** Number of allocations made so far, the first one included. */
  growCount: number;
}
