import { DEFAULT_BYTE_ORDER, isNativeByteOrder, type ByteOrder } from './byte-order.js';
import {
  ContinuationKind,
  createContinuationStack,
  type ContinuationStack
} from './continuation-stack.js';
import { ScanError, ScanErrorCode } from './scan-error.js';
import {
  TagType,
  elementWidth,
  isPackedListSubtype,
  isValidTagType
} from './tag-types.js';
import { createTagVector, type TagVector, type TagVectorOptions } from './tag-vector.js';

/**
 * Flat index of a scanned buffer. Records are in pre-order and refer to the
 * buffer by offset, so the buffer must outlive the index.
 */
export interface TagIndex {
  readonly tags: TagVector;

  /** Number of records. */
  readonly count: number;

  /** True when the declared byte order is the host's. */
  readonly native: boolean;

  readonly byteOrder: ByteOrder;

  /** Offset just past the root tag; later bytes were not read. */
  readonly end: number;
}

export type ScanOptions = TagVectorOptions;

/** Default continuation stack memory: 4096 slots (16 KiB). */
export const DEFAULT_STACK_SLOTS = 4096;

/**
 * Scan an NBT buffer into a flat tag index.
 *
 * `stackMemory` is owned by the caller and bounds the nesting the scan
 * accepts: when it runs out the scan fails with DepthExceeded instead of
 * growing. Any failure throws a ScanError and leaves nothing allocated.
 */
export function scanTags(
  buffer: Uint8Array,
  byteOrder: ByteOrder,
  stackMemory: Uint32Array,
  options?: ScanOptions): TagIndex {
  return scanWithStack(buffer, byteOrder, createContinuationStack(stackMemory), options);
}

function scanWithStack(
  buffer: Uint8Array,
  byteOrder: ByteOrder,
  stack: ContinuationStack,
  options: ScanOptions | undefined): TagIndex {
  const size = buffer.length;
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const littleEndian = byteOrder === 'little';
  const tags = createTagVector(options);

  let pos = 0;

  // Name length of the tag about to be scanned: set when a name is read,
  // reset for list elements.
  let nameLength = 0;

  function scanTag(tagType: number): void {
    if (!isValidTagType(tagType) || tagType === TagType.End)
      throw new ScanError(ScanErrorCode.InvalidTagType, pos, 'invalid tag type ' + tagType);

    let payload = pos;
    let children = 0;
    let listSubtype = -1;

    switch (tagType) {
      case TagType.Byte:
      case TagType.Short:
      case TagType.Int:
      case TagType.Long:
      case TagType.Float:
      case TagType.Double:
        pos += elementWidth(tagType);
        break;

      case TagType.String: {
        if (pos + 2 > size)
          throw new ScanError(ScanErrorCode.EndOfBuffer, pos);
        children = view.getUint16(pos, littleEndian);
        payload = pos + 2;
        pos += 2 + children;
        break;
      }

      case TagType.ByteArray:
      case TagType.IntArray:
      case TagType.LongArray: {
        if (pos + 4 > size)
          throw new ScanError(ScanErrorCode.EndOfBuffer, pos);
        // Declared signed, read unsigned: a negative length becomes a huge
        // count and fails the bounds check below.
        children = view.getUint32(pos, littleEndian);
        payload = pos + 4;
        pos += 4 + children * elementWidth(tagType);
        break;
      }

      case TagType.List: {
        if (pos + 5 > size)
          throw new ScanError(ScanErrorCode.EndOfBuffer, pos);
        const subtype = buffer[pos];
        const length = view.getUint32(pos + 1, littleEndian);
        payload = pos + 5;
        if (isPackedListSubtype(subtype)) {
          children = length;
          pos += 5 + length * elementWidth(subtype);
        } else {
          pos += 5;
          listSubtype = subtype;
          children = length;
        }
        break;
      }

      case TagType.Compound:
        break;
    }

    if (pos > size)
      throw new ScanError(ScanErrorCode.EndOfBuffer, size);

    if (listSubtype >= 0) {
      // children holds the element count until the list is closed
      const index = tags.append(tagType, payload, 0, nameLength);
      stack.pushExtendList(index, listSubtype, children);
    } else if (tagType === TagType.Compound) {
      const index = tags.append(tagType, payload, 0, nameLength);
      stack.pushExtendCompound(index);
    } else {
      tags.append(tagType, payload, children, nameLength);
    }
  }

  function closeContainer(parent: number): void {
    tags.patchChildren(parent, tags.length - parent - 1);
  }

  try {
    stack.clear();
    stack.pushNamedTag();

    while (!stack.isEmpty) {
      const next = stack.pop();
      switch (next.kind) {
        case ContinuationKind.NamedTag: {
          if (pos + 3 > size)
            throw new ScanError(ScanErrorCode.EndOfBuffer, pos);
          const tagType = buffer[pos];
          nameLength = view.getUint16(pos + 1, littleEndian);
          pos += 3 + nameLength;
          stack.pushScanTag(tagType);
          break;
        }

        case ContinuationKind.ExtendList:
          if (next.remaining === 0) {
            closeContainer(next.parent);
          } else {
            nameLength = 0;
            stack.pushExtendList(next.parent, next.subtype, next.remaining - 1);
            stack.pushScanTag(next.subtype);
          }
          break;

        case ContinuationKind.ExtendCompound:
          if (pos + 1 > size)
            throw new ScanError(ScanErrorCode.EndOfBuffer, pos);
          if (buffer[pos] === TagType.End) {
            pos += 1;
            closeContainer(next.parent);
          } else {
            stack.pushExtendCompound(next.parent);
            stack.pushNamedTag();
          }
          break;

        case ContinuationKind.ScanTag:
          scanTag(next.tagType);
          break;
      }
    }
  } catch (error) {
    tags.release();
    if (error instanceof ScanError && error.offset < 0)
      throw new ScanError(error.code, pos, error.reason);
    throw error;
  }

  return {
    tags,
    count: tags.length,
    native: isNativeByteOrder(byteOrder),
    byteOrder,
    end: pos,
  };
}

export interface ScannerOptions extends ScanOptions {
  /** Continuation stack size in 32-bit slots. */
  stackSize?: number;

  /** Byte order used when scan() is called without one. */
  byteOrder?: ByteOrder;
}

export interface Scanner {
  /**
   * Scan a buffer with this scanner's stack memory. Throws ScanError on
   * malformed input.
   */
  scan(buffer: Uint8Array, byteOrder?: ByteOrder): TagIndex;

  /** Fill a zero-allocation diagnostics state object about the last scan. */
  fillDebugState(state: Partial<ScannerDebugState>): void;
}

/**
 * Debug state interface for zero-allocation diagnostics
 */
export interface ScannerDebugState {
  /** Outcome of the last scan, None when it succeeded or none ran yet. */
  status: ScanErrorCode;

  /** Records produced by the last successful scan. */
  tagCount: number;

  /** End offset of the last scan, or where it failed. */
  offset: number;

  /** Most stack slots in use at once during the last scan. */
  peakStackDepth: number;

  /** Stack size in slots. */
  stackCapacity: number;

  /** Scans run so far by this scanner. */
  scanCount: number;
}

/**
 * Reusable scanner owning its continuation stack memory. Scans on one
 * instance must not overlap; use one scanner per worker.
 */
export function createScanner(options?: ScannerOptions): Scanner {
  const stackMemory = new Uint32Array(options?.stackSize ?? DEFAULT_STACK_SLOTS);
  const stack = createContinuationStack(stackMemory);
  const defaultByteOrder = options?.byteOrder ?? DEFAULT_BYTE_ORDER;
  const vectorOptions: ScanOptions = {
    initialCapacity: options?.initialCapacity,
    maxCapacity: options?.maxCapacity,
  };

  let status: ScanErrorCode = ScanErrorCode.None;
  let tagCount = 0;
  let offset = 0;
  let scanCount = 0;

  function scan(buffer: Uint8Array, byteOrder?: ByteOrder): TagIndex {
    scanCount++;
    try {
      const index = scanWithStack(buffer, byteOrder ?? defaultByteOrder, stack, vectorOptions);
      status = ScanErrorCode.None;
      tagCount = index.count;
      offset = index.end;
      return index;
    } catch (error) {
      if (error instanceof ScanError) {
        status = error.code;
        offset = error.offset;
      }
      tagCount = 0;
      throw error;
    }
  }

  function fillDebugState(state: Partial<ScannerDebugState>): void {
    state.status = status;
    state.tagCount = tagCount;
    state.offset = offset;
    state.peakStackDepth = stack.peakDepth;
    state.stackCapacity = stack.capacity;
    state.scanCount = scanCount;
  }

  return {
    scan,
    fillDebugState,
  };
}
