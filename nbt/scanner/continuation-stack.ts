import { ScanError, ScanErrorCode } from './scan-error.js';

/**
 * Pending unit of scan work.
 *
 * Tag type bytes are carried as read from the buffer, so a ScanTag entry may
 * hold a value that is not a valid tag type. The scanner rejects it when the
 * entry is popped.
 */
export type Continuation =
  | { kind: ContinuationKind.ScanTag, tagType: number }
  | { kind: ContinuationKind.NamedTag }
  | { kind: ContinuationKind.ExtendList, parent: number, subtype: number, remaining: number }
  | { kind: ContinuationKind.ExtendCompound, parent: number };

export const enum ContinuationKind {
  /** Scan an unnamed tag of a given type at the cursor. */
  ScanTag = 0,

  /** Read a type byte and a name, then scan the tag. */
  NamedTag = 1 << 8,

  /** Collect the next element of a list, or close it. */
  ExtendList = 2 << 8,

  /** Collect the next named child of a compound, or close it at the end marker. */
  ExtendCompound = 3 << 8,
}

/** Slots taken by each entry kind in the backing memory. */
export const enum ContinuationSlots {
  ScanTag = 1,
  NamedTag = 1,
  ExtendList = 4,
  ExtendCompound = 2,
}

export interface ContinuationStack {
  pushScanTag(tagType: number): void;
  pushNamedTag(): void;
  pushExtendList(parent: number, subtype: number, remaining: number): void;
  pushExtendCompound(parent: number): void;

  /** Remove and return the most recently pushed entry. */
  pop(): Continuation;

  clear(): void;

  readonly isEmpty: boolean;

  /** Slots currently in use. */
  readonly depth: number;

  /** Highest number of slots in use since the last clear(). */
  readonly peakDepth: number;

  /** Total slots available in the backing memory. */
  readonly capacity: number;
}

/**
 * Bounded LIFO stack over caller-owned memory. One 32-bit slot per word;
 * list and compound entries keep their arguments in the slots below the
 * opcode slot.
 *
 * Overflow throws ScanError(DepthExceeded) with offset -1, the scanner
 * reports the buffer position.
 */
export function createContinuationStack(memory: Uint32Array): ContinuationStack {
  const capacity = memory.length;
  let count = 0;
  let peak = 0;

  function reserve(slots: number): void {
    if (count + slots > capacity)
      throw new ScanError(ScanErrorCode.DepthExceeded, -1);
    if (count + slots > peak) peak = count + slots;
  }

  function pushScanTag(tagType: number): void {
    reserve(ContinuationSlots.ScanTag);
    memory[count++] = tagType & 0xFF;
  }

  function pushNamedTag(): void {
    reserve(ContinuationSlots.NamedTag);
    memory[count++] = ContinuationKind.NamedTag;
  }

  function pushExtendList(parent: number, subtype: number, remaining: number): void {
    reserve(ContinuationSlots.ExtendList);
    memory[count++] = parent;
    memory[count++] = subtype;
    memory[count++] = remaining;
    memory[count++] = ContinuationKind.ExtendList;
  }

  function pushExtendCompound(parent: number): void {
    reserve(ContinuationSlots.ExtendCompound);
    memory[count++] = parent;
    memory[count++] = ContinuationKind.ExtendCompound;
  }

  function pop(): Continuation {
    if (count === 0)
      throw new Error('ContinuationStack: pop from empty stack');

    const op = memory[--count];
    switch (op) {
      case ContinuationKind.NamedTag:
        return { kind: ContinuationKind.NamedTag };

      case ContinuationKind.ExtendList: {
        const remaining = memory[--count];
        const subtype = memory[--count];
        const parent = memory[--count];
        return { kind: ContinuationKind.ExtendList, parent, subtype, remaining };
      }

      case ContinuationKind.ExtendCompound: {
        const parent = memory[--count];
        return { kind: ContinuationKind.ExtendCompound, parent };
      }

      default:
        return { kind: ContinuationKind.ScanTag, tagType: op };
    }
  }

  function clear(): void {
    count = 0;
    peak = 0;
  }

  return {
    pushScanTag,
    pushNamedTag,
    pushExtendList,
    pushExtendCompound,
    pop,
    clear,
    get isEmpty() { return count === 0; },
    get depth() { return count; },
    get peakDepth() { return peak; },
    capacity,
  };
}

/**
 * Slots that always suffice for input whose deepest path crosses `depth`
 * containers, the root included (a lone root scalar is depth 0).
 *
 * An open list holds 4 slots and an open compound 2, plus one slot for the
 * innermost pending tag. Inputs nesting only compounds need fewer.
 */
export function minimumStackSlots(depth: number): number {
  return depth * ContinuationSlots.ExtendList + ContinuationSlots.NamedTag;
}
