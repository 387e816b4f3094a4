/**
 * Tag Traversal Infrastructure
 *
 * Visitor-based walks over a scanned index. The walk moves through the flat
 * record array; skipping a container jumps past its descendant count instead
 * of visiting each record.
 */

import { TagType } from './scanner/tag-types.js';
import type { TagReader } from './tag-reader.js';

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

/**
 * Context passed to every visitor call.
 */
export interface VisitContext {
  reader: TagReader;

  /** Record index of the enclosing container, -1 at the walk's start record. */
  parent: number;

  /** Nesting depth relative to the start record. */
  depth: number;
}

/**
 * Visitor with optional methods per tag family. visitTag is the fallback
 * for families without a method. Returning nothing means Continue.
 */
export interface TagVisitor {
  visitTag?(i: number, context: VisitContext): VisitResult | void;
  visitCompound?(i: number, context: VisitContext): VisitResult | void;
  visitList?(i: number, context: VisitContext): VisitResult | void;
  visitString?(i: number, context: VisitContext): VisitResult | void;
  visitArray?(i: number, context: VisitContext): VisitResult | void;
  visitNumber?(i: number, context: VisitContext): VisitResult | void;
}

function callVisitorMethod(i: number, visitor: TagVisitor, context: VisitContext): VisitResult {
  let result: VisitResult | void;
  switch (context.reader.type(i)) {
    case TagType.Compound:
      result = visitor.visitCompound ? visitor.visitCompound(i, context) : visitor.visitTag?.(i, context);
      break;
    case TagType.List:
      result = visitor.visitList ? visitor.visitList(i, context) : visitor.visitTag?.(i, context);
      break;
    case TagType.String:
      result = visitor.visitString ? visitor.visitString(i, context) : visitor.visitTag?.(i, context);
      break;
    case TagType.ByteArray:
    case TagType.IntArray:
    case TagType.LongArray:
      result = visitor.visitArray ? visitor.visitArray(i, context) : visitor.visitTag?.(i, context);
      break;
    default:
      result = visitor.visitNumber ? visitor.visitNumber(i, context) : visitor.visitTag?.(i, context);
      break;
  }
  return typeof result === 'number' ? result : VisitResult.Continue;
}

/**
 * Walk the subtree of `start` in pre-order.
 *
 * @returns Stop if a visitor stopped the walk, Continue otherwise
 */
export function walkTags(reader: TagReader, visitor: TagVisitor, start = 0): VisitResult {
  const last = start + reader.descendants(start);
  const open: number[] = [];
  const context: VisitContext = { reader, parent: -1, depth: 0 };

  let i = start;
  while (i <= last) {
    while (open.length > 0 && reader.nextSibling(open[open.length - 1]) <= i)
      open.pop();

    context.parent = open.length > 0 ? open[open.length - 1] : -1;
    context.depth = open.length;

    const result = callVisitorMethod(i, visitor, context);
    if (result === VisitResult.Stop)
      return VisitResult.Stop;

    if (result === VisitResult.Skip || reader.descendants(i) === 0) {
      i = reader.nextSibling(i);
    } else {
      open.push(i);
      i++;
    }
  }

  return VisitResult.Continue;
}

/**
 * Record indices of every tag of `type` in the subtree of `start`.
 * Elements of packed numeric lists have no records and are not included.
 */
export function collectTags(reader: TagReader, type: TagType, start = 0): number[] {
  const found: number[] = [];
  walkTags(reader, {
    visitTag(i) {
      if (reader.type(i) === type) found.push(i);
    }
  }, start);
  return found;
}

/**
 * Deepest nesting of the subtree of `start`, counting containers on the path
 * (a lone scalar is 0).
 */
export function maxContainerDepth(reader: TagReader, start = 0): number {
  let deepest = 0;
  walkTags(reader, {
    visitTag(i, context) {
      const type = reader.type(i);
      if (type === TagType.Compound || type === TagType.List) {
        if (context.depth + 1 > deepest) deepest = context.depth + 1;
      }
    }
  }, start);
  return deepest;
}
