/**
 * SNBT serializer - renders materialized tags as the text literal format.
 *
 *   {name:"level",spawn:[I;0,64,0],time:24000L,ratio:0.5d}
 *
 * Containers are expanded from an explicit step stack, like the binary
 * writer, so nesting depth is not limited by the call stack.
 */

import { TagType, tagTypeToString } from './scanner/tag-types.js';
import type { TagReader } from './tag-reader.js';
import type { NbtTag } from './tag-values.js';

// Keys made only of these characters are written without quotes.
const UNQUOTED_KEY = /^[a-zA-Z0-9._+-]+$/;

export function escapeString(value: string): string {
  return '"' + value.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"';
}

export function stringifyCompoundKey(key: string): string {
  return UNQUOTED_KEY.test(key) ? key : escapeString(key);
}

// Integral values keep a fractional part so they read back as floating point.
function formatFloat(value: number): string {
  if (Object.is(value, -0)) return '-0.0';
  if (Number.isInteger(value) && Math.abs(value) < 1e16) return value + '.0';
  return String(value);
}

function arrayLiteral(prefix: string, values: Iterable<number | bigint>, suffix: string): string {
  const elements: string[] = [];
  for (const value of values) elements.push(value + suffix);
  return '[' + prefix + ';' + elements.join(',') + ']';
}

function scalarLiteral(tag: NbtTag): string {
  switch (tag.type) {
    case TagType.Byte: return tag.value + 'b';
    case TagType.Short: return tag.value + 's';
    case TagType.Int: return String(tag.value);
    case TagType.Long: return tag.value + 'L';
    case TagType.Float: return formatFloat(tag.value) + 'f';
    case TagType.Double: return formatFloat(tag.value) + 'd';
    case TagType.String: return escapeString(tag.value);
    case TagType.ByteArray: return arrayLiteral('B', tag.value, 'b');
    case TagType.IntArray: return arrayLiteral('I', tag.value, '');
    case TagType.LongArray: return arrayLiteral('L', tag.value, 'L');
  }
  throw new Error('SnbtSerializer: ' + tagTypeToString(tag.type) + ' is not a scalar tag');
}

/** Render a tag as SNBT. */
export function serializeTag(tag: NbtTag): string {
  const out: string[] = [];

  // Strings are emitted as they are, tags are expanded.
  const steps: (string | NbtTag)[] = [tag];
  while (steps.length > 0) {
    const step = steps.pop();
    if (step === undefined) break;

    if (typeof step === 'string') {
      out.push(step);
      continue;
    }

    switch (step.type) {
      case TagType.List: {
        out.push('[');
        steps.push(']');
        for (let k = step.items.length - 1; k >= 0; k--) {
          steps.push(step.items[k]);
          if (k > 0) steps.push(',');
        }
        break;
      }

      case TagType.Compound: {
        out.push('{');
        steps.push('}');
        const entries = Array.from(step.entries);
        for (let k = entries.length - 1; k >= 0; k--) {
          steps.push(entries[k][1]);
          steps.push(stringifyCompoundKey(entries[k][0]) + ':');
          if (k > 0) steps.push(',');
        }
        break;
      }

      default:
        out.push(scalarLiteral(step));
    }
  }

  return out.join('');
}

/** Render a scanned record and its subtree as SNBT. */
export function serializeRecord(reader: TagReader, i: number): string {
  return serializeTag(reader.unpack(i));
}
