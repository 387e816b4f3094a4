/**
 * NBT writer - encodes materialized tags into the binary format.
 *
 * Output goes to a single growable byte buffer. Nested tags are written
 * from an explicit work stack, mirroring the scanner, so the writer accepts
 * any value the scanner can produce a stack large enough for.
 */

import { DEFAULT_BYTE_ORDER, type ByteOrder } from './scanner/byte-order.js';
import { TagType, isPackedListSubtype, tagTypeToString } from './scanner/tag-types.js';
import type { NbtTag } from './tag-values.js';

export interface NbtWriter {
  /** Append a named tag, as found at the root of a file or inside a compound. */
  writeNamed(name: string, tag: NbtTag): void;

  /** Copy of the bytes written so far; the writer is reset. */
  finish(): Uint8Array;

  reset(): void;

  /** Bytes written so far. */
  readonly length: number;
}

type WriteStep =
  | { named: string, tag: NbtTag }
  | { named: undefined, tag: NbtTag }
  | { named: undefined, tag: undefined };

const MAX_U16 = 0xFFFF;

const utf8 = new TextEncoder();

export function createNbtWriter(byteOrder: ByteOrder = DEFAULT_BYTE_ORDER, initialSize = 256): NbtWriter {
  const littleEndian = byteOrder === 'little';

  let bytes = new Uint8Array(Math.max(16, initialSize));
  let view = new DataView(bytes.buffer);
  let pos = 0;

  function grow(n: number): void {
    if (pos + n <= bytes.length) return;
    let capacity = bytes.length;
    while (capacity < pos + n) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(bytes.subarray(0, pos));
    bytes = next;
    view = new DataView(bytes.buffer);
  }

  function writeByte(value: number): void { grow(1); view.setInt8(pos, value); pos += 1; }
  function writeUint8(value: number): void { grow(1); bytes[pos++] = value; }
  function writeInt16(value: number): void { grow(2); view.setInt16(pos, value, littleEndian); pos += 2; }
  function writeUint16(value: number): void { grow(2); view.setUint16(pos, value, littleEndian); pos += 2; }
  function writeInt32(value: number): void { grow(4); view.setInt32(pos, value, littleEndian); pos += 4; }
  function writeUint32(value: number): void { grow(4); view.setUint32(pos, value, littleEndian); pos += 4; }
  function writeInt64(value: bigint): void { grow(8); view.setBigInt64(pos, value, littleEndian); pos += 8; }
  function writeFloat32(value: number): void { grow(4); view.setFloat32(pos, value, littleEndian); pos += 4; }
  function writeFloat64(value: number): void { grow(8); view.setFloat64(pos, value, littleEndian); pos += 8; }

  function writeUtf8(value: string, what: string): void {
    const encoded = utf8.encode(value);
    if (encoded.length > MAX_U16)
      throw new Error('NbtWriter: ' + what + ' is ' + encoded.length + ' bytes, the limit is ' + MAX_U16);
    writeUint16(encoded.length);
    grow(encoded.length);
    bytes.set(encoded, pos);
    pos += encoded.length;
  }

  function writeNumber(tag: NbtTag): void {
    switch (tag.type) {
      case TagType.Byte: writeByte(tag.value); return;
      case TagType.Short: writeInt16(tag.value); return;
      case TagType.Int: writeInt32(tag.value); return;
      case TagType.Long: writeInt64(tag.value); return;
      case TagType.Float: writeFloat32(tag.value); return;
      case TagType.Double: writeFloat64(tag.value); return;
    }
    throw new Error('NbtWriter: ' + tagTypeToString(tag.type) + ' is not a numeric tag');
  }

  // Writes the payload of `tag`. Children of containers are pushed onto
  // `steps` instead of being written here.
  function writePayload(tag: NbtTag, steps: WriteStep[]): void {
    switch (tag.type) {
      case TagType.String:
        writeUtf8(tag.value, 'string');
        return;

      case TagType.ByteArray:
        writeUint32(tag.value.length);
        for (const value of tag.value) writeByte(value);
        return;

      case TagType.IntArray:
        writeUint32(tag.value.length);
        for (const value of tag.value) writeInt32(value);
        return;

      case TagType.LongArray:
        writeUint32(tag.value.length);
        for (const value of tag.value) writeInt64(value);
        return;

      case TagType.List: {
        if (tag.subtype === TagType.End && tag.items.length > 0)
          throw new Error('NbtWriter: a list of end tags cannot have items');
        writeUint8(tag.subtype);
        writeUint32(tag.items.length);
        if (isPackedListSubtype(tag.subtype)) {
          for (const item of tag.items) {
            checkListItem(tag.subtype, item);
            writeNumber(item);
          }
        } else {
          for (let k = tag.items.length - 1; k >= 0; k--) {
            checkListItem(tag.subtype, tag.items[k]);
            steps.push({ named: undefined, tag: tag.items[k] });
          }
        }
        return;
      }

      case TagType.Compound: {
        steps.push({ named: undefined, tag: undefined });
        const entries = Array.from(tag.entries);
        for (let k = entries.length - 1; k >= 0; k--)
          steps.push({ named: entries[k][0], tag: entries[k][1] });
        return;
      }

      default:
        writeNumber(tag);
    }
  }

  function checkListItem(subtype: TagType, item: NbtTag): void {
    if (item.type !== subtype)
      throw new Error('NbtWriter: ' + tagTypeToString(item.type) + ' item in a list of ' + tagTypeToString(subtype));
  }

  function writeNamed(name: string, tag: NbtTag): void {
    const steps: WriteStep[] = [{ named: name, tag }];
    while (steps.length > 0) {
      const step = steps.pop();
      if (!step) break;

      if (step.tag === undefined) {
        writeUint8(TagType.End);
        continue;
      }

      if (step.named !== undefined) {
        writeUint8(step.tag.type);
        writeUtf8(step.named, 'name');
      }
      writePayload(step.tag, steps);
    }
  }

  function finish(): Uint8Array {
    const result = bytes.slice(0, pos);
    pos = 0;
    return result;
  }

  function reset(): void {
    pos = 0;
  }

  return {
    writeNamed,
    finish,
    reset,
    get length() { return pos; },
  };
}

/** Encode a root tag with its name. */
export function encodeNbt(name: string, tag: NbtTag, byteOrder: ByteOrder = DEFAULT_BYTE_ORDER): Uint8Array {
  const writer = createNbtWriter(byteOrder);
  writer.writeNamed(name, tag);
  return writer.finish();
}
