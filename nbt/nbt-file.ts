import { readFile, writeFile } from 'fs/promises';
import { gunzipSync, gzipSync } from 'zlib';

import { encodeNbt } from './nbt-writer.js';
import { DEFAULT_BYTE_ORDER, type ByteOrder } from './scanner/byte-order.js';
import { createScanner, type ScannerOptions, type TagIndex } from './scanner/scanner.js';
import { createTagReader, type TagReader } from './tag-reader.js';
import type { NbtTag } from './tag-values.js';

export interface NbtDocument {
  /** Uncompressed bytes the index refers to. */
  buffer: Uint8Array;
  index: TagIndex;
  reader: TagReader;
  gzipped: boolean;
  byteOrder: ByteOrder;
}

export interface ParseOptions extends ScannerOptions {
  /**
   * Whether the input is gzip-compressed. Detected from the magic number
   * when left out.
   */
  gzipped?: boolean;
}

export interface SaveOptions {
  gzipped?: boolean;
  byteOrder?: ByteOrder;
}

export function isGzipped(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1F && bytes[1] === 0x8B;
}

/**
 * Decompress when needed and scan. zlib errors propagate as thrown by
 * node:zlib; malformed NBT throws ScanError.
 */
export function parseNbt(bytes: Uint8Array, options?: ParseOptions): NbtDocument {
  const gzipped = options?.gzipped ?? isGzipped(bytes);
  const buffer = gzipped ? new Uint8Array(gunzipSync(bytes)) : bytes;
  const byteOrder = options?.byteOrder ?? DEFAULT_BYTE_ORDER;

  const index = createScanner(options).scan(buffer, byteOrder);
  return {
    buffer,
    index,
    reader: createTagReader(buffer, index),
    gzipped,
    byteOrder,
  };
}

export async function loadNbt(path: string, options?: ParseOptions): Promise<NbtDocument> {
  const bytes = await readFile(path);
  return parseNbt(bytes, options);
}

export function serializeNbt(name: string, tag: NbtTag, options?: SaveOptions): Uint8Array {
  const encoded = encodeNbt(name, tag, options?.byteOrder ?? DEFAULT_BYTE_ORDER);
  return options?.gzipped ? new Uint8Array(gzipSync(encoded)) : encoded;
}

export async function saveNbt(path: string, name: string, tag: NbtTag, options?: SaveOptions): Promise<void> {
  await writeFile(path, serializeNbt(name, tag, options));
}
