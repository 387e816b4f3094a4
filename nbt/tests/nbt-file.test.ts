/**
 * File layer: gzip detection, parse and save round trips
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import {
  ScanError,
  ScanErrorCode,
  TagType,
  compoundTag,
  intTag,
  isGzipped,
  listTag,
  loadNbt,
  longTag,
  parseNbt,
  saveNbt,
  serializeNbt,
  stringTag
} from '../index.js';

const level = compoundTag([
  ['name', stringTag('test-level')],
  ['time', longTag(24000n)],
  ['spawn', listTag(TagType.Int, [intTag(0), intTag(64), intTag(0)])],
]);

describe('parseNbt', () => {
  test('reads uncompressed bytes in place', () => {
    const encoded = serializeNbt('Data', level);
    const document = parseNbt(encoded);

    expect(document.gzipped).toBe(false);
    expect(document.buffer).toBe(encoded);
    expect(document.byteOrder).toBe('big');
    expect(document.index.count).toBe(4);
    expect(document.reader.root()).toEqual({ name: 'Data', tag: level });
  });

  test('detects and inflates gzip input', () => {
    const compressed = serializeNbt('Data', level, { gzipped: true });
    expect(isGzipped(compressed)).toBe(true);

    const document = parseNbt(compressed);
    expect(document.gzipped).toBe(true);
    expect(document.reader.root()).toEqual({ name: 'Data', tag: level });
  });

  test('honours the byte order option', () => {
    const encoded = serializeNbt('', level, { byteOrder: 'little' });
    const document = parseNbt(encoded, { byteOrder: 'little' });

    expect(document.byteOrder).toBe('little');
    expect(document.reader.unpack(0)).toEqual(level);
  });

  test('treats compressed bytes as NBT when told they are not gzip', () => {
    const compressed = serializeNbt('', level, { gzipped: true });
    // 0x1F is read as the root tag type
    expect(() => parseNbt(compressed, { gzipped: false })).toThrow(ScanError);
  });

  test('passes scanner limits through', () => {
    const encoded = serializeNbt('', level);
    let error: unknown;
    try {
      parseNbt(encoded, { stackSize: 2 });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ScanError);
    expect(error).toMatchObject({ code: ScanErrorCode.DepthExceeded });
  });

  test('corrupt gzip data fails in zlib', () => {
    expect(() => parseNbt(new Uint8Array([0x1F, 0x8B, 0, 0]))).toThrow();
  });

  test('isGzipped needs both magic bytes', () => {
    expect(isGzipped(new Uint8Array([0x1F]))).toBe(false);
    expect(isGzipped(new Uint8Array([0x0A, 0x8B]))).toBe(false);
  });
});

describe('loadNbt and saveNbt', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'nbt-index-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  test('round trip a compressed file', async () => {
    const path = join(directory, 'level.dat');
    await saveNbt(path, 'Data', level, { gzipped: true });

    const raw = await readFile(path);
    expect(isGzipped(raw)).toBe(true);

    const document = await loadNbt(path);
    expect(document.gzipped).toBe(true);
    expect(document.reader.name(0)).toBe('Data');
    expect(document.reader.unpack(0)).toEqual(level);
  });

  test('round trip an uncompressed little-endian file', async () => {
    const path = join(directory, 'level.nbt');
    await saveNbt(path, '', level, { byteOrder: 'little' });

    const document = await loadNbt(path, { byteOrder: 'little' });
    expect(document.gzipped).toBe(false);
    expect(document.reader.unpack(0)).toEqual(level);
  });
});
