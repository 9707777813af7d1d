import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  assertUploadSize,
  buildMetadata,
  expectedTransactionCount,
  readUploadFile,
  sha256Hex,
  splitChunks,
  validatePreviousHash,
} from './file';

const ABC_SHA256 =
  'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('upload file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'walletdesk-file-'));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the bytes and hashes them', async () => {
    const p = path.join(dir, 'report.final.txt');
    await writeFile(p, 'abc');
    const file = await readUploadFile(p);
    expect(file.bytes.length).toBe(3);
    expect(file.sha256).toBe(ABC_SHA256);
    expect(buildMetadata(file, null)).toEqual({
      filename: 'report.final',
      fileext: '.txt',
      filesize: 3,
      fileSha256: ABC_SHA256,
      prevFileSha256: null,
      uri: null,
    });
  });

  it('hashes raw bytes', () => {
    expect(sha256Hex(new TextEncoder().encode('abc'))).toBe(ABC_SHA256);
  });

  it('limits the file size', () => {
    expect(() => {
      assertUploadSize(5261);
    }).not.toThrow();
    expect(() => {
      assertUploadSize(5262);
    }).toThrow('Files cannot be larger than 5.261kB in size.');
  });

  it('accepts an empty or 64-hex previous hash', () => {
    expect(validatePreviousHash('  ')).toBeNull();
    expect(validatePreviousHash(ABC_SHA256.toUpperCase())).toBe(ABC_SHA256);
    expect(() => validatePreviousHash('abc')).toThrow(
      'Previous document hash must be a 32 byte hexadecimal string or left empty.',
    );
  });

  it('splits into 220-byte chunks', () => {
    expect(splitChunks(new Uint8Array(450)).map((c) => c.length)).toEqual([
      220, 220, 10,
    ]);
    expect(splitChunks(new Uint8Array(440)).map((c) => c.length)).toEqual([
      220, 220,
    ]);
    expect(splitChunks(new Uint8Array(0))).toEqual([]);
  });

  it('counts funding, chunk and overflow transactions', () => {
    expect(expectedTransactionCount(100, 50)).toBe(2);
    expect(expectedTransactionCount(200, 50)).toBe(3);
    expect(expectedTransactionCount(440, 50)).toBe(3);
    expect(expectedTransactionCount(500, 0)).toBe(4);
    expect(expectedTransactionCount(450, 230)).toBe(5);
  });
});
