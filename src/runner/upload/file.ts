/* src/runner/upload/file.ts
 * Upload file loading, validation and chunking.
 */
import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ValidationError } from '@/wallet/errors';
import type { FileMetadata } from '@/wallet/types';

export const MAX_UPLOAD_FILE_SIZE = 5261;
export const CHUNK_SIZE = 220;
/** Data capacity of the closing metadata transaction before its script. */
export const METADATA_TX_CAPACITY = 223;

export type UploadFile = {
  path: string;
  bytes: Uint8Array;
  sha256: string;
};

export const sha256Hex = (bytes: Uint8Array): string =>
  createHash('sha256').update(bytes).digest('hex');

export const readUploadFile = async (file: string): Promise<UploadFile> => {
  const bytes = new Uint8Array(await readFile(file));
  return { path: file, bytes, sha256: sha256Hex(bytes) };
};

export const assertUploadSize = (size: number): void => {
  if (size > MAX_UPLOAD_FILE_SIZE) {
    throw new ValidationError('Files cannot be larger than 5.261kB in size.');
  }
};

/** Previous-file hash: empty, or 64 hex characters. */
export const validatePreviousHash = (text: string): string | null => {
  const t = text.trim();
  if (t === '') return null;
  if (!/^[0-9a-fA-F]{64}$/.test(t)) {
    throw new ValidationError(
      'Previous document hash must be a 32 byte hexadecimal string or left empty.',
    );
  }
  return t.toLowerCase();
};

export const splitChunks = (
  bytes: Uint8Array,
  size: number = CHUNK_SIZE,
): Uint8Array[] => {
  const out: Uint8Array[] = [];
  for (let i = 0; i < bytes.length; i += size) {
    out.push(bytes.subarray(i, i + size));
  }
  return out;
};

export const buildMetadata = (
  file: UploadFile,
  prevFileSha256: string | null,
): FileMetadata => {
  const { name, ext } = path.parse(path.basename(file.path));
  return {
    filename: name,
    fileext: ext,
    filesize: file.bytes.length,
    fileSha256: file.sha256,
    prevFileSha256,
    uri: null,
  };
};

/**
 * Transactions the upload is expected to need: funding, one per chunk, plus
 * one when the final metadata transaction cannot carry the last chunk.
 */
export const expectedTransactionCount = (
  filesize: number,
  metadataScriptLength: number,
): number => {
  const chunks = Math.ceil(filesize / CHUNK_SIZE);
  const minLen = METADATA_TX_CAPACITY - metadataScriptLength;
  const adder =
    filesize < CHUNK_SIZE
      ? filesize > minLen
        ? 1
        : 0
      : minLen - (filesize % CHUNK_SIZE) < 0
        ? 1
        : 0;
  return chunks + adder + 1;
};
