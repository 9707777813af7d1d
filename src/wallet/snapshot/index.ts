/* src/wallet/snapshot/index.ts
 * Read-only backend over a wallet snapshot file. Plans consolidations;
 * signing, broadcasting and file uploads need a live wallet backend.
 */
import { readFile } from 'node:fs/promises';

import { ZodError } from 'zod';

import { parseText } from '@/common/config/parse';
import { formatZodError } from '@/common/config/zod';
import { UnsupportedOperationError, ValidationError } from '@/wallet/errors';
import type { WalletBackend } from '@/wallet/types';

import { consolidationTransactions } from './consolidator';
import { snapshotSchema, type WalletSnapshot } from './schema';

export const loadSnapshot = async (file: string): Promise<WalletSnapshot> => {
  const text = await readFile(file, 'utf8');
  try {
    return snapshotSchema.parse(parseText(file, text));
  } catch (e) {
    if (e instanceof ZodError) {
      throw new ValidationError(
        `invalid wallet snapshot ${file.replace(/\\/g, '/')}\n${formatZodError(e)}`,
      );
    }
    throw e;
  }
};

export const createSnapshotBackend = (
  snapshot: WalletSnapshot,
): WalletBackend => {
  const unused = [...snapshot.unusedAddresses];
  const readOnly = (what: string): UnsupportedOperationError =>
    new UnsupportedOperationError(
      `the snapshot backend cannot ${what}; configure a wallet backend module`,
    );
  return {
    name: 'snapshot',
    prefix: snapshot.prefix,
    consolidate: (request) =>
      consolidationTransactions(snapshot.coins, request),
    getUnusedAddress: () => {
      const next = unused[0];
      return next
        ? Promise.resolve(next)
        : Promise.reject(readOnly('derive new addresses'));
    },
    sign: () => Promise.reject(readOnly('sign transactions')),
    broadcast: () => Promise.reject(readOnly('broadcast transactions')),
  };
};
