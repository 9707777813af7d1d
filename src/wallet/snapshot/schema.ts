/* src/wallet/snapshot/schema.ts
 * Zod schema for offline wallet snapshot files (JSON or YAML).
 */
import { z } from 'zod';

import { type Address, parseAddressFor } from '@/wallet/address';
import { AddressError } from '@/wallet/errors';

const prefixSchema = z.enum(['bitcoincash', 'bchtest', 'bchreg']);

const addressSchema = (prefix: z.infer<typeof prefixSchema>) =>
  z.string().transform((s, ctx): Address => {
    try {
      return parseAddressFor(s, prefix);
    } catch (e) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: e instanceof AddressError ? e.message : String(e),
      });
      return z.NEVER;
    }
  });

const rawSnapshotSchema = z
  .object({
    prefix: prefixSchema.default('bitcoincash'),
    unusedAddresses: z.array(z.string()).default([]),
    coins: z
      .array(
        z
          .object({
            txid: z
              .string()
              .regex(/^[0-9a-fA-F]{64}$/, {
                message: 'txid must be 64 hex chars',
              }),
            vout: z.number().int().nonnegative(),
            value: z.number().int().positive(),
            address: z.string(),
            height: z.number().int().nonnegative().default(0),
            coinbase: z.boolean().default(false),
            frozen: z.boolean().default(false),
            token: z.boolean().default(false),
          })
          .strict(),
      )
      .default([]),
  })
  .strict();

/** Parse a snapshot document, resolving every address with the snapshot's prefix. */
export const snapshotSchema = rawSnapshotSchema.transform((raw, ctx) => {
  const toAddress = addressSchema(raw.prefix);
  const parse = (s: string, path: (string | number)[]): Address | null => {
    const r = toAddress.safeParse(s);
    if (r.success) return r.data;
    for (const issue of r.error.issues)
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: issue.message,
        path: [...path, ...issue.path],
      });
    return null;
  };
  const coins = raw.coins.map((c, i) => ({
    ...c,
    txid: c.txid.toLowerCase(),
    address: parse(c.address, ['coins', i, 'address']),
  }));
  const unused = raw.unusedAddresses.map((a, i) =>
    parse(a, ['unusedAddresses', i]),
  );
  return {
    prefix: raw.prefix,
    coins: coins.flatMap((c) =>
      c.address ? [{ ...c, address: c.address }] : [],
    ),
    unusedAddresses: unused.filter((a): a is Address => a !== null),
  };
});

export type WalletSnapshot = z.output<typeof snapshotSchema>;
