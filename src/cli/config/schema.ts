/* src/cli/config/schema.ts
 * Zod schemas for walletdesk configuration (top-level "walletdesk").
 */
import { z } from 'zod';

import { toBool } from '@/common/config/zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => toBool(v))
  .optional();

const backendSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('snapshot'),
      file: z.string().min(1, { message: 'file must be a non-empty string' }),
    })
    .strict(),
  z
    .object({
      kind: z.literal('module'),
      module: z
        .string()
        .min(1, { message: 'module must be a non-empty string' }),
      options: z.record(z.string(), z.unknown()).optional(),
    })
    .strict(),
]);

const amountSchema = z.union([z.string(), z.number()]).transform(String);

const cliDefaultsConsolidateSchema = z
  .object({
    coinbase: coerceBool,
    nonCoinbase: coerceBool,
    frozen: coerceBool,
    tokens: coerceBool,
    minimum: amountSchema.optional(),
    maximum: amountSchema.optional(),
    maxTxSize: z.coerce.number().int().positive().optional(),
    broadcastDelay: z.coerce.number().int().nonnegative().optional(),
    live: coerceBool,
  })
  .strict()
  .optional();

const cliDefaultsUploadSchema = z
  .object({
    broadcastDelay: z.coerce.number().int().nonnegative().optional(),
    copy: coerceBool,
  })
  .strict()
  .optional();

export const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
    consolidate: cliDefaultsConsolidateSchema,
    upload: cliDefaultsUploadSchema,
  })
  .strict()
  .optional();
export type CliDefaults = z.infer<typeof cliDefaultsSchema>;

export const cliConfigSchema = z
  .object({
    backend: backendSchema.optional(),
    network: z.enum(['mainnet', 'testnet', 'regtest']).default('mainnet'),
    cliDefaults: cliDefaultsSchema,
  })
  .strict();
export type CliConfig = z.infer<typeof cliConfigSchema>;
