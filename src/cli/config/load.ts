/* src/cli/config/load.ts
 * Load and validate walletdesk configuration from walletdesk.config.*
 * (top-level "walletdesk").
 */
import { existsSync, readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { type CliConfig, cliConfigSchema } from '@/cli/config/schema';
import { parseText } from '@/common/config/parse';
import { formatZodError } from '@/common/config/zod';
import { debugFallback, debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CLI_CONFIG_LOAD } from '@/runner/util/debug-scopes';
import { ValidationError } from '@/wallet/errors';

export const CONFIG_NAMESPACE = 'walletdesk';
export const CONFIG_FILES = [
  'walletdesk.config.yml',
  'walletdesk.config.yaml',
  'walletdesk.config.json',
] as const;

export type LoadedCliConfig = CliConfig & { path: string | null };

const EMPTY = (): LoadedCliConfig => ({
  ...cliConfigSchema.parse({}),
  path: null,
});

/** First config file present in `cwd`, or null. */
export const findConfigPathSync = (cwd: string): string | null => {
  for (const name of CONFIG_FILES) {
    const p = path.join(cwd, name);
    if (existsSync(p)) return p;
  }
  return null;
};

const pickNamespace = (root: unknown): unknown => {
  if (root === null || typeof root !== 'object') return undefined;
  return Reflect.get(root, CONFIG_NAMESPACE);
};

const parseCliNode = (text: string, cfgPath: string): LoadedCliConfig => {
  const rel = cfgPath.replace(/\\/g, '/');
  const node = pickNamespace(parseText(cfgPath, text));
  if (node === undefined) {
    debugFallback(
      DBG_SCOPE_CLI_CONFIG_LOAD,
      `no "${CONFIG_NAMESPACE}" key in ${rel}; using defaults`,
    );
    return { ...EMPTY(), path: cfgPath };
  }
  const parsed = cliConfigSchema.safeParse(node);
  if (!parsed.success) {
    throw new ValidationError(
      `invalid config in ${rel}\n${formatZodError(parsed.error)}`,
    );
  }
  debugLog(DBG_SCOPE_CLI_CONFIG_LOAD, `loaded ${rel}`);
  return { ...parsed.data, path: cfgPath };
};

export const loadCliConfig = async (cwd: string): Promise<LoadedCliConfig> => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) {
    debugFallback(DBG_SCOPE_CLI_CONFIG_LOAD, `no config in ${cwd}`);
    return EMPTY();
  }
  return parseCliNode(await readFile(cfgPath, 'utf8'), cfgPath);
};

/** Synchronous variant for CLI construction/help default tagging. */
export const loadCliConfigSync = (cwd: string): LoadedCliConfig => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) return EMPTY();
  return parseCliNode(readFileSync(cfgPath, 'utf8'), cfgPath);
};
