// src/cli/context.ts
import { type LoadedCliConfig, loadCliConfig } from '@/cli/config/load';
import { type AddressPrefix, NETWORK_PREFIX } from '@/wallet/address';
import { type BackendConfig, loadBackend } from '@/wallet/backend';
import { ValidationError } from '@/wallet/errors';
import type { WalletBackend } from '@/wallet/types';

export type CommandContext = {
  cwd: string;
  config: LoadedCliConfig;
  backend: WalletBackend;
  /** Prefix assumed for addresses entered without one. */
  prefix: AddressPrefix;
};

/**
 * Load config and the wallet backend for a command.
 * `--snapshot <file>` overrides the configured backend.
 */
export const resolveCommandContext = async (
  cwd: string,
  opts: { snapshot?: string },
): Promise<CommandContext> => {
  const config = await loadCliConfig(cwd);
  const backendConfig: BackendConfig | undefined = opts.snapshot
    ? { kind: 'snapshot', file: opts.snapshot }
    : config.backend;
  if (!backendConfig) {
    throw new ValidationError(
      'no wallet backend configured; set walletdesk.backend in walletdesk.config.yml or pass --snapshot <file>',
    );
  }
  const backend = await loadBackend(backendConfig, cwd);
  return {
    cwd,
    config,
    backend,
    prefix: backend.prefix ?? NETWORK_PREFIX[config.network],
  };
};
