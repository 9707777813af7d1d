/* src/wallet/backend.ts
 * Resolve the configured wallet backend: the offline snapshot backend, or a
 * module exporting `createBackend(options)`.
 */
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { resolveNamedOrDefaultFunction } from '@/common/interop/resolve';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_BACKEND_LOAD } from '@/runner/util/debug-scopes';

import { ValidationError } from './errors';
import { createSnapshotBackend, loadSnapshot } from './snapshot';
import type { WalletBackend } from './types';

export type BackendConfig =
  | { kind: 'snapshot'; file: string }
  | { kind: 'module'; module: string; options?: Record<string, unknown> };

const isObject = (v: unknown): v is object =>
  v !== null && (typeof v === 'object' || typeof v === 'function');

const hasFunction = (v: object, key: string): boolean =>
  typeof Reflect.get(v, key) === 'function';

/** Shape check for backends produced by third-party modules. */
export const isWalletBackend = (v: unknown): v is WalletBackend => {
  if (!isObject(v)) return false;
  if (typeof Reflect.get(v, 'name') !== 'string') return false;
  if (
    !['consolidate', 'getUnusedAddress', 'sign', 'broadcast'].every((k) =>
      hasFunction(v, k),
    )
  )
    return false;
  const files: unknown = Reflect.get(v, 'files');
  if (files === undefined) return true;
  return (
    isObject(files) &&
    [
      'calculateUploadCost',
      'metadataScriptLength',
      'fundingTransaction',
      'uploadTransaction',
    ].every((k) => hasFunction(files, k))
  );
};

/** Relative module paths resolve against `cwd`; bare specifiers import as is. */
const toSpecifier = (spec: string, cwd: string): string =>
  spec.startsWith('.') || path.isAbsolute(spec)
    ? pathToFileURL(path.resolve(cwd, spec)).href
    : spec;

export const loadBackend = async (
  config: BackendConfig,
  cwd: string,
): Promise<WalletBackend> => {
  if (config.kind === 'snapshot') {
    const file = path.resolve(cwd, config.file);
    debugLog(DBG_SCOPE_BACKEND_LOAD, `snapshot ${file}`);
    return createSnapshotBackend(await loadSnapshot(file));
  }
  const specifier = toSpecifier(config.module, cwd);
  debugLog(DBG_SCOPE_BACKEND_LOAD, `module ${specifier}`);
  const mod: unknown = await import(specifier);
  const create = resolveNamedOrDefaultFunction(
    mod,
    'createBackend',
    config.module,
  );
  const backend: unknown = await create(config.options ?? {});
  if (!isWalletBackend(backend)) {
    throw new ValidationError(
      `${config.module}: createBackend() did not return a wallet backend`,
    );
  }
  return backend;
};
