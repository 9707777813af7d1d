/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugLog/debugFallback.
 * Tests reference these exact tokens in expectations.
 */

/** cancellable builder (worker loop) */
export const DBG_SCOPE_BUILD = 'build:worker';

/** consolidation session (page changes, status transitions) */
export const DBG_SCOPE_CONSOLIDATE = 'consolidate:session';

/** upload session (signing machine, broadcast loop) */
export const DBG_SCOPE_UPLOAD = 'upload:session';

/** cli config loader */
export const DBG_SCOPE_CLI_CONFIG_LOAD = 'cli.config:load';

/** wallet backend loader */
export const DBG_SCOPE_BACKEND_LOAD = 'wallet.backend:load';
