/* src/runner/util/debug.ts
 * Centralized, opt-in debug logger.
 * Emits only when WALLETDESK_DEBUG=1 to avoid noisy output in normal mode.
 */

export const debugOn = (): boolean => process.env.WALLETDESK_DEBUG === '1';

/** Log a concise debug notice under WALLETDESK_DEBUG=1 (scope: module:function). */
export const debugLog = (scope: string, message: string): void => {
  if (!debugOn()) return;
  // stderr to keep separation from normal output
  console.error(`walletdesk: debug: ${scope}: ${message}`);
};

/** Log a fallback path taken (config missing, defaults applied, ...). */
export const debugFallback = (scope: string, reason: string): void => {
  debugLog(scope, `fallback: ${reason}`);
};
