// src/runner/prompt/confirm.ts
/**
 * Token-burn confirmation prompt.
 * - TTY-aware; non-TTY returns false (keep tokens safe).
 * - Honors WALLETDESK_YES=1 to auto-accept.
 * - Non-BORING mode dims the choices suffix (y/N); BORING shows plain text.
 */
import readline from 'node:readline';

import { dim, isBoring, warn } from '@/runner/util/color';

export const TOKEN_BURN_WARNING =
  'Including coins with tokens will burn the tokens. Continue?';

/** Return true to include token-bearing coins; false to back out. */
export const confirmTokenBurn = async (): Promise<boolean> => {
  if (process.env.WALLETDESK_YES === '1') return true;
  if (!process.stdin.isTTY || !process.stdout.isTTY) return false;

  const token = isBoring() ? '[WARN]' : warn('⚠︎');
  const msg = `walletdesk: ${token} ${TOKEN_BURN_WARNING} ${dim('(y/N)')} `;

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const a = await new Promise<string>((res) => {
    rl.question(msg, (answer) => {
      res(answer);
    });
  });
  rl.close();
  // Default No: only an explicit yes includes the tokens.
  return /^[yY]/.test(a.trim());
};
