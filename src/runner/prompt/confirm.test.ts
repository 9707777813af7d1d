import { afterEach, describe, expect, it } from 'vitest';

import { confirmTokenBurn } from './confirm';

describe('confirmTokenBurn', () => {
  const ttyBackup = process.stdin.isTTY;

  afterEach(() => {
    process.stdin.isTTY = ttyBackup;
  });

  it('accepts without asking under WALLETDESK_YES=1', async () => {
    process.env.WALLETDESK_YES = '1';
    await expect(confirmTokenBurn()).resolves.toBe(true);
  });

  it('keeps the tokens when nobody can answer', async () => {
    process.stdin.isTTY = false;
    await expect(confirmTokenBurn()).resolves.toBe(false);
  });
});
