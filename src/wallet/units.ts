/* src/wallet/units.ts
 * Coin amount conversion between display units (BCH) and integer satoshis.
 */
import BigNumber from 'bignumber.js';

import { ValidationError } from './errors';

export const COIN_UNIT = 'BCH';
export const SATS_PER_COIN = 100_000_000;
export const COIN_DECIMALS = 8;
/** Largest amount accepted by amount inputs, in display units. */
export const MAX_COIN_AMOUNT = 21_000_000;
export const DUST_THRESHOLD = 546;

const MAX_SATS = new BigNumber(MAX_COIN_AMOUNT).shiftedBy(COIN_DECIMALS);

/** Parse a decimal display amount (e.g. "0.00000546") into satoshis. */
export const parseCoinAmount = (text: string): number => {
  const s = text.trim();
  // plain decimal notation only; BigNumber alone would take "1e3" or "0x10"
  if (!/^\d+(?:\.\d*)?$/.test(s)) {
    throw new ValidationError(`invalid amount "${text}"`);
  }
  const amount = new BigNumber(s);
  const places = amount.decimalPlaces() ?? 0;
  if (places > COIN_DECIMALS) {
    throw new ValidationError(
      `amount "${text}" has more than ${String(COIN_DECIMALS)} decimals`,
    );
  }
  const sats = amount.shiftedBy(COIN_DECIMALS);
  if (sats.isGreaterThan(MAX_SATS)) {
    throw new ValidationError(
      `amount "${text}" exceeds ${String(MAX_COIN_AMOUNT)} ${COIN_UNIT}`,
    );
  }
  return sats.toNumber();
};

/** Format satoshis as a fixed 8-decimal display amount. */
export const formatSats = (sats: number): string =>
  new BigNumber(Math.trunc(sats))
    .shiftedBy(-COIN_DECIMALS)
    .toFixed(COIN_DECIMALS);
