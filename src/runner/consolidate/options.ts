/* src/runner/consolidate/options.ts
 * Input collection for the consolidation wizard. Everything here throws
 * ValidationError before a build is started.
 */
import type { Address, AddressPrefix } from '@/wallet/address';
import { parseAddressFor, tryParseAddress } from '@/wallet/address';
import { ValidationError } from '@/wallet/errors';
import type { CoinFilter } from '@/wallet/types';
import { parseCoinAmount } from '@/wallet/units';

export const MIN_TX_SIZE = 192;
export const MAX_TX_SIZE = 1_000_000;
export const MAX_STANDARD_TX_SIZE = 100_000;

/** Display values offered when a bound is enabled without a value. */
export const DEFAULT_MINIMUM_DISPLAY = '0.00000546';
export const DEFAULT_MAXIMUM_DISPLAY = '21000000';

/** Destination keyword meaning "the source address". */
export const SAME_ADDRESS = 'same';

export type CoinSelectionInput = {
  includeCoinbase?: boolean;
  includeNonCoinbase?: boolean;
  includeFrozen?: boolean;
  includeTokens?: boolean;
  /**
   * Minimum value in BCH. `true` enables the bound with its default value;
   * `false`, null or undefined leave it unset.
   */
  minimum?: string | boolean | null;
  maximum?: string | boolean | null;
};

export const defaultCoinFilter = (): CoinFilter => ({
  includeCoinbase: true,
  includeNonCoinbase: true,
  includeFrozen: false,
  includeTokens: false,
  minimumValue: null,
  maximumValue: null,
});

const resolveBound = (
  v: string | boolean | null | undefined,
  fallback: string,
): number | null => {
  if (v === undefined || v === null || v === false) return null;
  return parseCoinAmount(v === true ? fallback : v);
};

export const resolveCoinFilter = (input: CoinSelectionInput): CoinFilter => {
  const base = defaultCoinFilter();
  const minimumValue = resolveBound(input.minimum, DEFAULT_MINIMUM_DISPLAY);
  const maximumValue = resolveBound(input.maximum, DEFAULT_MAXIMUM_DISPLAY);
  if (
    minimumValue !== null &&
    maximumValue !== null &&
    minimumValue > maximumValue
  ) {
    throw new ValidationError('minimum value exceeds maximum value');
  }
  return {
    includeCoinbase: input.includeCoinbase ?? base.includeCoinbase,
    includeNonCoinbase: input.includeNonCoinbase ?? base.includeNonCoinbase,
    includeFrozen: input.includeFrozen ?? base.includeFrozen,
    includeTokens: input.includeTokens ?? base.includeTokens,
    minimumValue,
    maximumValue,
  };
};

/** Outputs-page completeness: "same" or an address that validates. */
export const isDestinationComplete = (
  text: string,
  prefix?: AddressPrefix,
): boolean =>
  text.trim() === SAME_ADDRESS || tryParseAddress(text, prefix) !== null;

export const resolveDestination = (
  text: string | undefined,
  source: Address,
): Address => {
  if (text === undefined || text.trim() === SAME_ADDRESS) return source;
  return parseAddressFor(text, source.prefix);
};

export const validateMaxTxSize = (size: number): number => {
  if (!Number.isInteger(size)) {
    throw new ValidationError(
      `maximum transaction size must be an integer (got ${String(size)})`,
    );
  }
  if (size < MIN_TX_SIZE || size > MAX_TX_SIZE) {
    throw new ValidationError(
      `maximum transaction size must be between ${String(MIN_TX_SIZE)} and ${String(MAX_TX_SIZE)} bytes`,
    );
  }
  return size;
};
