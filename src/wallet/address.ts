/* src/wallet/address.ts
 * CashAddr parsing and formatting (P2PKH / P2SH) over libauth's codec.
 */
import {
  decodeCashAddressFormat,
  encodeCashAddressFormat,
} from '@bitauth/libauth';

import { AddressError } from './errors';

export type AddressPrefix = 'bitcoincash' | 'bchtest' | 'bchreg';
export type AddressType = 'p2pkh' | 'p2sh';

export const ADDRESS_PREFIXES: readonly AddressPrefix[] = [
  'bitcoincash',
  'bchtest',
  'bchreg',
];

export type Network = 'mainnet' | 'testnet' | 'regtest';

export const NETWORK_PREFIX: Record<Network, AddressPrefix> = {
  mainnet: 'bitcoincash',
  testnet: 'bchtest',
  regtest: 'bchreg',
};

// version byte size bits -> hash length in bytes
const HASH_SIZES = [20, 24, 28, 32, 40, 48, 56, 64];

export class Address {
  constructor(
    readonly prefix: AddressPrefix,
    readonly type: AddressType,
    readonly hash: Uint8Array,
  ) {}

  equals(other: Address): boolean {
    return (
      this.prefix === other.prefix &&
      this.type === other.type &&
      this.hash.length === other.hash.length &&
      this.hash.every((b, i) => b === other.hash[i])
    );
  }

  /** Full `prefix:payload` form. */
  toString(): string {
    return encodeCashAddr(this.prefix, this.type, this.hash);
  }

  /** Payload without the prefix. */
  toShortString(): string {
    return this.toString().slice(this.prefix.length + 1);
  }

  /** Hash as lowercase hex. */
  hashHex(): string {
    return Buffer.from(this.hash).toString('hex');
  }
}

const isPrefix = (s: string): s is AddressPrefix =>
  ADDRESS_PREFIXES.some((p) => p === s);

export const encodeCashAddr = (
  prefix: AddressPrefix,
  type: AddressType,
  hash: Uint8Array,
): string => {
  const sizeBits = HASH_SIZES.indexOf(hash.length);
  if (sizeBits < 0) {
    throw new AddressError(`unsupported hash length ${String(hash.length)}`);
  }
  const version = ((type === 'p2sh' ? 1 : 0) << 3) | sizeBits;
  return encodeCashAddressFormat(prefix, version, hash);
};

/**
 * Parse a CashAddr string. The prefix is optional on input; when absent,
 * `defaultPrefix` is assumed for the checksum.
 *
 * @throws AddressError on any malformed input.
 */
export const parseAddress = (
  text: string,
  defaultPrefix: AddressPrefix = 'bitcoincash',
): Address => {
  const raw = text.trim();
  if (raw.length === 0) throw new AddressError('address is empty');
  if (raw !== raw.toLowerCase() && raw !== raw.toUpperCase()) {
    throw new AddressError(`mixed-case address: ${raw}`);
  }
  const lower = raw.toLowerCase();
  const sep = lower.lastIndexOf(':');
  const prefix = sep >= 0 ? lower.slice(0, sep) : defaultPrefix;
  if (!isPrefix(prefix)) {
    throw new AddressError(`unknown address prefix "${prefix}"`);
  }
  const decoded = decodeCashAddressFormat(
    sep >= 0 ? lower : `${prefix}:${lower}`,
  );
  if (typeof decoded === 'string') {
    throw new AddressError(`invalid address ${raw}: ${decoded}`);
  }
  const { version, payload } = decoded;
  const typeBits = (version >> 3) & 0x0f;
  if (version & 0x80 || typeBits > 1) {
    throw new AddressError(`unsupported address version ${String(version)}`);
  }
  if (HASH_SIZES[version & 0x07] !== payload.length) {
    throw new AddressError(`address hash length mismatch: ${raw}`);
  }
  return new Address(
    prefix,
    typeBits === 1 ? 'p2sh' : 'p2pkh',
    Uint8Array.from(payload),
  );
};

/**
 * Parse and require a given network prefix.
 *
 * @throws AddressError when the address belongs to another network.
 */
export const parseAddressFor = (
  text: string,
  prefix: AddressPrefix,
): Address => {
  const address = parseAddress(text, prefix);
  if (address.prefix !== prefix) {
    throw new AddressError(
      `address ${address.toString()} is not a ${prefix} address`,
    );
  }
  return address;
};

/** Non-throwing variant for form-style validation. */
export const tryParseAddress = (
  text: string,
  defaultPrefix?: AddressPrefix,
): Address | null => {
  try {
    return defaultPrefix === undefined
      ? parseAddress(text)
      : parseAddressFor(text, defaultPrefix);
  } catch (e) {
    if (e instanceof AddressError) return null;
    throw e;
  }
};
