/* src/wallet/errors.ts
 * Error taxonomy shared by the wallet collaborators and the workflows.
 */

export type WalletErrorCode =
  | 'VALIDATION'
  | 'INVALID_ADDRESS'
  | 'INSUFFICIENT_FUNDS'
  | 'PRODUCER_FAILED'
  | 'SIGNING_DECLINED'
  | 'BROADCAST_FAILED'
  | 'UNSUPPORTED'
  | 'BUILDER_BUSY';

export class WalletError extends Error {
  constructor(
    message: string,
    public readonly code: WalletErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WalletError';
  }
}

/** Malformed user input, raised while collecting inputs (before any run starts). */
export class ValidationError extends WalletError {
  constructor(message: string, code: WalletErrorCode = 'VALIDATION') {
    super(message, code);
    this.name = 'ValidationError';
  }
}

export class AddressError extends ValidationError {
  constructor(message: string = 'Invalid address') {
    super(message, 'INVALID_ADDRESS');
    this.name = 'AddressError';
  }
}

export class InsufficientFundsError extends WalletError {
  constructor(
    message: string = 'Insufficient funds',
    public readonly required?: number,
  ) {
    super(message, 'INSUFFICIENT_FUNDS');
    this.name = 'InsufficientFundsError';
  }
}

/** Anything a producer raised that is not already a WalletError. */
export class UncategorizedProducerError extends WalletError {
  constructor(cause: unknown) {
    super(
      `transaction producer failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'PRODUCER_FAILED',
      { cause },
    );
    this.name = 'UncategorizedProducerError';
  }
}

export class SigningDeclinedError extends WalletError {
  constructor(message: string = 'Signing was declined') {
    super(message, 'SIGNING_DECLINED');
    this.name = 'SigningDeclinedError';
  }
}

export class BroadcastError extends WalletError {
  constructor(message: string) {
    super(message, 'BROADCAST_FAILED');
    this.name = 'BroadcastError';
  }
}

export class UnsupportedOperationError extends WalletError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED');
    this.name = 'UnsupportedOperationError';
  }
}

export class BuilderBusyError extends WalletError {
  constructor() {
    super(
      'a build is already running; stop it before starting another',
      'BUILDER_BUSY',
    );
    this.name = 'BuilderBusyError';
  }
}

/** Wrap non-wallet failures so callers only ever see WalletError subclasses. */
export const toProducerError = (e: unknown): WalletError =>
  e instanceof WalletError ? e : new UncategorizedProducerError(e);
