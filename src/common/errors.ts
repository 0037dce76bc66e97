/**
 * Error taxonomy for the order lifecycle.
 *
 * Expected outcomes (empty cart, unknown product, ...) travel as result
 * objects carrying one of these codes. Conditions that abort the current
 * operation are thrown as CommerceError subclasses.
 */

export type ErrorCode =
  | 'NOT_REGISTERED'
  | 'SESSION_EXPIRED'
  | 'EMPTY_CART'
  | 'INVALID_PAYMENT_CHOICE'
  | 'PRODUCT_NOT_FOUND'
  | 'ORDER_NOT_FOUND'
  | 'ENCRYPTION_UNAVAILABLE'
  | 'INVALID_RATING'
  | 'INVALID_COUNTRY'
  | 'STORE_CORRUPT'
  | 'STORE_PERSIST_FAILED';

/** Outcome of an operation that can fail in an expected way */
export type OpResult<T> =
  | { ok: true; value: T }
  | { ok: false; code: ErrorCode; message: string };

export function ok<T>(value: T): OpResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: ErrorCode, message: string): OpResult<T> {
  return { ok: false, code, message };
}

export class CommerceError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = 'CommerceError';
  }
}

export class StoreCorruptError extends CommerceError {
  constructor(message = 'Store document is corrupt') {
    super(message, 'STORE_CORRUPT');
    this.name = 'StoreCorruptError';
  }
}

export class StorePersistError extends CommerceError {
  constructor(message = 'Failed to persist store document', public readonly reason?: unknown) {
    super(message, 'STORE_PERSIST_FAILED');
    this.name = 'StorePersistError';
  }
}

export class EncryptionUnavailableError extends CommerceError {
  constructor(message = 'Address encryption is unavailable', public readonly reason?: unknown) {
    super(message, 'ENCRYPTION_UNAVAILABLE');
    this.name = 'EncryptionUnavailableError';
  }
}
