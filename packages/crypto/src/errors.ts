/**
 * Typed errors for @sealdrop/crypto
 *
 * These codes are internal to the crypto package. The ledger maps the
 * ones it expects to E_* codes from @sealdrop/kernel.
 */

export type CryptoErrorCode =
  | 'CRYPTO_INVALID_KEY_LENGTH'
  | 'CRYPTO_INVALID_SEED_LENGTH'
  | 'CRYPTO_UNKNOWN_HANDLE'
  | 'CRYPTO_VALUE_OUT_OF_RANGE'
  | 'CRYPTO_DECRYPT_DENIED';

/**
 * Typed error for crypto operations
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, message: string) {
    super(message);
    this.name = 'CryptoError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CryptoError.prototype);
  }
}

export function isCryptoError(err: unknown, code?: CryptoErrorCode): err is CryptoError {
  return err instanceof CryptoError && (code === undefined || err.code === code);
}
