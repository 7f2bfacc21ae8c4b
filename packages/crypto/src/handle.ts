/**
 * Ciphertext handles and the encryption capability port
 *
 * A handle is an opaque reference to a value held by the encryption
 * backend. Who may decrypt it is tracked by the backend's allow-list,
 * never by the holder of the reference.
 */

import type { PrincipalId } from '@sealdrop/kernel';
import { CryptoError } from './errors.js';

/**
 * Encrypted integer types understood by the backend
 */
export type FheType = 'ebool' | 'euint8' | 'euint16' | 'euint32' | 'euint64' | 'euint128' | 'euint256';

/** Bit width of each encrypted type */
export const FHE_TYPE_BITS: Readonly<Record<FheType, number>> = {
  ebool: 1,
  euint8: 8,
  euint16: 16,
  euint32: 32,
  euint64: 64,
  euint128: 128,
  euint256: 256,
};

/**
 * Opaque reference to an encrypted value
 */
export interface CiphertextHandle {
  /** 0x-prefixed 32-byte hex reference */
  readonly handle: string;
  readonly type: FheType;
}

/**
 * Response delivered by the decryption oracle for a request id
 */
export interface DecryptionResponse {
  requestId: string;
  /** Decimal strings, one per requested handle, in request order */
  cleartexts: string[];
  /** base64url Ed25519 signature over the canonical request/result payload */
  signature: string;
}

export type DecryptionCallback = (response: DecryptionResponse) => void | Promise<void>;

/**
 * External encryption capability consumed by the ledger.
 *
 * Every handle created through `encrypt` or `randomCiphertext` is
 * decryptable by `systemPrincipal` from the start.
 */
export interface EncryptionCapability {
  readonly systemPrincipal: PrincipalId;
  encrypt(value: bigint, type: FheType): CiphertextHandle;
  randomCiphertext(type: FheType): CiphertextHandle;
  grantDecrypt(handle: CiphertextHandle, principal: PrincipalId): void;
  isAllowed(handle: CiphertextHandle, principal: PrincipalId): boolean;
  allowedPrincipals(handle: CiphertextHandle): PrincipalId[];
  /**
   * Submit handles for asynchronous decryption. The callback fires once the
   * oracle answers; the returned id correlates request and response.
   */
  requestDecryption(handles: CiphertextHandle[], callback: DecryptionCallback): string;
}

/**
 * Largest value representable by an encrypted type
 */
export function maxValueOf(type: FheType): bigint {
  return (1n << BigInt(FHE_TYPE_BITS[type])) - 1n;
}

export function assertValueInRange(value: bigint, type: FheType): void {
  if (value < 0n || value > maxValueOf(type)) {
    throw new CryptoError('CRYPTO_VALUE_OUT_OF_RANGE', `Value does not fit in ${type}`);
  }
}
