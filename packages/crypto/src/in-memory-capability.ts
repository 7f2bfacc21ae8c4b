/**
 * In-process encryption capability
 *
 * Stands in for a homomorphic coprocessor and its decryption oracle.
 * Values are held in memory behind random handles; the allow-list and
 * the asynchronous, signed decryption flow behave like the real backend.
 */

import { randomBytes } from 'node:crypto';
import type { PrincipalId } from '@sealdrop/kernel';
import { HandleAcl } from './acl.js';
import { signDecryptionPayload } from './decryption-proof.js';
import { CryptoError } from './errors.js';
import {
  FHE_TYPE_BITS,
  assertValueInRange,
  maxValueOf,
  type CiphertextHandle,
  type DecryptionCallback,
  type EncryptionCapability,
  type FheType,
} from './handle.js';

export interface InMemoryFheCapabilityOptions {
  systemPrincipal: PrincipalId;
  /** Ed25519 secret key the simulated oracle signs responses with */
  oracleSecretKey: Uint8Array;
}

interface StoredCiphertext {
  type: FheType;
  value: bigint;
}

interface QueuedDecryption {
  requestId: string;
  handles: CiphertextHandle[];
  callback: DecryptionCallback;
}

export class InMemoryFheCapability implements EncryptionCapability {
  readonly systemPrincipal: PrincipalId;
  private readonly oracleSecretKey: Uint8Array;
  private readonly ciphertexts = new Map<string, StoredCiphertext>();
  private readonly acl = new HandleAcl();
  private readonly queue: QueuedDecryption[] = [];
  private nextRequest = 1;

  constructor(options: InMemoryFheCapabilityOptions) {
    if (options.oracleSecretKey.length !== 32) {
      throw new CryptoError('CRYPTO_INVALID_KEY_LENGTH', 'Ed25519 private key must be 32 bytes');
    }
    this.systemPrincipal = options.systemPrincipal;
    this.oracleSecretKey = options.oracleSecretKey;
  }

  encrypt(value: bigint, type: FheType): CiphertextHandle {
    assertValueInRange(value, type);
    return this.store(value, type);
  }

  randomCiphertext(type: FheType): CiphertextHandle {
    const bits = FHE_TYPE_BITS[type];
    const bytes = randomBytes(Math.ceil(bits / 8));
    const value = BigInt(`0x${bytes.toString('hex')}`) & maxValueOf(type);
    return this.store(value, type);
  }

  grantDecrypt(handle: CiphertextHandle, principal: PrincipalId): void {
    this.require(handle);
    this.acl.allow(handle.handle, principal);
  }

  isAllowed(handle: CiphertextHandle, principal: PrincipalId): boolean {
    return this.acl.isAllowed(handle.handle, principal);
  }

  allowedPrincipals(handle: CiphertextHandle): PrincipalId[] {
    return this.acl.list(handle.handle);
  }

  /**
   * Re-encrypt-for-user path: reveals the value to an allowed principal.
   */
  userDecrypt(handle: CiphertextHandle, principal: PrincipalId): bigint {
    const stored = this.require(handle);
    if (!this.acl.isAllowed(handle.handle, principal)) {
      throw new CryptoError('CRYPTO_DECRYPT_DENIED', `${principal} may not decrypt ${handle.handle}`);
    }
    return stored.value;
  }

  requestDecryption(handles: CiphertextHandle[], callback: DecryptionCallback): string {
    for (const handle of handles) {
      this.require(handle);
      if (!this.acl.isAllowed(handle.handle, this.systemPrincipal)) {
        throw new CryptoError('CRYPTO_DECRYPT_DENIED', `system may not decrypt ${handle.handle}`);
      }
    }
    const requestId = `dec_${this.nextRequest++}`;
    this.queue.push({ requestId, handles: [...handles], callback });
    return requestId;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Answer every queued request in submission order.
   *
   * A callback that rejects stops processing; later requests stay queued.
   *
   * @returns number of requests answered
   */
  async fulfillPending(): Promise<number> {
    let answered = 0;
    let next = this.queue.shift();
    while (next) {
      const cleartexts = next.handles.map((h) => this.require(h).value.toString());
      const signature = await signDecryptionPayload(
        { requestId: next.requestId, handles: next.handles.map((h) => h.handle), cleartexts },
        this.oracleSecretKey
      );
      answered++;
      await next.callback({ requestId: next.requestId, cleartexts, signature });
      next = this.queue.shift();
    }
    return answered;
  }

  private store(value: bigint, type: FheType): CiphertextHandle {
    const handle: CiphertextHandle = { handle: `0x${randomBytes(32).toString('hex')}`, type };
    this.ciphertexts.set(handle.handle, { type, value });
    this.acl.allow(handle.handle, this.systemPrincipal);
    return handle;
  }

  private require(handle: CiphertextHandle): StoredCiphertext {
    const stored = this.ciphertexts.get(handle.handle);
    if (!stored || stored.type !== handle.type) {
      throw new CryptoError('CRYPTO_UNKNOWN_HANDLE', `Unknown ciphertext handle ${handle.handle}`);
    }
    return stored;
  }
}
