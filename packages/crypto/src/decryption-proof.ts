/**
 * Signed decryption responses
 *
 * The oracle signs the canonical JSON of `{ requestId, handles, cleartexts }`
 * with Ed25519. Binding the handles means a response for one request cannot
 * be replayed against another request with a different handle set.
 */

import { base64urlDecode, base64urlEncode } from './encoding.js';
import { getPublicKey, randomSecretKey, sign, verify } from './ed25519.js';
import { CryptoError } from './errors.js';
import { canonicalizeBytes } from './jcs.js';

/**
 * Payload covered by a decryption signature
 */
export interface DecryptionSigningPayload {
  requestId: string;
  handles: string[];
  cleartexts: string[];
}

const ED25519_SIGNATURE_LENGTH = 64;

/**
 * Generate an Ed25519 keypair with CSPRNG randomness
 */
export async function generateKeypair(): Promise<{
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}> {
  const privateKey = randomSecretKey();
  const publicKey = await getPublicKey(privateKey);
  return { privateKey, publicKey };
}

/**
 * Sign a decryption result, returning a base64url signature
 */
export async function signDecryptionPayload(
  payload: DecryptionSigningPayload,
  privateKey: Uint8Array
): Promise<string> {
  if (privateKey.length !== 32) {
    throw new CryptoError('CRYPTO_INVALID_KEY_LENGTH', 'Ed25519 private key must be 32 bytes');
  }
  const signature = await sign(canonicalizeBytes(payload), privateKey);
  return base64urlEncode(signature);
}

/**
 * Verify a base64url signature over a decryption result
 *
 * @returns false for a signature of the wrong length or one that does not verify
 */
export async function verifyDecryptionPayload(
  payload: DecryptionSigningPayload,
  signature: string,
  publicKey: Uint8Array
): Promise<boolean> {
  if (publicKey.length !== 32) {
    throw new CryptoError('CRYPTO_INVALID_KEY_LENGTH', 'Ed25519 public key must be 32 bytes');
  }
  const signatureBytes = base64urlDecode(signature);
  if (signatureBytes.length !== ED25519_SIGNATURE_LENGTH) {
    return false;
  }
  return verify(signatureBytes, canonicalizeBytes(payload), publicKey);
}
