/**
 * Sealdrop Crypto Test Kit
 *
 * Utilities for TEST FIXTURES ONLY, exposed as @sealdrop/crypto/testkit
 * and not from the main entry point.
 */

import { getPublicKey } from './ed25519.js';
import { CryptoError } from './errors.js';

/**
 * Generate an Ed25519 keypair from a deterministic seed.
 *
 * WARNING: FOR TEST FIXTURES ONLY. Seeded keys are predictable.
 *
 * @param seed - 32-byte seed
 */
export async function generateKeypairFromSeed(seed: Uint8Array): Promise<{
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}> {
  if (seed.length !== 32) {
    throw new CryptoError('CRYPTO_INVALID_SEED_LENGTH', 'Ed25519 seed must be 32 bytes');
  }

  // In Ed25519, the private key IS the seed (32 bytes)
  const privateKey = seed;
  const publicKey = await getPublicKey(privateKey);

  return { privateKey, publicKey };
}

/**
 * Seed filled with a single repeated byte, for readable fixtures
 */
export function fixtureSeed(byte: number): Uint8Array {
  return new Uint8Array(32).fill(byte);
}
