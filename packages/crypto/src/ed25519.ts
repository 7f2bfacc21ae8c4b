/**
 * Internal Ed25519 wrapper -- async-only surface
 *
 * Only the async methods from @noble/ed25519 are used. In noble v3, sync
 * methods require explicit hash configuration; async methods use the
 * built-in Web Crypto and need none.
 *
 * All other modules in @sealdrop/crypto import from this file, never
 * directly from '@noble/ed25519'.
 *
 * Key material handling:
 * - Secret keys are 32-byte Uint8Array (Ed25519 seed)
 * - Public keys are 32-byte Uint8Array (compressed Ed25519 point)
 * - Never log key bytes
 */

import { signAsync, verifyAsync, getPublicKeyAsync, utils } from '@noble/ed25519';

/** Sign a message with Ed25519 (async, Web Crypto backed) */
export const sign = signAsync;

/** Verify an Ed25519 signature (async, Web Crypto backed) */
export const verify = verifyAsync;

/** Derive public key from secret key (async, Web Crypto backed) */
export const getPublicKey = getPublicKeyAsync;

/** Generate a cryptographically random 32-byte secret key (CSPRNG) */
export const randomSecretKey = utils.randomSecretKey;
