/**
 * Sealdrop Crypto Package
 *
 * Ciphertext handles, the encryption capability port, the in-process
 * capability, and Ed25519-signed decryption responses.
 *
 * @packageDocumentation
 */

export * from './acl.js';
export * from './encoding.js';
export * from './decryption-proof.js';
export * from './errors.js';
export * from './handle.js';
export * from './in-memory-capability.js';
export * from './jcs.js';
