/**
 * Byte encodings for signatures and keys
 */

const HEX = /^(?:[0-9a-fA-F]{2})*$/;

/** RFC 4648 §5 alphabet, unpadded */
export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

/** Padding is optional */
export function base64urlDecode(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'base64url'));
}

/**
 * Decode hex, with or without a 0x prefix
 */
export function hexToBytes(hex: string): Uint8Array {
  const digits = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (!HEX.test(digits)) {
    throw new Error('Invalid hex string');
  }
  return new Uint8Array(Buffer.from(digits, 'hex'));
}

/** Lowercase, unprefixed */
export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}
