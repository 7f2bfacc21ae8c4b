/**
 * Tests for base64url (RFC 4648 §5) and hex helpers
 */

import { describe, it, expect } from 'vitest';
import { base64urlDecode, base64urlEncode, bytesToHex, hexToBytes } from '../src/encoding.js';

describe('Base64url encoding', () => {
  it('should encode bytes to base64url', () => {
    const bytes = new Uint8Array([72, 101, 108, 108, 111]); // "Hello"
    expect(base64urlEncode(bytes)).toBe('SGVsbG8');
  });

  it('should decode base64url to bytes', () => {
    expect(Array.from(base64urlDecode('SGVsbG8'))).toEqual([72, 101, 108, 108, 111]);
  });

  it('should handle base64url without padding', () => {
    const tests = [
      { str: 'YQ', expected: [97] },
      { str: 'YWI', expected: [97, 98] },
      { str: 'YWJj', expected: [97, 98, 99] },
    ];

    tests.forEach(({ str, expected }) => {
      expect(Array.from(base64urlDecode(str))).toEqual(expected);
    });
  });

  it('should replace + with - and / with _', () => {
    // [0xfb, 0xff] is "+/8=" in standard base64
    expect(base64urlEncode(new Uint8Array([0xfb, 0xff]))).toBe('-_8');
  });

  it('should handle empty input', () => {
    expect(base64urlEncode(new Uint8Array([]))).toBe('');
    expect(base64urlDecode('').length).toBe(0);
  });
});

describe('Hex helpers', () => {
  it('should encode bytes to lowercase hex', () => {
    expect(bytesToHex(new Uint8Array([0, 15, 171, 255]))).toBe('000fabff');
  });

  it('should decode hex with and without 0x prefix', () => {
    expect(Array.from(hexToBytes('000fabff'))).toEqual([0, 15, 171, 255]);
    expect(Array.from(hexToBytes('0x0FAB'))).toEqual([15, 171]);
  });

  it('should reject odd-length or non-hex input', () => {
    expect(() => hexToBytes('abc')).toThrow('Invalid hex string');
    expect(() => hexToBytes('zz')).toThrow('Invalid hex string');
  });
});
