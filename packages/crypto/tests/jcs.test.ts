/**
 * Tests for JSON Canonicalization Scheme (RFC 8785)
 */

import { describe, it, expect } from 'vitest';
import { canonicalize, canonicalizeBytes } from '../src/jcs.js';

describe('JSON Canonicalization (RFC 8785)', () => {
  it('should canonicalize primitives', () => {
    expect(canonicalize(null)).toBe('null');
    expect(canonicalize(true)).toBe('true');
    expect(canonicalize(false)).toBe('false');
    expect(canonicalize(-0)).toBe('0');
    expect(canonicalize(42)).toBe('42');
    expect(canonicalize('with"quotes')).toBe('"with\\"quotes"');
  });

  it('should canonicalize arrays in order', () => {
    expect(canonicalize([])).toBe('[]');
    expect(canonicalize(['3', '1', '2'])).toBe('["3","1","2"]');
  });

  it('should canonicalize a decryption payload with sorted keys', () => {
    const payload = {
      requestId: 'dec_1',
      handles: ['0xaa'],
      cleartexts: ['42'],
    };

    expect(canonicalize(payload)).toBe(
      '{"cleartexts":["42"],"handles":["0xaa"],"requestId":"dec_1"}'
    );
  });

  it('should produce identical output for equivalent objects with different key order', () => {
    expect(canonicalize({ a: 1, b: 2, c: 3 })).toBe(canonicalize({ c: 3, a: 1, b: 2 }));
  });

  it('should reject non-finite numbers and unsupported types', () => {
    expect(() => canonicalize(Infinity)).toThrow('Cannot canonicalize non-finite number');
    expect(() => canonicalize(NaN)).toThrow('Cannot canonicalize non-finite number');
    expect(() => canonicalize(10n)).toThrow('Cannot canonicalize type: bigint');
  });

  it('should encode as UTF-8 bytes', () => {
    expect(Array.from(canonicalizeBytes({ a: 'é' }))).toEqual(
      Array.from(new TextEncoder().encode('{"a":"é"}'))
    );
  });
});
