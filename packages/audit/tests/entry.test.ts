/**
 * Tests for audit entry creation and validation
 */

import { describe, it, expect } from 'vitest';
import {
  AUDIT_VERSION,
  createAuditEntry,
  generateAuditId,
  isValidAuditEntry,
  isValidUlid,
  validateAuditEntry,
} from '../src/entry.js';
import type { AuditEntry } from '../src/types.js';

describe('generateAuditId', () => {
  it('generates valid ULID format', () => {
    const id = generateAuditId();
    expect(id).toHaveLength(26);
    expect(isValidUlid(id)).toBe(true);
  });

  it('generates unique IDs', () => {
    const ids = new Set<string>();
    for (let i = 0; i < 100; i++) {
      ids.add(generateAuditId());
    }
    expect(ids.size).toBe(100);
  });

  it('encodes the timestamp in the first 10 characters', () => {
    expect(generateAuditId(0).substring(0, 10)).toBe('0000000000');
    expect(generateAuditId(32).substring(0, 10)).toBe('0000000010');
  });
});

describe('isValidUlid', () => {
  it('accepts valid ULIDs', () => {
    expect(isValidUlid('01ARZ3NDEKTSV4RRFFQ69G5FAV')).toBe(true);
  });

  it('rejects invalid ULIDs', () => {
    expect(isValidUlid('01arz3ndektsv4rrffq69g5fav')).toBe(false);
    expect(isValidUlid('01ARZ3NDEKTSV4RRFFQ69G5FA')).toBe(false);
    expect(isValidUlid('01ARZ3NDEKTSV4RRFFQ69G5FAI')).toBe(false);
    expect(isValidUlid('')).toBe(false);
  });
});

describe('createAuditEntry', () => {
  it('wraps an event with version, seq and recorded_at', () => {
    const recordedAt = new Date('2026-01-06T12:00:00.000Z');
    const entry = createAuditEntry(
      3,
      { type: 'ContentAccessed', contentId: 1, user: 'bob', ts: 1767700800 },
      recordedAt
    );

    expect(entry.version).toBe(AUDIT_VERSION);
    expect(entry.seq).toBe(3);
    expect(entry.recorded_at).toBe('2026-01-06T12:00:00.000Z');
    expect(isValidUlid(entry.id)).toBe(true);
    expect(entry.event).toEqual({ type: 'ContentAccessed', contentId: 1, user: 'bob', ts: 1767700800 });
  });
});

describe('validateAuditEntry', () => {
  const valid: AuditEntry = {
    version: 'sealdrop.audit/1',
    id: '01ARZ3NDEKTSV4RRFFQ69G5FAV',
    seq: 1,
    recorded_at: '2026-01-06T12:00:00Z',
    event: { type: 'AccessPurchased', contentId: 1, buyer: 'bob', tokenId: 1, expiresAt: 1767704400 },
  };

  it('accepts a valid entry', () => {
    expect(validateAuditEntry(valid)).toEqual({ valid: true, errors: [] });
    expect(isValidAuditEntry(valid)).toBe(true);
  });

  it('accepts a decryption request without a content id', () => {
    const entry = {
      ...valid,
      event: { type: 'DecryptionRequested', requestId: 'dec_1', requester: 'bob', handleCount: 1, ts: 5 },
    };
    expect(isValidAuditEntry(entry)).toBe(true);
  });

  it('rejects a wrong version', () => {
    expect(isValidAuditEntry({ ...valid, version: 'sealdrop.audit/0' })).toBe(false);
  });

  it('reports the failing path', () => {
    const result = validateAuditEntry({ ...valid, seq: 0 });
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^seq: /);
  });

  it('rejects unknown event types', () => {
    expect(isValidAuditEntry({ ...valid, event: { type: 'ContentDeleted', contentId: 1 } })).toBe(false);
  });

  it('rejects unknown event fields', () => {
    const entry = { ...valid, event: { ...valid.event, plaintext: 'secret' } };
    expect(isValidAuditEntry(entry)).toBe(false);
  });

  it('rejects non-objects', () => {
    expect(validateAuditEntry(null).valid).toBe(false);
    expect(validateAuditEntry('entry').valid).toBe(false);
  });
});
