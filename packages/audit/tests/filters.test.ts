/**
 * Tests for audit entry filters
 */

import { describe, it, expect } from 'vitest';
import {
  eventContentId,
  filterByContent,
  filterByEventType,
  filterByPrincipal,
  summarizeEntries,
} from '../src/filters.js';
import { AuditLog } from '../src/log.js';

function sampleLog(): AuditLog {
  const log = new AuditLog();
  log.appendAll([
    { type: 'ContentCreated', id: 1, creator: 'alice', title: 'Report', ts: 100 },
    { type: 'ContentCreated', id: 2, creator: 'carol', title: 'Memo', ts: 110 },
    { type: 'AccessPurchased', contentId: 1, buyer: 'bob', tokenId: 1, expiresAt: 3700 },
    { type: 'ContentAccessed', contentId: 1, user: 'bob', ts: 120 },
    { type: 'AccessRevoked', contentId: 1, user: 'bob', ts: 130 },
    { type: 'DecryptionFulfilled', requestId: 'dec_1', requester: 'bob', ts: 140 },
  ]);
  return log;
}

describe('eventContentId', () => {
  it('uses id for creation events and contentId otherwise', () => {
    expect(eventContentId({ type: 'ContentCreated', id: 4, creator: 'a', title: 't', ts: 1 })).toBe(4);
    expect(eventContentId({ type: 'PayloadRotated', contentId: 9, ts: 1 })).toBe(9);
    expect(
      eventContentId({ type: 'DecryptionFulfilled', requestId: 'dec_1', requester: 'a', ts: 1 })
    ).toBeUndefined();
  });
});

describe('filters', () => {
  it('filters by content', () => {
    expect(filterByContent(sampleLog().entries(), 1).map((e) => e.seq)).toEqual([1, 3, 4, 5]);
  });

  it('filters by principal', () => {
    expect(filterByPrincipal(sampleLog().entries(), 'bob').map((e) => e.seq)).toEqual([3, 4, 5, 6]);
    expect(filterByPrincipal(sampleLog().entries(), 'carol').map((e) => e.seq)).toEqual([2]);
  });

  it('filters by event type', () => {
    const entries = filterByEventType(sampleLog().entries(), 'AccessPurchased', 'AccessRevoked');
    expect(entries.map((e) => e.seq)).toEqual([3, 5]);
  });
});

describe('summarizeEntries', () => {
  it('counts entries by event type', () => {
    expect(summarizeEntries(sampleLog().entries())).toEqual({
      total: 6,
      byEventType: {
        ContentCreated: 2,
        AccessPurchased: 1,
        ContentAccessed: 1,
        AccessRevoked: 1,
        DecryptionFulfilled: 1,
      },
      firstSeq: 1,
      lastSeq: 6,
    });
  });

  it('summarizes an empty slice', () => {
    expect(summarizeEntries([])).toEqual({
      total: 0,
      byEventType: {},
      firstSeq: undefined,
      lastSeq: undefined,
    });
  });
});
