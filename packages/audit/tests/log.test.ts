/**
 * Tests for the append-only audit log
 */

import { describe, it, expect, vi } from 'vitest';
import { parseJsonl } from '../src/jsonl.js';
import { AuditLog } from '../src/log.js';
import type { AuditEntry, LedgerEvent } from '../src/types.js';

const created: LedgerEvent = { type: 'ContentCreated', id: 1, creator: 'alice', title: 'Report', ts: 100 };
const purchased: LedgerEvent = {
  type: 'AccessPurchased',
  contentId: 1,
  buyer: 'bob',
  tokenId: 1,
  expiresAt: 3700,
};

function fixedClock() {
  return new Date('2026-01-06T12:00:00.000Z');
}

describe('AuditLog', () => {
  it('numbers entries from 1 without gaps', () => {
    const log = new AuditLog({ now: fixedClock });

    const first = log.append(created);
    const [second, third] = log.appendAll([purchased, { type: 'PayloadRotated', contentId: 1, ts: 200 }]);

    expect([first.seq, second.seq, third.seq]).toEqual([1, 2, 3]);
    expect(log.size).toBe(3);
    expect(first.recorded_at).toBe('2026-01-06T12:00:00.000Z');
  });

  it('returns entries from a sequence number', () => {
    const log = new AuditLog();
    log.appendAll([created, purchased]);

    expect(log.entries().map((e) => e.event.type)).toEqual(['ContentCreated', 'AccessPurchased']);
    expect(log.entries(2).map((e) => e.seq)).toEqual([2]);
    expect(log.entries(3)).toEqual([]);
  });

  it('freezes appended entries', () => {
    const log = new AuditLog();
    const entry = log.append(created);

    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.event)).toBe(true);
  });

  it('does not share the caller event object', () => {
    const log = new AuditLog();
    const event: LedgerEvent = { type: 'AccessRevoked', contentId: 1, user: 'bob', ts: 5 };
    log.append(event);
    event.ts = 6;

    expect(log.entries()[0].event).toEqual({ type: 'AccessRevoked', contentId: 1, user: 'bob', ts: 5 });
  });

  it('does not expose the backing array', () => {
    const log = new AuditLog();
    log.append(created);
    log.entries().pop();

    expect(log.size).toBe(1);
  });

  it('delivers a batch only after every entry is appended', () => {
    const log = new AuditLog();
    const sizes: number[] = [];
    log.subscribe(() => sizes.push(log.size));

    log.appendAll([created, purchased]);

    expect(sizes).toEqual([2, 2]);
  });

  it('delivers entries to subscribers in order and stops after unsubscribe', () => {
    const log = new AuditLog();
    const seen: number[] = [];
    const stop = log.subscribe((entry) => seen.push(entry.seq));

    log.append(created);
    log.append(purchased);
    stop();
    log.append(created);

    expect(seen).toEqual([1, 2]);
  });

  it('replays existing entries on request', () => {
    const log = new AuditLog();
    log.append(created);
    const seen: AuditEntry[] = [];

    log.subscribe((entry) => seen.push(entry), { replay: true });
    log.append(purchased);

    expect(seen.map((e) => e.seq)).toEqual([1, 2]);
  });

  it('routes subscriber errors to onListenerError and keeps delivering', () => {
    const onListenerError = vi.fn();
    const log = new AuditLog({ onListenerError });
    const healthy = vi.fn();
    log.subscribe(() => {
      throw new Error('indexer down');
    });
    log.subscribe(healthy);

    const entry = log.append(created);

    expect(onListenerError).toHaveBeenCalledWith(new Error('indexer down'), entry);
    expect(healthy).toHaveBeenCalledWith(entry);
  });

  it('rethrows subscriber errors after the entry is recorded when no handler is set', () => {
    const log = new AuditLog();
    log.subscribe(() => {
      throw new Error('indexer down');
    });

    expect(() => log.append(created)).toThrow('indexer down');
    expect(log.size).toBe(1);
  });

  it('exports JSONL that parses back to the same entries', () => {
    const log = new AuditLog();
    log.appendAll([created, purchased]);

    const result = parseJsonl(log.toJsonl());

    expect(result.errors).toEqual([]);
    expect(result.entries).toEqual(log.entries());
  });
});
