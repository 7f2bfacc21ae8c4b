/**
 * Append-only audit log
 *
 * Entries are numbered without gaps, frozen on append, and delivered to
 * subscribers in append order. There is no way to update or remove an entry.
 */

import { createAuditEntry } from './entry.js';
import { formatJsonl } from './jsonl.js';
import type { AuditEntry, LedgerEvent } from './types.js';

export type AuditListener = (entry: AuditEntry) => void;

export interface AuditLogOptions {
  /** Wall clock for recorded_at; defaults to the system clock */
  now?: () => Date;
  /**
   * Receives errors thrown by subscribers. Without it, the first
   * subscriber error is rethrown once every subscriber has been called.
   */
  onListenerError?: (error: unknown, entry: AuditEntry) => void;
}

export interface SubscribeOptions {
  /** Deliver entries already in the log before live ones */
  replay?: boolean;
}

export class AuditLog {
  private readonly log: AuditEntry[] = [];
  private readonly listeners = new Set<AuditListener>();
  private readonly now: () => Date;
  private readonly onListenerError?: (error: unknown, entry: AuditEntry) => void;

  constructor(options: AuditLogOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.onListenerError = options.onListenerError;
  }

  get size(): number {
    return this.log.length;
  }

  append(event: LedgerEvent): AuditEntry {
    const [entry] = this.appendAll([event]);
    return entry;
  }

  /**
   * Append a batch. All entries are in the log before any subscriber runs,
   * so a subscriber never observes half of a state transition.
   */
  appendAll(events: readonly LedgerEvent[]): AuditEntry[] {
    const appended = events.map((event) => {
      const entry = freezeEntry(createAuditEntry(this.log.length + 1, { ...event }, this.now()));
      this.log.push(entry);
      return entry;
    });

    const failures: unknown[] = [];
    for (const entry of appended) {
      for (const listener of this.listeners) {
        try {
          listener(entry);
        } catch (err) {
          if (this.onListenerError) {
            this.onListenerError(err, entry);
          } else {
            failures.push(err);
          }
        }
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }

    return appended;
  }

  /**
   * Entries with seq >= fromSeq, in order
   */
  entries(fromSeq: number = 1): AuditEntry[] {
    return this.log.slice(Math.max(0, fromSeq - 1));
  }

  subscribe(listener: AuditListener, options: SubscribeOptions = {}): () => void {
    if (options.replay) {
      for (const entry of this.log) {
        listener(entry);
      }
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  toJsonl(): string {
    return formatJsonl(this.log, { trailingNewline: true });
  }
}

function freezeEntry(entry: AuditEntry): AuditEntry {
  Object.freeze(entry.event);
  return Object.freeze(entry);
}
