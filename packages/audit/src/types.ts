/**
 * Sealdrop Audit Types
 *
 * Type definitions for the append-only ledger event log.
 * Entries serialize one per line as JSONL.
 */

import type { ContentId, PrincipalId, Timestamp, TokenId } from '@sealdrop/kernel';

export interface ContentCreatedEvent {
  type: 'ContentCreated';
  id: ContentId;
  creator: PrincipalId;
  title: string;
  ts: Timestamp;
}

export interface AccessPurchasedEvent {
  type: 'AccessPurchased';
  contentId: ContentId;
  buyer: PrincipalId;
  tokenId: TokenId;
  expiresAt: Timestamp;
}

export interface ContentAccessedEvent {
  type: 'ContentAccessed';
  contentId: ContentId;
  user: PrincipalId;
  ts: Timestamp;
}

export interface AccessRevokedEvent {
  type: 'AccessRevoked';
  contentId: ContentId;
  user: PrincipalId;
  ts: Timestamp;
}

export interface ContentStatusChangedEvent {
  type: 'ContentStatusChanged';
  contentId: ContentId;
  active: boolean;
  ts: Timestamp;
}

export interface PayloadRotatedEvent {
  type: 'PayloadRotated';
  contentId: ContentId;
  ts: Timestamp;
}

export interface DecryptionRequestedEvent {
  type: 'DecryptionRequested';
  requestId: string;
  requester: PrincipalId;
  contentId?: ContentId;
  handleCount: number;
  ts: Timestamp;
}

export interface DecryptionFulfilledEvent {
  type: 'DecryptionFulfilled';
  requestId: string;
  requester: PrincipalId;
  ts: Timestamp;
}

export interface DecryptionRejectedEvent {
  type: 'DecryptionRejected';
  requestId: string;
  requester: PrincipalId;
  /** Error code the completion failed with */
  reason: string;
  ts: Timestamp;
}

/**
 * Every state transition the ledger reports to external indexers
 */
export type LedgerEvent =
  | ContentCreatedEvent
  | AccessPurchasedEvent
  | ContentAccessedEvent
  | AccessRevokedEvent
  | ContentStatusChangedEvent
  | PayloadRotatedEvent
  | DecryptionRequestedEvent
  | DecryptionFulfilledEvent
  | DecryptionRejectedEvent;

export type LedgerEventType = LedgerEvent['type'];

/**
 * Core audit entry structure (JSONL normative format).
 *
 * Fields are ordered for consistent serialization.
 */
export interface AuditEntry {
  /** Audit format version */
  version: 'sealdrop.audit/1';

  /** Unique entry identifier (ULID) */
  id: string;

  /** Position in the log, starting at 1, without gaps */
  seq: number;

  /** ISO 8601 time the entry was appended */
  recorded_at: string;

  event: LedgerEvent;
}

/**
 * Options for JSONL formatting
 */
export interface JsonlOptions {
  /** Append a trailing newline after the last entry */
  trailingNewline?: boolean;
}

/**
 * Options for JSONL parsing
 */
export interface JsonlParseOptions {
  /** Collect invalid lines as errors instead of stopping at the first one */
  skipInvalid?: boolean;
  /** Maximum number of non-empty lines to process (0 = unlimited) */
  maxLines?: number;
}

/**
 * Counts over a slice of the log
 */
export interface AuditSummary {
  total: number;
  byEventType: Partial<Record<LedgerEventType, number>>;
  firstSeq?: number;
  lastSeq?: number;
}
