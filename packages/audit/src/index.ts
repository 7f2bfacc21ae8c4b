/**
 * @sealdrop/audit
 *
 * Append-only event log for the sealdrop ledger.
 *
 * - Typed ledger events wrapped in numbered, ULID-identified entries
 * - Ordered subscriber delivery for external indexers
 * - JSONL export and parsing
 * - Filters by content, principal and event type
 *
 * @example
 * ```typescript
 * import { AuditLog, filterByContent } from '@sealdrop/audit';
 *
 * const log = new AuditLog();
 * const stop = log.subscribe((entry) => indexer.push(entry));
 * log.append({ type: 'ContentCreated', id: 1, creator: 'alice', title: 'Report', ts: 1700000000 });
 * const history = filterByContent(log.entries(), 1);
 * stop();
 * ```
 *
 * @packageDocumentation
 */

export type {
  LedgerEvent,
  LedgerEventType,
  ContentCreatedEvent,
  AccessPurchasedEvent,
  ContentAccessedEvent,
  AccessRevokedEvent,
  ContentStatusChangedEvent,
  PayloadRotatedEvent,
  DecryptionRequestedEvent,
  DecryptionFulfilledEvent,
  DecryptionRejectedEvent,
  AuditEntry,
  AuditSummary,
  JsonlOptions,
  JsonlParseOptions,
} from './types.js';

export {
  AUDIT_VERSION,
  AuditEntrySchema,
  LedgerEventSchema,
  generateAuditId,
  isValidUlid,
  createAuditEntry,
  validateAuditEntry,
  isValidAuditEntry,
  type ValidationResult,
} from './entry.js';

export {
  formatJsonlLine,
  formatJsonl,
  parseJsonl,
  type JsonlLineError,
  type JsonlParseResult,
} from './jsonl.js';

export {
  eventContentId,
  eventPrincipals,
  filterByContent,
  filterByPrincipal,
  filterByEventType,
  summarizeEntries,
} from './filters.js';

export { AuditLog, type AuditListener, type AuditLogOptions, type SubscribeOptions } from './log.js';
