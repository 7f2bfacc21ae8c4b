/**
 * Entry filters for indexers reading the audit log
 */

import type { ContentId, PrincipalId } from '@sealdrop/kernel';
import type { AuditEntry, AuditSummary, LedgerEvent, LedgerEventType } from './types.js';

/**
 * Content id an event refers to, if any
 */
export function eventContentId(event: LedgerEvent): ContentId | undefined {
  switch (event.type) {
    case 'ContentCreated':
      return event.id;
    case 'DecryptionFulfilled':
    case 'DecryptionRejected':
      return undefined;
    default:
      return event.contentId;
  }
}

/**
 * Principals named by an event
 */
export function eventPrincipals(event: LedgerEvent): PrincipalId[] {
  switch (event.type) {
    case 'ContentCreated':
      return [event.creator];
    case 'AccessPurchased':
      return [event.buyer];
    case 'ContentAccessed':
    case 'AccessRevoked':
      return [event.user];
    case 'DecryptionRequested':
    case 'DecryptionFulfilled':
    case 'DecryptionRejected':
      return [event.requester];
    case 'ContentStatusChanged':
    case 'PayloadRotated':
      return [];
  }
}

export function filterByContent(entries: readonly AuditEntry[], contentId: ContentId): AuditEntry[] {
  return entries.filter((entry) => eventContentId(entry.event) === contentId);
}

export function filterByPrincipal(entries: readonly AuditEntry[], principal: PrincipalId): AuditEntry[] {
  return entries.filter((entry) => eventPrincipals(entry.event).includes(principal));
}

export function filterByEventType(
  entries: readonly AuditEntry[],
  ...types: LedgerEventType[]
): AuditEntry[] {
  return entries.filter((entry) => types.includes(entry.event.type));
}

/**
 * Count entries by event type.
 */
export function summarizeEntries(entries: readonly AuditEntry[]): AuditSummary {
  const byEventType: Partial<Record<LedgerEventType, number>> = {};
  for (const entry of entries) {
    byEventType[entry.event.type] = (byEventType[entry.event.type] ?? 0) + 1;
  }

  return {
    total: entries.length,
    byEventType,
    firstSeq: entries[0]?.seq,
    lastSeq: entries[entries.length - 1]?.seq,
  };
}
