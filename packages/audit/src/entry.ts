/**
 * Audit Entry Creation and Validation
 */

import { z } from 'zod';
import type { AuditEntry, LedgerEvent } from './types.js';

/** Audit format version */
export const AUDIT_VERSION = 'sealdrop.audit/1' as const;

/**
 * ULID-compatible ID generator.
 * Uses timestamp prefix + random suffix for time-ordered, unique IDs.
 *
 * Format: 26 uppercase alphanumeric characters (Crockford Base32)
 */
export function generateAuditId(now: number = Date.now()): string {
  // Crockford Base32 alphabet (excludes I, L, O, U)
  const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

  let timestampPart = '';
  let time = now;
  for (let i = 0; i < 10; i++) {
    timestampPart = ALPHABET[time % 32] + timestampPart;
    time = Math.floor(time / 32);
  }

  let randomPart = '';
  for (let i = 0; i < 16; i++) {
    randomPart += ALPHABET[Math.floor(Math.random() * 32)];
  }

  return timestampPart + randomPart;
}

/**
 * Validate ULID format.
 */
export function isValidUlid(id: string): boolean {
  return /^[0-9A-HJKMNP-TV-Z]{26}$/.test(id);
}

const principal = z.string().min(1);
const positiveId = z.number().int().positive();
const timestamp = z.number().int().nonnegative();

export const LedgerEventSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('ContentCreated'),
      id: positiveId,
      creator: principal,
      title: z.string().min(1),
      ts: timestamp,
    })
    .strict(),
  z
    .object({
      type: z.literal('AccessPurchased'),
      contentId: positiveId,
      buyer: principal,
      tokenId: positiveId,
      expiresAt: timestamp,
    })
    .strict(),
  z
    .object({
      type: z.literal('ContentAccessed'),
      contentId: positiveId,
      user: principal,
      ts: timestamp,
    })
    .strict(),
  z
    .object({
      type: z.literal('AccessRevoked'),
      contentId: positiveId,
      user: principal,
      ts: timestamp,
    })
    .strict(),
  z
    .object({
      type: z.literal('ContentStatusChanged'),
      contentId: positiveId,
      active: z.boolean(),
      ts: timestamp,
    })
    .strict(),
  z
    .object({
      type: z.literal('PayloadRotated'),
      contentId: positiveId,
      ts: timestamp,
    })
    .strict(),
  z
    .object({
      type: z.literal('DecryptionRequested'),
      requestId: z.string().min(1),
      requester: principal,
      contentId: positiveId.optional(),
      handleCount: positiveId,
      ts: timestamp,
    })
    .strict(),
  z
    .object({
      type: z.literal('DecryptionFulfilled'),
      requestId: z.string().min(1),
      requester: principal,
      ts: timestamp,
    })
    .strict(),
  z
    .object({
      type: z.literal('DecryptionRejected'),
      requestId: z.string().min(1),
      requester: principal,
      reason: z.string().min(1),
      ts: timestamp,
    })
    .strict(),
]);

export const AuditEntrySchema = z
  .object({
    version: z.literal(AUDIT_VERSION),
    id: z.string().refine(isValidUlid, 'must be ULID format'),
    seq: positiveId,
    recorded_at: z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'must be ISO 8601'),
    event: LedgerEventSchema,
  })
  .strict();

/**
 * Create an audit entry for an event at a log position.
 *
 * @example
 * ```typescript
 * const entry = createAuditEntry(1, {
 *   type: 'ContentCreated',
 *   id: 1,
 *   creator: 'alice',
 *   title: 'Report',
 *   ts: 1700000000,
 * });
 * ```
 */
export function createAuditEntry(seq: number, event: LedgerEvent, recordedAt: Date = new Date()): AuditEntry {
  return {
    version: AUDIT_VERSION,
    id: generateAuditId(recordedAt.getTime()),
    seq,
    recorded_at: recordedAt.toISOString(),
    event,
  };
}

/**
 * Validation result type.
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Validate an audit entry.
 */
export function validateAuditEntry(entry: unknown): ValidationResult {
  const result = AuditEntrySchema.safeParse(entry);
  if (result.success) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}

/**
 * Check if an object is a valid audit entry.
 */
export function isValidAuditEntry(entry: unknown): entry is AuditEntry {
  return AuditEntrySchema.safeParse(entry).success;
}
