/**
 * Content Registry
 *
 * Content items are created once and never deleted; only the creator may
 * flip `active` or re-key the payload.
 */

import {
  LIMITS,
  LedgerError,
  type ContentId,
  type PrincipalId,
  type Timestamp,
} from '@sealdrop/kernel';
import type { CiphertextHandle, EncryptionCapability } from '@sealdrop/crypto';
import { appendIndex, type ContentItem, type LedgerData } from './state.js';

export interface NewContent {
  /** Cleartext payload, encrypted as euint256 */
  payload: bigint;
  /** Cleartext price, encrypted as euint64 */
  price: bigint;
  title: string;
  description: string;
}

export interface ContentInfo {
  creator: PrincipalId;
  title: string;
  description: string;
  createdAt: Timestamp;
  active: boolean;
}

export function requireContent(data: Readonly<LedgerData>, contentId: ContentId): ContentItem {
  const item = data.contents.get(contentId);
  if (!item) {
    throw new LedgerError('E_NOT_FOUND', `Content ${contentId} not found`, { contentId });
  }
  return item;
}

export function requireActive(item: ContentItem): void {
  if (!item.active) {
    throw new LedgerError('E_INACTIVE', `Content ${item.id} is inactive`, { contentId: item.id });
  }
}

export function requireCreator(item: ContentItem, caller: PrincipalId): void {
  if (item.creator !== caller) {
    throw new LedgerError('E_UNAUTHORIZED', `Only the creator of content ${item.id} may do this`, {
      contentId: item.id,
    });
  }
}

export function requirePrincipal(principal: PrincipalId, field: string): void {
  if (principal.trim().length === 0) {
    throw new LedgerError('E_INVALID_INPUT', `${field} must not be empty`, { field });
  }
}

function requireText(value: string, field: string): void {
  if (value.trim().length === 0) {
    throw new LedgerError('E_INVALID_INPUT', `${field} must not be empty`, { field });
  }
}

function requireInRange(value: bigint, max: bigint, field: string): void {
  if (value < 0n || value > max) {
    throw new LedgerError('E_INVALID_INPUT', `${field} is out of range`, { field });
  }
}

export function requirePayloadValue(payload: bigint): void {
  requireInRange(payload, LIMITS.maxUint256, 'payload');
}

/**
 * Encrypt and register a new content item in the draft.
 */
export function registerContent(
  draft: LedgerData,
  capability: EncryptionCapability,
  creator: PrincipalId,
  input: NewContent,
  now: Timestamp
): ContentItem {
  requirePrincipal(creator, 'creator');
  requireText(input.title, 'title');
  requireText(input.description, 'description');
  requirePayloadValue(input.payload);
  requireInRange(input.price, LIMITS.maxUint64, 'price');
  if (draft.nextContentId > LIMITS.maxSafeInteger) {
    throw new LedgerError('E_INVALID_INPUT', 'Content id space exhausted');
  }

  const payload = capability.encrypt(input.payload, 'euint256');
  const price = capability.encrypt(input.price, 'euint64');
  for (const handle of [payload, price]) {
    capability.grantDecrypt(handle, creator);
    capability.grantDecrypt(handle, capability.systemPrincipal);
  }

  const item: ContentItem = {
    id: draft.nextContentId,
    creator,
    payload,
    price,
    createdAt: now,
    active: true,
    title: input.title,
    description: input.description,
  };
  draft.contents.set(item.id, item);
  appendIndex(draft.contentByOwner, creator, item.id);
  draft.nextContentId++;
  return item;
}

export function contentInfo(item: ContentItem): ContentInfo {
  return {
    creator: item.creator,
    title: item.title,
    description: item.description,
    createdAt: item.createdAt,
    active: item.active,
  };
}

/**
 * Replace the payload handle with a fresh encryption of `payload`.
 *
 * Only `readers` (plus creator and system) can decrypt the new handle.
 */
export function replacePayload(
  item: ContentItem,
  capability: EncryptionCapability,
  payload: bigint,
  readers: readonly PrincipalId[]
): CiphertextHandle {
  requirePayloadValue(payload);
  const handle = capability.encrypt(payload, 'euint256');
  const principals = new Set([item.creator, capability.systemPrincipal, ...readers]);
  for (const principal of principals) {
    capability.grantDecrypt(handle, principal);
  }
  item.payload = handle;
  return handle;
}
