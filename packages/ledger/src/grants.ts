/**
 * Access Grant Ledger
 *
 * One grant per (content, user). `hasAccess` is the only access gate;
 * every reading path goes through it.
 */

import { LedgerError, type ContentId, type PrincipalId, type Timestamp } from '@sealdrop/kernel';
import type { EncryptionCapability } from '@sealdrop/crypto';
import { requireActive, requireContent, requireCreator, requirePrincipal } from './registry.js';
import { grantKey, type AccessGrant, type AccessToken, type LedgerData } from './state.js';
import { computeExpiry, invalidateToken, isTokenLive, mintToken } from './tokens.js';

/**
 * True iff `user` is the creator, or holds an active grant whose token is
 * valid and not yet expired. Unknown content yields false.
 */
export function hasAccess(
  data: Readonly<LedgerData>,
  contentId: ContentId,
  user: PrincipalId,
  now: Timestamp
): boolean {
  const item = data.contents.get(contentId);
  if (!item) {
    return false;
  }
  if (item.creator === user) {
    return true;
  }
  const grant = data.grants.get(grantKey(contentId, user));
  if (!grant || !grant.active || grant.tokenId === undefined) {
    return false;
  }
  const token = data.tokens.get(grant.tokenId);
  return token !== undefined && isTokenLive(token, now);
}

export interface PurchaseResult {
  grant: AccessGrant;
  token: AccessToken;
}

/**
 * Mint a token and record (or re-arm) the buyer's grant.
 *
 * Every check runs before the first capability call, so a rejected
 * purchase changes nothing.
 */
export function purchase(
  draft: LedgerData,
  capability: EncryptionCapability,
  buyer: PrincipalId,
  contentId: ContentId,
  duration: number,
  now: Timestamp,
  maxDuration?: number
): PurchaseResult {
  const item = requireContent(draft, contentId);
  requireActive(item);
  requirePrincipal(buyer, 'buyer');
  const expiresAt = computeExpiry(now, duration, maxDuration);
  if (item.creator === buyer) {
    throw new LedgerError('E_ALREADY_GRANTED', `Creator already has access to content ${contentId}`, {
      contentId,
    });
  }
  if (hasAccess(draft, contentId, buyer, now)) {
    throw new LedgerError('E_ALREADY_GRANTED', `${buyer} already has access to content ${contentId}`, {
      contentId,
    });
  }

  const token = mintToken(draft, capability, contentId, buyer, expiresAt, now);
  const key = grantKey(contentId, buyer);
  const grant: AccessGrant = draft.grants.get(key) ?? {
    contentId,
    user: buyer,
    active: true,
    grantedAt: now,
  };
  grant.tokenId = token.id;
  grant.active = true;
  draft.grants.set(key, grant);
  capability.grantDecrypt(item.payload, buyer);

  return { grant, token };
}

/**
 * Deactivate a grant and invalidate its token. Decrypt rights already
 * handed out on the payload handle stay in place.
 */
export function revoke(
  draft: LedgerData,
  caller: PrincipalId,
  contentId: ContentId,
  user: PrincipalId
): AccessGrant {
  const item = requireContent(draft, contentId);
  requireCreator(item, caller);
  if (user === item.creator) {
    throw new LedgerError('E_INVALID_INPUT', 'The creator cannot be revoked', { field: 'user' });
  }
  const grant = draft.grants.get(grantKey(contentId, user));
  if (!grant || !grant.active) {
    throw new LedgerError('E_NO_ACCESS', `${user} holds no active grant on content ${contentId}`, {
      contentId,
    });
  }
  grant.active = false;
  if (grant.tokenId !== undefined) {
    invalidateToken(draft, grant.tokenId);
  }
  return grant;
}

export function grantsForContent(data: Readonly<LedgerData>, contentId: ContentId): AccessGrant[] {
  const grants: AccessGrant[] = [];
  for (const grant of data.grants.values()) {
    if (grant.contentId === contentId) {
      grants.push({ ...grant });
    }
  }
  return grants;
}
