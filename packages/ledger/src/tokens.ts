/**
 * Token Store
 *
 * Tokens are append-only. Revocation flips `valid`; expiry is never swept
 * and is computed from `expiresAt` at the moment of each check.
 */

import {
  LIMITS,
  LedgerError,
  type ContentId,
  type PrincipalId,
  type Timestamp,
  type TokenId,
} from '@sealdrop/kernel';
import type { EncryptionCapability } from '@sealdrop/crypto';
import { appendIndex, type AccessToken, type LedgerData } from './state.js';

export interface TokenInfo {
  contentId: ContentId;
  owner: PrincipalId;
  expiresAt: Timestamp;
  valid: boolean;
  /** True once `expiresAt <= now` */
  expired: boolean;
  issuedAt: Timestamp;
}

/**
 * Compute `now + duration`, rejecting non-positive, fractional or
 * overflowing durations.
 */
export function computeExpiry(now: Timestamp, duration: number, maxDuration?: number): Timestamp {
  if (!Number.isSafeInteger(duration) || duration <= 0) {
    throw new LedgerError('E_INVALID_INPUT', 'duration must be a positive integer', { field: 'duration' });
  }
  if (maxDuration !== undefined && duration > maxDuration) {
    throw new LedgerError('E_INVALID_INPUT', `duration exceeds ${maxDuration} seconds`, {
      field: 'duration',
    });
  }
  if (duration > LIMITS.maxSafeInteger - now) {
    throw new LedgerError('E_INVALID_INPUT', 'expiry overflows', { field: 'duration' });
  }
  return now + duration;
}

export function isTokenLive(token: AccessToken, now: Timestamp): boolean {
  return token.valid && token.expiresAt > now;
}

export function requireToken(data: Readonly<LedgerData>, tokenId: TokenId): AccessToken {
  const token = data.tokens.get(tokenId);
  if (!token) {
    throw new LedgerError('E_NOT_FOUND', `Token ${tokenId} not found`, { tokenId });
  }
  return token;
}

/**
 * Issue a token with a fresh random key handle decryptable by `owner`.
 */
export function mintToken(
  draft: LedgerData,
  capability: EncryptionCapability,
  contentId: ContentId,
  owner: PrincipalId,
  expiresAt: Timestamp,
  now: Timestamp
): AccessToken {
  if (draft.nextTokenId > LIMITS.maxSafeInteger) {
    throw new LedgerError('E_INVALID_INPUT', 'Token id space exhausted');
  }
  const accessKey = capability.randomCiphertext('euint256');
  capability.grantDecrypt(accessKey, owner);

  const token: AccessToken = {
    id: draft.nextTokenId,
    contentId,
    owner,
    issuedAt: now,
    expiresAt,
    valid: true,
    accessKey,
  };
  draft.tokens.set(token.id, token);
  appendIndex(draft.tokensByOwner, owner, token.id);
  draft.nextTokenId++;
  return token;
}

/**
 * Mark a token invalid. Invalidating an invalid token is a no-op.
 */
export function invalidateToken(draft: LedgerData, tokenId: TokenId): void {
  requireToken(draft, tokenId).valid = false;
}

export function tokenInfo(token: AccessToken, now: Timestamp): TokenInfo {
  return {
    contentId: token.contentId,
    owner: token.owner,
    expiresAt: token.expiresAt,
    valid: token.valid,
    expired: token.expiresAt <= now,
    issuedAt: token.issuedAt,
  };
}
