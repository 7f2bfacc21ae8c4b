/**
 * Ledger state and its single-writer transaction boundary
 *
 * All ledger data lives in one `LedgerData` value. Mutations run against a
 * cloned draft that replaces the live value only if the mutation returns
 * normally; a throw leaves the live value untouched.
 */

import type { ContentId, PrincipalId, Timestamp, TokenId } from '@sealdrop/kernel';
import type { CiphertextHandle } from '@sealdrop/crypto';

export interface ContentItem {
  id: ContentId;
  creator: PrincipalId;
  payload: CiphertextHandle;
  price: CiphertextHandle;
  createdAt: Timestamp;
  active: boolean;
  title: string;
  description: string;
}

export interface AccessGrant {
  contentId: ContentId;
  user: PrincipalId;
  /** Token backing the grant; the latest one after a renewal */
  tokenId?: TokenId;
  /** Cleared by revocation; the record itself is kept */
  active: boolean;
  grantedAt: Timestamp;
}

export interface AccessToken {
  id: TokenId;
  contentId: ContentId;
  owner: PrincipalId;
  issuedAt: Timestamp;
  expiresAt: Timestamp;
  valid: boolean;
  accessKey: CiphertextHandle;
}

export interface LedgerData {
  nextContentId: ContentId;
  nextTokenId: TokenId;
  contents: Map<ContentId, ContentItem>;
  /** Keyed by grantKey(contentId, user), in first-purchase order */
  grants: Map<string, AccessGrant>;
  tokens: Map<TokenId, AccessToken>;
  contentByOwner: Map<PrincipalId, ContentId[]>;
  tokensByOwner: Map<PrincipalId, TokenId[]>;
}

export function emptyLedgerData(): LedgerData {
  return {
    nextContentId: 1,
    nextTokenId: 1,
    contents: new Map(),
    grants: new Map(),
    tokens: new Map(),
    contentByOwner: new Map(),
    tokensByOwner: new Map(),
  };
}

export function grantKey(contentId: ContentId, user: PrincipalId): string {
  return `${contentId}:${user}`;
}

export function appendIndex<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key);
  if (list) {
    list.push(value);
  } else {
    index.set(key, [value]);
  }
}

export class LedgerStore {
  private data: LedgerData;

  constructor(initial: LedgerData = emptyLedgerData()) {
    this.data = initial;
  }

  /**
   * Run a query against the last committed state.
   */
  read<T>(fn: (data: Readonly<LedgerData>) => T): T {
    return fn(this.data);
  }

  /**
   * Run a mutation as one transaction.
   *
   * The draft is discarded if `fn` throws. Transactions do not nest.
   * Each call copies the whole state, so a write costs time proportional
   * to the number of items, grants and tokens held.
   */
  transact<T>(fn: (draft: LedgerData) => T): T {
    const draft = structuredClone(this.data);
    const result = fn(draft);
    this.data = draft;
    return result;
  }
}
