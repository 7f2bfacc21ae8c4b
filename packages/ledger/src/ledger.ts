/**
 * Content ledger
 *
 * Public surface over the registry, grant ledger and token store. State
 * transitions run as single transactions; their audit events are appended
 * only after the transaction commits, in the order the transitions happened.
 */

import {
  LedgerError,
  isLedgerError,
  type ContentId,
  type PrincipalId,
  type Timestamp,
  type TokenId,
} from '@sealdrop/kernel';
import {
  hexToBytes,
  isCryptoError,
  type CiphertextHandle,
  type DecryptionResponse,
  type EncryptionCapability,
} from '@sealdrop/crypto';
import { AuditLog, type LedgerEvent } from '@sealdrop/audit';
import { SystemClock, type Clock } from './clock.js';
import { resolveConfig, type LedgerConfig, type LedgerConfigInput } from './config.js';
import {
  DecryptionGateway,
  type DecryptionResult,
  type DecryptionResultHandler,
  type PendingDecryption,
} from './decryption.js';
import { grantsForContent, hasAccess, purchase, revoke } from './grants.js';
import { createLogger, type Logger } from './logging.js';
import {
  contentInfo,
  registerContent,
  replacePayload,
  requireActive,
  requireContent,
  requireCreator,
  type ContentInfo,
  type NewContent,
} from './registry.js';
import {
  LedgerStore,
  grantKey,
  type AccessGrant,
  type ContentItem,
  type LedgerData,
} from './state.js';
import { requireToken, tokenInfo, type TokenInfo } from './tokens.js';

export interface ContentLedgerOptions {
  capability: EncryptionCapability;
  config?: LedgerConfigInput;
  clock?: Clock;
  logger?: Logger;
  audit?: AuditLog;
  /** Overrides config.oraclePublicKey */
  oraclePublicKey?: Uint8Array;
}

type EventSink = LedgerEvent[];

export class ContentLedger {
  readonly config: LedgerConfig;
  readonly audit: AuditLog;
  private readonly capability: EncryptionCapability;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly store = new LedgerStore();
  private readonly decryptions: DecryptionGateway;

  constructor(options: ContentLedgerOptions) {
    this.capability = options.capability;
    this.config = resolveConfig({
      ...options.config,
      systemPrincipal: options.config?.systemPrincipal ?? options.capability.systemPrincipal,
    });
    if (this.config.systemPrincipal !== this.capability.systemPrincipal) {
      throw new LedgerError(
        'E_INVALID_INPUT',
        'systemPrincipal does not match the encryption capability',
        { field: 'systemPrincipal' }
      );
    }
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? createLogger(this.config);
    this.audit =
      options.audit ??
      new AuditLog({
        onListenerError: (err, entry) => {
          this.logger.error({ err, seq: entry.seq }, 'audit subscriber failed');
        },
      });
    const oracleKey =
      options.oraclePublicKey ??
      (this.config.oraclePublicKey ? hexToBytes(this.config.oraclePublicKey) : undefined);
    this.decryptions = new DecryptionGateway(oracleKey);
  }

  // Content Registry

  createContent(creator: PrincipalId, input: NewContent): ContentId {
    const item = this.commit('createContent', (draft, events) => {
      const now = this.clock.now();
      const created = registerContent(draft, this.capability, creator, input, now);
      events.push({
        type: 'ContentCreated',
        id: created.id,
        creator,
        title: created.title,
        ts: now,
      });
      return created;
    });
    this.logger.info({ contentId: item.id, creator }, 'content created');
    return item.id;
  }

  setActive(contentId: ContentId, caller: PrincipalId, isActive: boolean): void {
    this.commit('setActive', (draft, events) => {
      const item = requireContent(draft, contentId);
      requireCreator(item, caller);
      item.active = isActive;
      const ts = this.clock.now();
      events.push({ type: 'ContentStatusChanged', contentId, active: isActive, ts });
    });
    this.logger.info({ contentId, active: isActive }, 'content status changed');
  }

  getInfo(contentId: ContentId): ContentInfo {
    return this.query('getInfo', (data) => contentInfo(requireContent(data, contentId)));
  }

  /**
   * Encrypted price, readable by the creator and the system principal only.
   */
  getPriceHandle(caller: PrincipalId, contentId: ContentId): CiphertextHandle {
    return this.query('getPriceHandle', (data) => {
      const item = requireContent(data, contentId);
      if (caller !== this.capability.systemPrincipal) {
        requireCreator(item, caller);
      }
      return item.price;
    });
  }

  /**
   * Re-encrypt the payload under a new handle. Holders whose access has
   * lapsed or been revoked cannot decrypt the new handle.
   */
  rotatePayload(caller: PrincipalId, contentId: ContentId, payload: bigint): CiphertextHandle {
    const handle = this.commit('rotatePayload', (draft, events) => {
      const now = this.clock.now();
      const item = requireContent(draft, contentId);
      requireCreator(item, caller);
      const readers = grantsForContent(draft, contentId)
        .filter((grant) => hasAccess(draft, contentId, grant.user, now))
        .map((grant) => grant.user);
      const rotated = replacePayload(item, this.capability, payload, readers);
      events.push({ type: 'PayloadRotated', contentId, ts: now });
      return rotated;
    });
    this.logger.info({ contentId }, 'payload rotated');
    return handle;
  }

  // Access Grant Ledger

  purchaseAccess(buyer: PrincipalId, contentId: ContentId, duration: number): TokenId {
    const token = this.commit('purchaseAccess', (draft, events) => {
      const now = this.clock.now();
      const result = purchase(
        draft,
        this.capability,
        buyer,
        contentId,
        duration,
        now,
        this.config.maxAccessDurationSeconds
      );
      events.push({
        type: 'AccessPurchased',
        contentId,
        buyer,
        tokenId: result.token.id,
        expiresAt: result.token.expiresAt,
      });
      return result.token;
    });
    this.logger.info(
      { contentId, buyer, tokenId: token.id, expiresAt: token.expiresAt },
      'access purchased'
    );
    return token.id;
  }

  revokeAccess(caller: PrincipalId, contentId: ContentId, user: PrincipalId): void {
    const grant = this.commit('revokeAccess', (draft, events) => {
      const revoked = revoke(draft, caller, contentId, user);
      events.push({ type: 'AccessRevoked', contentId, user, ts: this.clock.now() });
      return revoked;
    });
    this.logger.info({ contentId, user, tokenId: grant.tokenId }, 'access revoked');
  }

  checkAccess(contentId: ContentId, user: PrincipalId): boolean {
    return this.store.read((data) => hasAccess(data, contentId, user, this.clock.now()));
  }

  /**
   * Return the payload handle to a caller with live access.
   */
  accessContent(caller: PrincipalId, contentId: ContentId): CiphertextHandle {
    const now = this.clock.now();
    const handle = this.query(
      'accessContent',
      (data) => this.requireReadable(data, caller, contentId, now).payload
    );
    this.record([{ type: 'ContentAccessed', contentId, user: caller, ts: now }]);
    this.logger.info({ contentId, user: caller }, 'content accessed');
    return handle;
  }

  getGrant(contentId: ContentId, user: PrincipalId): AccessGrant | undefined {
    return this.store.read((data) => {
      const grant = data.grants.get(grantKey(contentId, user));
      return grant ? { ...grant } : undefined;
    });
  }

  listGrantsByContent(caller: PrincipalId, contentId: ContentId): AccessGrant[] {
    return this.query('listGrantsByContent', (data) => {
      requireCreator(requireContent(data, contentId), caller);
      return grantsForContent(data, contentId);
    });
  }

  // Token Store and indexes

  getTokenInfo(tokenId: TokenId): TokenInfo {
    return this.query('getTokenInfo', (data) =>
      tokenInfo(requireToken(data, tokenId), this.clock.now())
    );
  }

  listContentByOwner(principal: PrincipalId): ContentId[] {
    return this.store.read((data) => [...(data.contentByOwner.get(principal) ?? [])]);
  }

  listTokensByOwner(principal: PrincipalId): TokenId[] {
    return this.store.read((data) => [...(data.tokensByOwner.get(principal) ?? [])]);
  }

  totalContentCount(): number {
    return this.store.read((data) => data.nextContentId - 1);
  }

  totalTokenCount(): number {
    return this.store.read((data) => data.nextTokenId - 1);
  }

  // Decryption

  /**
   * Submit the payload for oracle decryption on behalf of a caller with
   * live access. `onResult` receives the values once a verified response
   * arrives for the returned request id.
   */
  requestDecryption(
    caller: PrincipalId,
    contentId: ContentId,
    onResult: DecryptionResultHandler
  ): string {
    const request = this.query('requestDecryption', (data) => {
      const item = this.requireReadable(data, caller, contentId);
      const handles = [item.payload];
      // Failed completions are already audited and logged by completeDecryption
      const requestId = this.capability.requestDecryption(handles, (response) =>
        this.completeDecryption(response).then(
          () => undefined,
          () => undefined
        )
      );
      return { requestId, requester: caller, contentId, handles, onResult };
    });
    this.decryptions.track(request);
    this.record([{
      type: 'DecryptionRequested',
      requestId: request.requestId,
      requester: caller,
      contentId,
      handleCount: request.handles.length,
      ts: this.clock.now(),
    }]);
    this.logger.info(
      { requestId: request.requestId, contentId, requester: caller },
      'decryption requested'
    );
    return request.requestId;
  }

  /**
   * Accept an oracle response. The request is consumed whether or not the
   * response is accepted; access is checked again before values are released.
   */
  async completeDecryption(response: DecryptionResponse): Promise<DecryptionResult> {
    const request = this.query('completeDecryption', () =>
      this.decryptions.take(response.requestId)
    );

    let values: bigint[];
    try {
      values = await this.decryptions.verify(request, response);
      this.store.read((data) => this.requireReadable(data, request.requester, request.contentId));
    } catch (err) {
      const error = translateCryptoError(err);
      this.rejectDecryption(request, error);
      throw error;
    }

    const result: DecryptionResult = {
      requestId: request.requestId,
      contentId: request.contentId,
      requester: request.requester,
      values,
    };
    this.record([{
      type: 'DecryptionFulfilled',
      requestId: request.requestId,
      requester: request.requester,
      ts: this.clock.now(),
    }]);
    this.logger.info(
      { requestId: request.requestId, contentId: request.contentId },
      'decryption fulfilled'
    );
    request.onResult(result);
    return result;
  }

  get pendingDecryptions(): number {
    return this.decryptions.pendingCount;
  }

  private requireReadable(
    data: Readonly<LedgerData>,
    caller: PrincipalId,
    contentId: ContentId,
    now: Timestamp = this.clock.now()
  ): ContentItem {
    const item = requireContent(data, contentId);
    requireActive(item);
    if (!hasAccess(data, contentId, caller, now)) {
      throw new LedgerError('E_NO_ACCESS', `${caller} has no access to content ${contentId}`, {
        contentId,
      });
    }
    return item;
  }

  private rejectDecryption(request: PendingDecryption, error: unknown): void {
    const detail = isLedgerError(error) ? error.details?.reason : undefined;
    const reason =
      typeof detail === 'string' ? detail : isLedgerError(error) ? error.code : 'internal error';
    this.record([{
      type: 'DecryptionRejected',
      requestId: request.requestId,
      requester: request.requester,
      reason,
      ts: this.clock.now(),
    }]);
    const fields = { requestId: request.requestId, reason };
    if (isLedgerError(error, 'E_VERIFICATION_FAILED')) {
      this.logger.warn(fields, 'decryption response rejected');
    } else if (isLedgerError(error)) {
      this.logger.debug(fields, 'decryption response rejected');
    } else {
      this.logger.error({ ...fields, err: error }, 'decryption completion failed');
    }
  }

  private commit<T>(operation: string, fn: (draft: LedgerData, events: EventSink) => T): T {
    const events: EventSink = [];
    let result: T;
    try {
      result = this.store.transact((draft) => fn(draft, events));
    } catch (err) {
      throw this.reject(operation, err);
    }
    this.record(events);
    return result;
  }

  /**
   * Append events for a change that has already taken effect. Subscriber
   * failures are logged here; they cannot undo the change.
   */
  private record(events: readonly LedgerEvent[]): void {
    try {
      this.audit.appendAll(events);
    } catch (err) {
      this.logger.error({ err, events: events.map((e) => e.type) }, 'audit subscriber failed');
    }
  }

  private query<T>(operation: string, fn: (data: Readonly<LedgerData>) => T): T {
    try {
      return this.store.read(fn);
    } catch (err) {
      throw this.reject(operation, err);
    }
  }

  private reject(operation: string, err: unknown): unknown {
    const error = translateCryptoError(err);
    if (isLedgerError(error)) {
      this.logger.debug({ operation, code: error.code }, 'operation rejected');
    } else {
      this.logger.error({ err: error, operation }, 'operation failed');
    }
    return error;
  }
}

/**
 * Map capability failures the ledger expects onto ledger error codes.
 */
function translateCryptoError(err: unknown): unknown {
  if (isCryptoError(err, 'CRYPTO_DECRYPT_DENIED')) {
    return new LedgerError('E_NO_ACCESS', err.message);
  }
  if (isCryptoError(err, 'CRYPTO_VALUE_OUT_OF_RANGE')) {
    return new LedgerError('E_INVALID_INPUT', err.message);
  }
  return err;
}
