/**
 * Decryption completion
 *
 * Requests are tracked by the correlation id the capability returns. A
 * response is accepted only if the oracle's Ed25519 signature covers the
 * request id, the requested handles and the cleartexts, in that order.
 * Every pending request is consumed by its first response, accepted or not.
 */

import { LedgerError, type ContentId, type PrincipalId } from '@sealdrop/kernel';
import {
  verifyDecryptionPayload,
  type CiphertextHandle,
  type DecryptionResponse,
} from '@sealdrop/crypto';

export interface DecryptionResult {
  requestId: string;
  contentId: ContentId;
  requester: PrincipalId;
  /** One value per requested handle */
  values: bigint[];
}

export type DecryptionResultHandler = (result: DecryptionResult) => void;

export interface PendingDecryption {
  requestId: string;
  requester: PrincipalId;
  contentId: ContentId;
  handles: CiphertextHandle[];
  onResult: DecryptionResultHandler;
}

const DECIMAL = /^(0|[1-9][0-9]*)$/;

function verificationFailed(requestId: string, reason: string): LedgerError {
  return new LedgerError('E_VERIFICATION_FAILED', `Decryption response ${requestId}: ${reason}`, {
    requestId,
    reason,
  });
}

export class DecryptionGateway {
  private readonly pending = new Map<string, PendingDecryption>();

  constructor(private readonly oraclePublicKey?: Uint8Array) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  track(request: PendingDecryption): void {
    this.pending.set(request.requestId, request);
  }

  /**
   * Remove a pending request so it cannot be completed twice.
   */
  take(requestId: string): PendingDecryption {
    const request = this.pending.get(requestId);
    if (!request) {
      throw new LedgerError('E_NOT_FOUND', `No pending decryption request ${requestId}`, {
        requestId,
      });
    }
    this.pending.delete(requestId);
    return request;
  }

  /**
   * Check the oracle's response and return the decrypted values.
   */
  async verify(request: PendingDecryption, response: DecryptionResponse): Promise<bigint[]> {
    if (!this.oraclePublicKey) {
      throw verificationFailed(request.requestId, 'no oracle key configured');
    }
    if (response.cleartexts.length !== request.handles.length) {
      throw verificationFailed(request.requestId, 'cleartext count mismatch');
    }
    const valid = await verifyDecryptionPayload(
      {
        requestId: request.requestId,
        handles: request.handles.map((h) => h.handle),
        cleartexts: response.cleartexts,
      },
      response.signature,
      this.oraclePublicKey
    );
    if (!valid) {
      throw verificationFailed(request.requestId, 'invalid signature');
    }
    if (!response.cleartexts.every((c) => DECIMAL.test(c))) {
      throw verificationFailed(request.requestId, 'malformed cleartext');
    }
    return response.cleartexts.map((c) => BigInt(c));
  }
}
