/**
 * @sealdrop/ledger
 *
 * Confidential content ledger: encrypted content items, time-limited
 * revocable access tokens, and an audited decryption flow.
 *
 * @example
 * ```typescript
 * import { ContentLedger } from '@sealdrop/ledger';
 *
 * const ledger = new ContentLedger({ capability });
 * const id = ledger.createContent('alice', {
 *   payload: 42n,
 *   price: 10n,
 *   title: 'Report',
 *   description: 'Quarterly numbers',
 * });
 * const tokenId = ledger.purchaseAccess('bob', id, 3600);
 * const handle = ledger.accessContent('bob', id);
 * ```
 *
 * @packageDocumentation
 */

export { ContentLedger, type ContentLedgerOptions } from './ledger.js';

export { SystemClock, ManualClock, type Clock } from './clock.js';

export {
  LedgerConfigSchema,
  LOG_LEVELS,
  resolveConfig,
  parseConfigFromEnv,
  type LedgerConfig,
  type LedgerConfigInput,
} from './config.js';

export { createLogger, REDACT_PATHS, type Logger } from './logging.js';

export type { ContentItem, AccessGrant, AccessToken, LedgerData } from './state.js';
export { LedgerStore, emptyLedgerData } from './state.js';

export type { NewContent, ContentInfo } from './registry.js';
export type { TokenInfo } from './tokens.js';
export { computeExpiry, isTokenLive } from './tokens.js';
export { hasAccess } from './grants.js';

export {
  DecryptionGateway,
  type DecryptionResult,
  type DecryptionResultHandler,
  type PendingDecryption,
} from './decryption.js';
