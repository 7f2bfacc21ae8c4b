/**
 * Sealdrop Kernel
 * Shared identifiers, constants and errors for the sealdrop ledger
 *
 * @packageDocumentation
 */

export type { PrincipalId, ContentId, TokenId, Timestamp, ErrorDefinition } from './types.js';

export { DEFAULT_SYSTEM_PRINCIPAL, LIMITS } from './constants.js';

export {
  ERROR_CODES,
  ERRORS,
  LedgerError,
  isLedgerError,
  getError,
  isRetriable,
  type ErrorCode,
} from './errors.js';
