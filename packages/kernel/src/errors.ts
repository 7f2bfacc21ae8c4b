/**
 * Sealdrop Error Codes
 *
 * Every failed ledger operation throws a LedgerError carrying one of these
 * codes. Nothing is retried internally; the registry marks every code as
 * non-retriable so callers can decide on their own policy.
 */

import type { ErrorDefinition } from './types.js';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_INVALID_INPUT: 'E_INVALID_INPUT',
  E_NOT_FOUND: 'E_NOT_FOUND',
  E_INACTIVE: 'E_INACTIVE',
  E_ALREADY_GRANTED: 'E_ALREADY_GRANTED',
  E_NO_ACCESS: 'E_NO_ACCESS',
  E_UNAUTHORIZED: 'E_UNAUTHORIZED',
  E_VERIFICATION_FAILED: 'E_VERIFICATION_FAILED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_INVALID_INPUT: {
    code: 'E_INVALID_INPUT',
    http_status: 400,
    title: 'Invalid Input',
    description: 'A required field is empty, a duration is not positive, or a value overflows',
    retriable: false,
    category: 'validation',
  },
  E_NOT_FOUND: {
    code: 'E_NOT_FOUND',
    http_status: 404,
    title: 'Not Found',
    description: 'The referenced content, token or decryption request does not exist',
    retriable: false,
    category: 'state',
  },
  E_INACTIVE: {
    code: 'E_INACTIVE',
    http_status: 409,
    title: 'Content Inactive',
    description: 'The content has been deactivated by its creator',
    retriable: false,
    category: 'state',
  },
  E_ALREADY_GRANTED: {
    code: 'E_ALREADY_GRANTED',
    http_status: 409,
    title: 'Already Granted',
    description: 'The principal already holds live access to this content',
    retriable: false,
    category: 'state',
  },
  E_NO_ACCESS: {
    code: 'E_NO_ACCESS',
    http_status: 403,
    title: 'No Access',
    description: 'The principal holds no valid, unexpired access to this content',
    retriable: false,
    category: 'authorization',
  },
  E_UNAUTHORIZED: {
    code: 'E_UNAUTHORIZED',
    http_status: 403,
    title: 'Unauthorized',
    description: 'Only the creator of the content may perform this operation',
    retriable: false,
    category: 'authorization',
  },
  E_VERIFICATION_FAILED: {
    code: 'E_VERIFICATION_FAILED',
    http_status: 400,
    title: 'Verification Failed',
    description: 'A decryption response was not signed by the configured oracle key',
    retriable: false,
    category: 'verification',
  },
};

/**
 * Typed error for ledger operations
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class LedgerError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.details = details;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, LedgerError.prototype);
  }
}

/**
 * Narrow an unknown error to a LedgerError, optionally of a given code
 */
export function isLedgerError(err: unknown, code?: ErrorCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}

/**
 * Get error definition by code
 */
export function getError(code: string): ErrorDefinition | undefined {
  return isErrorCode(code) ? ERRORS[code] : undefined;
}

/**
 * Check if error is retriable
 */
export function isRetriable(code: string): boolean {
  return getError(code)?.retriable ?? false;
}

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERRORS, code);
}
