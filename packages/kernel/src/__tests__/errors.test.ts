import { describe, it, expect } from 'vitest';
import {
  ERROR_CODES,
  ERRORS,
  LedgerError,
  getError,
  isLedgerError,
  isRetriable,
} from '../errors.js';

describe('ERRORS registry', () => {
  it('defines every error code', () => {
    for (const code of Object.values(ERROR_CODES)) {
      expect(ERRORS[code].code).toBe(code);
    }
  });

  it('marks no code as retriable', () => {
    for (const code of Object.values(ERROR_CODES)) {
      expect(isRetriable(code)).toBe(false);
    }
  });

  it('returns undefined for unknown codes', () => {
    expect(getError('E_UNKNOWN')).toBeUndefined();
    expect(getError('toString')).toBeUndefined();
    expect(isRetriable('E_UNKNOWN')).toBe(false);
  });

  it('maps authorization failures to 403', () => {
    expect(getError('E_NO_ACCESS')?.http_status).toBe(403);
    expect(getError('E_UNAUTHORIZED')?.http_status).toBe(403);
  });
});

describe('LedgerError', () => {
  it('carries code, message and details', () => {
    const err = new LedgerError('E_NOT_FOUND', 'content 7 not found', { contentId: 7 });
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(LedgerError);
    expect(err.name).toBe('LedgerError');
    expect(err.code).toBe('E_NOT_FOUND');
    expect(err.message).toBe('content 7 not found');
    expect(err.details).toEqual({ contentId: 7 });
  });

  it('narrows with isLedgerError', () => {
    const err: unknown = new LedgerError('E_INACTIVE', 'inactive');
    expect(isLedgerError(err)).toBe(true);
    expect(isLedgerError(err, 'E_INACTIVE')).toBe(true);
    expect(isLedgerError(err, 'E_NOT_FOUND')).toBe(false);
    expect(isLedgerError(new Error('plain'))).toBe(false);
  });
});
