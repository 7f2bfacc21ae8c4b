/**
 * Sealdrop Kernel Types
 * Shared identifiers used across the ledger packages
 */

/**
 * Identity that can hold rights: a user, a creator, or the ledger itself
 */
export type PrincipalId = string;

/** Content identifier, assigned from 1 upward and never reused */
export type ContentId = number;

/** Access token identifier, assigned from 1 upward and never reused */
export type TokenId = number;

/** Unix time in whole seconds */
export type Timestamp = number;

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  http_status: number;
  title: string;
  description: string;
  retriable: boolean;
  category: 'validation' | 'authorization' | 'state' | 'verification';
}
