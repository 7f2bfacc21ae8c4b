/**
 * Sealdrop Constants
 */

/**
 * Principal the ledger acts as when it holds rights on its own handles
 */
export const DEFAULT_SYSTEM_PRINCIPAL = 'sealdrop:system' as const;

/**
 * Numeric limits for identifiers, timestamps and encrypted integers
 */
export const LIMITS = {
  /** Largest timestamp or identifier the ledger will assign */
  maxSafeInteger: Number.MAX_SAFE_INTEGER,
  /** Upper bound of an euint64 price */
  maxUint64: (1n << 64n) - 1n,
  /** Upper bound of an euint256 payload */
  maxUint256: (1n << 256n) - 1n,
} as const;
