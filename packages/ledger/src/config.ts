/**
 * Ledger configuration
 *
 * Parsed from an object or from SEALDROP_* environment variables and
 * validated with zod. Invalid values fail with E_INVALID_INPUT naming the
 * offending field.
 */

import { z } from 'zod';
import { DEFAULT_SYSTEM_PRINCIPAL, LedgerError } from '@sealdrop/kernel';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const LedgerConfigSchema = z
  .object({
    /** Principal the ledger holds decrypt rights as */
    systemPrincipal: z.string().trim().min(1).default(DEFAULT_SYSTEM_PRINCIPAL),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    /** Upper bound on a single purchase duration, in seconds */
    maxAccessDurationSeconds: z.number().int().positive().optional(),
    /** Ed25519 public key (hex) that signs decryption responses */
    oraclePublicKey: z
      .string()
      .regex(/^[0-9a-fA-F]{64}$/, 'must be 64 hex characters')
      .optional(),
  })
  .strict();

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
export type LedgerConfigInput = z.input<typeof LedgerConfigSchema>;

/**
 * Validate a configuration object, filling defaults.
 */
export function resolveConfig(input: unknown = {}): LedgerConfig {
  const result = LedgerConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.') || 'config';
    throw new LedgerError('E_INVALID_INPUT', `Invalid configuration ${field}: ${issue.message}`, {
      field,
    });
  }
  return result.data;
}

function optionalString(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function optionalNumber(value: string | undefined): number | undefined {
  const raw = optionalString(value);
  return raw === undefined ? undefined : Number(raw);
}

/**
 * Parse configuration from environment variables.
 *
 * Unset or blank variables fall back to defaults.
 *
 * @param env - Environment variables as a Record
 */
export function parseConfigFromEnv(env: Record<string, string | undefined>): LedgerConfig {
  return resolveConfig({
    systemPrincipal: optionalString(env.SEALDROP_SYSTEM_PRINCIPAL),
    logLevel: optionalString(env.SEALDROP_LOG_LEVEL),
    maxAccessDurationSeconds: optionalNumber(env.SEALDROP_MAX_ACCESS_DURATION),
    oraclePublicKey: optionalString(env.SEALDROP_ORACLE_PUBLIC_KEY),
  });
}
