import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { LedgerConfig } from './config.js';

/**
 * Fields that carry key material or plaintext and never reach a log line
 */
export const REDACT_PATHS = ['*.privateKey', '*.secretKey', '*.cleartexts', '*.payload', '*.price'];

export type { Logger };

export function createLogger(
  config: Pick<LedgerConfig, 'logLevel'>,
  destination?: DestinationStream
): Logger {
  const options: LoggerOptions = {
    name: 'sealdrop',
    level: config.logLevel,
    base: { service: 'sealdrop-ledger' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
