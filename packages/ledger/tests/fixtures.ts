/**
 * Shared setup for ledger tests
 */

import { pino } from 'pino';
import { isLedgerError } from '@sealdrop/kernel';
import { InMemoryFheCapability } from '@sealdrop/crypto';
import { fixtureSeed, generateKeypairFromSeed } from '@sealdrop/crypto/testkit';
import { ContentLedger, ManualClock, type ContentLedgerOptions } from '../src/index.js';

export const SYSTEM = 'test:system';
export const T0 = 1_700_000_000;

export const REPORT = {
  payload: 4242n,
  price: 100n,
  title: 'Report',
  description: 'Quarterly numbers',
};

export async function createTestLedger(overrides: Partial<ContentLedgerOptions> = {}) {
  const oracle = await generateKeypairFromSeed(fixtureSeed(7));
  const capability = new InMemoryFheCapability({
    systemPrincipal: SYSTEM,
    oracleSecretKey: oracle.privateKey,
  });
  const clock = new ManualClock(T0);
  const ledger = new ContentLedger({
    capability,
    clock,
    logger: pino({ level: 'silent' }),
    oraclePublicKey: oracle.publicKey,
    ...overrides,
  });
  return { ledger, capability, clock, oracle };
}

/**
 * Error code thrown by `fn`, or undefined if it returned
 */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isLedgerError(err) ? err.code : `unexpected: ${String(err)}`;
  }
  return undefined;
}
