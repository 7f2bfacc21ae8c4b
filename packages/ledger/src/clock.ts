import type { Timestamp } from '@sealdrop/kernel';

/**
 * Source of the current time in integer Unix seconds.
 *
 * Expiry is evaluated against this on every check; nothing is scheduled.
 */
export interface Clock {
  now(): Timestamp;
}

export class SystemClock implements Clock {
  now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  private current: Timestamp;

  constructor(start: Timestamp = 0) {
    this.current = start;
  }

  now(): Timestamp {
    return this.current;
  }

  advance(seconds: number): Timestamp {
    this.current += seconds;
    return this.current;
  }

  set(timestamp: Timestamp): void {
    this.current = timestamp;
  }
}
