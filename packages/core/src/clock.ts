/**
 * Time source for the ledger and scheduler.
 * Values are unix seconds (fractional allowed).
 */

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now() / 1000,
};

/** Clock that only moves when told to. Never goes backward. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 1_700_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    if (seconds < 0) throw new RangeError('ManualClock cannot move backward');
    this.current += seconds;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) throw new RangeError('ManualClock cannot move backward');
    this.current = timestamp;
  }
}
