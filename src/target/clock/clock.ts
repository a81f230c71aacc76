/**
 * Time source for every wait in the harness.
 *
 * Real targets use the system clock. The simulated target runs on a virtual
 * clock whose sleep advances time instantly, so a suite with minutes of
 * probation and reboot waits completes in milliseconds.
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise<void>(resolve => setTimeout(resolve, Math.max(0, ms))),
};

export class VirtualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.advance(Math.max(0, ms));
  }

  advance(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`Cannot advance a virtual clock by ${ms}ms`);
    }
    this.current += ms;
  }
}
