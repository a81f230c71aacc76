/**
 * System generation and probation for the simulated target.
 *
 * A freshly installed system is 'tried' until its probation period elapses
 * with no lock held, at which point it becomes 'good'. Locks taken once the
 * system is good are ignored. State is settled lazily against the clock, so
 * callers must settle before reading or mutating.
 */

import type { SystemStatus, SystemStatusKind } from '../types/device-state.js';

export type LockResult = 'locked' | 'ignored';

/** Boots a system may take under probation before it is marked bad */
export const MAX_PROBATION_TRIES = 4;

export class ProbationState {
  private index = 0;
  private status: SystemStatusKind = 'good';
  private tries = 0;
  private startedAt: number;
  private readonly locks = new Map<string, number>();

  constructor(
    private probationMs: number,
    now: number,
  ) {
    this.startedAt = now;
  }

  get systemIndex(): number {
    return this.index;
  }

  get period(): number {
    return this.probationMs;
  }

  snapshot(): SystemStatus {
    return this.status === 'tried' ? { kind: 'tried', tries: this.tries } : { kind: this.status };
  }

  /** A new generation: index moves on and probation starts over */
  install(now: number): void {
    this.index += 1;
    this.status = 'tried';
    this.tries = 1;
    this.startedAt = now;
    this.locks.clear();
  }

  setPeriod(ms: number, now: number): void {
    this.probationMs = ms;
    this.settle(now);
  }

  settle(now: number): void {
    if (this.status === 'tried' && this.lockCount() === 0 && now - this.startedAt >= this.probationMs) {
      this.status = 'good';
    }
  }

  acquire(holder: string, now: number): LockResult {
    this.settle(now);
    if (this.status !== 'tried') {
      return 'ignored';
    }
    this.locks.set(holder, (this.locks.get(holder) ?? 0) + 1);
    return 'locked';
  }

  heldBy(holder: string): number {
    return this.locks.get(holder) ?? 0;
  }

  lockCount(): number {
    let total = 0;
    for (const count of this.locks.values()) {
      total += count;
    }
    return total;
  }

  /** Boot of the same generation: locks are gone, a tried system counts another try */
  restart(now: number): void {
    this.locks.clear();
    if (this.status !== 'tried') {
      return;
    }
    this.tries += 1;
    this.startedAt = now;
    if (this.tries > MAX_PROBATION_TRIES) {
      this.status = 'bad';
    }
  }
}
