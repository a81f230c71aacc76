/**
 * Polling primitive Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { VirtualClock } from '../clock/clock.js';
import { retryUntil, waitUntil } from './polling.js';

describe('retryUntil', () => {
  it('should stop at the first satisfied attempt', async () => {
    const clock = new VirtualClock();
    const predicate = vi.fn().mockReturnValueOnce(false).mockReturnValueOnce(false).mockReturnValue(true);

    const result = await retryUntil(predicate, { clock, maxAttempts: 10, intervalMs: 1000 });

    expect(result).toEqual({ status: 'satisfied', attempts: 3, elapsedMs: 2000 });
  });

  it('should report exhaustion without sleeping after the last attempt', async () => {
    const clock = new VirtualClock();

    const result = await retryUntil(() => false, { clock, maxAttempts: 3, intervalMs: 500 });

    expect(result).toEqual({ status: 'exhausted', attempts: 3, elapsedMs: 1000 });
    expect(clock.now()).toBe(1000);
  });

  it('should grow the interval by the backoff factor up to the cap', async () => {
    const clock = new VirtualClock();
    const seen: number[] = [];

    await retryUntil(
      () => {
        seen.push(clock.now());
        return false;
      },
      { clock, maxAttempts: 5, intervalMs: 100, backoffFactor: 2, maxIntervalMs: 300 },
    );

    expect(seen).toEqual([0, 100, 300, 600, 900]);
  });

  it('should not sleep past the maximum duration', async () => {
    const clock = new VirtualClock();

    const result = await retryUntil(() => false, { clock, maxAttempts: 100, intervalMs: 1000, maxDurationMs: 2500 });

    expect(result).toEqual({ status: 'exhausted', attempts: 3, elapsedMs: 2000 });
  });

  it('should await asynchronous predicates', async () => {
    const clock = new VirtualClock();
    let calls = 0;

    const result = await retryUntil(async () => ++calls === 2, { clock, maxAttempts: 5, intervalMs: 10 });

    expect(result.status).toBe('satisfied');
    expect(calls).toBe(2);
  });
});

describe('waitUntil', () => {
  it('should answer whether the predicate came true in time', async () => {
    const clock = new VirtualClock();

    await expect(waitUntil(() => clock.now() >= 3000, 5, 1000, clock)).resolves.toBe(true);
    await expect(waitUntil(() => false, 2, 1000, clock)).resolves.toBe(false);
  });
});
