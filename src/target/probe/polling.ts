/**
 * Bounded retry-with-backoff
 *
 * Absorbs device-side propagation delay: a module auto-loading after an app
 * start, the framework answering after an install, the target dropping off
 * the network after a reboot. Every wait is bounded by attempts and,
 * optionally, by elapsed time.
 */

import type { Clock } from '../clock/clock.js';

export interface RetryOptions {
  clock: Clock;
  maxAttempts: number;
  intervalMs: number;
  /** Multiplier applied to the interval after each failed attempt (default 1) */
  backoffFactor?: number;
  maxIntervalMs?: number;
  /** Give up before sleeping past this much elapsed time */
  maxDurationMs?: number;
}

export type RetryStatus = 'satisfied' | 'exhausted';

export interface RetryResult {
  status: RetryStatus;
  attempts: number;
  elapsedMs: number;
}

/**
 * Whether an exhausted wait fails the step ('required') or is only logged
 * ('best-effort').
 */
export type WaitPolicy = 'required' | 'best-effort';

export async function retryUntil(
  predicate: () => Promise<boolean> | boolean,
  options: RetryOptions,
): Promise<RetryResult> {
  const { clock, maxAttempts, maxDurationMs } = options;
  const backoffFactor = options.backoffFactor ?? 1;
  const maxIntervalMs = options.maxIntervalMs ?? Number.POSITIVE_INFINITY;
  const startedAt = clock.now();
  let interval = options.intervalMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (await predicate()) {
      return { status: 'satisfied', attempts: attempt, elapsedMs: clock.now() - startedAt };
    }

    const elapsed = clock.now() - startedAt;
    const outOfTime = maxDurationMs !== undefined && elapsed + interval > maxDurationMs;
    if (attempt === maxAttempts || outOfTime) {
      return { status: 'exhausted', attempts: attempt, elapsedMs: elapsed };
    }

    await clock.sleep(interval);
    interval = Math.min(interval * backoffFactor, maxIntervalMs);
  }

  return { status: 'exhausted', attempts: 0, elapsedMs: clock.now() - startedAt };
}

/** Fixed-interval polling; true once the predicate holds */
export async function waitUntil(
  predicate: () => Promise<boolean> | boolean,
  maxAttempts: number,
  pollIntervalMs: number,
  clock: Clock,
): Promise<boolean> {
  const result = await retryUntil(predicate, { clock, maxAttempts, intervalMs: pollIntervalMs });
  return result.status === 'satisfied';
}
