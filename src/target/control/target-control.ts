/**
 * Target Control
 *
 * Reboot handling and reachability, built on one-shot commands: the target
 * is reachable when a trivial command exits 0.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { Clock } from '../clock/clock.js';
import { retryUntil, type RetryOptions } from '../probe/polling.js';
import type { CommandRunner } from '../session/session-channel.js';

export interface TargetControl {
  isReachable(): Promise<boolean>;
  /** Reboots and waits for the target to answer again; false if it never did */
  reboot(timeoutMs: number): Promise<boolean>;
  waitForDeviceDown(timeoutMs: number): Promise<boolean>;
  /** Waits for a reboot already in progress to complete */
  waitForReboot(timeoutMs: number): Promise<boolean>;
}

export interface ShellTargetControlOptions {
  clock: Clock;
  pollIntervalMs?: number;
  probeTimeoutMs?: number;
  /** Upper bound on the shutdown phase of reboot() */
  shutdownTimeoutMs?: number;
}

export class ShellTargetControl implements TargetControl {
  private readonly logger = createSubsystemLogger('target/control');
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly shutdownTimeoutMs: number;

  constructor(private readonly runner: CommandRunner, options: ShellTargetControlOptions) {
    this.clock = options.clock;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5000;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 30000;
  }

  async isReachable(): Promise<boolean> {
    const result = await this.runner.run('true', { timeoutMs: this.probeTimeoutMs });
    return result.exitCode === 0;
  }

  async reboot(timeoutMs: number): Promise<boolean> {
    this.logger.info('Rebooting target...', { timeoutMs });
    const result = await this.runner.run('/sbin/reboot', { timeoutMs: this.probeTimeoutMs });
    this.logger.debug('Reboot command returned', { exitCode: result.exitCode });

    const wentDown = await this.waitForDeviceDown(Math.min(this.shutdownTimeoutMs, timeoutMs));
    if (!wentDown) {
      this.logger.warn('Target never dropped off after the reboot command');
    }
    return this.waitForReboot(timeoutMs);
  }

  async waitForDeviceDown(timeoutMs: number): Promise<boolean> {
    const result = await retryUntil(async () => !(await this.isReachable()), this.pollingFor(timeoutMs));
    this.logger.info(result.status === 'satisfied' ? 'Target is down' : 'Target stayed up', {
      elapsedMs: result.elapsedMs,
    });
    return result.status === 'satisfied';
  }

  async waitForReboot(timeoutMs: number): Promise<boolean> {
    const result = await retryUntil(() => this.isReachable(), this.pollingFor(timeoutMs));
    if (result.status === 'exhausted') {
      this.logger.error('Target did not come back', { timeoutMs });
    }
    return result.status === 'satisfied';
  }

  private pollingFor(timeoutMs: number): RetryOptions {
    return {
      clock: this.clock,
      intervalMs: this.pollIntervalMs,
      maxAttempts: Math.floor(timeoutMs / this.pollIntervalMs) + 1,
      maxDurationMs: timeoutMs,
    };
  }
}
