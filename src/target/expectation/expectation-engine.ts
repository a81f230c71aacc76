/**
 * Expectation Engine
 *
 * Sends kmod load/unload commands over the session and classifies the reply
 * against a fixed, ordered vocabulary. The engine observes; callers judge.
 * It never retries and never second-guesses the device: when several
 * conditions could apply, whatever pattern the target printed is the outcome.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { Clock } from '../clock/clock.js';
import { HarnessError } from '../errors.js';
import { LEGATO_BIN } from '../probe/device-queries.js';
import { retryUntil } from '../probe/polling.js';
import { TIMEOUT, type Pattern, type SessionChannel } from '../session/session-channel.js';
import {
  LOAD_OUTCOMES,
  TIMEOUT_OUTCOME,
  UNLOAD_OUTCOMES,
  type ExpectationResult,
  type LoadOutcome,
  type UnloadOutcome,
} from '../types/outcomes.js';

export const FAULT_MARKER = 'LE_FAULT';
export const DUPLICATE_MARKER = 'LE_DUPLICATE';
export const BUSY_MARKER = 'LE_BUSY';
export const READINESS_MARKER = 'Device:';

export function loadPatterns(module: string): Pattern[] {
  return [`Load of module ${module}.ko has been successful.`, FAULT_MARKER, DUPLICATE_MARKER];
}

export function unloadPatterns(module: string): Pattern[] {
  return [`Unload of module ${module}.ko has been successful.`, FAULT_MARKER, BUSY_MARKER];
}

export interface ExpectationEngineOptions {
  clock: Clock;
  /** Deadline for a load/unload reply */
  timeoutMs: number;
  /** Deadline for each `cm info` readiness probe */
  readinessTimeoutMs?: number;
  readinessIntervalMs?: number;
}

export class ExpectationEngine {
  private readonly logger = createSubsystemLogger('target/expectation');

  constructor(
    private readonly session: SessionChannel,
    private readonly options: ExpectationEngineOptions,
  ) {}

  attemptLoad(module: string): Promise<LoadOutcome> {
    return this.classify(`kmod load ${module}.ko`, loadPatterns(module), LOAD_OUTCOMES);
  }

  attemptUnload(module: string): Promise<UnloadOutcome> {
    return this.classify(`kmod unload ${module}.ko`, unloadPatterns(module), UNLOAD_OUTCOMES);
  }

  async checkLoad(module: string, expected: LoadOutcome): Promise<ExpectationResult<LoadOutcome>> {
    const observed = await this.attemptLoad(module);
    const index = LOAD_OUTCOMES.findIndex(outcome => outcome === observed);
    return { module, observed, expected, passed: observed === expected, matchIndex: index < 0 ? null : index };
  }

  async checkUnload(module: string, expected: UnloadOutcome): Promise<ExpectationResult<UnloadOutcome>> {
    const observed = await this.attemptUnload(module);
    const index = UNLOAD_OUTCOMES.findIndex(outcome => outcome === observed);
    return { module, observed, expected, passed: observed === expected, matchIndex: index < 0 ? null : index };
  }

  /**
   * Polls `cm info` until the framework answers with its device banner.
   */
  async waitForFrameworkReady(maxAttempts = 30): Promise<boolean> {
    this.logger.info('Checking legato is operational...');
    const timeoutMs = this.options.readinessTimeoutMs ?? this.options.timeoutMs;

    const result = await retryUntil(
      async () => {
        this.session.send(`${LEGATO_BIN}/cm info`);
        const match = await this.session.expect([READINESS_MARKER], timeoutMs);
        if (match === TIMEOUT) {
          this.logger.debug('Framework not answering yet');
          return false;
        }
        return true;
      },
      { clock: this.options.clock, maxAttempts, intervalMs: this.options.readinessIntervalMs ?? 1000 },
    );

    if (result.status === 'exhausted') {
      this.logger.warn('Framework did not report ready', { attempts: result.attempts });
    }
    return result.status === 'satisfied';
  }

  private async classify<O extends string>(
    command: string,
    patterns: Pattern[],
    vocabulary: readonly O[],
  ): Promise<O | typeof TIMEOUT_OUTCOME> {
    this.session.send(command);
    const match = await this.session.expect(patterns, this.options.timeoutMs);

    if (match === TIMEOUT) {
      this.logger.error('None of the expected output has been found', {
        command,
        timeoutMs: this.options.timeoutMs,
        kind: 'infrastructure',
      });
      return TIMEOUT_OUTCOME;
    }

    if (match < 0 || match >= vocabulary.length) {
      throw new HarnessError(`Session matched pattern ${match} outside ${vocabulary.length} expected outcomes`, 'SESSION');
    }

    const outcome = vocabulary[match];
    this.logger.debug('Command classified', { command, outcome });
    return outcome;
  }
}
