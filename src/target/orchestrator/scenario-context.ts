/**
 * Scenario Context
 *
 * The step accumulator every scenario writes into. A failing step records a
 * labelled message and the scenario carries on; the verdict is the
 * conjunction of every step. Only infrastructure failures and explicit
 * aborts stop a scenario early, and they do so by throwing.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { Clock } from '../clock/clock.js';
import type { DeviceCommands } from '../control/device-commands.js';
import type { TargetControl } from '../control/target-control.js';
import type { WorkspaceManager } from '../environment/workspace-manager.js';
import { ScenarioAbortedError } from '../errors.js';
import type { ExpectationEngine } from '../expectation/expectation-engine.js';
import type { StateProbe } from '../probe/device-queries.js';
import { waitUntil, type WaitPolicy } from '../probe/polling.js';
import type { ExpectationResult, LoadOutcome, UnloadOutcome } from '../types/outcomes.js';

/** Everything a scenario may touch on the target */
export interface HarnessTarget {
  engine: ExpectationEngine;
  probe: StateProbe;
  commands: DeviceCommands;
  control: TargetControl;
  workspace: WorkspaceManager;
  clock: Clock;
}

export interface ScenarioTiming {
  /** Pause on each side of the readiness check after an install */
  settleDelayMs: number;
  pollIntervalMs: number;
  waitAttempts: number;
  readinessAttempts: number;
  teardownRebootTimeoutMs: number;
  probationRebootTimeoutMs: number;
  /** Grace period before a probation scenario restores the baseline */
  probationCooldownMs: number;
}

export const DEFAULT_SCENARIO_TIMING: ScenarioTiming = {
  settleDelayMs: 5000,
  pollIntervalMs: 1000,
  waitAttempts: 30,
  readinessAttempts: 30,
  teardownRebootTimeoutMs: 60000,
  probationRebootTimeoutMs: 120000,
  probationCooldownMs: 60000,
};

export type ScenarioPhase = 'setup' | 'run' | 'teardown';

export class ScenarioContext {
  private readonly logger = createSubsystemLogger('target/orchestrator');
  private readonly errorList: string[] = [];
  private phase: ScenarioPhase = 'setup';
  private stepNumber = 0;

  constructor(
    readonly scenarioId: string,
    readonly target: HarnessTarget,
    readonly timing: ScenarioTiming = DEFAULT_SCENARIO_TIMING,
  ) {}

  get passed(): boolean {
    return this.errorList.length === 0;
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  enterPhase(phase: ScenarioPhase): void {
    this.phase = phase;
  }

  step(description: string): void {
    this.stepNumber += 1;
    this.logger.info(`${this.label()}: ${description}`, { scenario: this.scenarioId });
  }

  /** Records `message` when `condition` is false; returns the condition */
  check(condition: boolean, message: string): boolean {
    if (!condition) {
      this.fail(message);
    }
    return condition;
  }

  fail(message: string, meta: Record<string, unknown> = {}): void {
    const entry = `${this.label()}: ${message}`;
    this.errorList.push(entry);
    this.logger.error(entry, { scenario: this.scenarioId, step: this.label(), ...meta });
  }

  abort(message: string): never {
    throw new ScenarioAbortedError(message);
  }

  async expectLoad(module: string, expected: LoadOutcome, message: string): Promise<boolean> {
    return this.record(await this.target.engine.checkLoad(module, expected), message);
  }

  async expectUnload(module: string, expected: UnloadOutcome, message: string): Promise<boolean> {
    return this.record(await this.target.engine.checkUnload(module, expected), message);
  }

  async expectModulePresent(module: string, message: string): Promise<boolean> {
    return this.check(await this.target.probe.isModulePresent(module), message);
  }

  async expectModuleAbsent(module: string, message: string): Promise<boolean> {
    return this.check(!(await this.target.probe.isModulePresent(module)), message);
  }

  async expectAppRunning(app: string, message: string): Promise<boolean> {
    return this.check(await this.target.probe.isAppRunning(app), message);
  }

  async expectAppNotRunning(app: string, message: string): Promise<boolean> {
    return this.check(!(await this.target.probe.isAppRunning(app)), message);
  }

  async expectAppNotInstalled(app: string, message: string): Promise<boolean> {
    return this.check(!(await this.target.probe.isAppInstalled(app)), message);
  }

  /**
   * Polls until `predicate` holds. A required wait that runs out fails the
   * step; a best-effort one only warns.
   */
  async waitFor(
    description: string,
    predicate: () => Promise<boolean> | boolean,
    policy: WaitPolicy,
  ): Promise<boolean> {
    const satisfied = await waitUntil(
      predicate,
      this.timing.waitAttempts,
      this.timing.pollIntervalMs,
      this.target.clock,
    );
    if (!satisfied) {
      if (policy === 'required') {
        this.fail(`${description} not reached after ${this.timing.waitAttempts} attempts`);
      } else {
        this.logger.warn(`${description} not reached, continuing`, { scenario: this.scenarioId });
      }
    }
    return satisfied;
  }

  async waitForFrameworkReady(policy: WaitPolicy = 'best-effort'): Promise<boolean> {
    const ready = await this.target.engine.waitForFrameworkReady(this.timing.readinessAttempts);
    if (!ready && policy === 'required') {
      this.fail('Framework did not report ready');
    }
    return ready;
  }

  /** Builds and installs a system, then waits for the framework to come up */
  async installSystem(name: string): Promise<void> {
    await this.target.workspace.installSystem(name);
    await this.sleep(this.timing.settleDelayMs);
    await this.waitForFrameworkReady();
    await this.sleep(this.timing.settleDelayMs);
  }

  sleep(ms: number): Promise<void> {
    return this.target.clock.sleep(ms);
  }

  private record<O extends string>(result: ExpectationResult<O>, message: string): boolean {
    if (!result.passed) {
      this.fail(`${message} (observed ${result.observed}, expected ${result.expected})`, {
        module: result.module,
        observed: result.observed,
        expected: result.expected,
      });
    }
    return result.passed;
  }

  private label(): string {
    switch (this.phase) {
      case 'setup':
        return 'Setup';
      case 'teardown':
        return 'Teardown';
      default:
        return `Step ${this.stepNumber}`;
    }
  }
}
