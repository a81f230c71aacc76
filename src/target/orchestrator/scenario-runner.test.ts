/**
 * ScenarioRunner Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createSimulatedHarness, type SimulatedHarness } from '../harness.js';
import type { ScenarioDefinition, ScenarioResult } from './scenario.js';

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

function scenario(overrides: Partial<ScenarioDefinition> & Pick<ScenarioDefinition, 'run'>): ScenarioDefinition {
  return { id: 'sample', title: 'Sample scenario', group: 'kmod', ...overrides };
}

describe('ScenarioRunner', () => {
  let harness: SimulatedHarness;

  beforeEach(async () => {
    harness = createSimulatedHarness();
    await harness.environment.initialize();
  });

  it('should pass a scenario with no failed steps and reboot in teardown', async () => {
    const result = await harness.runner.runScenario(
      scenario({
        async run(context) {
          context.step('Nothing to do');
        },
      }),
    );

    expect(result).toMatchObject({ id: 'sample', group: 'kmod', passed: true, aborted: false, errors: [] });
    expect(result.durationMs).toBe(30000);
    expect(harness.device.rebootCount).toBe(1);
  });

  it('should record an abort against the current step and still tear down', async () => {
    const result = await harness.runner.runScenario(
      scenario({
        async run(context) {
          context.step('one');
          context.step('two');
          context.abort('gave up');
        },
      }),
    );

    expect(result.aborted).toBe(true);
    expect(result.errors).toEqual(['Step 2: Aborted: gave up']);
    expect(harness.device.rebootCount).toBe(1);
  });

  it('should run the failure hook only for failed scenarios', async () => {
    const onFailure = vi.fn(async () => undefined);

    await harness.runner.runScenario(scenario({ run: async () => undefined, onFailure }));
    expect(onFailure).not.toHaveBeenCalled();

    await harness.runner.runScenario(
      scenario({
        async run(context) {
          context.fail('broken');
        },
        onFailure,
      }),
    );
    expect(onFailure).toHaveBeenCalledTimes(1);
  });

  it('should turn teardown errors into scenario errors', async () => {
    const slowBoot = createSimulatedHarness({ bootDurationMs: 1_000_000 });
    await slowBoot.environment.initialize();

    const result = await slowBoot.runner.runScenario(
      scenario({
        group: 'probation',
        async run() {
          slowBoot.device.execute('/sbin/reboot');
        },
      }),
    );

    expect(result.passed).toBe(false);
    expect(result.aborted).toBe(false);
    expect(result.errors).toEqual(['Teardown: Cannot update with system default: target unreachable']);
  });

  it('should emit start and completion events', async () => {
    const started: string[] = [];
    const completed: ScenarioResult[] = [];
    harness.runner.on('scenarioStart', (definition: ScenarioDefinition) => started.push(definition.id));
    harness.runner.on('scenarioComplete', (result: ScenarioResult) => completed.push(result));

    await harness.runner.runScenario(scenario({ id: 'evented', run: async () => undefined }));

    expect(started).toEqual(['evented']);
    expect(completed.map(result => result.id)).toEqual(['evented']);
  });

  it('should initialize once and run a suite in order', async () => {
    const fresh = createSimulatedHarness();
    const order: string[] = [];
    const first = scenario({ id: 'first', run: async () => void order.push('first') });
    const second = scenario({
      id: 'second',
      async run(context) {
        order.push('second');
        context.fail('broken');
      },
    });

    const suite = await fresh.runner.runSuite([first, second]);

    expect(fresh.environment.isInitialized).toBe(true);
    expect(order).toEqual(['first', 'second']);
    expect(suite.passed).toBe(false);
    expect(suite.results.map(result => result.passed)).toEqual([true, false]);
  });
});
