/**
 * Scenario Runner
 *
 * Brackets each scenario with its group's fixture and turns it into a
 * result. Teardown always runs; whatever it throws is one more error on the
 * scenario. Scenarios run strictly one after another against the single
 * target.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { SuiteEnvironment } from '../environment/suite-environment.js';
import { describeError, HarnessError } from '../errors.js';
import { fixtureFor } from './fixtures.js';
import type { ScenarioDefinition, ScenarioResult, SuiteResult } from './scenario.js';
import {
  DEFAULT_SCENARIO_TIMING,
  ScenarioContext,
  type HarnessTarget,
  type ScenarioTiming,
} from './scenario-context.js';

export class ScenarioRunner extends EventEmitter {
  private readonly logger = createSubsystemLogger('target/runner');

  constructor(
    private readonly target: HarnessTarget,
    private readonly environment: SuiteEnvironment,
    private readonly timing: ScenarioTiming = DEFAULT_SCENARIO_TIMING,
  ) {
    super();
  }

  async runScenario(scenario: ScenarioDefinition): Promise<ScenarioResult> {
    const { clock } = this.target;
    const context = new ScenarioContext(scenario.id, this.target, this.timing);
    const fixture = fixtureFor(scenario.group);
    const startedAt = clock.now();
    let aborted = false;

    this.logger.info('Scenario started', { scenario: scenario.id });
    this.emit('scenarioStart', scenario);

    try {
      context.enterPhase('setup');
      await fixture.setup(context, scenario);
      context.enterPhase('run');
      await scenario.run(context);
      if (!context.passed && scenario.onFailure) {
        await scenario.onFailure(context);
      }
    } catch (error) {
      aborted = true;
      context.fail(`Aborted: ${describeError(error)}`, {
        code: error instanceof HarnessError ? error.code : 'UNEXPECTED',
      });
    }

    context.enterPhase('teardown');
    try {
      await fixture.teardown(context, scenario);
    } catch (error) {
      context.fail(describeError(error));
    }

    const result: ScenarioResult = {
      id: scenario.id,
      title: scenario.title,
      group: scenario.group,
      passed: context.passed,
      aborted,
      errors: [...context.errors],
      startedAt,
      durationMs: clock.now() - startedAt,
    };

    if (result.passed) {
      this.logger.info('Scenario passed', { scenario: scenario.id, durationMs: result.durationMs });
    } else {
      this.logger.error('Scenario failed', { scenario: scenario.id, errors: result.errors });
    }
    this.emit('scenarioComplete', result);
    return result;
  }

  /** Bootstraps the suite once, then runs every scenario in order */
  async runSuite(scenarios: readonly ScenarioDefinition[]): Promise<SuiteResult> {
    await this.environment.initialize();

    const results: ScenarioResult[] = [];
    for (const scenario of scenarios) {
      results.push(await this.runScenario(scenario));
    }

    const passed = results.every(result => result.passed);
    this.logger.info('Suite finished', {
      passed: results.filter(result => result.passed).length,
      failed: results.filter(result => !result.passed).length,
    });
    return { passed, results };
  }
}
