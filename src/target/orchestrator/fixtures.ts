/**
 * Setup and teardown brackets per scenario group.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { ScenarioGroup, ScenarioDefinition } from './scenario.js';
import type { ScenarioContext } from './scenario-context.js';

export const UPDATE_CONTROL_APP = 'testUpdateCtrl';

export interface ScenarioFixture {
  setup(context: ScenarioContext, scenario: ScenarioDefinition): Promise<void>;
  teardown(context: ScenarioContext, scenario: ScenarioDefinition): Promise<void>;
}

const logger = createSubsystemLogger('target/fixtures');

/** Clean log before; baseline system and a reboot after */
export const kmodFixture: ScenarioFixture = {
  async setup(context) {
    logger.info('Clearing target log...');
    await context.target.workspace.clearTargetLog();
  },

  async teardown(context) {
    const { target, timing } = context;
    await context.waitForFrameworkReady();
    await target.workspace.restoreBaseline();
    await context.waitForFrameworkReady();

    if (!(await target.control.reboot(timing.teardownRebootTimeoutMs))) {
      context.fail(`Target did not come back within ${timing.teardownRebootTimeoutMs}ms of the reboot`);
    }
  },
};

/** Long probation and the update-control test app before; baseline after a cool-down */
export const probationFixture: ScenarioFixture = {
  async setup(context, scenario) {
    const { workspace } = context.target;
    if (!scenario.keepShortProbation) {
      // Test setups shorten probation to 1ms; these scenarios need to run under it
      await workspace.resetProbationTimer();
    }
    await workspace.installApp(UPDATE_CONTROL_APP);
    logger.info('Made and installed the test app', { app: UPDATE_CONTROL_APP });
  },

  async teardown(context) {
    await context.sleep(context.timing.probationCooldownMs);
    await context.waitFor('Target reachable', () => context.target.control.isReachable(), 'best-effort');
    await context.target.workspace.restoreBaseline();
  },
};

export function fixtureFor(group: ScenarioGroup): ScenarioFixture {
  return group === 'kmod' ? kmodFixture : probationFixture;
}
