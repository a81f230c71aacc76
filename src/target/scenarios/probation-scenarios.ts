/**
 * Update control: probation lock scenarios
 *
 * The test app takes the probation lock when started with process
 * arguments `lockProbation <mode>`. Mode 3 exits right after taking it;
 * the others hold it until stopped.
 */

import { UPDATE_CONTROL_APP } from '../orchestrator/fixtures.js';
import type { ScenarioContext } from '../orchestrator/scenario-context.js';
import type { ScenarioDefinition } from '../orchestrator/scenario.js';
import { formatSystemStatus } from '../types/device-state.js';

/** How long a dying lock holder may take to bring the target down */
const SHUTDOWN_WINDOW_MS = 10000;
const SHUTDOWN_GRACE_MS = 5000;

async function startLockingApp(context: ScenarioContext, mode: string): Promise<void> {
  const { commands } = context.target;
  await commands.setProcessArgument(UPDATE_CONTROL_APP, 1, 'lockProbation');
  await commands.setProcessArgument(UPDATE_CONTROL_APP, 2, mode);
  await commands.startApp(UPDATE_CONTROL_APP);
}

/** Reboots to clear a lock counter the scenario may have left behind */
async function clearLockByReboot(context: ScenarioContext): Promise<void> {
  if (!(await context.target.control.reboot(context.timing.probationRebootTimeoutMs))) {
    context.fail('Target did not come back after the clean-up reboot');
  }
}

async function expectRebootAfterLockRelease(context: ScenarioContext, failure: string): Promise<void> {
  const { control } = context.target;
  await context.sleep(SHUTDOWN_GRACE_MS);

  context.step('Check the target device is rebooting...');
  if (!context.check(await control.waitForDeviceDown(SHUTDOWN_WINDOW_MS), failure)) {
    return;
  }

  context.step('Wait for the target to finish rebooting...');
  context.check(
    await control.waitForReboot(context.timing.probationRebootTimeoutMs),
    'Target did not come back after rebooting',
  );
}

const lockPreventsPromotion: ScenarioDefinition = {
  id: 'L_UpdateCtrl_LockProbation_0001',
  title: 'LockProbation() prevents the probation period from ending',
  group: 'probation',
  async run(context) {
    const { workspace, probe, control } = context.target;

    context.step('Set the probation period to 20s...');
    await workspace.setProbationTimer(20);

    context.step('Run the app that locks probation...');
    await startLockingApp(context, '1');
    await context.sleep(25000);

    context.step('Check the system is still under probation...');
    const status = await probe.currentSystemStatus();
    context.check(
      status.kind !== 'good',
      `LockProbation() doesn't prevent the probation period from ending (status ${formatSystemStatus(status)})`,
    );

    context.step('Reboot to clear the probation lock...');
    context.check(
      await control.reboot(context.timing.probationRebootTimeoutMs),
      'Target did not come back after the reboot',
    );
  },
};

const lockIgnoredWhenGood: ScenarioDefinition = {
  id: 'L_UpdateCtrl_LockProbation_0002',
  title: 'LockProbation() is ignored once the system is good',
  group: 'probation',
  keepShortProbation: true,
  async run(context) {
    const { workspace, probe, commands } = context.target;

    context.step('Set the probation period to 1s and let it pass...');
    await workspace.setProbationTimer(1);
    await context.sleep(3000);

    context.step('Run the app that locks probation...');
    await commands.setProcessArgument(UPDATE_CONTROL_APP, 1, 'lockProbation');
    await commands.setProcessArgument(UPDATE_CONTROL_APP, 2, '2');
    const indexBefore = await probe.currentSystemIndex();
    await commands.startApp(UPDATE_CONTROL_APP);

    context.step('Check system status and index are unchanged...');
    const indexAfter = await probe.currentSystemIndex();
    const status = await probe.currentSystemStatus();
    if (status.kind !== 'good') {
      context.fail(
        `LockProbation() modifies the current system status when the system is already marked as 'good' (status ${formatSystemStatus(status)})`,
      );
    } else {
      context.check(
        indexBefore === indexAfter,
        `LockProbation() modifies the system index when the system is already marked as 'good' (${indexBefore} -> ${indexAfter})`,
      );
    }
  },
  onFailure: clearLockByReboot,
};

const rebootWhenHolderDies: ScenarioDefinition = {
  id: 'L_UpdateCtrl_LockProbation_0003',
  title: 'The target reboots when the lock holder dies',
  group: 'probation',
  async run(context) {
    context.step('Run the app that locks probation and exits...');
    await startLockingApp(context, '3');

    await expectRebootAfterLockRelease(
      context,
      'The target device is not rebooting when a process who called LockProbation() is dead',
    );
  },
  onFailure: clearLockByReboot,
};

const rebootWhenHolderStopped: ScenarioDefinition = {
  id: 'L_UpdateCtrl_LockProbation_0004',
  title: 'The target reboots when the lock holder is stopped',
  group: 'probation',
  async run(context) {
    context.step('Run the app that locks probation...');
    await startLockingApp(context, '4');

    context.step('Stop the app...');
    await context.target.commands.stopApp(UPDATE_CONTROL_APP);

    await expectRebootAfterLockRelease(
      context,
      'The target device is not rebooting after stopping a process who called LockProbation()',
    );
  },
  onFailure: clearLockByReboot,
};

export const PROBATION_SCENARIOS: readonly ScenarioDefinition[] = [
  lockPreventsPromotion,
  lockIgnoredWhenGood,
  rebootWhenHolderDies,
  rebootWhenHolderStopped,
];
