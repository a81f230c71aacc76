/**
 * Kernel module lifecycle scenarios
 *
 * Each installs a system whose kernel modules (and sometimes an app) are
 * named after the scenario, then drives kmod and the app commands, checking
 * the reported outcome and the module listing after every step.
 */

import type { ScenarioContext } from '../orchestrator/scenario-context.js';
import type { ScenarioDefinition } from '../orchestrator/scenario.js';

export const LOOPING_APP = 'LoopingHelloWorld';

async function waitForApp(context: ScenarioContext, app: string): Promise<void> {
  const { probe } = context.target;
  await context.waitFor(`${app} listed`, () => probe.isAppInstalled(app), 'best-effort');
  await context.waitFor(`${app} running`, () => probe.isAppRunning(app), 'best-effort');
}

const autoLoad: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0004',
  title: 'Load and unload a module installed with load: auto',
  group: 'kmod',
  async run(context) {
    const module = 'L_Tools_Kmod_0004';

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0004');

    context.step('Verify mod has been loaded...');
    await context.expectModulePresent(module, 'Kernel module has not been properly loaded');

    context.step('Unloading...');
    await context.expectUnload(module, 'OK', 'Kernel module has not been properly unloaded');

    context.step('Loading...');
    await context.expectLoad(module, 'OK', 'Kernel module has not been properly loaded');
  },
};

const manualLoad: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0005',
  title: 'Load and unload a module installed with load: manual',
  group: 'kmod',
  async run(context) {
    const module = 'L_Tools_Kmod_0005';

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0005');

    context.step('Verify mod has not been loaded...');
    await context.expectModuleAbsent(module, 'Kernel module has been unexpectedly loaded');

    context.step('Loading...');
    await context.expectLoad(module, 'OK', 'Kernel module has not been properly loaded');

    context.step('Unloading...');
    await context.expectUnload(module, 'OK', 'Kernel module has not been properly unloaded');
  },
};

const duplicateLoad: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0006',
  title: 'Loading an already loaded module is rejected',
  group: 'kmod',
  async run(context) {
    // Same system and module as L_Tools_Kmod_0004
    const module = 'L_Tools_Kmod_0004';

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0004');

    context.step('Verify mod has been loaded...');
    await context.expectModulePresent(module, 'Kernel module has not been properly loaded');

    context.step('Loading...');
    await context.expectLoad(module, 'DUPLICATE', 'Loading should have been forbidden.');
  },
};

const dependencyBusy: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0007',
  title: 'A module required by a loaded module cannot be unloaded',
  group: 'kmod',
  async run(context) {
    const required = 'L_Tools_Kmod_0004';
    const primary = 'L_Tools_Kmod_0007';

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0007');

    context.step('Verify mods have been loaded...');
    await context.expectModulePresent(required, 'Required kernel module has not been properly loaded');
    await context.expectModulePresent(primary, 'Primary kernel module has not been properly loaded');

    context.step('Unloading required module...');
    await context.expectUnload(required, 'BUSY', 'Unloading should have been forbidden.');

    context.step('Unloading primary module...');
    await context.expectUnload(primary, 'OK', 'Primary kernel module has not been properly unloaded');
  },
};

const appAutoStart: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0008',
  title: 'Unload and reload an auto module used by a running app',
  group: 'kmod',
  async run(context) {
    const module = 'L_Tools_Kmod_0008';

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0008');

    context.step('Verify mod has been loaded and app is running...');
    await waitForApp(context, LOOPING_APP);
    await context.expectModulePresent(module, 'Kernel module has not been properly loaded');
    await context.expectAppRunning(LOOPING_APP, 'App is not running');

    context.step('Unloading...');
    await context.expectUnload(module, 'OK', 'Kernel module has not been properly unloaded');

    context.step('Loading...');
    await context.expectLoad(module, 'OK', 'Kernel module has not been properly loaded');
  },
};

const appManualStart: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0009',
  title: 'A manual module is pinned while the app that loaded it runs',
  group: 'kmod',
  async run(context) {
    const module = 'L_Tools_Kmod_0009';
    const { probe, commands } = context.target;

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0009');

    context.step('Verify mod has not been loaded and app is not running...');
    await context.expectModuleAbsent(module, 'Kernel module has been erroneously loaded');
    await context.expectAppNotRunning(LOOPING_APP, 'App is running');

    context.step('Loading...');
    await context.expectLoad(module, 'OK', 'Kernel module has not been properly loaded');

    context.step('Verify mod has been loaded...');
    await context.expectModulePresent(module, 'Kernel module has not been properly loaded');

    context.step('Unloading...');
    await context.expectUnload(module, 'OK', 'Kernel module has not been properly unloaded');

    context.step('Starting the application...');
    await context.waitFor(`${LOOPING_APP} listed`, () => probe.isAppInstalled(LOOPING_APP), 'best-effort');
    await commands.startApp(LOOPING_APP);
    await context.waitFor(`${LOOPING_APP} running`, () => probe.isAppRunning(LOOPING_APP), 'best-effort');

    context.step('Verify mod has been loaded...');
    await context.expectModulePresent(module, 'Kernel module has not been properly loaded');

    context.step('Unloading...');
    await context.expectUnload(module, 'BUSY', 'Unloading should have been forbidden while the app runs.');

    context.step('Stopping the application...');
    await commands.stopApp(LOOPING_APP);
    await context.waitFor(`${LOOPING_APP} stopped`, async () => !(await probe.isAppRunning(LOOPING_APP)), 'best-effort');

    context.step('Verify mod has been unloaded...');
    await context.expectModuleAbsent(module, 'Kernel module should have been unloaded');

    context.step('Loading...');
    await context.expectLoad(module, 'OK', 'Kernel module has not been properly loaded');
  },
};

const appRemoval: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0010',
  title: 'Removing an app unloads the module it loaded',
  group: 'kmod',
  async run(context) {
    // Same system as L_Tools_Kmod_0009
    const module = 'L_Tools_Kmod_0009';
    const { commands } = context.target;

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0009');

    context.step('Verify mod has not been loaded and app is not running...');
    await context.expectModuleAbsent(module, 'Kernel module has been erroneously loaded');
    await context.expectAppNotRunning(LOOPING_APP, 'App is running');

    context.step('Start app...');
    commands.sendAppStart(LOOPING_APP);

    context.step('Verify mod has been loaded and app is running...');
    await waitForApp(context, LOOPING_APP);
    await context.expectModulePresent(module, 'Kernel module has not been properly loaded');
    await context.expectAppRunning(LOOPING_APP, 'App is not running');

    context.step('Removing the application...');
    await commands.removeApp(LOOPING_APP);

    context.step('Verify mod unloaded and app removed...');
    await context.expectModuleAbsent(module, 'Kernel module has been erroneously loaded');
    await context.expectAppNotInstalled(LOOPING_APP, 'App still exists');

    context.step('Loading...');
    await context.expectLoad(module, 'OK', 'Kernel module has not been properly loaded');
    await context.waitFor(`${module} listed`, () => context.target.probe.isModulePresent(module), 'best-effort');

    context.step('Verify mod has been loaded...');
    await context.expectModulePresent(module, 'Kernel module has not been properly loaded');
  },
};

const dependencyGating: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0011',
  title: 'A module cannot be loaded before the module it requires',
  group: 'kmod',
  async run(context) {
    const required = 'L_Tools_Kmod_0005';
    const primary = 'L_Tools_Kmod_0011';

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0011');

    context.step('Verify mods have not been loaded...');
    await context.expectModuleAbsent(primary, 'Primary kernel module has been unexpectedly loaded');
    await context.expectModuleAbsent(required, 'Required kernel module has been unexpectedly loaded');

    context.step('Loading primary module...');
    await context.expectLoad(primary, 'FAULT', 'Primary module should not load before its dependency.');

    context.step('Loading required module...');
    await context.expectLoad(required, 'OK', 'Required module has not been properly loaded.');

    context.step('Loading primary module...');
    await context.expectLoad(primary, 'OK', 'Primary module has not been properly loaded.');

    context.step('Unloading the primary module...');
    await context.expectUnload(primary, 'OK', 'Primary kernel module has not been properly unloaded');

    context.step('Unloading the required module...');
    await context.expectUnload(required, 'OK', 'Required kernel module has not been properly unloaded');

    context.step('Verify mods have been unloaded...');
    await context.expectModuleAbsent(primary, 'Primary kernel module has not been unloaded');
    await context.expectModuleAbsent(required, 'Required kernel module has not been unloaded');
  },
};

/** Dependencies first; L_Tools_Kmod_0020_1 and _2 share _common */
export const DIAMOND_LOAD_ORDER = [
  'L_Tools_Kmod_0020_common',
  'L_Tools_Kmod_0020_3',
  'L_Tools_Kmod_0020_1',
  'L_Tools_Kmod_0020_2',
  'L_Tools_Kmod_0020',
] as const;

const sharedDependency: ScenarioDefinition = {
  id: 'L_Tools_Kmod_0020',
  title: 'Modules sharing a dependency load bottom-up and unload top-down',
  group: 'kmod',
  async run(context) {
    const unloadOrder = [...DIAMOND_LOAD_ORDER].reverse();

    context.step('Compiling...');
    await context.installSystem('L_Tools_Kmod_0020');

    context.step('Verify mods have not been loaded...');
    for (const module of DIAMOND_LOAD_ORDER) {
      await context.expectModuleAbsent(module, `${module} has been unexpectedly loaded`);
    }

    context.step('Loading...');
    for (const module of DIAMOND_LOAD_ORDER) {
      await context.expectLoad(module, 'OK', `${module} has not been properly loaded`);
    }
    for (const module of DIAMOND_LOAD_ORDER) {
      await context.expectModulePresent(module, `${module} is not listed`);
    }

    context.step('Unloading...');
    for (const module of unloadOrder) {
      await context.expectUnload(module, 'OK', `${module} has not been properly unloaded`);
    }
    for (const module of DIAMOND_LOAD_ORDER) {
      await context.expectModuleAbsent(module, `${module} is still listed`);
    }
  },
};

export const KMOD_SCENARIOS: readonly ScenarioDefinition[] = [
  autoLoad,
  manualLoad,
  duplicateLoad,
  dependencyBusy,
  appAutoStart,
  appManualStart,
  appRemoval,
  dependencyGating,
  sharedDependency,
];
