/**
 * SimulatedWorkspace Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { VirtualClock } from '../clock/clock.js';
import { InfrastructureError } from '../errors.js';
import { SimulatedDevice } from './simulated-device.js';
import { SimulatedWorkspace } from './simulated-workspace.js';
import { SystemCatalog } from './system-catalog.js';

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

const catalog = new SystemCatalog({
  systems: [
    { name: 'default' },
    { name: 'withModule', modules: [{ name: 'mod_a', load: 'auto' }] },
  ],
  apps: [{ name: 'updater', start: 'manual', behavior: 'updateControl' }],
});

describe('SimulatedWorkspace', () => {
  let clock: VirtualClock;
  let device: SimulatedDevice;
  let workspace: SimulatedWorkspace;

  beforeEach(() => {
    clock = new VirtualClock();
    device = new SimulatedDevice({ clock });
    workspace = new SimulatedWorkspace(device, catalog);
  });

  it('should install catalog systems on the device', async () => {
    await workspace.installSystem('withModule');

    expect(device.currentSystem).toBe('withModule');
    expect(device.loadedModules()).toEqual(['mod_a']);
  });

  it('should restore the baseline system', async () => {
    await workspace.installSystem('withModule');
    await workspace.restoreBaseline();

    expect(device.currentSystem).toBe('default');
    expect(device.loadedModules()).toEqual([]);
  });

  it('should fail on unknown definitions', async () => {
    await expect(workspace.installSystem('missing')).rejects.toThrow('sdef file does not exist: missing.sdef');
    await expect(workspace.installApp('missing')).rejects.toThrow('adef file does not exist: missing.adef');
  });

  it('should require a baseline system in the catalog', async () => {
    const bare = new SimulatedWorkspace(device, new SystemCatalog({ systems: [] }));

    await expect(bare.prepareBaseline()).rejects.toThrow('sdef file does not exist: default.sdef');
  });

  it('should refuse to install while the target reboots', async () => {
    device.execute('/sbin/reboot');

    const install = workspace.installSystem('withModule');

    await expect(install).rejects.toBeInstanceOf(InfrastructureError);
    await expect(install).rejects.toThrow('Cannot update with system withModule: target unreachable');
  });

  it('should set and reset the probation period in seconds', async () => {
    await workspace.installSystem('default');
    await workspace.setProbationTimer(20);
    await workspace.installApp('updater');

    clock.advance(19999);
    expect(device.systemStatus).toEqual({ kind: 'tried', tries: 1 });
    clock.advance(1);
    expect(device.systemStatus).toEqual({ kind: 'good' });

    await workspace.resetProbationTimer();
    await workspace.installApp('updater');
    clock.advance(20000);
    expect(device.systemStatus).toEqual({ kind: 'tried', tries: 1 });
  });

  it('should clear the target log', async () => {
    await workspace.installSystem('default');
    expect(device.logLines()).not.toEqual([]);

    await workspace.clearTargetLog();

    expect(device.logLines()).toEqual([]);
  });
});
