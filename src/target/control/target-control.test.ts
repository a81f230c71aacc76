/**
 * ShellTargetControl Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { VirtualClock } from '../clock/clock.js';
import type { CommandResult, CommandRunner } from '../session/session-channel.js';
import { SimulatedDevice } from '../simulator/simulated-device.js';
import { SimulatedCommandRunner } from '../simulator/simulated-transport.js';
import { ShellTargetControl } from './target-control.js';

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

const alwaysUp: CommandRunner = {
  run: async (): Promise<CommandResult> => ({ exitCode: 0, stdout: '', stderr: '' }),
};

describe('ShellTargetControl', () => {
  let clock: VirtualClock;

  beforeEach(() => {
    clock = new VirtualClock();
  });

  it('should treat a trivial command exiting 0 as reachable', async () => {
    const run = vi.fn(async (_command: string): Promise<CommandResult> => ({ exitCode: 255, stdout: '', stderr: '' }));
    const control = new ShellTargetControl({ run }, { clock });

    await expect(control.isReachable()).resolves.toBe(false);
    expect(run).toHaveBeenCalledWith('true', { timeoutMs: 5000 });
  });

  it('should reboot and wait until the target answers again', async () => {
    const device = new SimulatedDevice({ clock, bootDurationMs: 30000 });
    const control = new ShellTargetControl(new SimulatedCommandRunner(device), { clock });

    await expect(control.reboot(60000)).resolves.toBe(true);
    expect(device.rebootCount).toBe(1);
    expect(clock.now()).toBe(30000);
  });

  it('should give up when the target stays down past the timeout', async () => {
    const device = new SimulatedDevice({ clock, bootDurationMs: 120000 });
    const control = new ShellTargetControl(new SimulatedCommandRunner(device), { clock });

    await expect(control.reboot(60000)).resolves.toBe(false);
    expect(clock.now()).toBe(60000);
  });

  it('should report a target that never goes down', async () => {
    const control = new ShellTargetControl(alwaysUp, { clock, pollIntervalMs: 500 });

    await expect(control.waitForDeviceDown(10000)).resolves.toBe(false);
    expect(clock.now()).toBe(10000);
  });
});
