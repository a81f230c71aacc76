/**
 * Device query translation Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { DeviceQueryError } from '../errors.js';
import type { CommandResult, CommandRunner } from '../session/session-channel.js';
import {
  StateProbe,
  moduleListingCommand,
  parseAppList,
  parseAppStatus,
  parseModuleListing,
  parseSystemIndex,
  parseSystemStatus,
} from './device-queries.js';

function result(exitCode: number, stdout = '', stderr = ''): CommandResult {
  return { exitCode, stdout, stderr };
}

describe('parseModuleListing', () => {
  it('should find a module whose name is the first column', () => {
    expect(parseModuleListing(result(0, 'mod_a 16384 0\n'), 'mod_a')).toBe(true);
  });

  it('should not count a longer name that merely contains it', () => {
    expect(parseModuleListing(result(0, 'mod_a_extra 16384 0\n'), 'mod_a')).toBe(false);
  });

  it('should treat a failing grep as absent', () => {
    expect(parseModuleListing(result(1), 'mod_a')).toBe(false);
  });
});

describe('parseAppStatus', () => {
  it('should read running and stopped', () => {
    expect(parseAppStatus(result(0, '[running] LoopingHelloWorld\n'))).toBe('running');
    expect(parseAppStatus(result(0, '[stopped] LoopingHelloWorld\n'))).toBe('stopped');
  });

  it('should read a failing status as not installed', () => {
    expect(parseAppStatus(result(1, '', '[not installed] LoopingHelloWorld\n'))).toBe('not-installed');
  });

  it('should reject output it does not recognise', () => {
    expect(() => parseAppStatus(result(0, 'paused\n'))).toThrow(DeviceQueryError);
  });
});

describe('parseAppList', () => {
  it('should match whole lines only', () => {
    const listing = result(0, 'LoopingHelloWorld\ntestUpdateCtrl\n');

    expect(parseAppList(listing, 'testUpdateCtrl')).toBe(true);
    expect(parseAppList(listing, 'Looping')).toBe(false);
  });
});

describe('parseSystemStatus', () => {
  it('should read good, bad and tried with its count', () => {
    expect(parseSystemStatus(result(0, 'good\n'))).toEqual({ kind: 'good' });
    expect(parseSystemStatus(result(0, 'bad\n'))).toEqual({ kind: 'bad' });
    expect(parseSystemStatus(result(0, 'tried 3\n'))).toEqual({ kind: 'tried', tries: 3 });
  });

  it('should read a missing status file as untried', () => {
    expect(parseSystemStatus(result(1, '', 'No such file or directory\n'))).toEqual({ kind: 'untried' });
  });

  it('should reject an unknown status', () => {
    expect(() => parseSystemStatus(result(0, 'probation\n'))).toThrow('Unrecognised system status: probation');
  });
});

describe('parseSystemIndex', () => {
  it('should read the integer index', () => {
    expect(parseSystemIndex(result(0, '12\n'))).toBe(12);
  });

  it('should fail when the index cannot be read', () => {
    expect(() => parseSystemIndex(result(1, '', 'cat: missing\n'))).toThrow(
      'Cannot read the current system index (exit 1): cat: missing',
    );
  });
});

describe('StateProbe', () => {
  function probeReplying(reply: CommandResult) {
    const run = vi.fn(async (_command: string) => reply);
    const runner: CommandRunner = { run };
    return { probe: new StateProbe(runner), run };
  }

  it('should grep lsmod for the module', async () => {
    const { probe, run } = probeReplying(result(0, 'mod_a 16384 0\n'));

    await expect(probe.isModulePresent('mod_a')).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith(moduleListingCommand('mod_a'));
    expect(moduleListingCommand('mod_a')).toBe('/sbin/lsmod | grep -F "mod_a"');
  });

  it('should query app status through the framework tools', async () => {
    const { probe, run } = probeReplying(result(0, '[running] LoopingHelloWorld\n'));

    await expect(probe.isAppRunning('LoopingHelloWorld')).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith('/legato/systems/current/bin/app status LoopingHelloWorld');
  });

  it('should read the status and index files of the current system', async () => {
    const { probe, run } = probeReplying(result(0, '4\n'));

    await expect(probe.currentSystemIndex()).resolves.toBe(4);
    expect(run).toHaveBeenCalledWith('cat /legato/systems/current/index');
  });
});
