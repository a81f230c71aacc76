/**
 * Presence/State Probe
 *
 * The only place that reads raw command output. Each query issues one
 * command and translates the answer into a typed value; nothing is cached,
 * so every call reflects the device as it is now.
 */

import { DeviceQueryError } from '../errors.js';
import type { CommandResult, CommandRunner } from '../session/session-channel.js';
import type { SystemStatus } from '../types/device-state.js';

export const LEGATO_BIN = '/legato/systems/current/bin';
export const SYSTEM_STATUS_FILE = '/legato/systems/current/status';
export const SYSTEM_INDEX_FILE = '/legato/systems/current/index';

export type AppRunState = 'running' | 'stopped' | 'not-installed';

export function moduleListingCommand(name: string): string {
  return `/sbin/lsmod | grep -F "${name}"`;
}

/**
 * lsmod prints `name size used-by`; a module counts as present only when a
 * line's first column is exactly its name, so `foo` is not found in `foo_bar`.
 */
export function parseModuleListing(result: CommandResult, name: string): boolean {
  if (result.exitCode !== 0) {
    return false;
  }
  return result.stdout
    .split('\n')
    .some(line => line.trim().split(/\s+/)[0] === name);
}

export function parseAppStatus(result: CommandResult): AppRunState {
  const text = `${result.stdout}\n${result.stderr}`.toLowerCase();
  if (text.includes('[running]')) {
    return 'running';
  }
  if (text.includes('[stopped]')) {
    return 'stopped';
  }
  if (result.exitCode !== 0 || text.includes('not installed')) {
    return 'not-installed';
  }
  throw new DeviceQueryError(`Unrecognised app status output: ${result.stdout.trim()}`);
}

export function parseAppList(result: CommandResult, name: string): boolean {
  if (result.exitCode !== 0) {
    return false;
  }
  return result.stdout.split('\n').some(line => line.trim() === name);
}

/** A missing status file means the current system has never been started */
export function parseSystemStatus(result: CommandResult): SystemStatus {
  if (result.exitCode !== 0) {
    return { kind: 'untried' };
  }

  const text = result.stdout.trim();
  if (text === '') {
    return { kind: 'untried' };
  }
  if (text === 'good' || text === 'bad') {
    return { kind: text };
  }

  const tried = /^tried\s+(\d+)$/.exec(text);
  if (tried) {
    return { kind: 'tried', tries: Number.parseInt(tried[1], 10) };
  }

  throw new DeviceQueryError(`Unrecognised system status: ${text}`);
}

export function parseSystemIndex(result: CommandResult): number {
  const text = result.stdout.trim();
  if (result.exitCode !== 0 || !/^\d+$/.test(text)) {
    throw new DeviceQueryError(`Cannot read the current system index (exit ${result.exitCode}): ${text || result.stderr.trim()}`);
  }
  return Number.parseInt(text, 10);
}

export class StateProbe {
  constructor(private readonly runner: CommandRunner) {}

  async isModulePresent(name: string): Promise<boolean> {
    return parseModuleListing(await this.runner.run(moduleListingCommand(name)), name);
  }

  async appState(name: string): Promise<AppRunState> {
    return parseAppStatus(await this.runner.run(`${LEGATO_BIN}/app status ${name}`));
  }

  async isAppRunning(name: string): Promise<boolean> {
    return (await this.appState(name)) === 'running';
  }

  async isAppInstalled(name: string): Promise<boolean> {
    return parseAppList(await this.runner.run(`${LEGATO_BIN}/app list`), name);
  }

  async currentSystemStatus(): Promise<SystemStatus> {
    return parseSystemStatus(await this.runner.run(`cat ${SYSTEM_STATUS_FILE}`));
  }

  async currentSystemIndex(): Promise<number> {
    return parseSystemIndex(await this.runner.run(`cat ${SYSTEM_INDEX_FILE}`));
  }
}
