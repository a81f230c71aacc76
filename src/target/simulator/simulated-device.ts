/**
 * Simulated Legato target
 *
 * An executable model of the device lifecycle: kernel modules with
 * dependencies, applications that load and pin the modules they need, and a
 * system generation under probation whose lock holders reboot the device
 * when they go away. It answers the same shell commands a real target does,
 * so every harness layer above the transport runs unchanged against it.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { Clock } from '../clock/clock.js';
import { HarnessError } from '../errors.js';
import { LEGATO_BIN, SYSTEM_INDEX_FILE, SYSTEM_STATUS_FILE } from '../probe/device-queries.js';
import type { CommandResult } from '../session/session-channel.js';
import type { AppDefinition, SystemDefinition, SystemStatus } from '../types/device-state.js';
import { KernelModuleRegistry } from './module-registry.js';
import { ProbationState } from './probation-state.js';

export interface SimulatedDeviceOptions {
  clock: Clock;
  /** Time from reboot until the target answers again */
  bootDurationMs?: number;
  /** Initial probation period; test frameworks usually shorten it to 1ms */
  probationMs?: number;
  deviceName?: string;
}

interface InstalledApp {
  definition: AppDefinition;
  running: boolean;
  /** Modules this app's start loaded; they stay pinned while it runs */
  pinned: string[];
}

/** Where the framework keeps its probation period, in milliseconds */
export const PROBATION_PERIOD_PATH = '/framework/probation/periodMs';

/** updateControl process argument 2: take the lock, then exit */
const LOCK_AND_EXIT_MODE = '3';

const UNREACHABLE: CommandResult = {
  exitCode: 255,
  stdout: '',
  stderr: 'ssh: connect to host target port 22: Connection refused\n',
};

const LSMOD_PATTERN = /^\/sbin\/lsmod(?:\s*\|\s*grep -F "([^"]*)")?$/;

function ok(stdout = ''): CommandResult {
  return { exitCode: 0, stdout, stderr: '' };
}

function failure(stderr: string, exitCode = 1): CommandResult {
  return { exitCode, stdout: '', stderr: `${stderr}\n` };
}

export class SimulatedDevice extends EventEmitter {
  private readonly logger = createSubsystemLogger('target/simulator');
  private readonly clock: Clock;
  private readonly bootDurationMs: number;
  private readonly deviceName: string;
  private modules = new KernelModuleRegistry([]);
  private readonly apps = new Map<string, InstalledApp>();
  private readonly probation: ProbationState;
  private readonly config = new Map<string, string>();
  private log: string[] = [];
  private downUntil: number | null = null;
  private reboots = 0;
  private systemName = 'none';

  constructor(options: SimulatedDeviceOptions) {
    super();
    this.clock = options.clock;
    this.bootDurationMs = options.bootDurationMs ?? 30000;
    this.deviceName = options.deviceName ?? 'WP7607';
    this.probation = new ProbationState(options.probationMs ?? 1, this.clock.now());
  }

  get rebootCount(): number {
    return this.reboots;
  }

  get currentSystem(): string {
    return this.systemName;
  }

  get systemIndex(): number {
    this.settle();
    return this.probation.systemIndex;
  }

  get systemStatus(): SystemStatus {
    this.settle();
    return this.probation.snapshot();
  }

  get probationLocks(): number {
    this.settle();
    return this.probation.lockCount();
  }

  loadedModules(): string[] {
    this.settle();
    return this.modules.loadedModules();
  }

  logLines(): string[] {
    return [...this.log];
  }

  isUp(): boolean {
    this.settle();
    return this.downUntil === null;
  }

  installSystem(definition: SystemDefinition): void {
    this.requireUp('install a system');
    const registry = new KernelModuleRegistry(definition.modules);
    for (const app of definition.apps) {
      this.checkAppModules(app, registry);
    }

    this.stopEverything();
    this.modules = registry;
    this.apps.clear();
    this.config.clear();
    for (const app of definition.apps) {
      this.apps.set(app.name, { definition: app, running: false, pinned: [] });
    }

    this.systemName = definition.name;
    this.probation.install(this.clock.now());
    this.record(`System '${definition.name}' installed as index ${this.probation.systemIndex}`);
    this.boot();
  }

  installApp(definition: AppDefinition): void {
    this.requireUp('install an app');
    this.checkAppModules(definition, this.modules);

    const previous = this.apps.get(definition.name);
    if (previous?.running) {
      this.stopApp(definition.name);
    }
    this.apps.set(definition.name, { definition, running: false, pinned: [] });
    this.probation.install(this.clock.now());
    this.record(`App '${definition.name}' installed, system index ${this.probation.systemIndex}`);

    if (definition.start === 'auto') {
      this.startApp(definition.name);
    }
  }

  setProbationPeriod(ms: number): void {
    this.requireUp('set the probation period');
    this.probation.setPeriod(ms, this.clock.now());
  }

  clearLog(): void {
    this.log = [];
  }

  execute(command: string): CommandResult {
    this.settle();
    if (this.downUntil !== null) {
      return UNREACHABLE;
    }

    const line = command.trim();
    const normalized = line.startsWith(`${LEGATO_BIN}/`) ? line.slice(LEGATO_BIN.length + 1) : line;
    const words = normalized.split(/\s+/);

    const lsmod = LSMOD_PATTERN.exec(normalized);
    if (lsmod) {
      return this.listModules(lsmod[1]);
    }

    switch (words[0]) {
      case 'true':
        return ok();
      case 'kmod':
        return this.kmod(words[1], words[2]);
      case 'app':
        return this.app(words[1], words[2]);
      case 'config':
        return this.configCommand(words.slice(1));
      case 'cm':
        return words[1] === 'info'
          ? ok(`Device: ${this.deviceName}\nIMEI: 000000000000000\nFW Version: SIMULATED\n`)
          : failure(`cm: unknown command ${words[1] ?? ''}`);
      case 'cat':
        return this.readFile(words[1]);
      case '/sbin/reboot':
        this.beginReboot('reboot requested');
        return ok();
      case '/sbin/logread':
        if (words[1] === '-c') {
          this.clearLog();
          return ok();
        }
        return ok(this.log.map(entry => `${entry}\n`).join(''));
      default:
        return failure(`sh: ${words[0]}: not found`, 127);
    }
  }

  private kmod(action: string | undefined, file: string | undefined): CommandResult {
    if ((action !== 'load' && action !== 'unload') || !file?.endsWith('.ko')) {
      return failure('Usage: kmod <load|unload> <module>.ko');
    }
    const name = file.slice(0, -'.ko'.length);

    if (action === 'load') {
      const outcome = this.modules.load(name);
      this.record(`kmod load ${file}: ${outcome}`);
      return outcome === 'OK'
        ? ok(`Load of module ${file} has been successful.\n`)
        : failure(`Failed to load kernel module ${file}: LE_${outcome}`);
    }

    const outcome = this.isPinned(name) ? 'BUSY' : this.modules.unload(name);
    this.record(`kmod unload ${file}: ${outcome}`);
    return outcome === 'OK'
      ? ok(`Unload of module ${file} has been successful.\n`)
      : failure(`Failed to unload kernel module ${file}: LE_${outcome}`);
  }

  private listModules(filter: string | undefined): CommandResult {
    const lines = this.modules
      .loadedModules()
      .reverse()
      .map(name => `${name} 16384 ${this.modules.loadedDependents(name).length}`)
      .filter(line => filter === undefined || line.includes(filter));
    if (filter !== undefined && lines.length === 0) {
      return { exitCode: 1, stdout: '', stderr: '' };
    }
    return ok(lines.map(line => `${line}\n`).join(''));
  }

  private app(action: string | undefined, name: string | undefined): CommandResult {
    if (action === 'list') {
      return ok([...this.apps.keys()].map(app => `${app}\n`).join(''));
    }
    if (!name) {
      return failure(`app ${action ?? ''}: missing application name`);
    }

    switch (action) {
      case 'start':
        return this.startApp(name);
      case 'stop':
        return this.stopApp(name);
      case 'remove':
        return this.removeApp(name);
      case 'status': {
        const app = this.apps.get(name);
        if (!app) {
          return failure(`[not installed] ${name}`);
        }
        return ok(`[${app.running ? 'running' : 'stopped'}] ${name}\n`);
      }
      default:
        return failure(`app: unknown command ${action ?? ''}`);
    }
  }

  private startApp(name: string): CommandResult {
    const app = this.apps.get(name);
    if (!app) {
      return failure(`App '${name}' is not installed.`);
    }
    if (app.running) {
      return ok(`App '${name}' is already running.\n`);
    }

    for (const module of app.definition.requiresModules) {
      app.pinned.push(...this.modules.loadWithDependencies(module));
    }
    app.running = true;
    this.record(`Application '${name}' has started.`);
    this.runProcesses(app);
    return ok();
  }

  private stopApp(name: string): CommandResult {
    const app = this.apps.get(name);
    if (!app) {
      return failure(`App '${name}' is not installed.`);
    }
    if (!app.running) {
      return ok(`App '${name}' is not running.\n`);
    }

    this.processesEnded(app, 'stopped');
    return ok();
  }

  private removeApp(name: string): CommandResult {
    const app = this.apps.get(name);
    if (!app) {
      return failure(`App '${name}' is not installed.`);
    }
    if (app.running) {
      this.processesEnded(app, 'stopped');
    }
    this.apps.delete(name);
    this.record(`Application '${name}' has been removed.`);
    return ok();
  }

  private runProcesses(app: InstalledApp): void {
    if (app.definition.behavior !== 'updateControl') {
      return;
    }

    const name = app.definition.name;
    if (this.processArgument(name, 1) !== 'lockProbation') {
      return;
    }

    const result = this.probation.acquire(name, this.clock.now());
    this.record(`${name}: le_updateCtrl_LockProbation() ${result}`);

    if (this.processArgument(name, 2) === LOCK_AND_EXIT_MODE) {
      this.processesEnded(app, 'died');
    }
  }

  /** The app's processes are gone; a held probation lock makes that fatal */
  private processesEnded(app: InstalledApp, how: 'stopped' | 'died'): void {
    const name = app.definition.name;
    app.running = false;
    this.record(`Application '${name}' has ${how === 'died' ? 'exited' : 'stopped'}.`);

    if (this.probation.heldBy(name) > 0) {
      this.beginReboot(`probation lock holder ${name} ${how}`);
      return;
    }
    this.releaseModules(app);
  }

  private releaseModules(app: InstalledApp): void {
    const pinned = [...app.pinned].reverse();
    app.pinned = [];
    for (const module of pinned) {
      if (!this.isPinned(module) && this.modules.loadedDependents(module).length === 0) {
        this.modules.unload(module);
      }
    }
  }

  private isPinned(module: string): boolean {
    for (const app of this.apps.values()) {
      if (app.running && app.pinned.includes(module)) {
        return true;
      }
    }
    return false;
  }

  private processArgument(app: string, position: number): string | undefined {
    return this.config.get(`apps/${app}/procs/${app}/args/${position}`);
  }

  private configCommand(args: string[]): CommandResult {
    const [action, path, ...rest] = args;
    if (!path) {
      return failure('Usage: config <get|set> <path> [value]');
    }
    if (action === 'get') {
      const value = this.config.get(path);
      return value === undefined ? failure(`${path}: not found`) : ok(`${value}\n`);
    }
    if (action === 'set' && rest.length > 0) {
      if (path === PROBATION_PERIOD_PATH) {
        const ms = Number.parseInt(rest[0], 10);
        if (!Number.isFinite(ms) || ms < 0) {
          return failure(`${path}: invalid period ${rest[0]}`);
        }
        this.probation.setPeriod(ms, this.clock.now());
      }
      this.config.set(path, rest.join(' '));
      return ok();
    }
    return failure('Usage: config <get|set> <path> [value]');
  }

  private readFile(path: string | undefined): CommandResult {
    if (path === SYSTEM_INDEX_FILE) {
      return ok(`${this.probation.systemIndex}\n`);
    }
    if (path === SYSTEM_STATUS_FILE) {
      const status = this.probation.snapshot();
      if (status.kind === 'untried') {
        return failure(`cat: can't open '${path}': No such file or directory`);
      }
      return ok(status.kind === 'tried' ? `tried ${status.tries ?? 1}\n` : `${status.kind}\n`);
    }
    return failure(`cat: can't open '${path ?? ''}': No such file or directory`);
  }

  private beginReboot(reason: string): void {
    this.record(`Rebooting: ${reason}`);
    this.logger.info('Simulated target rebooting', { reason });
    this.stopEverything();
    this.downUntil = this.clock.now() + this.bootDurationMs;
    this.reboots += 1;
    this.emit('reboot', reason);
  }

  private boot(): void {
    this.modules.autoLoadAll();
    for (const app of this.apps.values()) {
      if (app.definition.start === 'auto') {
        this.startApp(app.definition.name);
      }
    }
  }

  private settle(): void {
    const now = this.clock.now();
    if (this.downUntil !== null && now >= this.downUntil) {
      this.downUntil = null;
      this.probation.restart(now);
      this.record('Boot complete');
      this.boot();
    }
    this.probation.settle(now);
  }

  /** Processes go away without any lock-release consequences */
  private stopEverything(): void {
    for (const app of this.apps.values()) {
      app.running = false;
      app.pinned = [];
    }
    this.modules.unloadAll();
  }

  private requireUp(action: string): void {
    if (!this.isUp()) {
      throw new HarnessError(`Cannot ${action}: the target is rebooting`, 'INFRASTRUCTURE');
    }
  }

  private checkAppModules(app: AppDefinition, registry: KernelModuleRegistry): void {
    const unknown = app.requiresModules.filter(module => !registry.has(module));
    if (unknown.length > 0) {
      throw new HarnessError(`App ${app.name} requires unknown modules: ${unknown.join(', ')}`, 'INVALID_DEFINITION');
    }
  }

  private record(entry: string): void {
    this.log.push(`${this.clock.now()} ${entry}`);
  }
}
