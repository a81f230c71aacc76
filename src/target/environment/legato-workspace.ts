/**
 * Workspace manager for real targets
 *
 * Compiles system and application definitions with the Legato host tools in
 * a temporary directory and pushes the resulting update packages to the
 * target. A system without a hand-written .sdef in the resources directory
 * is rendered from the system catalog into the workspace first.
 */

import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import {
  DEFAULT_PROBATION_SECONDS,
  kernelRootVariable,
  probationCommandFor,
  type DeviceSettings,
} from '../config/harness-config.js';
import { InfrastructureError } from '../errors.js';
import type { CommandRunner } from '../session/session-channel.js';
import type { HostToolchain } from './host-toolchain.js';
import {
  KERNEL_MODULE_DIR,
  renderModuleDefinition,
  renderModuleSource,
  renderSystemDefinition,
} from './legato-definitions.js';
import type { SystemCatalog } from '../simulator/system-catalog.js';
import type { SystemDefinition } from '../types/device-state.js';
import { BASELINE_SYSTEM, type WorkspaceManager } from './workspace-manager.js';

export interface LegatoWorkspaceOptions {
  device: DeviceSettings;
  resourcesDir: string;
  probationCommand: string;
  toolchain: HostToolchain;
  /** Runs commands on the target */
  runner: CommandRunner;
  /** Source of the systems that have no .sdef in `resourcesDir` */
  catalog?: SystemCatalog;
}

export class LegatoWorkspace implements WorkspaceManager {
  private readonly logger = createSubsystemLogger('target/workspace');
  private workspaceDir?: string;

  constructor(private readonly options: LegatoWorkspaceOptions) {}

  async prepareBaseline(): Promise<void> {
    this.logger.info('Compiling default legato...');
    await this.buildSystem(BASELINE_SYSTEM, join(this.options.device.legatoRoot, `${BASELINE_SYSTEM}.sdef`));
  }

  async installSystem(name: string): Promise<void> {
    const definition = await this.systemDefinitionFile(name);

    this.logger.info('Compilation in progress. Please wait...', { system: name });
    await this.buildSystem(name, definition);
    await this.update(name);
  }

  async restoreBaseline(): Promise<void> {
    this.logger.info('Updating target with default legato...');
    const workspace = await this.workspace();
    if (!existsSync(this.packagePath(workspace, BASELINE_SYSTEM))) {
      await this.prepareBaseline();
    }
    await this.update(BASELINE_SYSTEM);
  }

  async installApp(name: string): Promise<void> {
    const definition = this.appDefinitionFile(name);

    const workspace = await this.workspace();
    await this.options.toolchain.run(
      'mkapp',
      ['-t', this.options.device.type, `--output-dir=${workspace}`, definition],
      { cwd: workspace, env: this.toolEnvironment() },
    );
    await this.update(name);
    this.logger.info('Application built and installed', { app: name });
  }

  async clearTargetLog(): Promise<void> {
    this.logger.info('Clearing target log...');
    const result = await this.options.runner.run('/sbin/logread -c');
    if (result.exitCode !== 0) {
      throw new InfrastructureError(`Cannot clear the target log: ${result.stderr.trim()}`);
    }
  }

  async setProbationTimer(seconds: number): Promise<void> {
    const command = probationCommandFor(this.options.probationCommand, seconds);
    const result = await this.options.runner.run(command);
    if (result.exitCode !== 0) {
      throw new InfrastructureError(`Cannot set the probation period to ${seconds}s: ${result.stderr.trim()}`);
    }
    this.logger.info('Probation period set', { seconds });
  }

  resetProbationTimer(): Promise<void> {
    return this.setProbationTimer(DEFAULT_PROBATION_SECONDS);
  }

  private async systemDefinitionFile(name: string): Promise<string> {
    const handWritten = join(this.options.resourcesDir, `${name}.sdef`);
    if (existsSync(handWritten)) {
      return handWritten;
    }
    const system = this.options.catalog?.system(name);
    if (!system) {
      throw new InfrastructureError(`sdef file does not exist: ${handWritten}`);
    }
    return this.renderSystem(system);
  }

  private appDefinitionFile(name: string): string {
    const definition = join(this.options.resourcesDir, 'apps', name, `${name}.adef`);
    if (!existsSync(definition)) {
      throw new InfrastructureError(`adef file does not exist: ${definition}`);
    }
    return definition;
  }

  /** Writes the system's .sdef and .mdef files into the workspace; returns the .sdef */
  private async renderSystem(system: SystemDefinition): Promise<string> {
    // A missing .adef fails the install before anything is written
    for (const app of system.apps) {
      this.appDefinitionFile(app.name);
    }
    const directory = join(await this.workspace(), 'definitions', system.name);
    const moduleDirectory = join(directory, KERNEL_MODULE_DIR);
    await mkdir(moduleDirectory, { recursive: true });

    for (const module of system.modules) {
      let source = join(this.options.resourcesDir, KERNEL_MODULE_DIR, `${module.name}.c`);
      if (!existsSync(source)) {
        source = `${module.name}.c`;
        await writeFile(join(moduleDirectory, source), renderModuleSource(module.name), 'utf8');
      }
      await writeFile(join(moduleDirectory, `${module.name}.mdef`), renderModuleDefinition(module, source), 'utf8');
    }

    const sdef = join(directory, `${system.name}.sdef`);
    await writeFile(sdef, renderSystemDefinition(system, app => this.appDefinitionFile(app.name)), 'utf8');
    this.logger.debug('System definition rendered from the catalog', { system: system.name, sdef });
    return sdef;
  }

  private async buildSystem(name: string, definition: string): Promise<void> {
    const workspace = await this.workspace();
    await this.options.toolchain.run(
      'mksys',
      ['-t', this.options.device.type, `--output-dir=${workspace}`, definition],
      { cwd: workspace, env: this.toolEnvironment() },
    );
    this.logger.debug('System built', { system: name, workspace });
  }

  private async update(name: string): Promise<void> {
    const workspace = await this.workspace();
    const updatePackage = this.packagePath(workspace, name);
    await this.options.toolchain.run('update', [updatePackage, this.options.device.host], {
      cwd: workspace,
      env: this.toolEnvironment(),
    });
  }

  private packagePath(workspace: string, name: string): string {
    return join(workspace, `${name}.${this.options.device.type}.update`);
  }

  private async workspace(): Promise<string> {
    this.workspaceDir ??= await mkdtemp(join(tmpdir(), 'kmod-harness-'));
    return this.workspaceDir;
  }

  private toolEnvironment(): NodeJS.ProcessEnv {
    const { device } = this.options;
    return {
      ...process.env,
      LEGATO_ROOT: device.legatoRoot,
      [kernelRootVariable(device.type)]: device.kernelRoot,
      DEST_IP: device.host,
    };
  }
}
