/**
 * Workspace manager for the simulated target: "building" a system is a
 * catalog lookup and "updating" hands the definition to the device.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { DEFAULT_PROBATION_SECONDS } from '../config/harness-config.js';
import { InfrastructureError } from '../errors.js';
import { BASELINE_SYSTEM, type WorkspaceManager } from '../environment/workspace-manager.js';
import type { SimulatedDevice } from './simulated-device.js';
import type { SystemCatalog } from './system-catalog.js';

export class SimulatedWorkspace implements WorkspaceManager {
  private readonly logger = createSubsystemLogger('target/workspace');
  private baselinePrepared = false;

  constructor(
    private readonly device: SimulatedDevice,
    private readonly catalog: SystemCatalog,
  ) {}

  async prepareBaseline(): Promise<void> {
    if (!this.catalog.system(BASELINE_SYSTEM)) {
      throw new InfrastructureError(`sdef file does not exist: ${BASELINE_SYSTEM}.sdef`);
    }
    this.baselinePrepared = true;
  }

  async installSystem(name: string): Promise<void> {
    const definition = this.catalog.system(name);
    if (!definition) {
      throw new InfrastructureError(`sdef file does not exist: ${name}.sdef`);
    }
    this.requireReachable(`update with system ${name}`);
    this.logger.info('Installing system', { system: name });
    this.device.installSystem(definition);
  }

  async restoreBaseline(): Promise<void> {
    if (!this.baselinePrepared) {
      await this.prepareBaseline();
    }
    await this.installSystem(BASELINE_SYSTEM);
  }

  async installApp(name: string): Promise<void> {
    const definition = this.catalog.app(name);
    if (!definition) {
      throw new InfrastructureError(`adef file does not exist: ${name}.adef`);
    }
    this.requireReachable(`install app ${name}`);
    this.logger.info('Installing app', { app: name });
    this.device.installApp(definition);
  }

  async clearTargetLog(): Promise<void> {
    this.requireReachable('clear the target log');
    this.device.clearLog();
  }

  async setProbationTimer(seconds: number): Promise<void> {
    this.requireReachable('set the probation timer');
    this.device.setProbationPeriod(seconds * 1000);
  }

  async resetProbationTimer(): Promise<void> {
    await this.setProbationTimer(DEFAULT_PROBATION_SECONDS);
  }

  private requireReachable(action: string): void {
    if (!this.device.isUp()) {
      throw new InfrastructureError(`Cannot ${action}: target unreachable`);
    }
  }
}
