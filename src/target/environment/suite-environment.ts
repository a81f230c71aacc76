/**
 * One-time suite bootstrap.
 *
 * Builds the baseline package and puts it on the target before the first
 * scenario. `initialize()` is the single entry point; later calls reuse the
 * first run's result.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { WorkspaceManager } from './workspace-manager.js';

export class SuiteEnvironment {
  private readonly logger = createSubsystemLogger('target/suite');
  private initialized = false;
  private pending?: Promise<void>;

  constructor(private readonly workspace: WorkspaceManager) {}

  get isInitialized(): boolean {
    return this.initialized;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.pending ??= this.bootstrap();
    try {
      await this.pending;
    } catch (error) {
      this.pending = undefined;
      throw error;
    }
  }

  private async bootstrap(): Promise<void> {
    this.logger.info('Preparing baseline system...');
    await this.workspace.prepareBaseline();
    await this.workspace.restoreBaseline();
    this.initialized = true;
    this.logger.info('Suite environment ready');
  }
}
