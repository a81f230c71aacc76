/**
 * Application and configuration commands.
 *
 * The narrow command surface through which scenarios mutate the target
 * besides kmod itself.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { LEGATO_BIN } from '../probe/device-queries.js';
import type { CommandResult, CommandRunner, SessionChannel } from '../session/session-channel.js';

export class DeviceCommands {
  private readonly logger = createSubsystemLogger('target/commands');

  constructor(
    private readonly runner: CommandRunner,
    private readonly session: SessionChannel,
  ) {}

  startApp(name: string): Promise<CommandResult> {
    return this.app('start', name);
  }

  stopApp(name: string): Promise<CommandResult> {
    return this.app('stop', name);
  }

  removeApp(name: string): Promise<CommandResult> {
    return this.app('remove', name);
  }

  /** Starts an app through the interactive session without waiting for it */
  sendAppStart(name: string): void {
    this.session.send(`${LEGATO_BIN}/app start ${name}`);
  }

  /** Sets argument `position` of the app's main process (same name as the app) */
  async setProcessArgument(app: string, position: number, value: string): Promise<CommandResult> {
    const result = await this.runner.run(`${LEGATO_BIN}/config set apps/${app}/procs/${app}/args/${position} ${value}`);
    if (result.exitCode !== 0) {
      this.logger.warn('config set failed', { app, position, value, stderr: result.stderr.trim() });
    }
    return result;
  }

  private async app(action: 'start' | 'stop' | 'remove', name: string): Promise<CommandResult> {
    const result = await this.runner.run(`${LEGATO_BIN}/app ${action} ${name}`);
    this.logger.debug(`app ${action}`, { app: name, exitCode: result.exitCode });
    return result;
  }
}
