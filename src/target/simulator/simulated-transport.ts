/**
 * Transports onto a simulated target.
 *
 * The session echoes each command and its output followed by a prompt, like
 * an interactive shell would. Nothing arrives while the target is down, so
 * an expect then runs into its deadline on the virtual clock.
 */

import type { Clock } from '../clock/clock.js';
import { ExpectBuffer } from '../session/expect-buffer.js';
import {
  TIMEOUT,
  type CommandResult,
  type CommandRunner,
  type ExpectMatch,
  type Pattern,
  type SessionChannel,
} from '../session/session-channel.js';
import type { SimulatedDevice } from './simulated-device.js';

const PROMPT = 'root@swi-mdm9x28:~# ';

export class SimulatedSession implements SessionChannel {
  private readonly buffer = new ExpectBuffer();

  constructor(
    private readonly device: SimulatedDevice,
    private readonly clock: Clock,
    private readonly defaultTimeoutMs = 30000,
  ) {}

  get pendingOutput(): string {
    return this.buffer.contents;
  }

  send(line: string): void {
    if (!this.device.isUp()) {
      return;
    }
    const result = this.device.execute(line);
    this.buffer.append(`${line}\n${result.stdout}${result.stderr}${PROMPT}`);
  }

  async expect(patterns: readonly Pattern[], timeoutMs = this.defaultTimeoutMs): Promise<ExpectMatch> {
    const match = this.buffer.consume(patterns);
    if (match) {
      return match.index;
    }
    await this.clock.sleep(timeoutMs);
    return TIMEOUT;
  }
}

export class SimulatedCommandRunner implements CommandRunner {
  constructor(private readonly device: SimulatedDevice) {}

  async run(command: string): Promise<CommandResult> {
    return this.device.execute(command);
  }
}
