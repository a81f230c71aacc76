/**
 * Session Channel that survives target reboots.
 *
 * A reboot drops the interactive connection and ends its stream session for
 * good. The next send opens a fresh connection through the factory; while
 * the target is still down that connection fails and ends too, so every
 * send retries until the target answers.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { TIMEOUT, type ExpectMatch, type Pattern, type SessionChannel } from './session-channel.js';
import type { StreamSession } from './stream-session.js';

export interface SessionConnection {
  channel: StreamSession;
  /** Tears the underlying process or line down */
  dispose(): void;
}

export class ReconnectingSession implements SessionChannel {
  private readonly logger = createSubsystemLogger('target/session');
  private current: SessionConnection | null = null;
  private connections = 0;

  constructor(private readonly connect: () => SessionConnection) {}

  /** Whether a live connection is open right now */
  get connected(): boolean {
    return this.current !== null && !this.current.channel.isClosed;
  }

  get connectionCount(): number {
    return this.connections;
  }

  send(line: string): void {
    this.ensureConnected().channel.send(line);
  }

  expect(patterns: readonly Pattern[], timeoutMs?: number): Promise<ExpectMatch> {
    if (this.current === null) {
      // Nothing was sent, so nothing can arrive
      return Promise.resolve(TIMEOUT);
    }
    return this.current.channel.expect(patterns, timeoutMs);
  }

  close(): void {
    this.current?.dispose();
    this.current = null;
  }

  private ensureConnected(): SessionConnection {
    if (this.current !== null && !this.current.channel.isClosed) {
      return this.current;
    }
    if (this.current !== null) {
      this.logger.info('Session closed, reconnecting', { previousConnections: this.connections });
      this.current.dispose();
    }
    this.current = this.connect();
    this.connections += 1;
    return this.current;
  }
}
