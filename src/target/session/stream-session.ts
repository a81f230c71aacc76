/**
 * Stream-backed Session Channel
 *
 * Wraps the stdio of an interactive shell (an `ssh -tt` child process, a
 * serial line bridge) and implements send/expect over its output.
 */

import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { HarnessError } from '../errors.js';
import { ExpectBuffer } from './expect-buffer.js';
import { TIMEOUT, type ExpectMatch, type Pattern, type SessionChannel } from './session-channel.js';

export interface StreamSessionOptions {
  /** Deadline for expect() calls that do not pass their own */
  defaultTimeoutMs: number;
  maxBufferSize?: number;
}

export class StreamSession extends EventEmitter implements SessionChannel {
  private readonly buffer: ExpectBuffer;
  private readonly output: Writable;
  private readonly defaultTimeoutMs: number;
  private openInputs: number;
  private closed = false;
  private onActivity?: () => void;

  constructor(inputs: Readable | Readable[], output: Writable, options: StreamSessionOptions) {
    super();
    const streams = Array.isArray(inputs) ? inputs : [inputs];
    this.buffer = new ExpectBuffer(options.maxBufferSize);
    this.output = output;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.openInputs = streams.length;

    for (const stream of streams) {
      stream.setEncoding('utf8');
      stream.on('data', (chunk: string) => {
        this.buffer.append(chunk);
        this.emit('data', chunk);
        this.onActivity?.();
      });
      stream.once('end', () => this.inputEnded());
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Output received but not yet consumed by a match */
  get pendingOutput(): string {
    return this.buffer.contents;
  }

  send(line: string): void {
    if (this.closed) {
      this.emit('sendAfterClose', line);
      return;
    }
    this.output.write(`${line}\n`);
  }

  expect(patterns: readonly Pattern[], timeoutMs = this.defaultTimeoutMs): Promise<ExpectMatch> {
    if (this.onActivity) {
      return Promise.reject(new HarnessError('Only one expect() may be pending on a session', 'SESSION'));
    }

    return new Promise<ExpectMatch>(resolve => {
      let timer: NodeJS.Timeout | undefined;

      const finish = (result: ExpectMatch): void => {
        if (timer) {
          clearTimeout(timer);
        }
        this.onActivity = undefined;
        resolve(result);
      };

      const attempt = (): boolean => {
        const match = this.buffer.consume(patterns);
        if (match) {
          finish(match.index);
          return true;
        }
        if (this.closed) {
          finish(TIMEOUT);
          return true;
        }
        return false;
      };

      if (attempt()) {
        return;
      }

      timer = setTimeout(() => finish(TIMEOUT), timeoutMs);
      this.onActivity = () => {
        attempt();
      };
    });
  }

  private inputEnded(): void {
    this.openInputs -= 1;
    if (this.openInputs > 0 || this.closed) {
      return;
    }
    this.closed = true;
    this.emit('close');
    this.onActivity?.();
  }
}
