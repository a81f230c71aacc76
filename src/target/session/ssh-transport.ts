/**
 * SSH transport
 *
 * Interactive sessions run over an `ssh -tt` child process, respawned after
 * the target drops it; one-shot queries run a fresh `ssh <target> <command>`
 * each and report the remote exit status. OpenSSH reports its own
 * connection failures as exit 255.
 */

import { execFile, spawn } from 'node:child_process';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ReconnectingSession, type SessionConnection } from './reconnecting-session.js';
import { StreamSession } from './stream-session.js';
import type { CommandResult, CommandRunner, RunOptions } from './session-channel.js';

const log = createSubsystemLogger('target/ssh');

export const SSH_CONNECTION_FAILURE = 255;

export interface SshTarget {
  host: string;
  user: string;
  port: number;
  /** Seconds OpenSSH waits for the TCP connection */
  connectTimeoutSec?: number;
}

export function sshArguments(target: SshTarget): string[] {
  return [
    '-o', 'StrictHostKeyChecking=no',
    '-o', 'UserKnownHostsFile=/dev/null',
    '-o', 'LogLevel=ERROR',
    '-o', `ConnectTimeout=${target.connectTimeoutSec ?? 5}`,
    '-p', String(target.port),
    `${target.user}@${target.host}`,
  ];
}

export interface SshSession {
  channel: ReconnectingSession;
  close(): void;
}

function connect(target: SshTarget, defaultTimeoutMs: number): SessionConnection {
  const child = spawn('ssh', ['-tt', ...sshArguments(target)]);
  const channel = new StreamSession([child.stdout, child.stderr], child.stdin, { defaultTimeoutMs });

  log.info('Interactive session opened', { host: target.host, pid: child.pid });

  channel.on('data', (chunk: string) => log.debug('session output', { chunk }));
  child.on('exit', (code, signal) => {
    log.info('Interactive session closed', { host: target.host, code, signal });
  });
  child.on('error', error => {
    log.error('Interactive session failed', { host: target.host, error: error.message });
  });
  // A write racing a dropped connection fails with EPIPE; the session then ends
  child.stdin.on('error', error => {
    log.warn('Interactive session input failed', { host: target.host, error: error.message });
  });

  return {
    channel,
    dispose: () => {
      if (child.exitCode === null) {
        child.kill();
      }
    },
  };
}

/** Connects on first use and again after every dropped connection */
export function openSshSession(target: SshTarget, options: { defaultTimeoutMs: number }): SshSession {
  const channel = new ReconnectingSession(() => connect(target, options.defaultTimeoutMs));
  return { channel, close: () => channel.close() };
}

export class SshCommandRunner implements CommandRunner {
  constructor(
    private readonly target: SshTarget,
    private readonly defaultTimeoutMs = 30000,
  ) {}

  run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise<CommandResult>(resolve => {
      execFile(
        'ssh',
        [...sshArguments(this.target), command],
        { timeout, encoding: 'utf8', maxBuffer: 4 * 1024 * 1024 },
        (error, stdout, stderr) => {
          const exitCode = error === null ? 0 : typeof error.code === 'number' ? error.code : SSH_CONNECTION_FAILURE;
          log.debug('command finished', { command, exitCode });
          resolve({ exitCode, stdout, stderr });
        },
      );
    });
  }
}
