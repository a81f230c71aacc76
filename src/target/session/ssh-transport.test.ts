/**
 * SSH transport Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { EventEmitter } from 'node:events';
import { TIMEOUT } from './session-channel.js';
import { SSH_CONNECTION_FAILURE, SshCommandRunner, openSshSession, sshArguments } from './ssh-transport.js';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const { execFileMock, spawnMock } = vi.hoisted(() => ({
  execFileMock: vi.fn(),
  spawnMock: vi.fn(),
}));

vi.mock('node:child_process', () => ({
  execFile: execFileMock,
  spawn: spawnMock,
}));

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

const target = { host: '192.168.2.2', user: 'root', port: 22 };

function replyWith(error: Error | null, stdout = '', stderr = ''): void {
  execFileMock.mockImplementation((_file: string, _args: string[], _options: object, callback: ExecCallback) => {
    callback(error, stdout, stderr);
  });
}

describe('sshArguments', () => {
  it('should disable host key prompts and address the target', () => {
    expect(sshArguments(target)).toEqual([
      '-o', 'StrictHostKeyChecking=no',
      '-o', 'UserKnownHostsFile=/dev/null',
      '-o', 'LogLevel=ERROR',
      '-o', 'ConnectTimeout=5',
      '-p', '22',
      'root@192.168.2.2',
    ]);
  });

  it('should use the configured connect timeout', () => {
    expect(sshArguments({ ...target, connectTimeoutSec: 12 })).toContain('ConnectTimeout=12');
  });
});

describe('SshCommandRunner', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should run the command remotely and report exit 0 on success', async () => {
    replyWith(null, 'L_Tools_Kmod_0004 16384 0\n');
    const runner = new SshCommandRunner(target);

    const result = await runner.run('/sbin/lsmod');

    expect(result).toEqual({ exitCode: 0, stdout: 'L_Tools_Kmod_0004 16384 0\n', stderr: '' });
    expect(execFileMock).toHaveBeenCalledWith(
      'ssh',
      [...sshArguments(target), '/sbin/lsmod'],
      expect.objectContaining({ timeout: 30000 }),
      expect.any(Function),
    );
  });

  it('should pass the remote exit status through', async () => {
    replyWith(Object.assign(new Error('Command failed'), { code: 1 }), '', 'not found\n');

    const result = await new SshCommandRunner(target).run('cat /missing', { timeoutMs: 500 });

    expect(result).toEqual({ exitCode: 1, stdout: '', stderr: 'not found\n' });
    expect(execFileMock).toHaveBeenCalledWith('ssh', expect.any(Array), expect.objectContaining({ timeout: 500 }), expect.any(Function));
  });

  it('should report a connection failure when ssh gives no exit status', async () => {
    replyWith(Object.assign(new Error('spawn ssh ENOENT'), { code: 'ENOENT' }));

    const result = await new SshCommandRunner(target).run('true');

    expect(result.exitCode).toBe(SSH_CONNECTION_FAILURE);
  });
});

function fakeChild(pid = 4242) {
  const child = Object.assign(new EventEmitter(), {
    stdout: new PassThrough(),
    stderr: new PassThrough(),
    stdin: new PassThrough(),
    pid,
    exitCode: null,
    kill: vi.fn(),
  });
  child.stdin.setEncoding('utf8');
  return child;
}

describe('openSshSession', () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it('should drive an ssh -tt child through a stream session', async () => {
    const child = fakeChild();
    spawnMock.mockReturnValue(child);

    const ssh = openSshSession(target, { defaultTimeoutMs: 1000 });
    ssh.channel.send('/legato/systems/current/bin/cm info');
    const pending = ssh.channel.expect(['Device:']);
    child.stdout.write('Device: WP7607\n');

    await expect(pending).resolves.toBe(0);
    expect(spawnMock).toHaveBeenCalledWith('ssh', ['-tt', ...sshArguments(target)]);
    expect(child.stdin.read()).toBe('/legato/systems/current/bin/cm info\n');

    ssh.close();
    expect(child.kill).toHaveBeenCalled();
  });

  it('should not connect before the first command', async () => {
    const ssh = openSshSession(target, { defaultTimeoutMs: 1000 });

    await expect(ssh.channel.expect(['Device:'])).resolves.toBe(TIMEOUT);
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it('should reconnect once a reboot has dropped the connection', async () => {
    const beforeReboot = fakeChild(4242);
    const afterReboot = fakeChild(4343);
    spawnMock.mockReturnValueOnce(beforeReboot).mockReturnValueOnce(afterReboot);
    const ssh = openSshSession(target, { defaultTimeoutMs: 1000 });

    ssh.channel.send('kmod load mod_a.ko');
    const first = ssh.channel.expect(['has been successful.', 'LE_FAULT', 'LE_DUPLICATE']);
    beforeReboot.stdout.write('Load of module mod_a.ko has been successful.\n');
    await expect(first).resolves.toBe(0);

    beforeReboot.stdout.end();
    beforeReboot.stderr.end();
    await vi.waitFor(() => expect(ssh.channel.connected).toBe(false));

    ssh.channel.send('kmod load mod_a.ko');
    const second = ssh.channel.expect(['has been successful.', 'LE_FAULT', 'LE_DUPLICATE']);
    afterReboot.stdout.write('Failed to load kernel module mod_a.ko: LE_DUPLICATE\n');

    await expect(second).resolves.toBe(2);
    expect(spawnMock).toHaveBeenCalledTimes(2);
    expect(ssh.channel.connectionCount).toBe(2);
    expect(beforeReboot.kill).toHaveBeenCalled();
    expect(afterReboot.stdin.read()).toBe('kmod load mod_a.ko\n');
  });

  it('should absorb input errors from a connection that just dropped', () => {
    const child = fakeChild();
    spawnMock.mockReturnValue(child);
    const ssh = openSshSession(target, { defaultTimeoutMs: 1000 });
    ssh.channel.send('true');

    const epipe = Object.assign(new Error('write EPIPE'), { code: 'EPIPE' });

    expect(() => child.stdin.emit('error', epipe)).not.toThrow();
  });
});
