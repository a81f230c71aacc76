/**
 * Harness configuration Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { ConfigurationError } from '../errors.js';
import {
  DEFAULT_PROBATION_COMMAND,
  loadHarnessConfig,
  probationCommandFor,
  requireDeviceSettings,
} from './harness-config.js';

describe('loadHarnessConfig', () => {
  it('should fall back to defaults when nothing is set', () => {
    expect(loadHarnessConfig({})).toEqual({
      target: { host: undefined, user: 'root', port: 22, type: 'wp76xx' },
      legatoRoot: undefined,
      sysroot: undefined,
      kernelRoot: undefined,
      resourcesDir: resolve('resources'),
      expectTimeoutMs: 30000,
      probationCommand: DEFAULT_PROBATION_COMMAND,
    });
  });

  it('should derive the kernel root from the target sysroot', () => {
    const config = loadHarnessConfig({ TARGET_TYPE: 'wp76xx', WP76XX_SYSROOT: '/opt/swi/sysroot' });

    expect(config.sysroot).toBe('/opt/swi/sysroot');
    expect(config.kernelRoot).toBe('/opt/swi/sysroot/usr/src/kernel');
  });

  it('should prefer an explicit kernel root', () => {
    const config = loadHarnessConfig({ WP76XX_SYSROOT: '/opt/swi/sysroot', WP76XX_KERNELROOT: '/opt/kernel' });

    expect(config.kernelRoot).toBe('/opt/kernel');
  });

  it('should coerce numeric settings', () => {
    const config = loadHarnessConfig({ TARGET_SSH_PORT: '2222', HARNESS_EXPECT_TIMEOUT_MS: '5000' });

    expect(config.target.port).toBe(2222);
    expect(config.expectTimeoutMs).toBe(5000);
  });

  it('should reject an invalid port', () => {
    expect(() => loadHarnessConfig({ TARGET_SSH_PORT: '70000' })).toThrow(ConfigurationError);
    expect(() => loadHarnessConfig({ TARGET_SSH_PORT: '70000' })).toThrow(/^Invalid harness environment: TARGET_SSH_PORT: /);
  });

  it('should reject a probation command without a placeholder', () => {
    expect(() => loadHarnessConfig({ HARNESS_PROBATION_COMMAND: 'config set period 10' })).toThrow(
      'Invalid harness environment: HARNESS_PROBATION_COMMAND: HARNESS_PROBATION_COMMAND must contain {ms}',
    );
  });
});

describe('requireDeviceSettings', () => {
  it('should name every missing setting', () => {
    expect(() => requireDeviceSettings(loadHarnessConfig({}))).toThrow(
      'Missing TARGET_IP, LEGATO_ROOT, WP76XX_SYSROOT. Please configure your legato environment',
    );
  });

  it('should return the device settings once everything is there', () => {
    const config = loadHarnessConfig({
      TARGET_IP: '192.168.2.2',
      LEGATO_ROOT: '/opt/legato',
      WP76XX_SYSROOT: '/opt/swi/sysroot',
    });

    expect(requireDeviceSettings(config)).toEqual({
      host: '192.168.2.2',
      user: 'root',
      port: 22,
      type: 'wp76xx',
      legatoRoot: '/opt/legato',
      sysroot: '/opt/swi/sysroot',
      kernelRoot: '/opt/swi/sysroot/usr/src/kernel',
    });
  });
});

describe('probationCommandFor', () => {
  it('should substitute the period in milliseconds', () => {
    expect(probationCommandFor(DEFAULT_PROBATION_COMMAND, 20)).toBe(
      '/legato/systems/current/bin/config set /framework/probation/periodMs 20000 int',
    );
  });
});
