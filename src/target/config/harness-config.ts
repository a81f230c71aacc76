/**
 * Harness configuration
 *
 * Read from environment variables and validated with zod. Only runs against
 * a real target need the device and toolchain settings; the simulated
 * target runs with none of them.
 */

import { join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

/** `{ms}` is replaced with the probation period in milliseconds */
export const DEFAULT_PROBATION_COMMAND = '/legato/systems/current/bin/config set /framework/probation/periodMs {ms} int';

/** Probation period the framework uses when nothing overrides it */
export const DEFAULT_PROBATION_SECONDS = 30 * 60;

const envSchema = z.object({
  TARGET_IP: z.string().trim().min(1).optional(),
  TARGET_USER: z.string().trim().min(1).default('root'),
  TARGET_SSH_PORT: z.coerce.number().int().min(1).max(65535).default(22),
  TARGET_TYPE: z
    .string()
    .trim()
    .regex(/^[a-z0-9_]+$/i, 'TARGET_TYPE must be an identifier such as wp76xx')
    .default('wp76xx'),
  LEGATO_ROOT: z.string().trim().min(1).optional(),
  HARNESS_RESOURCES_DIR: z.string().trim().min(1).optional(),
  HARNESS_EXPECT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  HARNESS_PROBATION_COMMAND: z
    .string()
    .includes('{ms}', { message: 'HARNESS_PROBATION_COMMAND must contain {ms}' })
    .default(DEFAULT_PROBATION_COMMAND),
});

export interface HarnessConfig {
  target: {
    host?: string;
    user: string;
    port: number;
    /** Target family, e.g. wp76xx; prefixes the toolchain variables */
    type: string;
  };
  legatoRoot?: string;
  sysroot?: string;
  kernelRoot?: string;
  /** Directory holding system (.sdef) and app (.adef) definitions */
  resourcesDir: string;
  expectTimeoutMs: number;
  probationCommand: string;
}

/** What a run against real hardware cannot do without */
export interface DeviceSettings {
  host: string;
  user: string;
  port: number;
  type: string;
  legatoRoot: string;
  sysroot: string;
  kernelRoot: string;
}

export function sysrootVariable(targetType: string): string {
  return `${targetType.toUpperCase()}_SYSROOT`;
}

export function kernelRootVariable(targetType: string): string {
  return `${targetType.toUpperCase()}_KERNELROOT`;
}

export function loadHarnessConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid harness environment: ${issues}`, { cause: parsed.error });
  }

  const values = parsed.data;
  const sysroot = env[sysrootVariable(values.TARGET_TYPE)]?.trim() || undefined;
  const kernelRoot =
    env[kernelRootVariable(values.TARGET_TYPE)]?.trim() || (sysroot ? join(sysroot, 'usr/src/kernel') : undefined);

  return {
    target: {
      host: values.TARGET_IP,
      user: values.TARGET_USER,
      port: values.TARGET_SSH_PORT,
      type: values.TARGET_TYPE,
    },
    legatoRoot: values.LEGATO_ROOT,
    sysroot,
    kernelRoot,
    resourcesDir: resolve(values.HARNESS_RESOURCES_DIR ?? 'resources'),
    expectTimeoutMs: values.HARNESS_EXPECT_TIMEOUT_MS,
    probationCommand: values.HARNESS_PROBATION_COMMAND,
  };
}

export function requireDeviceSettings(config: HarnessConfig): DeviceSettings {
  const missing: string[] = [];
  if (!config.target.host) missing.push('TARGET_IP');
  if (!config.legatoRoot) missing.push('LEGATO_ROOT');
  if (!config.sysroot) missing.push(sysrootVariable(config.target.type));

  const { host, user, port, type } = config.target;
  const { legatoRoot, sysroot, kernelRoot } = config;
  if (!host || !legatoRoot || !sysroot || !kernelRoot) {
    throw new ConfigurationError(
      `Missing ${missing.join(', ')}. Please configure your legato environment`,
    );
  }

  return { host, user, port, type, legatoRoot, sysroot, kernelRoot };
}

export function probationCommandFor(template: string, seconds: number): string {
  return template.replace(/\{ms\}/g, String(Math.round(seconds * 1000)));
}
