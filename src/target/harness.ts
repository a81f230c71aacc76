/**
 * Harness assembly
 *
 * Wires a target (real over SSH, or simulated in process) into the layers
 * the scenario runner drives. Both variants expose the same HarnessTarget.
 */

import { systemClock, VirtualClock, type Clock } from './clock/clock.js';
import { requireDeviceSettings, type HarnessConfig } from './config/harness-config.js';
import { DeviceCommands } from './control/device-commands.js';
import { ShellTargetControl } from './control/target-control.js';
import { ChildProcessToolchain } from './environment/host-toolchain.js';
import { LegatoWorkspace } from './environment/legato-workspace.js';
import { SuiteEnvironment } from './environment/suite-environment.js';
import type { WorkspaceManager } from './environment/workspace-manager.js';
import { ExpectationEngine } from './expectation/expectation-engine.js';
import { DEFAULT_SCENARIO_TIMING, type HarnessTarget, type ScenarioTiming } from './orchestrator/scenario-context.js';
import { ScenarioRunner } from './orchestrator/scenario-runner.js';
import { StateProbe } from './probe/device-queries.js';
import type { CommandRunner, SessionChannel } from './session/session-channel.js';
import { openSshSession, SshCommandRunner } from './session/ssh-transport.js';
import { SimulatedDevice } from './simulator/simulated-device.js';
import { SimulatedCommandRunner, SimulatedSession } from './simulator/simulated-transport.js';
import { SimulatedWorkspace } from './simulator/simulated-workspace.js';
import { loadSystemCatalog, type SystemCatalog } from './simulator/system-catalog.js';

export interface Harness {
  target: HarnessTarget;
  environment: SuiteEnvironment;
  runner: ScenarioRunner;
  close(): void;
}

export interface SimulatedHarness extends Harness {
  device: SimulatedDevice;
  clock: VirtualClock;
}

export interface SimulatedHarnessOptions {
  catalog?: SystemCatalog;
  timing?: ScenarioTiming;
  bootDurationMs?: number;
  expectTimeoutMs?: number;
}

interface Transport {
  session: SessionChannel;
  runner: CommandRunner;
  workspace: WorkspaceManager;
  clock: Clock;
  expectTimeoutMs: number;
}

function assemble(transport: Transport, timing: ScenarioTiming, close: () => void): Harness {
  const { session, runner, workspace, clock, expectTimeoutMs } = transport;
  const target: HarnessTarget = {
    engine: new ExpectationEngine(session, {
      clock,
      timeoutMs: expectTimeoutMs,
      readinessTimeoutMs: 5000,
      readinessIntervalMs: timing.pollIntervalMs,
    }),
    probe: new StateProbe(runner),
    commands: new DeviceCommands(runner, session),
    control: new ShellTargetControl(runner, { clock, pollIntervalMs: timing.pollIntervalMs }),
    workspace,
    clock,
  };
  const environment = new SuiteEnvironment(workspace);
  return { target, environment, runner: new ScenarioRunner(target, environment, timing), close };
}

export function createSimulatedHarness(options: SimulatedHarnessOptions = {}): SimulatedHarness {
  const clock = new VirtualClock();
  const device = new SimulatedDevice({ clock, bootDurationMs: options.bootDurationMs });
  const expectTimeoutMs = options.expectTimeoutMs ?? 30000;
  const harness = assemble(
    {
      session: new SimulatedSession(device, clock, expectTimeoutMs),
      runner: new SimulatedCommandRunner(device),
      workspace: new SimulatedWorkspace(device, options.catalog ?? loadSystemCatalog()),
      clock,
      expectTimeoutMs,
    },
    options.timing ?? DEFAULT_SCENARIO_TIMING,
    () => undefined,
  );
  return { ...harness, device, clock };
}

/** Throws ConfigurationError when the environment does not describe a device */
export function createDeviceHarness(config: HarnessConfig, timing: ScenarioTiming = DEFAULT_SCENARIO_TIMING): Harness {
  const device = requireDeviceSettings(config);
  const sshTarget = { host: device.host, user: device.user, port: device.port };
  const ssh = openSshSession(sshTarget, { defaultTimeoutMs: config.expectTimeoutMs });
  const runner = new SshCommandRunner(sshTarget, config.expectTimeoutMs);

  return assemble(
    {
      session: ssh.channel,
      runner,
      workspace: new LegatoWorkspace({
        device,
        resourcesDir: config.resourcesDir,
        probationCommand: config.probationCommand,
        toolchain: new ChildProcessToolchain(),
        runner,
        catalog: loadSystemCatalog(),
      }),
      clock: systemClock,
      expectTimeoutMs: config.expectTimeoutMs,
    },
    timing,
    ssh.close,
  );
}
