/**
 * Host-side build/install tools (mksys, mkapp, update) run as child processes.
 */

import { execFile } from 'node:child_process';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { InfrastructureError } from '../errors.js';

const log = createSubsystemLogger('target/toolchain');

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

export interface ToolRunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface HostToolchain {
  run(tool: string, args: string[], options: ToolRunOptions): Promise<ToolOutput>;
}

export class ChildProcessToolchain implements HostToolchain {
  run(tool: string, args: string[], options: ToolRunOptions): Promise<ToolOutput> {
    log.debug('Running host tool', { tool, args, cwd: options.cwd });

    return new Promise<ToolOutput>((resolve, reject) => {
      execFile(
        tool,
        args,
        {
          cwd: options.cwd,
          env: options.env,
          timeout: options.timeoutMs ?? 20 * 60 * 1000,
          encoding: 'utf8',
          maxBuffer: 16 * 1024 * 1024,
        },
        (error, stdout, stderr) => {
          if (error) {
            const detail = stderr.trim().split('\n').slice(-5).join('\n');
            reject(new InfrastructureError(`${tool} ${args.join(' ')} failed: ${detail || error.message}`, { cause: error }));
            return;
          }
          resolve({ stdout, stderr });
        },
      );
    });
  }
}
