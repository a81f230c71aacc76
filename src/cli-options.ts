/**
 * Command-line parsing and output formatting for kmod-harness.
 */

import { ConfigurationError } from './target/errors.js';
import { SCENARIO_GROUPS, type ScenarioGroup, type ScenarioResult } from './target/orchestrator/scenario.js';

export const USAGE =
  'Usage: kmod-harness list | run [ids...] [--group kmod|probation] [--simulate] [--report <file>]';

export type CliCommand =
  | { kind: 'list' }
  | { kind: 'run'; ids: string[]; group?: ScenarioGroup; simulate: boolean; reportPath?: string };

function isScenarioGroup(value: string): value is ScenarioGroup {
  return SCENARIO_GROUPS.some(group => group === value);
}

export function parseCliArguments(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === 'list' && rest.length === 0) {
    return { kind: 'list' };
  }
  if (command !== 'run') {
    throw new ConfigurationError(USAGE);
  }

  const ids: string[] = [];
  let group: ScenarioGroup | undefined;
  let simulate = false;
  let reportPath: string | undefined;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '--simulate':
        simulate = true;
        break;
      case '--group': {
        const value = rest[++i];
        if (value === undefined || !isScenarioGroup(value)) {
          throw new ConfigurationError(`--group expects one of ${SCENARIO_GROUPS.join(', ')}`);
        }
        group = value;
        break;
      }
      case '--report': {
        const value = rest[++i];
        if (value === undefined || value.startsWith('--')) {
          throw new ConfigurationError('--report expects a file path');
        }
        reportPath = value;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new ConfigurationError(`Unknown option ${arg}\n${USAGE}`);
        }
        ids.push(arg);
    }
  }

  return { kind: 'run', ids, group, simulate, reportPath };
}

export function formatResult(result: ScenarioResult): string[] {
  const verdict = result.passed ? 'PASS' : result.aborted ? 'ABORT' : 'FAIL';
  return [
    `${verdict} ${result.id} (${(result.durationMs / 1000).toFixed(1)}s) ${result.title}`,
    ...result.errors.map(error => `    ${error}`),
  ];
}

export interface RunReport {
  generatedAt: string;
  total: number;
  passed: number;
  failed: number;
  results: ScenarioResult[];
}

export function buildReport(results: ScenarioResult[], generatedAt: Date): RunReport {
  const passed = results.filter(result => result.passed).length;
  return {
    generatedAt: generatedAt.toISOString(),
    total: results.length,
    passed,
    failed: results.length - passed,
    results,
  };
}
