#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { buildReport, formatResult, parseCliArguments, type CliCommand } from './cli-options.js';
import { logError, logInfo } from './logger.js';
import { loadHarnessConfig } from './target/config/harness-config.js';
import { ConfigurationError, describeError } from './target/errors.js';
import { createDeviceHarness, createSimulatedHarness } from './target/harness.js';
import type { ScenarioResult } from './target/orchestrator/scenario.js';
import { ALL_SCENARIOS, selectScenarios } from './target/scenarios/catalog.js';

const EXIT_FAILED = 1;
const EXIT_USAGE = 2;

async function run(command: Extract<CliCommand, { kind: 'run' }>): Promise<number> {
  const scenarios = selectScenarios({ ids: command.ids, group: command.group });
  const harness = command.simulate ? createSimulatedHarness() : createDeviceHarness(loadHarnessConfig());

  harness.runner.on('scenarioComplete', (result: ScenarioResult) => {
    for (const line of formatResult(result)) {
      console.log(line);
    }
  });

  try {
    const suite = await harness.runner.runSuite(scenarios);
    if (command.reportPath) {
      await mkdir(dirname(command.reportPath), { recursive: true });
      const report = buildReport(suite.results, new Date());
      await writeFile(command.reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
      logInfo(`Report written to ${command.reportPath}`);
    }
    const passed = suite.results.filter(result => result.passed).length;
    console.log(`${passed}/${suite.results.length} scenarios passed`);
    return suite.passed ? 0 : EXIT_FAILED;
  } finally {
    harness.close();
  }
}

async function main(): Promise<void> {
  let exitCode: number;
  try {
    const command = parseCliArguments(process.argv.slice(2));
    if (command.kind === 'list') {
      for (const scenario of ALL_SCENARIOS) {
        console.log(`${scenario.id}\t${scenario.group}\t${scenario.title}`);
      }
      exitCode = 0;
    } else {
      exitCode = await run(command);
    }
  } catch (error) {
    logError(describeError(error));
    exitCode = error instanceof ConfigurationError ? EXIT_USAGE : EXIT_FAILED;
  }
  process.exitCode = exitCode;
}

void main();
