/**
 * Scenario definitions
 */

import type { ScenarioContext } from './scenario-context.js';

export type ScenarioGroup = 'kmod' | 'probation';

export const SCENARIO_GROUPS: readonly ScenarioGroup[] = ['kmod', 'probation'];

export interface ScenarioDefinition {
  /** Stable identifier, e.g. L_Tools_Kmod_0004 */
  id: string;
  title: string;
  group: ScenarioGroup;
  /** Probation scenarios only: skip resetting the probation period in setup */
  keepShortProbation?: boolean;
  run(context: ScenarioContext): Promise<void>;
  /** Runs when the scenario failed, before teardown */
  onFailure?(context: ScenarioContext): Promise<void>;
}

export interface ScenarioResult {
  id: string;
  title: string;
  group: ScenarioGroup;
  passed: boolean;
  /** Stopped early by an infrastructure failure or an explicit abort */
  aborted: boolean;
  errors: string[];
  startedAt: number;
  durationMs: number;
}

export interface SuiteResult {
  passed: boolean;
  results: ScenarioResult[];
}
