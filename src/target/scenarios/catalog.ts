/**
 * Scenario catalogue and selection
 */

import { ConfigurationError } from '../errors.js';
import type { ScenarioDefinition, ScenarioGroup } from '../orchestrator/scenario.js';
import { KMOD_SCENARIOS } from './kmod-scenarios.js';
import { PROBATION_SCENARIOS } from './probation-scenarios.js';

export const ALL_SCENARIOS: readonly ScenarioDefinition[] = [...KMOD_SCENARIOS, ...PROBATION_SCENARIOS];

export interface ScenarioSelection {
  ids?: readonly string[];
  group?: ScenarioGroup;
}

export function findScenario(id: string): ScenarioDefinition | undefined {
  return ALL_SCENARIOS.find(scenario => scenario.id === id);
}

/**
 * Scenarios matching every given filter, in catalogue order. Unknown ids are
 * a configuration error rather than an empty run.
 */
export function selectScenarios(selection: ScenarioSelection = {}): ScenarioDefinition[] {
  const { ids = [], group } = selection;
  const unknown = ids.filter(id => !findScenario(id));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown scenario: ${unknown.join(', ')}`);
  }

  return ALL_SCENARIOS.filter(
    scenario => (ids.length === 0 || ids.includes(scenario.id)) && (group === undefined || scenario.group === group),
  );
}
