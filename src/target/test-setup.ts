/**
 * Property-based testing setup for the harness
 *
 * Generators for kernel module graphs and kmod operation sequences, shared
 * by the registry, engine and simulator property tests.
 */

import * as fc from 'fast-check';
import type { KernelModuleDefinition, LoadPolicy } from './types/index.js';

export const moduleNameArbitrary: fc.Arbitrary<string> = fc.stringMatching(/^[a-z][a-z0-9_]{0,11}$/);

/**
 * Acyclic module graphs: a module only requires modules generated before
 * it, so the list itself is a valid load order.
 */
export const moduleGraphArbitrary: fc.Arbitrary<KernelModuleDefinition[]> = fc
  .uniqueArray(moduleNameArbitrary, { minLength: 1, maxLength: 8 })
  .chain(names =>
    fc.tuple(
      ...names.map((name, index) =>
        fc
          .record({
            load: fc.constantFrom<LoadPolicy>('auto', 'manual'),
            requires: fc.subarray(names.slice(0, index)),
          })
          .map(({ load, requires }): KernelModuleDefinition => ({ name, load, requires })),
      ),
    ),
  );

export interface KmodOperation {
  action: 'load' | 'unload';
  /** Picks a module modulo the graph size */
  pick: number;
}

export const kmodOperationsArbitrary: fc.Arbitrary<KmodOperation[]> = fc.array(
  fc.record({
    action: fc.constantFrom<KmodOperation['action']>('load', 'unload'),
    pick: fc.nat({ max: 63 }),
  }),
  { minLength: 1, maxLength: 25 },
);

/** Reference model of the kmod load/unload rules */
export function expectedLoad(graph: readonly KernelModuleDefinition[], loaded: ReadonlySet<string>, name: string): 'OK' | 'FAULT' | 'DUPLICATE' {
  const definition = graph.find(module => module.name === name);
  if (!definition) {
    return 'FAULT';
  }
  if (loaded.has(name)) {
    return 'DUPLICATE';
  }
  return definition.requires.every(dependency => loaded.has(dependency)) ? 'OK' : 'FAULT';
}

export function expectedUnload(graph: readonly KernelModuleDefinition[], loaded: ReadonlySet<string>, name: string): 'OK' | 'FAULT' | 'BUSY' {
  if (!loaded.has(name)) {
    return 'FAULT';
  }
  const hasDependent = graph.some(module => loaded.has(module.name) && module.requires.includes(name));
  return hasDependent ? 'BUSY' : 'OK';
}

/**
 * Common test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 30,
  timeout: 5000,
  verbose: false,
};
