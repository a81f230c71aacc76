/**
 * Property-Based Tests for KernelModuleRegistry
 *
 * Load/unload must agree with the module listing, dependencies must come
 * before their dependents, and a closure loaded bottom-up must unload
 * cleanly top-down.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  expectedLoad,
  expectedUnload,
  kmodOperationsArbitrary,
  moduleGraphArbitrary,
  propertyTestConfig,
} from '../test-setup.js';
import { KernelModuleRegistry } from './module-registry.js';

describe('KernelModuleRegistry Property-Based Tests', () => {
  it('should follow the kmod rules and keep presence in step with outcomes', () => {
    fc.assert(
      fc.property(moduleGraphArbitrary, kmodOperationsArbitrary, (graph, operations) => {
        const registry = new KernelModuleRegistry(graph);
        const loaded = new Set<string>();

        for (const operation of operations) {
          const name = graph[operation.pick % graph.length].name;
          if (operation.action === 'load') {
            const expected = expectedLoad(graph, loaded, name);
            expect(registry.load(name)).toBe(expected);
            if (expected === 'OK') loaded.add(name);
          } else {
            const expected = expectedUnload(graph, loaded, name);
            expect(registry.unload(name)).toBe(expected);
            if (expected === 'OK') loaded.delete(name);
          }
          expect(new Set(registry.loadedModules())).toEqual(loaded);
        }
      }),
      propertyTestConfig,
    );
  });

  it('should order every dependency before its dependents', () => {
    fc.assert(
      fc.property(moduleGraphArbitrary, fc.nat(), (graph, pick) => {
        const registry = new KernelModuleRegistry(graph);
        const closure = registry.dependencyClosure(graph[pick % graph.length].name);

        closure.forEach((name, position) => {
          for (const dependency of registry.definition(name)?.requires ?? []) {
            expect(closure.indexOf(dependency)).toBeGreaterThanOrEqual(0);
            expect(closure.indexOf(dependency)).toBeLessThan(position);
          }
        });
      }),
      propertyTestConfig,
    );
  });

  it('should unload a closure top-down after loading it bottom-up', () => {
    fc.assert(
      fc.property(moduleGraphArbitrary, fc.nat(), (graph, pick) => {
        const registry = new KernelModuleRegistry(graph);
        const target = graph[pick % graph.length].name;

        const loadedNow = registry.loadWithDependencies(target);
        expect(loadedNow).toEqual(registry.dependencyClosure(target));

        for (const name of [...loadedNow].reverse()) {
          expect(registry.unload(name)).toBe('OK');
        }
        expect(registry.loadedModules()).toEqual([]);
      }),
      propertyTestConfig,
    );
  });

  it('should keep a module with a loaded dependent loaded', () => {
    fc.assert(
      fc.property(moduleGraphArbitrary, (graph) => {
        const registry = new KernelModuleRegistry(graph);
        for (const module of graph) {
          registry.load(module.name);
        }

        for (const module of graph) {
          if (registry.loadedDependents(module.name).length > 0) {
            expect(registry.unload(module.name)).toBe('BUSY');
            expect(registry.isLoaded(module.name)).toBe(true);
          }
        }
      }),
      propertyTestConfig,
    );
  });
});
