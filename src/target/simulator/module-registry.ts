/**
 * Kernel module registry
 *
 * Load/unload rules for the simulated target:
 * - loading a loaded module is DUPLICATE (checked before dependencies)
 * - loading with any dependency unloaded, or an unknown module, is FAULT
 * - unloading a module some loaded module requires is BUSY
 * - unloading an unloaded or unknown module is FAULT
 */

import { HarnessError } from '../errors.js';
import type { ClassifiedLoadOutcome, ClassifiedUnloadOutcome } from '../types/outcomes.js';
import type { KernelModuleDefinition } from '../types/device-state.js';

export class KernelModuleRegistry {
  private readonly definitions = new Map<string, KernelModuleDefinition>();
  // Insertion order is load order, which is what lsmod reports in reverse
  private readonly loaded = new Set<string>();

  constructor(definitions: readonly KernelModuleDefinition[]) {
    for (const definition of definitions) {
      if (this.definitions.has(definition.name)) {
        throw new HarnessError(`Kernel module ${definition.name} is defined twice`, 'INVALID_DEFINITION');
      }
      this.definitions.set(definition.name, definition);
    }

    for (const definition of definitions) {
      for (const dependency of definition.requires) {
        if (!this.definitions.has(dependency)) {
          throw new HarnessError(
            `Kernel module ${definition.name} requires unknown module ${dependency}`,
            'INVALID_DEFINITION',
          );
        }
      }
    }

    for (const definition of definitions) {
      this.dependencyClosure(definition.name);
    }
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  definition(name: string): KernelModuleDefinition | undefined {
    return this.definitions.get(name);
  }

  isLoaded(name: string): boolean {
    return this.loaded.has(name);
  }

  loadedModules(): string[] {
    return [...this.loaded];
  }

  /** Loaded modules that list `name` as a requirement */
  loadedDependents(name: string): string[] {
    return [...this.loaded].filter(loaded => this.definitions.get(loaded)?.requires.includes(name) ?? false);
  }

  load(name: string): ClassifiedLoadOutcome {
    const definition = this.definitions.get(name);
    if (!definition) {
      return 'FAULT';
    }
    if (this.loaded.has(name)) {
      return 'DUPLICATE';
    }
    if (!definition.requires.every(dependency => this.loaded.has(dependency))) {
      return 'FAULT';
    }
    this.loaded.add(name);
    return 'OK';
  }

  unload(name: string): ClassifiedUnloadOutcome {
    if (!this.loaded.has(name)) {
      return 'FAULT';
    }
    if (this.loadedDependents(name).length > 0) {
      return 'BUSY';
    }
    this.loaded.delete(name);
    return 'OK';
  }

  /** `name` and everything it needs, dependencies first */
  dependencyClosure(name: string): string[] {
    const order: string[] = [];
    const done = new Set<string>();

    const visit = (current: string, path: string[]): void => {
      if (done.has(current)) {
        return;
      }
      if (path.includes(current)) {
        throw new HarnessError(
          `Kernel module dependency cycle: ${[...path, current].join(' -> ')}`,
          'INVALID_DEFINITION',
        );
      }
      const definition = this.definitions.get(current);
      if (!definition) {
        throw new HarnessError(`Unknown kernel module ${current}`, 'INVALID_DEFINITION');
      }
      for (const dependency of definition.requires) {
        visit(dependency, [...path, current]);
      }
      done.add(current);
      order.push(current);
    };

    visit(name, []);
    return order;
  }

  /** Loads `name` after its missing dependencies; returns what was newly loaded */
  loadWithDependencies(name: string): string[] {
    const newlyLoaded: string[] = [];
    for (const module of this.dependencyClosure(name)) {
      if (this.load(module) === 'OK') {
        newlyLoaded.push(module);
      }
    }
    return newlyLoaded;
  }

  autoLoadAll(): string[] {
    return [...this.definitions.values()]
      .filter(definition => definition.load === 'auto')
      .flatMap(definition => this.loadWithDependencies(definition.name));
  }

  unloadAll(): void {
    this.loaded.clear();
  }
}
