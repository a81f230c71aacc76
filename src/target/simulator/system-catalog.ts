/**
 * Catalogue of the system and application definitions the simulated target
 * can install. Real runs compile .sdef/.adef files instead; the simulator
 * reads the same shapes from JSON.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { HarnessError } from '../errors.js';
import type { AppDefinition, SystemDefinition } from '../types/device-state.js';

export const DEFAULT_CATALOG_URL = new URL('../../../resources/systems.json', import.meta.url);

const moduleSchema = z.object({
  name: z.string().min(1),
  load: z.enum(['auto', 'manual']),
  requires: z.array(z.string().min(1)).default([]),
});

const appSchema = z.object({
  name: z.string().min(1),
  start: z.enum(['auto', 'manual']),
  requiresModules: z.array(z.string().min(1)).default([]),
  behavior: z.enum(['looping', 'updateControl']).default('looping'),
});

const catalogSchema = z.object({
  systems: z.array(
    z.object({
      name: z.string().min(1),
      modules: z.array(moduleSchema).default([]),
      apps: z.array(appSchema).default([]),
    }),
  ),
  apps: z.array(appSchema).default([]),
});

export type CatalogData = z.input<typeof catalogSchema>;

function parseCatalog(data: unknown): z.output<typeof catalogSchema> {
  const parsed = catalogSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new HarnessError(`Invalid system catalog: ${issues.join('; ')}`, 'INVALID_DEFINITION');
  }
  return parsed.data;
}

export class SystemCatalog {
  private readonly systems = new Map<string, SystemDefinition>();
  private readonly apps = new Map<string, AppDefinition>();

  constructor(data: CatalogData) {
    const catalog = parseCatalog(data);
    for (const system of catalog.systems) {
      this.systems.set(system.name, system);
    }
    for (const app of catalog.apps) {
      this.apps.set(app.name, app);
    }
  }

  get systemNames(): string[] {
    return [...this.systems.keys()];
  }

  system(name: string): SystemDefinition | undefined {
    return this.systems.get(name);
  }

  app(name: string): AppDefinition | undefined {
    return this.apps.get(name);
  }
}

export function loadSystemCatalog(location: URL | string = DEFAULT_CATALOG_URL): SystemCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(location, 'utf8'));
  } catch (error) {
    throw new HarnessError(`Cannot read system catalog ${String(location)}`, 'INVALID_DEFINITION', { cause: error });
  }
  return new SystemCatalog(parseCatalog(raw));
}
