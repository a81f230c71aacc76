/**
 * Device lifecycle types
 *
 * Host-side projections of the state that lives on the target: kernel
 * modules, applications and the installed system generation.
 */

export type LoadPolicy = 'auto' | 'manual';

export type StartPolicy = 'auto' | 'manual';

export type AppState = 'not-installed' | 'installed-stopped' | 'running';

export type SystemStatusKind = 'good' | 'tried' | 'bad' | 'untried';

export interface SystemStatus {
  kind: SystemStatusKind;
  /** Number of boots attempted while under probation, only for 'tried' */
  tries?: number;
}

export interface KernelModuleDefinition {
  /** Module name without the .ko suffix */
  name: string;
  load: LoadPolicy;
  /** Modules that must be loaded before this one */
  requires: string[];
}

/**
 * How the processes of a simulated application behave once started.
 * 'looping' runs until stopped; 'updateControl' reads its process arguments
 * and exercises the probation lock.
 */
export type AppBehavior = 'looping' | 'updateControl';

export interface AppDefinition {
  name: string;
  start: StartPolicy;
  requiresModules: string[];
  behavior: AppBehavior;
}

export interface SystemDefinition {
  name: string;
  modules: KernelModuleDefinition[];
  apps: AppDefinition[];
}

export function formatSystemStatus(status: SystemStatus): string {
  return status.kind === 'tried' && status.tries !== undefined ? `tried ${status.tries}` : status.kind;
}
