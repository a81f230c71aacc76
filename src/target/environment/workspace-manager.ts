/**
 * Environment/Workspace Manager contract
 *
 * Builds and installs packages into a scratch workspace and brackets
 * scenarios with a known baseline. Every install failure surfaces as an
 * InfrastructureError.
 */

export const BASELINE_SYSTEM = 'default';

export interface WorkspaceManager {
  /** Builds the baseline package once per suite */
  prepareBaseline(): Promise<void>;
  /** Builds the named system definition and updates the target with it */
  installSystem(name: string): Promise<void>;
  /** Reinstalls the baseline package */
  restoreBaseline(): Promise<void>;
  /** Builds a single application and installs it on the current system */
  installApp(name: string): Promise<void>;
  clearTargetLog(): Promise<void>;
  setProbationTimer(seconds: number): Promise<void>;
  /** Puts the probation period back to the framework default */
  resetProbationTimer(): Promise<void>;
}
