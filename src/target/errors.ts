/**
 * Harness error taxonomy
 *
 * Step-level mismatches are never thrown; they are recorded by the scenario
 * context. These errors cover what cannot be recorded as a step verdict.
 */

export type HarnessErrorCode =
  | 'CONFIGURATION'
  | 'INFRASTRUCTURE'
  | 'SCENARIO_ABORTED'
  | 'DEVICE_QUERY'
  | 'INVALID_DEFINITION'
  | 'SESSION';

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;

  constructor(message: string, code: HarnessErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Build, install or transport failure: nothing on the device can be trusted afterwards */
export class InfrastructureError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INFRASTRUCTURE', options);
  }
}

export class ScenarioAbortedError extends HarnessError {
  constructor(message: string) {
    super(message, 'SCENARIO_ABORTED');
  }
}

export class ConfigurationError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
  }
}

/** A query answered with text the translation layer does not recognise */
export class DeviceQueryError extends HarnessError {
  constructor(message: string) {
    super(message, 'DEVICE_QUERY');
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
