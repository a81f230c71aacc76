import { createSubsystemLogger } from './logging/subsystem.js';

const log = createSubsystemLogger('harness');

export function logInfo(message: string): void {
  log.info(message);
}

export function logError(message: string): void {
  log.error(message);
}
