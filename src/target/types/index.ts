/**
 * Harness type definitions
 */

export * from './outcomes.js';
export * from './device-state.js';
