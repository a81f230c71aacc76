/**
 * Kernel-module lifecycle and probation harness
 */

export * from './types/index.js';
export * from './errors.js';
export * from './clock/index.js';
export * from './session/index.js';
export * from './expectation/index.js';
export * from './probe/index.js';
export * from './control/index.js';
export * from './config/index.js';
export * from './environment/index.js';
export * from './simulator/index.js';
export * from './orchestrator/index.js';
export * from './scenarios/index.js';
export * from './harness.js';
