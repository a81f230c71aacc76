export * from './scenario.js';
export * from './scenario-context.js';
export * from './fixtures.js';
export * from './scenario-runner.js';
