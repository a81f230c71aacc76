export * from './kmod-scenarios.js';
export * from './probation-scenarios.js';
export * from './catalog.js';
