export * from './harness-config.js';
