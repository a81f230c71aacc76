export * from './expectation-engine.js';
