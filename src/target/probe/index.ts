export * from './device-queries.js';
export * from './polling.js';
