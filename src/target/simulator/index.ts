export * from './module-registry.js';
export * from './probation-state.js';
export * from './simulated-device.js';
export * from './simulated-transport.js';
export * from './simulated-workspace.js';
export * from './system-catalog.js';
