export * from './workspace-manager.js';
export * from './host-toolchain.js';
export * from './legato-definitions.js';
export * from './legato-workspace.js';
export * from './suite-environment.js';
