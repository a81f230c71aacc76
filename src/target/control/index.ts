export * from './target-control.js';
export * from './device-commands.js';
