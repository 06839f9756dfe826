export * from './commands/index.js';
export * from './inspection/index.js';
export * from './program/index.js';
export * from './session/index.js';
