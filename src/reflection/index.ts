export * from './types.js';
export * from './improvements.js';
export * from './levels.js';
export * from './reflection-engine.js';
