export * from './types.js';
export * from './component-extractor.js';
export * from './concept-graph.js';
export * from './reasoning-engine.js';
