export { ConvergenceDetector } from './convergence-detector.js';
export type { ConvergenceConfig, ConvergenceReport, ConvergenceStats } from './types.js';
