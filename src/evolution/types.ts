/**
 * Convergence: Type Definitions
 */

export interface ConvergenceConfig {
  /** Trailing samples considered. */
  window: number;
  /** Below this many samples the series is never judged converged. */
  minSamples: number;
  avgChangeThreshold: number;
  stdChangeThreshold: number;
}

export interface ConvergenceReport {
  converged: boolean;
  confidence: number;
  avgChange: number;
  stdChange: number;
  /** Mean signed change; positive while the series still grows. */
  trend: number;
  samples: number;
}

export interface ConvergenceStats {
  checksPerformed: number;
  convergencesDetected: number;
  lastReport: ConvergenceReport | null;
  config: ConvergenceConfig;
}
