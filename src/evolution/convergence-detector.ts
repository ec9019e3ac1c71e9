/**
 * ConvergenceDetector: judges whether a numeric series (Λ_total history)
 * has stopped moving.
 *
 * Looks at the trailing window, takes successive differences and calls the
 * series converged when both the mean absolute change and the spread of the
 * changes fall under their thresholds.
 */

import { EventEmitter } from 'node:events';
import type { ConvergenceConfig, ConvergenceReport, ConvergenceStats } from './types.js';
import { diff, mean, stdDev } from '../utils/stats.js';

const DEFAULT_CONFIG: ConvergenceConfig = {
  window: 5,
  minSamples: 3,
  avgChangeThreshold: 0.01,
  stdChangeThreshold: 0.02,
};

export class ConvergenceDetector extends EventEmitter {
  private config: ConvergenceConfig;
  private checksPerformed = 0;
  private convergencesDetected = 0;
  private lastReport: ConvergenceReport | null = null;

  constructor(config?: Partial<ConvergenceConfig>) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  detect(history: readonly number[]): ConvergenceReport {
    this.checksPerformed++;

    if (history.length < this.config.minSamples) {
      const report: ConvergenceReport = {
        converged: false,
        confidence: 0,
        avgChange: 0,
        stdChange: 0,
        trend: 0,
        samples: history.length,
      };
      this.lastReport = report;
      return report;
    }

    const recent = history.slice(-this.config.window);
    const changes = diff(recent);
    const avgChange = mean(changes.map(Math.abs));
    const stdChange = stdDev(changes);
    const converged =
      avgChange < this.config.avgChangeThreshold && stdChange < this.config.stdChangeThreshold;

    const report: ConvergenceReport = {
      converged,
      confidence: 1 - Math.min(1, avgChange * 10),
      avgChange,
      stdChange,
      trend: mean(changes),
      samples: recent.length,
    };

    const wasConverged = this.lastReport?.converged ?? false;
    this.lastReport = report;
    if (converged) {
      this.convergencesDetected++;
      if (!wasConverged) {
        this.emit('convergence:detected', { avgChange, stdChange, confidence: report.confidence });
      }
    }

    return report;
  }

  getStats(): ConvergenceStats {
    return {
      checksPerformed: this.checksPerformed,
      convergencesDetected: this.convergencesDetected,
      lastReport: this.lastReport,
      config: { ...this.config },
    };
  }
}
