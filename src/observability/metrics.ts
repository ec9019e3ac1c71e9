/**
 * Metrics sampling: periodic snapshots of system metrics kept in a bounded
 * history, plus aggregates over that history.
 */

import type { SystemMetrics } from '../core/system.js';
import { getLogger } from '../core/logger.js';
import { mean } from '../utils/stats.js';

export interface MetricsSource {
  getMetrics(): SystemMetrics;
}

export interface MetricSample {
  timestamp: number;
  lambdaTotal: number;
  avgEmergence: number;
  avgCertainty: number;
  cacheHitRate: number;
  converged: boolean;
  convergenceConfidence: number;
  cyclesCompleted: number;
}

export interface AggregateMetrics {
  samples: number;
  latest: MetricSample | null;
  /** Λ_total change between the oldest and newest sample considered. */
  lambdaGrowth: number;
  avgEmergence: number;
  avgCertainty: number;
  avgCacheHitRate: number;
  convergedRatio: number;
}

export interface MetricsCollectorOptions {
  /** Default: 1000 */
  maxSamples?: number;
  /** Clock source, in milliseconds. */
  now?: () => number;
}

/**
 * MetricsCollector samples a metrics source on an interval.
 */
export class MetricsCollector {
  private samples: MetricSample[] = [];
  private readonly maxSamples: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private logger = getLogger();

  constructor(private readonly source: MetricsSource, options: MetricsCollectorOptions = {}) {
    this.maxSamples = options.maxSamples ?? 1000;
    this.now = options.now ?? Date.now;
  }

  /** Begin sampling. The interval never keeps the process alive. */
  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sample();
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Take one sample now. */
  sample(): MetricSample {
    const metrics = this.source.getMetrics();
    const sample: MetricSample = {
      timestamp: this.now(),
      lambdaTotal: metrics.lambdaTotal,
      avgEmergence: metrics.avgEmergence,
      avgCertainty: metrics.avgCertainty,
      cacheHitRate: metrics.cacheHitRate,
      converged: metrics.convergence.converged,
      convergenceConfidence: metrics.convergence.confidence,
      cyclesCompleted: metrics.cyclesCompleted,
    };

    this.samples.push(sample);
    if (this.samples.length > this.maxSamples) {
      this.samples = this.samples.slice(-this.maxSamples);
    }

    this.logger.debug(
      { lambdaTotal: sample.lambdaTotal, cycles: sample.cyclesCompleted },
      'MetricsCollector: sample recorded',
    );
    return sample;
  }

  getSamples(): readonly MetricSample[] {
    return this.samples;
  }

  aggregate(since?: number): AggregateMetrics {
    const filtered = since !== undefined
      ? this.samples.filter(s => s.timestamp >= since)
      : this.samples;

    if (filtered.length === 0) {
      return {
        samples: 0,
        latest: null,
        lambdaGrowth: 0,
        avgEmergence: 0,
        avgCertainty: 0,
        avgCacheHitRate: 0,
        convergedRatio: 0,
      };
    }

    const first = filtered[0];
    const latest = filtered[filtered.length - 1];
    return {
      samples: filtered.length,
      latest,
      lambdaGrowth: latest.lambdaTotal - first.lambdaTotal,
      avgEmergence: mean(filtered.map(s => s.avgEmergence)),
      avgCertainty: mean(filtered.map(s => s.avgCertainty)),
      avgCacheHitRate: mean(filtered.map(s => s.cacheHitRate)),
      convergedRatio: filtered.filter(s => s.converged).length / filtered.length,
    };
  }

  reset(): void {
    this.samples = [];
  }
}
