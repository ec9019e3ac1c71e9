import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConvergenceDetector } from '../../../src/evolution/convergence-detector.js';

describe('ConvergenceDetector', () => {
  let detector: ConvergenceDetector;

  beforeEach(() => {
    detector = new ConvergenceDetector();
  });

  it('needs at least three samples', () => {
    expect(detector.detect([10, 10.1])).toEqual({
      converged: false,
      confidence: 0,
      avgChange: 0,
      stdChange: 0,
      trend: 0,
      samples: 2,
    });
  });

  it('converges on a flat series', () => {
    const report = detector.detect([1, 1, 1, 1, 1]);
    expect(report.converged).toBe(true);
    expect(report.confidence).toBe(1);
    expect(report.trend).toBe(0);
  });

  it('does not converge while Λ is still growing', () => {
    const report = detector.detect([10, 10.08, 10.164, 10.252]);
    expect(report.converged).toBe(false);
    expect(report.avgChange).toBeCloseTo(0.084, 10);
    expect(report.trend).toBeCloseTo(0.084, 10);
    expect(report.confidence).toBeCloseTo(0.16, 10);
    // diffs 0.080, 0.084, 0.088
    expect(report.stdChange).toBeCloseTo(Math.sqrt((0.004 ** 2 * 2) / 3), 10);
  });

  it('only looks at the trailing window', () => {
    const report = detector.detect([0, 5, 5.001, 5.002, 5.003, 5.004]);
    expect(report.samples).toBe(5);
    expect(report.converged).toBe(true);
    expect(report.avgChange).toBeCloseTo(0.001, 10);
    expect(report.confidence).toBeCloseTo(0.99, 10);
  });

  it('uses a single-diff standard deviation of 0', () => {
    const small = new ConvergenceDetector({ minSamples: 2, window: 2 });
    const report = small.detect([1, 1.005]);
    expect(report.stdChange).toBe(0);
    expect(report.converged).toBe(true);
  });

  it('emits convergence:detected on the transition only', () => {
    const listener = vi.fn();
    detector.on('convergence:detected', listener);

    detector.detect([1, 1, 1]);
    detector.detect([1, 1, 1, 1]);
    expect(listener).toHaveBeenCalledTimes(1);

    detector.detect([1, 2, 3]);
    detector.detect([3, 3, 3]);
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('tracks stats', () => {
    detector.detect([1, 1, 1]);
    detector.detect([1]);
    const stats = detector.getStats();
    expect(stats.checksPerformed).toBe(2);
    expect(stats.convergencesDetected).toBe(1);
    expect(stats.lastReport?.samples).toBe(1);
    expect(stats.config).toEqual({ window: 5, minSamples: 3, avgChangeThreshold: 0.01, stdChangeThreshold: 0.02 });
  });
});
