/**
 * Wall-clock timing for pipeline stages.
 */

export function elapsedSince(start: number): number {
  return performance.now() - start;
}

/**
 * Times named stages run through it. A stage run twice accumulates.
 */
export class StageTimer<S extends string> {
  private readonly startedAt = performance.now();
  private readonly timings = new Map<S, number>();

  time<T>(stage: S, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.timings.set(stage, (this.timings.get(stage) ?? 0) + elapsedSince(start));
    }
  }

  /** Per-stage milliseconds, in first-run order. */
  durations(): Partial<Record<S, number>> {
    const out: Partial<Record<S, number>> = {};
    for (const [stage, ms] of this.timings) {
      out[stage] = ms;
    }
    return out;
  }

  /** Milliseconds since construction. */
  total(): number {
    return elapsedSince(this.startedAt);
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1) return `${ms.toFixed(2)}ms`;
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}
