/**
 * EngineState: the single owner of everything that accumulates across calls:
 * Λ_total and its history, reflection cycles, emergence history, the
 * improvement log, tunable baselines and the reasoning cache.
 *
 * Histories are append-only. Λ_total never decreases.
 */

import type { ReasoningResult } from '../reasoning/types.js';
import type { ReflectionCycle } from '../reflection/types.js';
import type { ImprovementLogEntry } from '../reflection/improvements.js';

export interface EngineBaselines {
  reasoningDepth: number;
  certaintyThreshold: number;
  emergenceTarget: number;
  lambdaGrowthTarget: number;
  optimizedPatterns: string[];
}

export const DEFAULT_BASELINES: Readonly<EngineBaselines> = {
  reasoningDepth: 2,
  certaintyThreshold: 0.7,
  emergenceTarget: 2.0,
  lambdaGrowthTarget: 0.1,
  optimizedPatterns: [],
};

export interface EngineStateOptions {
  initialLambda?: number;
  /** Max cached reasoning results; unbounded when omitted. */
  cacheMaxSize?: number;
  baselines?: Partial<EngineBaselines>;
}

export interface EngineStateSnapshot {
  lambdaTotal: number;
  lambdaHistory: number[];
  cyclesCompleted: number;
  emergenceHistory: number[];
  improvementCount: number;
  baselines: EngineBaselines;
  cacheSize: number;
}

/**
 * Reasoning result cache. Least recently used entries are evicted first once
 * a max size is set.
 */
export class ReasoningCache {
  private entries = new Map<string, ReasoningResult>();

  constructor(private readonly maxSize?: number) {}

  get(key: string): ReasoningResult | undefined {
    const value = this.entries.get(key);
    if (value && this.maxSize !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, value);
    }
    return value;
  }

  set(key: string, value: ReasoningResult): void {
    this.entries.delete(key);
    this.entries.set(key, value);
    if (this.maxSize === undefined) return;
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export class EngineState {
  readonly cache: ReasoningCache;
  private lambda: number;
  private readonly lambdaSeries: number[];
  private readonly cycleLog: ReflectionCycle[] = [];
  private readonly emergenceSeries: number[] = [];
  private readonly improvements: ImprovementLogEntry[] = [];
  private currentBaselines: EngineBaselines;

  constructor(options: EngineStateOptions = {}) {
    this.lambda = options.initialLambda ?? 10.0;
    this.lambdaSeries = [this.lambda];
    this.cache = new ReasoningCache(options.cacheMaxSize);
    this.currentBaselines = {
      ...DEFAULT_BASELINES,
      ...options.baselines,
      optimizedPatterns: [...(options.baselines?.optimizedPatterns ?? [])],
    };
  }

  get lambdaTotal(): number {
    return this.lambda;
  }

  get lambdaHistory(): readonly number[] {
    return this.lambdaSeries;
  }

  get cycles(): readonly ReflectionCycle[] {
    return this.cycleLog;
  }

  get emergenceHistory(): readonly number[] {
    return this.emergenceSeries;
  }

  get improvementLog(): readonly ImprovementLogEntry[] {
    return this.improvements;
  }

  get baselines(): Readonly<EngineBaselines> {
    return this.currentBaselines;
  }

  updateBaselines(patch: Partial<EngineBaselines>): void {
    this.currentBaselines = { ...this.currentBaselines, ...patch };
  }

  /** The last `n` emergence values (fewer when history is shorter). */
  recentEmergence(n: number): number[] {
    return n > 0 ? this.emergenceSeries.slice(-n) : [];
  }

  /**
   * Append a finalized cycle and fold its impact into Λ_total. A negative
   * impact is treated as zero.
   */
  appendCycle(cycle: ReflectionCycle): void {
    this.cycleLog.push(cycle);
    this.emergenceSeries.push(cycle.emergence);
    this.lambda += Math.max(0, cycle.lambdaImpact);
    this.lambdaSeries.push(this.lambda);
  }

  appendImprovement(entry: ImprovementLogEntry): void {
    this.improvements.push(entry);
  }

  snapshot(): EngineStateSnapshot {
    return {
      lambdaTotal: this.lambda,
      lambdaHistory: [...this.lambdaSeries],
      cyclesCompleted: this.cycleLog.length,
      emergenceHistory: [...this.emergenceSeries],
      improvementCount: this.improvements.length,
      baselines: { ...this.currentBaselines, optimizedPatterns: [...this.currentBaselines.optimizedPatterns] },
      cacheSize: this.cache.size,
    };
  }
}
