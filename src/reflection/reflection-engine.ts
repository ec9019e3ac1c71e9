/**
 * ReflectionEngine: runs the reasoning engine against itself through four
 * levels, scores the cycle's emergence, folds the Λ impact into EngineState
 * and applies the proposed improvements.
 *
 * A failing improvement handler is logged (improvement log + pino) and never
 * invalidates the cycle, which is already appended by then.
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { ReasoningEngine } from '../reasoning/reasoning-engine.js';
import type { ReasoningContext } from '../reasoning/types.js';
import type { EngineState } from '../core/state.js';
import {
  IMPROVEMENT_HANDLERS,
  runImprovement,
  type ImprovementHandlerTable,
  type ImprovementLogEntry,
} from './improvements.js';
import {
  cycleEmergence,
  lambdaImpact,
  recursiveLevel,
  reflexiveLevel,
  regenerativeLevel,
  transcendentLevel,
} from './levels.js';
import {
  REFLECTION_LEVELS,
  levelValue,
  type ReflectionCycle,
  type ReflectionLevel,
  type ReflectionOutcome,
} from './types.js';
import { sha256 } from '../utils/crypto.js';
import { StageTimer } from '../utils/timer.js';
import { toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

export interface ReflectionEngineOptions {
  /** Cycles averaged by the transcendent level. Default: 5 */
  emergenceWindow?: number;
  /** Override individual improvement handlers. */
  handlers?: Partial<ImprovementHandlerTable>;
}

export function hashCycle(id: string, levelReached: ReflectionLevel, improvementCount: number): string {
  return sha256(`${id}|${levelValue(levelReached)}|${REFLECTION_LEVELS.length}|${improvementCount}`);
}

export class ReflectionEngine extends EventEmitter {
  private readonly emergenceWindow: number;
  private readonly handlers: ImprovementHandlerTable;
  private logger = getLogger();

  constructor(
    private readonly reasoning: ReasoningEngine,
    private readonly state: EngineState,
    options: ReflectionEngineOptions = {},
  ) {
    super();
    this.emergenceWindow = options.emergenceWindow ?? 5;
    this.handlers = { ...IMPROVEMENT_HANDLERS, ...options.handlers };
  }

  reflect(query: string, context: ReasoningContext = {}): ReflectionOutcome {
    const timer = new StageTimer<ReflectionLevel>();
    const baselines = this.state.baselines;

    const reflexive = timer.time('reflexive', () => reflexiveLevel(this.reasoning, this.state, query, context));
    const recursive = timer.time('recursive', () => recursiveLevel(this.reasoning, baselines, query, reflexive));
    const regenerative = timer.time('regenerative', () => regenerativeLevel(recursive, baselines));
    const transcendent = timer.time('transcendent', () =>
      transcendentLevel(regenerative, this.state.emergenceHistory, baselines, this.emergenceWindow),
    );
    const levels = { reflexive, recursive, regenerative, transcendent };

    const emergence = cycleEmergence(levels);
    const index = this.state.cycles.length;
    const impact = lambdaImpact(emergence, index, baselines.lambdaGrowthTarget);
    const lambdaBefore = this.state.lambdaTotal;
    const levelReached: ReflectionLevel = transcendent.breakthrough ? 'transcendent' : 'regenerative';
    const id = `r3_${index}_${nanoid(8)}`;
    const improvements = regenerative.proposals;

    const cycle: ReflectionCycle = {
      id,
      index,
      query,
      context: { ...context },
      levelReached,
      levels,
      improvements,
      emergence,
      lambdaBefore,
      lambdaImpact: impact,
      lambdaAfter: lambdaBefore + impact,
      levelTimings: timer.durations(),
      durationMs: timer.total(),
      hash: hashCycle(id, levelReached, improvements.length),
      timestamp: Date.now(),
    };

    this.state.appendCycle(cycle);

    const applied = improvements.map(proposal => this.applyImprovement(cycle.id, proposal));
    const failed = applied.filter(entry => entry.error !== undefined).length;

    this.logger.info(
      { cycleId: id, emergence, lambdaTotal: this.state.lambdaTotal, levelReached, failed },
      'ReflectionEngine: cycle completed',
    );
    this.emit('reflection:completed', {
      cycleId: id,
      emergence,
      lambdaTotal: this.state.lambdaTotal,
      breakthrough: transcendent.breakthrough,
    });

    return {
      cycle,
      improvements: applied,
      metrics: {
        lambdaTotal: this.state.lambdaTotal,
        lambdaGrowth: this.state.lambdaTotal - lambdaBefore,
        emergence,
        improvementsApplied: applied.length - failed,
        improvementsFailed: failed,
        cyclesCompleted: this.state.cycles.length,
      },
    };
  }

  private applyImprovement(
    cycleId: string,
    proposal: ReflectionCycle['improvements'][number],
  ): ImprovementLogEntry {
    let entry: ImprovementLogEntry;
    try {
      const result = runImprovement(proposal, this.state, this.handlers);
      entry = { cycleId, kind: proposal.kind, result, timestamp: Date.now() };
      this.emit('improvement:applied', { cycleId, kind: proposal.kind, summary: result.summary });
    } catch (err) {
      const error = toError(err);
      entry = { cycleId, kind: proposal.kind, error: error.message, timestamp: Date.now() };
      this.logger.warn(
        { cycleId, kind: proposal.kind, error: error.message },
        'ReflectionEngine: improvement failed',
      );
    }
    this.state.appendImprovement(entry);
    return entry;
  }
}
