import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReflectionEngine, hashCycle } from '../../../src/reflection/reflection-engine.js';
import { ReasoningEngine } from '../../../src/reasoning/reasoning-engine.js';
import { EngineState } from '../../../src/core/state.js';
import { ImprovementError } from '../../../src/core/errors.js';
import { sha256 } from '../../../src/utils/crypto.js';
import { REFLECTION_LEVELS, levelValue } from '../../../src/reflection/types.js';

function createEngine(state: EngineState, options: ConstructorParameters<typeof ReflectionEngine>[2] = {}) {
  return new ReflectionEngine(new ReasoningEngine(state), state, options);
}

describe('REFLECTION_LEVELS', () => {
  it('runs reflexive, recursive, regenerative, transcendent in order', () => {
    expect(REFLECTION_LEVELS).toEqual(['reflexive', 'recursive', 'regenerative', 'transcendent']);
    expect(levelValue('reflexive')).toBe(1);
    expect(levelValue('transcendent')).toBe(4);
  });
});

describe('ReflectionEngine', () => {
  let state: EngineState;
  let engine: ReflectionEngine;

  beforeEach(() => {
    state = new EngineState();
    engine = createEngine(state);
  });

  it('analyzes the meta query at the reflexive level', () => {
    const { cycle } = engine.reflect('Socrates is mortal');
    const { reflexive } = cycle.levels;

    expect(reflexive.insights).toEqual([
      'Processing query: Socrates is mortal',
      'Context: {}',
      'Current state: Λ=10.000, cycles=0',
    ]);
    // "Analyze", "I'm" and "Socrates" are unknown; "doing" is an action
    expect(reflexive.analysis.unknowns).toBe(3);
    expect(reflexive.analysis.patternTypes).toEqual(['action']);
    expect(reflexive.certainty).toBeCloseTo(0.45, 10);
  });

  it('finds fixed points and flags inefficient patterns at the recursive level', () => {
    const { recursive } = engine.reflect('Socrates is mortal').cycle.levels;

    expect(recursive.fixedPoints).toEqual(['action']);
    expect(recursive.inefficientPatterns).toEqual(['unresolved_unknowns']);
    expect(recursive.recursionDepth).toBe(1);
    expect(recursive.recursiveStructures).toEqual([]);
    expect(recursive.certainty).toBeCloseTo(0.45, 10);
  });

  it('counts nested meta prefixes and self-reference markers', () => {
    const { recursive } = engine.reflect("Analyze what I'm doing: think about itself").cycle.levels;
    expect(recursive.recursiveStructures).toEqual(['meta_prefix', 'self_reference:itself']);
    expect(recursive.recursionDepth).toBe(2);
  });

  it('proposes all three improvements on a weak first cycle', () => {
    const { cycle } = engine.reflect('Socrates is mortal');
    const { regenerative } = cycle.levels;

    expect(regenerative.proposals.map(p => p.kind)).toEqual([
      'increase_reasoning_depth',
      'improve_certainty',
      'optimize_patterns',
    ]);
    expect(regenerative.proposals[0]).toEqual({ kind: 'increase_reasoning_depth', from: 2, to: 3, impact: 0.15 });
    expect(regenerative.potentialGain).toBeCloseTo(0.45, 10);
    expect(regenerative.certainty).toBe(0.7);
    expect(cycle.improvements).toBe(regenerative.proposals);
  });

  it('applies improvements to the baselines', () => {
    const { improvements } = engine.reflect('Socrates is mortal');

    expect(improvements.map(i => i.kind)).toEqual([
      'increase_reasoning_depth',
      'improve_certainty',
      'optimize_patterns',
    ]);
    expect(improvements.every(i => i.error === undefined)).toBe(true);
    expect(state.baselines.reasoningDepth).toBe(3);
    expect(state.baselines.optimizedPatterns).toEqual(['unresolved_unknowns']);
    expect(state.improvementLog).toHaveLength(3);
  });

  it('stops flagging patterns once they are optimized', () => {
    engine.reflect('Socrates is mortal');
    const { cycle } = engine.reflect('Socrates is mortal');

    expect(cycle.levels.recursive.inefficientPatterns).toEqual([]);
    expect(cycle.levels.recursive.certainty).toBeCloseTo(0.5, 10);
    expect(cycle.improvements.map(p => p.kind)).toEqual(['increase_reasoning_depth', 'improve_certainty']);
  });

  it('grows Λ_total from 10.0 over five cycles', () => {
    const emergences: number[] = [];
    for (let i = 0; i < 5; i++) {
      emergences.push(engine.reflect('Socrates is mortal').cycle.emergence);
    }

    const multiplier = (e: number) => (e >= 2 ? 1.5 : e >= 1 ? 1.2 : 0.8);
    const expected = emergences.reduce((total, e, i) => total + 0.1 * multiplier(e) * (1 + 0.05 * i), 10);
    expect(state.lambdaTotal).toBeCloseTo(expected, 10);

    // No novelty insights, so every cycle contributes at the 0.8 multiplier
    expect(emergences).toEqual([0, 0, 0, 0, 0]);
    const history = state.lambdaHistory;
    [10, 10.08, 10.164, 10.252, 10.344, 10.44].forEach((value, i) => {
      expect(history[i]).toBeCloseTo(value, 10);
    });
  });

  it('reaches a transcendent breakthrough once the emergence window fills', () => {
    const reasoning = new ReasoningEngine(state);
    reasoning.addConcept('Analyze');
    reasoning.addConcept("I'm");
    const reflection = new ReflectionEngine(reasoning, state);
    const completed = vi.fn();
    reflection.on('reflection:completed', completed);

    const cycles = Array.from({ length: 7 }, () => reflection.reflect('a new thing').cycle);

    // One novelty insight, two levels above 0.7, eight insights in total
    for (const cycle of cycles.slice(0, 5)) {
      expect(cycle.emergence).toBeCloseTo(2 * Math.sqrt(8), 10);
      expect(cycle.levelReached).toBe('regenerative');
      expect(cycle.levels.transcendent.breakthrough).toBe(false);
    }

    const [sixth, seventh] = cycles.slice(5);
    expect(sixth.levels.transcendent.averageEmergence).toBeCloseTo(2 * Math.sqrt(8), 10);
    expect(sixth.levels.transcendent.breakthrough).toBe(true);
    expect(sixth.levels.transcendent.framework?.basis).toEqual(['increase_reasoning_depth']);
    expect(sixth.levelReached).toBe('transcendent');
    expect(sixth.hash).toBe(sha256(`${sixth.id}|4|4|1`));
    // Two novelty insights, three levels above 0.7, nine insights: log2(3) * 3 * 3
    expect(sixth.emergence).toBeCloseTo(Math.log2(3) * 9, 10);
    expect(sixth.emergence).toBeGreaterThan(5);
    expect(seventh.levelReached).toBe('transcendent');
    expect(completed.mock.calls[5][0]).toMatchObject({ cycleId: sixth.id, breakthrough: true });

    const expected = cycles.reduce((total, _cycle, i) => total + 0.1 * 1.5 * (1 + 0.05 * i), 10);
    expect(state.lambdaTotal).toBeCloseTo(expected, 10);
    expect(state.lambdaTotal).toBeCloseTo(11.2075, 10);
  });

  it('never lets Λ_total decrease', () => {
    for (let i = 0; i < 8; i++) {
      engine.reflect(`query number ${i}`);
    }
    const history = state.lambdaHistory;
    for (let i = 1; i < history.length; i++) {
      expect(history[i]).toBeGreaterThanOrEqual(history[i - 1]);
    }
  });

  it('records cycle bookkeeping', () => {
    const { cycle, metrics } = engine.reflect('Socrates is mortal', { source: 'test' });

    expect(cycle.id).toMatch(/^r3_0_[a-z0-9]{8}$/);
    expect(cycle.index).toBe(0);
    expect(cycle.levelReached).toBe('regenerative');
    expect(cycle.lambdaBefore).toBe(10);
    expect(cycle.lambdaImpact).toBeCloseTo(0.08, 10);
    expect(cycle.lambdaAfter).toBeCloseTo(10.08, 10);
    expect(cycle.hash).toBe(sha256(`${cycle.id}|3|4|3`));
    expect(cycle.levels.reflexive.insights[1]).toBe('Context: {"source":"test"}');

    expect(metrics).toMatchObject({ improvementsApplied: 3, improvementsFailed: 0, cyclesCompleted: 1 });
    expect(metrics.lambdaGrowth).toBeCloseTo(0.08, 10);
    expect(state.cycles).toEqual([cycle]);
    expect(state.emergenceHistory).toEqual([0]);
    expect(Object.keys(cycle.levelTimings)).toEqual([...REFLECTION_LEVELS]);
    expect(cycle.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('logs a failing improvement and keeps the cycle', () => {
    const failing = createEngine(state, {
      handlers: {
        increase_reasoning_depth: () => {
          throw new ImprovementError('depth locked', 'increase_reasoning_depth');
        },
      },
    });

    const { cycle, improvements, metrics } = failing.reflect('Socrates is mortal');

    expect(improvements[0]).toMatchObject({ cycleId: cycle.id, kind: 'increase_reasoning_depth', error: 'depth locked' });
    expect(improvements[1].result?.summary).toBe('Certainty gap 0.25 needs ~5 refinements');
    expect(metrics.improvementsFailed).toBe(1);
    expect(metrics.improvementsApplied).toBe(2);
    expect(state.cycles).toHaveLength(1);
    expect(state.baselines.reasoningDepth).toBe(2);
  });

  it('emits reflection:completed and improvement:applied', () => {
    const completed = vi.fn();
    const applied = vi.fn();
    engine.on('reflection:completed', completed);
    engine.on('improvement:applied', applied);

    const { cycle } = engine.reflect('Socrates is mortal');

    expect(completed).toHaveBeenCalledTimes(1);
    expect(completed.mock.calls[0][0]).toMatchObject({ cycleId: cycle.id, emergence: 0, breakthrough: false });
    expect(applied).toHaveBeenCalledTimes(3);
  });

  it('uses the cached reflexive analysis on repeat queries', () => {
    const reasoning = new ReasoningEngine(state);
    const reflection = new ReflectionEngine(reasoning, state);
    reflection.reflect('Socrates is mortal');
    reflection.reflect('Socrates is mortal');

    // Two meta-query runs per cycle (depths 1 and 2); the second cycle hits both
    expect(reasoning.getStats().cacheHits).toBe(2);
  });
});

describe('hashCycle', () => {
  it('hashes id, level value, level count and improvement count', () => {
    expect(hashCycle('r3_1_abc', 'transcendent', 2)).toBe(sha256('r3_1_abc|4|4|2'));
  });
});
