import { describe, it, expect, beforeEach } from 'vitest';
import { IMPROVEMENT_HANDLERS, runImprovement } from '../../../src/reflection/improvements.js';
import { EngineState } from '../../../src/core/state.js';
import { ImprovementError } from '../../../src/core/errors.js';

describe('IMPROVEMENT_HANDLERS', () => {
  let state: EngineState;

  beforeEach(() => {
    state = new EngineState();
  });

  it('raises the baseline reasoning depth', () => {
    const result = runImprovement({ kind: 'increase_reasoning_depth', from: 2, to: 3, impact: 0.15 }, state);
    expect(result).toEqual({ summary: 'Reasoning depth 2 -> 3', changes: { reasoningDepth: 3 } });
    expect(state.baselines.reasoningDepth).toBe(3);
  });

  it('rejects a depth outside 1..10', () => {
    expect(() =>
      runImprovement({ kind: 'increase_reasoning_depth', from: 10, to: 11, impact: 0.15 }, state),
    ).toThrow(ImprovementError);
    expect(state.baselines.reasoningDepth).toBe(2);
  });

  it('sizes the certainty gap in refinements', () => {
    const result = IMPROVEMENT_HANDLERS.improve_certainty(
      { kind: 'improve_certainty', current: 0.5, target: 0.7, impact: 0.1 },
      state,
    );
    expect(result.summary).toBe('Certainty gap 0.20 needs ~4 refinements');
    expect(result.changes.refinementsNeeded).toBe(4);
  });

  it('adds optimized patterns without duplicates', () => {
    state.updateBaselines({ optimizedPatterns: ['unresolved_unknowns'] });
    const result = runImprovement(
      { kind: 'optimize_patterns', patterns: ['unresolved_unknowns', 'patternless_query'], impact: 0.2 },
      state,
    );
    expect(result.changes).toEqual({ optimizedPatterns: ['patternless_query'] });
    expect(state.baselines.optimizedPatterns).toEqual(['unresolved_unknowns', 'patternless_query']);
  });

  it('dispatches through an overridden table', () => {
    const table = {
      ...IMPROVEMENT_HANDLERS,
      improve_certainty: () => ({ summary: 'custom', changes: {} }),
    };
    const result = runImprovement({ kind: 'improve_certainty', current: 0.1, target: 0.7, impact: 0.1 }, state, table);
    expect(result.summary).toBe('custom');
  });
});
