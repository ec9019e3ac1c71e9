/**
 * Self-improvement actions. Proposals are plain data; each kind has exactly
 * one handler in IMPROVEMENT_HANDLERS.
 */

import type { EngineState } from '../core/state.js';
import type { JsonObject } from '../core/types.js';
import { ImprovementError } from '../core/errors.js';

export const MAX_REASONING_DEPTH = 10;

export type ImprovementProposal =
  | { kind: 'increase_reasoning_depth'; from: number; to: number; impact: number }
  | { kind: 'improve_certainty'; current: number; target: number; impact: number }
  | { kind: 'optimize_patterns'; patterns: string[]; impact: number };

export type ImprovementKind = ImprovementProposal['kind'];

export interface ImprovementResult {
  summary: string;
  changes: JsonObject;
}

export interface ImprovementLogEntry {
  cycleId: string;
  kind: ImprovementKind;
  result?: ImprovementResult;
  error?: string;
  timestamp: number;
}

export type ImprovementHandler<K extends ImprovementKind> = (
  proposal: Extract<ImprovementProposal, { kind: K }>,
  state: EngineState,
) => ImprovementResult;

export type ImprovementHandlerTable = {
  [K in ImprovementKind]: ImprovementHandler<K>;
};

export const IMPROVEMENT_HANDLERS: ImprovementHandlerTable = {
  increase_reasoning_depth(proposal, state) {
    if (!Number.isInteger(proposal.to) || proposal.to < 1 || proposal.to > MAX_REASONING_DEPTH) {
      throw new ImprovementError(`Reasoning depth out of range: ${proposal.to}`, proposal.kind);
    }
    state.updateBaselines({ reasoningDepth: proposal.to });
    return {
      summary: `Reasoning depth ${proposal.from} -> ${proposal.to}`,
      changes: { reasoningDepth: proposal.to },
    };
  },

  improve_certainty(proposal) {
    const gap = Math.max(0, proposal.target - proposal.current);
    // Each extra refinement is worth 0.05 certainty in the reasoning score.
    const refinementsNeeded = Math.ceil(gap / 0.05 - 1e-9);
    return {
      summary: `Certainty gap ${gap.toFixed(2)} needs ~${refinementsNeeded} refinements`,
      changes: { current: proposal.current, target: proposal.target, gap, refinementsNeeded },
    };
  },

  optimize_patterns(proposal, state) {
    const known = new Set(state.baselines.optimizedPatterns);
    const added = proposal.patterns.filter(p => !known.has(p));
    state.updateBaselines({ optimizedPatterns: [...known, ...added] });
    return {
      summary: `Optimized ${added.length} pattern(s)`,
      changes: { optimizedPatterns: added },
    };
  },
};

/** Dispatch a proposal to its handler. Throws whatever the handler throws. */
export function runImprovement(
  proposal: ImprovementProposal,
  state: EngineState,
  handlers: ImprovementHandlerTable = IMPROVEMENT_HANDLERS,
): ImprovementResult {
  switch (proposal.kind) {
    case 'increase_reasoning_depth':
      return handlers.increase_reasoning_depth(proposal, state);
    case 'improve_certainty':
      return handlers.improve_certainty(proposal, state);
    case 'optimize_patterns':
      return handlers.optimize_patterns(proposal, state);
  }
}
