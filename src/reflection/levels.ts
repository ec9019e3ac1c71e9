/**
 * The four reflection levels as functions of their inputs. Only the reflexive
 * and recursive levels touch the reasoning engine (and through it, the cache);
 * the rest are pure.
 */

import type { ReasoningEngine } from '../reasoning/reasoning-engine.js';
import { reachedMaxDepth, refinementPasses } from '../reasoning/reasoning-engine.js';
import type { ReasoningContext, ReasoningResult } from '../reasoning/types.js';
import type { EngineBaselines, EngineState } from '../core/state.js';
import type { ImprovementProposal } from './improvements.js';
import { MAX_REASONING_DEPTH } from './improvements.js';
import {
  META_PREFIX,
  type AnalysisSummary,
  type RecursiveLevel,
  type ReflectionLevels,
  type ReflexiveLevel,
  type RegenerativeLevel,
  type TranscendentLevel,
} from './types.js';
import { canonicalJson, sha256, shortHash } from '../utils/crypto.js';
import { clamp, mean } from '../utils/stats.js';

export const SELF_ANALYSIS_CONTEXT: ReasoningContext = { analysisType: 'self_analysis' };

export const SELF_REFERENCE_MARKERS = [
  'itself', 'myself', 'yourself', 'this statement', 'self-referential', 'recursive',
];

const NOVELTY = /new|create/i;

export function summarize(result: ReasoningResult): AnalysisSummary {
  return {
    hash: result.hash,
    certainty: result.certainty,
    emergence: result.emergence,
    depth: result.depth,
    patternTypes: result.base.patterns.map(p => p.type),
    unknowns: result.base.unknowns.length,
    contradictions: result.base.contradictions.length,
    refinements: refinementPasses(result.refinement).reduce((n, p) => n + p.refinements.length, 0),
    maxDepthReached: reachedMaxDepth(result.refinement),
  };
}

export function metaQuery(query: string): string {
  return `${META_PREFIX}${query}`;
}

export function reflexiveLevel(
  reasoning: ReasoningEngine,
  state: EngineState,
  query: string,
  context: ReasoningContext,
): ReflexiveLevel {
  const analysis = summarize(reasoning.reasonAbout(metaQuery(query), SELF_ANALYSIS_CONTEXT, 1));
  return {
    level: 'reflexive',
    analysis,
    insights: [
      `Processing query: ${query}`,
      `Context: ${canonicalJson(context)}`,
      `Current state: Λ=${state.lambdaTotal.toFixed(3)}, cycles=${state.cycles.length}`,
    ],
    certainty: analysis.certainty,
  };
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export function recursiveLevel(
  reasoning: ReasoningEngine,
  baselines: Readonly<EngineBaselines>,
  query: string,
  reflexive: ReflexiveLevel,
): RecursiveLevel {
  const probe = summarize(reasoning.reasonAbout(metaQuery(query), SELF_ANALYSIS_CONTEXT, 2));
  const { analysis } = reflexive;

  const patternTypes = analysis.patternTypes;
  const fixedPoints = patternTypes.filter(t => probe.patternTypes.includes(t));

  const flagged: string[] = [];
  if (analysis.unknowns > 0) flagged.push('unresolved_unknowns');
  if (analysis.contradictions > 0) flagged.push('unresolved_contradictions');
  if (patternTypes.length === 0) flagged.push('patternless_query');
  if (probe.maxDepthReached) flagged.push('refinement_truncated');
  const optimized = new Set(baselines.optimizedPatterns);
  const inefficientPatterns = flagged.filter(p => !optimized.has(p));

  const lower = query.toLowerCase();
  const nested = countOccurrences(lower, META_PREFIX.trim().toLowerCase());
  const recursiveStructures = [
    ...Array.from({ length: nested }, () => 'meta_prefix'),
    ...SELF_REFERENCE_MARKERS.filter(m => lower.includes(m)).map(m => `self_reference:${m}`),
  ];
  const recursionDepth = 1 + nested;

  const certainty = clamp(
    reflexive.certainty + 0.05 * fixedPoints.length - 0.05 * inefficientPatterns.length,
    0,
    1,
  );

  return {
    level: 'recursive',
    patternTypes,
    inefficientPatterns,
    recursiveStructures,
    recursionDepth,
    fixedPoints,
    insights: [
      `Thinking patterns: ${patternTypes.length > 0 ? patternTypes.join(', ') : 'none'}`,
      `Recursive depth: ${recursionDepth}`,
      `Fixed points found: ${fixedPoints.length}`,
    ],
    certainty,
  };
}

export function regenerativeLevel(
  recursive: RecursiveLevel,
  baselines: Readonly<EngineBaselines>,
): RegenerativeLevel {
  const proposals: ImprovementProposal[] = [
    {
      kind: 'increase_reasoning_depth',
      from: baselines.reasoningDepth,
      to: Math.min(MAX_REASONING_DEPTH, baselines.reasoningDepth + 1),
      impact: 0.15,
    },
  ];

  if (recursive.certainty < baselines.certaintyThreshold) {
    proposals.push({
      kind: 'improve_certainty',
      current: recursive.certainty,
      target: baselines.certaintyThreshold,
      impact: 0.1,
    });
  }

  if (recursive.inefficientPatterns.length > 0) {
    proposals.push({
      kind: 'optimize_patterns',
      patterns: [...recursive.inefficientPatterns],
      impact: 0.2,
    });
  }

  return {
    level: 'regenerative',
    proposals,
    potentialGain: proposals.reduce((sum, p) => sum + p.impact, 0),
    insights: [],
    certainty: 0.7,
  };
}

/**
 * Average emergence over the trailing window; 0 until the window is full.
 */
export function transcendentLevel(
  regenerative: RegenerativeLevel,
  emergenceHistory: readonly number[],
  baselines: Readonly<EngineBaselines>,
  window: number,
): TranscendentLevel {
  const averageEmergence =
    emergenceHistory.length >= window ? mean(emergenceHistory.slice(-window)) : 0;
  const target = baselines.emergenceTarget;

  if (averageEmergence >= target) {
    const basis = regenerative.proposals.map(p => p.kind);
    const name = `framework_${shortHash(canonicalJson({ basis, averageEmergence }))}`;
    return {
      level: 'transcendent',
      averageEmergence,
      breakthrough: true,
      framework: { name, basis, averageEmergence },
      insights: [
        `New framework created: ${name}`,
        `Emergence threshold met: ${averageEmergence.toFixed(2)} >= ${target}`,
        'Transcendent capability achieved',
      ],
      certainty: 0.8,
    };
  }

  return {
    level: 'transcendent',
    averageEmergence,
    breakthrough: false,
    framework: null,
    insights: [
      `Emergence insufficient: ${averageEmergence.toFixed(2)} < ${target}`,
      'Continue recursive refinement',
    ],
    certainty: 0.5,
  };
}

/**
 * Cycle emergence: distinct novelty insights, weighted by how many levels
 * were confident and by the total insight volume. Uncapped.
 */
export function cycleEmergence(levels: ReflectionLevels): number {
  const all = [levels.reflexive, levels.recursive, levels.regenerative, levels.transcendent];
  const insights = all.flatMap(l => l.insights);
  const unique = new Set(insights.filter(i => NOVELTY.test(i)).map(sha256)).size;
  if (unique === 0) return 0;

  const depthFactor = all.filter(l => l.certainty > 0.7).length;
  return Math.log2(1 + unique) * depthFactor * Math.sqrt(insights.length);
}

export function lambdaImpact(emergence: number, cyclesCompleted: number, baseGrowth: number): number {
  const multiplier = emergence >= 2 ? 1.5 : emergence >= 1 ? 1.2 : 0.8;
  return baseGrowth * multiplier * (1 + 0.05 * cyclesCompleted);
}
