/**
 * R3 Reflection: Type Definitions
 */

import type { ReasoningContext } from '../reasoning/types.js';
import type { ImprovementLogEntry, ImprovementProposal } from './improvements.js';

/** The four reflection levels, in execution order. */
export const REFLECTION_LEVELS = ['reflexive', 'recursive', 'regenerative', 'transcendent'] as const;

export type ReflectionLevel = (typeof REFLECTION_LEVELS)[number];

/** 1-based position of a level in the pipeline. */
export function levelValue(level: ReflectionLevel): number {
  return REFLECTION_LEVELS.indexOf(level) + 1;
}

export const META_PREFIX = "Analyze what I'm doing: ";

/** Condensed view of the reasoning run a level was built on. */
export interface AnalysisSummary {
  hash: string;
  certainty: number;
  emergence: number;
  depth: number;
  patternTypes: string[];
  unknowns: number;
  contradictions: number;
  refinements: number;
  maxDepthReached: boolean;
}

export interface ReflexiveLevel {
  level: 'reflexive';
  analysis: AnalysisSummary;
  insights: string[];
  certainty: number;
}

export interface RecursiveLevel {
  level: 'recursive';
  patternTypes: string[];
  inefficientPatterns: string[];
  recursiveStructures: string[];
  recursionDepth: number;
  fixedPoints: string[];
  insights: string[];
  certainty: number;
}

export interface RegenerativeLevel {
  level: 'regenerative';
  proposals: ImprovementProposal[];
  potentialGain: number;
  insights: string[];
  certainty: number;
}

export interface Framework {
  name: string;
  basis: string[];
  averageEmergence: number;
}

export interface TranscendentLevel {
  level: 'transcendent';
  averageEmergence: number;
  breakthrough: boolean;
  framework: Framework | null;
  insights: string[];
  certainty: number;
}

export interface ReflectionLevels {
  reflexive: ReflexiveLevel;
  recursive: RecursiveLevel;
  regenerative: RegenerativeLevel;
  transcendent: TranscendentLevel;
}

export interface ReflectionCycle {
  id: string;
  index: number;
  query: string;
  context: ReasoningContext;
  levelReached: ReflectionLevel;
  levels: ReflectionLevels;
  improvements: ImprovementProposal[];
  emergence: number;
  lambdaBefore: number;
  lambdaImpact: number;
  lambdaAfter: number;
  /** Milliseconds spent in each level. */
  levelTimings: Partial<Record<ReflectionLevel, number>>;
  durationMs: number;
  hash: string;
  timestamp: number;
}

export interface ReflectionMetrics {
  lambdaTotal: number;
  lambdaGrowth: number;
  emergence: number;
  improvementsApplied: number;
  improvementsFailed: number;
  cyclesCompleted: number;
}

export interface ReflectionOutcome {
  cycle: ReflectionCycle;
  improvements: ImprovementLogEntry[];
  metrics: ReflectionMetrics;
}
