/**
 * Recursive Reasoning: Type Definitions
 *
 * Everything here is plain data: results are JSON-compatible and frozen
 * before they are cached or returned.
 */

export interface ExtractedComponents {
  readonly entities: readonly string[];
  readonly relations: readonly string[];
  readonly quantifiers: readonly string[];
  readonly modalities: readonly string[];
  readonly actions: readonly string[];
}

/**
 * Turns a query into structural components. The lexical implementation is a
 * placeholder; anything honouring this contract can replace it.
 */
export interface ComponentExtractor {
  readonly name: string;
  extract(query: string): ExtractedComponents;
}

export interface DirectInference {
  readonly type: 'entity_known';
  readonly entity: string;
  readonly relations: readonly string[];
}

export type PatternType = 'implication' | 'quantified' | 'action';

export interface ReasoningPattern {
  readonly type: PatternType;
  readonly certainty: number;
  readonly description: string;
}

export interface Contradiction {
  readonly source: 'relation' | 'lexical';
  readonly detail: string;
}

export interface BaseReasoning {
  readonly directInferences: readonly DirectInference[];
  readonly contradictions: readonly Contradiction[];
  readonly unknowns: readonly string[];
  readonly patterns: readonly ReasoningPattern[];
  readonly needsRefinement: boolean;
}

export type RefinementKind = 'hypothesis' | 'resolution' | 'implication';

export interface RefinementEntry {
  readonly kind: RefinementKind;
  readonly subject: string;
  readonly content: string;
  readonly certainty: number;
}

export interface RefinementPass {
  readonly status: 'refined';
  /** 1-based index of this pass. */
  readonly level: number;
  /** Passes still available when this pass ran, itself included. */
  readonly budget: number;
  readonly refinements: readonly RefinementEntry[];
  /** Unknowns uncovered by this pass, handed to the next one. */
  readonly unknowns: readonly string[];
  readonly next: RefinementNode | null;
}

/** Returned in place of a further pass once the depth budget is spent. */
export interface MaxDepthReached {
  readonly status: 'max_depth_reached';
  readonly level: number;
}

export type RefinementNode = RefinementPass | MaxDepthReached;

export interface ReasoningContext {
  readonly [key: string]: unknown;
}

export interface ReasoningResult {
  readonly query: string;
  readonly context: ReasoningContext;
  readonly components: ExtractedComponents;
  readonly base: BaseReasoning;
  readonly refinement: RefinementNode | null;
  readonly depth: number;
  readonly certainty: number;
  readonly emergence: number;
  readonly novelInsights: readonly string[];
  readonly hash: string;
  readonly timestamp: number;
}

export interface ReasoningEngineConfig {
  maxDepth: number;
  /** Upper bound on implications explored per refinement pass. */
  maxImplications: number;
}

export interface ReasoningEngineStats {
  queriesProcessed: number;
  cacheLookups: number;
  cacheHits: number;
  cacheHitRate: number;
  cacheSize: number;
  avgDepth: number;
  avgCertainty: number;
  avgResponseTimeMs: number;
  conceptCount: number;
  extractor: string;
}
