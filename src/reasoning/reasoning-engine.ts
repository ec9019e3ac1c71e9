/**
 * ReasoningEngine: component extraction, base reasoning against the concept
 * graph, then bounded recursive refinement of whatever stayed unresolved.
 *
 * Results are memoized in the shared EngineState cache under the full
 * (normalized query, canonical context, depth) triple. Every caller gets the
 * same frozen object.
 */

import { EventEmitter } from 'node:events';
import { LexicalComponentExtractor, RELATION_WORDS, tokenize } from './component-extractor.js';
import { ConceptGraph } from './concept-graph.js';
import type {
  BaseReasoning,
  ComponentExtractor,
  Contradiction,
  DirectInference,
  ExtractedComponents,
  ReasoningContext,
  ReasoningEngineConfig,
  ReasoningEngineStats,
  ReasoningPattern,
  ReasoningResult,
  RefinementEntry,
  RefinementNode,
  RefinementPass,
} from './types.js';
import type { EngineState } from '../core/state.js';
import { canonicalJson, contentHash, sha256 } from '../utils/crypto.js';
import { clamp } from '../utils/stats.js';
import { deepFreeze } from '../utils/freeze.js';
import { elapsedSince } from '../utils/timer.js';
import { getLogger } from '../core/logger.js';

export const MAX_REASONING_EMERGENCE = 5.0;
export const DEFAULT_DEPTH = 3;

const DEFAULT_CONFIG: ReasoningEngineConfig = {
  maxDepth: 10,
  maxImplications: 5,
};

const CONTRADICTION_PHRASES = [
  'not and', 'and not', 'but not', 'however not',
  'false true', 'true false', 'yes no', 'no yes',
];

export interface ReasoningEngineOptions {
  config?: Partial<ReasoningEngineConfig>;
  extractor?: ComponentExtractor;
  graph?: ConceptGraph;
}

/** Trim and collapse internal whitespace; case is preserved. */
export function normalizeQuery(query: string): string {
  return query.trim().replace(/\s+/g, ' ');
}

export function cacheKey(query: string, context: ReasoningContext, depth: number): string {
  return canonicalJson([normalizeQuery(query), context, depth]);
}

/**
 * Certainty of a reasoning result, floored at 0.1.
 */
export function reasoningCertainty(
  base: Pick<BaseReasoning, 'unknowns' | 'contradictions' | 'patterns'>,
  refinements: number,
): number {
  const score =
    0.7 -
    0.1 * base.unknowns.length -
    0.2 * base.contradictions.length +
    Math.min(0.3, 0.05 * refinements) +
    0.05 * base.patterns.length;
  return clamp(score, 0.1, 1.0);
}

export function reasoningEmergence(uniqueInsights: number, depth: number, complexity: number): number {
  if (uniqueInsights === 0) return 0;
  const raw = Math.log2(1 + uniqueInsights) * (1 + 0.1 * depth) * Math.sqrt(complexity);
  return Math.min(MAX_REASONING_EMERGENCE, raw);
}

/** Walk a refinement chain, passes only. */
export function refinementPasses(node: RefinementNode | null): RefinementPass[] {
  const passes: RefinementPass[] = [];
  let current = node;
  while (current && current.status === 'refined') {
    passes.push(current);
    current = current.next;
  }
  return passes;
}

/** True when the refinement chain ends in the depth sentinel. */
export function reachedMaxDepth(node: RefinementNode | null): boolean {
  let current = node;
  while (current) {
    if (current.status === 'max_depth_reached') return true;
    current = current.next;
  }
  return false;
}

export class ReasoningEngine extends EventEmitter {
  private readonly config: ReasoningEngineConfig;
  private readonly extractor: ComponentExtractor;
  private readonly graph: ConceptGraph;
  private logger = getLogger();

  private queriesProcessed = 0;
  private cacheLookups = 0;
  private cacheHits = 0;
  private depthSum = 0;
  private certaintySum = 0;
  private totalTimeMs = 0;

  constructor(
    private readonly state: EngineState,
    options: ReasoningEngineOptions = {},
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.extractor = options.extractor ?? new LexicalComponentExtractor();
    this.graph = options.graph ?? ConceptGraph.withLogicalOperators();
  }

  /**
   * Reason about a query. Repeated calls with the same normalized query,
   * context and (clamped) depth return the cached result.
   */
  reasonAbout(
    query: string,
    context: ReasoningContext = {},
    depth: number = DEFAULT_DEPTH,
  ): ReasoningResult {
    const started = performance.now();
    const effectiveDepth = this.clampDepth(depth);
    const normalized = normalizeQuery(query);
    const key = cacheKey(normalized, context, effectiveDepth);

    this.cacheLookups++;
    const cached = this.state.cache.get(key);
    if (cached) {
      this.cacheHits++;
      this.emit('reasoning:completed', { hash: cached.hash, cached: true });
      return cached;
    }

    const components = this.extractor.extract(normalized);
    const base = this.reasonBase(normalized, components);

    let refinement: RefinementNode | null = null;
    if (base.needsRefinement && effectiveDepth > 1) {
      const frontier = base.directInferences.map(inf => inf.entity);
      const visited = new Set([...frontier, ...base.unknowns]);
      refinement = this.refine(base.unknowns, base.contradictions, frontier, effectiveDepth - 1, 1, visited);
    }

    const entries = refinementPasses(refinement).flatMap(pass => pass.refinements);
    const novelInsights = this.distinctContents(entries);
    const certainty = reasoningCertainty(base, entries.length);
    const emergence = reasoningEmergence(
      novelInsights.length,
      effectiveDepth,
      base.patterns.length + base.directInferences.length,
    );

    const body = {
      query: normalized,
      context,
      components,
      base,
      refinement,
      depth: effectiveDepth,
      certainty,
      emergence,
      novelInsights,
    };
    // Cached and shared across callers: detach from caller-owned objects, then freeze.
    const result: ReasoningResult = deepFreeze(structuredClone({
      ...body,
      hash: contentHash(body),
      timestamp: Date.now(),
    }));

    this.state.cache.set(key, result);

    const elapsed = elapsedSince(started);
    this.queriesProcessed++;
    this.depthSum += effectiveDepth;
    this.certaintySum += certainty;
    this.totalTimeMs += elapsed;

    this.logger.debug(
      { hash: result.hash, depth: effectiveDepth, certainty, emergence, refinements: entries.length },
      'ReasoningEngine: query reasoned',
    );
    this.emit('reasoning:completed', { hash: result.hash, cached: false });

    return result;
  }

  addConcept(name: string): void {
    this.graph.addConcept(name);
    this.state.cache.clear();
  }

  addRelation(source: string, target: string): void {
    this.graph.addRelation(source, target);
    this.state.cache.clear();
  }

  hasConcept(name: string): boolean {
    return this.graph.has(name);
  }

  getGraph(): ConceptGraph {
    return this.graph;
  }

  getStats(): ReasoningEngineStats {
    const n = this.queriesProcessed;
    return {
      queriesProcessed: n,
      cacheLookups: this.cacheLookups,
      cacheHits: this.cacheHits,
      cacheHitRate: this.cacheLookups > 0 ? this.cacheHits / this.cacheLookups : 0,
      cacheSize: this.state.cache.size,
      avgDepth: n > 0 ? this.depthSum / n : 0,
      avgCertainty: n > 0 ? this.certaintySum / n : 0,
      avgResponseTimeMs: n > 0 ? this.totalTimeMs / n : 0,
      conceptCount: this.graph.size,
      extractor: this.extractor.name,
    };
  }

  private clampDepth(depth: number): number {
    if (!Number.isFinite(depth)) return DEFAULT_DEPTH;
    return Math.max(1, Math.min(this.config.maxDepth, Math.floor(depth)));
  }

  private reasonBase(query: string, components: ExtractedComponents): BaseReasoning {
    const directInferences: DirectInference[] = [];
    const unknowns: string[] = [];
    const contradictions: Contradiction[] = [];

    for (const entity of components.entities) {
      if (this.graph.has(entity)) {
        directInferences.push({
          type: 'entity_known',
          entity,
          relations: this.graph.neighbors(entity),
        });
      } else {
        unknowns.push(entity);
      }
    }

    for (const relation of components.relations) {
      if (!RELATION_WORDS.has(relation)) {
        contradictions.push({ source: 'relation', detail: `invalid relation: ${relation}` });
      }
    }

    const joined = [
      ...components.entities,
      ...components.relations,
      ...components.quantifiers,
      ...components.modalities,
      ...components.actions,
    ].join(' ').toLowerCase();
    const padded = ` ${joined} `;
    const phrase = CONTRADICTION_PHRASES.find(p => padded.includes(` ${p} `));
    if (phrase) {
      contradictions.push({ source: 'lexical', detail: `contradictory phrase: ${phrase}` });
    }

    const patterns = this.findPatterns(query, components);

    return {
      directInferences,
      contradictions,
      unknowns,
      patterns,
      needsRefinement: unknowns.length > 0 || contradictions.length > 0 || patterns.length === 0,
    };
  }

  private findPatterns(query: string, components: ExtractedComponents): ReasoningPattern[] {
    const patterns: ReasoningPattern[] = [];
    const words = new Set(tokenize(query).map(t => t.toLowerCase()));

    if (words.has('if') && words.has('then')) {
      patterns.push({ type: 'implication', certainty: 0.8, description: 'if/then conditional' });
    }
    if (components.quantifiers.length > 0) {
      patterns.push({
        type: 'quantified',
        certainty: 0.7,
        description: `quantified by ${components.quantifiers.join(', ')}`,
      });
    }
    if (components.actions.length > 0) {
      patterns.push({
        type: 'action',
        certainty: 0.6,
        description: `action-oriented: ${components.actions.join(', ')}`,
      });
    }

    return patterns;
  }

  /**
   * One refinement pass, recursing while the pass uncovers new unknowns and
   * budget remains. `budget` counts this pass.
   */
  private refine(
    unknowns: readonly string[],
    contradictions: readonly Contradiction[],
    frontier: readonly string[],
    budget: number,
    level: number,
    visited: Set<string>,
  ): RefinementPass {
    const refinements: RefinementEntry[] = [];
    const sources = [...frontier];

    for (const unknown of unknowns) {
      const match = this.graph.findCaseInsensitive(unknown);
      if (match) {
        refinements.push({
          kind: 'hypothesis',
          subject: unknown,
          content: `${unknown} likely refers to known concept ${match}`,
          certainty: 0.7,
        });
        if (!sources.includes(match)) sources.push(match);
      } else {
        refinements.push({
          kind: 'hypothesis',
          subject: unknown,
          content: `${unknown} is hypothesized as an unseen concept`,
          certainty: 0.5,
        });
      }
    }

    for (const contradiction of contradictions) {
      refinements.push({
        kind: 'resolution',
        subject: contradiction.detail,
        content: `Resolve "${contradiction.detail}" by separating the conflicting contexts`,
        certainty: 0.6,
      });
    }

    const nextUnknowns: string[] = [];
    const nextFrontier: string[] = [];
    let explored = 0;

    for (const source of sources) {
      for (const target of this.graph.neighbors(source)) {
        if (explored >= this.config.maxImplications) break;
        explored++;
        refinements.push({
          kind: 'implication',
          subject: source,
          content: `${source} implies ${target}`,
          certainty: 0.6,
        });
        if (visited.has(target)) continue;
        visited.add(target);
        if (this.graph.has(target)) {
          nextFrontier.push(target);
        } else {
          nextUnknowns.push(target);
        }
      }
    }

    let next: RefinementNode | null = null;
    if (nextUnknowns.length > 0) {
      next = budget > 1
        ? this.refine(nextUnknowns, [], nextFrontier, budget - 1, level + 1, visited)
        : { status: 'max_depth_reached', level: level + 1 };
    }

    return { status: 'refined', level, budget, refinements, unknowns: nextUnknowns, next };
  }

  private distinctContents(entries: readonly RefinementEntry[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const entry of entries) {
      const digest = sha256(entry.content);
      if (seen.has(digest)) continue;
      seen.add(digest);
      out.push(entry.content);
    }
    return out;
  }
}
