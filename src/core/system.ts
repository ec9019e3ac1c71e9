/**
 * IntelligenceSystem: the public façade over grounding, reasoning and
 * reflection.
 *
 * Every state-mutating call (reflect, process, concept edits) is serialized
 * through one AsyncMutex. Records are persisted after the lock is released.
 */

import { nanoid } from 'nanoid';
import { AxiomGrounder } from '../grounding/axiom-grounder.js';
import type { GroundedStatement, GroundingContext, GroundingMetrics } from '../grounding/types.js';
import { ReasoningEngine } from '../reasoning/reasoning-engine.js';
import type { ConceptGraph } from '../reasoning/concept-graph.js';
import type {
  ComponentExtractor,
  ReasoningContext,
  ReasoningEngineStats,
  ReasoningResult,
} from '../reasoning/types.js';
import { ReflectionEngine } from '../reflection/reflection-engine.js';
import type { ImprovementHandlerTable, ImprovementLogEntry } from '../reflection/improvements.js';
import type { ReflectionCycle, ReflectionOutcome } from '../reflection/types.js';
import { ConvergenceDetector } from '../evolution/convergence-detector.js';
import type { ConvergenceReport } from '../evolution/types.js';
import { InMemoryRecordStore } from '../store/memory-store.js';
import { toJsonValue, type RecordKind, type RecordStore, type StoredRecord } from '../store/types.js';
import { EngineState } from './state.js';
import { EventBus, type LambdaEvents } from './events.js';
import { AsyncMutex, type LockStats } from './mutex.js';
import { defaultConfig, type LambdaConfig } from './types.js';
import { toError } from './errors.js';
import { getLogger } from './logger.js';
import { contentHash } from '../utils/crypto.js';
import { mean } from '../utils/stats.js';

export const HARM_TERMS = ['harm', 'hurt', 'kill', 'steal'];
export const MAX_STORED_PATHS = 1000;
/** Grounding scores kept for the recent-grounding requirement. */
export const RECENT_GROUNDING_WINDOW = 10;

export interface SafetyReport {
  proofVerified: boolean;
  noContradictions: boolean;
  noHarm: boolean;
  withinLimits: boolean;
  safe: boolean;
}

export interface ReasoningPath {
  id: string;
  sessionId: string;
  query: string;
  grounded: GroundedStatement;
  reasoning: ReasoningResult;
  cycle: ReflectionCycle;
  groundingCertainty: number;
  emergence: number;
  lambdaImpact: number;
  reasoningDepth: number;
  safety: SafetyReport;
  convergence: ConvergenceReport;
  timestamp: number;
  hash: string;
}

export interface SystemMetrics {
  avgCertainty: number;
  avgEmergence: number;
  cacheHitRate: number;
  lambdaTotal: number;
  convergence: ConvergenceReport;
  cyclesCompleted: number;
  pathsProcessed: number;
  grounding: GroundingMetrics;
  reasoning: ReasoningEngineStats;
  lock: LockStats;
}

export interface ProcessResult {
  path: ReasoningPath;
  improvements: ImprovementLogEntry[];
  metrics: SystemMetrics;
}

export interface RequirementReport {
  requirements: Record<string, boolean>;
  allMet: boolean;
  score: number;
}

export interface IntelligenceSystemOptions {
  config?: LambdaConfig;
  store?: RecordStore;
  extractor?: ComponentExtractor;
  graph?: ConceptGraph;
  handlers?: Partial<ImprovementHandlerTable>;
}

/**
 * Depth grows with query length (up to +5) and with the share of
 * question-like words (up to +3).
 */
export function optimalDepth(query: string, baseDepth: number, maxDepth: number): number {
  const words = query.split(/\s+/).filter(w => w.length > 0);
  if (words.length === 0) return Math.min(maxDepth, baseDepth);

  const lengthBonus = Math.min(5, Math.floor((words.length / 10) * 3));
  const questions = words.filter(w => w.endsWith('?')).length;
  const questionBonus = Math.min(3, Math.floor((questions / words.length) * 5));
  return Math.min(maxDepth, baseDepth + lengthBonus + questionBonus);
}

export function checkSafety(
  query: string,
  grounded: GroundedStatement,
  reasoning: ReasoningResult,
  pathsSoFar: number,
): SafetyReport {
  const lower = query.toLowerCase();
  const report = {
    proofVerified: grounded.verified,
    noContradictions: reasoning.base.contradictions.length === 0,
    noHarm: !HARM_TERMS.some(term => lower.includes(term)),
    withinLimits: pathsSoFar < MAX_STORED_PATHS,
  };
  return { ...report, safe: Object.values(report).every(Boolean) };
}

export class IntelligenceSystem {
  readonly sessionId = `session_${nanoid()}`;
  readonly config: LambdaConfig;
  readonly state: EngineState;
  readonly events = new EventBus();
  readonly grounder: AxiomGrounder;
  readonly reasoning: ReasoningEngine;
  readonly reflection: ReflectionEngine;
  readonly convergence: ConvergenceDetector;

  private readonly store: RecordStore;
  private readonly mutex = new AsyncMutex();
  private logger = getLogger();

  private groundingCount = 0;
  private groundingSum = 0;
  private recentGroundingScores: number[] = [];
  private recentPaths: ReasoningPath[] = [];
  private pathCount = 0;
  private storedPaths = 0;

  constructor(options: IntelligenceSystemOptions = {}) {
    this.config = options.config ?? defaultConfig();
    const { engine, reflection, convergence } = this.config;

    this.state = new EngineState({
      initialLambda: engine.initialLambda,
      cacheMaxSize: engine.cacheMaxSize,
      baselines: {
        reasoningDepth: reflection.reasoningDepth,
        certaintyThreshold: reflection.certaintyThreshold,
        emergenceTarget: reflection.emergenceTarget,
        lambdaGrowthTarget: reflection.lambdaGrowthTarget,
      },
    });
    this.store = options.store ?? new InMemoryRecordStore();

    this.grounder = new AxiomGrounder();
    this.reasoning = new ReasoningEngine(this.state, {
      config: { maxDepth: engine.maxDepth },
      extractor: options.extractor,
      graph: options.graph,
    });
    this.reflection = new ReflectionEngine(this.reasoning, this.state, {
      emergenceWindow: reflection.emergenceWindow,
      handlers: options.handlers,
    });
    this.convergence = new ConvergenceDetector({
      window: convergence.window,
      minSamples: convergence.minSamples,
      avgChangeThreshold: convergence.avgChangeThreshold,
      stdChangeThreshold: convergence.stdChangeThreshold,
    });

    this.forwardEvents();
  }

  ground(statement: string, context: GroundingContext = {}): GroundedStatement {
    const grounded = this.grounder.ground(statement, context);
    this.groundingCount++;
    this.groundingSum += grounded.certainty;
    this.recentGroundingScores.push(grounded.certainty);
    if (this.recentGroundingScores.length > RECENT_GROUNDING_WINDOW) {
      this.recentGroundingScores.shift();
    }
    return grounded;
  }

  reasonAbout(query: string, context: ReasoningContext = {}, depth?: number): ReasoningResult {
    return this.reasoning.reasonAbout(query, context, depth);
  }

  async reflect(query: string, context: ReasoningContext = {}): Promise<ReflectionOutcome> {
    const outcome = await this.mutex.withLock(() => this.reflection.reflect(query, context));
    await this.persist(outcome.cycle.id, 'cycle', outcome.cycle);
    return outcome;
  }

  /**
   * Full pipeline: ground, reason at a depth suited to the query, reflect,
   * then check safety and record the path.
   */
  async process(query: string): Promise<ProcessResult> {
    const { path, improvements } = await this.mutex.withLock(() => this.runPipeline(query));

    if (await this.persist(path.id, 'path', path)) {
      this.storedPaths++;
      this.events.emit('path:stored', { id: path.id, sessionId: path.sessionId, safe: path.safety.safe });
    }

    return { path, improvements, metrics: this.getMetrics() };
  }

  async addConcept(name: string): Promise<void> {
    await this.mutex.withLock(() => this.reasoning.addConcept(name));
  }

  async addRelation(source: string, target: string): Promise<void> {
    await this.mutex.withLock(() => this.reasoning.addRelation(source, target));
  }

  getConvergence(): ConvergenceReport {
    return this.convergence.detect(this.state.lambdaHistory);
  }

  getMetrics(): SystemMetrics {
    const reasoning = this.reasoning.getStats();
    return {
      avgCertainty: reasoning.avgCertainty,
      avgEmergence: mean(this.state.emergenceHistory),
      cacheHitRate: reasoning.cacheHitRate,
      lambdaTotal: this.state.lambdaTotal,
      convergence: this.getConvergence(),
      cyclesCompleted: this.state.cycles.length,
      pathsProcessed: this.pathCount,
      grounding: this.grounder.getMetrics(),
      reasoning,
      lock: this.mutex.getStats(),
    };
  }

  /** Most recent cycles first. */
  getCycles(limit: number): ReflectionCycle[] {
    if (limit <= 0) return [];
    return this.state.cycles.slice(-limit).reverse();
  }

  getRecentPaths(): readonly ReasoningPath[] {
    return this.recentPaths;
  }

  async getRecord(id: string): Promise<StoredRecord | null> {
    return this.store.get(id);
  }

  async listRecords(limit: number, kind?: RecordKind): Promise<StoredRecord[]> {
    return this.store.list(limit, kind);
  }

  validateRequirements(): RequirementReport {
    const emergence = this.state.emergenceHistory;
    const recentGrounding = this.recentGroundingScores;
    const recentPaths = this.recentPaths.slice(-5);

    const requirements: Record<string, boolean> = {
      axiomGrounding: this.groundingCount > 0 && this.groundingSum / this.groundingCount >= 0.95,
      recentGrounding: recentGrounding.length > 0 && recentGrounding.every(c => c > 0.8),
      pathsStored: this.storedPaths === this.pathCount,
      lambdaPositive: this.state.lambdaTotal > 0,
      reflectionActive: this.state.cycles.length > 0,
      safetyMaintained: recentPaths.length > 0 && recentPaths.every(p => p.safety.safe),
      emergenceTracked: emergence.length > 0 && mean(emergence) >= 0,
      convergenceMeasured: this.getConvergence().confidence > 0,
    };

    const values = Object.values(requirements);
    const met = values.filter(Boolean).length;
    return { requirements, allMet: met === values.length, score: met / values.length };
  }

  async close(): Promise<void> {
    await this.store.close();
    this.events.removeAllListeners();
  }

  private runPipeline(query: string): { path: ReasoningPath; improvements: ImprovementLogEntry[] } {
    const grounded = this.ground(query, { queryNumber: this.pathCount + 1 });

    const depth = optimalDepth(query, this.state.baselines.reasoningDepth, this.config.engine.maxDepth);
    const reasoning = this.reasoning.reasonAbout(
      query,
      { grounding: { hash: grounded.hash, certainty: grounded.certainty } },
      depth,
    );

    const outcome = this.reflection.reflect(query, {
      reasoning: { hash: reasoning.hash, certainty: reasoning.certainty, emergence: reasoning.emergence },
    });
    const { cycle } = outcome;

    const safety = checkSafety(query, grounded, reasoning, this.pathCount);
    const convergence = this.getConvergence();
    const id = `path_${this.pathCount}_${nanoid(8)}`;

    const path: ReasoningPath = {
      id,
      sessionId: this.sessionId,
      query,
      grounded,
      reasoning,
      cycle,
      groundingCertainty: grounded.certainty,
      emergence: cycle.emergence,
      lambdaImpact: cycle.lambdaImpact,
      reasoningDepth: reasoning.depth,
      safety,
      convergence,
      timestamp: Date.now(),
      hash: contentHash({
        id,
        sessionId: this.sessionId,
        query,
        grounded: grounded.hash,
        reasoning: reasoning.hash,
        cycle: cycle.hash,
      }),
    };

    this.pathCount++;
    this.recentPaths.push(path);
    if (this.recentPaths.length > MAX_STORED_PATHS) {
      this.recentPaths.splice(0, this.recentPaths.length - MAX_STORED_PATHS);
    }

    if (!safety.safe) {
      this.logger.warn({ pathId: id, safety }, 'IntelligenceSystem: path failed safety checks');
    }

    return { path, improvements: outcome.improvements };
  }

  private async persist(id: string, kind: RecordKind, record: unknown): Promise<boolean> {
    try {
      await this.store.save(id, kind, toJsonValue(record));
      return true;
    } catch (err) {
      this.logger.error({ id, kind, error: toError(err).message }, 'IntelligenceSystem: persist failed');
      return false;
    }
  }

  private forwardEvents(): void {
    this.grounder.on('grounding:completed', (data: LambdaEvents['grounding:completed']) => {
      this.events.emit('grounding:completed', data);
    });
    this.reasoning.on('reasoning:completed', (data: LambdaEvents['reasoning:completed']) => {
      this.events.emit('reasoning:completed', data);
    });
    this.reflection.on('reflection:completed', (data: LambdaEvents['reflection:completed']) => {
      this.events.emit('reflection:completed', data);
    });
    this.reflection.on('improvement:applied', (data: LambdaEvents['improvement:applied']) => {
      this.events.emit('improvement:applied', data);
    });
    this.convergence.on('convergence:detected', (data: LambdaEvents['convergence:detected']) => {
      this.events.emit('convergence:detected', data);
    });
  }
}
