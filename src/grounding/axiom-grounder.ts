/**
 * AxiomGrounder: attaches a synthetic proof to a statement.
 *
 * Every statement receives the same fixed proof skeleton (existence,
 * identity, optional non-contradiction, excluded middle, conservation,
 * emergence potential). The proof is checked against each axiom's allowed
 * transformation vocabulary; a proof that fails the check is replaced by a
 * single minimal step instead of raising.
 */

import { EventEmitter } from 'node:events';
import { AXIOM_COUNT, hasContradictionMarker, isValidTransformation } from './axioms.js';
import type {
  GroundedStatement,
  GroundingContext,
  GroundingMetrics,
  ProofStep,
} from './types.js';
import { contentHash } from '../utils/crypto.js';
import { clamp, mean, product, stdDev } from '../utils/stats.js';
import { getLogger } from '../core/logger.js';

export const FALLBACK_CERTAINTY = 0.1;

const FALLBACK_STEP: ProofStep = {
  axiom: 'A1',
  transformation: 'existential',
  result: 'unproven',
  certainty: FALLBACK_CERTAINTY,
};

export interface AxiomGrounderOptions {
  /** How many grounded statements to keep for metrics. Default: 1000 */
  historyLimit?: number;
}

/**
 * A proof is valid when every step applies a transformation its axiom allows.
 */
export function verifyProof(steps: readonly ProofStep[]): boolean {
  return steps.every(step => isValidTransformation(step.axiom, step.transformation));
}

/**
 * Certainty of a proof: product of step certainties, plus a depth bonus and
 * an axiom-coverage bonus, clamped to [0, 1]. Proofs of four or more steps
 * that clear 0.8 are floored at 0.85.
 */
export function proofCertainty(steps: readonly ProofStep[]): number {
  if (steps.length === 0) return 0;

  const chained = product(steps.map(s => s.certainty));
  const depthBonus = Math.min(0.3, steps.length * 0.05);
  const distinctAxioms = new Set(steps.map(s => s.axiom)).size;
  const consistencyBonus = (distinctAxioms / AXIOM_COUNT) * 0.1;

  let total = clamp(chained + depthBonus + consistencyBonus, 0, 1);
  if (total > 0.8 && steps.length >= 4) {
    total = Math.max(total, 0.85);
  }
  return total;
}

/** Digest over the statement and the ordered step content. */
export function hashProof(statement: string, steps: readonly ProofStep[]): string {
  return contentHash({
    statement,
    steps: steps.map(s => [s.axiom, s.transformation, s.result, s.certainty]),
  });
}

export class AxiomGrounder extends EventEmitter {
  private readonly historyLimit: number;
  private history: GroundedStatement[] = [];
  private proofCache = new Map<string, GroundedStatement>();
  private fallbacks = 0;
  private logger = getLogger();

  constructor(options: AxiomGrounderOptions = {}) {
    super();
    this.historyLimit = options.historyLimit ?? 1000;
  }

  /**
   * Ground a statement in the axiom table. Never throws.
   */
  ground(statement: string, context: GroundingContext = {}): GroundedStatement {
    const grounded = this.fromSteps(statement, this.generateProof(statement));

    this.logger.debug(
      {
        hash: grounded.hash,
        certainty: grounded.certainty,
        steps: grounded.steps.length,
        contextKeys: Object.keys(context),
      },
      'AxiomGrounder: statement grounded',
    );

    return grounded;
  }

  /**
   * Build a grounded statement from explicit proof steps, substituting the
   * minimal fallback proof when verification fails.
   */
  fromSteps(statement: string, steps: readonly ProofStep[]): GroundedStatement {
    const verified = verifyProof(steps);
    const finalSteps = verified ? [...steps] : [FALLBACK_STEP];
    const certainty = verified ? proofCertainty(finalSteps) : FALLBACK_CERTAINTY;

    if (!verified) {
      this.fallbacks++;
      const invalid = steps.find(s => !isValidTransformation(s.axiom, s.transformation));
      this.logger.warn(
        { axiom: invalid?.axiom, transformation: invalid?.transformation },
        'AxiomGrounder: invalid proof, using minimal grounding',
      );
    }

    const grounded: GroundedStatement = {
      statement,
      steps: finalSteps,
      certainty,
      hash: hashProof(statement, finalSteps),
      axiomsUsed: [...new Set(finalSteps.map(s => s.axiom))],
      verified,
      timestamp: Date.now(),
    };

    this.record(grounded);
    this.emit('grounding:completed', {
      hash: grounded.hash,
      certainty: grounded.certainty,
      fallback: !verified,
    });

    return grounded;
  }

  /** Whether a proof with this hash has been produced by this grounder. */
  isKnownProof(hash: string): boolean {
    return this.proofCache.has(hash);
  }

  getProof(hash: string): GroundedStatement | undefined {
    return this.proofCache.get(hash);
  }

  getMetrics(): GroundingMetrics {
    const certainties = this.history.map(g => g.certainty);
    return {
      totalGrounded: this.history.length,
      avgCertainty: mean(certainties),
      stdCertainty: stdDev(certainties),
      proofCacheSize: this.proofCache.size,
      axiomsLoaded: AXIOM_COUNT,
      fallbacks: this.fallbacks,
    };
  }

  private generateProof(statement: string): ProofStep[] {
    const steps: ProofStep[] = [];

    steps.push({
      axiom: 'A1',
      transformation: 'existential',
      result: `'${statement}' exists as conscious content`,
      certainty: 1.0,
    });

    steps.push({
      axiom: 'A2',
      transformation: 'identity',
      result: 'Statement is self-identical',
      certainty: 1.0,
    });

    if (hasContradictionMarker(statement)) {
      steps.push({
        axiom: 'A3',
        transformation: 'contradiction_elimination',
        result: 'Contradiction resolved via law of non-contradiction',
        certainty: 1.0,
      });
    }

    steps.push({
      axiom: 'A4',
      transformation: 'disjunction',
      result: 'Statement or its negation holds',
      certainty: 1.0,
    });

    const bytes = Buffer.byteLength(statement, 'utf8');
    steps.push({
      axiom: 'A5',
      transformation: 'conservation',
      result: `Information conserved (${bytes} bytes)`,
      certainty: 0.99,
    });

    const words = statement.split(/\s+/).filter(w => w.length > 0).length;
    steps.push({
      axiom: 'A6',
      transformation: 'emergence_potential',
      result: `Emergence potential: ${(words / 10).toFixed(2)}`,
      certainty: 0.95,
    });

    return steps;
  }

  private record(grounded: GroundedStatement): void {
    this.proofCache.set(grounded.hash, grounded);
    this.history.push(grounded);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }
}
