/**
 * Axiom Grounding: Type Definitions
 */

export type AxiomId = 'A1' | 'A2' | 'A3' | 'A4' | 'A5' | 'A6';

export type AxiomCategory = 'ontological' | 'logical' | 'physical' | 'systemic';

export interface Axiom {
  readonly id: AxiomId;
  readonly statement: string;
  /** Base certainty in [0, 1]. */
  readonly certainty: number;
  readonly category: AxiomCategory;
  readonly description: string;
  /** Transformations a proof step citing this axiom may apply. */
  readonly transformations: readonly string[];
}

export interface ProofStep {
  readonly axiom: string;
  readonly transformation: string;
  readonly result: string;
  readonly certainty: number;
}

export interface GroundedStatement {
  readonly statement: string;
  readonly steps: readonly ProofStep[];
  readonly certainty: number;
  /** SHA-256 over statement + ordered step content. */
  readonly hash: string;
  readonly axiomsUsed: readonly string[];
  /** False when the generated proof failed verification and the fallback was used. */
  readonly verified: boolean;
  readonly timestamp: number;
}

export interface GroundingContext {
  readonly [key: string]: unknown;
}

export interface GroundingMetrics {
  totalGrounded: number;
  avgCertainty: number;
  stdCertainty: number;
  proofCacheSize: number;
  axiomsLoaded: number;
  fallbacks: number;
}
