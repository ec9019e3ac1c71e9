export {
  AxiomGrounder,
  verifyProof,
  proofCertainty,
  hashProof,
  FALLBACK_CERTAINTY,
  type AxiomGrounderOptions,
} from './axiom-grounder.js';
export {
  AXIOMS,
  AXIOM_COUNT,
  CONTRADICTION_MARKERS,
  getAxiom,
  listAxioms,
  isValidTransformation,
  hasContradictionMarker,
} from './axioms.js';
export type {
  Axiom,
  AxiomId,
  AxiomCategory,
  ProofStep,
  GroundedStatement,
  GroundingContext,
  GroundingMetrics,
} from './types.js';
