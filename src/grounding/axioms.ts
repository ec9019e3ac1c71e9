/**
 * The fixed axiom table. Loaded once; frozen for the lifetime of the process.
 */

import type { Axiom, AxiomId } from './types.js';

const AXIOM_LIST: readonly Axiom[] = [
  {
    id: 'A1',
    statement: 'Conscious experience exists',
    certainty: 1.0,
    category: 'ontological',
    description: 'First-person experience is fundamental',
    transformations: ['existential', 'instantiation'],
  },
  {
    id: 'A2',
    statement: 'A = A (Identity)',
    certainty: 1.0,
    category: 'logical',
    description: 'Law of identity',
    transformations: ['identity', 'reflexive', 'symmetric', 'transitive'],
  },
  {
    id: 'A3',
    statement: 'Not (A and not-A)',
    certainty: 1.0,
    category: 'logical',
    description: 'Law of non-contradiction',
    transformations: ['negation', 'contradiction_elimination'],
  },
  {
    id: 'A4',
    statement: 'Either A or not-A',
    certainty: 1.0,
    category: 'logical',
    description: 'Law of excluded middle',
    transformations: ['disjunction', 'choice', 'partition'],
  },
  {
    id: 'A5',
    statement: 'Information is conserved',
    certainty: 0.99,
    category: 'physical',
    description: 'Conservation of information',
    transformations: ['conservation', 'invariance', 'symmetry'],
  },
  {
    id: 'A6',
    statement: 'Emergence exists',
    certainty: 0.95,
    category: 'systemic',
    description: 'Complex systems exhibit novel properties',
    transformations: ['composition', 'hierarchy', 'emergence_detection', 'emergence_potential'],
  },
];

export const AXIOMS: ReadonlyMap<string, Axiom> = new Map(
  AXIOM_LIST.map((axiom): [string, Axiom] => [
    axiom.id,
    Object.freeze({ ...axiom, transformations: Object.freeze([...axiom.transformations]) }),
  ]),
);

export const AXIOM_COUNT = AXIOMS.size;

export function getAxiom(id: AxiomId): Axiom | undefined {
  return AXIOMS.get(id);
}

export function listAxioms(): Axiom[] {
  return [...AXIOMS.values()];
}

/** Whether `transformation` is in the allowed vocabulary of `axiomId`. */
export function isValidTransformation(axiomId: string, transformation: string): boolean {
  const axiom = AXIOMS.get(axiomId);
  return axiom !== undefined && axiom.transformations.includes(transformation);
}

/**
 * Phrases that mark a statement as self-contradictory. Matched
 * case-insensitively as substrings.
 */
export const CONTRADICTION_MARKERS: readonly string[] = [
  'and not',
  'but not',
  'however not',
  'although not',
  'false true',
  'true false',
  'yes no',
  'no yes',
  'contradiction',
  'paradox',
];

export function hasContradictionMarker(text: string): boolean {
  const lower = text.toLowerCase();
  return CONTRADICTION_MARKERS.some(marker => lower.includes(marker));
}
