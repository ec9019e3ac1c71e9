import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  AxiomGrounder,
  FALLBACK_CERTAINTY,
  hashProof,
  proofCertainty,
  verifyProof,
} from '../../../src/grounding/axiom-grounder.js';
import {
  AXIOMS,
  AXIOM_COUNT,
  hasContradictionMarker,
  isValidTransformation,
} from '../../../src/grounding/axioms.js';
import type { ProofStep } from '../../../src/grounding/types.js';

describe('axiom table', () => {
  it('loads six frozen axioms', () => {
    expect(AXIOM_COUNT).toBe(6);
    const a2 = AXIOMS.get('A2');
    expect(a2?.statement).toBe('A = A (Identity)');
    expect(Object.isFrozen(a2)).toBe(true);
    expect(Object.isFrozen(a2?.transformations)).toBe(true);
  });

  it('checks transformations against each axiom vocabulary', () => {
    expect(isValidTransformation('A1', 'existential')).toBe(true);
    expect(isValidTransformation('A1', 'instantiation')).toBe(true);
    expect(isValidTransformation('A3', 'identity')).toBe(false);
    expect(isValidTransformation('A6', 'emergence_potential')).toBe(true);
    expect(isValidTransformation('A7', 'identity')).toBe(false);
  });

  it('detects contradiction markers case-insensitively', () => {
    expect(hasContradictionMarker('It is raining AND NOT raining')).toBe(true);
    expect(hasContradictionMarker('This is a Paradox')).toBe(true);
    expect(hasContradictionMarker('Socrates is mortal')).toBe(false);
  });
});

describe('proof helpers', () => {
  it('verifyProof rejects a step outside its axiom vocabulary', () => {
    const steps: ProofStep[] = [
      { axiom: 'A1', transformation: 'existential', result: 'exists', certainty: 1 },
      { axiom: 'A3', transformation: 'identity', result: 'bad', certainty: 1 },
    ];
    expect(verifyProof(steps)).toBe(false);
    expect(verifyProof(steps.slice(0, 1))).toBe(true);
  });

  it('proofCertainty is 0 for an empty proof', () => {
    expect(proofCertainty([])).toBe(0);
  });

  it('proofCertainty adds depth and coverage bonuses', () => {
    const steps: ProofStep[] = [{ axiom: 'A1', transformation: 'existential', result: 'x', certainty: 0.5 }];
    // 0.5 + 0.05 + (1/6) * 0.1
    expect(proofCertainty(steps)).toBeCloseTo(0.5 + 0.05 + 0.1 / 6, 10);
  });

  it('proofCertainty floors long proofs above 0.8 at 0.85', () => {
    const steps: ProofStep[] = Array.from({ length: 4 }, () => ({
      axiom: 'A1',
      transformation: 'existential',
      result: 'x',
      certainty: 0.88,
    }));
    // 0.88^4 + 0.2 + 0.1/6 ≈ 0.816, raised to the floor
    expect(proofCertainty(steps)).toBe(0.85);
  });

  it('hashProof depends only on statement and steps', () => {
    const steps: ProofStep[] = [{ axiom: 'A2', transformation: 'identity', result: 'same', certainty: 1 }];
    expect(hashProof('x', steps)).toBe(hashProof('x', [...steps]));
    expect(hashProof('x', steps)).not.toBe(hashProof('y', steps));
    expect(hashProof('x', steps)).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('AxiomGrounder', () => {
  let grounder: AxiomGrounder;

  beforeEach(() => {
    grounder = new AxiomGrounder();
  });

  it('grounds "A = A" with an identity step at full certainty', () => {
    const grounded = grounder.ground('A = A');

    expect(grounded.verified).toBe(true);
    expect(grounded.steps.map(s => s.axiom)).toEqual(['A1', 'A2', 'A4', 'A5', 'A6']);
    expect(grounded.steps[1]).toEqual({
      axiom: 'A2',
      transformation: 'identity',
      result: 'Statement is self-identical',
      certainty: 1.0,
    });
    expect(grounded.certainty).toBe(1.0);
    expect(grounded.axiomsUsed).toEqual(['A1', 'A2', 'A4', 'A5', 'A6']);
  });

  it('records byte length and word count in the narrative steps', () => {
    const grounded = grounder.ground('A = A');
    expect(grounded.steps[3].result).toBe('Information conserved (5 bytes)');
    expect(grounded.steps[4].result).toBe('Emergence potential: 0.30');
  });

  it('adds the non-contradiction step when a marker is present', () => {
    const grounded = grounder.ground('yes and not no');
    expect(grounded.steps).toHaveLength(6);
    expect(grounded.steps[2]).toMatchObject({ axiom: 'A3', transformation: 'contradiction_elimination' });
  });

  it('produces the same hash for the same statement regardless of time', () => {
    const first = grounder.ground('Socrates is mortal');
    const second = grounder.ground('Socrates is mortal');
    expect(second.hash).toBe(first.hash);
    expect(grounder.isKnownProof(first.hash)).toBe(true);
    expect(grounder.getProof(first.hash)?.statement).toBe('Socrates is mortal');
  });

  it('falls back to a minimal grounding when the proof fails verification', () => {
    const grounded = grounder.fromSteps('bad proof', [
      { axiom: 'A3', transformation: 'identity', result: 'wrong vocabulary', certainty: 1 },
    ]);

    expect(grounded.verified).toBe(false);
    expect(grounded.certainty).toBe(FALLBACK_CERTAINTY);
    expect(grounded.steps).toEqual([
      { axiom: 'A1', transformation: 'existential', result: 'unproven', certainty: 0.1 },
    ]);
    expect(grounder.getMetrics().fallbacks).toBe(1);
  });

  it('emits grounding:completed', () => {
    const listener = vi.fn();
    grounder.on('grounding:completed', listener);
    const grounded = grounder.ground('A = A');
    expect(listener).toHaveBeenCalledWith({ hash: grounded.hash, certainty: 1, fallback: false });
  });

  it('reports metrics over the grounding history', () => {
    grounder.ground('A = A');
    grounder.ground('A = A');
    const metrics = grounder.getMetrics();
    expect(metrics).toEqual({
      totalGrounded: 2,
      avgCertainty: 1,
      stdCertainty: 0,
      proofCacheSize: 1,
      axiomsLoaded: 6,
      fallbacks: 0,
    });
  });

  it('caps the history at historyLimit', () => {
    const small = new AxiomGrounder({ historyLimit: 2 });
    small.ground('one');
    small.ground('two');
    small.ground('three');
    expect(small.getMetrics().totalGrounded).toBe(2);
    expect(small.getMetrics().proofCacheSize).toBe(3);
  });
});
