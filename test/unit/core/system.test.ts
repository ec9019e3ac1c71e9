import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  IntelligenceSystem,
  MAX_STORED_PATHS,
  RECENT_GROUNDING_WINDOW,
  checkSafety,
  optimalDepth,
} from '../../../src/core/system.js';
import { InMemoryRecordStore } from '../../../src/store/memory-store.js';
import { StoreError } from '../../../src/core/errors.js';
import { defaultConfig } from '../../../src/core/types.js';

class FailingStore extends InMemoryRecordStore {
  override async save(): Promise<void> {
    throw new StoreError('disk full');
  }
}

describe('optimalDepth', () => {
  it('uses the base depth for short statements', () => {
    expect(optimalDepth('Socrates is mortal', 2, 10)).toBe(2);
    expect(optimalDepth('   ', 2, 10)).toBe(2);
  });

  it('grows with length and questions, capped at max', () => {
    const long = Array.from({ length: 20 }, (_, i) => `w${i}`).join(' ');
    // floor(20 / 10 * 3) = 6, capped at 5
    expect(optimalDepth(long, 2, 10)).toBe(7);
    // one question word out of two: floor(0.5 * 5) = 2
    expect(optimalDepth('why? because', 2, 10)).toBe(4);
    expect(optimalDepth(long, 2, 4)).toBe(4);
  });
});

describe('checkSafety', () => {
  it('fails on harm terms and contradictions', () => {
    const system = new IntelligenceSystem();
    const grounded = system.ground('steal the data');
    const reasoning = system.reasonAbout('steal the data');
    const report = checkSafety('steal the data', grounded, reasoning, 0);
    expect(report).toEqual({
      proofVerified: true,
      noContradictions: true,
      noHarm: false,
      withinLimits: true,
      safe: false,
    });

    const contradictory = system.reasonAbout('Alice AND NOT Bob');
    expect(checkSafety('Alice AND NOT Bob', grounded, contradictory, 0).noContradictions).toBe(false);
    expect(checkSafety('fine', grounded, reasoning, MAX_STORED_PATHS).withinLimits).toBe(false);
  });
});

describe('IntelligenceSystem', () => {
  let store: InMemoryRecordStore;
  let system: IntelligenceSystem;

  beforeEach(() => {
    store = new InMemoryRecordStore();
    system = new IntelligenceSystem({ store });
  });

  afterEach(async () => {
    await system.close();
  });

  it('creates a session id', () => {
    expect(system.sessionId).toMatch(/^session_[a-z0-9]{21}$/);
  });

  it('processes a query through grounding, reasoning and reflection', async () => {
    const { path, metrics } = await system.process('Socrates is mortal');

    expect(path.id).toMatch(/^path_0_[a-z0-9]{8}$/);
    expect(path.sessionId).toBe(system.sessionId);
    expect(path.groundingCertainty).toBe(1);
    expect(path.reasoningDepth).toBe(2);
    expect(path.reasoning.context).toEqual({
      grounding: { hash: path.grounded.hash, certainty: 1 },
    });
    expect(path.safety.safe).toBe(true);
    expect(path.cycle.index).toBe(0);
    expect(path.hash).toMatch(/^[0-9a-f]{64}$/);

    expect(metrics.pathsProcessed).toBe(1);
    expect(metrics.cyclesCompleted).toBe(1);
    expect(metrics.lambdaTotal).toBe(system.state.lambdaTotal);
    expect(metrics.lambdaTotal).toBeGreaterThan(10);
  });

  it('persists paths and cycles', async () => {
    const { path } = await system.process('Socrates is mortal');
    const { cycle } = await system.reflect('Plato is wise');

    const storedPath = await system.getRecord(path.id);
    expect(storedPath?.kind).toBe('path');
    expect(await system.getRecord(cycle.id)).toMatchObject({ id: cycle.id, kind: 'cycle' });
    expect((await system.listRecords(10, 'path')).map(r => r.id)).toEqual([path.id]);
    expect(await store.count()).toBe(2);
  });

  it('emits path:stored only after a successful save', async () => {
    const stored = vi.fn();
    system.events.on('path:stored', stored);
    const { path } = await system.process('Socrates is mortal');
    expect(stored).toHaveBeenCalledWith({ id: path.id, sessionId: system.sessionId, safe: true });

    const failing = new IntelligenceSystem({ store: new FailingStore() });
    const missed = vi.fn();
    failing.events.on('path:stored', missed);
    const result = await failing.process('Socrates is mortal');
    expect(result.path.id).toMatch(/^path_0_/);
    expect(missed).not.toHaveBeenCalled();
    expect(failing.validateRequirements().requirements.pathsStored).toBe(false);
    await failing.close();
  });

  it('forwards component events onto the bus', async () => {
    const grounding = vi.fn();
    const reflection = vi.fn();
    system.events.on('grounding:completed', grounding);
    system.events.on('reflection:completed', reflection);

    await system.process('Socrates is mortal');

    expect(grounding).toHaveBeenCalledTimes(1);
    expect(reflection).toHaveBeenCalledTimes(1);
    expect(reflection.mock.calls[0][0]).toMatchObject({ lambdaTotal: system.state.lambdaTotal });
  });

  it('serializes concurrent process calls', async () => {
    const results = await Promise.all([
      system.process('first query'),
      system.process('second query'),
      system.process('third query'),
    ]);

    expect(results.map(r => r.path.cycle.index)).toEqual([0, 1, 2]);
    expect(system.getMetrics().lock).toMatchObject({ acquisitions: 3, contended: 2, waiting: 0 });
    expect(system.state.lambdaHistory).toHaveLength(4);
    for (let i = 1; i < system.state.lambdaHistory.length; i++) {
      expect(system.state.lambdaHistory[i]).toBeGreaterThan(system.state.lambdaHistory[i - 1]);
    }
  });

  it('returns cycles newest first', async () => {
    await system.reflect('one');
    await system.reflect('two');
    await system.reflect('three');

    expect(system.getCycles(2).map(c => c.query)).toEqual(['three', 'two']);
    expect(system.getCycles(10)).toHaveLength(3);
    expect(system.getCycles(0)).toEqual([]);
  });

  it('clears the reasoning cache when concepts change', async () => {
    system.reasonAbout('Socrates is mortal');
    expect(system.state.cache.size).toBe(1);

    await system.addRelation('Socrates', 'Human');
    expect(system.state.cache.size).toBe(0);
    expect(system.reasoning.hasConcept('Socrates')).toBe(true);
  });

  it('reports requirements once enough history exists', async () => {
    const before = system.validateRequirements();
    expect(before.allMet).toBe(false);
    expect(before.requirements.lambdaPositive).toBe(true);
    expect(before.requirements.reflectionActive).toBe(false);

    await system.process('Socrates is mortal');
    // two Λ samples are below the convergence minimum
    expect(system.validateRequirements().requirements.convergenceMeasured).toBe(false);

    await system.process('Plato is wise');
    const after = system.validateRequirements();
    expect(after.requirements).toEqual({
      axiomGrounding: true,
      recentGrounding: true,
      pathsStored: true,
      lambdaPositive: true,
      reflectionActive: true,
      safetyMaintained: true,
      emergenceTracked: true,
      convergenceMeasured: true,
    });
    expect(after.allMet).toBe(true);
    expect(after.score).toBe(1);
  });

  it('judges recent grounding on the last ten scores and overall grounding on all of them', () => {
    const weak = system.grounder.fromSteps('bad proof', [
      { axiom: 'A3', transformation: 'identity', result: 'wrong vocabulary', certainty: 1 },
    ]);
    vi.spyOn(system.grounder, 'ground').mockReturnValueOnce(weak);

    system.ground('bad proof');
    expect(system.validateRequirements().requirements.recentGrounding).toBe(false);

    for (let i = 0; i < RECENT_GROUNDING_WINDOW; i++) system.ground('Socrates is mortal');
    // the 0.1 score has left the window but still weighs on the mean: 10.1 / 11
    let { requirements } = system.validateRequirements();
    expect(requirements.recentGrounding).toBe(true);
    expect(requirements.axiomGrounding).toBe(false);

    for (let i = 0; i < 9; i++) system.ground('Socrates is mortal');
    // 19.1 / 20
    ({ requirements } = system.validateRequirements());
    expect(requirements.axiomGrounding).toBe(true);
  });

  it('takes engine settings from config', () => {
    const custom = new IntelligenceSystem({
      config: defaultConfig({ engine: { initialLambda: 4 }, reflection: { reasoningDepth: 3 } }),
    });
    expect(custom.state.lambdaTotal).toBe(4);
    expect(custom.state.baselines.reasoningDepth).toBe(3);
  });
});
