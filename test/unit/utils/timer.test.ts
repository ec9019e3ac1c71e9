import { describe, it, expect } from 'vitest';
import { StageTimer, elapsedSince, formatDuration } from '../../../src/utils/timer.js';

function busyWait(ms: number): void {
  const start = performance.now();
  while (performance.now() - start < ms) {
    // spin
  }
}

describe('StageTimer', () => {
  it('returns the stage result and records its duration', () => {
    const timer = new StageTimer<'parse' | 'check'>();
    const value = timer.time('parse', () => {
      busyWait(5);
      return 42;
    });

    expect(value).toBe(42);
    const { parse, check } = timer.durations();
    expect(parse).toBeGreaterThanOrEqual(5);
    expect(check).toBeUndefined();
    expect(timer.total()).toBeGreaterThanOrEqual(parse ?? 0);
  });

  it('accumulates repeated stages in first-run order', () => {
    const timer = new StageTimer<'a' | 'b'>();
    timer.time('b', () => busyWait(2));
    timer.time('a', () => busyWait(2));
    timer.time('b', () => busyWait(2));

    const durations = timer.durations();
    expect(Object.keys(durations)).toEqual(['b', 'a']);
    expect(durations.b).toBeGreaterThanOrEqual(4);
  });

  it('records a stage that throws', () => {
    const timer = new StageTimer<'fail'>();
    expect(() => timer.time('fail', () => { throw new Error('boom'); })).toThrow('boom');
    expect(timer.durations().fail).toBeGreaterThanOrEqual(0);
  });
});

describe('elapsedSince', () => {
  it('measures from a performance.now() mark', () => {
    const start = performance.now();
    busyWait(3);
    expect(elapsedSince(start)).toBeGreaterThanOrEqual(3);
  });
});

describe('formatDuration', () => {
  it('formats each range', () => {
    expect(formatDuration(0.5)).toBe('0.50ms');
    expect(formatDuration(250.4)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});
