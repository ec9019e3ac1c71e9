import { describe, it, expect } from 'vitest';
import { createCLI } from '../../../src/cli/index.js';
import { parsePositiveInt } from '../../../src/cli/context.js';
import { DEMO_QUERIES } from '../../../src/cli/commands/demo.js';

describe('createCLI', () => {
  it('registers every command', () => {
    const names = createCLI().commands.map(c => c.name());
    expect(names).toEqual(['ground', 'reason', 'reflect', 'process', 'demo', 'serve', 'status']);
  });

  it('declares global options', () => {
    const flags = createCLI().options.map(o => o.long);
    expect(flags).toEqual(expect.arrayContaining(['--verbose', '--json', '--dir', '--version']));
  });

  it('parses reason depth as a positive integer', () => {
    const reason = createCLI().commands.find(c => c.name() === 'reason');
    const depth = reason?.options.find(o => o.long === '--depth');
    expect(depth?.short).toBe('-d');
    expect(depth?.defaultValue).toBe(3);
  });
});

describe('parsePositiveInt', () => {
  it('accepts positive integers', () => {
    expect(parsePositiveInt('4')).toBe(4);
  });

  it('rejects zero and non-numbers', () => {
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer, got "0"');
    expect(() => parsePositiveInt('abc')).toThrow('Expected a positive integer, got "abc"');
  });
});

describe('demo queries', () => {
  it('ships five queries', () => {
    expect(DEMO_QUERIES).toHaveLength(5);
  });
});
