/**
 * `lambdacore demo`: run a handful of queries and report requirement status.
 */

import { Command } from 'commander';
import { createSystem, loadContext, printJSON } from '../context.js';
import { printProcessResult } from './process.js';
import type { ProcessResult } from '../../core/system.js';

export const DEMO_QUERIES = [
  'What is consciousness?',
  'If all men are mortal and Socrates is a man, then is Socrates mortal?',
  'Can a system create new knowledge by reflecting on itself?',
  'Every thinking process is evolving',
  'Is this statement true AND NOT false?',
];

export function createDemoCommand(): Command {
  const cmd = new Command('demo');

  cmd
    .description('Process a set of demo queries and validate requirements')
    .action(async (_options: unknown, command: Command) => {
      const ctx = loadContext(command);
      const system = createSystem(ctx, false);
      const results: ProcessResult[] = [];

      try {
        for (const query of DEMO_QUERIES) {
          results.push(await system.process(query));
        }
      } finally {
        await system.close();
      }

      const report = system.validateRequirements();
      const metrics = system.getMetrics();

      if (ctx.options.json) {
        printJSON({ paths: results.map(r => r.path), metrics, requirements: report });
        return;
      }

      console.log();
      results.forEach((result, i) => {
        console.log(`  [${i + 1}/${results.length}]`);
        printProcessResult(result);
        console.log();
      });

      console.log('  Requirements:');
      for (const [name, met] of Object.entries(report.requirements)) {
        console.log(`    ${met ? '✓' : '✗'} ${name}`);
      }
      console.log(`  Score: ${(report.score * 100).toFixed(0)}%`);
      console.log(`  Converged: ${metrics.convergence.converged ? 'yes' : 'no'} (confidence ${metrics.convergence.confidence.toFixed(2)})`);
      console.log();
    });

  return cmd;
}
