/**
 * `lambdacore reason "query"`: run recursive reasoning on a query.
 */

import { Command } from 'commander';
import { refinementPasses, reachedMaxDepth } from '../../reasoning/reasoning-engine.js';
import { createSystem, loadContext, parsePositiveInt, printJSON } from '../context.js';

export function createReasonCommand(): Command {
  const cmd = new Command('reason');

  cmd
    .description('Reason about a query with bounded recursive refinement')
    .argument('<query>', 'Query to reason about')
    .option('-d, --depth <depth>', 'Reasoning depth', parsePositiveInt, 3)
    .action(async (query: string, options: { depth: number }, command: Command) => {
      const ctx = loadContext(command);
      const system = createSystem(ctx, false);
      const result = system.reasonAbout(query, {}, options.depth);
      await system.close();

      if (ctx.options.json) {
        printJSON(result);
        return;
      }

      const { components, base } = result;
      console.log();
      console.log(`  Query:      ${result.query}`);
      console.log(`  Depth:      ${result.depth}`);
      console.log(`  Certainty:  ${result.certainty.toFixed(3)}`);
      console.log(`  Emergence:  ${result.emergence.toFixed(3)}`);
      console.log();
      console.log(`  Entities:   ${components.entities.join(', ') || '-'}`);
      console.log(`  Relations:  ${components.relations.join(', ') || '-'}`);
      console.log(`  Unknowns:   ${base.unknowns.join(', ') || '-'}`);
      console.log(`  Patterns:   ${base.patterns.map(p => p.type).join(', ') || '-'}`);
      console.log(`  Conflicts:  ${base.contradictions.map(c => c.detail).join('; ') || '-'}`);

      const passes = refinementPasses(result.refinement);
      if (passes.length > 0) {
        console.log();
        console.log(`  Refinement: ${passes.length} pass(es)${reachedMaxDepth(result.refinement) ? ', depth limit reached' : ''}`);
        for (const insight of result.novelInsights) {
          console.log(`    - ${insight}`);
        }
      }
      console.log();
    });

  return cmd;
}
