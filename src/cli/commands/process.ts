/**
 * `lambdacore process <query...>`: run the full pipeline on a query.
 */

import { Command } from 'commander';
import { createSystem, loadContext, printJSON } from '../context.js';
import type { ProcessResult } from '../../core/system.js';

export function printProcessResult(result: ProcessResult): void {
  const { path, metrics } = result;
  const failed = Object.entries(path.safety)
    .filter(([name, ok]) => name !== 'safe' && !ok)
    .map(([name]) => name);

  console.log(`  Query:      ${path.query}`);
  console.log(`  Grounding:  ${path.groundingCertainty.toFixed(3)}`);
  console.log(`  Reasoning:  depth ${path.reasoningDepth}, certainty ${path.reasoning.certainty.toFixed(3)}`);
  console.log(`  Emergence:  ${path.emergence.toFixed(3)}`);
  console.log(`  Λ_total:    ${metrics.lambdaTotal.toFixed(3)} (+${path.lambdaImpact.toFixed(3)})`);
  console.log(`  Safety:     ${path.safety.safe ? 'passed' : `failed (${failed.join(', ')})`}`);
}

export function createProcessCommand(): Command {
  const cmd = new Command('process');

  cmd
    .description('Run grounding, reasoning and reflection on a query')
    .argument('<query...>', 'Query words')
    .action(async (words: string[], _options: unknown, command: Command) => {
      const ctx = loadContext(command);
      const system = createSystem(ctx, true);

      let result: ProcessResult;
      try {
        result = await system.process(words.join(' '));
      } finally {
        await system.close();
      }

      if (ctx.options.json) {
        printJSON(result);
        return;
      }

      console.log();
      printProcessResult(result);
      console.log();
    });

  return cmd;
}
