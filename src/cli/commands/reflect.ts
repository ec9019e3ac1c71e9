/**
 * `lambdacore reflect "query"`: run one or more R3 reflection cycles.
 */

import { Command } from 'commander';
import { createSystem, loadContext, parsePositiveInt, printJSON } from '../context.js';
import type { ReflectionOutcome } from '../../reflection/types.js';
import { formatDuration } from '../../utils/timer.js';

export function createReflectCommand(): Command {
  const cmd = new Command('reflect');

  cmd
    .description('Run R3 self-reflection cycles on a query')
    .argument('<query>', 'Query to reflect on')
    .option('-n, --cycles <count>', 'Number of cycles', parsePositiveInt, 1)
    .action(async (query: string, options: { cycles: number }, command: Command) => {
      const ctx = loadContext(command);
      const system = createSystem(ctx, true);
      const outcomes: ReflectionOutcome[] = [];

      try {
        for (let i = 0; i < options.cycles; i++) {
          outcomes.push(await system.reflect(query));
        }
      } finally {
        await system.close();
      }

      if (ctx.options.json) {
        printJSON(outcomes);
        return;
      }

      console.log();
      for (const { cycle, metrics } of outcomes) {
        console.log(
          `  ${cycle.id}  ${cycle.levelReached.padEnd(12)} emergence=${cycle.emergence.toFixed(3)}  ` +
          `Λ=${metrics.lambdaTotal.toFixed(3)} (+${metrics.lambdaGrowth.toFixed(3)})  ` +
          `improvements=${metrics.improvementsApplied}/${cycle.improvements.length}  ` +
          formatDuration(cycle.durationMs),
        );
      }
      console.log();
    });

  return cmd;
}
