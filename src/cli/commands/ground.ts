/**
 * `lambdacore ground "statement"`: attach an axiom proof to a statement.
 */

import { Command } from 'commander';
import { createSystem, loadContext, printJSON } from '../context.js';

export function createGroundCommand(): Command {
  const cmd = new Command('ground');

  cmd
    .description('Ground a statement in the axiom table')
    .argument('<statement>', 'Statement to ground')
    .action(async (statement: string, _options: unknown, command: Command) => {
      const ctx = loadContext(command);
      const system = createSystem(ctx, false);
      const grounded = system.ground(statement);
      await system.close();

      if (ctx.options.json) {
        printJSON(grounded);
        return;
      }

      console.log();
      console.log(`  Statement: ${grounded.statement}`);
      console.log(`  Certainty: ${grounded.certainty.toFixed(3)}${grounded.verified ? '' : ' (fallback)'}`);
      console.log(`  Hash:      ${grounded.hash.slice(0, 16)}`);
      console.log();
      for (const step of grounded.steps) {
        console.log(`    ${step.axiom}  ${step.transformation.padEnd(26)} ${step.certainty.toFixed(2)}  ${step.result}`);
      }
      console.log();
    });

  return cmd;
}
