/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createGroundCommand } from './commands/ground.js';
import { createReasonCommand } from './commands/reason.js';
import { createReflectCommand } from './commands/reflect.js';
import { createProcessCommand } from './commands/process.js';
import { createDemoCommand } from './commands/demo.js';
import { createServeCommand } from './commands/serve.js';
import { createStatusCommand } from './commands/status.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Axiom grounding, recursive reasoning and R3 self-reflection')
    .option('-v, --verbose', 'Enable verbose (pretty, debug-level) logging')
    .option('--json', 'Output results as JSON')
    .option('--dir <directory>', 'Project directory for .lambdacore.yaml', '.');

  program.addCommand(createGroundCommand());
  program.addCommand(createReasonCommand());
  program.addCommand(createReflectCommand());
  program.addCommand(createProcessCommand());
  program.addCommand(createDemoCommand());
  program.addCommand(createServeCommand());
  program.addCommand(createStatusCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
