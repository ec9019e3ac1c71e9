/**
 * `lambdacore status`: show configuration and store status.
 */

import { Command } from 'commander';
import { existsSync, statSync } from 'fs';
import { join } from 'path';
import { VERSION } from '../../version.js';
import { AXIOM_COUNT } from '../../grounding/axioms.js';
import { loadContext, printJSON } from '../context.js';

export function createStatusCommand(): Command {
  const cmd = new Command('status');

  cmd
    .description('Show lambdacore configuration and store status')
    .action((_options: unknown, command: Command) => {
      const { options, config, configManager } = loadContext(command);
      const storePath = config.store.path ?? configManager.getDefaultStorePath();
      const storeExists = existsSync(storePath);

      const status = {
        version: VERSION,
        projectDir: configManager.getProjectDir(),
        projectConfig: existsSync(join(configManager.getProjectDir(), '.lambdacore.yaml')),
        axioms: AXIOM_COUNT,
        engine: config.engine,
        reflection: config.reflection,
        api: { port: config.api.port, authEnabled: Boolean(config.api.apiKey) },
        store: {
          enabled: config.store.enabled,
          path: storePath,
          exists: storeExists,
          sizeBytes: storeExists ? statSync(storePath).size : 0,
        },
      };

      if (options.json) {
        printJSON(status);
        return;
      }

      console.log();
      console.log(`  lambdacore v${VERSION}`);
      console.log('  ' + '─'.repeat(40));
      console.log();
      console.log(`  Project:        ${status.projectDir}`);
      console.log(`  Project config: ${status.projectConfig ? 'Yes' : 'No'}`);
      console.log(`  Axioms:         ${status.axioms}`);
      console.log();
      console.log('  Engine:');
      console.log(`    Initial Λ:    ${config.engine.initialLambda}`);
      console.log(`    Max depth:    ${config.engine.maxDepth}`);
      console.log(`    Cache limit:  ${config.engine.cacheMaxSize ?? 'unbounded'}`);
      console.log();
      console.log('  Store:');
      console.log(`    Enabled:  ${status.store.enabled ? 'Yes' : 'No'}`);
      console.log(`    Path:     ${status.store.path}`);
      console.log(`    Database: ${storeExists ? `${Math.round(status.store.sizeBytes / 1024)} KB` : 'Not created yet'}`);
      console.log();
      console.log(`  API: port ${status.api.port}, auth ${status.api.authEnabled ? 'enabled' : 'disabled'}`);
      console.log();
    });

  return cmd;
}
