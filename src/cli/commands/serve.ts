/**
 * `lambdacore serve`: start the REST API with metrics sampling.
 */

import { Command } from 'commander';
import { APIServer } from '../../api/server.js';
import { MetricsCollector } from '../../observability/metrics.js';
import { createSystem, loadContext } from '../context.js';

export function createServeCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the REST API server')
    .option('-p, --port <port>', 'Port to listen on (overrides config)', (v: string) => parseInt(v, 10))
    .option('--host <host>', 'Interface to bind', '0.0.0.0')
    .action(async (options: { port?: number; host: string }, command: Command) => {
      const ctx = loadContext(command);
      const { api, metrics } = ctx.config;
      const system = createSystem(ctx, true);

      const collector = new MetricsCollector(system, { maxSamples: metrics.maxSamples });
      const server = new APIServer(
        system,
        {
          port: options.port ?? api.port,
          host: options.host,
          apiKey: api.apiKey,
          corsOrigins: api.corsOrigins,
          maxQueryLength: api.maxQueryLength,
          rateLimit: api.rateLimit,
        },
        collector,
      );

      const url = await server.start();
      collector.start(metrics.sampleIntervalMs);
      console.log(`\n  lambdacore API listening on ${url}\n`);

      const shutdown = async (): Promise<void> => {
        collector.stop();
        await server.stop();
        await system.close();
        process.exit(0);
      };
      process.once('SIGINT', () => {
        shutdown().catch(() => process.exit(1));
      });
      process.once('SIGTERM', () => {
        shutdown().catch(() => process.exit(1));
      });
    });

  return cmd;
}
