/**
 * Shared CLI plumbing: global options, config loading, system construction.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import { IntelligenceSystem } from '../core/system.js';
import type { LambdaConfig } from '../core/types.js';
import { SQLiteRecordStore } from '../store/sqlite-store.js';
import { InMemoryRecordStore } from '../store/memory-store.js';

export type GlobalOptions = {
  verbose?: boolean;
  json?: boolean;
  dir?: string;
};

export interface CLIContext {
  options: GlobalOptions;
  configManager: ConfigManager;
  config: LambdaConfig;
}

export function loadContext(command: Command): CLIContext {
  const options = command.optsWithGlobals<GlobalOptions>();
  const configManager = new ConfigManager(resolve(options.dir ?? '.'));
  const config = configManager.load(options.verbose ? { logging: { verbose: true } } : undefined);

  setLogger(createLogger('lambdacore', { verbose: config.logging.verbose, level: config.logging.level }));

  return { options, configManager, config };
}

/**
 * Build a system for one CLI invocation. `persist` selects the SQLite store
 * (when enabled in config) over the in-memory one.
 */
export function createSystem(ctx: CLIContext, persist: boolean): IntelligenceSystem {
  const store = persist && ctx.config.store.enabled
    ? new SQLiteRecordStore(ctx.config.store.path ?? ctx.configManager.getDefaultStorePath())
    : new InMemoryRecordStore();
  return new IntelligenceSystem({ config: ctx.config, store });
}

export function printJSON(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return n;
}
