/**
 * lambdacore: axiom grounding, recursive reasoning and R3 self-reflection
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, IntelligenceSystem } from 'lambdacore';
 *
 * const system = new IntelligenceSystem({ config: new ConfigManager().load() });
 * const { path } = await system.process('If all men are mortal then Socrates is mortal');
 * console.log(path.emergence, system.state.lambdaTotal);
 * ```
 */

// Core
export {
  IntelligenceSystem,
  optimalDepth,
  checkSafety,
  HARM_TERMS,
  MAX_STORED_PATHS,
  type IntelligenceSystemOptions,
  type ReasoningPath,
  type SafetyReport,
  type SystemMetrics,
  type ProcessResult,
  type RequirementReport,
} from './core/system.js';
export {
  EngineState,
  ReasoningCache,
  DEFAULT_BASELINES,
  type EngineBaselines,
  type EngineStateOptions,
  type EngineStateSnapshot,
} from './core/state.js';
export { EventBus, type LambdaEvents, type LambdaEventName } from './core/events.js';
export { ConfigManager } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  LambdaError,
  ConfigError,
  StoreError,
  ValidationError,
  ImprovementError,
  toError,
} from './core/errors.js';
export { AsyncMutex, type LockStats } from './core/mutex.js';
export {
  LambdaConfigSchema,
  defaultConfig,
  type LambdaConfig,
  type LambdaConfigInput,
  type JsonValue,
  type JsonObject,
} from './core/types.js';

// Stages
export * from './grounding/index.js';
export * from './reasoning/index.js';
export * from './reflection/index.js';
export * from './evolution/index.js';

// Plumbing
export * from './store/index.js';
export * from './api/index.js';
export * from './observability/index.js';

export { VERSION, NAME } from './version.js';
