import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { LambdaConfigSchema, type LambdaConfig, type LambdaConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: LambdaConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.lambdacore');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: LambdaConfigInput): LambdaConfig {
    let raw: RawConfig = {};

    const globalConfigPath = join(this.globalDir, 'config.yaml');
    raw = this.deepMerge(raw, this.readYaml(globalConfigPath, 'global'));

    const projectConfigPath = join(this.projectDir, '.lambdacore.yaml');
    raw = this.deepMerge(raw, this.readYaml(projectConfigPath, 'project'));

    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = LambdaConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  get(): LambdaConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /** Default location of the record database. */
  getDefaultStorePath(): string {
    return join(this.globalDir, 'records.db');
  }

  ensureDirectories(): void {
    const dirs = [this.globalDir, join(this.globalDir, 'logs')];
    for (const dir of dirs) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /**
   * Create default global config if it doesn't exist
   */
  createDefaultConfig(): string {
    this.ensureDirectories();
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# lambdacore global configuration
engine:
  initialLambda: 10
  maxDepth: 10

reflection:
  reasoningDepth: 2
  emergenceTarget: 2.0

api:
  port: 10000
  # apiKey: change-me

logging:
  level: info
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const env = process.env;
    const result: RawConfig = { ...raw };

    const section = (key: string): RawConfig => {
      const current = result[key];
      const copy = isRecord(current) ? { ...current } : {};
      result[key] = copy;
      return copy;
    };

    if (env.LAMBDACORE_PORT) {
      section('api').port = this.parseNumber('LAMBDACORE_PORT', env.LAMBDACORE_PORT);
    }
    if (env.LAMBDACORE_API_KEY) {
      section('api').apiKey = env.LAMBDACORE_API_KEY;
    }
    if (env.LAMBDACORE_LOG_LEVEL) {
      section('logging').level = env.LAMBDACORE_LOG_LEVEL;
    }
    if (env.LAMBDACORE_DB_PATH) {
      section('store').path = env.LAMBDACORE_DB_PATH;
    }
    if (env.LAMBDACORE_INITIAL_LAMBDA) {
      section('engine').initialLambda = this.parseNumber('LAMBDACORE_INITIAL_LAMBDA', env.LAMBDACORE_INITIAL_LAMBDA);
    }

    return result;
  }

  private parseNumber(name: string, value: string): number {
    const n = Number(value);
    if (!Number.isFinite(n)) {
      throw new ConfigError(`${name} must be a number, got "${value}"`);
    }
    return n;
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result: RawConfig = { ...target };
    for (const key of Object.keys(source)) {
      const s = source[key];
      const t = target[key];
      if (isRecord(s) && isRecord(t)) {
        result[key] = this.deepMerge(t, s);
      } else if (s !== undefined) {
        result[key] = s;
      }
    }
    return result;
  }
}
