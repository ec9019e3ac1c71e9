import { z } from 'zod';

// ===== Configuration =====

export const LambdaConfigSchema = z.object({
  engine: z.object({
    initialLambda: z.number().min(0).default(10),
    maxDepth: z.number().int().min(1).max(32).default(10),
    /** Unbounded when omitted. */
    cacheMaxSize: z.number().int().min(1).optional(),
  }).default({}),
  reflection: z.object({
    reasoningDepth: z.number().int().min(1).max(10).default(2),
    certaintyThreshold: z.number().min(0).max(1).default(0.7),
    emergenceTarget: z.number().min(0).default(2.0),
    lambdaGrowthTarget: z.number().min(0).default(0.1),
    emergenceWindow: z.number().int().min(1).default(5),
  }).default({}),
  convergence: z.object({
    window: z.number().int().min(2).default(5),
    minSamples: z.number().int().min(2).default(3),
    avgChangeThreshold: z.number().min(0).default(0.01),
    stdChangeThreshold: z.number().min(0).default(0.02),
  }).default({}),
  api: z.object({
    port: z.number().int().min(0).max(65535).default(10000),
    apiKey: z.string().optional(),
    corsOrigins: z.array(z.string()).default(['*']),
    maxQueryLength: z.number().int().min(1).default(2000),
    rateLimit: z.object({
      maxTokens: z.number().int().min(1).default(60),
      refillRate: z.number().int().min(1).default(1),
      refillIntervalMs: z.number().int().min(1).default(1000),
    }).default({}),
  }).default({}),
  store: z.object({
    enabled: z.boolean().default(true),
    path: z.string().optional(),
  }).default({}),
  metrics: z.object({
    sampleIntervalMs: z.number().int().min(100).default(30000),
    maxSamples: z.number().int().min(1).default(1000),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type LambdaConfig = z.infer<typeof LambdaConfigSchema>;
export type LambdaConfigInput = z.input<typeof LambdaConfigSchema>;

/** Parse a (partial) config object, applying defaults. */
export function defaultConfig(input: LambdaConfigInput = {}): LambdaConfig {
  return LambdaConfigSchema.parse(input);
}

// ===== JSON values =====

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };
