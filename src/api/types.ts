/**
 * REST API: request schemas and response types
 */

import { z } from 'zod';

export interface APIServerConfig {
  port: number;
  host?: string;
  apiKey?: string;
  corsOrigins?: string[];
  maxQueryLength?: number;
  rateLimit?: {
    maxTokens: number;
    refillRate: number;
    refillIntervalMs: number;
  };
}

const contextSchema = z.record(z.unknown());

/** Request body schemas; text fields are bounded by `maxLength`. */
export function createRequestSchemas(maxLength: number) {
  const text = z.string().trim().min(1, 'must not be empty').max(maxLength, `must be at most ${maxLength} characters`);

  return {
    ground: z.object({ statement: text, context: contextSchema.optional() }),
    reason: z.object({
      query: text,
      context: contextSchema.optional(),
      depth: z.number().int().min(1).max(32).optional(),
    }),
    reflect: z.object({ query: text, context: contextSchema.optional() }),
    process: z.object({ query: text }),
    concept: z.object({
      source: z.string().trim().min(1).max(200),
      target: z.string().trim().min(1).max(200),
    }),
  };
}

export type RequestSchemas = ReturnType<typeof createRequestSchemas>;

export interface HealthResponse {
  status: 'ok';
  version: string;
  uptime: number;
  lambdaTotal: number;
  cyclesCompleted: number;
}

export interface APIError {
  error: string;
  code: string;
  details?: string[];
}
