/**
 * HTTP middleware: CORS, bearer API key, rate limiting.
 */

import { timingSafeEqual } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { TokenBucketRateLimiter } from './rate-limiter.js';

/** Paths served without authentication or rate limiting. */
export const PUBLIC_PATHS: ReadonlySet<string> = new Set(['/', '/health']);

export type RequestHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  next: () => void
) => void;

function pathOf(req: IncomingMessage): string {
  return new URL(req.url || '/', 'http://localhost').pathname;
}

function reject(res: ServerResponse, status: number, error: string, code: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ error, code }));
}

/**
 * Constant-time comparison of API keys
 */
export function verifyApiKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export function createAuthMiddleware(apiKey: string): RequestHandler {
  return (req, res, next) => {
    if (PUBLIC_PATHS.has(pathOf(req))) {
      return next();
    }

    const authHeader = req.headers.authorization;
    const providedKey = authHeader?.startsWith('Bearer ') ? authHeader.slice(7) : undefined;

    if (!providedKey || !verifyApiKey(providedKey, apiKey)) {
      return reject(res, 401, 'Unauthorized', 'INVALID_API_KEY');
    }

    next();
  };
}

export function createCorsMiddleware(origins: string[] = ['*']): RequestHandler {
  return (req, res, next) => {
    const origin = req.headers.origin || '*';
    const allowed = origins.includes('*') || origins.includes(origin);

    if (allowed) {
      res.setHeader('Access-Control-Allow-Origin', origins.includes('*') ? '*' : origin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    }

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    next();
  };
}

export function createRateLimitMiddleware(limiter: TokenBucketRateLimiter): RequestHandler {
  return (req, res, next) => {
    if (PUBLIC_PATHS.has(pathOf(req))) {
      return next();
    }

    if (!limiter.tryAcquire()) {
      res.setHeader('Retry-After', String(Math.ceil(limiter.retryAfterMs() / 1000)));
      return reject(res, 429, 'Too many requests', 'RATE_LIMITED');
    }

    next();
  };
}
