/**
 * lambdacore REST API Server
 *
 * HTTP surface over the IntelligenceSystem. Uses Node.js built-in http module;
 * request bodies are validated with zod before they reach the core.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from 'node:http';
import type { z } from 'zod';
import {
  createAuthMiddleware,
  createCorsMiddleware,
  createRateLimitMiddleware,
  type RequestHandler,
} from './auth.js';
import { TokenBucketRateLimiter } from './rate-limiter.js';
import { createRequestSchemas, type APIError, type APIServerConfig, type HealthResponse, type RequestSchemas } from './types.js';
import type { IntelligenceSystem } from '../core/system.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { LambdaError, ValidationError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { NAME, VERSION } from '../version.js';

const MAX_BODY_BYTES = 1024 * 1024;

export const ENDPOINTS = [
  'GET /',
  'GET /health',
  'POST /api/ground',
  'POST /api/reason',
  'POST /api/reflect',
  'POST /api/process',
  'POST /api/concepts',
  'GET /api/metrics',
  'GET /api/metrics/history',
  'GET /api/requirements',
  'GET /api/cycles',
  'GET /api/records/:id',
];

class HttpError extends LambdaError {
  constructor(public readonly status: number, message: string, code: string) {
    super(message, code, 'request');
    this.name = 'HttpError';
  }
}

export class APIServer {
  private server: Server | null = null;
  private readonly config: Required<APIServerConfig>;
  private readonly schemas: RequestSchemas;
  private middleware: RequestHandler[] = [];
  private startedAt = 0;
  private logger = getLogger();

  constructor(
    private readonly system: IntelligenceSystem,
    config: APIServerConfig,
    private readonly collector: MetricsCollector | null = null,
  ) {
    this.config = {
      port: config.port,
      host: config.host ?? '0.0.0.0',
      apiKey: config.apiKey ?? '',
      corsOrigins: config.corsOrigins ?? ['*'],
      maxQueryLength: config.maxQueryLength ?? 2000,
      rateLimit: config.rateLimit ?? { maxTokens: 60, refillRate: 1, refillIntervalMs: 1000 },
    };
    this.schemas = createRequestSchemas(this.config.maxQueryLength);

    this.middleware.push(createCorsMiddleware(this.config.corsOrigins));
    if (this.config.apiKey) {
      this.middleware.push(createAuthMiddleware(this.config.apiKey));
    }
    this.middleware.push(createRateLimitMiddleware(new TokenBucketRateLimiter(this.config.rateLimit)));
  }

  /** Start listening. Resolves with the base URL (actual port when 0 was requested). */
  async start(): Promise<string> {
    return new Promise((resolve, reject) => {
      this.startedAt = Date.now();

      const server = createServer((req, res) => {
        this.runMiddleware(req, res, 0, () => {
          this.handleRequest(req, res).catch((err: unknown) => {
            this.logger.error({ error: toError(err).message }, 'APIServer: unhandled request failure');
          });
        });
      });
      this.server = server;

      server.on('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        const port = address !== null && typeof address === 'object' ? address.port : this.config.port;
        const host = this.config.host === '0.0.0.0' ? 'localhost' : this.config.host;
        this.logger.info({ port }, 'APIServer: listening');
        resolve(`http://${host}:${port}`);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => resolve());
        this.server = null;
      } else {
        resolve();
      }
    });
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  // ─── Request Handling ─────────────────────────────────────

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');
    const method = req.method?.toUpperCase() || 'GET';
    const path = url.pathname;

    try {
      if (method === 'GET') {
        if (path === '/') return this.sendJSON(res, 200, this.root());
        if (path === '/health') return this.sendJSON(res, 200, this.health());
        if (path === '/api/metrics') return this.sendJSON(res, 200, this.system.getMetrics());
        if (path === '/api/metrics/history') return this.handleMetricsHistory(url, res);
        if (path === '/api/requirements') return this.sendJSON(res, 200, this.system.validateRequirements());
        if (path === '/api/cycles') return this.handleListCycles(url, res);

        const recordMatch = path.match(/^\/api\/records\/([^/]+)$/);
        if (recordMatch) return await this.handleGetRecord(decodeURIComponent(recordMatch[1]), res);
      }

      if (method === 'POST') {
        if (path === '/api/ground') {
          const body = await this.parseBody(req, this.schemas.ground);
          return this.sendJSON(res, 200, this.system.ground(body.statement, body.context));
        }
        if (path === '/api/reason') {
          const body = await this.parseBody(req, this.schemas.reason);
          return this.sendJSON(res, 200, this.system.reasonAbout(body.query, body.context, body.depth));
        }
        if (path === '/api/reflect') {
          const body = await this.parseBody(req, this.schemas.reflect);
          return this.sendJSON(res, 200, await this.system.reflect(body.query, body.context));
        }
        if (path === '/api/process') {
          const body = await this.parseBody(req, this.schemas.process);
          return this.sendJSON(res, 200, await this.system.process(body.query));
        }
        if (path === '/api/concepts') {
          const body = await this.parseBody(req, this.schemas.concept);
          await this.system.addRelation(body.source, body.target);
          return this.sendJSON(res, 201, {
            source: body.source,
            target: body.target,
            conceptCount: this.system.reasoning.getStats().conceptCount,
          });
        }
      }

      this.sendError(res, 404, { error: 'Not found', code: 'NOT_FOUND' });
    } catch (err) {
      if (err instanceof ValidationError) {
        return this.sendError(res, 400, { error: err.message, code: err.code, details: err.issues });
      }
      if (err instanceof HttpError) {
        return this.sendError(res, err.status, { error: err.message, code: err.code });
      }
      const error = toError(err);
      this.logger.error({ path, error: error.message }, 'APIServer: request failed');
      this.sendError(res, 500, { error: error.message, code: 'INTERNAL_ERROR' });
    }
  }

  private root(): { name: string; version: string; status: string; endpoints: string[] } {
    return { name: NAME, version: VERSION, status: 'running', endpoints: ENDPOINTS };
  }

  private health(): HealthResponse {
    return {
      status: 'ok',
      version: VERSION,
      uptime: Date.now() - this.startedAt,
      lambdaTotal: this.system.state.lambdaTotal,
      cyclesCompleted: this.system.state.cycles.length,
    };
  }

  private handleListCycles(url: URL, res: ServerResponse): void {
    const limit = parseInt(url.searchParams.get('limit') || '20', 10);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('Invalid limit', ['limit: must be a positive integer']);
    }
    const cycles = this.system.getCycles(limit).map(c => ({
      id: c.id,
      index: c.index,
      query: c.query,
      levelReached: c.levelReached,
      emergence: c.emergence,
      lambdaImpact: c.lambdaImpact,
      lambdaAfter: c.lambdaAfter,
      improvements: c.improvements.map(i => i.kind),
      hash: c.hash,
      timestamp: c.timestamp,
    }));
    this.sendJSON(res, 200, { cycles, total: this.system.state.cycles.length });
  }

  private handleMetricsHistory(url: URL, res: ServerResponse): void {
    if (!this.collector) {
      return this.sendError(res, 503, { error: 'Metrics sampling is not enabled', code: 'METRICS_DISABLED' });
    }

    const sinceParam = url.searchParams.get('since');
    const since = sinceParam === null ? undefined : Number(sinceParam);
    if (since !== undefined && !Number.isFinite(since)) {
      throw new ValidationError('Invalid since', ['since: must be a timestamp in milliseconds']);
    }

    const samples = this.collector.getSamples().filter(s => since === undefined || s.timestamp >= since);
    this.sendJSON(res, 200, { aggregate: this.collector.aggregate(since), samples });
  }

  private async handleGetRecord(id: string, res: ServerResponse): Promise<void> {
    const record = await this.system.getRecord(id);
    if (!record) {
      return this.sendError(res, 404, { error: 'Record not found', code: 'NOT_FOUND' });
    }
    this.sendJSON(res, 200, record);
  }

  // ─── Helpers ──────────────────────────────────────────────

  private runMiddleware(req: IncomingMessage, res: ServerResponse, index: number, done: () => void): void {
    if (index >= this.middleware.length) return done();
    this.middleware[index](req, res, () => this.runMiddleware(req, res, index + 1, done));
  }

  private async parseBody<S extends z.ZodTypeAny>(req: IncomingMessage, schema: S): Promise<z.output<S>> {
    const raw = await this.readBody(req);

    let json: unknown;
    try {
      json = raw.length > 0 ? JSON.parse(raw) : {};
    } catch {
      throw new HttpError(400, 'Invalid JSON body', 'INVALID_JSON');
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`);
      throw new ValidationError('Invalid request body', issues);
    }
    return parsed.data;
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      const onData = (chunk: Buffer): void => {
        size += chunk.length;
        if (size > MAX_BODY_BYTES) {
          // Drain the rest so the 413 reaches the client over the open socket
          req.off('data', onData);
          req.resume();
          reject(new HttpError(413, 'Request body too large', 'PAYLOAD_TOO_LARGE'));
          return;
        }
        chunks.push(chunk);
      };
      req.on('data', onData);
      req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
      req.on('error', reject);
    });
  }

  private sendError(res: ServerResponse, status: number, error: APIError): void {
    this.sendJSON(res, status, error);
  }

  private sendJSON(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }
}
