export { APIServer, ENDPOINTS } from './server.js';
export { verifyApiKey, createAuthMiddleware, createCorsMiddleware, createRateLimitMiddleware } from './auth.js';
export { TokenBucketRateLimiter, type RateLimiterOptions } from './rate-limiter.js';
export { createRequestSchemas } from './types.js';
export type { APIServerConfig, HealthResponse, APIError, RequestSchemas } from './types.js';
