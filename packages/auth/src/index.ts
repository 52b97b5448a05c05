export * from './jwt.js';
export { createRateLimiter, type RateLimitConfig, type RateLimitDecision, type RateLimiter } from './rate-limiter.js';
export * from './signature.js';
export * from './token.js';
export type * from './types.js';
