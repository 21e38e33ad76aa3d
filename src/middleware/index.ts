export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler, createErrorHandler } from './error-handler.js';
export { validateBody } from './validate-body.js';
export type { BodyHandler } from './validate-body.js';
export {
  createRateLimitMiddleware,
  RATE_LIMITS,
  ipKey,
  assessmentKey,
  globalKey,
} from './rate-limit.js';
export type { RateLimitConfig } from './rate-limit.js';
export { createLoggingMiddleware } from './logging.js';
