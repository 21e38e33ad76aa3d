/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become
 * 500 and are logged when a log provider is supplied.
 */

import { AppError, RateLimitError, errorMessage } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createErrorHandler(logProvider?: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          const body: ApiErrorResponse = {
            error: {
              code: err.code,
              message: err.message,
              ...(err.details && { details: err.details }),
            },
          };

          const headers: Record<string, string> = { ...JSON_HEADERS };

          if (err instanceof RateLimitError && err.details?.retryAfter) {
            headers['Retry-After'] = String(err.details.retryAfter);
          }

          return new Response(JSON.stringify(body), {
            status: err.statusCode,
            headers,
          });
        }

        logProvider?.error('http.unhandled_error', {
          method: req.method,
          path: new URL(req.url).pathname,
          error: errorMessage(err),
        });

        // Unknown error — don't leak internals
        const body: ApiErrorResponse = {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'An unexpected error occurred',
          },
        };

        return new Response(JSON.stringify(body), {
          status: 500,
          headers: JSON_HEADERS,
        });
      }
    };
  };
}

/** Error handler without logging. */
export const errorHandler: Middleware = createErrorHandler();
