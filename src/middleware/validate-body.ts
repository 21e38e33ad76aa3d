/**
 * Body validation.
 * Parses the JSON body against a zod schema and hands the typed result to
 * the handler. Returns 400 with field-level errors if validation fails.
 */

import type { z } from 'zod';
import type { Handler, HandlerContext } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export type BodyHandler<T> = (
  req: Request,
  ctx: HandlerContext,
  body: T
) => Promise<Response>;

export function validateBody<S extends z.ZodTypeAny>(
  schema: S,
  handler: BodyHandler<z.output<S>>
): Handler {
  return async (req, ctx) => {
    let raw: unknown;

    try {
      raw = await req.json();
    } catch {
      return errorResponse('Request body must be valid JSON');
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const errors = parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      return errorResponse(errors.join('; '), { fields: errors });
    }

    return handler(req, ctx, parsed.data);
  };
}

function errorResponse(
  message: string,
  details?: Record<string, unknown>
): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'INVALID_REQUEST',
        message,
        ...(details && { details }),
      },
    }),
    { status: 400, headers: JSON_HEADERS }
  );
}
