/**
 * Error handler middleware.
 * An AppError becomes its own status and `{ error: { code, message, details? } }`.
 * Anything else, such as a failed model call or a database outage, is logged
 * with its message and answered with an opaque 500.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse } from '../types/api.js';
import type { Middleware } from './pipeline.js';

export function toErrorBody(err: unknown): { status: number; body: ApiErrorResponse } {
  if (err instanceof AppError) {
    return {
      status: err.statusCode,
      body: {
        error: {
          code: err.code,
          message: err.message,
          ...(err.details && { details: err.details }),
        },
      },
    };
  }

  return {
    status: 500,
    body: { error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } },
  };
}

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      const { status, body } = toErrorBody(err);
      if (status >= 500) {
        logProvider.error('Request failed', {
          requestId: ctx.requestId,
          code: body.error.code,
          error: err instanceof Error ? err.message : String(err),
        });
      }
      return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
      });
    }
  };
}
