/**
 * Request logging middleware.
 * One event per request with method, path, status, duration and request id.
 * 5xx and thrown errors log at error, 4xx at warn, the rest at info.
 */

import { randomUUID } from 'node:crypto';
import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Middleware } from './pipeline.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    const requestId = ctx.requestId ?? req.headers.get(REQUEST_ID_HEADER) ?? randomUUID();
    const method = req.method;
    const path = new URL(req.url).pathname;
    const start = performance.now();

    const record = (status: number, error?: unknown): void => {
      const durationMs = Math.round(performance.now() - start);
      const event: RequestLogEvent = {
        level: error === undefined ? levelForStatus(status) : 'error',
        message: `${method} ${path} → ${status} (${durationMs}ms)`,
        method,
        path,
        status,
        durationMs,
        requestId,
        ...(error !== undefined && {
          fields: { error: error instanceof Error ? error.message : String(error) },
        }),
      };
      logProvider.log(event);
    };

    let response: Response;
    try {
      response = await next(req, { ...ctx, requestId });
    } catch (err) {
      record(500, err);
      throw err;
    }

    record(response.status);
    return response;
  };
}
