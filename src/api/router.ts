/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Works with any runtime built on the Fetch Request/Response types.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { ApiErrorResponse, HealthResponse } from '../types/api.js';
import { createCourseHandlers } from './courses.js';
import { createQueryHandlers } from './query.js';
import { createSessionHandlers } from './sessions.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const health: Handler = async () => {
  const body: HealthResponse = { status: 'ok' };
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
};

export function createRouter(container: Container) {
  const query = createQueryHandlers(container);
  const courses = createCourseHandlers(container);
  const sessions = createSessionHandlers(container);

  const routes: Route[] = [
    { method: 'POST', pattern: /^\/api\/query\/?$/, handler: query.ask },
    { method: 'GET', pattern: /^\/api\/courses\/?$/, handler: courses.stats },
    { method: 'DELETE', pattern: /^\/api\/sessions\/[^/]+\/?$/, handler: sessions.clear },
    { method: 'GET', pattern: /^\/api\/health\/?$/, handler: health },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders() });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    const allowed = routes
      .filter((r) => r.pattern.test(url.pathname))
      .map((r) => r.method);

    if (allowed.length > 0) {
      return jsonError(405, 'INVALID_REQUEST', `Method ${method} not allowed`, {
        Allow: allowed.join(', '),
      });
    }

    return jsonError(404, 'NOT_FOUND', `No route matches ${method} ${url.pathname}`);
  };

  return { handle, routes };
}

function jsonError(
  status: number,
  code: string,
  message: string,
  extraHeaders: Record<string, string> = {}
): Response {
  const body: ApiErrorResponse = { error: { code, message } };
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...extraHeaders, ...corsHeaders() },
  });
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
