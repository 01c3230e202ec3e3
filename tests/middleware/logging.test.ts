import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware, levelForStatus } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { LogEvent, RequestLogEvent } from '../../src/providers/ILogProvider.js';

function makeRequest(method: string, path: string, headers?: Record<string, string>): Request {
  return new Request(`https://example.com${path}`, { method, headers });
}

function isRequestLogEvent(event: LogEvent | undefined): event is RequestLogEvent {
  return event !== undefined && 'method' in event && 'status' in event;
}

function requestEvent(provider: ConsoleLogProvider, index = 0): RequestLogEvent {
  const event = provider.events[index];
  if (!isRequestLogEvent(event)) {
    throw new Error(`No request log event at index ${index}`);
  }
  return event;
}

const ctx: HandlerContext = {};

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  it('should log a successful request', async () => {
    const handler: Handler = async () => new Response(JSON.stringify({ ok: true }), { status: 200 });

    const response = await middleware(handler)(makeRequest('GET', '/api/courses'), ctx);

    expect(response.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);

    const event = requestEvent(logProvider);
    expect(event.level).toBe('info');
    expect(event.method).toBe('GET');
    expect(event.path).toBe('/api/courses');
    expect(event.status).toBe(200);
    expect(event.durationMs).toBeGreaterThanOrEqual(0);
    expect(event.message).toBe(`GET /api/courses → 200 (${event.durationMs}ms)`);
  });

  it('should pass through the response unmodified', async () => {
    const body = JSON.stringify({ answer: 'test' });
    const handler: Handler = async () =>
      new Response(body, {
        status: 200,
        headers: { 'Content-Type': 'application/json', 'X-Custom': 'yes' },
      });

    const response = await middleware(handler)(makeRequest('POST', '/api/query'), ctx);

    expect(response.headers.get('X-Custom')).toBe('yes');
    expect(await response.text()).toBe(body);
  });

  it('should log 4xx responses at warn level', async () => {
    const handler: Handler = async () => new Response(null, { status: 400 });

    await middleware(handler)(makeRequest('POST', '/api/query'), ctx);

    const event = requestEvent(logProvider);
    expect(event.level).toBe('warn');
    expect(event.status).toBe(400);
  });

  it('should log 5xx responses at error level', async () => {
    const handler: Handler = async () => new Response('Internal Error', { status: 500 });

    await middleware(handler)(makeRequest('POST', '/api/query'), ctx);

    expect(requestEvent(logProvider).level).toBe('error');
  });

  it('should log 204 responses at info level', async () => {
    const handler: Handler = async () => new Response(null, { status: 204 });

    await middleware(handler)(makeRequest('DELETE', '/api/sessions/session_1'), ctx);

    expect(requestEvent(logProvider).level).toBe('info');
  });

  it('should measure request duration', async () => {
    const handler: Handler = async () => {
      await new Promise((r) => setTimeout(r, 20));
      return new Response(null, { status: 200 });
    };

    await middleware(handler)(makeRequest('GET', '/api/courses'), ctx);

    expect(requestEvent(logProvider).durationMs).toBeGreaterThanOrEqual(15);
  });

  it('should log and re-throw if the handler throws', async () => {
    const handler: Handler = async () => {
      throw new Error('boom');
    };

    await expect(middleware(handler)(makeRequest('POST', '/api/query'), ctx)).rejects.toThrow('boom');

    expect(logProvider.events).toHaveLength(1);
    const event = requestEvent(logProvider);
    expect(event.level).toBe('error');
    expect(event.status).toBe(500);
    expect(event.fields).toEqual({ error: 'boom' });
  });

  it('should log path without query parameters', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });

    await middleware(handler)(makeRequest('GET', '/api/courses?foo=bar'), ctx);

    expect(requestEvent(logProvider).path).toBe('/api/courses');
  });

  // --- request ids ---

  it('should assign a request id and hand it downstream', async () => {
    let seen: string | undefined;
    const handler: Handler = async (_req, handlerCtx) => {
      seen = handlerCtx.requestId;
      return new Response(null, { status: 200 });
    };

    await middleware(handler)(makeRequest('GET', '/api/health'), ctx);

    expect(seen).toMatch(/^[0-9a-f-]{36}$/);
    expect(requestEvent(logProvider).requestId).toBe(seen);
  });

  it('should reuse an incoming X-Request-Id', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });

    await middleware(handler)(makeRequest('GET', '/api/health', { 'X-Request-Id': 'trace-42' }), ctx);

    expect(requestEvent(logProvider).requestId).toBe('trace-42');
  });
});

describe('levelForStatus', () => {
  it('should map status classes to levels', () => {
    expect(levelForStatus(200)).toBe('info');
    expect(levelForStatus(302)).toBe('info');
    expect(levelForStatus(404)).toBe('warn');
    expect(levelForStatus(502)).toBe('error');
  });
});
