import { describe, it, expect } from 'vitest';
import { validateBody } from '../../src/middleware/validate-body.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { BodySchema } from '../../src/types/common.js';

describe('validateBody', () => {
  const ctx: HandlerContext = {};

  const echoHandler: Handler = async (_req, handlerCtx) =>
    new Response(JSON.stringify(handlerCtx.body ?? null), { status: 200 });

  function makeReq(body: unknown): Request {
    return new Request('http://test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  const schema: BodySchema = {
    query: { type: 'string', required: true, maxLength: 50 },
    limit: { type: 'integer', required: false, min: 1, max: 10 },
    verbose: { type: 'boolean', required: false },
    tags: { type: 'array', required: false },
  };

  it('should hand the parsed body to the handler', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ query: 'What is MCP?', limit: 3, verbose: true, tags: ['a'] }), ctx);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ query: 'What is MCP?', limit: 3, verbose: true, tags: ['a'] });
  });

  it('should pass with only required fields', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ query: 'x' }), ctx);

    expect(res.status).toBe(200);
  });

  it('should reject missing required field with field details', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ limit: 2 }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'query is required',
        details: { fields: ['query is required'] },
      },
    });
  });

  it('should join several field errors', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ query: 123, limit: 0 }), ctx);

    expect(await res.json()).toMatchObject({
      error: { message: 'query must be a string; limit must be at least 1' },
    });
  });

  it('should reject a fractional integer', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ query: 'x', limit: 2.5 }), ctx);

    expect(await res.json()).toMatchObject({ error: { message: 'limit must be an integer' } });
  });

  it('should reject string exceeding maxLength', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ query: 'a'.repeat(51) }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'query must be 50 characters or less' } });
  });

  it('should reject number above max', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ query: 'x', limit: 11 }), ctx);

    expect(res.status).toBe(400);
  });

  it('should reject non-JSON body', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(new Request('http://test', { method: 'POST', body: 'not json' }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Request body must be valid JSON' },
    });
  });

  it('should reject a JSON array body', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq(['query']), ctx);

    expect(await res.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Request body must be a JSON object' },
    });
  });

  it('should validate enum values', async () => {
    const enumSchema: BodySchema = {
      level: { type: 'string', required: true, enum: ['debug', 'info'] },
    };
    const wrapped = validateBody(enumSchema)(echoHandler);

    const good = await wrapped(makeReq({ level: 'info' }), ctx);
    expect(good.status).toBe(200);

    const bad = await wrapped(makeReq({ level: 'trace' }), ctx);
    expect(bad.status).toBe(400);
  });
});
