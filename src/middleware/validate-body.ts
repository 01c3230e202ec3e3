/**
 * Body validation middleware.
 * The request body must be a JSON object matching the schema; on success the
 * parsed object is handed downstream as `ctx.body`, otherwise the request is
 * answered with 400 INVALID_REQUEST without reaching the handler.
 */

import type { ApiErrorResponse } from '../types/api.js';
import type { BodySchema } from '../types/common.js';
import { isRecord, validateFields } from '../validation/fields.js';
import type { Middleware } from './pipeline.js';

type BodyRead =
  | { ok: true; body: Record<string, unknown> }
  | { ok: false; message: string; details?: Record<string, unknown> };

async function readBody(req: Request, schema: BodySchema): Promise<BodyRead> {
  let parsed: unknown;
  try {
    parsed = await req.json();
  } catch {
    return { ok: false, message: 'Request body must be valid JSON' };
  }

  if (!isRecord(parsed)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const errors = validateFields(parsed, schema);
  if (errors.length > 0) {
    return { ok: false, message: errors.join('; '), details: { fields: errors } };
  }
  return { ok: true, body: parsed };
}

export function validateBody(schema: BodySchema): Middleware {
  return (next) => async (req, ctx) => {
    const read = await readBody(req, schema);
    if (read.ok) {
      return next(req, { ...ctx, body: read.body });
    }

    const body: ApiErrorResponse = {
      error: {
        code: 'INVALID_REQUEST',
        message: read.message,
        ...(read.details && { details: read.details }),
      },
    };
    return new Response(JSON.stringify(body), {
      status: 400,
      headers: { 'Content-Type': 'application/json' },
    });
  };
}
