/**
 * Query endpoint.
 * POST /api/query: answer a question about the course materials.
 */

import { pipeline, type Handler } from '../middleware/pipeline.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { QueryRequest, QueryResponse } from '../types/api.js';

const querySchema: BodySchema = {
  query: { type: 'string', required: true, maxLength: 4000 },
  session_id: { type: 'string', required: false, maxLength: 200 },
};

// validateBody has already checked the field types
function toQueryRequest(body: Record<string, unknown>): QueryRequest {
  return {
    query: String(body.query),
    ...(typeof body.session_id === 'string' && body.session_id !== '' && { session_id: body.session_id }),
  };
}

export function createQueryHandlers(container: Container) {
  const ask: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody(querySchema)
  )(async (_req, ctx) => {
    const request = toQueryRequest(ctx.body ?? {});
    const sessionId = request.session_id ?? container.assistantService.newSession();

    const { answer, sources } = await container.assistantService.answer(request.query, sessionId);

    const result: QueryResponse = { answer, sources, session_id: sessionId };
    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { ask };
}
