/**
 * Session endpoints.
 * DELETE /api/sessions/:id: forget a session's conversation history.
 * Unknown ids are accepted; the call is idempotent.
 */

import { pipeline, type Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';

export function createSessionHandlers(container: Container) {
  const clear: Handler = pipeline(container.logging, container.errors)(async (req) => {
    // /api/sessions/:id
    const parts = new URL(req.url).pathname.split('/').filter(Boolean);
    const id = decodeSegment(parts[parts.length - 1] ?? '');
    if (id === '') {
      throw new ValidationError('Session id is required');
    }

    container.assistantService.clearSession(id);
    return new Response(null, { status: 204 });
  });

  return { clear };
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError('Session id is not valid URL encoding', { segment });
  }
}
