/**
 * Node HTTP adapter for the Fetch-style router.
 * Converts IncomingMessage to a Request and writes the Response back.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createRouter } from './api/router.js';
import type { Container } from './container.js';
import { AppError, PayloadTooLargeError } from './errors.js';
import { toErrorBody } from './middleware/error-handler.js';

export const MAX_BODY_BYTES = 64 * 1024;

export async function toWebRequest(
  req: IncomingMessage,
  origin: string,
  maxBodyBytes = MAX_BODY_BYTES
): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers.set(key, Array.isArray(value) ? value.join(', ') : value);
  }

  const method = req.method ?? 'GET';
  let body: Buffer | undefined;
  if (method !== 'GET' && method !== 'HEAD') {
    // Past the limit the body is drained but no longer buffered
    const chunks: Buffer[] = [];
    let received = 0;
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      received += buffer.length;
      if (received <= maxBodyBytes) chunks.push(buffer);
    }
    if (received > maxBodyBytes) throw new PayloadTooLargeError(maxBodyBytes);
    body = chunks.length > 0 ? Buffer.concat(chunks) : undefined;
  }

  return new Request(new URL(req.url ?? '/', origin), { method, headers, body });
}

export async function writeWebResponse(response: Response, res: ServerResponse): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);
  const body = Buffer.from(await response.arrayBuffer());
  res.end(body);
}

export function createHttpServer(container: Container): Server {
  const router = createRouter(container);
  const origin = `http://localhost:${container.config.port}`;

  return createServer((req, res) => {
    toWebRequest(req, origin)
      .then((request) => router.handle(request, {}))
      .then((response) => writeWebResponse(response, res))
      .catch((err: unknown) => {
        if (err instanceof AppError && !res.headersSent) {
          const { status, body } = toErrorBody(err);
          res.writeHead(status, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(body));
          return;
        }
        container.logProvider.error('Unhandled request failure', {
          error: err instanceof Error ? err.message : String(err),
        });
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
        }
        res.end(JSON.stringify({ error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } }));
      });
  });
}
