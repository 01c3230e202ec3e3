/**
 * Process entry point: load course documents, then serve the API.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { getProductionContainer } from './container.production.js';
import { createHttpServer } from './server.js';

async function main(): Promise<void> {
  const container = getProductionContainer();
  const { config, logProvider } = container;

  const docsPath = resolve(config.docsPath);
  if (existsSync(docsPath)) {
    logProvider.info('Loading initial documents', { docsPath });
    const { courseCount, chunkCount } = await container.assistantService.addFolder(docsPath);
    logProvider.info('Loaded courses', { courseCount, chunkCount });
  } else {
    logProvider.warn('Docs folder not found, starting with the stored catalog', { docsPath });
  }

  const server = createHttpServer(container);
  server.listen(config.port, () => {
    logProvider.info('Course assistant listening', { port: config.port });
  });

  const shutdown = () => {
    server.close(() => {
      logProvider.flush().finally(() => process.exit(0));
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
