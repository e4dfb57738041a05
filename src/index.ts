import 'dotenv/config';
import { serve } from '@hono/node-server';
import { config, validateConfig } from './config.js';
import { closeDatabase, createDatabase } from './db/index.js';
import { createApi } from './api/index.js';
import { ModelClient } from './services/ai/clients.js';
import { BrandStore } from './services/brands/index.js';
import { ContentEditor } from './services/generation/editor.js';
import { ContentGenerator } from './services/generation/orchestrator.js';
import { loadTemplates } from './services/generation/templates.js';
import { GenerationHistory } from './services/history.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('server');

async function main() {
  logger.info('Starting Content Studio...');

  // Validate configuration
  validateConfig();

  logger.info('Initializing database...');
  const db = createDatabase(config.database.url);

  const templates = loadTemplates();
  const model = new ModelClient();
  logger.info(`Using ${config.ai.provider} model ${model.modelName}`);

  const app = createApi({
    generator: new ContentGenerator({ model, templates }),
    editor: new ContentEditor({ model, templates }),
    brands: new BrandStore(db),
    history: new GenerationHistory(db),
    usage: model.usage,
  });

  // Start server
  const server = serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  }, (info) => {
    logger.info(`Server running at http://${info.address}:${info.port}`);
    logger.info(`API: http://${info.address}:${info.port}/api`);
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    server.close(() => {
      closeDatabase(db);
      logger.info('Server closed');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
