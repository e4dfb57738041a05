import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger as honoLogger } from 'hono/logger';
import type { UsageTracker } from '../services/ai/types.js';
import type { BrandStore } from '../services/brands/index.js';
import type { ContentEditor } from '../services/generation/editor.js';
import type { ContentGenerator } from '../services/generation/orchestrator.js';
import type { GenerationHistory } from '../services/history.js';
import {
  GenerationCancelledError,
  ModelCallError,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

import brandRoutes from './routes/brands.js';
import generationRoutes from './routes/generations.js';
import studioRoutes from './routes/studio.js';

const logger = createLogger('api');

export interface ApiServices {
  generator: ContentGenerator;
  editor: ContentEditor;
  brands: BrandStore;
  history: GenerationHistory;
  usage: UsageTracker;
  /** Clock for export timestamps. */
  now?: () => Date;
}

export interface ApiOptions {
  /** Per-request access log; off in tests. */
  requestLog?: boolean;
}

export function createApi(services: ApiServices, options: ApiOptions = {}) {
  const app = new Hono();

  // Global middleware
  app.use('*', cors());
  if (options.requestLog ?? true) {
    const requestLogger = logger.child('http');
    app.use('*', honoLogger((message) => requestLogger.info(message)));
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.route('/api', studioRoutes(services));
  app.route('/api/generations', generationRoutes(services));
  app.route('/api/brands', brandRoutes(services));

  // Token usage
  app.get('/api/usage', (c) => c.json(services.usage.getStats()));
  app.post('/api/usage/reset', (c) => {
    services.usage.reset();
    return c.json({ success: true });
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, issues: err.issues }, 400);
    }
    if (err instanceof NotFoundError) {
      return c.json({ error: err.message }, 404);
    }
    if (err instanceof ModelCallError) {
      logger.warn('Model call failed', { message: err.message, attempts: err.attempts });
      return c.json({ error: err.message, attempts: err.attempts }, 502);
    }
    if (err instanceof GenerationCancelledError) {
      return c.json({ error: err.message, partial: err.partial }, 503);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}`, err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
