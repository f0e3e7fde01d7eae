/**
 * Express application factory
 *
 * Builds the app around already constructed services so tests can hand in fakes.
 */
import express, { type Express } from 'express';
import { setupMiddleware } from './config/middlewareConfig.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createNotionRouter } from './routes/notionRoutes.js';
import { isNotionConfigured, type Env } from './config/env.js';
import type { NotionPageService } from './services/notion/NotionPageService.js';
import type { BookIngestionService } from './services/notion/BookIngestionService.js';

export interface AppDependencies {
  env: Env;
  pageService: NotionPageService;
  bookIngestionService: BookIngestionService;
}

export function createApp({ env, pageService, bookIngestionService }: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  setupMiddleware(app, env);

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/v1/notion', createNotionRouter({
    pageService,
    bookIngestionService,
    isConfigured: () => isNotionConfigured(env),
  }));

  // Must stay last
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
