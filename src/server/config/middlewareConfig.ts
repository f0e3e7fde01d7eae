/**
 * Middleware Configuration
 *
 * Configures all Express middleware that runs before the routes.
 */

import type { Express } from 'express';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestIdMiddleware } from '../middleware/requestId.js';
import { getCorsOptions } from './corsConfig.js';
import type { Env } from './env.js';

/**
 * Setup all application middleware
 */
export function setupMiddleware(app: Express, env: Env): void {
  // 1. Request ID and logging context - must be first
  app.use(requestIdMiddleware);

  // 2. CORS - before other middleware that might set headers
  app.use(cors(getCorsOptions(env)));

  // 3. Security headers
  app.use(helmet());

  // 4. JSON body parsing
  app.use(express.json({ limit: '1mb' }));
}
