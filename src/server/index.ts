import './config/loadDotenv.js';
import type { Server } from 'http';
import { validateEnv, isNotionConfigured, type Env } from './config/env.js';
import { closeHttpAgents } from './config/httpClient.js';
import { createApp } from './app.js';
import { createNotionApiClient } from './services/external/NotionApiClient.js';
import { NotionPageService } from './services/notion/NotionPageService.js';
import { BookIngestionService } from './services/notion/BookIngestionService.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';
import { logger } from './utils/logger.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

// Fail fast if config is invalid
function loadEnv(): Env {
  try {
    const env = validateEnv();
    logger.info('Environment variables validated successfully');
    return env;
  } catch (error) {
    logger.fatal({ error }, 'Environment variable validation failed');
    process.exit(1);
  }
}

function main(): void {
  const env = loadEnv();

  if (!isNotionConfigured(env)) {
    logger.warn('NOTION_API_KEY is not set; Notion endpoints will answer 503 until it is configured');
  }

  const notionClient = createNotionApiClient(env);
  const app = createApp({
    env,
    pageService: new NotionPageService(notionClient),
    bookIngestionService: new BookIngestionService(notionClient, {
      concurrency: env.NOTION_INGEST_CONCURRENCY,
    }),
  });

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server started successfully and listening');
  });

  server.on('error', (error) => {
    logger.fatal({ error, port: env.PORT }, 'HTTP server error');
    process.exit(1);
  });

  const shutdownCoordinator = new ShutdownCoordinator();
  shutdownCoordinator.register('http-server', () => closeServer(server));
  shutdownCoordinator.register('http-agents', closeHttpAgents);

  const gracefulShutdown = (signal: NodeJS.Signals): void => {
    shutdownCoordinator
      .shutdown(signal)
      .then((finished) => process.exit(finished ? 0 : 1))
      .catch((error: unknown) => {
        logger.error({ error, signal }, 'Error during shutdown - forcing exit');
        process.exit(1);
      });
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });
}

main();
