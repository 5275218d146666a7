import type { Server } from 'http';
import { createApp } from './app.js';
import { getEnv } from './config/env.js';
import { checkDatabaseHealth, closeDB, connectDB, isDBConfigured } from './config/database.js';
import { closeHttpAgents } from './config/httpClient.js';
import { Architecture } from './models/Architecture.js';
import { createScrapePipeline } from './services/scraping/scrapePipelineFactory.js';
import { logger } from './utils/logger.js';

let httpServer: Server | null = null;

async function startServer(): Promise<void> {
  const env = getEnv();

  let store: Architecture | undefined;
  if (isDBConfigured()) {
    try {
      const db = await connectDB();
      store = new Architecture(db, env.MONGO_COLL_NAME);
      await store.ensureIndexes();
    } catch (error) {
      // The API still serves dry-run scrapes without a database
      logger.error({ error }, 'MongoDB unavailable, starting without persistence');
      store = undefined;
    }
  } else {
    logger.warn('MONGODB_URI not set, scrape results cannot be saved');
  }

  const pipeline = createScrapePipeline(env);
  const app = createApp({
    createScrapeService: pipeline.createService,
    getStore: () => store,
    defaultSources: env.GITHUB_SOURCES,
    checkDatabase: async () => (isDBConfigured() ? (await checkDatabaseHealth()).healthy : null),
  });

  httpServer = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, strategy: pipeline.strategy, persistence: Boolean(store) }, 'Server listening');
  });
}

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  const server = httpServer;
  if (server) {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
  closeHttpAgents();
  await closeDB();
}

startServer().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason: reason instanceof Error ? reason : { reason: String(reason) } }, 'Unhandled promise rejection');
});

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    gracefulShutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, 'Error during shutdown, forcing exit');
        process.exit(1);
      });
  });
}
