import { MongoClient, ServerApiVersion, type Db, type MongoClientOptions } from 'mongodb';
import { logger } from '../utils/logger.js';
import { calculateExponentialBackoff, sleep } from '../utils/retry.js';
import { ServiceUnavailableError } from '../types/errors.js';
import { getEnv } from './env.js';

const MAX_RETRIES = 3;
const INITIAL_RETRY_DELAY = 1000;
const MAX_RETRY_DELAY = 10000;

const clientOptions: MongoClientOptions = {
  serverApi: {
    version: ServerApiVersion.v1,
    strict: false,
    deprecationErrors: true,
  },
  maxPoolSize: 10,
  minPoolSize: 1,
  serverSelectionTimeoutMS: 10000,
  connectTimeoutMS: 10000,
  socketTimeoutMS: 45000,
};

let client: MongoClient | null = null;
let db: Db | null = null;

/**
 * Hide credentials before a URI reaches the logs
 */
function redactMongoUri(uri: string): string {
  return uri.replace(/\/\/([^:/@]+):([^@]+)@/, '//$1:***@');
}

/**
 * Network-level failures worth another connection attempt
 */
function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return (
    error.name === 'MongoNetworkError' ||
    error.name === 'MongoServerSelectionError' ||
    message.includes('econnrefused') ||
    message.includes('etimedout') ||
    message.includes('timed out')
  );
}

/**
 * Whether a MongoDB URI is configured at all. Without one, scrape passes can only run dry.
 */
export function isDBConfigured(): boolean {
  return Boolean(getEnv().MONGODB_URI);
}

export async function connectDB(): Promise<Db> {
  if (db) {
    return db;
  }
  const env = getEnv();
  if (!env.MONGODB_URI) {
    throw new ServiceUnavailableError('MONGODB_URI is not configured');
  }

  let lastError: Error | null = null;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      const delay = calculateExponentialBackoff(attempt - 1, INITIAL_RETRY_DELAY, 2, MAX_RETRY_DELAY);
      logger.warn({ attempt, maxRetries: MAX_RETRIES, delay }, 'Retrying database connection...');
      await sleep(delay);
    }

    const candidate = new MongoClient(env.MONGODB_URI, clientOptions);
    try {
      await candidate.connect();
      const database = candidate.db(env.MONGO_DB_NAME);
      await database.command({ ping: 1 });
      client = candidate;
      db = database;
      logger.info(
        { uri: redactMongoUri(env.MONGODB_URI), dbName: env.MONGO_DB_NAME, attempt: attempt + 1 },
        'Connected to MongoDB'
      );
      return database;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      await candidate.close().catch((closeError: unknown) => {
        logger.debug({ error: closeError }, 'Error closing failed MongoDB client');
      });
      if (!isTransientError(error)) {
        logger.error({ error: lastError }, 'MongoDB connection failed with permanent error');
        throw lastError;
      }
    }
  }

  logger.error({ error: lastError, maxRetries: MAX_RETRIES }, 'MongoDB connection failed after retries');
  throw lastError ?? new Error('MongoDB connection failed');
}

export async function closeDB(): Promise<void> {
  const current = client;
  client = null;
  db = null;
  if (current) {
    await current.close();
    logger.info('MongoDB connection closed');
  }
}

/**
 * Check database health by performing a ping
 */
export async function checkDatabaseHealth(): Promise<{ healthy: boolean; latency?: number; error?: string }> {
  if (!db) {
    return { healthy: false, error: 'Database not initialized' };
  }
  const startTime = Date.now();
  try {
    await db.command({ ping: 1 });
    return { healthy: true, latency: Date.now() - startTime };
  } catch (error) {
    return { healthy: false, error: error instanceof Error ? error.message : String(error) };
  }
}
