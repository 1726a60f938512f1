import type { Server } from 'node:http';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { logger } from './lib/logger.js';
import { env, validateProductionEnv } from './config/env.js';
import { anomalyConfigFromEnv } from './config/anomaly.js';
import { loadChainsConfig } from './config/chains.js';
import { getDb } from './lib/db.js';
import { PgIndexerStore } from './repositories/pg-store.js';
import { HttpBlockSource, blockSourceUrls } from './services/block-source.js';
import { ChainHealthRegistry } from './services/chain-health.js';
import { IndexerService } from './services/indexer.js';

// ─── Startup validation ──────────────────────────────────────────
// Crash immediately if critical env vars are missing in production.
validateProductionEnv();

const chains = loadChainsConfig(env.CHAINS_CONFIG_PATH);
const anomaly = anomalyConfigFromEnv(env);
const db = getDb();
const store = new PgIndexerStore(db);
const health = new ChainHealthRegistry();
const urls = blockSourceUrls(env.BLOCK_SOURCE_URL, env.BLOCK_SOURCE_URLS_FALLBACK);

const indexerService = new IndexerService({
  chains,
  store,
  health,
  anomaly,
  retry: {
    attempts: env.STORE_RETRY_ATTEMPTS,
    baseDelayMs: env.STORE_RETRY_BASE_MS,
    maxDelayMs: env.STORE_RETRY_MAX_MS,
  },
  createSource: (chain, log) =>
    new HttpBlockSource({ chainId: chain.chainId, urls, timeoutMs: env.BLOCK_SOURCE_TIMEOUT_MS, logger: log }),
});

logger.info({ chains: chains.map((c) => c.name), port: env.HEALTH_PORT }, 'Starting Tidemark indexer');

async function initServices() {
  if (env.ENABLE_INDEXER !== 'true') {
    logger.info('Indexer disabled (ENABLE_INDEXER != "true"). Set ENABLE_INDEXER=true to enable.');
    return;
  }
  await indexerService.init();
  indexerService.start();
}

const server = serve(
  {
    fetch: createApp({ store, health }).fetch,
    port: env.HEALTH_PORT,
    hostname: env.HEALTH_HOST,
  },
  (info) => {
    logger.info(`Health endpoint at http://${env.HEALTH_HOST}:${info.port}/health`);
  },
);

initServices().catch((err: unknown) => {
  logger.error({ err }, 'Fatal: indexer initialization failed');
  void gracefulShutdown('initFailure', 1);
});

// ─── Graceful Shutdown ──────────────────────────────────────────
// Watchers stop first so no tick starts mid-shutdown; an in-flight block
// transaction either commits or rolls back with the pool.

let shuttingDown = false;

async function gracefulShutdown(signal: string, exitCode = 0) {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info({ signal }, 'Received shutdown signal — starting graceful shutdown');

  const SHUTDOWN_TIMEOUT_MS = 15_000;
  const shutdownTimer = setTimeout(() => {
    logger.error('Graceful shutdown timed out — forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    indexerService.stop();

    // Stop accepting new connections
    await new Promise<void>((resolve) => {
      (server as Server).close(() => {
        logger.info('HTTP server closed');
        resolve();
      });
    });

    await db.$client.end({ timeout: 5 });
    logger.info('Database pool closed');

    clearTimeout(shutdownTimer);
    logger.info('Graceful shutdown complete');
    process.exit(exitCode);
  } catch (err) {
    logger.error({ err }, 'Error during graceful shutdown');
    clearTimeout(shutdownTimer);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Catch unhandled rejections — log them instead of crashing
process.on('unhandledRejection', (reason, promise) => {
  logger.error({ reason, promise: String(promise) }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Uncaught exception — shutting down');
  void gracefulShutdown('uncaughtException', 1);
});
