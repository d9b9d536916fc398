/**
 * quota-relay application entry point.
 * Bootstraps configuration, credential pool, rate limiter, cache, upstream
 * client and dispatcher, creates the Hono application, and starts the HTTP server.
 */

import { serve } from '@hono/node-server';
import { logger } from './shared/logger.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { CredentialPool } from './credentials/pool.js';
import { RateLimiter } from './ratelimit/limiter.js';
import { retryPolicyFromConfig } from './ratelimit/retry.js';
import { ResponseCache } from './cache/response-cache.js';
import { buildRegistry } from './upstream/registry.js';
import { HttpUpstreamClient } from './upstream/http-client.js';
import { Dispatcher } from './dispatch/dispatcher.js';
import { initializeDatabase } from './persistence/db.js';
import { migrateSchema } from './persistence/schema.js';
import { DispatchLogger } from './persistence/dispatch-logger.js';
import { UsageAggregator } from './persistence/aggregator.js';
import { createApp, VERSION } from './app.js';

// --- Bootstrap ---

logger.info(`quota-relay v${VERSION} starting...`);

const configPath = resolveConfigPath();
const config = loadConfig(configPath);

// Update logger level from config
logger.level = config.settings.logLevel;

const registry = buildRegistry(config.operations);

const pool = new CredentialPool(config.credentials, {
  strategy: config.rotation.strategy,
  dailyQuota: config.rotation.dailyQuota,
  hourlyQuota: config.rotation.hourlyQuota,
  quotaResetUtcHour: config.rotation.quotaResetUtcHour,
});

const limiter = new RateLimiter({
  minIntervalMs: config.rateLimit.minIntervalSeconds * 1000,
  retry: retryPolicyFromConfig(config.rateLimit),
});

const cache = new ResponseCache({
  ttlSeconds: config.cache.ttlSeconds,
  defaultTtlSeconds: config.cache.defaultTtlSeconds,
});
if (config.cache.sweepIntervalSeconds !== undefined) {
  cache.startSweeper(config.cache.sweepIntervalSeconds * 1000);
}

const dispatcher = new Dispatcher({
  registry,
  pool,
  limiter,
  cache,
  client: new HttpUpstreamClient(config.upstream),
  config: config.dispatch,
});

// --- Initialize observability database ---
const db = initializeDatabase(config.settings.dbPath);
migrateSchema(db);
const dispatchLogger = new DispatchLogger(db);
dispatchLogger.startPruner(config.settings.logRetentionDays);
const aggregator = new UsageAggregator(db);

// --- Create Hono application ---

const app = createApp({
  apiKeys: config.settings.apiKeys,
  dispatcher,
  registry,
  dispatchLogger,
  aggregator,
});

// --- Start server ---

const server = serve(
  {
    fetch: app.fetch,
    port: config.settings.port,
  },
  (info) => {
    logger.info({ port: info.port }, `quota-relay listening on port ${info.port}`);
    logger.info(
      {
        credentials: pool.size,
        strategy: pool.strategyName,
        operations: registry.size,
        upstream: config.upstream.baseUrl,
        dbPath: config.settings.dbPath,
      },
      'Ready',
    );
  },
);

// --- Graceful shutdown ---

const shutdown = () => {
  logger.info('Shutting down...');
  cache.shutdown();
  dispatchLogger.stopPruner();
  db.close();
  logger.info('Database closed');
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// --- Unhandled rejection handler ---

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});
