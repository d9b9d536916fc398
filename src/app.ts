/**
 * Hono application assembly.
 * Wires routes and middleware around an already-built dispatcher so the
 * bootstrap and the tests share one definition of the HTTP surface.
 */

import { Hono } from 'hono';
import { createAuthMiddleware } from './api/middleware/auth.js';
import { errorHandler } from './api/middleware/error-handler.js';
import { createHealthRoutes } from './api/routes/health.js';
import { createOpsRoutes } from './api/routes/ops.js';
import { createBatchRoutes } from './api/routes/batch.js';
import { createCacheRoutes } from './api/routes/cache.js';
import { createKeyRoutes } from './api/routes/keys.js';
import { createStatsRoutes } from './api/routes/stats.js';
import type { Dispatcher } from './dispatch/dispatcher.js';
import type { OperationRegistry } from './upstream/registry.js';
import type { DispatchLogger } from './persistence/dispatch-logger.js';
import type { UsageAggregator } from './persistence/aggregator.js';

export const VERSION = '0.1.0';

export interface AppDeps {
  apiKeys: string[];
  dispatcher: Dispatcher;
  registry: OperationRegistry;
  dispatchLogger: DispatchLogger;
  aggregator: UsageAggregator;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // Global error handler
  app.onError(errorHandler);

  // Health route (no auth required)
  app.route('/health', createHealthRoutes(deps.dispatcher, deps.registry, VERSION));

  // Auth-protected v1 routes
  const v1 = new Hono();
  v1.use('*', createAuthMiddleware(deps.apiKeys));

  v1.route('/ops', createOpsRoutes(deps.dispatcher, deps.dispatchLogger));
  v1.route('/batch', createBatchRoutes(deps.dispatcher, deps.dispatchLogger));
  v1.route('/cache', createCacheRoutes(deps.dispatcher));
  v1.route('/keys', createKeyRoutes(deps.dispatcher));
  v1.route('/stats', createStatsRoutes(deps.aggregator));

  app.route('/v1', v1);

  return app;
}
