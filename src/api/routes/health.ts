/**
 * GET /health handler.
 * Returns relay status information. No authentication required.
 */

import { Hono } from 'hono';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import type { OperationRegistry } from '../../upstream/registry.js';

/**
 * Create health routes with injected dependencies.
 * @param dispatcher - Dispatcher, for pool and cache snapshots.
 * @param registry - Operation registry.
 * @param version - Relay version reported to clients.
 * @returns Hono app with GET / route for health checks.
 */
export function createHealthRoutes(
  dispatcher: Dispatcher,
  registry: OperationRegistry,
  version: string,
) {
  const app = new Hono();

  app.get('/', (c) => {
    const keys = dispatcher.keyStats();
    return c.json({
      status: keys.availableCredentials > 0 ? 'ok' : 'degraded',
      version,
      uptime: process.uptime(),
      credentials: {
        total: keys.totalCredentials,
        available: keys.availableCredentials,
      },
      operations: registry.size,
      cache: dispatcher.cacheStats(),
    });
  });

  return app;
}
