/**
 * Response cache routes: statistics and manual invalidation.
 */

import { Hono } from 'hono';
import type { Dispatcher } from '../../dispatch/dispatcher.js';

export function createCacheRoutes(dispatcher: Dispatcher) {
  const app = new Hono();

  app.get('/stats', (c) => c.json(dispatcher.cacheStats()));

  app.post('/clear', (c) => {
    dispatcher.cacheClear();
    return c.json({ cleared: true, stats: dispatcher.cacheStats() });
  });

  return app;
}
