/**
 * GET /v1/keys/stats: per-credential usage and quota headroom.
 * Secrets never appear in the snapshot.
 */

import { Hono } from 'hono';
import type { Dispatcher } from '../../dispatch/dispatcher.js';

export function createKeyRoutes(dispatcher: Dispatcher) {
  const app = new Hono();

  app.get('/stats', (c) => c.json(dispatcher.keyStats()));

  return app;
}
