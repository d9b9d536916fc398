/**
 * Stats routes for querying dispatch log aggregations.
 * Provides per-operation and per-credential usage plus recent dispatches.
 */

import { Hono } from 'hono';
import type { UsageAggregator } from '../../persistence/aggregator.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

/** Parse the `limit` query param, falling back to the default for junk values. */
export function parseLimit(raw: string | undefined): number {
  const limit = raw === undefined ? DEFAULT_LIMIT : Number(raw);
  if (!Number.isInteger(limit) || limit < 1) {
    return DEFAULT_LIMIT;
  }
  return Math.min(limit, MAX_LIMIT);
}

/**
 * Create stats routes with injected aggregator dependency.
 * @param aggregator - UsageAggregator instance for reading materialized stats.
 * @returns Hono sub-app with stats endpoints.
 */
export function createStatsRoutes(aggregator: UsageAggregator) {
  const app = new Hono();

  // GET /operations - All operation usage statistics
  app.get('/operations', (c) => {
    return c.json({
      operations: aggregator.getAllOperationUsage(),
    });
  });

  // GET /operations/:name - Single operation usage statistics
  app.get('/operations/:name', (c) => {
    const name = c.req.param('name');
    const usage = aggregator.getOperationUsage(name);

    if (usage === null) {
      return c.json(
        {
          error: {
            message: `No usage data for operation '${name}'`,
            type: 'request_error',
            code: 'not_found',
          },
        },
        404,
      );
    }

    return c.json(usage);
  });

  // GET /credentials - Per-credential usage from the dispatch log
  app.get('/credentials', (c) => {
    return c.json({
      credentials: aggregator.getAllCredentialUsage(),
    });
  });

  // GET /requests - Recent dispatch logs
  app.get('/requests', (c) => {
    return c.json({
      requests: aggregator.getRecentDispatches(parseLimit(c.req.query('limit'))),
    });
  });

  return app;
}
