/**
 * POST /v1/batch handler.
 * Runs up to `dispatch.maxBatchSize` operations through the worker pool and
 * returns per-item results in request order.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { logger } from '../../shared/logger.js';
import { ValidationError } from '../../shared/errors.js';
import { OperationParamsSchema } from '../../upstream/registry.js';
import { errorResponse, logInBackground } from '../respond.js';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import type { CacheStatus, DispatchResult } from '../../dispatch/types.js';
import type { DispatchLogger } from '../../persistence/dispatch-logger.js';

const BatchRequestSchema = z.object({
  requests: z.array(
    z.object({
      operation: z.string().min(1),
      params: OperationParamsSchema.optional(),
    }),
  ),
});

/** Batch-level cache status: the status every item shares, or `mixed`. */
export function batchCacheStatus(results: DispatchResult[]): CacheStatus | 'mixed' | null {
  const statuses = new Set(results.map((r) => r.meta.cacheStatus));
  if (statuses.size !== 1) {
    return 'mixed';
  }
  const [only] = statuses;
  return only ?? null;
}

function itemBody(result: DispatchResult) {
  return result.ok
    ? { ok: true, data: result.data, meta: result.meta }
    : { ok: false, error: result.error.toErrorResponse().error, meta: result.meta };
}

/**
 * Create batch routes with injected dependencies.
 * @param dispatcher - Dispatcher that runs every operation.
 * @param dispatchLogger - Dispatch log writer for observability.
 */
export function createBatchRoutes(dispatcher: Dispatcher, dispatchLogger: DispatchLogger) {
  const app = new Hono();

  app.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new ValidationError('Request body must be valid JSON');
    }

    const parsed = BatchRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError(`Invalid batch request: ${z.prettifyError(parsed.error)}`);
    }

    const outcome = await dispatcher.dispatchMany(parsed.data.requests, {
      signal: c.req.raw.signal,
    });
    if (!outcome.ok) {
      return errorResponse(c, outcome.error);
    }

    const { results } = outcome;
    const succeeded = results.filter((r) => r.ok).length;
    const meta = {
      count: results.length,
      succeeded,
      failed: results.length - succeeded,
      cacheStatus: batchCacheStatus(results),
    };

    logger.info(meta, `Batch of ${meta.count} finished (${meta.failed} failed)`);
    logInBackground(dispatchLogger, results);

    return c.json({ results: results.map(itemBody), meta });
  });

  return app;
}
