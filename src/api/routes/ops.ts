/**
 * Single-operation routes.
 * GET takes params from the query string, POST from a JSON object body.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { logger } from '../../shared/logger.js';
import { logInBackground, paramsFromBody, paramsFromQuery, resultResponse } from '../respond.js';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import type { DispatchLogger } from '../../persistence/dispatch-logger.js';
import type { OperationParams } from '../../shared/types.js';

/**
 * Create operation routes with injected dependencies.
 * @param dispatcher - Dispatcher that runs every operation.
 * @param dispatchLogger - Dispatch log writer for observability.
 * @returns Hono sub-app with GET and POST /:operation.
 */
export function createOpsRoutes(dispatcher: Dispatcher, dispatchLogger: DispatchLogger) {
  const app = new Hono();

  const run = async (c: Context, params: OperationParams) => {
    const operation = c.req.param('operation') ?? '';
    const result = await dispatcher.dispatch(operation, params, { signal: c.req.raw.signal });

    logger.info(
      {
        operation,
        ok: result.ok,
        cacheStatus: result.meta.cacheStatus,
        attempts: result.meta.attempts,
        latencyMs: result.meta.latencyMs,
      },
      `Operation ${operation} ${result.ok ? 'succeeded' : `failed (${result.error.code})`}`,
    );
    logInBackground(dispatchLogger, [result]);

    return resultResponse(c, result);
  };

  app.get('/:operation', (c) => run(c, paramsFromQuery(c)));

  app.post('/:operation', async (c) => run(c, await paramsFromBody(c)));

  return app;
}
