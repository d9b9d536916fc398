/**
 * Shared response helpers for dispatch routes.
 */

import type { Context } from 'hono';
import { logger } from '../shared/logger.js';
import { QuotaExhaustedError, ValidationError } from '../shared/errors.js';
import { OperationParamsSchema } from '../upstream/registry.js';
import type { DispatchError } from '../shared/errors.js';
import type { OperationParams } from '../shared/types.js';
import type { DispatchLogger } from '../persistence/dispatch-logger.js';
import type { DispatchMeta, DispatchResult } from '../dispatch/types.js';

/** JSON error body with the error's status. Quota exhaustion also gets Retry-After. */
export function errorResponse(c: Context, error: DispatchError, meta?: DispatchMeta): Response {
  if (error instanceof QuotaExhaustedError) {
    c.header('Retry-After', String(Math.max(1, Math.ceil(error.retryAfterMs / 1000))));
  }
  return c.json({ ...error.toErrorResponse(), ...(meta && { meta }) }, error.httpStatus);
}

/** `{ data, meta }` on success, the mapped error otherwise. */
export function resultResponse(c: Context, result: DispatchResult): Response {
  if (result.meta.cacheStatus) {
    c.header('X-Cache-Status', result.meta.cacheStatus);
  }
  if (!result.ok) {
    return errorResponse(c, result.error, result.meta);
  }
  return c.json({ data: result.data, meta: result.meta });
}

/**
 * Parse operation params from a JSON request body. An empty body means no params.
 * @throws ValidationError if the body is not JSON or not a params object
 */
export async function paramsFromBody(c: Context): Promise<OperationParams> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return {};
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }

  const parsed = OperationParamsSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(
      'Request body must be an object of scalar or list-of-scalar params',
    );
  }
  return parsed.data;
}

/** Query string params; repeated keys become lists. */
export function paramsFromQuery(c: Context): OperationParams {
  const params: OperationParams = {};
  for (const [name, values] of Object.entries(c.req.queries())) {
    const [first] = values;
    if (values.length > 1) {
      params[name] = values;
    } else if (first !== undefined) {
      params[name] = first;
    }
  }
  return params;
}

/** Write dispatch log rows after the response has been handed back. */
export function logInBackground(dispatchLogger: DispatchLogger, results: DispatchResult[]): void {
  setImmediate(() => {
    for (const result of results) {
      try {
        dispatchLogger.logResult(result);
      } catch (error) {
        logger.error({ error, operation: result.meta.operation }, 'Failed to write dispatch log');
      }
    }
  });
}
