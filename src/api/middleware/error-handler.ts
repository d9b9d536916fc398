/**
 * Global error handler returning JSON error bodies.
 * Catches all errors that escape route handlers and converts them to the
 * `{ error: { message, type, code } }` shape used by every endpoint.
 */

import type { ErrorHandler } from 'hono';
import { logger } from '../../shared/logger.js';
import { DispatchError } from '../../shared/errors.js';
import { errorResponse } from '../respond.js';

/**
 * Hono error handler.
 *
 * Error mapping:
 * - DispatchError -> its own status and body (429 also sets Retry-After)
 * - Unknown -> 500 (generic server error, details only in the log)
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof DispatchError) {
    logger.warn({ code: err.code, path: c.req.path }, `Request failed: ${err.message}`);
    return errorResponse(c, err);
  }

  // Unknown error -- log full details but return generic message
  logger.error({ err }, 'Unhandled error');
  return c.json(
    {
      error: {
        message: 'Internal server error',
        type: 'server_error',
        code: null,
      },
    },
    500,
  );
};
