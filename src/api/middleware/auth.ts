/**
 * API key validation middleware for Hono.
 * Accepts `Authorization: Bearer <key>` or `X-API-Key: <key>` and checks the
 * key against the configured relay API keys.
 */

import { createMiddleware } from 'hono/factory';
import type { ErrorResponse } from '../../shared/types.js';

function unauthorized(message: string): ErrorResponse {
  return { error: { message, type: 'authentication_error', code: 'invalid_api_key' } };
}

/** Pull the presented key from either supported header. */
export function extractApiKey(
  authorization: string | undefined,
  apiKeyHeader: string | undefined,
): string | undefined {
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice('Bearer '.length).trim();
  }
  return apiKeyHeader?.trim() || undefined;
}

/**
 * Create an auth middleware that validates relay API keys.
 * @param apiKeys - Array of valid API keys from config.
 * @returns Hono middleware that enforces API key authentication.
 */
export function createAuthMiddleware(apiKeys: string[]) {
  const keySet = new Set(apiKeys);

  return createMiddleware(async (c, next) => {
    const key = extractApiKey(c.req.header('authorization'), c.req.header('x-api-key'));

    if (!key) {
      return c.json(
        unauthorized(
          'Missing API key. Provide it as "Authorization: Bearer <key>" or in the X-API-Key header.',
        ),
        401,
      );
    }

    if (!keySet.has(key)) {
      return c.json(unauthorized('Invalid API key provided.'), 401);
    }

    await next();
  });
}
