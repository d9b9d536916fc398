/**
 * Fetch-based upstream client.
 *
 * Issues `GET {baseUrl}{path}?{params}&{credentialParam}={secret}` and maps
 * every failure onto an UpstreamError kind the rate limiter understands.
 */

import { logger } from '../shared/logger.js';
import { UpstreamError } from '../shared/errors.js';
import { parseRetryAfterMs } from './retry-after.js';
import type { UpstreamConfig } from '../config/types.js';
import type { CredentialLease } from '../credentials/types.js';
import type { JsonValue, OperationParams } from '../shared/types.js';
import type { OperationDefinition, UpstreamClient } from './types.js';

/** Longest slice of an upstream error body kept on the error. */
const MAX_ERROR_BODY = 500;

export class HttpUpstreamClient implements UpstreamClient {
  private readonly baseUrl: string;
  private readonly credentialParam: string;
  private readonly requestTimeoutMs: number;

  constructor(config: UpstreamConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.credentialParam = config.credentialParam;
    this.requestTimeoutMs = config.requestTimeoutMs;
  }

  /** Build the request URL. The secret is appended last. */
  buildUrl(operation: OperationDefinition, params: OperationParams, secret: string): URL {
    const url = new URL(`${this.baseUrl}${operation.path}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, Array.isArray(value) ? value.join(',') : String(value));
    }
    url.searchParams.set(this.credentialParam, secret);
    return url;
  }

  async call(
    operation: OperationDefinition,
    params: OperationParams,
    credential: CredentialLease,
    signal?: AbortSignal,
  ): Promise<JsonValue> {
    const url = this.buildUrl(operation, params, credential.secret);
    const requestTimeout = AbortSignal.timeout(this.requestTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, requestTimeout]) : requestTimeout;

    logger.debug(
      { operation: operation.name, path: operation.path, credentialId: credential.credentialId },
      'Sending upstream request',
    );

    const start = performance.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: combined,
      });
    } catch (err) {
      const message = requestTimeout.aborted
        ? `Upstream request timed out after ${this.requestTimeoutMs}ms`
        : `Upstream request failed: ${err instanceof Error ? err.message : String(err)}`;
      throw new UpstreamError('network', operation.name, message, { cause: err });
    }

    const latencyMs = Math.round(performance.now() - start);
    const text = await this.readBody(response, operation.name);

    if (!response.ok) {
      throw this.classify(operation.name, response, text, latencyMs);
    }

    try {
      const body: JsonValue = JSON.parse(text);
      logger.debug(
        { operation: operation.name, status: response.status, latencyMs },
        'Upstream request succeeded',
      );
      return body;
    } catch (err) {
      logger.error(
        { operation: operation.name, status: response.status, latencyMs },
        'Upstream returned a body that is not JSON',
      );
      throw new UpstreamError('malformed', operation.name, 'Upstream returned invalid JSON', {
        statusCode: response.status,
        responseBody: text.slice(0, MAX_ERROR_BODY),
        cause: err,
      });
    }
  }

  private async readBody(response: Response, operation: string): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      throw new UpstreamError('network', operation, 'Upstream response body could not be read', {
        statusCode: response.status,
        cause: err,
      });
    }
  }

  private classify(
    operation: string,
    response: Response,
    text: string,
    latencyMs: number,
  ): UpstreamError {
    const status = response.status;
    const responseBody = text.slice(0, MAX_ERROR_BODY);

    if (status === 429) {
      const retryAfterMs = parseRetryAfterMs(response.headers.get('retry-after'));
      logger.warn({ operation, latencyMs, retryAfterMs }, 'Upstream returned 429 rate limit');
      return new UpstreamError('rate_limited', operation, 'Upstream returned 429', {
        statusCode: status,
        responseBody,
        retryAfterMs,
      });
    }

    logger.error({ operation, status, latencyMs }, 'Upstream returned error');

    if (status === 404) {
      return new UpstreamError('not_found', operation, 'Upstream returned 404', {
        statusCode: status,
        responseBody,
      });
    }
    if (status >= 500) {
      return new UpstreamError('server_error', operation, `Upstream returned ${status}`, {
        statusCode: status,
        responseBody,
      });
    }
    return new UpstreamError('client_error', operation, `Upstream returned ${status}`, {
      statusCode: status,
      responseBody,
    });
  }
}
