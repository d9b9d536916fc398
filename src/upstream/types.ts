/**
 * Upstream boundary types.
 * The dispatcher talks to the upstream API only through `UpstreamClient`.
 */

import type { OperationConfig } from '../config/types.js';
import type { CredentialLease } from '../credentials/types.js';
import type { JsonValue, OperationParams } from '../shared/types.js';

/** A configured upstream operation, as held by the registry. */
export type OperationDefinition = OperationConfig;

/**
 * Performs one upstream call.
 * Implementations reject with `UpstreamError` only; the kind decides whether
 * the rate limiter retries.
 */
export interface UpstreamClient {
  /**
   * @param operation - The resolved operation to call.
   * @param params - Validated parameters.
   * @param credential - Lease whose secret authenticates this single call.
   * @param signal - Aborts the in-flight request.
   * @returns The parsed JSON response body.
   */
  call(
    operation: OperationDefinition,
    params: OperationParams,
    credential: CredentialLease,
    signal?: AbortSignal,
  ): Promise<JsonValue>;
}
