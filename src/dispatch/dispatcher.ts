/**
 * Dispatcher: the entry point for every logical upstream operation.
 *
 * Flow per call: validate -> fingerprint -> cache -> (join an identical
 * in-flight call | rate-limited upstream call with a freshly leased credential
 * per attempt) -> cache write. Every failure comes back as a typed result;
 * `dispatch()` never rejects.
 */

import { logger } from '../shared/logger.js';
import { AbortedError, waitFor } from '../shared/async.js';
import { DispatchError, UpstreamError, ValidationError } from '../shared/errors.js';
import { fingerprint } from '../cache/fingerprint.js';
import { timeoutFrom } from '../ratelimit/limiter.js';
import { mapWithConcurrency } from './worker-pool.js';
import type { CredentialPool } from '../credentials/pool.js';
import type { PoolSnapshot } from '../credentials/types.js';
import type { RateLimiter } from '../ratelimit/limiter.js';
import type { ResponseCache } from '../cache/response-cache.js';
import type { CacheStats } from '../cache/types.js';
import type { OperationRegistry, ResolvedCall } from '../upstream/registry.js';
import type { UpstreamClient } from '../upstream/types.js';
import type { DispatchConfig } from '../config/types.js';
import type { JsonValue, OperationParams } from '../shared/types.js';
import type {
  BatchItem,
  BatchOutcome,
  DispatchMeta,
  DispatchOptions,
  DispatchResult,
} from './types.js';

export interface DispatcherDeps {
  registry: OperationRegistry;
  pool: CredentialPool;
  limiter: RateLimiter;
  cache: ResponseCache;
  client: UpstreamClient;
  config: DispatchConfig;
}

/** Result of one upstream call, shared by every dispatch that joined it. */
type UpstreamOutcome =
  | { ok: true; value: JsonValue; attempts: number; credentialId: string | null }
  | { ok: false; error: DispatchError; attempts: number; credentialId: string | null };

/**
 * An upstream call and the dispatches waiting on it. The call runs under its
 * own controller, aborted only once every waiter has given up.
 */
interface Flight {
  promise: Promise<UpstreamOutcome>;
  controller: AbortController;
  waiters: number;
  settled: boolean;
}

export class Dispatcher {
  private readonly registry: OperationRegistry;
  private readonly pool: CredentialPool;
  private readonly limiter: RateLimiter;
  private readonly cache: ResponseCache;
  private readonly client: UpstreamClient;
  private readonly config: DispatchConfig;
  private readonly inFlight = new Map<string, Flight>();

  constructor(deps: DispatcherDeps) {
    this.registry = deps.registry;
    this.pool = deps.pool;
    this.limiter = deps.limiter;
    this.cache = deps.cache;
    this.client = deps.client;
    this.config = deps.config;
  }

  /** Run one logical operation. Never rejects. */
  async dispatch(
    operation: string,
    params: OperationParams = {},
    options: DispatchOptions = {},
  ): Promise<DispatchResult> {
    const start = performance.now();
    const meta: DispatchMeta = {
      operation,
      cacheKey: null,
      cacheStatus: null,
      attempts: 0,
      credentialId: null,
      latencyMs: 0,
    };
    const finish = (
      result: { ok: true; data: JsonValue } | { ok: false; error: DispatchError },
    ): DispatchResult => {
      meta.latencyMs = Math.round(performance.now() - start);
      return { ...result, meta };
    };

    let call: ResolvedCall;
    try {
      call = this.registry.resolve(operation, params);
    } catch (err) {
      return finish({ ok: false, error: toDispatchError(err, operation) });
    }

    const key = fingerprint(operation, call.params, call.operation.unorderedParams);
    meta.cacheKey = key;

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      meta.cacheStatus = 'hit';
      logger.debug({ operation, cacheKey: key }, 'Cache hit');
      return finish({ ok: true, data: cached });
    }

    const signal = this.deadlineSignal(options);
    let flight = this.inFlight.get(key);
    if (flight) {
      meta.cacheStatus = 'shared';
      logger.debug({ operation, cacheKey: key }, 'Joining identical in-flight dispatch');
    } else {
      meta.cacheStatus = 'miss';
      flight = this.startFlight(call, key);
    }

    let outcome: UpstreamOutcome;
    flight.waiters++;
    try {
      outcome = await waitFor(flight.promise, signal);
    } catch (err) {
      const error = err instanceof AbortedError ? timeoutFrom(signal) : toDispatchError(err, operation);
      return finish({ ok: false, error });
    } finally {
      flight.waiters--;
      if (flight.waiters === 0 && !flight.settled) {
        logger.debug({ operation, cacheKey: key }, 'Every waiter left, aborting upstream call');
        flight.controller.abort(signal.reason);
      }
    }

    meta.attempts = outcome.attempts;
    meta.credentialId = outcome.credentialId;
    if (!outcome.ok) {
      return finish({ ok: false, error: outcome.error });
    }
    return finish({ ok: true, data: outcome.value });
  }

  /**
   * Run a batch through the worker pool. Results line up with `items`.
   * An empty or oversized batch is rejected as a whole.
   */
  async dispatchMany(items: BatchItem[], options: DispatchOptions = {}): Promise<BatchOutcome> {
    if (items.length === 0) {
      return { ok: false, error: new ValidationError('Batch must contain at least one request') };
    }
    if (items.length > this.config.maxBatchSize) {
      return {
        ok: false,
        error: new ValidationError(
          `Batch of ${items.length} exceeds the maximum of ${this.config.maxBatchSize} requests`,
        ),
      };
    }

    logger.debug(
      { count: items.length, concurrency: this.config.concurrency },
      'Dispatching batch',
    );
    const results = await mapWithConcurrency(items, this.config.concurrency, (item) =>
      this.dispatch(item.operation, item.params ?? {}, options),
    );
    return { ok: true, results };
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  cacheClear(): void {
    this.cache.clear();
  }

  keyStats(): PoolSnapshot {
    return this.pool.stats();
  }

  private deadlineSignal(options: DispatchOptions): AbortSignal {
    const deadline = AbortSignal.timeout(options.timeoutMs ?? this.config.timeoutMs);
    return options.signal ? AbortSignal.any([options.signal, deadline]) : deadline;
  }

  private startFlight(call: ResolvedCall, key: string): Flight {
    const controller = new AbortController();
    const flight: Flight = {
      promise: this.callUpstream(call, key, controller.signal),
      controller,
      waiters: 0,
      settled: false,
    };
    this.inFlight.set(key, flight);
    void flight.promise.finally(() => {
      flight.settled = true;
      if (this.inFlight.get(key) === flight) {
        this.inFlight.delete(key);
      }
    });
    return flight;
  }

  /** One upstream call with retries. Each attempt leases and settles its own credential. */
  private async callUpstream(
    call: ResolvedCall,
    key: string,
    signal: AbortSignal,
  ): Promise<UpstreamOutcome> {
    const name = call.operation.name;
    let attempts = 0;
    let credentialId: string | null = null;

    try {
      const value = await this.limiter.execute(
        async () => {
          const lease = this.pool.select();
          credentialId = lease.credentialId;
          try {
            const result = await this.client.call(call.operation, call.params, lease, signal);
            this.pool.record(lease, 'success');
            return result;
          } catch (err) {
            this.pool.record(lease, 'failure');
            throw toDispatchError(err, name);
          }
        },
        {
          signal,
          beforeThrottle: (attempt) => {
            attempts = attempt;
            this.pool.assertCapacity();
          },
        },
      );

      this.cache.put(key, value, call.operation.resourceClass);
      logger.info(
        { operation: name, cacheKey: key, attempts, credentialId },
        `Dispatched ${name} upstream`,
      );
      return { ok: true, value, attempts, credentialId };
    } catch (err) {
      const error = toDispatchError(err, name);
      logger.warn(
        { operation: name, code: error.code, attempts, credentialId },
        `Dispatch of ${name} failed: ${error.message}`,
      );
      return { ok: false, error, attempts, credentialId };
    }
  }
}

/**
 * Keep typed errors as they are. Anything else escaping an upstream client
 * breaks its contract and is reported as a network failure.
 */
function toDispatchError(err: unknown, operation: string): DispatchError {
  if (err instanceof DispatchError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new UpstreamError('network', operation, `Upstream client failed: ${message}`, {
    cause: err,
  });
}
