/**
 * In-memory credential pool with rotation and per-credential quota accounting.
 *
 * Selection reserves quota up front: `select()` rolls the windows, picks a
 * credential and bumps its daily/hourly counters in one synchronous step, so
 * two overlapping dispatches can never both spend a credential's last unit.
 * `record()` then settles the reservation as a success or failure.
 */

import { logger } from '../shared/logger.js';
import { QuotaExhaustedError } from '../shared/errors.js';
import { createStrategy } from './strategies.js';
import {
  dayWindowStart,
  hourWindowStart,
  msUntilDayReset,
  msUntilHourReset,
} from './windows.js';
import type { RotationStrategy } from './strategies.js';
import type { ResolvedCredential, RotationStrategyName } from '../config/types.js';
import type {
  CallOutcome,
  CandidateView,
  CredentialLease,
  CredentialSnapshot,
  CredentialState,
  PoolSnapshot,
} from './types.js';

export interface CredentialPoolOptions {
  strategy: RotationStrategyName;
  dailyQuota: number;
  hourlyQuota: number;
  /** UTC hour at which daily counters reset. */
  quotaResetUtcHour?: number;
  /** Clock, injectable for tests. */
  now?: () => number;
  /** Random source for the random strategy. */
  random?: () => number;
}

/** Counters as they would read after any pending window rollover. */
interface WindowedCounts {
  callsToday: number;
  callsThisHour: number;
}

export class CredentialPool {
  private readonly credentials: CredentialState[];
  private readonly strategy: RotationStrategy;
  private readonly dailyQuota: number;
  private readonly hourlyQuota: number;
  private readonly resetUtcHour: number;
  private readonly now: () => number;
  private readonly openLeases = new Map<number, CredentialState>();
  private nextLeaseId = 1;

  constructor(credentials: ResolvedCredential[], options: CredentialPoolOptions) {
    if (credentials.length === 0) {
      throw new Error('CredentialPool requires at least one credential');
    }

    this.now = options.now ?? Date.now;
    this.dailyQuota = options.dailyQuota;
    this.hourlyQuota = options.hourlyQuota;
    this.resetUtcHour = options.quotaResetUtcHour ?? 0;
    this.strategy = createStrategy(options.strategy, options.random);

    const now = this.now();
    this.credentials = credentials.map((cred) => ({
      id: cred.id,
      secret: cred.secret,
      totalCalls: 0,
      successfulCalls: 0,
      failedCalls: 0,
      callsToday: 0,
      callsThisHour: 0,
      inFlight: 0,
      lastUsed: null,
      dayWindowStart: dayWindowStart(now, this.resetUtcHour),
      hourWindowStart: hourWindowStart(now),
    }));
  }

  /** Number of credentials in the pool. */
  get size(): number {
    return this.credentials.length;
  }

  /** Configured rotation strategy. */
  get strategyName(): RotationStrategyName {
    return this.strategy.name;
  }

  /**
   * Reserve a credential for one upstream call.
   * @throws QuotaExhaustedError when every credential is over its daily or hourly ceiling.
   */
  select(): CredentialLease {
    const now = this.now();
    const candidates: CandidateView[] = this.credentials.map((state, index) => {
      this.rollWindows(state, now);
      return {
        index,
        callsToday: state.callsToday,
        eligible: this.hasHeadroom(state),
      };
    });

    const index = this.strategy.pick(candidates);
    const state = index === -1 ? undefined : this.credentials[index];
    if (!state) {
      throw this.exhausted(now);
    }

    state.callsToday++;
    state.callsThisHour++;
    state.inFlight++;
    state.lastUsed = now;

    const lease: CredentialLease = {
      leaseId: this.nextLeaseId++,
      credentialId: state.id,
      secret: state.secret,
      acquiredAt: now,
    };
    this.openLeases.set(lease.leaseId, state);

    logger.debug(
      {
        credentialId: state.id,
        strategy: this.strategy.name,
        callsToday: state.callsToday,
        callsThisHour: state.callsThisHour,
      },
      `Selected credential ${state.id}`,
    );

    return lease;
  }

  /**
   * Check that some credential has headroom, without reserving anything.
   * @throws QuotaExhaustedError when `select()` would throw it.
   */
  assertCapacity(): void {
    const now = this.now();
    let available = false;
    for (const state of this.credentials) {
      this.rollWindows(state, now);
      available ||= this.hasHeadroom(state);
    }
    if (!available) {
      throw this.exhausted(now);
    }
  }

  /**
   * Settle a lease. Each lease is recorded exactly once; repeats are ignored.
   * Failed calls keep their reserved quota, since the upstream counts them too.
   */
  record(lease: CredentialLease, outcome: CallOutcome): void {
    const state = this.openLeases.get(lease.leaseId);
    if (!state) {
      logger.warn(
        { credentialId: lease.credentialId, leaseId: lease.leaseId },
        'Ignoring record for unknown or already-settled lease',
      );
      return;
    }
    this.openLeases.delete(lease.leaseId);

    this.rollWindows(state, this.now());
    state.totalCalls++;
    state.inFlight--;
    if (outcome === 'success') {
      state.successfulCalls++;
    } else {
      state.failedCalls++;
    }
  }

  /** Usage snapshot. Reads only; pending rollovers are applied to the copy. */
  stats(): PoolSnapshot {
    const now = this.now();
    const credentials = this.credentials.map((state) => this.snapshot(state, now));

    return {
      rotationStrategy: this.strategy.name,
      totalCredentials: credentials.length,
      availableCredentials: credentials.filter((c) => c.canMakeRequest).length,
      dailyQuotaPerCredential: this.dailyQuota,
      hourlyQuotaPerCredential: this.hourlyQuota,
      credentials,
    };
  }

  private snapshot(state: CredentialState, now: number): CredentialSnapshot {
    const counts = this.effectiveCounts(state, now);
    const dailyExhausted = counts.callsToday >= this.dailyQuota;
    const hourlyExhausted = counts.callsThisHour >= this.hourlyQuota;

    return {
      id: state.id,
      totalCalls: state.totalCalls,
      successfulCalls: state.successfulCalls,
      failedCalls: state.failedCalls,
      callsToday: counts.callsToday,
      callsThisHour: counts.callsThisHour,
      inFlight: state.inFlight,
      dailyQuotaUsedPct: percent(counts.callsToday, this.dailyQuota),
      hourlyQuotaUsedPct: percent(counts.callsThisHour, this.hourlyQuota),
      lastUsed: state.lastUsed === null ? null : new Date(state.lastUsed).toISOString(),
      isExhausted: dailyExhausted,
      canMakeRequest: !dailyExhausted && !hourlyExhausted,
    };
  }

  private effectiveCounts(state: CredentialState, now: number): WindowedCounts {
    return {
      callsToday:
        dayWindowStart(now, this.resetUtcHour) > state.dayWindowStart ? 0 : state.callsToday,
      callsThisHour: hourWindowStart(now) > state.hourWindowStart ? 0 : state.callsThisHour,
    };
  }

  private rollWindows(state: CredentialState, now: number): void {
    const day = dayWindowStart(now, this.resetUtcHour);
    if (day > state.dayWindowStart) {
      if (state.callsToday > 0) {
        logger.debug(
          { credentialId: state.id, previous: state.callsToday },
          `Daily window rolled over for ${state.id}`,
        );
      }
      state.callsToday = 0;
      state.dayWindowStart = day;
    }

    const hour = hourWindowStart(now);
    if (hour > state.hourWindowStart) {
      state.callsThisHour = 0;
      state.hourWindowStart = hour;
    }
  }

  private hasHeadroom(state: CredentialState): boolean {
    return state.callsToday < this.dailyQuota && state.callsThisHour < this.hourlyQuota;
  }

  private exhausted(now: number): QuotaExhaustedError {
    const retryAfterMs = this.msUntilAnyHeadroom(now);
    logger.warn({ credentials: this.credentials.length, retryAfterMs }, 'All credentials exhausted');
    return new QuotaExhaustedError(this.credentials.length, retryAfterMs);
  }

  /** Time until the earliest credential regains headroom in both windows. */
  private msUntilAnyHeadroom(now: number): number {
    let soonest = Number.POSITIVE_INFINITY;
    for (const state of this.credentials) {
      const dayWait = state.callsToday >= this.dailyQuota ? msUntilDayReset(now, this.resetUtcHour) : 0;
      const hourWait = state.callsThisHour >= this.hourlyQuota ? msUntilHourReset(now) : 0;
      soonest = Math.min(soonest, Math.max(dayWait, hourWait));
    }
    return soonest;
  }
}

function percent(used: number, quota: number): number {
  return Math.round((used / quota) * 10_000) / 100;
}
