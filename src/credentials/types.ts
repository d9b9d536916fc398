/**
 * Credential pool types.
 * Internal per-credential accounting plus the read-only shapes handed out by the pool.
 */

import type { RotationStrategyName } from '../config/types.js';

/** Outcome of one attempted upstream call made with a leased credential. */
export type CallOutcome = 'success' | 'failure';

/** Internal mutable accounting for one credential. Never leaves the pool. */
export interface CredentialState {
  id: string;
  secret: string;
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  callsToday: number;
  callsThisHour: number;
  /** Leases handed out but not yet recorded. */
  inFlight: number;
  /** Unix ms of the last selection, or null if never used. */
  lastUsed: number | null;
  /** Start (Unix ms) of the daily window the counters belong to. */
  dayWindowStart: number;
  /** Start (Unix ms) of the hourly window the counters belong to. */
  hourWindowStart: number;
}

/**
 * A reserved credential for exactly one upstream call.
 * Must be passed back to `CredentialPool.record()` once the call finishes.
 */
export interface CredentialLease {
  readonly leaseId: number;
  readonly credentialId: string;
  readonly secret: string;
  readonly acquiredAt: number;
}

/** Read-only usage snapshot for one credential. */
export interface CredentialSnapshot {
  id: string;
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  callsToday: number;
  callsThisHour: number;
  inFlight: number;
  dailyQuotaUsedPct: number;
  hourlyQuotaUsedPct: number;
  /** ISO timestamp of the last selection, or null. */
  lastUsed: string | null;
  isExhausted: boolean;
  canMakeRequest: boolean;
}

/** Read-only snapshot of the whole pool. */
export interface PoolSnapshot {
  rotationStrategy: RotationStrategyName;
  totalCredentials: number;
  availableCredentials: number;
  dailyQuotaPerCredential: number;
  hourlyQuotaPerCredential: number;
  credentials: CredentialSnapshot[];
}

/** What a rotation strategy sees of each credential. */
export interface CandidateView {
  index: number;
  callsToday: number;
  eligible: boolean;
}
