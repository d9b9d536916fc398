/**
 * Credential rotation strategies.
 * The configured strategy is resolved once, at pool construction, into one of these objects.
 */

import type { RotationStrategyName } from '../config/types.js';
import type { CandidateView } from './types.js';

/** Chooses which eligible credential serves the next call. */
export interface RotationStrategy {
  readonly name: RotationStrategyName;
  /**
   * Pick a credential.
   * @param candidates - Every credential in pool order, with eligibility already evaluated.
   * @returns Pool index of the chosen credential, or -1 when none is eligible.
   */
  pick(candidates: readonly CandidateView[]): number;
}

/**
 * Cycles through credentials in pool order, skipping ineligible ones.
 * The cursor moves forward by one slot per successful pick, however many were skipped.
 */
export class RoundRobinStrategy implements RotationStrategy {
  readonly name = 'round_robin';
  private cursor = 0;

  pick(candidates: readonly CandidateView[]): number {
    const count = candidates.length;
    for (let offset = 0; offset < count; offset++) {
      const candidate = candidates[(this.cursor + offset) % count];
      if (candidate?.eligible) {
        this.cursor = (this.cursor + 1) % count;
        return candidate.index;
      }
    }
    return -1;
  }
}

/** Lowest calls-today wins; ties go to the credential listed first. */
export class LeastUsedStrategy implements RotationStrategy {
  readonly name = 'least_used';

  pick(candidates: readonly CandidateView[]): number {
    let best: CandidateView | undefined;
    for (const candidate of candidates) {
      if (!candidate.eligible) continue;
      if (best === undefined || candidate.callsToday < best.callsToday) {
        best = candidate;
      }
    }
    return best?.index ?? -1;
  }
}

/** Uniform sample among eligible credentials. */
export class RandomStrategy implements RotationStrategy {
  readonly name = 'random';

  constructor(private readonly random: () => number = Math.random) {}

  pick(candidates: readonly CandidateView[]): number {
    const eligible = candidates.filter((c) => c.eligible);
    if (eligible.length === 0) {
      return -1;
    }
    const slot = Math.min(Math.floor(this.random() * eligible.length), eligible.length - 1);
    return eligible[slot]?.index ?? -1;
  }
}

/** Resolve a configured strategy name into a strategy object. */
export function createStrategy(
  name: RotationStrategyName,
  random: () => number = Math.random,
): RotationStrategy {
  switch (name) {
    case 'round_robin':
      return new RoundRobinStrategy();
    case 'least_used':
      return new LeastUsedStrategy();
    case 'random':
      return new RandomStrategy(random);
  }
}
