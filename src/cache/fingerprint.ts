/**
 * Deterministic cache keys for operation calls.
 *
 * Two calls that ask the upstream for the same thing get the same key: object
 * keys are sorted, and parameters that the operation treats as sets (for
 * example a list of ids) are split on commas, deduplicated and sorted.
 */

import { createHash } from 'node:crypto';
import type { JsonValue, OperationParams, ParamValue } from '../shared/types.js';

/** Split a set-valued parameter into its sorted, distinct members. */
export function normalizeSetParam(value: ParamValue): string[] {
  const raw = Array.isArray(value) ? value : [value];
  const members = raw
    .flatMap((item) => String(item).split(','))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return [...new Set(members)].sort();
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const fields = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key] ?? null)}`);
    return `{${fields.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Cache key for one call: `<operation>:<sha256 of canonical params>`.
 *
 * @param unorderedParams - Names of params whose values are sets
 */
export function fingerprint(
  operation: string,
  params: OperationParams,
  unorderedParams: readonly string[] = [],
): string {
  const unordered = new Set(unorderedParams);
  const normalized: Record<string, JsonValue> = {};
  for (const [name, value] of Object.entries(params)) {
    normalized[name] = unordered.has(name) ? normalizeSetParam(value) : value;
  }

  const hash = createHash('sha256').update(canonicalJson(normalized)).digest('hex');
  return `${operation}:${hash}`;
}
