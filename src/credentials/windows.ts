/**
 * Quota window arithmetic.
 * Daily windows are aligned to a fixed UTC reset hour; hourly windows to the top of the UTC hour.
 */

export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;

/** Start of the daily window containing `now`. */
export function dayWindowStart(now: number, resetUtcHour: number): number {
  const offset = resetUtcHour * HOUR_MS;
  return Math.floor((now - offset) / DAY_MS) * DAY_MS + offset;
}

/** Start of the hourly window containing `now`. */
export function hourWindowStart(now: number): number {
  return Math.floor(now / HOUR_MS) * HOUR_MS;
}

/** Milliseconds from `now` until the next daily reset. */
export function msUntilDayReset(now: number, resetUtcHour: number): number {
  return dayWindowStart(now, resetUtcHour) + DAY_MS - now;
}

/** Milliseconds from `now` until the next hour boundary. */
export function msUntilHourReset(now: number): number {
  return hourWindowStart(now) + HOUR_MS - now;
}
