// Reference-zone helpers built on luxon. Every timestamp that enters the history is
// converted to an instant (epoch ms) here before it is compared with anything.

import { DateTime, IANAZone } from 'luxon';

export type TimeZone = string;

export const MINUTE_MS = 60_000;
export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;

const MAX_OFFSET_MINUTES = 24 * 60;
const ISO_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSZZ";

// Calendar dates only: luxon also reads week dates, ordinal dates and bare times.
const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]|$)/;

export function isValidTimeZone(timeZone: string): boolean {
  return timeZone.trim().length > 0 && IANAZone.isValidZone(timeZone);
}

function inZone(instantMs: number, timeZone: TimeZone): DateTime {
  return DateTime.fromMillis(instantMs, { zone: timeZone, locale: 'en-US' });
}

/** Offset of `timeZone` from UTC at the given instant, in ms (New York in winter: -5h). */
export function zoneOffsetMs(instantMs: number, timeZone: TimeZone): number {
  return inZone(instantMs, timeZone).offset * MINUTE_MS;
}

/**
 * Converts a wall-clock time in `timeZone` (expressed as if it were UTC ms) into an
 * instant. Wall times skipped by a DST jump move forward by the length of the gap
 * (02:30 on a spring-forward night in New York is 03:30 EDT).
 */
export function zonedWallTimeToInstant(wallMs: number, timeZone: TimeZone): number {
  return DateTime.fromMillis(wallMs, { zone: 'utc' })
    .setZone(timeZone, { keepLocalTime: true })
    .toMillis();
}

/**
 * Parses an ISO-8601 timestamp into epoch ms. Timestamps with `Z` or an offset are
 * absolute; naive timestamps are wall time in `timeZone`. Returns null when malformed.
 */
export function parseInstant(value: string, timeZone: TimeZone): number | null {
  const text = value.trim();
  if (!CALENDAR_DATE.test(text)) return null;

  const dt = DateTime.fromISO(text.replace(' ', 'T'), { zone: timeZone, setZone: true });
  if (!dt.isValid || Math.abs(dt.offset) >= MAX_OFFSET_MINUTES) return null;
  return dt.toMillis();
}

/** ISO-8601 with the zone's offset at that instant, e.g. `2026-03-01T09:00:00.000-05:00`. */
export function formatInstant(instantMs: number, timeZone: TimeZone): string {
  return inZone(instantMs, timeZone).toFormat(ISO_FORMAT);
}
