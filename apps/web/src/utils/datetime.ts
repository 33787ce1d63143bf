export type TimeZone = string;
export type Locale = string;

const DEFAULT_LOCALE: Locale = 'en-US';

function safeDate(ms: number): Date | null {
  if (!Number.isFinite(ms)) return null;
  const d = new Date(ms);
  if (Number.isNaN(d.getTime())) return null;
  return d;
}

/** Epoch ms of a stored timestamp; stored timestamps always carry an offset. */
export function parseTimestamp(value: string): number | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function format(
  ms: number,
  options: Intl.DateTimeFormatOptions,
  timeZone: TimeZone | undefined,
  locale: Locale,
): string {
  const d = safeDate(ms);
  if (!d) return '';

  try {
    return d.toLocaleString(locale, timeZone ? { ...options, timeZone } : options);
  } catch {
    // Invalid/unsupported timeZone in this runtime; fall back to local.
    return d.toLocaleString(locale, options);
  }
}

export function formatDateTime(ms: number, timeZone?: TimeZone, locale = DEFAULT_LOCALE): string {
  return format(
    ms,
    {
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
      timeZoneName: 'short',
    },
    timeZone,
    locale,
  );
}

// `Jan 05`
export function formatDay(ms: number, timeZone?: TimeZone, locale = DEFAULT_LOCALE): string {
  return format(ms, { month: 'short', day: '2-digit' }, timeZone, locale);
}

// `07:00`
export function formatTime(ms: number, timeZone?: TimeZone, locale = DEFAULT_LOCALE): string {
  return format(ms, { hour: '2-digit', minute: '2-digit', hourCycle: 'h23' }, timeZone, locale);
}
