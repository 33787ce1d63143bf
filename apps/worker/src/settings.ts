// Environment-backed settings.
//
// - Source: `process.env` (or any string map in tests).
// - Invalid values fall back to their defaults, except the reference timezone, which
//   stops the run.

import type { Env } from './env';
import { AppError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';
import { settingsEnvSchema } from './schemas/settings';
import { isValidTimeZone } from './time/zone';

export type Settings = {
  targets_file: string;
  targets_env: string | null;
  require_targets: boolean;

  results_file: string;
  archive_file: string | null;
  output_dir: string;

  retention_days: number;
  heatmap_bucket_minutes: number;
  sparkline_bucket_minutes: number;
  sparkline_days: number;

  timezone: string;

  check_timeout_ms: number;
  probe_concurrency: number;

  site_title: string;
  log_level: LogLevel;
};

const MINUTES_PER_DAY = 1440;

export const DEFAULT_SETTINGS: Settings = {
  targets_file: 'monitoring_targets.txt',
  targets_env: null,
  require_targets: false,

  results_file: 'docs/data/results.json',
  archive_file: null,
  output_dir: 'docs',

  retention_days: 30,
  heatmap_bucket_minutes: 60,
  sparkline_bucket_minutes: 360,
  sparkline_days: 7,

  timezone: 'America/New_York',

  check_timeout_ms: 10_000,
  probe_concurrency: 4,

  site_title: 'System Status',
  log_level: 'info',
};

function parseIntSetting(
  raw: string | undefined,
  opts: { min: number; max: number },
): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  const n = Number.parseInt(trimmed, 10);
  if (!Number.isFinite(n)) return null;
  if (n < opts.min || n > opts.max) return null;
  return n;
}

// Heatmap columns are days, so the bucket width must split a day evenly.
function parseDayDivisor(raw: string | undefined): number | null {
  const n = parseIntSetting(raw, { min: 1, max: MINUTES_PER_DAY });
  return n !== null && MINUTES_PER_DAY % n === 0 ? n : null;
}

function parseStringSetting(
  raw: string | undefined,
  opts: { max: number; allowEmpty?: boolean },
): string | null {
  if (raw === undefined) return null;
  const s = raw.trim();
  if (!opts.allowEmpty && s.length === 0) return null;
  if (s.length > opts.max) return null;
  return s;
}

function parseEnumSetting<T extends string>(
  raw: string | undefined,
  allowed: readonly T[],
): T | null {
  if (raw === undefined) return null;
  const value = raw.trim();
  return allowed.find((a) => a === value) ?? null;
}

export function readSettings(env: Env): Settings {
  const r = settingsEnvSchema.safeParse(env);
  if (!r.success) {
    throw new AppError('MISCONFIGURED', `Invalid environment: ${r.error.message}`, {
      cause: r.error,
    });
  }
  const e = r.data;

  const timezone =
    parseStringSetting(e.UPTIME_TIMEZONE, { max: 64 }) ?? DEFAULT_SETTINGS.timezone;
  if (!isValidTimeZone(timezone)) {
    throw new AppError('MISCONFIGURED', `UPTIME_TIMEZONE is not a valid IANA zone: ${timezone}`);
  }

  return {
    targets_file:
      parseStringSetting(e.UPTIME_TARGETS_FILE, { max: 4096 }) ?? DEFAULT_SETTINGS.targets_file,
    targets_env: parseStringSetting(e.UPTIME_TARGETS, { max: 65_536 }),
    require_targets: e.UPTIME_REQUIRE_TARGETS ?? DEFAULT_SETTINGS.require_targets,

    results_file:
      parseStringSetting(e.UPTIME_RESULTS_FILE, { max: 4096 }) ?? DEFAULT_SETTINGS.results_file,
    archive_file: parseStringSetting(e.UPTIME_ARCHIVE_FILE, { max: 4096 }),
    output_dir:
      parseStringSetting(e.UPTIME_OUTPUT_DIR, { max: 4096 }) ?? DEFAULT_SETTINGS.output_dir,

    retention_days:
      parseIntSetting(e.UPTIME_RETENTION_DAYS, { min: 1, max: 365 }) ??
      DEFAULT_SETTINGS.retention_days,
    heatmap_bucket_minutes:
      parseDayDivisor(e.UPTIME_HEATMAP_BUCKET_MINUTES) ?? DEFAULT_SETTINGS.heatmap_bucket_minutes,
    sparkline_bucket_minutes:
      parseIntSetting(e.UPTIME_SPARKLINE_BUCKET_MINUTES, { min: 1, max: 1440 }) ??
      DEFAULT_SETTINGS.sparkline_bucket_minutes,
    sparkline_days:
      parseIntSetting(e.UPTIME_SPARKLINE_DAYS, { min: 1, max: 365 }) ??
      DEFAULT_SETTINGS.sparkline_days,

    timezone,

    check_timeout_ms:
      parseIntSetting(e.UPTIME_CHECK_TIMEOUT_MS, { min: 100, max: 60_000 }) ??
      DEFAULT_SETTINGS.check_timeout_ms,
    probe_concurrency:
      parseIntSetting(e.UPTIME_PROBE_CONCURRENCY, { min: 1, max: 32 }) ??
      DEFAULT_SETTINGS.probe_concurrency,

    site_title:
      parseStringSetting(e.UPTIME_SITE_TITLE, { max: 100 }) ?? DEFAULT_SETTINGS.site_title,
    log_level: parseEnumSetting(e.UPTIME_LOG_LEVEL, LOG_LEVELS) ?? DEFAULT_SETTINGS.log_level,
  };
}
