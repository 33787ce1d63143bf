import { z } from 'zod';

const optionalText = z.string().optional();

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes')
  .optional();

// Raw environment. Values stay strings here; range checks and defaults live in
// settings.ts so one bad value does not discard the rest.
export const settingsEnvSchema = z
  .object({
    UPTIME_TARGETS_FILE: optionalText,
    UPTIME_TARGETS: optionalText,
    UPTIME_REQUIRE_TARGETS: booleanFlag,

    UPTIME_RESULTS_FILE: optionalText,
    UPTIME_ARCHIVE_FILE: optionalText,
    UPTIME_OUTPUT_DIR: optionalText,

    UPTIME_RETENTION_DAYS: optionalText,
    UPTIME_HEATMAP_BUCKET_MINUTES: optionalText,
    UPTIME_SPARKLINE_BUCKET_MINUTES: optionalText,
    UPTIME_SPARKLINE_DAYS: optionalText,

    // IANA timezone, e.g. 'UTC', 'America/New_York'.
    UPTIME_TIMEZONE: optionalText,

    UPTIME_CHECK_TIMEOUT_MS: optionalText,
    UPTIME_PROBE_CONCURRENCY: optionalText,

    UPTIME_SITE_TITLE: optionalText,
    UPTIME_LOG_LEVEL: optionalText,
  })
  .passthrough();

export type SettingsEnv = z.infer<typeof settingsEnvSchema>;
