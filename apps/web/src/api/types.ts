import type { BucketedSeries } from '@beacon/db';

export type TargetStatus = 'Up' | 'Down' | 'Unknown';

export interface PublicTarget {
  id: string;
  name: string;
  status: TargetStatus;
  last_checked_at: string | null;
  uptime_pct: number | null;
  avg_latency_ms: number | null;
  p95_latency_ms: number | null;
  chart: string;
  sparkline: string;
}

// Contents of status.json.
export interface StatusSnapshot {
  generated_at: string;
  site_title: string;
  timezone: string;
  retention_days: number;
  last_checked_at: string | null;
  targets: PublicTarget[];
}

export interface ReportInput {
  snapshot: StatusSnapshot;
  heatmaps: ReadonlyMap<string, BucketedSeries>;
  sparklines: ReadonlyMap<string, BucketedSeries>;
  // Buckets per heatmap column (24 for hourly buckets laid out by day).
  heatmapRows: number;
}

export type ReportLogFields = Record<string, string | number | boolean | null | undefined>;

export interface ReportLogger {
  info(message: string, fields?: ReportLogFields): void;
  error(message: string, fields?: ReportLogFields): void;
}
