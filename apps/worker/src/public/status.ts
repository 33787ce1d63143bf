import { sanitizeTargetName, type BucketedSeries, type History, type Target } from '@beacon/db';

import { summarizeSeries } from '../analytics/buckets';
import { latencyStats } from '../analytics/latency';
import { latestObservation } from '../history/store';
import {
  statusSnapshotSchema,
  type PublicTarget,
  type StatusSnapshot,
} from '../schemas/public-status';
import { formatInstant, parseInstant, type TimeZone } from '../time/zone';

export function chartFileName(target: string): string {
  return `chart_${sanitizeTargetName(target)}.svg`;
}

export function sparklineFileName(target: string): string {
  return `sparkline_${sanitizeTargetName(target)}.svg`;
}

export type StatusSnapshotInput = {
  siteTitle: string;
  retentionDays: number;
  now: number;
  timeZone: TimeZone;
  targets: readonly Target[];
  history: History;
  // Keyed by target id; uptime is reported over this series.
  heatmaps: ReadonlyMap<string, BucketedSeries>;
};

export function computeStatusSnapshot(input: StatusSnapshotInput): StatusSnapshot {
  let lastCheckedAt: number | null = null;

  const targets: PublicTarget[] = [];
  for (const t of input.targets) {
    const latest = latestObservation(input.history, t.id, input.timeZone);
    const latestAt = latest ? parseInstant(latest.timestamp, input.timeZone) : null;
    if (latestAt !== null && (lastCheckedAt === null || latestAt > lastCheckedAt)) {
      lastCheckedAt = latestAt;
    }

    const heatmap = input.heatmaps.get(t.id);
    const latency = latencyStats(input.history.get(t.id) ?? []);

    targets.push({
      id: t.id,
      name: t.displayName,
      status: latest ? latest.status : 'Unknown',
      last_checked_at: latest ? latest.timestamp : null,
      uptime_pct: heatmap ? summarizeSeries(heatmap).uptimePct : null,
      avg_latency_ms: latency.avgMs,
      p95_latency_ms: latency.p95Ms,
      chart: chartFileName(t.id),
      sparkline: sparklineFileName(t.id),
    });
  }

  return statusSnapshotSchema.parse({
    generated_at: formatInstant(input.now, input.timeZone),
    site_title: input.siteTitle,
    timezone: input.timeZone,
    retention_days: input.retentionDays,
    last_checked_at: lastCheckedAt === null ? null : formatInstant(lastCheckedAt, input.timeZone),
    targets,
  });
}
