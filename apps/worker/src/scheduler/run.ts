import type { BucketedSeries } from '@beacon/db';
import { writeReport, type ReportResult } from '@beacon/web';

import { bucketizeTargets } from '../analytics/buckets';
import { appendToArchive } from '../history/archive';
import { loadHistory, persistHistory } from '../history/store';
import type { Logger } from '../logger';
import { probeAll } from '../monitor/probe';
import { resolveTargets, type TargetSource } from '../monitor/target-list';
import { computeStatusSnapshot } from '../public/status';
import type { Settings } from '../settings';
import { DAY_MS, MINUTE_MS, formatInstant } from '../time/zone';
import { runRetention } from './retention';

export type MonitorCycleOptions = {
  logger: Logger;
  clock?: () => number;
};

export type MonitorCycleSummary = {
  source: TargetSource;
  targets: number;
  observations: number;
  down: number;
  records: number;
  persisted: boolean;
  archived: number;
  report: ReportResult;
};

function byTarget(series: BucketedSeries[]): Map<string, BucketedSeries> {
  return new Map(series.map((s) => [s.target, s]));
}

/**
 * One monitoring run: resolve targets, load history, probe, merge and prune, persist,
 * archive what expired, then render every artifact from the in-memory history. Only
 * misconfiguration throws; a history that cannot be saved still gets rendered, and its
 * expired observations stay in the results file until a later run saves it.
 */
export async function runMonitorCycle(
  settings: Settings,
  opts: MonitorCycleOptions,
): Promise<MonitorCycleSummary> {
  const clock = opts.clock ?? Date.now;
  const log = opts.logger;
  const timeZone = settings.timezone;
  const store = { timeZone, logger: log.child('store') };

  const { targets, source } = await resolveTargets({
    targetsFile: settings.targets_file,
    targetsEnv: settings.targets_env,
    requireTargets: settings.require_targets,
    logger: log.child('targets'),
  });

  const existing = await loadHistory(settings.results_file, store);

  const observations = await probeAll(targets, {
    timeoutMs: settings.check_timeout_ms,
    concurrency: settings.probe_concurrency,
    timeZone,
    logger: log.child('probe'),
    clock,
  });

  // Taken after probing so that every observation of this run is at or before `now`.
  const now = clock();

  const { history, expired } = runRetention(existing, observations, {
    now,
    retentionDays: settings.retention_days,
    timeZone,
    logger: log.child('retention'),
  });

  const persisted = await persistHistory(settings.results_file, history, store);

  let archived = 0;
  if (settings.archive_file && expired.length > 0) {
    const archive = { timeZone, logger: log.child('archive') };
    if (!persisted) {
      archive.logger.warn('history not saved, deferring archive', {
        file: settings.archive_file,
        count: expired.length,
      });
    } else if (await appendToArchive(settings.archive_file, expired, archive)) {
      archived = expired.length;
    }
  }

  const analytics = log.child('analytics');
  const heatmapWidthMs = settings.heatmap_bucket_minutes * MINUTE_MS;
  const heatmaps = byTarget(
    bucketizeTargets(history, targets, {
      now,
      retentionMs: settings.retention_days * DAY_MS,
      bucketWidthMs: heatmapWidthMs,
      alignMs: DAY_MS,
      timeZone,
      logger: analytics,
    }),
  );
  const sparklines = byTarget(
    bucketizeTargets(history, targets, {
      now,
      retentionMs: settings.sparkline_days * DAY_MS,
      bucketWidthMs: settings.sparkline_bucket_minutes * MINUTE_MS,
      timeZone,
      logger: analytics,
    }),
  );

  const snapshot = computeStatusSnapshot({
    siteTitle: settings.site_title,
    retentionDays: settings.retention_days,
    now,
    timeZone,
    targets,
    history,
    heatmaps,
  });

  const report = await writeReport(
    settings.output_dir,
    { snapshot, heatmaps, sparklines, heatmapRows: DAY_MS / heatmapWidthMs },
    log.child('report'),
  );

  let records = 0;
  for (const list of history.values()) records += list.length;

  const summary: MonitorCycleSummary = {
    source,
    targets: targets.length,
    observations: observations.length,
    down: observations.filter((o) => o.status === 'Down').length,
    records,
    persisted,
    archived,
    report,
  };

  log.info('run finished', {
    at: formatInstant(now, timeZone),
    source,
    targets: summary.targets,
    down: summary.down,
    records,
    persisted,
    files: report.written.length,
  });
  return summary;
}
