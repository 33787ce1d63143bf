import {
  bucketValue,
  type Bucket,
  type BucketState,
  type BucketValue,
  type BucketedSeries,
  type CheckStatus,
  type History,
  type Target,
  type TargetId,
} from '@beacon/db';

import { AppError } from '../errors';
import type { Logger } from '../logger';
import { parseInstant, zonedWallTimeToInstant, zoneOffsetMs, type TimeZone } from '../time/zone';

export type BucketizeOptions = {
  now: number;
  retentionMs: number;
  bucketWidthMs: number;
  /**
   * Length of the period the range is aligned to, in reference-zone wall time. The range
   * ends where the period containing `now` ends; buckets after `now` are future buckets.
   * Defaults to one bucket.
   */
  alignMs?: number;
  timeZone: TimeZone;
  logger: Logger;
};

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new AppError('INVALID_ARGUMENT', `${name} must be a positive duration: ${value}`);
  }
}

/**
 * End of the reference-zone period of length `alignMs` that contains `now`. A period
 * end that falls in a DST gap moves forward past it, so the result is always after `now`.
 */
export function alignedRangeEnd(now: number, alignMs: number, timeZone: TimeZone): number {
  const wall = now + zoneOffsetMs(now, timeZone);
  const periodStart = Math.floor(wall / alignMs) * alignMs;
  return zonedWallTimeToInstant(periodStart + alignMs, timeZone);
}

/**
 * Fixed scaffold of `ceil(retention / width)` empty buckets. Boundaries depend only on
 * `now`, the widths and the zone.
 */
export function buildScaffold(opts: Omit<BucketizeOptions, 'logger'>): {
  rangeStartAt: number;
  rangeEndAt: number;
  count: number;
} {
  if (!Number.isFinite(opts.now)) {
    throw new AppError('INVALID_ARGUMENT', `now must be a finite instant: ${opts.now}`);
  }
  requirePositive('retention', opts.retentionMs);
  requirePositive('bucket width', opts.bucketWidthMs);
  const alignMs = opts.alignMs ?? opts.bucketWidthMs;
  requirePositive('alignment', alignMs);

  const count = Math.ceil(opts.retentionMs / opts.bucketWidthMs);
  const rangeEndAt = alignedRangeEnd(opts.now, alignMs, opts.timeZone);
  return { rangeStartAt: rangeEndAt - count * opts.bucketWidthMs, rangeEndAt, count };
}

/**
 * Resamples one target's observations into fixed-width buckets.
 *
 * - Each elapsed bucket takes the latest observation inside it (ties: later in history).
 * - Elapsed buckets without one are forward-filled from the previous bucket; the first is
 *   seeded from the latest observation before the range, or `no_data` if there is none.
 * - Buckets starting after `now` are `future` and are never filled.
 */
export function bucketize(
  history: History,
  target: TargetId,
  opts: BucketizeOptions,
): BucketedSeries {
  const { rangeStartAt, rangeEndAt, count } = buildScaffold(opts);
  const width = opts.bucketWidthMs;

  const latest: Array<{ at: number; status: CheckStatus } | undefined> = new Array(count);
  let seed: { at: number; status: CheckStatus } | null = null;

  for (const o of history.get(target) ?? []) {
    const at = parseInstant(o.timestamp, opts.timeZone);
    if (at === null) {
      opts.logger.warn('skipping observation with malformed timestamp', {
        target,
        timestamp: o.timestamp,
      });
      continue;
    }
    if (at > opts.now) continue;

    if (at < rangeStartAt) {
      if (!seed || at >= seed.at) seed = { at, status: o.status };
      continue;
    }

    const idx = Math.floor((at - rangeStartAt) / width);
    if (idx >= count) continue;
    const cur = latest[idx];
    if (!cur || at >= cur.at) latest[idx] = { at, status: o.status };
  }

  const buckets: Bucket[] = [];
  let carried: CheckStatus | 'no_data' = seed ? seed.status : 'no_data';

  for (let i = 0; i < count; i++) {
    const startAt = rangeStartAt + i * width;
    const endAt = startAt + width;

    let state: BucketState;
    if (startAt > opts.now) {
      state = { kind: 'future' };
    } else {
      const hit = latest[i];
      if (hit) {
        state = { kind: 'observed', status: hit.status };
        carried = hit.status;
      } else {
        state = { kind: 'missing', resolved: carried };
      }
    }

    buckets.push({ index: i, startAt, endAt, state });
  }

  return { target, rangeStartAt, rangeEndAt, bucketWidthMs: width, buckets };
}

/** One series per configured target; history keys outside the list are ignored. */
export function bucketizeTargets(
  history: History,
  targets: readonly Target[],
  opts: BucketizeOptions,
): BucketedSeries[] {
  return targets.map((t) => bucketize(history, t.id, opts));
}

export function resolvedStatus(bucket: Bucket): BucketValue {
  return bucketValue(bucket.state);
}

export type SeriesSummary = {
  up: number;
  down: number;
  noData: number;
  future: number;
  uptimePct: number | null;
};

/** Bucket counts by resolved value; uptime is Up over Up+Down buckets. */
export function summarizeSeries(series: BucketedSeries): SeriesSummary {
  const summary: SeriesSummary = { up: 0, down: 0, noData: 0, future: 0, uptimePct: null };

  for (const b of series.buckets) {
    switch (bucketValue(b.state)) {
      case 'Up':
        summary.up++;
        break;
      case 'Down':
        summary.down++;
        break;
      case 'no_data':
        summary.noData++;
        break;
      case 'future':
        summary.future++;
        break;
    }
  }

  const known = summary.up + summary.down;
  if (known > 0) {
    summary.uptimePct = Math.round((summary.up / known) * 100_000) / 1000;
  }
  return summary;
}
