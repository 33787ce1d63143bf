import type { History, Observation } from '@beacon/db';

import { partitionExpired } from '../history/archive';
import { historyFromRecords, historyToRecords, mergeAndPrune } from '../history/store';
import type { Logger } from '../logger';
import { DAY_MS, formatInstant, type TimeZone } from '../time/zone';

export type RetentionOptions = {
  now: number;
  retentionDays: number;
  timeZone: TimeZone;
  logger: Logger;
};

export type RetentionResult = {
  history: History;
  // Fell out of the window this run; archived once the pruned history is saved.
  expired: Observation[];
};

/** Merges this run's observations into the history and applies the retention window. */
export function runRetention(
  existing: History,
  observations: readonly Observation[],
  opts: RetentionOptions,
): RetentionResult {
  const retentionMs = opts.retentionDays * DAY_MS;

  const combined = historyFromRecords([
    ...historyToRecords(existing, opts.timeZone),
    ...observations,
  ]);
  const { expired } = partitionExpired(combined, retentionMs, opts.now, opts.timeZone);
  const history = mergeAndPrune(existing, observations, retentionMs, opts.now, opts);

  let kept = 0;
  for (const list of history.values()) kept += list.length;

  opts.logger.info('pruned', {
    kept,
    added: observations.length,
    expired: expired.length,
    cutoff: formatInstant(opts.now - retentionMs, opts.timeZone),
    days: opts.retentionDays,
  });
  return { history, expired };
}
