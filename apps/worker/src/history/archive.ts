import type { History, Observation } from '@beacon/db';

import type { Logger } from '../logger';
import { parseInstant, type TimeZone } from '../time/zone';
import { historyFromRecords, historyToRecords, loadHistory, persistHistory } from './store';

/** Splits the history at `now - retentionMs`. Records with unreadable timestamps are in neither half. */
export function partitionExpired(
  history: History,
  retentionMs: number,
  now: number,
  timeZone: TimeZone,
): { kept: Observation[]; expired: Observation[] } {
  const cutoff = now - retentionMs;
  const kept: Observation[] = [];
  const expired: Observation[] = [];

  for (const observation of historyToRecords(history, timeZone)) {
    const at = parseInstant(observation.timestamp, timeZone);
    if (at === null) continue;
    if (at < cutoff) {
      expired.push(observation);
    } else {
      kept.push(observation);
    }
  }

  return { kept, expired };
}

/**
 * Appends expired observations to the archive file. The archive is never pruned; a
 * failure here is logged and the run continues.
 */
export async function appendToArchive(
  filePath: string,
  expired: readonly Observation[],
  opts: { timeZone: TimeZone; logger: Logger },
): Promise<boolean> {
  if (expired.length === 0) return true;

  const archived = await loadHistory(filePath, opts);
  const combined = historyFromRecords([...historyToRecords(archived, opts.timeZone), ...expired]);
  const ok = await persistHistory(filePath, combined, opts);
  if (ok) {
    opts.logger.info('archived expired observations', { file: filePath, count: expired.length });
  }
  return ok;
}
