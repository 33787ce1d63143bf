import {
  historyFileSchema,
  historyRecordsSchema,
  readJsonFile,
  serializeDbJson,
  writeFileAtomic,
  type History,
  type Observation,
  type TargetId,
} from '@beacon/db';

import { AppError, toErrorMessage } from '../errors';
import type { Logger } from '../logger';
import { formatInstant, parseInstant, type TimeZone } from '../time/zone';
import { normalizeRecord } from './observation';

export type StoreOptions = {
  timeZone: TimeZone;
  logger: Logger;
};

type Timed = { observation: Observation; at: number; seq: number };

function byTime(a: Timed, b: Timed): number {
  return a.at - b.at || a.seq - b.seq;
}

export function historyFromRecords(observations: Iterable<Observation>): History {
  const history: History = new Map();
  for (const o of observations) {
    const list = history.get(o.resource);
    if (list) {
      list.push(o);
    } else {
      history.set(o.resource, [o]);
    }
  }
  return history;
}

/** Flattens the history into the persisted order: by timestamp, insertion order for ties. */
export function historyToRecords(history: History, timeZone: TimeZone): Observation[] {
  const timed: Timed[] = [];
  const undated: Observation[] = [];
  let seq = 0;

  for (const list of history.values()) {
    for (const observation of list) {
      const at = parseInstant(observation.timestamp, timeZone);
      if (at === null) {
        undated.push(observation);
      } else {
        timed.push({ observation, at, seq: seq++ });
      }
    }
  }

  return [...timed.sort(byTime).map((t) => t.observation), ...undated];
}

/**
 * Unions the persisted history with this run's observations and drops everything older
 * than `now - retentionMs`. Duplicates are kept. Inputs are not modified, and applying it
 * again with no new observations returns an equal history.
 */
export function mergeAndPrune(
  existing: History,
  newObservations: readonly Observation[],
  retentionMs: number,
  now: number,
  opts: StoreOptions,
): History {
  if (!Number.isFinite(retentionMs) || retentionMs <= 0) {
    throw new AppError('INVALID_ARGUMENT', `retention must be a positive duration: ${retentionMs}`);
  }
  if (!Number.isFinite(now)) {
    throw new AppError('INVALID_ARGUMENT', `now must be a finite instant: ${now}`);
  }

  const cutoff = now - retentionMs;
  const grouped = new Map<TargetId, Timed[]>();
  let seq = 0;
  let pruned = 0;
  let malformed = 0;

  const add = (target: TargetId, observation: Observation) => {
    const at = parseInstant(observation.timestamp, opts.timeZone);
    if (at === null) {
      malformed++;
      opts.logger.warn('dropping observation with malformed timestamp', {
        target,
        timestamp: observation.timestamp,
      });
      return;
    }
    if (at < cutoff) {
      pruned++;
      return;
    }

    const list = grouped.get(target);
    const item = { observation, at, seq: seq++ };
    if (list) {
      list.push(item);
    } else {
      grouped.set(target, [item]);
    }
  };

  for (const [target, list] of existing) {
    for (const observation of list) add(target, observation);
  }
  for (const observation of newObservations) add(observation.resource, observation);

  const merged: History = new Map();
  for (const [target, list] of grouped) {
    merged.set(target, list.sort(byTime).map((t) => t.observation));
  }

  opts.logger.debug('merged', {
    kept: seq,
    added: newObservations.length,
    pruned,
    malformed,
    cutoff: formatInstant(cutoff, opts.timeZone),
  });

  return merged;
}

/**
 * Reads the persisted history. A missing, unreadable or malformed file yields an empty
 * history; individual bad records are skipped and the rest are kept.
 */
export async function loadHistory(filePath: string, opts: StoreOptions): Promise<History> {
  const { logger } = opts;
  const file = await readJsonFile(filePath);

  if (!file.ok) {
    if (file.reason === 'missing') {
      logger.info('history file not found, starting fresh', {
        code: 'STORE_UNREADABLE',
        file: filePath,
      });
    } else {
      logger.error('history file could not be read, starting fresh', {
        code: 'STORE_UNREADABLE',
        file: filePath,
        reason: file.reason,
        error: file.error,
      });
    }
    return new Map();
  }

  const rows = historyFileSchema.safeParse(file.value);
  if (!rows.success) {
    logger.error('history file is not a list of records, starting fresh', {
      code: 'STORE_UNREADABLE',
      file: filePath,
    });
    return new Map();
  }

  const observations: Observation[] = [];
  rows.data.forEach((row, index) => {
    const r = normalizeRecord(row, opts.timeZone);
    if (r.ok) {
      observations.push(r.observation);
    } else {
      logger.warn('skipping invalid history record', { file: filePath, index, error: r.error });
    }
  });

  logger.info('loaded history', {
    file: filePath,
    records: observations.length,
    skipped: rows.data.length - observations.length,
  });
  return historyFromRecords(observations);
}

/** Writes the history atomically. Failures are logged and reported as `false`. */
export async function persistHistory(
  filePath: string,
  history: History,
  opts: StoreOptions,
): Promise<boolean> {
  const records = historyToRecords(history, opts.timeZone);
  try {
    const contents = serializeDbJson(historyRecordsSchema, records, {
      field: filePath,
      indent: 2,
    });
    await writeFileAtomic(filePath, `${contents}\n`);
  } catch (err) {
    opts.logger.error('could not persist history', {
      code: 'PERSIST_FAILURE',
      file: filePath,
      records: records.length,
      error: toErrorMessage(err),
    });
    return false;
  }

  opts.logger.info('saved history', { file: filePath, records: records.length });
  return true;
}

/** The chronologically latest observation for `target`, if any. */
export function latestObservation(
  history: History,
  target: TargetId,
  timeZone: TimeZone,
): Observation | null {
  let latest: Observation | null = null;
  let latestAt = Number.NEGATIVE_INFINITY;
  for (const o of history.get(target) ?? []) {
    const at = parseInstant(o.timestamp, timeZone);
    if (at !== null && at >= latestAt) {
      latest = o;
      latestAt = at;
    }
  }
  return latest;
}
