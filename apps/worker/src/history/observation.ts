import { historyRecordSchema, type Observation } from '@beacon/db';

import { AppError } from '../errors';
import { formatInstant, parseInstant, type TimeZone } from '../time/zone';

export type NormalizeResult =
  | { ok: true; observation: Observation; at: number }
  | { ok: false; error: string };

/**
 * Validates a raw record and rewrites its timestamp as an offset-qualified ISO string in
 * the reference zone. Naive timestamps are read as wall time in that zone.
 */
export function normalizeRecord(raw: unknown, timeZone: TimeZone): NormalizeResult {
  const r = historyRecordSchema.safeParse(raw);
  if (!r.success) {
    const issue = r.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `${where}${issue?.message ?? 'invalid record'}` };
  }

  const at = parseInstant(r.data.timestamp, timeZone);
  if (at === null) {
    return { ok: false, error: `timestamp: malformed value ${JSON.stringify(r.data.timestamp)}` };
  }

  return { ok: true, observation: { ...r.data, timestamp: formatInstant(at, timeZone) }, at };
}

export function createObservation(raw: unknown, timeZone: TimeZone): Observation {
  const r = normalizeRecord(raw, timeZone);
  if (!r.ok) {
    throw new AppError('INVALID_ARGUMENT', `Invalid observation: ${r.error}`);
  }
  return r.observation;
}
