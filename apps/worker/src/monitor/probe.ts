import type { Observation, Target } from '@beacon/db';

import { toErrorMessage } from '../errors';
import { createObservation } from '../history/observation';
import type { Logger } from '../logger';
import { formatInstant } from '../time/zone';
import { runHttpCheck } from './http';
import { runIcmpCheck } from './icmp';
import { classifyTarget } from './targets';
import { runTcpCheck } from './tcp';
import type { CheckOutcome } from './types';

export type ProbeOptions = {
  timeoutMs: number;
  timeZone: string;
  logger: Logger;
  clock?: () => number;
};

async function check(address: string, timeoutMs: number): Promise<CheckOutcome> {
  const target = classifyTarget(address);
  switch (target.kind) {
    case 'http':
      return runHttpCheck({ url: target.url, timeoutMs });
    case 'tcp':
      return runTcpCheck({ host: target.host, port: target.port, timeoutMs });
    case 'icmp':
      return runIcmpCheck({ host: target.host, timeoutMs });
    case 'invalid':
      return { status: 'down', latencyMs: null, httpStatus: null, error: target.error, attempts: 0 };
  }
}

/**
 * Checks one target and records the result. A failed or crashed check is a `Down`
 * observation, never an exception.
 */
export async function runProbe(target: Target, opts: ProbeOptions): Promise<Observation> {
  const clock = opts.clock ?? Date.now;
  const checkedAt = clock();

  let outcome: CheckOutcome;
  try {
    outcome = await check(target.id, opts.timeoutMs);
  } catch (err) {
    outcome = {
      status: 'down',
      latencyMs: null,
      httpStatus: null,
      error: toErrorMessage(err),
      attempts: 0,
    };
  }

  const observation = createObservation(
    {
      resource: target.id,
      status: outcome.status === 'up' ? 'Up' : 'Down',
      timestamp: formatInstant(checkedAt, opts.timeZone),
      latency_ms: outcome.latencyMs,
      error: outcome.error,
    },
    opts.timeZone,
  );

  if (outcome.status === 'up') {
    opts.logger.info('check succeeded', {
      target: target.id,
      http_status: outcome.httpStatus ?? undefined,
      latency_ms: outcome.latencyMs,
    });
  } else {
    opts.logger.warn('check failed', {
      code: 'PROBE_FAILURE',
      target: target.id,
      at: observation.timestamp,
      http_status: outcome.httpStatus ?? undefined,
      attempts: outcome.attempts,
      error: outcome.error,
    });
  }

  return observation;
}

export type ProbeAllOptions = ProbeOptions & { concurrency: number };

/** Probes every target with at most `concurrency` checks in flight. Result order is unspecified. */
export async function probeAll(targets: Target[], opts: ProbeAllOptions): Promise<Observation[]> {
  const results: Observation[] = [];
  let next = 0;

  const worker = async () => {
    while (next < targets.length) {
      const target = targets[next++];
      if (!target) break;
      results.push(await runProbe(target, opts));
    }
  };

  const lanes = Math.max(1, Math.min(opts.concurrency, targets.length));
  await Promise.all(Array.from({ length: lanes }, () => worker()));
  return results;
}
