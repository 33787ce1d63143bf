import type { Env } from './env';
import { exitCodeFor, toAppError } from './errors';
import { createConsoleLogger, type Logger } from './logger';
import { runMonitorCycle } from './scheduler/run';
import { readSettings } from './settings';

export {
  bucketize,
  bucketizeTargets,
  buildScaffold,
  resolvedStatus,
  summarizeSeries,
} from './analytics/buckets';
export { appendToArchive, partitionExpired } from './history/archive';
export {
  historyFromRecords,
  historyToRecords,
  latestObservation,
  loadHistory,
  mergeAndPrune,
  persistHistory,
} from './history/store';
export { AppError, exitCodeFor, type ErrorCode } from './errors';
export { createConsoleLogger, createMemoryLogger, type Logger } from './logger';
export { probeAll, runProbe } from './monitor/probe';
export { parseTargetEnv, parseTargetList, resolveTargets } from './monitor/target-list';
export { classifyTarget, sanitizeTargetName } from './monitor/targets';
export { computeStatusSnapshot } from './public/status';
export { runMonitorCycle, type MonitorCycleSummary } from './scheduler/run';
export { DEFAULT_SETTINGS, readSettings, type Settings } from './settings';
export { formatInstant, parseInstant, zoneOffsetMs } from './time/zone';

export type MainOptions = {
  logger?: Logger;
  clock?: () => number;
};

/** Runs one monitoring cycle and returns the process exit code. */
export async function main(env: Env = process.env, opts: MainOptions = {}): Promise<number> {
  let logger = opts.logger ?? createConsoleLogger();
  try {
    const settings = readSettings(env);
    if (!opts.logger) logger = createConsoleLogger({ level: settings.log_level });
    await runMonitorCycle(settings, { logger, clock: opts.clock });
    return 0;
  } catch (err) {
    const e = toAppError(err);
    logger.child('run').error('run aborted', { code: e.code, error: e.message });
    return exitCodeFor(e);
  }
}
