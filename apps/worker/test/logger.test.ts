import { afterEach, describe, expect, it, vi } from 'vitest';

import { createConsoleLogger, createMemoryLogger, formatLogLine } from '../src/logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats scope, message and fields on one line', () => {
    const fields = { kept: 12, cutoff: '2026-01-15T00:00:00Z', skipped: undefined };
    expect(formatLogLine('retention', 'pruned', fields)).toBe(
      'retention: pruned kept=12 cutoff=2026-01-15T00:00:00Z',
    );
    expect(formatLogLine('', 'check failed', { error: 'Timeout after 50ms', ok: false })).toBe(
      'check failed error="Timeout after 50ms" ok=false',
    );
    expect(formatLogLine('probe', 'done', { latency_ms: null })).toBe(
      'probe: done latency_ms=null',
    );
  });

  it('routes levels to the matching console method and filters below the minimum', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = createConsoleLogger({ level: 'info' }).child('store');
    logger.debug('hidden');
    logger.info('loaded history', { records: 3 });
    logger.warn('skipping record', { index: 2 });
    logger.error('could not persist history');

    expect(log.mock.calls).toEqual([['store: loaded history records=3']]);
    expect(warn.mock.calls).toEqual([['store: skipping record index=2']]);
    expect(error.mock.calls).toEqual([['store: could not persist history']]);
  });

  it('nests child scopes and records entries in memory', () => {
    const { logger, entries } = createMemoryLogger();

    logger.child('run').child('probe').debug('started', { targets: 2 });

    expect(entries).toEqual([
      { level: 'debug', scope: 'run.probe', message: 'started', fields: { targets: 2 } },
    ]);
  });
});
