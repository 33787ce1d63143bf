import os from 'node:os';
import path from 'node:path';

import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../src/monitor/http', () => ({
  runHttpCheck: vi.fn(),
}));
vi.mock('../src/history/store', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/history/store')>();
  return { ...actual, persistHistory: vi.fn(actual.persistHistory) };
});

import { persistHistory } from '../src/history/store';
import { main } from '../src/index';
import { createMemoryLogger } from '../src/logger';
import { runHttpCheck, type HttpCheckConfig } from '../src/monitor/http';
import { runMonitorCycle } from '../src/scheduler/run';
import { DEFAULT_SETTINGS, type Settings } from '../src/settings';

const NOW = Date.UTC(2026, 0, 15, 10, 30);
const clock = () => NOW;

describe('scheduler/run', () => {
  let dir: string;
  let settings: Settings;

  beforeEach(async () => {
    dir = await fse.mkdtemp(path.join(os.tmpdir(), 'beacon-run-'));
    settings = {
      ...DEFAULT_SETTINGS,
      targets_file: path.join(dir, 'monitoring_targets.txt'),
      results_file: path.join(dir, 'data', 'results.json'),
      output_dir: path.join(dir, 'docs'),
      timezone: 'UTC',
    };

    await fse.writeFile(settings.targets_file, 'Google=google.com\nBroken=https://down.example\n');
    await fse.outputJson(settings.results_file, [
      { resource: 'google.com', status: 'Up', timestamp: '2026-01-15T09:00:00Z', latency_ms: 30 },
      { resource: 'old.example', status: 'Down', timestamp: '2026-01-15T08:00:00Z' },
    ]);

    vi.mocked(runHttpCheck).mockImplementation(async (config: HttpCheckConfig) =>
      config.url.includes('down.example')
        ? {
            status: 'down',
            latencyMs: 10_000,
            httpStatus: null,
            error: 'Timeout after 10000ms',
            attempts: 3,
          }
        : { status: 'up', latencyMs: 40, httpStatus: 200, error: null, attempts: 1 },
    );
  });

  afterEach(async () => {
    vi.clearAllMocks();
    await fse.remove(dir);
  });

  it('probes, persists and renders one run', async () => {
    const { logger } = createMemoryLogger();

    const summary = await runMonitorCycle(settings, { logger, clock });

    expect(summary).toEqual({
      source: 'file',
      targets: 2,
      observations: 2,
      down: 1,
      records: 4,
      persisted: true,
      archived: 0,
      report: {
        written: [
          'chart_google_com.svg',
          'sparkline_google_com.svg',
          'chart_https___down_example.svg',
          'sparkline_https___down_example.svg',
          'status.json',
          'index.html',
        ],
        failed: [],
      },
    });

    const saved: unknown = await fse.readJson(settings.results_file);
    expect(saved).toEqual([
      {
        resource: 'old.example',
        status: 'Down',
        timestamp: '2026-01-15T08:00:00.000+00:00',
      },
      {
        resource: 'google.com',
        status: 'Up',
        timestamp: '2026-01-15T09:00:00.000+00:00',
        latency_ms: 30,
      },
      {
        resource: 'google.com',
        status: 'Up',
        timestamp: '2026-01-15T10:30:00.000+00:00',
        latency_ms: 40,
        error: null,
      },
      {
        resource: 'https://down.example',
        status: 'Down',
        timestamp: '2026-01-15T10:30:00.000+00:00',
        latency_ms: 10_000,
        error: 'Timeout after 10000ms',
      },
    ]);
  });

  it('publishes only the configured targets', async () => {
    await runMonitorCycle(settings, { logger: createMemoryLogger().logger, clock });

    const status: unknown = await fse.readJson(path.join(settings.output_dir, 'status.json'));
    expect(status).toMatchObject({
      generated_at: '2026-01-15T10:30:00.000+00:00',
      last_checked_at: '2026-01-15T10:30:00.000+00:00',
      targets: [
        { id: 'google.com', name: 'Google', status: 'Up', uptime_pct: 100 },
        { id: 'https://down.example', name: 'Broken', status: 'Down', uptime_pct: 0 },
      ],
    });
    const removed = path.join(settings.output_dir, 'chart_old_example.svg');
    await expect(fse.pathExists(removed)).resolves.toBe(false);
  });

  it('still renders when the history cannot be saved', async () => {
    const blocker = path.join(dir, 'blocker');
    await fse.writeFile(blocker, '');
    const { logger } = createMemoryLogger();

    const summary = await runMonitorCycle(
      { ...settings, results_file: path.join(blocker, 'results.json') },
      { logger, clock },
    );

    expect(summary.persisted).toBe(false);
    expect(summary.records).toBe(2);
    expect(summary.report.failed).toEqual([]);
  });

  it('archives expired observations after the history is saved', async () => {
    const archiveFile = path.join(dir, 'data', 'archive.json');
    await fse.outputJson(settings.results_file, [
      { resource: 'google.com', status: 'Down', timestamp: '2025-12-01T00:00:00Z' },
      { resource: 'google.com', status: 'Up', timestamp: '2026-01-15T09:00:00Z' },
    ]);

    const summary = await runMonitorCycle(
      { ...settings, archive_file: archiveFile },
      { logger: createMemoryLogger().logger, clock },
    );

    expect(summary.archived).toBe(1);
    const archived: unknown = await fse.readJson(archiveFile);
    expect(archived).toEqual([
      { resource: 'google.com', status: 'Down', timestamp: '2025-12-01T00:00:00.000+00:00' },
    ]);
  });

  it('keeps expired observations out of the archive until the history is saved', async () => {
    const archiveFile = path.join(dir, 'data', 'archive.json');
    await fse.outputJson(settings.results_file, [
      { resource: 'google.com', status: 'Down', timestamp: '2025-12-01T00:00:00Z' },
    ]);
    vi.mocked(persistHistory).mockResolvedValueOnce(false);
    const { logger, entries } = createMemoryLogger();

    const summary = await runMonitorCycle(
      { ...settings, archive_file: archiveFile },
      { logger, clock },
    );

    expect(summary.persisted).toBe(false);
    expect(summary.archived).toBe(0);
    await expect(fse.pathExists(archiveFile)).resolves.toBe(false);
    expect(entries).toContainEqual({
      level: 'warn',
      scope: 'archive',
      message: 'history not saved, deferring archive',
      fields: { file: archiveFile, count: 1 },
    });
    const results: unknown = await fse.readJson(settings.results_file);
    expect(results).toEqual([
      { resource: 'google.com', status: 'Down', timestamp: '2025-12-01T00:00:00Z' },
    ]);
  });

  it('exits with 0 after a successful run', async () => {
    const { logger } = createMemoryLogger();

    const code = await main(
      {
        UPTIME_TARGETS_FILE: settings.targets_file,
        UPTIME_RESULTS_FILE: settings.results_file,
        UPTIME_OUTPUT_DIR: settings.output_dir,
        UPTIME_TIMEZONE: 'UTC',
      },
      { logger, clock },
    );

    expect(code).toBe(0);
    await expect(fse.pathExists(path.join(settings.output_dir, 'index.html'))).resolves.toBe(true);
  });

  it('exits with 2 when targets are required but missing', async () => {
    const { logger, entries } = createMemoryLogger();

    const code = await main(
      {
        UPTIME_TARGETS_FILE: path.join(dir, 'absent.txt'),
        UPTIME_REQUIRE_TARGETS: 'true',
        UPTIME_TIMEZONE: 'UTC',
      },
      { logger, clock },
    );

    expect(code).toBe(2);
    expect(runHttpCheck).not.toHaveBeenCalled();
    expect(entries.at(-1)).toMatchObject({
      level: 'error',
      scope: 'run',
      message: 'run aborted',
      fields: { code: 'MISCONFIGURED' },
    });
  });

  it('exits with 2 on an invalid timezone', async () => {
    const { logger } = createMemoryLogger();
    await expect(main({ UPTIME_TIMEZONE: 'Nowhere/Special' }, { logger, clock })).resolves.toBe(2);
  });
});
