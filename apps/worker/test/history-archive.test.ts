import os from 'node:os';
import path from 'node:path';

import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { appendToArchive, partitionExpired } from '../src/history/archive';
import { createMemoryLogger } from '../src/logger';
import { DAY_MS } from '../src/time/zone';
import { buildHistory, buildObservation } from './helpers/data-builders';

const NOW = Date.UTC(2026, 0, 15, 12);

describe('history/archive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fse.mkdtemp(path.join(os.tmpdir(), 'beacon-archive-'));
  });

  afterEach(async () => {
    await fse.remove(dir);
  });

  it('splits the history at the retention cutoff', () => {
    const old = buildObservation('a.example', '2026-01-10T00:00:00Z', 'Down');
    const recent = buildObservation('a.example', '2026-01-15T00:00:00Z', 'Up');
    const undated = buildObservation('a.example', 'whenever', 'Up');

    const { kept, expired } = partitionExpired(
      buildHistory([recent, old, undated]),
      DAY_MS,
      NOW,
      'UTC',
    );

    expect(kept).toEqual([recent]);
    expect(expired).toEqual([old]);
  });

  it('appends expired observations to an existing archive', async () => {
    const file = path.join(dir, 'archive.json');
    await fse.writeJson(file, [
      { resource: 'a.example', status: 'Up', timestamp: '2026-01-01T00:00:00.000+00:00' },
    ]);
    const { logger, entries } = createMemoryLogger();

    const ok = await appendToArchive(
      file,
      [buildObservation('a.example', '2026-01-10T00:00:00.000+00:00', 'Down')],
      { timeZone: 'UTC', logger },
    );

    expect(ok).toBe(true);
    const archived: unknown = await fse.readJson(file);
    expect(archived).toEqual([
      { resource: 'a.example', status: 'Up', timestamp: '2026-01-01T00:00:00.000+00:00' },
      {
        resource: 'a.example',
        status: 'Down',
        timestamp: '2026-01-10T00:00:00.000+00:00',
        latency_ms: null,
        error: null,
      },
    ]);
    expect(entries.at(-1)).toEqual({
      level: 'info',
      scope: '',
      message: 'archived expired observations',
      fields: { file, count: 1 },
    });
  });

  it('does not touch the archive when nothing expired', async () => {
    const file = path.join(dir, 'archive.json');
    const { logger } = createMemoryLogger();

    await expect(appendToArchive(file, [], { timeZone: 'UTC', logger })).resolves.toBe(true);
    await expect(fse.pathExists(file)).resolves.toBe(false);
  });
});
