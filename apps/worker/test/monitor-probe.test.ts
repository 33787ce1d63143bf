import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('../src/monitor/http', () => ({
  runHttpCheck: vi.fn(),
}));
vi.mock('../src/monitor/tcp', () => ({
  runTcpCheck: vi.fn(),
}));
vi.mock('../src/monitor/icmp', () => ({
  runIcmpCheck: vi.fn(),
}));

import { createMemoryLogger } from '../src/logger';
import { runHttpCheck } from '../src/monitor/http';
import { runIcmpCheck } from '../src/monitor/icmp';
import { probeAll, runProbe } from '../src/monitor/probe';
import { runTcpCheck } from '../src/monitor/tcp';

const CHECKED_AT = Date.UTC(2026, 0, 15, 12);

function probeOptions() {
  const { logger, entries } = createMemoryLogger();
  return {
    entries,
    opts: { timeoutMs: 1_000, timeZone: 'America/New_York', logger, clock: () => CHECKED_AT },
  };
}

describe('monitor/probe', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('records a successful http check as Up in the reference zone', async () => {
    vi.mocked(runHttpCheck).mockResolvedValue({
      status: 'up',
      latencyMs: 42,
      httpStatus: 200,
      error: null,
      attempts: 1,
    });
    const { opts, entries } = probeOptions();

    const observation = await runProbe({ id: 'google.com', displayName: 'Google' }, opts);

    expect(observation).toEqual({
      resource: 'google.com',
      status: 'Up',
      timestamp: '2026-01-15T07:00:00.000-05:00',
      latency_ms: 42,
      error: null,
    });
    expect(runHttpCheck).toHaveBeenCalledWith({ url: 'https://google.com', timeoutMs: 1_000 });
    expect(entries).toEqual([
      {
        level: 'info',
        scope: '',
        message: 'check succeeded',
        fields: { target: 'google.com', http_status: 200, latency_ms: 42 },
      },
    ]);
  });

  it('records failures as Down and logs them with context', async () => {
    vi.mocked(runTcpCheck).mockResolvedValue({
      status: 'down',
      latencyMs: 1_000,
      httpStatus: null,
      error: 'Timeout after 1000ms',
      attempts: 3,
    });
    const { opts, entries } = probeOptions();

    const observation = await runProbe(
      { id: 'tcp://db.example.com:5432', displayName: 'DB' },
      opts,
    );

    expect(observation.status).toBe('Down');
    expect(observation.error).toBe('Timeout after 1000ms');
    expect(runTcpCheck).toHaveBeenCalledWith({
      host: 'db.example.com',
      port: 5432,
      timeoutMs: 1_000,
    });
    expect(entries).toEqual([
      {
        level: 'warn',
        scope: '',
        message: 'check failed',
        fields: {
          code: 'PROBE_FAILURE',
          target: 'tcp://db.example.com:5432',
          at: '2026-01-15T07:00:00.000-05:00',
          http_status: undefined,
          attempts: 3,
          error: 'Timeout after 1000ms',
        },
      },
    ]);
  });

  it('turns a throwing check into a Down observation', async () => {
    vi.mocked(runIcmpCheck).mockRejectedValue(new Error('spawn ping ENOENT'));
    const { opts } = probeOptions();

    const observation = await runProbe({ id: 'icmp://192.0.2.10', displayName: 'Router' }, opts);

    expect(observation).toMatchObject({
      status: 'Down',
      error: 'spawn ping ENOENT',
      latency_ms: null,
    });
  });

  it('records invalid addresses as Down without probing', async () => {
    const { opts } = probeOptions();

    const observation = await runProbe({ id: 'tcp://nowhere', displayName: 'Broken' }, opts);

    expect(observation.status).toBe('Down');
    expect(observation.error).toBe('target must be in host:port format (IPv6: [addr]:port)');
    expect(runTcpCheck).not.toHaveBeenCalled();
  });

  it('probes every target with bounded concurrency', async () => {
    let inFlight = 0;
    let peak = 0;
    vi.mocked(runHttpCheck).mockImplementation(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return { status: 'up', latencyMs: 5, httpStatus: 200, error: null, attempts: 1 };
    });
    const { opts } = probeOptions();
    const targets = ['a', 'b', 'c', 'd', 'e'].map((n) => ({
      id: `${n}.example.com`,
      displayName: n,
    }));

    const observations = await probeAll(targets, { ...opts, concurrency: 2 });

    expect(observations.map((o) => o.resource).sort()).toEqual(targets.map((t) => t.id));
    expect(peak).toBe(2);
    expect(runHttpCheck).toHaveBeenCalledTimes(5);
  });

  it('returns nothing for an empty target list', async () => {
    const { opts } = probeOptions();
    await expect(probeAll([], { ...opts, concurrency: 4 })).resolves.toEqual([]);
  });
});
