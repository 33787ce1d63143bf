import { execFile } from 'node:child_process';

import { toErrorMessage } from '../errors';
import { isValidHost } from './targets';
import type { CheckOutcome } from './types';

export type IcmpCheckConfig = {
  host: string;
  timeoutMs: number;
  platform?: NodeJS.Platform;
};

export function buildPingArgs(
  host: string,
  timeoutMs: number,
  platform: NodeJS.Platform,
): string[] {
  if (platform === 'win32') {
    return ['-n', '1', '-w', String(timeoutMs), host];
  }
  return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), host];
}

// `time=12.3 ms` (Linux/macOS) or `time=12ms` / `time<1ms` (Windows)
export function parsePingLatency(stdout: string): number | null {
  const m = /time[=<]\s*([\d.]+)\s*ms/i.exec(stdout);
  if (!m || m[1] === undefined) return null;
  const v = Number(m[1]);
  return Number.isFinite(v) ? Math.round(v) : null;
}

function execPing(
  args: string[],
  timeoutMs: number,
): Promise<{ ok: true; stdout: string } | { ok: false; error: string; timedOut: boolean }> {
  return new Promise((resolve) => {
    execFile('ping', args, { timeout: timeoutMs, windowsHide: true }, (err, stdout) => {
      if (err) {
        const timedOut = 'killed' in err && err.killed === true;
        resolve({ ok: false, error: toErrorMessage(err), timedOut });
        return;
      }
      resolve({ ok: true, stdout: String(stdout) });
    });
  });
}

export async function runIcmpCheck(config: IcmpCheckConfig): Promise<CheckOutcome> {
  if (!isValidHost(config.host)) {
    return {
      status: 'down',
      latencyMs: null,
      httpStatus: null,
      error: 'target host is invalid',
      attempts: 0,
    };
  }

  const platform = config.platform ?? process.platform;
  const started = performance.now();
  // The process gets a little longer than ping's own deadline before it is killed.
  const r = await execPing(
    buildPingArgs(config.host, config.timeoutMs, platform),
    config.timeoutMs + 1000,
  );
  const elapsed = Math.round(performance.now() - started);

  if (!r.ok) {
    return {
      status: 'down',
      latencyMs: elapsed,
      httpStatus: null,
      error: r.timedOut ? `Timeout after ${config.timeoutMs}ms` : r.error,
      attempts: 1,
    };
  }

  return {
    status: 'up',
    latencyMs: parsePingLatency(r.stdout) ?? elapsed,
    httpStatus: null,
    error: null,
    attempts: 1,
  };
}
