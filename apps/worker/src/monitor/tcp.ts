import net from 'node:net';

import { toErrorMessage } from '../errors';
import type { CheckOutcome } from './types';

export type TcpCheckConfig = {
  host: string;
  port: number;
  timeoutMs: number;
  retryDelaysMs?: readonly number[];
};

const DEFAULT_RETRY_DELAYS_MS = [300, 800] as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function attemptTcpCheck(config: TcpCheckConfig): Promise<Omit<CheckOutcome, 'attempts'>> {
  const started = performance.now();
  const elapsed = () => Math.round(performance.now() - started);

  return new Promise((resolve) => {
    let settled = false;
    let socket: net.Socket | null = null;

    const finish = (r: Omit<CheckOutcome, 'attempts'>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      socket?.destroy();
      resolve(r);
    };

    const timeoutId = setTimeout(() => {
      finish({
        status: 'down',
        latencyMs: elapsed(),
        httpStatus: null,
        error: `Timeout after ${config.timeoutMs}ms`,
      });
    }, config.timeoutMs);

    try {
      socket = net.connect({ host: config.host, port: config.port });
      socket.once('connect', () => {
        finish({ status: 'up', latencyMs: elapsed(), httpStatus: null, error: null });
      });
      socket.once('error', (err) => {
        finish({ status: 'down', latencyMs: elapsed(), httpStatus: null, error: err.message });
      });
    } catch (err) {
      finish({ status: 'down', latencyMs: elapsed(), httpStatus: null, error: toErrorMessage(err) });
    }
  });
}

export async function runTcpCheck(config: TcpCheckConfig): Promise<CheckOutcome> {
  const retryDelays = config.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  const maxAttempts = 1 + retryDelays.length;
  let last: CheckOutcome | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const r = await attemptTcpCheck(config);
    const outcome: CheckOutcome = { ...r, attempts: attempt };

    if (outcome.status === 'up') {
      return outcome;
    }

    last = outcome;
    const delay = retryDelays[attempt - 1];
    if (delay !== undefined) {
      await sleep(delay);
    }
  }

  return (
    last ?? {
      status: 'down',
      latencyMs: null,
      httpStatus: null,
      error: 'No attempts executed',
      attempts: 0,
    }
  );
}
