import { toErrorMessage } from '../errors';
import { validateHttpTarget } from './targets';
import type { CheckOutcome } from './types';

export type HttpCheckConfig = {
  url: string;
  timeoutMs: number;
  retryDelaysMs?: readonly number[];
};

const USER_AGENT = 'BeaconStatus/0.1';
export const DEFAULT_RETRY_DELAYS_MS = [300, 800] as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}

async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  init: RequestInit,
): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

function statusOk(httpStatus: number): boolean {
  return httpStatus >= 200 && httpStatus < 300;
}

async function attemptHttpCheck(config: HttpCheckConfig): Promise<Omit<CheckOutcome, 'attempts'>> {
  const started = performance.now();

  try {
    const res = await fetchWithTimeout(config.url, config.timeoutMs, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
      cache: 'no-store',
      redirect: 'follow',
    });

    const latencyMs = Math.round(performance.now() - started);
    const httpStatus = res.status;
    await res.body?.cancel().catch(() => undefined);

    if (!statusOk(httpStatus)) {
      return {
        status: 'down',
        latencyMs,
        httpStatus,
        error: `Unexpected HTTP status: ${httpStatus}`,
      };
    }

    return { status: 'up', latencyMs, httpStatus, error: null };
  } catch (err) {
    const latencyMs = Math.round(performance.now() - started);
    if (isAbortError(err)) {
      return {
        status: 'down',
        latencyMs,
        httpStatus: null,
        error: `Timeout after ${config.timeoutMs}ms`,
      };
    }

    return {
      status: 'down',
      latencyMs,
      httpStatus: null,
      error: toErrorMessage(err),
    };
  }
}

export async function runHttpCheck(config: HttpCheckConfig): Promise<CheckOutcome> {
  const targetErr = validateHttpTarget(config.url);
  if (targetErr) {
    return { status: 'down', latencyMs: null, httpStatus: null, error: targetErr, attempts: 0 };
  }

  const retryDelays = config.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  const maxAttempts = 1 + retryDelays.length;
  let last: CheckOutcome | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const r = await attemptHttpCheck(config);
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
