import type { Observation } from '@beacon/db';

export function avg(values: number[]): number | null {
  const clean = values.filter((v) => Number.isFinite(v) && v >= 0);
  if (clean.length === 0) return null;
  return Math.round(clean.reduce((acc, v) => acc + v, 0) / clean.length);
}

export function percentileFromValues(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  if (!Number.isFinite(p) || p <= 0 || p > 1) return null;

  const sorted = values.filter((v) => Number.isFinite(v)).sort((a, b) => a - b);
  if (sorted.length === 0) return null;

  // "Nearest-rank" (ceil(p*N)) with 0-based index.
  const idx = Math.max(0, Math.min(sorted.length - 1, Math.ceil(p * sorted.length) - 1));
  return sorted[idx] ?? null;
}

export type LatencyStats = {
  avgMs: number | null;
  p95Ms: number | null;
  samples: number;
};

/** Latency over successful checks only; failed checks measure the timeout, not the target. */
export function latencyStats(observations: readonly Observation[]): LatencyStats {
  const values: number[] = [];
  for (const o of observations) {
    if (o.status !== 'Up') continue;
    if (typeof o.latency_ms === 'number') values.push(o.latency_ms);
  }
  return {
    avgMs: avg(values),
    p95Ms: percentileFromValues(values, 0.95),
    samples: values.length,
  };
}
