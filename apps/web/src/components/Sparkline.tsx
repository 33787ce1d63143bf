import { bucketValue, type BucketedSeries } from '@beacon/db';

import { BUCKET_COLORS } from './UptimeHeatmap';

const PAD = 2;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Polyline points: Up at the top, Down and no-data at the bottom. Future buckets are
 * left out, so the line stops at the current bucket.
 */
export function sparklinePoints(series: BucketedSeries, width: number, height: number): string {
  const count = series.buckets.length;
  const step = count > 1 ? (width - 2 * PAD) / (count - 1) : 0;

  const points: string[] = [];
  for (const b of series.buckets) {
    const value = bucketValue(b.state);
    if (value === 'future') continue;
    const x = round2(PAD + b.index * step);
    const y = value === 'Up' ? PAD : height - PAD;
    points.push(`${x},${y}`);
  }
  return points.join(' ');
}

interface SparklineProps {
  series: BucketedSeries;
  width?: number;
  height?: number;
}

export function Sparkline({ series, width = 200, height = 40 }: SparklineProps) {
  const points = sparklinePoints(series, width, height);

  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
    >
      {points && (
        <polyline
          points={points}
          fill="none"
          stroke={BUCKET_COLORS.Up}
          strokeWidth={1.5}
          strokeLinejoin="round"
        />
      )}
    </svg>
  );
}
