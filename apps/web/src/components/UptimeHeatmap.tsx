import { bucketValue, type BucketValue, type BucketedSeries } from '@beacon/db';

import { formatDateTime, formatDay, formatTime } from '../utils/datetime';

export const BUCKET_COLORS: Record<BucketValue, string> = {
  Up: '#FA4616',
  Down: '#0021A5',
  no_data: '#333333',
  future: '#FFFFFF',
};

const LEGEND: Array<{ value: BucketValue; label: string }> = [
  { value: 'Up', label: 'Up' },
  { value: 'Down', label: 'Down' },
  { value: 'no_data', label: 'Missing' },
  { value: 'future', label: 'Future' },
];

const CELL = 12;
const GAP = 2;
const LEFT = 48;
const TOP = 32;
const BOTTOM = 48;
const LEGEND_WIDTH = 96;

export interface HeatmapCell {
  column: number;
  row: number;
  value: BucketValue;
  startAt: number;
}

/**
 * Places buckets column by column, `rows` per column. The grid is right-aligned: the
 * last bucket of the range always fills the bottom cell of the last column.
 */
export function layoutHeatmap(
  series: BucketedSeries,
  rows: number,
): { rows: number; columns: number; cells: HeatmapCell[] } {
  const perColumn = Math.max(1, Math.floor(rows));
  const count = series.buckets.length;
  const offset = (perColumn - (count % perColumn)) % perColumn;

  const cells = series.buckets.map((b) => {
    const position = b.index + offset;
    return {
      column: Math.floor(position / perColumn),
      row: position % perColumn,
      value: bucketValue(b.state),
      startAt: b.startAt,
    };
  });

  return { rows: perColumn, columns: Math.ceil((count + offset) / perColumn), cells };
}

interface UptimeHeatmapProps {
  series: BucketedSeries;
  rows: number;
  title: string;
  timeZone: string;
}

export function UptimeHeatmap({ series, rows, title, timeZone }: UptimeHeatmapProps) {
  const layout = layoutHeatmap(series, rows);
  const gridWidth = layout.columns * (CELL + GAP);
  const gridHeight = layout.rows * (CELL + GAP);
  const width = LEFT + gridWidth + LEGEND_WIDTH;
  const height = TOP + gridHeight + BOTTOM;

  // Row labels come from the latest column, column labels from each column's first bucket.
  const rowStarts = new Map<number, number>();
  const columnStarts = new Map<number, number>();
  for (const cell of layout.cells) {
    rowStarts.set(cell.row, cell.startAt);
    if (!columnStarts.has(cell.column)) columnStarts.set(cell.column, cell.startAt);
  }

  const rowStep = Math.max(1, Math.round(layout.rows / 6));
  const columnStep = 5;

  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
      role="img"
      aria-label={title}
      fontFamily="sans-serif"
    >
      <text x={LEFT} y={20} fontSize={13} fill="#343a40">
        {title}
      </text>

      {layout.cells.map((cell) => (
        <rect
          key={cell.startAt}
          x={LEFT + cell.column * (CELL + GAP)}
          y={TOP + cell.row * (CELL + GAP)}
          width={CELL}
          height={CELL}
          fill={BUCKET_COLORS[cell.value]}
          stroke={cell.value === 'future' ? '#dee2e6' : undefined}
        >
          <title>{`${formatDateTime(cell.startAt, timeZone)}: ${cell.value}`}</title>
        </rect>
      ))}

      {[...rowStarts.entries()]
        .filter(([row]) => row % rowStep === 0)
        .map(([row, startAt]) => (
          <text
            key={`row-${row}`}
            x={LEFT - 6}
            y={TOP + row * (CELL + GAP) + CELL - 2}
            fontSize={10}
            textAnchor="end"
            fill="#6c757d"
          >
            {formatTime(startAt, timeZone)}
          </text>
        ))}

      {[...columnStarts.entries()]
        .filter(([column]) => column % columnStep === 0)
        .map(([column, startAt]) => (
          <text
            key={`column-${column}`}
            x={LEFT + column * (CELL + GAP)}
            y={TOP + gridHeight + 14}
            fontSize={10}
            fill="#6c757d"
          >
            {formatDay(startAt, timeZone)}
          </text>
        ))}

      {LEGEND.map((item, i) => (
        <g key={item.value} transform={`translate(${LEFT + gridWidth + 16}, ${TOP + i * 18})`}>
          <rect
            width={CELL}
            height={CELL}
            fill={BUCKET_COLORS[item.value]}
            stroke={item.value === 'future' ? '#000000' : undefined}
          />
          <text x={CELL + 6} y={CELL - 2} fontSize={11} fill="#212529">
            {item.label}
          </text>
        </g>
      ))}
    </svg>
  );
}
