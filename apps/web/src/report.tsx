import path from 'node:path';

import { writeFileAtomic } from '@beacon/db';
import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

import type { ReportInput, ReportLogger, StatusSnapshot } from './api/types';
import { Sparkline } from './components/Sparkline';
import { UptimeHeatmap } from './components/UptimeHeatmap';
import { StatusPage } from './pages/StatusPage';

export const STATUS_JSON = 'status.json';
export const INDEX_HTML = 'index.html';

export function renderSvg(element: ReactElement): string {
  return `${renderToStaticMarkup(element)}\n`;
}

export function renderStatusPage(snapshot: StatusSnapshot): string {
  return `<!DOCTYPE html>\n${renderToStaticMarkup(<StatusPage snapshot={snapshot} />)}\n`;
}

export type ReportResult = {
  written: string[];
  failed: string[];
};

/**
 * Renders every artifact into `outputDir`: one heatmap and one sparkline per target,
 * `status.json` and `index.html`. A file that cannot be written is logged and skipped.
 */
export async function writeReport(
  outputDir: string,
  input: ReportInput,
  logger: ReportLogger,
): Promise<ReportResult> {
  const { snapshot } = input;
  const result: ReportResult = { written: [], failed: [] };

  const write = async (name: string, render: () => string) => {
    const file = path.join(outputDir, name);
    try {
      await writeFileAtomic(file, render());
      result.written.push(name);
    } catch (err) {
      result.failed.push(name);
      logger.error('could not write report file', {
        code: 'PERSIST_FAILURE',
        file,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  for (const target of snapshot.targets) {
    const heatmap = input.heatmaps.get(target.id);
    if (heatmap) {
      await write(target.chart, () =>
        renderSvg(
          <UptimeHeatmap
            series={heatmap}
            rows={input.heatmapRows}
            title={`Uptime: ${target.name} (last ${snapshot.retention_days} days)`}
            timeZone={snapshot.timezone}
          />,
        ),
      );
    }

    const sparkline = input.sparklines.get(target.id);
    if (sparkline) {
      await write(target.sparkline, () => renderSvg(<Sparkline series={sparkline} />));
    }
  }

  await write(STATUS_JSON, () => `${JSON.stringify(snapshot, null, 2)}\n`);
  await write(INDEX_HTML, () => renderStatusPage(snapshot));

  logger.info('wrote report', {
    dir: outputDir,
    written: result.written.length,
    failed: result.failed.length,
  });
  return result;
}
