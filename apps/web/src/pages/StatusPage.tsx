import type { PublicTarget, StatusSnapshot, TargetStatus } from '../api/types';
import { formatDateTime, parseTimestamp } from '../utils/datetime';

const STYLES = `
body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif; margin: 2em; background-color: #f8f9fa; color: #212529; }
h1, h2 { color: #343a40; }
.banner { padding: 0.75em 1em; border-radius: 8px; color: #fff; font-weight: bold; margin-bottom: 1.5em; }
.banner.operational { background-color: #FA4616; }
.banner.partial_outage, .banner.major_outage { background-color: #0021A5; }
.banner.unknown { background-color: #6c757d; }
.service-grid { display: grid; grid-template-columns: repeat(3, 1fr); gap: 1.5em; }
@media (max-width: 992px) { .service-grid { grid-template-columns: repeat(2, 1fr); } }
@media (max-width: 768px) { .service-grid { grid-template-columns: 1fr; } }
.service { background-color: #fff; border: 1px solid #dee2e6; padding: 1.5em; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
.service h3 { margin-top: 0; }
.up { color: #FA4616; font-weight: bold; }
.down { color: #0021A5; font-weight: bold; }
.unknown { color: #6c757d; font-weight: bold; }
.metrics { color: #6c757d; font-size: 0.9em; }
img { max-width: 100%; height: auto; border-radius: 4px; margin-top: 1em; }
.footer { margin-top: 2em; padding-top: 1em; border-top: 1px solid #dee2e6; color: #6c757d; font-size: 0.9em; }
`;

export type BannerStatus = 'operational' | 'partial_outage' | 'major_outage' | 'unknown';

export function getBannerStatus(targets: readonly PublicTarget[]): BannerStatus {
  const known = targets.filter((t) => t.status !== 'Unknown');
  if (known.length === 0) return 'unknown';
  const down = known.filter((t) => t.status === 'Down').length;
  if (down === 0) return 'operational';
  return down === known.length ? 'major_outage' : 'partial_outage';
}

const BANNER_TEXT: Record<BannerStatus, string> = {
  operational: 'All Systems Operational',
  partial_outage: 'Partial System Outage',
  major_outage: 'Major System Outage',
  unknown: 'Status Unknown',
};

function statusClass(status: TargetStatus): string {
  return status.toLowerCase();
}

export function formatTimestamp(value: string | null, timeZone: string): string {
  if (value === null) return 'N/A';
  const ms = parseTimestamp(value);
  return ms === null ? value : formatDateTime(ms, timeZone);
}

function ServiceCard({ target, retentionDays }: { target: PublicTarget; retentionDays: number }) {
  return (
    <div className="service">
      <h3>{target.name}</h3>
      <p>
        <strong>Status:</strong>{' '}
        <span className={statusClass(target.status)}>{target.status}</span>
      </p>
      <p className="metrics">
        {target.uptime_pct !== null
          ? `${target.uptime_pct.toFixed(2)}% uptime (${retentionDays} days)`
          : 'No data yet'}
        {target.avg_latency_ms !== null && ` · avg ${target.avg_latency_ms}ms`}
        {target.p95_latency_ms !== null && ` · p95 ${target.p95_latency_ms}ms`}
      </p>
      <img src={target.sparkline} alt={`${target.name} recent trend`} />
      <img src={target.chart} alt={`${target.name} Uptime Chart`} />
    </div>
  );
}

export function StatusPage({ snapshot }: { snapshot: StatusSnapshot }) {
  const banner = getBannerStatus(snapshot.targets);

  return (
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title>{snapshot.site_title}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <h1>{snapshot.site_title}</h1>
        <div className={`banner ${banner}`}>{BANNER_TEXT[banner]}</div>
        <h2>Last Checked: {formatTimestamp(snapshot.last_checked_at, snapshot.timezone)}</h2>

        <div className="service-grid">
          {snapshot.targets.map((t) => (
            <ServiceCard key={t.id} target={t} retentionDays={snapshot.retention_days} />
          ))}
        </div>

        <div className="footer">
          Generated {formatTimestamp(snapshot.generated_at, snapshot.timezone)} · Times in{' '}
          {snapshot.timezone}
        </div>
      </body>
    </html>
  );
}
