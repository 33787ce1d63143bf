export * from './api/types';
export {
  BUCKET_COLORS,
  layoutHeatmap,
  UptimeHeatmap,
  type HeatmapCell,
} from './components/UptimeHeatmap';
export { Sparkline, sparklinePoints } from './components/Sparkline';
export { getBannerStatus, StatusPage, type BannerStatus } from './pages/StatusPage';
export {
  INDEX_HTML,
  renderStatusPage,
  renderSvg,
  STATUS_JSON,
  writeReport,
  type ReportResult,
} from './report';
