/**
 * Newsdesk — Delivery Module
 *
 * Report rendering and output.
 */

export {
  scoreBand,
  SCORE_BAND_MEDIUM_THRESHOLD,
  SCORE_BAND_HIGH_THRESHOLD,
  prepareReportData,
  calculateStatistics,
  renderHtmlReport,
  escapeHtml,
  formatScore,
  formatDate,
  reportFilename,
  saveReport,
  type ScoreBand,
  type ReportArticle,
  type ReportData,
  type ReportOptions,
  type ReportStatistics,
} from './report';
