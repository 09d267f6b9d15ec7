/**
 * レポートモジュール
 */

export * from "./types";
export { DEFAULT_SEGMENT_FILLS, DEFAULT_PALETTE } from "./report-styles";
export {
  LEADING_REPORT_COLUMNS,
  KEY_COLUMN,
  ACTION_COLUMN,
  RECOMMENDED_BID_COLUMN,
  DAILY_CAP_SUGGESTION_COLUMN,
  buildReportColumns,
  buildReportArtifact,
  annotateReport,
} from "./report-builder";
export { toCsvField, formatMetadataPreamble, exportReportToCsv } from "./csv-export";
export {
  RunSummaryInput,
  countActions,
  countSegments,
  buildRunSummary,
  formatActionBreakdown,
} from "./summary";
