/**
 * レコードマージモジュール
 *
 * 主要エクスポート:
 * - mergeAdvertiserData: 社内データ × 広告主KPI の左結合
 * - excludeSiteTypes: プッシュ通知系配信面の除外
 * - resolveExternalKeyColumns / suggestKpiColumns: 列解決
 */

export {
  REQUIRED_INTERNAL_COLUMNS,
  MergeOptions,
  MergeResult,
  buildRecordKey,
  toCampaignRecord,
  mergeAdvertiserData,
  isScorable,
  dropIncompleteRecords,
} from "./record-merge";

export { SiteExclusionResult, excludeSiteTypes } from "./site-exclusion";

export {
  KeyColumnResolution,
  KeyColumnOverrides,
  resolveExternalKeyColumns,
  resolveKpiColumn,
  columnLetterToIndex,
  suggestKpiColumns,
} from "./column-resolver";
