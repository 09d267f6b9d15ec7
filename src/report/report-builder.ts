/**
 * レポート生成
 *
 * 判定済みレコードを1レコード1行のテーブルに整形し、描画用の色指定を付与する
 */

import { CellValue, EvaluatedRecord, RunMetadata } from "../../types";
import { DEFAULT_PALETTE } from "./report-styles";
import { KpiLabels, ReportArtifact, ReportPalette, RowAnnotation } from "./types";

// =============================================================================
// 列定義
// =============================================================================

/**
 * KPI列より前に並ぶ社内データ列（この順序で出力）
 */
export const LEADING_REPORT_COLUMNS = [
  "campaignId",
  "campaignName",
  "siteId",
  "siteName",
  "status",
  "spend",
  "preloads",
  "maxPreloads",
  "fillRate",
  "installs",
  "cvr",
  "ecpp",
  "ecpi",
  "bidFloorGroupName",
  "effectiveBidFloor",
  "bidRate",
  "dailyCap",
  "lowTier",
  "midTier",
  "highTier",
] as const;

export const KEY_COLUMN = "Key";
export const ACTION_COLUMN = "Action";
export const RECOMMENDED_BID_COLUMN = "Recommended bid";
export const DAILY_CAP_SUGGESTION_COLUMN = "Daily Cap Suggestion";

/**
 * レポートの列順を決定
 *
 * 社内データに存在しない列は出力しない
 */
export function buildReportColumns(
  internalColumns: readonly string[],
  labels: KpiLabels
): string[] {
  const present = new Set(internalColumns);
  return [
    KEY_COLUMN,
    ...LEADING_REPORT_COLUMNS.filter((column) => present.has(column)),
    labels.primary,
    labels.secondary,
    ACTION_COLUMN,
    RECOMMENDED_BID_COLUMN,
    DAILY_CAP_SUGGESTION_COLUMN,
  ];
}

// =============================================================================
// テーブル生成
// =============================================================================

function toReportRow(
  record: EvaluatedRecord,
  columns: readonly string[],
  labels: KpiLabels
): Record<string, CellValue> {
  const row: Record<string, CellValue> = {};

  for (const column of columns) {
    row[column] = record.source[column] ?? null;
  }

  row[KEY_COLUMN] = record.key;
  row[labels.primary] = record.kpiPrimary;
  row[labels.secondary] = record.kpiSecondary;
  row[ACTION_COLUMN] = record.action;
  row[RECOMMENDED_BID_COLUMN] = record.recommendedBid;
  row[DAILY_CAP_SUGGESTION_COLUMN] = record.dailyCapSuggestion;

  return row;
}

/**
 * 判定結果からレポートテーブルを生成（行順は判定順のまま）
 */
export function buildReportArtifact(
  evaluated: readonly EvaluatedRecord[],
  internalColumns: readonly string[],
  labels: KpiLabels,
  metadata: RunMetadata = {}
): ReportArtifact {
  const columns = buildReportColumns(internalColumns, labels);

  return {
    columns,
    rows: evaluated.map((record) => toReportRow(record, columns, labels)),
    kpiLabels: labels,
    metadata: { ...metadata },
  };
}

// =============================================================================
// 表示用アノテーション
// =============================================================================

/**
 * 行ごとの色指定を生成
 *
 * 除外行は KPI / Action セルを、アクションのない行は Action セルを着色しない
 */
export function annotateReport(
  evaluated: readonly EvaluatedRecord[],
  palette: Readonly<ReportPalette> = DEFAULT_PALETTE
): RowAnnotation[] {
  return evaluated.map((record) => {
    const segmentFill = record.discard ? null : palette.segments[record.segment];
    return {
      key: record.key,
      segment: record.segment,
      discard: record.discard,
      kpiFill: segmentFill,
      actionFill: record.action !== null ? segmentFill : null,
      dailyCapFill: record.dailyCapSuggestion !== null ? palette.dailyCap : null,
    };
  });
}
