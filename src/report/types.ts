/**
 * レポート - 型定義
 */

import { CellValue, RunMetadata, Segment } from "../../types";

// =============================================================================
// レポート本体
// =============================================================================

export interface KpiLabels {
  primary: string;
  secondary: string;
}

/**
 * 1レコード1行のレポートテーブル
 */
export interface ReportArtifact {
  columns: string[];
  rows: Record<string, CellValue>[];
  kpiLabels: KpiLabels;
  metadata: RunMetadata;
}

// =============================================================================
// 表示用アノテーション
// =============================================================================

/**
 * セグメントごとの背景色（16進RGB）
 */
export type SegmentFillMap = Readonly<Record<Segment, string>>;

/**
 * レポート描画用の配色設定（読み取り専用、描画側に渡す）
 */
export interface ReportPalette {
  segments: SegmentFillMap;
  dailyCap: string;
}

/**
 * 行ごとの表示ヒント
 *
 * 除外された行は KPI セルに色を付けない
 */
export interface RowAnnotation {
  key: string;
  segment: Segment;
  discard: boolean;
  /** KPI セルの背景色 */
  kpiFill: string | null;
  /** Action / Recommended bid セルの背景色（アクションなしは null） */
  actionFill: string | null;
  /** Daily Cap Suggestion セルの背景色 */
  dailyCapFill: string | null;
}

// =============================================================================
// 実行サマリー
// =============================================================================

export interface RunSummary {
  /** null 除去後に判定したレコード数 */
  totalRows: number;
  /** サイト種別で除外した行数 */
  excludedRows: number;
  /** 必須値の欠損で除去した行数 */
  droppedForNulls: number;
  /** siteId が整数に変換できずスキップした行数 */
  malformedKeyRows: number;
  /** アクションが付いた行数 */
  actionedRows: number;
  /** アクションなし（除外・フロア張り付き・様子見を含む）の行数 */
  disregardedRows: number;
  dailyCapFlags: number;
  /** アクション → 件数（件数の降順） */
  actionBreakdown: Record<string, number>;
  segmentBreakdown: Record<Segment, number>;
  kpiPrimaryLabel: string;
  kpiSecondaryLabel: string;
  unparseableKpiCells: number;
}
