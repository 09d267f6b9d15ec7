/**
 * キャンペーン入札最適化エンジン - 型定義
 */

// =============================================================================
// 入力テーブル
// =============================================================================

/**
 * セル値（CSV / スプレッドシート由来の生値）
 */
export type CellValue = string | number | boolean | null;

/**
 * 列順序付きのテーブル
 *
 * 外部（広告主）データセットのKPI列は列位置で選択するため、columns の順序に意味がある
 */
export interface DataTable {
  columns: string[];
  rows: Record<string, CellValue>[];
}

// =============================================================================
// 分類結果
// =============================================================================

export type Segment = "green" | "yellow" | "orange" | "red";

/**
 * 有効な Segment 一覧（良い順）
 */
export const SEGMENTS: readonly Segment[] = [
  "green",
  "yellow",
  "orange",
  "red",
] as const;

export type Progression = "good" | "poor" | "flat";

export const PROGRESSIONS: readonly Progression[] = [
  "good",
  "poor",
  "flat",
] as const;

/**
 * 入札ルールID（評価順）
 */
export type BidRuleId =
  | "DISCARDED"        // 除外済み
  | "AT_FLOOR"         // 既にフロア以下
  | "GOOD_PROGRESSION" // 良好な推移（セグメントより優先）
  | "POOR_PROGRESSION" // 悪化傾向
  | "GREEN"
  | "YELLOW"
  | "ORANGE"
  | "RED";

export type BidActionLabel =
  | `Increase bid ${number}%`
  | `Decrease bid ${number}%`
  | "Meet bid floor";

export type DailyCapSuggestion = "Suggest pause" | `Add daily cap $${string}`;

// =============================================================================
// キャンペーンレコード
// =============================================================================

/**
 * 社内データ1行 + 広告主KPIをマージしたレコード
 */
export interface CampaignRecord {
  /** campaignName（trim済み） + "_" + siteId（整数） */
  key: string;

  campaignName: string;
  siteId: number;
  siteName: string;
  status: string;

  spend: number;
  preloads: number;
  maxPreloads: number | null;
  fillRate: number | null;
  installs: number;

  bidRate: number;
  effectiveBidFloor: number | null;
  highTier: number | null;
  midTier: number | null;
  lowTier: number | null;

  /** 広告主データセットのKPI（小数表現、0.059 = 5.9%） */
  kpiPrimary: number | null;
  kpiSecondary: number | null;

  /** レポート出力用の元行 */
  source: Record<string, CellValue>;
}

/**
 * null除去後、スコアリング可能なレコード
 */
export interface ScorableRecord extends CampaignRecord {
  maxPreloads: number;
  fillRate: number;
  kpiPrimary: number;
  kpiSecondary: number;
}

/**
 * 判定結果を付与したレコード
 */
export interface EvaluatedRecord extends ScorableRecord {
  segment: Segment;
  progression: Progression;
  discard: boolean;
  atFloor: boolean;
  dailyCapSuggestion: DailyCapSuggestion | null;
  action: BidActionLabel | null;
  recommendedBid: number | null;
  ruleId: BidRuleId;
}

// =============================================================================
// 実行設定
// =============================================================================

/**
 * 1回の実行に対する設定（実行中は不変）
 */
export interface RunConfig {
  kpiTargetPrimary: number;
  kpiTargetSecondary: number;
  weightPrimary: number;
  weightSecondary: number;
  /** 広告主データセットの0始まり列番号 */
  primaryColumnIndex: number;
  secondaryColumnIndex: number;
}

/**
 * スコアリングに必要な設定部分
 */
export type ScoringConfig = Pick<
  RunConfig,
  "kpiTargetPrimary" | "kpiTargetSecondary" | "weightPrimary" | "weightSecondary"
>;

/**
 * 実行メタデータ（レポートにそのまま残す）
 */
export interface RunMetadata {
  /** "Scale" / "Performance" / 自由記述 */
  optimizationType?: string;
  /** 例: "Last 30 days" */
  reportDuration?: string;
  notes?: string;
}
