/**
 * キャンペーン入札最適化エンジン - 定数定義
 */

// =============================================================================
// セグメント判定しきい値
// =============================================================================
export const SEGMENT_THRESHOLDS = {
  /** 目標未達率がこの値以下なら yellow */
  YELLOW_MAX_BELOW: 0.5,
  /** 目標未達率がこの値未満なら orange（以上は red） */
  ORANGE_MAX_BELOW: 1.0,
} as const;

// =============================================================================
// 除外（discard）判定しきい値
// =============================================================================
export const DISCARD_THRESHOLDS = {
  /** green でもインストール数がこれ以上なら除外しない */
  GREEN_MIN_INSTALLS: 5,
  /** 良好推移の例外を適用するフィルレート上限（未満） */
  GOOD_PROGRESSION_MAX_FILL_RATE: 0.6,
  /** 最低消化額 */
  MIN_SPEND: 100,
  /** 最低プリロード数 */
  MIN_PRELOADS: 100,
  /** 停止扱いのステータス（小文字比較） */
  PAUSED_STATUS: "paused",
} as const;

// =============================================================================
// 日予算キャップ提案
// =============================================================================
export const DAILY_CAP = {
  /** この消化額を超えた場合のみ提案 */
  MIN_SPEND: 1000,
  /** 集計期間の日数 */
  PERIOD_DAYS: 30,
  /** 日平均消化額に掛ける比率 */
  CAP_RATIO: 0.5,
} as const;

// =============================================================================
// 入札調整
// =============================================================================
export const BID_ADJUSTMENT = {
  /** 良好推移: secondary/primary がこれ以上なら大きく引き上げ */
  STRONG_PROGRESSION_RATIO: 2.0,
  PROGRESSION_STRONG_INCREASE: 0.15,
  PROGRESSION_MILD_INCREASE: 0.1,

  /** 悪化傾向の引き下げ率 */
  POOR_PROGRESSION_DECREASE: 0.1,

  /** green: 高フィルレート帯（超） */
  HIGH_FILL_RATE: 0.8,
  /** green: 中フィルレート帯（超） */
  MID_FILL_RATE: 0.6,
  /** フィルレート帯で固定される引き上げ率 */
  FILL_CAPPED_INCREASE: 0.15,
  /** green: 目標超過率に応じた引き上げ */
  GREEN_STEPS: [
    { maxAbove: 0.25, increase: 0.1 },
    { maxAbove: 0.5, increase: 0.2 },
  ],
  GREEN_MAX_INCREASE: 0.3,

  /** yellow */
  YELLOW_MILD_MAX_BELOW: 0.25,
  YELLOW_MILD_DECREASE: 0.1,
  YELLOW_STRONG_DECREASE: 0.15,

  /** orange */
  ORANGE_MILD_MAX_BELOW: 0.75,
  ORANGE_MILD_DECREASE: 0.2,
  ORANGE_STRONG_DECREASE: 0.25,

  /** red */
  RED_DECREASE: 0.3,

  /** 上限ティア超過時の例外 */
  TIER_OVERRIDE_MAX_FILL_RATE: 0.7,
  TIER_OVERRIDE_INCREASE: 0.15,
} as const;

// =============================================================================
// 実行設定デフォルト
// =============================================================================
export const RUN_DEFAULTS = {
  WEIGHT_PRIMARY: 0.8,
  WEIGHT_SECONDARY: 0.2,
  /** 重みの合計が 1.0 から許容される誤差 */
  WEIGHT_SUM_TOLERANCE: 0.001,
} as const;

// =============================================================================
// サイト種別除外
// =============================================================================

/**
 * プッシュ通知系の配信面（マージ前に除外）
 */
export const EXCLUDED_SITE_PATTERN = /OM.?Push|OM_PUSH|Notif/i;

// =============================================================================
// サーバー設定
// =============================================================================
export const SERVER = {
  DEFAULT_PORT: 8080,
  DEFAULT_BODY_LIMIT: "10mb",
  DEFAULT_RATE_LIMIT_PER_MINUTE: 60,
  SERVICE_NAME: "campaign-bid-optimizer",
} as const;
