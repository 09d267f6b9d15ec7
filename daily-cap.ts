/**
 * キャンペーン入札最適化エンジン - 日予算キャップ提案
 *
 * 除外判定・入札提案とは独立に評価する
 */

import { DailyCapSuggestion, ScorableRecord } from "./types";
import { DAILY_CAP } from "./src/constants";
import { roundToCents, formatCurrency } from "./money";

export type DailyCapInput = Pick<
  ScorableRecord,
  "spend" | "bidRate" | "effectiveBidFloor" | "kpiPrimary" | "kpiSecondary"
>;

/**
 * 入札額がフロア以下かどうか（フロア未設定なら false）
 */
export function isAtBidFloor(bidRate: number, effectiveBidFloor: number | null): boolean {
  return effectiveBidFloor !== null && bidRate <= effectiveBidFloor;
}

/**
 * 日予算キャップ額 = 日平均消化額 × 50%
 */
export function calculateDailyCap(spend: number): number {
  return roundToCents((spend / DAILY_CAP.PERIOD_DAYS) * DAILY_CAP.CAP_RATIO);
}

/**
 * 日予算キャップ / 停止の提案を返す
 *
 * - spend <= 1000 → 提案なし
 * - 両KPIが0 → 停止提案
 * - フロア張り付き かつ いずれかのKPIが正 → 日予算キャップ提案
 */
export function suggestDailyCap(input: DailyCapInput): DailyCapSuggestion | null {
  if (input.spend <= DAILY_CAP.MIN_SPEND) {
    return null;
  }

  if (input.kpiPrimary === 0 && input.kpiSecondary === 0) {
    return "Suggest pause";
  }

  const atFloor = isAtBidFloor(input.bidRate, input.effectiveBidFloor);
  const hasPerformance = input.kpiPrimary > 0 || input.kpiSecondary > 0;

  if (atFloor && hasPerformance) {
    return `Add daily cap ${formatCurrency(calculateDailyCap(input.spend))}`;
  }

  return null;
}
