/**
 * キャンペーン入札最適化エンジン - 除外（discard）判定
 */

import { ScorableRecord, Segment, Progression } from "./types";
import { DISCARD_THRESHOLDS } from "./src/constants";

/**
 * 除外判定に使う入力
 */
export type DiscardInput = Pick<
  ScorableRecord,
  "spend" | "preloads" | "status" | "kpiPrimary"
> & {
  segment: Segment;
  progression: Progression;
  installs: number | null;
  fillRate: number | null;
};

/**
 * レコードを入札アクション対象から除外するかどうかを判定
 *
 * 上から順に評価し、最初に成立した条件で確定する:
 * 1. green かつ installs >= 5 → 除外しない
 * 2. 良好推移 かつ fillRate < 60% かつ 主KPI > 0 かつ spend >= 100 → 除外しない
 * 3. spend < 100 → 除外
 * 4. preloads < 100 → 除外
 * 5. 一時停止中 かつ green 以外 → 除外
 */
export function shouldDiscard(input: DiscardInput): boolean {
  const isGreen = input.segment === "green";
  const installs = input.installs ?? 0;
  const fillRate = input.fillRate ?? 0;

  if (isGreen && installs >= DISCARD_THRESHOLDS.GREEN_MIN_INSTALLS) {
    return false;
  }

  if (
    input.progression === "good" &&
    fillRate < DISCARD_THRESHOLDS.GOOD_PROGRESSION_MAX_FILL_RATE &&
    input.kpiPrimary > 0 &&
    input.spend >= DISCARD_THRESHOLDS.MIN_SPEND
  ) {
    return false;
  }

  if (input.spend < DISCARD_THRESHOLDS.MIN_SPEND) return true;
  if (input.preloads < DISCARD_THRESHOLDS.MIN_PRELOADS) return true;
  if (input.status.toLowerCase() === DISCARD_THRESHOLDS.PAUSED_STATUS && !isGreen) {
    return true;
  }

  return false;
}
