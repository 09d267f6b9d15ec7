/**
 * キャンペーン入札最適化エンジン - セグメント・推移判定
 */

import { Segment, Progression, ScoringConfig } from "./types";
import { SEGMENT_THRESHOLDS } from "./src/constants";
import { logger } from "./src/logger";

/**
 * 加重スコアを計算
 */
export function weightedScore(
  kpiPrimary: number,
  kpiSecondary: number,
  weightPrimary: number,
  weightSecondary: number
): number {
  return weightPrimary * kpiPrimary + weightSecondary * kpiSecondary;
}

/**
 * 加重目標値を計算
 */
export function weightedTarget(config: ScoringConfig): number {
  return weightedScore(
    config.kpiTargetPrimary,
    config.kpiTargetSecondary,
    config.weightPrimary,
    config.weightSecondary
  );
}

/**
 * 目標に対する超過率 (score - target) / target
 *
 * target が正でない場合は 0 を返し、警告ログを出す
 */
export function percentAboveTarget(score: number, target: number): number {
  if (target > 0) {
    return (score - target) / target;
  }
  logger.warn("Non-positive KPI target, treating percent above target as 0", {
    score,
    target,
  });
  return 0;
}

/**
 * 目標に対する未達率 (target - score) / target
 *
 * target が正でない場合は 0 を返し、警告ログを出す
 */
export function percentBelowTarget(score: number, target: number): number {
  if (target > 0) {
    return (target - score) / target;
  }
  logger.warn("Non-positive KPI target, treating percent below target as 0", {
    score,
    target,
  });
  return 0;
}

/**
 * 未達率からセグメントを決定（yellow / orange / red）
 */
function segmentFromShortfall(pctBelow: number): Segment {
  if (pctBelow <= SEGMENT_THRESHOLDS.YELLOW_MAX_BELOW) return "yellow";
  if (pctBelow < SEGMENT_THRESHOLDS.ORANGE_MAX_BELOW) return "orange";
  return "red";
}

/**
 * 加重スコアと加重目標からセグメントを判定
 *
 * 両KPIが0の場合は比率計算の前に red とする（ホエール保護）
 */
export function classifySegment(
  kpiPrimary: number,
  kpiSecondary: number,
  config: ScoringConfig
): Segment {
  const score = weightedScore(
    kpiPrimary,
    kpiSecondary,
    config.weightPrimary,
    config.weightSecondary
  );
  const target = weightedTarget(config);

  if (score >= target) {
    return "green";
  }

  if (kpiPrimary === 0 && kpiSecondary === 0) {
    return "red";
  }

  return segmentFromShortfall(percentBelowTarget(score, target));
}

/**
 * 単一KPIを自身の目標に対してセグメント判定
 *
 * 悪化傾向（poor progression）の判定で副KPIに使用
 */
export function classifySegmentSingle(value: number, target: number): Segment {
  if (value >= target) {
    return "green";
  }
  if (value === 0) {
    return "red";
  }
  return segmentFromShortfall(percentBelowTarget(value, target));
}

/**
 * 2つの観測ウィンドウ間の推移を判定
 *
 * 主KPIが0の場合は flat（少数サンプルで誤って poor と判定しない）
 */
export function classifyProgression(
  kpiPrimary: number,
  kpiSecondary: number
): Progression {
  if (kpiPrimary === 0) {
    return "flat";
  }
  if (kpiSecondary > kpiPrimary) {
    return "good";
  }
  if (kpiSecondary < kpiPrimary) {
    return "poor";
  }
  return "flat";
}
