/**
 * キャンペーン入札最適化エンジン - メインエントリーポイント
 *
 * マージ済みのキャンペーンレコードを1件ずつ独立に判定する。
 * セグメント・推移 → 除外判定 → 日予算キャップ → 入札最適化 の順に評価し、
 * レコード間の依存はない。
 */

import {
  ScorableRecord,
  ScoringConfig,
  EvaluatedRecord,
  Segment,
} from "./types";
import { classifySegment, classifyProgression } from "./segmentation";
import { shouldDiscard } from "./discard-policy";
import { suggestDailyCap, isAtBidFloor } from "./daily-cap";
import { optimizeBid } from "./bid-optimizer";
import { logger, StructuredLogger } from "./src/logger";

/**
 * 単一レコードを判定
 *
 * 純粋関数。同じレコード・同じ設定に対して常に同じ結果を返す
 */
export function evaluateCampaignRecord(
  record: ScorableRecord,
  config: ScoringConfig
): EvaluatedRecord {
  // 1. セグメント・推移
  const segment = classifySegment(record.kpiPrimary, record.kpiSecondary, config);
  const progression = classifyProgression(record.kpiPrimary, record.kpiSecondary);

  // 2. 除外判定
  const discard = shouldDiscard({ ...record, segment, progression });

  // 3. 日予算キャップ（除外・入札判定とは独立）
  const dailyCapSuggestion = suggestDailyCap(record);

  // 4. 入札最適化
  const atFloor = isAtBidFloor(record.bidRate, record.effectiveBidFloor);
  const decision = optimizeBid({
    record,
    segment,
    progression,
    discard,
    atFloor,
    config,
  });

  return {
    ...record,
    segment,
    progression,
    discard,
    atFloor,
    dailyCapSuggestion,
    action: decision.action,
    recommendedBid: decision.recommendedBid,
    ruleId: decision.ruleId,
  };
}

/**
 * 複数レコードを判定
 */
export function evaluateCampaignRecords(
  records: ScorableRecord[],
  config: ScoringConfig,
  log: StructuredLogger = logger
): EvaluatedRecord[] {
  if (records.length === 0) {
    log.warn("No campaign records to evaluate");
    return [];
  }

  const evaluated = records.map((record) => evaluateCampaignRecord(record, config));

  logEvaluationSummary(evaluated, log);

  return evaluated;
}

/**
 * 判定結果のサマリーをログ出力
 */
function logEvaluationSummary(
  evaluated: EvaluatedRecord[],
  log: StructuredLogger
): void {
  const segmentCounts: Record<Segment, number> = {
    green: 0,
    yellow: 0,
    orange: 0,
    red: 0,
  };

  let discarded = 0;
  let actioned = 0;
  let dailyCapFlags = 0;

  evaluated.forEach((record) => {
    segmentCounts[record.segment]++;
    if (record.discard) discarded++;
    if (record.action !== null) actioned++;
    if (record.dailyCapSuggestion !== null) dailyCapFlags++;
  });

  log.info("Campaign records evaluated", {
    total: evaluated.length,
    segments: segmentCounts,
    discarded,
    actioned,
    dailyCapFlags,
  });
}

export { classifySegment, classifySegmentSingle, classifyProgression } from "./segmentation";
export { shouldDiscard } from "./discard-policy";
export { suggestDailyCap, isAtBidFloor } from "./daily-cap";
export { optimizeBid, BID_RULES } from "./bid-optimizer";
export { parseKpiValue, buildKpiLabel } from "./kpi-parser";

export * from "./types";
