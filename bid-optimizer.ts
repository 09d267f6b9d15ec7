/**
 * キャンペーン入札最適化エンジン - 入札額最適化
 *
 * 入札判定は「ガード付きルールの順序付きリスト」として表現する。
 * 上から順に when を評価し、最初に成立したルールの decide で確定する（以降は評価しない）。
 */

import {
  BidActionLabel,
  BidRuleId,
  Progression,
  ScorableRecord,
  ScoringConfig,
  Segment,
} from "./types";
import { BID_ADJUSTMENT, DISCARD_THRESHOLDS } from "./src/constants";
import {
  classifySegmentSingle,
  percentAboveTarget,
  percentBelowTarget,
  weightedScore,
  weightedTarget,
} from "./segmentation";
import { roundToCents } from "./money";

// =============================================================================
// 型定義
// =============================================================================

/**
 * 入札判定の入力
 */
export interface BidContext {
  record: Pick<
    ScorableRecord,
    | "bidRate"
    | "effectiveBidFloor"
    | "highTier"
    | "fillRate"
    | "installs"
    | "spend"
    | "kpiPrimary"
    | "kpiSecondary"
  >;
  segment: Segment;
  progression: Progression;
  discard: boolean;
  atFloor: boolean;
  config: ScoringConfig;
}

/**
 * ルールが返す調整内容（null は「調整なし」）
 */
export type BidOutcome = {
  action: BidActionLabel;
  recommendedBid: number;
} | null;

export interface BidRule {
  id: BidRuleId;
  when: (ctx: BidContext) => boolean;
  decide: (ctx: BidContext) => BidOutcome;
}

export interface BidDecision {
  ruleId: BidRuleId;
  action: BidActionLabel | null;
  recommendedBid: number | null;
}

// =============================================================================
// ラベル
// =============================================================================

export function increaseLabel(pct: number): BidActionLabel {
  return `Increase bid ${Math.round(pct * 100)}%`;
}

export function decreaseLabel(pct: number): BidActionLabel {
  return `Decrease bid ${Math.round(pct * 100)}%`;
}

export const MEET_BID_FLOOR: BidActionLabel = "Meet bid floor";

// =============================================================================
// 上限ティア・フロア補正
// =============================================================================

/**
 * 入札フロアを適用
 *
 * フロア未満になる場合はフロア値に置き換え、ラベルも "Meet bid floor" に差し替える
 */
export function applyBidFloor(
  bid: number,
  action: BidActionLabel,
  effectiveBidFloor: number | null
): NonNullable<BidOutcome> {
  if (effectiveBidFloor !== null && bid < effectiveBidFloor) {
    return { action: MEET_BID_FLOOR, recommendedBid: roundToCents(effectiveBidFloor) };
  }
  return { action, recommendedBid: roundToCents(bid) };
}

/**
 * 上限ティア（highTier）を適用（引き上げ時のみ）
 *
 * - highTier 未設定: ラベルは名目の引き上げ率、入札額はそのまま
 * - 現在の入札額が既に highTier 超 かつ fillRate < 70%: 現在額 +15% に固定
 * - それ以外: min(候補額, highTier)、ラベルは名目の引き上げ率
 */
export function applyHighTier(
  candidateBid: number,
  pct: number,
  ctx: BidContext
): NonNullable<BidOutcome> {
  const { bidRate, highTier, fillRate } = ctx.record;

  if (highTier === null) {
    return { action: increaseLabel(pct), recommendedBid: roundToCents(candidateBid) };
  }

  if (bidRate > highTier && fillRate < BID_ADJUSTMENT.TIER_OVERRIDE_MAX_FILL_RATE) {
    return {
      action: increaseLabel(BID_ADJUSTMENT.TIER_OVERRIDE_INCREASE),
      recommendedBid: roundToCents(bidRate * (1 + BID_ADJUSTMENT.TIER_OVERRIDE_INCREASE)),
    };
  }

  return {
    action: increaseLabel(pct),
    recommendedBid: roundToCents(Math.min(candidateBid, highTier)),
  };
}

/**
 * 引き上げ: 候補額 → 上限ティア → フロア の順に、各段階で丸める
 */
function increaseBid(ctx: BidContext, pct: number): NonNullable<BidOutcome> {
  const candidate = roundToCents(ctx.record.bidRate * (1 + pct));
  const tiered = applyHighTier(candidate, pct, ctx);
  return applyBidFloor(tiered.recommendedBid, tiered.action, ctx.record.effectiveBidFloor);
}

/**
 * 引き下げ: 上限ティアは不要、フロアのみ適用
 */
function decreaseBid(ctx: BidContext, pct: number): NonNullable<BidOutcome> {
  const candidate = roundToCents(ctx.record.bidRate * (1 - pct));
  return applyBidFloor(candidate, decreaseLabel(pct), ctx.record.effectiveBidFloor);
}

function scoreOf(ctx: BidContext): { score: number; target: number } {
  const { kpiPrimary, kpiSecondary } = ctx.record;
  return {
    score: weightedScore(
      kpiPrimary,
      kpiSecondary,
      ctx.config.weightPrimary,
      ctx.config.weightSecondary
    ),
    target: weightedTarget(ctx.config),
  };
}

// =============================================================================
// ルール定義
// =============================================================================

/**
 * green の引き上げ率（fillRate <= 60% のとき、目標超過率に比例）
 */
export function greenIncreasePct(pctAbove: number): number {
  for (const step of BID_ADJUSTMENT.GREEN_STEPS) {
    if (pctAbove <= step.maxAbove) {
      return step.increase;
    }
  }
  return BID_ADJUSTMENT.GREEN_MAX_INCREASE;
}

const discardedRule: BidRule = {
  id: "DISCARDED",
  when: (ctx) => ctx.discard,
  decide: () => null,
};

const atFloorRule: BidRule = {
  id: "AT_FLOOR",
  when: (ctx) => ctx.atFloor,
  decide: () => null,
};

/**
 * 良好推移（セグメントより優先）
 */
const goodProgressionRule: BidRule = {
  id: "GOOD_PROGRESSION",
  when: (ctx) =>
    ctx.progression === "good" &&
    ctx.record.fillRate < BID_ADJUSTMENT.MID_FILL_RATE &&
    ctx.record.kpiPrimary > 0,
  decide: (ctx) => {
    const ratio = ctx.record.kpiSecondary / ctx.record.kpiPrimary;
    const pct =
      ratio >= BID_ADJUSTMENT.STRONG_PROGRESSION_RATIO
        ? BID_ADJUSTMENT.PROGRESSION_STRONG_INCREASE
        : BID_ADJUSTMENT.PROGRESSION_MILD_INCREASE;
    return increaseBid(ctx, pct);
  },
};

/**
 * 悪化傾向: 副KPI単体が目標未達なら -10%、達成していれば様子見
 */
const poorProgressionRule: BidRule = {
  id: "POOR_PROGRESSION",
  when: (ctx) => ctx.progression === "poor",
  decide: (ctx) => {
    if (ctx.record.spend < DISCARD_THRESHOLDS.MIN_SPEND) {
      return null;
    }
    const secondarySegment = classifySegmentSingle(
      ctx.record.kpiSecondary,
      ctx.config.kpiTargetSecondary
    );
    if (secondarySegment === "green") {
      return null;
    }
    return decreaseBid(ctx, BID_ADJUSTMENT.POOR_PROGRESSION_DECREASE);
  },
};

const greenRule: BidRule = {
  id: "GREEN",
  when: (ctx) => ctx.segment === "green",
  decide: (ctx) => {
    const { installs, fillRate, bidRate, highTier, effectiveBidFloor } = ctx.record;

    if (installs < DISCARD_THRESHOLDS.GREEN_MIN_INSTALLS) {
      return null;
    }

    // 高フィルレート: +15% 固定、highTier で頭打ち（上限超過の例外なし）
    if (fillRate > BID_ADJUSTMENT.HIGH_FILL_RATE) {
      let bid = roundToCents(bidRate * (1 + BID_ADJUSTMENT.FILL_CAPPED_INCREASE));
      if (highTier !== null) {
        bid = roundToCents(Math.min(bid, highTier));
      }
      return applyBidFloor(
        bid,
        increaseLabel(BID_ADJUSTMENT.FILL_CAPPED_INCREASE),
        effectiveBidFloor
      );
    }

    if (fillRate > BID_ADJUSTMENT.MID_FILL_RATE) {
      return increaseBid(ctx, BID_ADJUSTMENT.FILL_CAPPED_INCREASE);
    }

    const { score, target } = scoreOf(ctx);
    return increaseBid(ctx, greenIncreasePct(percentAboveTarget(score, target)));
  },
};

const yellowRule: BidRule = {
  id: "YELLOW",
  when: (ctx) => ctx.segment === "yellow",
  decide: (ctx) => {
    const { score, target } = scoreOf(ctx);
    const pct =
      percentBelowTarget(score, target) <= BID_ADJUSTMENT.YELLOW_MILD_MAX_BELOW
        ? BID_ADJUSTMENT.YELLOW_MILD_DECREASE
        : BID_ADJUSTMENT.YELLOW_STRONG_DECREASE;
    return decreaseBid(ctx, pct);
  },
};

const orangeRule: BidRule = {
  id: "ORANGE",
  when: (ctx) => ctx.segment === "orange",
  decide: (ctx) => {
    const { score, target } = scoreOf(ctx);
    const pct =
      percentBelowTarget(score, target) <= BID_ADJUSTMENT.ORANGE_MILD_MAX_BELOW
        ? BID_ADJUSTMENT.ORANGE_MILD_DECREASE
        : BID_ADJUSTMENT.ORANGE_STRONG_DECREASE;
    return decreaseBid(ctx, pct);
  },
};

/**
 * red（どのルールにも該当しない場合のフォールスルー）
 */
const redRule: BidRule = {
  id: "RED",
  when: () => true,
  decide: (ctx) => decreaseBid(ctx, BID_ADJUSTMENT.RED_DECREASE),
};

/**
 * 評価順のルール一覧
 */
export const BID_RULES: readonly BidRule[] = [
  discardedRule,
  atFloorRule,
  goodProgressionRule,
  poorProgressionRule,
  greenRule,
  yellowRule,
  orangeRule,
  redRule,
];

// =============================================================================
// メイン関数
// =============================================================================

/**
 * 最初に成立したルールで入札アクションを決定
 */
export function optimizeBid(
  ctx: BidContext,
  rules: readonly BidRule[] = BID_RULES
): BidDecision {
  const rule = rules.find((candidate) => candidate.when(ctx)) ?? redRule;
  const outcome = rule.decide(ctx);

  return {
    ruleId: rule.id,
    action: outcome?.action ?? null,
    recommendedBid: outcome?.recommendedBid ?? null,
  };
}
