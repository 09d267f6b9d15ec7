/**
 * 実行サマリー
 */

import { EvaluatedRecord, Segment } from "../../types";
import { KpiLabels, RunSummary } from "./types";

export interface RunSummaryInput {
  evaluated: readonly EvaluatedRecord[];
  labels: KpiLabels;
  excludedRows: number;
  droppedForNulls: number;
  malformedKeyRows: number;
  unparseableKpiCells: number;
}

/**
 * アクション別件数（件数の降順、同数は初出順）
 */
export function countActions(evaluated: readonly EvaluatedRecord[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const record of evaluated) {
    if (record.action !== null) {
      counts.set(record.action, (counts.get(record.action) ?? 0) + 1);
    }
  }

  // Array.prototype.sort は安定ソート
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return Object.fromEntries(sorted);
}

/**
 * セグメント別件数（4セグメントを常に green → red の順で含む）
 */
export function countSegments(evaluated: readonly EvaluatedRecord[]): Record<Segment, number> {
  const counts: Record<Segment, number> = { green: 0, yellow: 0, orange: 0, red: 0 };
  for (const record of evaluated) {
    counts[record.segment]++;
  }
  return counts;
}

export function buildRunSummary(input: RunSummaryInput): RunSummary {
  const { evaluated } = input;

  return {
    totalRows: evaluated.length,
    excludedRows: input.excludedRows,
    droppedForNulls: input.droppedForNulls,
    malformedKeyRows: input.malformedKeyRows,
    actionedRows: evaluated.filter((record) => record.action !== null).length,
    disregardedRows: evaluated.filter((record) => record.action === null).length,
    dailyCapFlags: evaluated.filter((record) => record.dailyCapSuggestion !== null).length,
    actionBreakdown: countActions(evaluated),
    segmentBreakdown: countSegments(evaluated),
    kpiPrimaryLabel: input.labels.primary,
    kpiSecondaryLabel: input.labels.secondary,
    unparseableKpiCells: input.unparseableKpiCells,
  };
}

/**
 * アクション内訳を表示用の行に整形
 *
 * 例: "Decrease bid 30% — 12 rows (40%)"
 */
export function formatActionBreakdown(summary: RunSummary): string[] {
  return Object.entries(summary.actionBreakdown).map(([action, count]) => {
    const pct = summary.actionedRows > 0 ? Math.round((count / summary.actionedRows) * 100) : 0;
    return `${action} — ${count} rows (${pct}%)`;
  });
}

