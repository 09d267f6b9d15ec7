/**
 * 最適化実行
 *
 * 1回の実行 = 社内データ + 広告主データ + 実行設定 → レポート・サマリー。
 * 設定・列解決のエラーは行処理の前に送出し、部分的なレポートは返さない。
 */

import { v4 as uuidv4 } from "uuid";
import { DataTable, RunConfig, RunMetadata } from "../../types";
import { evaluateCampaignRecords } from "../../index";
import { ColumnResolutionError, ConfigurationError } from "../errors";
import { logger, StructuredLogger } from "../logger";
import { validateRunConfig } from "../schemas";
import { findMissingColumns } from "../utils/field-mapper";
import {
  KeyColumnOverrides,
  REQUIRED_INTERNAL_COLUMNS,
  dropIncompleteRecords,
  excludeSiteTypes,
  mergeAdvertiserData,
} from "../merge";
import {
  DEFAULT_PALETTE,
  ReportArtifact,
  ReportPalette,
  RowAnnotation,
  RunSummary,
  annotateReport,
  buildReportArtifact,
  buildRunSummary,
  formatActionBreakdown,
} from "../report";

// =============================================================================
// 型定義
// =============================================================================

export interface OptimizationOptions {
  /** 広告主データのキー列を明示する場合 */
  keyColumns?: KeyColumnOverrides;
  palette?: Readonly<ReportPalette>;
  log?: StructuredLogger;
}

export interface OptimizationResult {
  runId: string;
  report: ReportArtifact;
  annotations: RowAnnotation[];
  summary: RunSummary;
}

// =============================================================================
// 設定検証
// =============================================================================

/**
 * 実行設定を検証し、凍結したコピーを返す
 *
 * @throws {ConfigurationError} 検証に失敗した場合
 */
export function resolveRunConfig(config: unknown): Readonly<RunConfig> {
  const validation = validateRunConfig(config);
  if (!validation.success || validation.data === undefined) {
    const violations = validation.errors ?? [];
    throw new ConfigurationError(
      `Invalid run configuration: ${violations.join("; ")}`,
      violations
    );
  }
  return Object.freeze({ ...validation.data });
}

// =============================================================================
// メイン関数
// =============================================================================

/**
 * 最適化を1回実行
 *
 * @throws {ConfigurationError} 実行設定が不正な場合
 * @throws {ColumnResolutionError} 必須列・KPI列・キー列が解決できない場合
 */
export function runOptimization(
  internal: DataTable,
  external: DataTable,
  config: RunConfig,
  metadata: RunMetadata = {},
  options: OptimizationOptions = {}
): OptimizationResult {
  const runId = uuidv4();
  const log = (options.log ?? logger).child({ runId });

  // 1. 設定検証（行処理の前）
  const runConfig = resolveRunConfig(config);

  log.info("Optimization run started", {
    internalRows: internal.rows.length,
    externalRows: external.rows.length,
    kpiTargetPrimary: runConfig.kpiTargetPrimary,
    kpiTargetSecondary: runConfig.kpiTargetSecondary,
    weightPrimary: runConfig.weightPrimary,
    weightSecondary: runConfig.weightSecondary,
    optimizationType: metadata.optimizationType,
  });

  // 2. 社内データの必須列
  const missing = findMissingColumns(internal.columns, REQUIRED_INTERNAL_COLUMNS);
  if (missing.length > 0) {
    throw new ColumnResolutionError("internal", missing);
  }

  // 3. サイト種別除外 → マージ → null 除去
  const exclusion = excludeSiteTypes(internal.rows);
  const merge = mergeAdvertiserData(
    exclusion.kept,
    external,
    runConfig.primaryColumnIndex,
    runConfig.secondaryColumnIndex,
    { keyColumns: options.keyColumns, log }
  );
  const scorable = dropIncompleteRecords(merge.records);

  if (scorable.droppedCount > 0) {
    log.info("Dropped records with missing values", {
      droppedForNulls: scorable.droppedCount,
    });
  }

  // 4. 判定 → レポート
  const evaluated = evaluateCampaignRecords(scorable.records, runConfig, log);

  const report = buildReportArtifact(evaluated, internal.columns, merge.labels, metadata);
  const annotations = annotateReport(evaluated, options.palette ?? DEFAULT_PALETTE);
  const summary = buildRunSummary({
    evaluated,
    labels: merge.labels,
    excludedRows: exclusion.excludedCount,
    droppedForNulls: scorable.droppedCount,
    malformedKeyRows: merge.malformedKeyRows,
    unparseableKpiCells: merge.unparseableKpiCells,
  });

  log.info("Optimization run completed", {
    totalRows: summary.totalRows,
    actionedRows: summary.actionedRows,
    disregardedRows: summary.disregardedRows,
    dailyCapFlags: summary.dailyCapFlags,
    excludedRows: summary.excludedRows,
    droppedForNulls: summary.droppedForNulls,
    malformedKeyRows: summary.malformedKeyRows,
    actions: formatActionBreakdown(summary),
  });

  return { runId, report, annotations, summary };
}
