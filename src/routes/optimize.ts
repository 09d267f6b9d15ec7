/**
 * 最適化実行エンドポイント
 *
 * POST /optimize
 * - body: { internal, external, config, metadata?, format? }
 * - format: "csv" の場合は text/csv、それ以外は ApiResponse（JSON）
 */

import { Router, Request, Response } from "express";
import { DataTable, RunConfig } from "../../types";
import { RUN_DEFAULTS } from "../constants";
import { ApiResponseBuilder, ValidationError, toAppError } from "../errors";
import { logger } from "../logger";
import { columnLetterToIndex, suggestKpiColumns } from "../merge";
import { OptimizationResult, runOptimization } from "../engine";
import { exportReportToCsv } from "../report";
import { ColumnRef, OptimizeConfig, OptimizeRequestSchema } from "../schemas";

const router = Router();

// =============================================================================
// 型定義
// =============================================================================

export type OptimizeOutcome =
  | { format: "json"; result: OptimizationResult }
  | { format: "csv"; runId: string; csv: string };

// =============================================================================
// リクエスト → RunConfig
// =============================================================================

/**
 * 重みを解決（片方のみ指定された場合は残りを補完）
 */
export function resolveWeights(
  weightPrimary: number | undefined,
  weightSecondary: number | undefined
): { weightPrimary: number; weightSecondary: number } {
  if (weightPrimary === undefined && weightSecondary === undefined) {
    return {
      weightPrimary: RUN_DEFAULTS.WEIGHT_PRIMARY,
      weightSecondary: RUN_DEFAULTS.WEIGHT_SECONDARY,
    };
  }
  if (weightPrimary === undefined) {
    const secondary = weightSecondary ?? RUN_DEFAULTS.WEIGHT_SECONDARY;
    return { weightPrimary: 1 - secondary, weightSecondary: secondary };
  }
  return {
    weightPrimary,
    weightSecondary: weightSecondary ?? 1 - weightPrimary,
  };
}

function toColumnIndex(ref: ColumnRef | undefined, fallback: number): number {
  if (ref === undefined) {
    return fallback;
  }
  return typeof ref === "number" ? ref : columnLetterToIndex(ref);
}

/**
 * リクエストの設定から RunConfig を組み立てる
 *
 * KPI列が省略された場合は広告主データの列名から推定する
 */
export function buildRunConfig(config: OptimizeConfig, external: DataTable): RunConfig {
  const suggested = suggestKpiColumns(external.columns);

  return {
    kpiTargetPrimary: config.kpiTargetPrimary,
    kpiTargetSecondary: config.kpiTargetSecondary,
    ...resolveWeights(config.weightPrimary, config.weightSecondary),
    primaryColumnIndex: toColumnIndex(config.primaryColumn, suggested.primaryColumnIndex),
    secondaryColumnIndex: toColumnIndex(config.secondaryColumn, suggested.secondaryColumnIndex),
  };
}

// =============================================================================
// ハンドラー
// =============================================================================

/**
 * リクエストボディを検証して最適化を実行
 *
 * @throws {ValidationError} ボディの形式が不正な場合
 * @throws {ConfigurationError} 実行設定が不正な場合
 * @throws {ColumnResolutionError} 列が解決できない場合
 */
export function handleOptimizeRequest(body: unknown): OptimizeOutcome {
  const parsed = OptimizeRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }

  const { internal, external, config, metadata, format } = parsed.data;
  const result = runOptimization(
    internal,
    external,
    buildRunConfig(config, external),
    metadata
  );

  if (format === "csv") {
    return { format, runId: result.runId, csv: exportReportToCsv(result.report) };
  }
  return { format, result };
}

function traceIdOf(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === "string" ? traceId : undefined;
}

router.post("/", (req: Request, res: Response) => {
  const traceId = traceIdOf(res);

  try {
    const outcome = handleOptimizeRequest(req.body);

    if (outcome.format === "csv") {
      res
        .status(200)
        .attachment(`optimization-${outcome.runId}.csv`)
        .type("text/csv")
        .send(outcome.csv);
      return;
    }

    res.status(200).json(ApiResponseBuilder.success(outcome.result, { requestId: traceId }));
  } catch (error) {
    const appError = toAppError(error);
    const logData = { traceId, code: appError.code, error: appError.message };
    if (appError.statusCode >= 500) {
      logger.error("Optimization request failed", logData);
    } else {
      logger.warn("Optimization request rejected", logData);
    }

    const response = ApiResponseBuilder.error(appError, traceId);
    res.status(response.statusCode).json(response);
  }
});

export default router;
