/**
 * キャンペーン入札最適化エンジン - バリデーションスキーマ
 */

import { z } from "zod";
import { RUN_DEFAULTS } from "./constants";

// =============================================================================
// 基本型のスキーマ
// =============================================================================

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const DataTableSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(z.string(), CellValueSchema)),
});

/**
 * 列指定: 0始まりの列番号、またはスプレッドシートの列記号（"I" 等）
 */
export const ColumnRefSchema = z.union([
  z.number().int().min(0, "column index must be a non-negative integer"),
  z.string().regex(/^\s*[A-Za-z]+\s*$/, "column letter must consist of A-Z"),
]);

export const OutputFormatSchema = z.enum(["json", "csv"]);

const weightSchema = z
  .number()
  .min(0, "weight must be between 0 and 1")
  .max(1, "weight must be between 0 and 1");

const kpiTargetSchema = z.number().positive("KPI target must be greater than 0");

// =============================================================================
// RunConfig スキーマ
// =============================================================================

export const RunConfigSchema = z
  .object({
    kpiTargetPrimary: kpiTargetSchema,
    kpiTargetSecondary: kpiTargetSchema,
    weightPrimary: weightSchema,
    weightSecondary: weightSchema,
    primaryColumnIndex: z.number().int().min(0, "column index must be a non-negative integer"),
    secondaryColumnIndex: z.number().int().min(0, "column index must be a non-negative integer"),
  })
  .refine(
    (config) =>
      Math.abs(config.weightPrimary + config.weightSecondary - 1) <=
      RUN_DEFAULTS.WEIGHT_SUM_TOLERANCE,
    {
      message: "weightPrimary + weightSecondary must equal 1.0",
      path: ["weightSecondary"],
    }
  );

export const RunMetadataSchema = z.object({
  optimizationType: z.string().optional(),
  reportDuration: z.string().optional(),
  notes: z.string().optional(),
});

// =============================================================================
// APIリクエストスキーマ
// =============================================================================

/**
 * リクエストで受け付ける実行設定（重み・列は省略可）
 */
export const OptimizeConfigSchema = z.object({
  kpiTargetPrimary: kpiTargetSchema,
  kpiTargetSecondary: kpiTargetSchema,
  weightPrimary: weightSchema.optional(),
  weightSecondary: weightSchema.optional(),
  primaryColumn: ColumnRefSchema.optional(),
  secondaryColumn: ColumnRefSchema.optional(),
});

export const OptimizeRequestSchema = z.object({
  internal: DataTableSchema,
  external: DataTableSchema,
  config: OptimizeConfigSchema,
  metadata: RunMetadataSchema.optional(),
  format: OutputFormatSchema.optional().default("json"),
});

// =============================================================================
// 型エクスポート（zodから推論）
// =============================================================================

export type ColumnRef = z.infer<typeof ColumnRefSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OptimizeConfig = z.infer<typeof OptimizeConfigSchema>;
export type OptimizeRequest = z.infer<typeof OptimizeRequestSchema>;

// =============================================================================
// バリデーション結果型
// =============================================================================

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

// =============================================================================
// バリデーションヘルパー関数
// =============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) =>
    err.path.length > 0 ? `${err.path.join(".")}: ${err.message}` : err.message
  );
}

/**
 * RunConfigをバリデーション
 */
export function validateRunConfig(
  data: unknown
): ValidationResult<z.infer<typeof RunConfigSchema>> {
  const result = RunConfigSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}
